import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import type { FileSystem } from "./patch/types";
import { isErrnoException, PatchError, PatchFailureKind } from "./patch/types";

export function resolveToCwd(filePath: string, cwd: string): string {
	return resolve(cwd, filePath);
}

/** Whether `target` is strictly inside `root`; both must be absolute */
export function isWithinRoot(root: string, target: string): boolean {
	const rel = relative(root, target);
	if (rel === "" || isAbsolute(rel)) {
		return false;
	}
	return rel !== ".." && !rel.startsWith(`..${sep}`);
}

/** Deepest existing entry on the way to `target`; symlinks count whether or not they dangle */
async function nearestExistingPath(fs: FileSystem, target: string): Promise<string> {
	let current = target;
	while (!(await fs.exists(current, { followSymlinks: false }))) {
		const parent = dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}
	return current;
}

/**
 * Resolve a diff filename against the project root.
 *
 * The lexical path must stay inside the root, and so must the real path of
 * its nearest existing entry, which rules out symlinks pointing outside.
 * A dangling symlink on the way is rejected outright.
 *
 * @throws PatchError with kind `security` when the path escapes the root
 */
export async function resolveWithinRoot(projectRoot: string, filename: string, fs: FileSystem): Promise<string> {
	const root = resolve(projectRoot);
	const target = resolveToCwd(filename, root);
	if (!isWithinRoot(root, target)) {
		throw new PatchError(`Path escapes project root: ${filename}`, PatchFailureKind.SECURITY, { path: target });
	}

	const realRoot = await fs.realpath(root);
	const existing = await nearestExistingPath(fs, target);
	let realExisting: string;
	try {
		realExisting = await fs.realpath(existing);
	} catch (err) {
		if (isErrnoException(err) && err.code === "ENOENT") {
			throw new PatchError(`Path resolves through a dangling symlink: ${filename}`, PatchFailureKind.SECURITY, {
				path: target,
			});
		}
		throw err;
	}
	const realTarget = resolve(realExisting, relative(existing, target));
	if (!isWithinRoot(realRoot, realTarget)) {
		throw new PatchError(`Path resolves outside project root: ${filename}`, PatchFailureKind.SECURITY, {
			path: target,
		});
	}
	return target;
}
