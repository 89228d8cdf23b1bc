/**
 * Multi-file patch application under a project root.
 *
 * Hunks are grouped by target file. Each group is applied and written on its
 * own: a failing file never blocks the others, and a file is only written
 * after all of its hunks applied.
 */

import { dirname } from "node:path";
import { logger } from "../../logger";
import { resolveWithinRoot } from "../path-utils";
import { applyHunks, defaultFileSystem } from "./applicator";
import type { Hunk } from "./hunk";
import { joinLines, type SplitText, splitText } from "./normalize";
import { extractHunks } from "./parser";
import type { FileChangeType, FilePatchOutcome, FileSystem, PatchProjectOptions, ProjectPatchResult } from "./types";
import { isErrnoException, PatchError, PatchFailureKind } from "./types";

const NEW_FILE_FORMAT: Omit<SplitText, "lines"> = { bom: "", lineEnding: "\n", hadFinalNewline: true };

interface FileGroup {
	filename: string;
	hunks: Hunk[];
}

function groupByFile(hunks: readonly Hunk[]): { groups: FileGroup[]; skipped: number } {
	const byName = new Map<string, FileGroup>();
	let skipped = 0;
	for (const hunk of hunks) {
		if (hunk.filename === undefined) {
			skipped++;
			continue;
		}
		let group = byName.get(hunk.filename);
		if (!group) {
			group = { filename: hunk.filename, hunks: [] };
			byName.set(hunk.filename, group);
		}
		group.hunks.push(hunk);
	}
	return { groups: [...byName.values()], skipped };
}

/** Run a filesystem step, reporting any I/O error as a `filesystem` failure */
async function withFileSystem<T>(path: string, action: string, run: () => Promise<T>): Promise<T> {
	try {
		return await run();
	} catch (err) {
		if (err instanceof PatchError || !isErrnoException(err)) {
			throw err;
		}
		throw new PatchError(`Failed to ${action} ${path}: ${err.message}`, PatchFailureKind.FILESYSTEM, {
			path,
			cause: err,
		});
	}
}

/** Topmost directory on the way to `dir` that does not exist yet */
async function firstMissingDirectory(fs: FileSystem, dir: string): Promise<string | undefined> {
	let missing: string | undefined;
	let current = dir;
	while (!(await fs.exists(current))) {
		missing = current;
		const parent = dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}
	return missing;
}

/** Write a new file, removing the directories made for it if the write fails */
async function writeNewFile(fs: FileSystem, path: string, content: string): Promise<void> {
	const parentDir = dirname(path);
	const created = await withFileSystem(parentDir, "check", () => firstMissingDirectory(fs, parentDir));
	await withFileSystem(parentDir, "create directory", () => fs.mkdir(parentDir));
	try {
		await withFileSystem(path, "write", () => fs.write(path, content));
	} catch (err) {
		if (created !== undefined) {
			await fs.removeDirectory(created).catch((cleanupErr: unknown) => {
				logger.warn("Failed to remove directory created for new file", {
					path: created,
					error: String(cleanupErr),
				});
			});
		}
		throw err;
	}
}

async function patchFile(
	projectRoot: string,
	group: FileGroup,
	fuzziness: number,
	fs: FileSystem,
	dryRun: boolean,
): Promise<{ path: string; type: FileChangeType }> {
	const { filename, hunks } = group;
	const path = await withFileSystem(filename, "resolve", () => resolveWithinRoot(projectRoot, filename, fs));
	const isNewFile = hunks.every((hunk) => hunk.isNewFile);

	let original: SplitText;
	if (isNewFile) {
		original = { lines: [], ...NEW_FILE_FORMAT };
		if (await withFileSystem(path, "check", () => fs.exists(path))) {
			logger.warn("New-file patch targets an existing file; replacing it", { path });
		}
	} else {
		if (!(await withFileSystem(path, "check", () => fs.exists(path)))) {
			throw new PatchError(`File not found: ${filename}`, PatchFailureKind.FILESYSTEM, { path });
		}
		original = splitText(await withFileSystem(path, "read", () => fs.read(path)));
	}

	const result = applyHunks(original.lines, hunks, fuzziness);
	if (!result.ok) {
		const firstLine = result.hunk.match[0] ?? "";
		throw new PatchError(
			`Hunk ${result.hunkIndex + 1} of ${hunks.length} (${result.hunk.toString()}) does not match ${filename}` +
				(firstLine ? ` near: ${firstLine}` : ""),
			PatchFailureKind.LOCATION,
			{ path },
		);
	}

	const isDeletion = hunks.every((hunk) => hunk.isDeletedFile) && result.lines.length === 0;
	const type: FileChangeType = isNewFile ? "create" : isDeletion ? "delete" : "update";
	if (dryRun) {
		return { path, type };
	}

	if (isDeletion) {
		await withFileSystem(path, "delete", () => fs.delete(path));
		return { path, type };
	}

	const content = joinLines(result.lines, original);
	if (isNewFile) {
		await writeNewFile(fs, path, content);
	} else {
		await withFileSystem(path, "write", () => fs.write(path, content));
	}
	return { path, type };
}

/**
 * Apply a multi-file unified diff under `projectRoot`, reporting each file.
 */
export async function patchProjectFiles(
	projectRoot: string,
	patchLines: readonly string[],
	fuzziness = 0,
	options: PatchProjectOptions = {},
): Promise<ProjectPatchResult> {
	const { fs = defaultFileSystem, dryRun = false } = options;
	const { groups, skipped } = groupByFile(extractHunks(patchLines));
	if (skipped > 0) {
		logger.debug("Skipping hunks without a file marker", { count: skipped });
	}

	const files: FilePatchOutcome[] = [];
	for (const group of groups) {
		try {
			const { path, type } = await patchFile(projectRoot, group, fuzziness, fs, dryRun);
			files.push({ ok: true, filename: group.filename, path, type, hunks: group.hunks.length });
		} catch (err) {
			if (!(err instanceof PatchError)) {
				throw err;
			}
			logger.warn("Patch failed for file", { filename: group.filename, kind: err.kind, error: err.message });
			files.push({
				ok: false,
				filename: group.filename,
				path: err.path,
				kind: err.kind,
				message: err.message,
				hunks: group.hunks.length,
			});
		}
	}

	return { ok: files.every((file) => file.ok), files, skippedHunks: skipped };
}

/**
 * Apply a multi-file unified diff under `projectRoot`.
 *
 * Returns true iff every targeted file was patched. Files that applied are
 * written even when others fail.
 */
export async function patchProject(
	projectRoot: string,
	patchLines: readonly string[],
	fuzziness = 0,
	options: PatchProjectOptions = {},
): Promise<boolean> {
	const result = await patchProjectFiles(projectRoot, patchLines, fuzziness, options);
	return result.ok;
}
