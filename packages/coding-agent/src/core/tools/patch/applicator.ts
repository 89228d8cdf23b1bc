/**
 * Patch application logic.
 *
 * Applies parsed hunks to a line buffer in diff order. Each hunk is located
 * against the buffer as already modified by the hunks before it, so declared
 * line numbers only serve as a starting point for the search.
 */

import { lstat, mkdir, readFile, realpath, rm, stat, writeFile } from "node:fs/promises";
import { logger } from "../../logger";
import type { Hunk } from "./hunk";
import { extractHunks } from "./parser";
import { type ApplyHunksResult, type ExistsOptions, type FileSystem, isErrnoException } from "./types";

// ═══════════════════════════════════════════════════════════════════════════
// Default File System
// ═══════════════════════════════════════════════════════════════════════════

/** Default filesystem implementation using node:fs/promises */
export const defaultFileSystem: FileSystem = {
	async exists(path: string, options: ExistsOptions = {}): Promise<boolean> {
		const { followSymlinks = true } = options;
		try {
			await (followSymlinks ? stat(path) : lstat(path));
			return true;
		} catch (err) {
			if (isErrnoException(err) && err.code === "ENOENT") {
				return false;
			}
			throw err;
		}
	},
	async read(path: string): Promise<string> {
		return readFile(path, "utf-8");
	},
	async write(path: string, content: string): Promise<void> {
		await writeFile(path, content, "utf-8");
	},
	async delete(path: string): Promise<void> {
		await rm(path);
	},
	async mkdir(path: string): Promise<void> {
		await mkdir(path, { recursive: true });
	},
	async removeDirectory(path: string): Promise<void> {
		await rm(path, { recursive: true, force: true });
	},
	async realpath(path: string): Promise<string> {
		return realpath(path);
	},
};

// ═══════════════════════════════════════════════════════════════════════════
// Hunk Location
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Find a hunk, trying the strictest comparison first and relaxing up to
 * `fuzziness`.
 */
export function locateHunk(
	lines: readonly string[],
	hunk: Hunk,
	fuzziness: number,
): { index: number; fuzziness: number } | undefined {
	for (let level = 0; level <= Math.max(0, fuzziness); level++) {
		const index = hunk.matchCode(lines, level);
		if (index !== undefined) {
			return { index, fuzziness: level };
		}
	}
	return undefined;
}

/**
 * Lines to splice in for a hunk found at `index`.
 *
 * Leading and trailing context keeps the buffer's own text, so a context line
 * matched while ignoring its comment or indentation is written back unchanged.
 */
function buildReplacement(lines: readonly string[], hunk: Hunk, index: number): string[] {
	const replacement = [...hunk.replace];
	const leading = hunk.leadingContext();
	const trailing = hunk.trailingContext();
	for (let i = 0; i < leading; i++) {
		replacement[i] = lines[index + i];
	}
	for (let i = 1; i <= trailing; i++) {
		replacement[replacement.length - i] = lines[index + hunk.matchCount() - i];
	}
	return replacement;
}

// ═══════════════════════════════════════════════════════════════════════════
// Public API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Apply hunks in order to a copy of `lines`.
 *
 * Stops at the first hunk that cannot be located; `lines` itself is never
 * modified.
 */
export function applyHunks(lines: readonly string[], hunks: readonly Hunk[], fuzziness: number): ApplyHunksResult {
	const working = [...lines];

	for (let hunkIndex = 0; hunkIndex < hunks.length; hunkIndex++) {
		const hunk = hunks[hunkIndex];
		if (hunk.empty()) {
			continue;
		}

		const location = locateHunk(working, hunk, fuzziness);
		if (!location) {
			logger.warn("Cannot locate hunk", {
				hunk: hunk.toString(),
				hunkIndex,
				fuzziness,
				firstLine: hunk.match[0],
			});
			return { ok: false, hunk, hunkIndex };
		}

		logger.debug("Applying hunk", {
			hunk: hunk.toString(),
			index: location.index,
			fuzziness: location.fuzziness,
		});
		working.splice(location.index, hunk.matchCount(), ...buildReplacement(working, hunk, location.index));
	}

	return { ok: true, lines: working };
}

/**
 * Apply a unified diff to an in-memory line buffer.
 *
 * File markers in the diff are ignored; every hunk targets `codeLines`.
 * Returns false and leaves `codeLines` untouched if the diff has no hunks or
 * any hunk cannot be located; on success `codeLines` is updated in place.
 */
export function patchCode(codeLines: string[], patchLines: readonly string[], fuzziness = 0): boolean {
	const hunks = extractHunks(patchLines);
	if (hunks.length === 0) {
		logger.warn("Diff contains no hunks");
		return false;
	}
	logger.debug("Extracted hunks", { count: hunks.length });

	const result = applyHunks(codeLines, hunks, fuzziness);
	if (!result.ok) {
		return false;
	}
	codeLines.splice(0, codeLines.length, ...result.lines);
	return true;
}
