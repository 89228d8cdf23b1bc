/**
 * Fuzzy line matching for hunk location.
 *
 * Fuzziness levels:
 * - 0: exact string equality
 * - 1: ignore trailing whitespace and trailing `#` comments
 * - 2: additionally ignore indentation and whitespace runs
 */

import { collapseWhitespace, trimTrailingComment } from "./normalize";

export type LineComparator = (actual: string, expected: string) => boolean;

const exact: LineComparator = (actual, expected) => actual === expected;

const ignoreComments: LineComparator = (actual, expected) =>
	trimTrailingComment(actual) === trimTrailingComment(expected);

const ignoreWhitespace: LineComparator = (actual, expected) =>
	collapseWhitespace(trimTrailingComment(actual)) === collapseWhitespace(trimTrailingComment(expected));

export function getLineComparator(fuzziness: number): LineComparator {
	if (fuzziness <= 0) return exact;
	if (fuzziness === 1) return ignoreComments;
	return ignoreWhitespace;
}

/** Whether `pattern` lines up with `lines` starting at `index` */
export function matchesAt(
	lines: readonly string[],
	pattern: readonly string[],
	index: number,
	fuzziness: number,
): boolean {
	if (index < 0 || index + pattern.length > lines.length) {
		return false;
	}
	const equals = getLineComparator(fuzziness);
	for (let i = 0; i < pattern.length; i++) {
		if (!equals(lines[index + i], pattern[i])) {
			return false;
		}
	}
	return true;
}

/**
 * Find `pattern` in `lines`, searching outward from `hintIndex`.
 *
 * Candidates are visited by increasing distance from the hint, later offsets
 * first on ties (hint, hint+1, hint-1, hint+2, ...), so the closest match to
 * the declared position wins.
 */
export function seekSequence(
	lines: readonly string[],
	pattern: readonly string[],
	hintIndex: number,
	fuzziness: number,
): number | undefined {
	const lastStart = lines.length - pattern.length;
	if (lastStart < 0) {
		return undefined;
	}
	const start = Math.max(0, Math.min(hintIndex, lastStart));
	const maxDistance = Math.max(start, lastStart - start);
	for (let distance = 0; distance <= maxDistance; distance++) {
		const after = start + distance;
		if (after <= lastStart && matchesAt(lines, pattern, after, fuzziness)) {
			return after;
		}
		const before = start - distance;
		if (distance > 0 && before >= 0 && matchesAt(lines, pattern, before, fuzziness)) {
			return before;
		}
	}
	return undefined;
}
