/**
 * Decide whether model output is a unified diff.
 */

/** `@@ -a,b +c,d @@` with either count optional */
export const HUNK_HEADER_REGEX = /^@@ -(\d+)(?:,(\d*))? \+(\d+)(?:,(\d*))? @@/;

/** `@@ ... @@`, emitted when the model did not compute line numbers */
export const HUNK_HEADER_NO_COUNTS_REGEX = /^@@ \.\.\. @@/;

export function isUnifiedDiff(lines: readonly string[]): boolean {
	return lines.some((line) => HUNK_HEADER_REGEX.test(line) || HUNK_HEADER_NO_COUNTS_REGEX.test(line));
}

export function isUnifiedDiffNoCounts(lines: readonly string[]): boolean {
	return lines.some((line) => HUNK_HEADER_NO_COUNTS_REGEX.test(line));
}
