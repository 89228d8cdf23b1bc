/**
 * Interpret model responses: pull fenced code blocks out of markdown and
 * decide whether the answer is a diff or a full source file.
 */

import { isUnifiedDiff, isUnifiedDiffNoCounts } from "./classify";
import { toLines } from "./normalize";

const FENCE_OPEN_REGEX = /^(`{3,4}|~{3,4})([\w+#.-]*)\s*$/;
const DIFF_LANGUAGES = new Set(["diff", "patch", "udiff"]);

export type ModelResponse =
	| { kind: "diff"; lines: string[]; hasCounts: boolean }
	| { kind: "source"; language: string; lines: string[] }
	| { kind: "empty" };

/**
 * Extract fenced code blocks, keyed by language tag (`plaintext` when
 * untagged). A block closes only at a fence identical to the one that opened
 * it, so ```` ```` ```` blocks may contain ```` ``` ```` lines.
 */
export function extractCodeBlocks(markdown: string): Map<string, string[]> {
	const blocks = new Map<string, string[]>();
	const lines = toLines(markdown);

	let i = 0;
	while (i < lines.length) {
		const open = FENCE_OPEN_REGEX.exec(lines[i]);
		if (!open) {
			i++;
			continue;
		}
		const fence = open[1];
		const language = open[2] || "plaintext";
		const close = lines.findIndex((line, idx) => idx > i && line.trimEnd() === fence);
		if (close === -1) {
			break;
		}
		const code = lines.slice(i + 1, close).join("\n");
		const existing = blocks.get(language);
		if (existing) {
			existing.push(code);
		} else {
			blocks.set(language, [code]);
		}
		i = close + 1;
	}
	return blocks;
}

/** Drop a leading ```` ```lang ```` line and a trailing ```` ``` ```` line */
export function stripCodeFence(lines: readonly string[]): string[] {
	let result = [...lines];
	if (result.length > 0 && /^\s*(```|~~~)/.test(result[0])) {
		result = result.slice(1);
	}
	if (result.length > 0 && /^\s*(```|~~~)\s*$/.test(result[result.length - 1])) {
		result = result.slice(0, -1);
	}
	return result;
}

function asDiff(lines: string[]): ModelResponse | undefined {
	if (!isUnifiedDiff(lines)) {
		return undefined;
	}
	return { kind: "diff", lines, hasCounts: !isUnifiedDiffNoCounts(lines) };
}

/**
 * Classify a model response.
 *
 * Preference order: a `diff`/`patch` block, any block that is a diff, the raw
 * text as a diff, then the first other code block as full source.
 */
export function interpretResponse(text: string): ModelResponse {
	const blocks = extractCodeBlocks(text);

	for (const language of DIFF_LANGUAGES) {
		for (const code of blocks.get(language) ?? []) {
			const diff = asDiff(toLines(code));
			if (diff) return diff;
		}
	}
	for (const codes of blocks.values()) {
		for (const code of codes) {
			const diff = asDiff(toLines(code));
			if (diff) return diff;
		}
	}

	const raw = asDiff(stripCodeFence(toLines(text)));
	if (raw) return raw;

	for (const [language, codes] of blocks) {
		if (DIFF_LANGUAGES.has(language) || codes.length === 0) continue;
		return { kind: "source", language, lines: toLines(codes[0]) };
	}
	return { kind: "empty" };
}
