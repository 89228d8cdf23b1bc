/**
 * Text normalization helpers: line comparison forms, BOM and line endings.
 */

// ═══════════════════════════════════════════════════════════════════════════
// Line comparison forms
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Strip trailing whitespace and a trailing `#` comment.
 *
 * A `#` inside a single- or double-quoted string is not a comment:
 * `print("#")` is kept whole, `x = 1  # note` becomes `x = 1`.
 */
export function trimTrailingComment(line: string): string {
	let quote: string | undefined;
	for (let i = 0; i < line.length; i++) {
		const ch = line[i];
		if (quote) {
			if (ch === "\\") {
				i++;
			} else if (ch === quote) {
				quote = undefined;
			}
			continue;
		}
		if (ch === '"' || ch === "'") {
			quote = ch;
		} else if (ch === "#") {
			return line.slice(0, i).trimEnd();
		}
	}
	return line.trimEnd();
}

/** Collapse whitespace runs to one space and drop indentation */
export function collapseWhitespace(line: string): string {
	return line.trim().replace(/\s+/g, " ");
}

// ═══════════════════════════════════════════════════════════════════════════
// BOM and line endings
// ═══════════════════════════════════════════════════════════════════════════

export function stripBom(content: string): { bom: string; text: string } {
	return content.startsWith("\uFEFF") ? { bom: "\uFEFF", text: content.slice(1) } : { bom: "", text: content };
}

export function detectLineEnding(content: string): "\r\n" | "\n" {
	const crlfIdx = content.indexOf("\r\n");
	const lfIdx = content.indexOf("\n");
	if (lfIdx === -1) return "\n";
	if (crlfIdx === -1) return "\n";
	return crlfIdx < lfIdx ? "\r\n" : "\n";
}

export function normalizeToLF(text: string): string {
	return text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");
}

export function restoreLineEndings(text: string, ending: "\r\n" | "\n"): string {
	return ending === "\r\n" ? text.replace(/\n/g, "\r\n") : text;
}

// ═══════════════════════════════════════════════════════════════════════════
// Text <-> lines
// ═══════════════════════════════════════════════════════════════════════════

export interface SplitText {
	lines: string[];
	bom: string;
	lineEnding: "\r\n" | "\n";
	hadFinalNewline: boolean;
}

/** Split file content into a line buffer, remembering how to put it back together */
export function splitText(content: string): SplitText {
	const { bom, text } = stripBom(content);
	const lineEnding = detectLineEnding(text);
	const normalized = normalizeToLF(text);
	const hadFinalNewline = normalized.endsWith("\n");
	const body = hadFinalNewline ? normalized.slice(0, -1) : normalized;
	return {
		lines: body.length === 0 && !hadFinalNewline ? [] : body.split("\n"),
		bom,
		lineEnding,
		hadFinalNewline,
	};
}

export function joinLines(
	lines: readonly string[],
	format: Pick<SplitText, "bom" | "lineEnding" | "hadFinalNewline">,
): string {
	if (lines.length === 0) {
		return format.bom;
	}
	const body = lines.join("\n") + (format.hadFinalNewline ? "\n" : "");
	return format.bom + restoreLineEndings(body, format.lineEnding);
}

/** Split diff or response text into lines, tolerating CRLF */
export function toLines(text: string): string[] {
	return normalizeToLF(text).split("\n");
}
