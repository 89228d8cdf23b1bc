/**
 * A single parsed unified-diff edit operation.
 */

import { logger } from "../../logger";
import { HUNK_HEADER_REGEX } from "./classify";
import { matchesAt, seekSequence } from "./fuzzy";

export interface HunkFileInfo {
	filename?: string;
	isNewFile?: boolean;
	isDeletedFile?: boolean;
}

const NO_NEWLINE_MARKER = "\\";

function parseCount(raw: string | undefined): number | undefined {
	return raw === undefined || raw === "" ? undefined : Number.parseInt(raw, 10);
}

export class Hunk {
	static readonly MAX_STARTING_CONTEXT = 3;
	static readonly MAX_TRAILING_CONTEXT = 3;

	/** 1-based, undefined for `@@ ... @@` headers */
	readonly startOriginal: number | undefined;
	readonly startNew: number | undefined;
	/** Declared counts; advisory only */
	readonly originalCount: number | undefined;
	readonly newCount: number | undefined;

	readonly filename: string | undefined;
	readonly isNewFile: boolean;
	readonly isDeletedFile: boolean;

	match: string[] = [];
	replace: string[] = [];

	constructor(header: string, lines: readonly string[], file: HunkFileInfo = {}) {
		const parsed = HUNK_HEADER_REGEX.exec(header);
		this.startOriginal = parsed ? Number.parseInt(parsed[1], 10) : undefined;
		this.originalCount = parsed ? parseCount(parsed[2]) : undefined;
		this.startNew = parsed ? Number.parseInt(parsed[3], 10) : undefined;
		this.newCount = parsed ? parseCount(parsed[4]) : undefined;

		this.filename = file.filename;
		this.isNewFile = file.isNewFile ?? false;
		this.isDeletedFile = file.isDeletedFile ?? false;

		this.#parseBody(lines);
		this.#trimContext();
	}

	#parseBody(lines: readonly string[]): void {
		let end = lines.length;
		while (end > 0 && lines[end - 1].trim() === "") {
			end--;
		}

		for (const line of lines.slice(0, end)) {
			if (line.startsWith(NO_NEWLINE_MARKER)) {
				continue;
			}
			if (line.startsWith("+")) {
				this.replace.push(line.slice(1));
			} else if (line.startsWith("-")) {
				this.match.push(line.slice(1));
			} else {
				// Models often drop the leading space of context lines; keep such lines verbatim
				const content = line.startsWith(" ") ? line.slice(1) : line;
				this.match.push(content);
				this.replace.push(content);
			}
		}
	}

	#trimContext(): void {
		const leading = this.#countCommonLines((i) => this.match[i] === this.replace[i]);
		if (leading > Hunk.MAX_STARTING_CONTEXT) {
			const excess = leading - Hunk.MAX_STARTING_CONTEXT;
			logger.debug("Trimming leading hunk context", { excess, header: this.toString() });
			this.match = this.match.slice(excess);
			this.replace = this.replace.slice(excess);
		}

		const trailing = this.#countCommonLines(
			(i) => this.match[this.match.length - 1 - i] === this.replace[this.replace.length - 1 - i],
		);
		if (trailing > Hunk.MAX_TRAILING_CONTEXT) {
			const excess = trailing - Hunk.MAX_TRAILING_CONTEXT;
			logger.debug("Trimming trailing hunk context", { excess, header: this.toString() });
			this.match = this.match.slice(0, -excess);
			this.replace = this.replace.slice(0, -excess);
		}
	}

	#countCommonLines(isCommon: (offset: number) => boolean): number {
		const limit = Math.min(this.match.length, this.replace.length);
		let count = 0;
		while (count < limit && isCommon(count)) {
			count++;
		}
		return count;
	}

	matchCount(): number {
		return this.match.length;
	}

	replaceCount(): number {
		return this.replace.length;
	}

	/** No lines to find and none to write: a no-op, or the "create empty file" hunk */
	empty(): boolean {
		return this.matchCount() === 0 && this.replaceCount() === 0;
	}

	/** Number of leading lines shared by `match` and `replace` */
	leadingContext(): number {
		return this.#countCommonLines((i) => this.match[i] === this.replace[i]);
	}

	/** Number of trailing lines shared by `match` and `replace`, not overlapping the leading ones */
	trailingContext(): number {
		const leading = this.leadingContext();
		const limit = Math.min(this.match.length, this.replace.length) - leading;
		let count = 0;
		while (
			count < limit &&
			this.match[this.match.length - 1 - count] === this.replace[this.replace.length - 1 - count]
		) {
			count++;
		}
		return count;
	}

	/** Whether the match lines sit at `index` (0-based) in `codeLines` */
	matchesCode(codeLines: readonly string[], index: number, fuzziness = 0): boolean {
		return matchesAt(codeLines, this.match, index, fuzziness);
	}

	/**
	 * Locate the hunk in `codeLines`, starting at the declared line and widening
	 * outward. Pure insertions resolve to the declared position (or the end of
	 * the buffer when the header carries no line numbers).
	 */
	matchCode(codeLines: readonly string[], fuzziness = 0): number | undefined {
		if (this.matchCount() === 0) {
			const position = this.startOriginal ?? codeLines.length;
			return Math.max(0, Math.min(position, codeLines.length));
		}
		const hint = this.startOriginal === undefined ? 0 : this.startOriginal - 1;
		return seekSequence(codeLines, this.match, hint, fuzziness);
	}

	toString(): string {
		return `@@ -${this.startOriginal ?? "?"},${this.matchCount()} +${this.startNew ?? "?"},${this.replaceCount()} @@`;
	}
}
