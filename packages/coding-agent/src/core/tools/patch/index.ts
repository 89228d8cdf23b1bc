/**
 * Patch tool module.
 *
 * Applies model-written unified diffs to files under the session's project
 * root, one file at a time.
 */

import { readFileSync } from "node:fs";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { logger } from "../../logger";
import { DEFAULT_FUZZINESS, MAX_FUZZINESS, type PatchSettings } from "../../settings";
import { isUnifiedDiff } from "./classify";
import { toLines } from "./normalize";
import { patchProjectFiles } from "./project";
import type { FilePatchOutcome, FileSystem, ProjectPatchResult } from "./types";

// ═══════════════════════════════════════════════════════════════════════════
// Re-exports
// ═══════════════════════════════════════════════════════════════════════════

// Application
export { applyHunks, defaultFileSystem, locateHunk, patchCode } from "./applicator";
export { patchProject, patchProjectFiles } from "./project";

// Classification
export { HUNK_HEADER_NO_COUNTS_REGEX, HUNK_HEADER_REGEX, isUnifiedDiff, isUnifiedDiffNoCounts } from "./classify";

// Fuzzy matching
export { getLineComparator, type LineComparator, matchesAt, seekSequence } from "./fuzzy";

// Parsing
export { Hunk, type HunkFileInfo } from "./hunk";
export { extractHunks, parseMarkerPath, ScanState } from "./parser";

// Normalization
export {
	collapseWhitespace,
	detectLineEnding,
	joinLines,
	normalizeToLF,
	restoreLineEndings,
	splitText,
	stripBom,
	toLines,
	trimTrailingComment,
} from "./normalize";

// Model responses
export { extractCodeBlocks, interpretResponse, type ModelResponse, stripCodeFence } from "./response";

// Types
export type {
	ApplyHunksResult,
	ExistsOptions,
	FileChangeType,
	FilePatchOutcome,
	FileSystem,
	PatchProjectOptions,
	ProjectPatchResult,
} from "./types";
export { PatchError, PatchFailureKind } from "./types";

// ═══════════════════════════════════════════════════════════════════════════
// Schema
// ═══════════════════════════════════════════════════════════════════════════

const patchDescription = readFileSync(new URL("../../../prompts/tools/patch.md", import.meta.url), "utf-8");

export const patchToolSchema = Type.Object({
	diff: Type.String({ description: "Unified diff covering one or more files" }),
	fuzziness: Type.Optional(
		Type.Integer({
			minimum: 0,
			maximum: MAX_FUZZINESS,
			description: "0 = exact, 1 = ignore trailing comments, 2 = also ignore whitespace",
		}),
	),
});

export type PatchParams = Static<typeof patchToolSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// Tool Class
// ═══════════════════════════════════════════════════════════════════════════

export interface PatchToolSession {
	/** Project root; every patched file must resolve inside it */
	cwd: string;
	settings?: PatchSettings;
	fs?: FileSystem;
}

export interface PatchToolResult {
	content: Array<{ type: "text"; text: string }>;
	details: ProjectPatchResult;
}

function describeOutcome(file: FilePatchOutcome): string {
	if (!file.ok) {
		return `Failed (${file.kind}) ${file.filename}: ${file.message}`;
	}
	switch (file.type) {
		case "create":
			return `Created ${file.filename}`;
		case "delete":
			return `Deleted ${file.filename}`;
		case "update":
			return `Patched ${file.filename}`;
	}
}

export class PatchTool {
	public readonly name = "patch";
	public readonly label = "Patch";
	public readonly description = patchDescription;
	public readonly parameters = patchToolSchema;

	private readonly session: PatchToolSession;

	constructor(session: PatchToolSession) {
		this.session = session;
		if (session.settings) {
			logger.setLevel(session.settings.logLevel);
		}
	}

	public async execute(_toolCallId: string, params: PatchParams): Promise<PatchToolResult> {
		if (!Value.Check(patchToolSchema, params)) {
			const [first] = [...Value.Errors(patchToolSchema, params)];
			throw new Error(`Invalid patch parameters: ${first ? `${first.path} ${first.message}` : "unknown error"}`);
		}

		const lines = toLines(params.diff);
		if (!isUnifiedDiff(lines)) {
			return {
				content: [{ type: "text", text: "Input is not a unified diff: no @@ hunk headers found." }],
				details: { ok: false, files: [], skippedHunks: 0 },
			};
		}

		const fuzziness = params.fuzziness ?? this.session.settings?.fuzziness ?? DEFAULT_FUZZINESS;
		const result = await patchProjectFiles(this.session.cwd, lines, fuzziness, { fs: this.session.fs });

		const summary = result.files.map(describeOutcome);
		if (result.skippedHunks > 0) {
			summary.push(`Skipped ${result.skippedHunks} hunk(s) without a --- / +++ file header`);
		}
		if (result.files.length === 0) {
			summary.push("No file in the diff was patched.");
		}

		return {
			content: [{ type: "text", text: summary.join("\n") }],
			details: { ...result, ok: result.ok && result.files.length > 0 },
		};
	}
}
