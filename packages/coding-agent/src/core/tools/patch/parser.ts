/**
 * Hunk extraction from unified diff text.
 *
 * The scanner is a small state machine:
 *
 *   Seeking       --- path        -> InFileHeader
 *   Seeking       +++ path        -> Seeking (filename committed)
 *   InFileHeader  +++ path        -> Seeking (filename committed)
 *   any           @@ header       -> InHunk (previous hunk closed)
 *   InHunk        --- / +++ pair  -> close hunk, then as Seeking
 *   InHunk        diff --git      -> close hunk, Seeking
 *   InHunk        other line      -> InHunk (body line)
 *   end of input                  -> close hunk
 *
 * A `--- /dev/null` / `+++ path` pair with no hunk after it still yields an
 * empty new-file hunk, so that empty files can be created.
 *
 * Inside a hunk, `--- x` is also what a removed `-- x` line looks like, and
 * `+++ x` an added `++ x`. A `---` line stays in the body while the header's
 * original-line count has room for it; past that it ends the body only when
 * it is bare or followed by `+++`. A lone `+++` line never ends a body.
 */

import { HUNK_HEADER_REGEX } from "./classify";
import { Hunk, type HunkFileInfo } from "./hunk";

export enum ScanState {
	Seeking = "seeking",
	InFileHeader = "file-header",
	InHunk = "hunk",
}

const NULL_DEVICE = "/dev/null";
const EMPTY_NEW_FILE_HEADER = "@@ -0,0 +1,0 @@";

interface FileMarkerState {
	source?: string;
	sourceIsNull: boolean;
	current: HunkFileInfo;
}

/** Path from a `---`/`+++` marker line, without `a/`/`b/` prefix or timestamp */
export function parseMarkerPath(line: string): string | undefined {
	let path = line.slice(3).split("\t")[0].trim();
	if (path.length === 0) {
		return undefined;
	}
	if (path.startsWith('"') && path.endsWith('"') && path.length > 1) {
		path = path.slice(1, -1);
	}
	if (path === NULL_DEVICE) {
		return path;
	}
	if (path.startsWith("a/") || path.startsWith("b/")) {
		path = path.slice(2);
	}
	return path.length > 0 ? path : undefined;
}

export function isHunkHeader(line: string): boolean {
	return line.startsWith("@@");
}

function isSourceMarker(line: string): boolean {
	return line.startsWith("---");
}

function isTargetMarker(line: string): boolean {
	return line.startsWith("+++");
}

/** Lines a counted header still expects on each side; absent for `@@ ... @@` */
interface LineBudget {
	old: number;
	new: number;
}

function parseLineBudget(header: string): LineBudget | undefined {
	const parsed = HUNK_HEADER_REGEX.exec(header);
	if (!parsed) {
		return undefined;
	}
	// An omitted count means one line
	const count = (raw: string | undefined): number => (raw === undefined || raw === "" ? 1 : Number.parseInt(raw, 10));
	return { old: count(parsed[2]), new: count(parsed[4]) };
}

function consumeBudget(budget: LineBudget | undefined, line: string): void {
	if (!budget || line.startsWith("\\")) {
		return;
	}
	if (!line.startsWith("+")) budget.old--;
	if (!line.startsWith("-")) budget.new--;
}

/** Whether a line seen inside a hunk body ends that body */
function endsHunkBody(line: string, next: string | undefined, budget: LineBudget | undefined): boolean {
	if (line.startsWith("diff --git ")) {
		return true;
	}
	if (!isSourceMarker(line) || (budget !== undefined && budget.old > 0)) {
		return false;
	}
	return line === "---" || (next !== undefined && isTargetMarker(next));
}

function applySourceMarker(state: FileMarkerState, line: string): void {
	const path = parseMarkerPath(line);
	if (path === undefined) {
		// A bare `---` separator carries no file information
		return;
	}
	state.source = path === NULL_DEVICE ? undefined : path;
	state.sourceIsNull = path === NULL_DEVICE;
	// Covers diffs whose `+++` line went missing
	state.current = { filename: state.source, isNewFile: false, isDeletedFile: false };
}

function applyTargetMarker(state: FileMarkerState, line: string): void {
	const path = parseMarkerPath(line);
	if (path === undefined) {
		return;
	}
	if (path === NULL_DEVICE) {
		state.current = { filename: state.source, isNewFile: false, isDeletedFile: state.source !== undefined };
	} else {
		state.current = { filename: path, isNewFile: state.sourceIsNull, isDeletedFile: false };
	}
	state.source = undefined;
	state.sourceIsNull = false;
}

/**
 * Split diff lines into hunks.
 *
 * Hunks that no file marker preceded keep `filename === undefined`; callers
 * decide whether to drop them or apply them to a known file.
 */
export function extractHunks(lines: readonly string[]): Hunk[] {
	const hunks: Hunk[] = [];
	const markers: FileMarkerState = { sourceIsNull: false, current: {} };
	let state = ScanState.Seeking;
	let header: string | undefined;
	let body: string[] = [];
	let budget: LineBudget | undefined;
	let pendingNewFile: HunkFileInfo | undefined;

	const flushPendingNewFile = (): void => {
		if (pendingNewFile) {
			hunks.push(new Hunk(EMPTY_NEW_FILE_HEADER, [], pendingNewFile));
		}
		pendingNewFile = undefined;
	};

	const closeHunk = (): void => {
		if (header !== undefined) {
			hunks.push(new Hunk(header, body, { ...markers.current }));
		}
		header = undefined;
		body = [];
	};

	for (let i = 0; i < lines.length; i++) {
		const line = lines[i];

		if (isHunkHeader(line)) {
			closeHunk();
			pendingNewFile = undefined;
			header = line;
			budget = parseLineBudget(line);
			state = ScanState.InHunk;
			continue;
		}

		if (state === ScanState.InHunk) {
			if (!endsHunkBody(line, lines[i + 1], budget)) {
				body.push(line);
				consumeBudget(budget, line);
				continue;
			}
			closeHunk();
			state = ScanState.Seeking;
		}

		if (isSourceMarker(line)) {
			flushPendingNewFile();
			applySourceMarker(markers, line);
			state = ScanState.InFileHeader;
		} else if (isTargetMarker(line)) {
			flushPendingNewFile();
			applyTargetMarker(markers, line);
			pendingNewFile = markers.current.isNewFile ? { ...markers.current } : undefined;
			state = ScanState.Seeking;
		}
	}

	closeHunk();
	flushPendingNewFile();
	return hunks;
}
