/**
 * Shared types for the patch engine.
 */

import type { Hunk } from "./hunk";

// ═══════════════════════════════════════════════════════════════════════════
// File System
// ═══════════════════════════════════════════════════════════════════════════

export interface ExistsOptions {
	/** When false, a symlink counts as existing even if its target does not */
	followSymlinks?: boolean;
}

/** Filesystem operations used by the project patcher */
export interface FileSystem {
	exists(path: string, options?: ExistsOptions): Promise<boolean>;
	read(path: string): Promise<string>;
	write(path: string, content: string): Promise<void>;
	delete(path: string): Promise<void>;
	mkdir(path: string): Promise<void>;
	/** Remove a directory and everything below it */
	removeDirectory(path: string): Promise<void>;
	/** Resolve symlinks; used to keep targets inside the project root */
	realpath(path: string): Promise<string>;
}

// ═══════════════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════════════

export enum PatchFailureKind {
	/** A hunk's match lines were not found at any offset */
	LOCATION = "location",
	/** The target path resolves outside the project root */
	SECURITY = "security",
	/** Missing file, permission denied or another I/O error */
	FILESYSTEM = "filesystem",
}

export class PatchError extends Error {
	readonly kind: PatchFailureKind;
	readonly path?: string;
	readonly cause?: Error;

	constructor(message: string, kind: PatchFailureKind, options: { path?: string; cause?: Error } = {}) {
		super(message);
		this.name = "PatchError";
		this.kind = kind;
		this.path = options.path;
		this.cause = options.cause;
	}
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err;
}

// ═══════════════════════════════════════════════════════════════════════════
// Results
// ═══════════════════════════════════════════════════════════════════════════

export type ApplyHunksResult =
	| { ok: true; lines: string[] }
	| { ok: false; hunk: Hunk; hunkIndex: number };

export type FileChangeType = "create" | "update" | "delete";

export type FilePatchOutcome =
	| {
			ok: true;
			/** Filename as written in the diff */
			filename: string;
			/** Absolute path inside the project root */
			path: string;
			type: FileChangeType;
			hunks: number;
	  }
	| {
			ok: false;
			filename: string;
			path?: string;
			kind: PatchFailureKind;
			message: string;
			hunks: number;
	  };

export interface ProjectPatchResult {
	/** True iff every file group applied and persisted */
	ok: boolean;
	files: FilePatchOutcome[];
	/** Hunks dropped because no file marker preceded them */
	skippedHunks: number;
}

export interface PatchProjectOptions {
	fs?: FileSystem;
	/** Compute outcomes without writing anything */
	dryRun?: boolean;
}
