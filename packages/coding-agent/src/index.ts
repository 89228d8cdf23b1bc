// Logging
export { LOG_LEVELS, type Logger, type LogLevel, logger } from "./core/logger";
// Settings
export {
	DEFAULT_FUZZINESS,
	loadPatchSettings,
	MAX_FUZZINESS,
	type PatchSettings,
	patchSettingsSchema,
} from "./core/settings";
// Path safety
export { isWithinRoot, resolveToCwd, resolveWithinRoot } from "./core/tools/path-utils";
// Patch engine
export {
	type ApplyHunksResult,
	applyHunks,
	defaultFileSystem,
	type ExistsOptions,
	extractCodeBlocks,
	extractHunks,
	type FileChangeType,
	type FilePatchOutcome,
	type FileSystem,
	Hunk,
	type HunkFileInfo,
	interpretResponse,
	isUnifiedDiff,
	isUnifiedDiffNoCounts,
	type ModelResponse,
	PatchError,
	PatchFailureKind,
	type PatchParams,
	type PatchProjectOptions,
	PatchTool,
	type PatchToolResult,
	type PatchToolSession,
	patchCode,
	patchProject,
	patchProjectFiles,
	patchToolSchema,
	type ProjectPatchResult,
	stripCodeFence,
	toLines,
} from "./core/tools/patch/index";
