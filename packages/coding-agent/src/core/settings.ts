import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { LOG_LEVELS, type LogLevel } from "./logger";

export const MAX_FUZZINESS = 2;
export const DEFAULT_FUZZINESS = 1;

const fuzzinessSchema = Type.Integer({ minimum: 0, maximum: MAX_FUZZINESS });

export const patchSettingsSchema = Type.Object({
	fuzziness: fuzzinessSchema,
	logLevel: Type.Union(LOG_LEVELS.map((level) => Type.Literal(level))),
});

export type PatchSettings = Static<typeof patchSettingsSchema>;

function parseFuzziness(raw: string | undefined): number {
	if (raw === undefined || raw === "auto") {
		return DEFAULT_FUZZINESS;
	}
	const value = Number(raw.trim());
	if (raw.trim().length === 0 || !Value.Check(fuzzinessSchema, value)) {
		throw new Error(`Invalid FUZZPATCH_FUZZINESS: ${raw}`);
	}
	return value;
}

function parseLogLevel(raw: string | undefined): LogLevel {
	if (raw === undefined) {
		return "warn";
	}
	const level = LOG_LEVELS.find((candidate) => candidate === raw.trim().toLowerCase());
	if (!level) {
		throw new Error(`Invalid FUZZPATCH_LOG_LEVEL: ${raw}`);
	}
	return level;
}

/**
 * Read patch settings from the environment.
 *
 * Unset variables fall back to defaults; malformed ones throw.
 */
export function loadPatchSettings(env: NodeJS.ProcessEnv = process.env): PatchSettings {
	const { FUZZPATCH_FUZZINESS: fuzziness, FUZZPATCH_LOG_LEVEL: logLevel } = env;
	return {
		fuzziness: parseFuzziness(fuzziness),
		logLevel: parseLogLevel(logLevel),
	};
}
