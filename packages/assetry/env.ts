import { type LogLevel, LogLevels } from "consola"

const NAMED_LEVELS: Record<string, LogLevel> = {
	debug: LogLevels.debug,
	error: LogLevels.error,
	info: LogLevels.info,
	silent: LogLevels.silent,
	trace: LogLevels.trace,
	warn: LogLevels.warn,
}

/** Level named by ASSETRY_LOG_LEVEL; unknown or unset values mean info. */
export function parseLogLevel(value: string | undefined): LogLevel {
	const named = value ? NAMED_LEVELS[value.trim().toLowerCase()] : undefined
	return named ?? LogLevels.info
}

export const ASSETRY_LOG_LEVEL = parseLogLevel(process.env.ASSETRY_LOG_LEVEL)
