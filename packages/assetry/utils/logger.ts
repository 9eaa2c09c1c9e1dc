import { type ConsolaInstance, createConsola, LogLevels } from "consola"
import { ASSETRY_LOG_LEVEL } from "@/env"

/** `--verbose` raises the environment level to debug, never lowers it. */
export function createLogger(verbose: boolean, level = ASSETRY_LOG_LEVEL): ConsolaInstance {
	return createConsola({ level: verbose ? Math.max(level, LogLevels.debug) : level })
}
