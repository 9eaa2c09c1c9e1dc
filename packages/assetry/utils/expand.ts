import { homedir } from "node:os"

const VARIABLE_PATTERN = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g

/**
 * Expand a leading `~` and `$VAR` / `${VAR}` references.
 * Unset variables are left as written.
 */
export function expandPath(
	value: string,
	env: NodeJS.ProcessEnv = process.env,
	home: string = homedir(),
): string {
	const withHome =
		value === "~" || value.startsWith("~/") || value.startsWith("~\\")
			? `${home}${value.slice(1)}`
			: value

	return withHome.replace(
		VARIABLE_PATTERN,
		(match: string, braced: string | undefined, bare: string | undefined) => {
			const name = braced ?? bare
			if (!name) {
				return match
			}
			const resolved = env[name]
			return resolved === undefined ? match : resolved
		},
	)
}
