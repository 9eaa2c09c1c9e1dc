import { CURRENT_DIR } from "../constants"
import type { SourceDeclaration } from "../types/entry"

/**
 * Provenance string recorded in the lockfile and shown in output.
 */
export function formatSourceDisplay(declaration: SourceDeclaration): string {
	switch (declaration.type) {
		case "git":
			return declaration.repo
		case "filesystem":
			return `filesystem:${declaration.root}`
		default: {
			const exhaustive: never = declaration
			return exhaustive
		}
	}
}

/**
 * Short form with the sub-path, used in status and dry-run output.
 */
export function formatSourceLocation(declaration: SourceDeclaration): string {
	const subPath = declaration.path
	const hasSubPath = subPath !== undefined && subPath !== CURRENT_DIR

	switch (declaration.type) {
		case "git":
			return hasSubPath ? `${declaration.repo}:${subPath}` : declaration.repo
		case "filesystem":
			return hasSubPath ? `${declaration.root}/${subPath}` : declaration.root
		default: {
			const exhaustive: never = declaration
			return exhaustive
		}
	}
}
