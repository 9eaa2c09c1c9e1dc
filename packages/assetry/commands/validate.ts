import { type Entry, isDirectoryKind, kindTraits, type Result } from "@assetry/core"
import { resolveManifest } from "@/commands/manifest-selection"
import type { CommandRuntime } from "@/commands/sync"
import { CommandResult, printOutcome } from "@/commands/types"
import { validateStructure } from "@/install/validate"
import { safeStat } from "@/io/fs"
import { detectOverlappingDestinations } from "@/manifest/overlap"
import { entrySources, resolveSource, usesGit } from "@/sources/resolve"
import { type ResolvedSource, useResolvedSource } from "@/sources/types"
import type { InstallContext } from "@/types/context"
import type { AssetryError } from "@/types/errors"
import { createGitClient, ensureGitAvailable } from "@/utils/git"
import { createLogger } from "@/utils/logger"

export interface ValidateCommandOptions {
	manifest?: string
	strict: boolean
	verbose: boolean
}

export interface ValidationReport {
	entries: number
	warnings: string[]
}

type CheckContext = Pick<InstallContext, "baseDir" | "git" | "logger">

export async function validateCommand(options: ValidateCommandOptions): Promise<void> {
	const logger = createLogger(options.verbose)
	const result = await validateWithRuntime(options, {
		checkGit: ensureGitAvailable,
		cwd: process.cwd(),
		git: createGitClient(),
		logger,
	})
	printOutcome(result, logger)
}

/**
 * Check the manifest without installing: schema, overlapping destinations,
 * every source (composite parts included) and marker files.
 *
 * Under strict the first source or structure warning fails the command.
 * Overlap warnings are reported either way.
 */
export async function validateWithRuntime(
	options: Pick<ValidateCommandOptions, "manifest" | "strict">,
	runtime: Pick<CommandRuntime, "checkGit" | "cwd" | "git" | "logger">,
): Promise<CommandResult<ValidationReport>> {
	const { logger } = runtime

	const selection = await resolveManifest(options.manifest, runtime.cwd)
	if (selection.status !== "completed") {
		return selection
	}

	const { baseDir, manifest, manifestPath } = selection.value
	logger.start(`Validating ${manifestPath}`)
	logger.success("Schema validation passed")

	const warnings = detectOverlappingDestinations(manifest.entries, baseDir)
	for (const warning of warnings) {
		logger.warn(warning)
	}

	if (usesGit(manifest.entries)) {
		const git = runtime.checkGit()
		if (!git.ok) {
			return CommandResult.failed(git.error)
		}
	}

	const ctx: CheckContext = { baseDir, git: runtime.git, logger }
	for (const entry of manifest.entries) {
		const checked = await checkEntry(entry, ctx, options.strict)
		if (!checked.ok) {
			return CommandResult.failed(checked.error)
		}

		if (checked.value.length === 0) {
			logger.success(entry.id)
		}
		for (const warning of checked.value) {
			logger.warn(warning)
		}
		warnings.push(...checked.value)
	}

	const count = manifest.entries.length
	if (warnings.length === 0) {
		logger.info(`Manifest is valid. All ${count} entr${count === 1 ? "y" : "ies"} validated.`)
	} else {
		logger.info(`Manifest is valid with ${warnings.length} warning(s).`)
		if (!options.strict) {
			logger.info("Run with --strict to treat warnings as errors.")
		}
	}

	return CommandResult.completed({ entries: count, warnings })
}

async function checkEntry(
	entry: Entry,
	ctx: CheckContext,
	strict: boolean,
): Promise<Result<string[], AssetryError>> {
	const declarations = entrySources(entry)
	if (declarations.length === 0) {
		const message = `Entry '${entry.id}' has no source configured`
		if (strict) {
			return {
				error: { field: "source", message, source: "manual", type: "validation" },
				ok: false,
			}
		}
		return { ok: true, value: [message] }
	}

	const warnings: string[] = []
	for (const declaration of declarations) {
		const resolved = await resolveSource(declaration, ctx)
		if (!resolved.ok) {
			if (strict) {
				return resolved
			}
			warnings.push(`${entry.id}: ${resolved.error.message}`)
			continue
		}

		const checked = await useResolvedSource(resolved.value, (source) =>
			checkResolvedSource(entry, source, strict),
		)
		if (!checked.ok) {
			return checked
		}
		warnings.push(...checked.value.map((warning) => `${entry.id}: ${warning}`))
	}

	return { ok: true, value: warnings }
}

async function checkResolvedSource(
	entry: Entry,
	source: ResolvedSource,
	strict: boolean,
): Promise<Result<string[], AssetryError>> {
	const stats = await safeStat(source.path)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		const message = `Source path does not exist: ${source.path}`
		if (strict) {
			return { error: { message, path: source.path, type: "source_unavailable" }, ok: false }
		}
		return { ok: true, value: [message] }
	}

	const composite = kindTraits(entry.kind).shape === "composite"
	const expectsDirectory = !composite && isDirectoryKind(entry.kind)
	if (expectsDirectory !== stats.value.isDirectory()) {
		const message = `Source for ${entry.kind} must be a ${expectsDirectory ? "directory" : "file"}: ${source.path}`
		if (strict) {
			return {
				error: { field: "source", message, path: source.path, source: "manual", type: "validation" },
				ok: false,
			}
		}
		return { ok: true, value: [message] }
	}

	if (composite) {
		return { ok: true, value: [] }
	}
	return validateStructure(entry.kind, source.path, strict)
}
