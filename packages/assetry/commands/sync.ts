import type { Result, ValidationError } from "@assetry/core"
import type { ConsolaInstance } from "consola"
import { resolveManifest } from "@/commands/manifest-selection"
import { CommandResult, printOutcome } from "@/commands/types"
import type { InstallResult } from "@/install/types"
import { resolveLockfilePath } from "@/lockfile/lockfile"
import { usesGit } from "@/sources/resolve"
import { runSync } from "@/sync/sync"
import type { SyncSummary } from "@/sync/types"
import { createGitClient, ensureGitAvailable, type GitClient } from "@/utils/git"
import { createLogger } from "@/utils/logger"
import { createPrompter, type Prompter } from "@/utils/prompt"

export interface SyncCommandOptions {
	dryRun: boolean
	yes: boolean
	strict: boolean
	upgrade: boolean
	only?: string[]
	manifest?: string
	verbose: boolean
}

export interface CommandRuntime {
	cwd: string
	logger: ConsolaInstance
	git: GitClient
	prompter: Prompter
	checkGit: () => Result<void, ValidationError>
}

export async function syncCommand(options: SyncCommandOptions): Promise<void> {
	const logger = createLogger(options.verbose)
	const result = await syncWithRuntime(options, {
		checkGit: ensureGitAvailable,
		cwd: process.cwd(),
		git: createGitClient(),
		logger,
		prompter: createPrompter(),
	})
	printOutcome(result, logger)
}

export async function syncWithRuntime(
	options: SyncCommandOptions,
	runtime: CommandRuntime,
): Promise<CommandResult<SyncSummary>> {
	const { logger } = runtime

	const selection = await resolveManifest(options.manifest, runtime.cwd)
	if (selection.status !== "completed") {
		return selection
	}

	const { baseDir, manifest, manifestPath } = selection.value
	if (manifest.entries.length === 0) {
		return CommandResult.unchanged(`No entries declared in ${manifestPath}.`)
	}

	if (usesGit(manifest.entries)) {
		const git = runtime.checkGit()
		if (!git.ok) {
			return CommandResult.failed(git.error)
		}
	}

	logger.start(options.dryRun ? `Planning sync of ${manifestPath}` : `Syncing ${manifestPath}`)

	const result = await runSync({
		ctx: {
			baseDir,
			git: runtime.git,
			logger,
			options: {
				allowOverwrite: options.yes,
				dryRun: options.dryRun,
				strict: options.strict,
				upgrade: options.upgrade,
			},
			prompter: runtime.prompter,
		},
		entries: manifest.entries,
		lockfilePath: resolveLockfilePath(manifestPath),
		only: options.only,
	})
	if (!result.ok) {
		if (result.error.type === "cancelled") {
			return CommandResult.cancelled()
		}
		return CommandResult.failed(result.error)
	}

	reportSummary(result.value, options.dryRun, logger)
	return CommandResult.completed(result.value)
}

function reportSummary(summary: SyncSummary, dryRun: boolean, logger: ConsolaInstance): void {
	for (const result of summary.results) {
		if (result.upgradeAvailable) {
			logger.info(
				`${result.id}: ${result.upgradeAvailable.availableCommit.slice(0, 8)} is available (run with --upgrade)`,
			)
		}
	}

	const installed = countWhere(summary.results, (result) => !result.skippedNoChange)
	const unchanged = countWhere(summary.results, (result) => result.skippedNoChange)
	const verb = dryRun ? "Would install" : "Installed"
	logger.info(`${verb} ${installed} entr${installed === 1 ? "y" : "ies"}, ${unchanged} unchanged.`)

	if (summary.orphansRemoved.length > 0) {
		logger.info(`Removed ${summary.orphansRemoved.length} previous destination(s).`)
	}
	if (summary.staleRemoved.length > 0) {
		logger.info(`Dropped from lockfile: ${summary.staleRemoved.join(", ")}`)
	}
	if (summary.warnings.length > 0) {
		logger.warn(`${summary.warnings.length} warning(s):`)
		for (const warning of summary.warnings) {
			logger.warn(`  ${warning}`)
		}
	}
}

function countWhere(results: InstallResult[], predicate: (result: InstallResult) => boolean): number {
	return results.filter(predicate).length
}
