#!/usr/bin/env node

import { Command } from "commander"
import { statusCommand } from "@/commands/status"
import { syncCommand } from "@/commands/sync"
import { validateCommand } from "@/commands/validate"
import pkg from "./package.json" with { type: "json" }

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("assetry")
		.description("Sync shared agent config assets into a project")
		.version(pkg.version, "-V, --version", "Output the version number")
		.showHelpAfterError()
		.showSuggestionAfterError()

	program
		.command("sync")
		.description("Install every declared entry and update the lockfile")
		.option("--dry-run", "Plan changes without modifying files")
		.option("-y, --yes", "Back up and overwrite conflicting content without asking")
		.option("--strict", "Fail on structural warnings")
		.option("--upgrade", "Fetch the latest commit for git sources")
		.option("--only <ids...>", "Sync only these entry ids")
		.option("--manifest <path>", "Use this manifest instead of searching for one")
		.option("--verbose", "Log every step")
		.action(
			async (options: {
				dryRun?: boolean
				yes?: boolean
				strict?: boolean
				upgrade?: boolean
				only?: string[]
				manifest?: string
				verbose?: boolean
			}) => {
				await syncCommand({
					dryRun: Boolean(options.dryRun),
					manifest: options.manifest,
					only: options.only,
					strict: Boolean(options.strict),
					upgrade: Boolean(options.upgrade),
					verbose: Boolean(options.verbose),
					yes: Boolean(options.yes),
				})
			},
		)

	program
		.command("status")
		.description("Compare installed entries with the manifest")
		.option("--manifest <path>", "Use this manifest instead of searching for one")
		.option("--verbose", "Log every step")
		.action(async (options: { manifest?: string; verbose?: boolean }) => {
			await statusCommand({
				manifest: options.manifest,
				verbose: Boolean(options.verbose),
			})
		})

	program
		.command("validate")
		.description("Check the manifest and every source without installing")
		.option("--strict", "Treat warnings as errors")
		.option("--manifest <path>", "Use this manifest instead of searching for one")
		.option("--verbose", "Log every step")
		.action(async (options: { strict?: boolean; manifest?: string; verbose?: boolean }) => {
			await validateCommand({
				manifest: options.manifest,
				strict: Boolean(options.strict),
				verbose: Boolean(options.verbose),
			})
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

void main()
