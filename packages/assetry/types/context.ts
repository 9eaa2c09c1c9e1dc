import type { AbsolutePath } from "@assetry/core"
import type { ConsolaInstance } from "consola"
import type { GitClient } from "@/utils/git"
import type { Prompter } from "@/utils/prompt"

export interface InstallOptions {
	dryRun: boolean
	/** Overwrite conflicting content (after a backup) without asking. */
	allowOverwrite: boolean
	/** Turn structural warnings into failures. */
	strict: boolean
	/** Re-resolve git refs instead of reusing the locked commit. */
	upgrade: boolean
}

export interface InstallContext {
	baseDir: AbsolutePath
	options: InstallOptions
	git: GitClient
	prompter: Prompter
	logger: ConsolaInstance
	now?: () => Date
}
