import type { EntryId } from "./branded"

export type AssetKind =
	| "agents_md"
	| "composite_agents_md"
	| "cursor_rules"
	| "cursor_skills_root"
	| "agent_skill"
	| "cursor_hooks"

export interface GitSourceDeclaration {
	type: "git"
	repo: string
	ref: string
	shallow: boolean
	path?: string
}

export interface FilesystemSourceDeclaration {
	type: "filesystem"
	root: string
	symlink: boolean
	path?: string
}

export type SourceDeclaration = GitSourceDeclaration | FilesystemSourceDeclaration

export interface Entry {
	id: EntryId
	kind: AssetKind
	source?: SourceDeclaration
	/** Only used by composite kinds. */
	sources: SourceDeclaration[]
	dest?: string
	include: string[]
}

export interface ManifestInfo {
	entries: Entry[]
}
