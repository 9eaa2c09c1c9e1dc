import { HOOKS_CONFIG_FILENAME, SKILL_FILENAME } from "../constants"
import type { AssetKind } from "../types/entry"

/**
 * How an asset kind lands on disk.
 *
 * - file: one source file, one destination file
 * - composite: several source files merged into one generated file
 * - tree: a directory installed as a whole (or as per-file symlinks)
 * - patch: a directory whose top-level items are merged into a shared destination
 */
export type KindShape = "file" | "composite" | "tree" | "patch"

/**
 * Marker file a source must provide. "children" checks every immediate child
 * directory, "root" checks the source directory itself.
 */
export interface KindMarker {
	filename: string
	scope: "children" | "root"
}

export interface KindTraits {
	shape: KindShape
	defaultDest: string
	marker?: KindMarker
}

const KIND_TRAITS: Readonly<Record<AssetKind, KindTraits>> = {
	agent_skill: {
		defaultDest: ".claude/skills",
		marker: { filename: SKILL_FILENAME, scope: "root" },
		shape: "tree",
	},
	agents_md: { defaultDest: "AGENTS.md", shape: "file" },
	composite_agents_md: { defaultDest: "AGENTS.md", shape: "composite" },
	cursor_hooks: {
		defaultDest: ".cursor",
		marker: { filename: HOOKS_CONFIG_FILENAME, scope: "root" },
		shape: "patch",
	},
	cursor_rules: { defaultDest: ".cursor/rules", shape: "tree" },
	cursor_skills_root: {
		defaultDest: ".cursor/skills",
		marker: { filename: SKILL_FILENAME, scope: "children" },
		shape: "tree",
	},
}

export const ASSET_KINDS = [
	"agents_md",
	"composite_agents_md",
	"cursor_rules",
	"cursor_skills_root",
	"agent_skill",
	"cursor_hooks",
] as const satisfies ReadonlyArray<AssetKind>

export function kindTraits(kind: AssetKind): KindTraits {
	return KIND_TRAITS[kind]
}

export function isDirectoryKind(kind: AssetKind): boolean {
	const shape = KIND_TRAITS[kind].shape
	return shape === "tree" || shape === "patch"
}
