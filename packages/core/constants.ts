/**
 * Shared constants for manifest, lockfile and backup locations.
 */

/** Manifest file - declares the entries to synchronize */
export const MANIFEST_FILENAME = "assetry.toml"

/** Lockfile written beside the manifest */
export const LOCKFILE_FILENAME = "assetry.lock"

/** Current lockfile format version */
export const LOCKFILE_VERSION = 1

/** Backup root, created inside the base directory */
export const BACKUP_DIRNAME = ".assetry-backups"

/** Marker file every skill directory must contain */
export const SKILL_FILENAME = "SKILL.md"

/** Marker file of a hooks bundle */
export const HOOKS_CONFIG_FILENAME = "hooks.json"

/** Ref value that asks the resolver to try AUTO_REF_FALLBACKS in order */
export const AUTO_REF = "auto"

/** Branches tried, in order, for an "auto" ref */
export const AUTO_REF_FALLBACKS: ReadonlyArray<string> = ["main", "master"]

/** Sub-path value meaning "the root itself" */
export const CURRENT_DIR = "."
