import type { AbsolutePath, EntryId, Result } from "@assetry/core"
import type { LockedEntry } from "@/lockfile/types"
import type { AssetryError } from "@/types/errors"

export interface UpgradeInfo {
	currentCommit: string
	availableCommit: string
}

export interface InstallResult {
	id: EntryId
	installed: boolean
	skippedNoChange: boolean
	/** Present only after a real (non dry-run) install. */
	lockedEntry?: LockedEntry
	warnings: string[]
	destPath: AbsolutePath
	wasSymlink: boolean
	backups: AbsolutePath[]
	upgradeAvailable?: UpgradeInfo
}

export type InstallOutcome = Result<InstallResult, AssetryError>
