import type { AbsolutePath, EntryId } from "@assetry/core"
import type { InstallResult, UpgradeInfo } from "@/install/types"

export function skippedResult(
	id: EntryId,
	destPath: AbsolutePath,
	wasSymlink: boolean,
	upgradeAvailable?: UpgradeInfo,
): InstallResult {
	return {
		backups: [],
		destPath,
		id,
		installed: false,
		skippedNoChange: true,
		upgradeAvailable,
		warnings: [],
		wasSymlink,
	}
}
