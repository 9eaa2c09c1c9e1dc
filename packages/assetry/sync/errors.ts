import type { AbsolutePath, EntryId } from "@assetry/core"
import type { SyncResult, SyncStage } from "@/sync/types"
import type { AssetryError } from "@/types/errors"

export function failSync(
	stage: SyncStage,
	error: AssetryError,
	context: { entryId?: EntryId; dest?: AbsolutePath } = {},
): SyncResult<never> {
	const prefix = context.entryId
		? `Sync failed at ${stage} for ${context.entryId}`
		: `Sync failed at ${stage}`
	return {
		error: {
			...error,
			...context,
			cause: error,
			message: `${prefix}.`,
			stage,
		},
		ok: false,
	}
}
