import path from "node:path"
import { type AbsolutePath, MANIFEST_FILENAME, type ManifestInfo } from "@assetry/core"
import { CommandResult } from "@/commands/types"
import { toAbsolutePath } from "@/io/fs"
import { findManifest } from "@/manifest/discover"
import { loadManifest } from "@/manifest/fs"

export interface ManifestSelection {
	manifest: ManifestInfo
	manifestPath: AbsolutePath
	/** Directory holding the manifest; destinations resolve against it. */
	baseDir: AbsolutePath
}

/**
 * Load the manifest named by `--manifest`, or the closest one above cwd.
 */
export async function resolveManifest(
	explicitPath: string | undefined,
	cwd: string,
): Promise<CommandResult<ManifestSelection>> {
	let manifestPath: AbsolutePath
	if (explicitPath) {
		manifestPath = toAbsolutePath(path.resolve(cwd, explicitPath))
	} else {
		const found = await findManifest(cwd)
		if (!found.ok) {
			return CommandResult.failed(found.error)
		}
		if (!found.value) {
			return CommandResult.failed({
				message: `No ${MANIFEST_FILENAME} found in ${cwd} or its parents.`,
				target: "manifest",
				type: "not_found",
			})
		}
		manifestPath = found.value
	}

	const loaded = await loadManifest(manifestPath)
	if (!loaded.ok) {
		return CommandResult.failed(loaded.error)
	}

	return CommandResult.completed({
		baseDir: toAbsolutePath(path.dirname(manifestPath)),
		manifest: loaded.value,
		manifestPath,
	})
}
