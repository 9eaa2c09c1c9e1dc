import {
	type AbsolutePath,
	type CoreError,
	type ManifestInfo,
	type Result,
	validateManifest,
} from "@assetry/core"
import { readTextFile, safeStat } from "@/io/fs"

/**
 * Load and validate a manifest from a specific path.
 */
export async function loadManifest(
	manifestPath: AbsolutePath,
): Promise<Result<ManifestInfo, CoreError>> {
	const stats = await safeStat(manifestPath)
	if (!stats.ok) {
		return stats
	}
	if (!stats.value) {
		return {
			error: {
				message: `Manifest not found: ${manifestPath}`,
				path: manifestPath,
				target: "manifest",
				type: "not_found",
			},
			ok: false,
		}
	}

	const contents = await readTextFile(manifestPath)
	if (!contents.ok) {
		return contents
	}

	return validateManifest(contents.value, manifestPath)
}
