import path from "node:path"
import { type AbsolutePath, MANIFEST_FILENAME } from "@assetry/core"
import { type IoResult, safeStat, toAbsolutePath } from "@/io/fs"

/**
 * Walk up from startDir to the closest assetry.toml.
 * The search ends at the first directory holding `.git` (the repository root)
 * or at the filesystem root. Returns the manifest path, or null.
 */
export async function findManifest(startDir: string): Promise<IoResult<AbsolutePath | null>> {
	let current: string = toAbsolutePath(startDir)

	while (true) {
		const manifestPath = path.join(current, MANIFEST_FILENAME)
		const manifest = await safeStat(manifestPath)
		if (!manifest.ok) {
			return manifest
		}
		if (manifest.value?.isFile()) {
			return { ok: true, value: toAbsolutePath(manifestPath) }
		}

		const gitDir = await safeStat(path.join(current, ".git"))
		if (!gitDir.ok) {
			return gitDir
		}
		if (gitDir.value) {
			return { ok: true, value: null }
		}

		const parent = path.dirname(current)
		if (parent === current) {
			return { ok: true, value: null }
		}
		current = parent
	}
}
