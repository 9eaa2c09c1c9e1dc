import path from "node:path"
import { type AbsolutePath, type AssetKind, kindTraits, type Result } from "@assetry/core"
import { listDirectory, safeStat } from "@/io/fs"
import type { IoError, ValidationError } from "@/types/errors"

type StructureResult = Result<string[], IoError | ValidationError>

/**
 * Check the marker file a kind requires. Violations come back as warnings,
 * or as an error on the first one when strict.
 */
export async function validateStructure(
	kind: AssetKind,
	sourcePath: AbsolutePath,
	strict: boolean,
): Promise<StructureResult> {
	const marker = kindTraits(kind).marker
	if (!marker) {
		return { ok: true, value: [] }
	}

	const candidates: { label: string; dir: string }[] = []
	if (marker.scope === "root") {
		candidates.push({ dir: sourcePath, label: `Source ${sourcePath}` })
	} else {
		const entries = await listDirectory(sourcePath)
		if (!entries.ok) {
			return entries
		}
		const children = entries.value
			.filter((entry) => entry.isDirectory())
			.map((entry) => entry.name)
			.sort()
		for (const name of children) {
			candidates.push({ dir: path.join(sourcePath, name), label: `Skill '${name}'` })
		}
	}

	const warnings: string[] = []
	for (const candidate of candidates) {
		const stats = await safeStat(path.join(candidate.dir, marker.filename))
		if (!stats.ok) {
			return stats
		}
		if (stats.value?.isFile()) {
			continue
		}

		const message = `${candidate.label} is missing ${marker.filename}`
		if (strict) {
			return {
				error: {
					field: "structure",
					message,
					path: sourcePath,
					source: "manual",
					type: "validation",
				},
				ok: false,
			}
		}
		warnings.push(message)
	}

	return { ok: true, value: warnings }
}
