import { createHash, type Hash } from "node:crypto"
import path from "node:path"
import { type IoResult, listDirectory, readBytes, safeStat } from "@/io/fs"

const ALGORITHM = "sha256"

/**
 * Fingerprint a file or directory tree as `sha256:<hex>`.
 *
 * Directories hash every regular file (symlinks are not followed) in order of
 * their `/`-separated relative path, each fed as `path \0 content`. Absolute
 * locations and timestamps never reach the hash.
 */
export async function computeChecksum(targetPath: string): Promise<IoResult<string>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	const hash = createHash(ALGORITHM)

	if (stats.value?.isFile()) {
		const contents = await readBytes(targetPath)
		if (!contents.ok) {
			return contents
		}
		hash.update(contents.value)
		return { ok: true, value: formatDigest(hash) }
	}

	if (stats.value?.isDirectory()) {
		const files = await collectFiles(targetPath, "")
		if (!files.ok) {
			return files
		}

		const ordered = [...files.value].sort((a, b) =>
			Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8")),
		)
		for (const relative of ordered) {
			const contents = await readBytes(path.join(targetPath, ...relative.split("/")))
			if (!contents.ok) {
				return contents
			}
			hash.update(Buffer.from(relative, "utf8"))
			hash.update(Buffer.from([0]))
			hash.update(contents.value)
		}
		return { ok: true, value: formatDigest(hash) }
	}

	return { ok: true, value: formatDigest(hash) }
}

/** Fingerprint generated text with the same algorithm and format. */
export function hashContent(content: string): string {
	return formatDigest(createHash(ALGORITHM).update(content, "utf8"))
}

async function collectFiles(root: string, prefix: string): Promise<IoResult<string[]>> {
	const entries = await listDirectory(prefix ? path.join(root, prefix) : root)
	if (!entries.ok) {
		return entries
	}

	const files: string[] = []
	for (const entry of entries.value) {
		const relative = prefix ? `${prefix}/${entry.name}` : entry.name
		if (entry.isDirectory()) {
			const nested = await collectFiles(root, relative)
			if (!nested.ok) {
				return nested
			}
			files.push(...nested.value)
		} else if (entry.isFile()) {
			files.push(relative)
		}
	}

	return { ok: true, value: files }
}

function formatDigest(hash: Hash): string {
	return `${ALGORITHM}:${hash.digest("hex")}`
}
