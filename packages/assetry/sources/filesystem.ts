import path from "node:path"
import {
	type AbsolutePath,
	CURRENT_DIR,
	type FilesystemSourceDeclaration,
	formatSourceDisplay,
} from "@assetry/core"
import { toAbsolutePath } from "@/io/fs"
import type { ResolvedSource } from "@/sources/types"
import { expandPath } from "@/utils/expand"

/**
 * Join an expanded sub-path onto root, unless it names root itself.
 */
export function appendSubPath(root: string, subPath: string | undefined): AbsolutePath {
	if (subPath === undefined) {
		return toAbsolutePath(root)
	}

	const expanded = expandPath(subPath)
	return toAbsolutePath(expanded === CURRENT_DIR ? root : path.join(root, expanded))
}

/**
 * Filesystem sources need no materialization. Existence is checked by the caller.
 */
export function resolveFilesystemSource(
	declaration: FilesystemSourceDeclaration,
	baseDir: AbsolutePath,
): ResolvedSource {
	const root = path.resolve(baseDir, expandPath(declaration.root))
	return {
		display: formatSourceDisplay(declaration),
		path: appendSubPath(root, declaration.path),
		useSymlink: declaration.symlink,
	}
}
