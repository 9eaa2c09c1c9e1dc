import type { AbsolutePath, Result } from "@assetry/core"
import type { GitError, IoError, SourceUnavailableError } from "@/types/errors"

export interface GitProvenance {
	resolvedRef: string
	commit: string
}

/**
 * A materialized source. For git sources the path lives inside a temporary
 * clone owned by this value; `release` deletes it.
 */
export interface ResolvedSource {
	path: AbsolutePath
	display: string
	/** Always false for git sources. */
	useSymlink: boolean
	git?: GitProvenance
	release?: () => Promise<void>
}

export type SourceError = SourceUnavailableError | GitError | IoError

export type SourceResult<T> = Result<T, SourceError>

/**
 * Run fn with a resolved source and release its clone on every exit path.
 */
export async function useResolvedSource<T>(
	resolved: ResolvedSource,
	fn: (source: ResolvedSource) => Promise<T>,
): Promise<T> {
	try {
		return await fn(resolved)
	} finally {
		await resolved.release?.()
	}
}
