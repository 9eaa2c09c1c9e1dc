import { mkdtemp } from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import {
	AUTO_REF,
	AUTO_REF_FALLBACKS,
	formatSourceDisplay,
	type GitSourceDeclaration,
} from "@assetry/core"
import { ioFailure, type IoResult, removePath } from "@/io/fs"
import { appendSubPath } from "@/sources/filesystem"
import type { ResolvedSource, SourceResult } from "@/sources/types"
import type { InstallContext } from "@/types/context"
import type { GitAttempt } from "@/types/errors"

const TEMP_PREFIX = "assetry-git-"

type GitContext = Pick<InstallContext, "git" | "logger">

export interface RemoteCommit {
	ref: string
	commit: string
}

/** Branches to try, in order, for a declared ref. */
export function refCandidates(ref: string): string[] {
	return ref === AUTO_REF ? [...AUTO_REF_FALLBACKS] : [ref]
}

/**
 * Clone the declared ref into a fresh temporary directory. An "auto" ref
 * falls back through the default branch names; the error of a total failure
 * lists every attempt.
 */
export async function resolveGitSource(
	declaration: GitSourceDeclaration,
	ctx: GitContext,
): Promise<SourceResult<ResolvedSource>> {
	const clone = await createClone(ctx)
	if (!clone.ok) {
		return clone
	}

	const { release, repoDir } = clone.value
	const candidates = refCandidates(declaration.ref)
	const attempts: GitAttempt[] = []
	let resolvedRef: string | undefined

	for (const ref of candidates) {
		ctx.logger.debug(`Cloning ${declaration.repo} at ${ref}`)
		const cloned = await ctx.git.cloneRef(declaration.repo, ref, repoDir, declaration.shallow)
		if (cloned.ok) {
			resolvedRef = ref
			break
		}

		attempts.push({ message: cloned.error.message, ref })
		const cleared = await removePath(repoDir)
		if (!cleared.ok) {
			await release()
			return cleared
		}
	}

	if (!resolvedRef) {
		await release()
		return {
			error: {
				attempts,
				message: `Unable to clone ${declaration.repo} (tried ${candidates.join(", ")}).`,
				operation: "clone",
				repo: declaration.repo,
				type: "git",
			},
			ok: false,
		}
	}

	const head = await ctx.git.headCommit(repoDir)
	if (!head.ok) {
		await release()
		return head
	}

	return {
		ok: true,
		value: {
			display: formatSourceDisplay(declaration),
			git: { commit: head.value, resolvedRef },
			path: appendSubPath(repoDir, declaration.path),
			release,
			useSymlink: false,
		},
	}
}

/**
 * Reproduce a recorded install: clone without checkout, then check out the
 * exact commit.
 */
export async function resolveGitCommit(
	declaration: GitSourceDeclaration,
	locked: { commit: string; resolvedRef: string },
	ctx: GitContext,
): Promise<SourceResult<ResolvedSource>> {
	const clone = await createClone(ctx)
	if (!clone.ok) {
		return clone
	}

	const { release, repoDir } = clone.value
	ctx.logger.debug(`Cloning ${declaration.repo} at commit ${locked.commit}`)
	const cloned = await ctx.git.cloneCommit(declaration.repo, locked.commit, repoDir)
	if (!cloned.ok) {
		await release()
		return {
			error: {
				...cloned.error,
				attempts: [{ message: cloned.error.message, ref: locked.commit }],
			},
			ok: false,
		}
	}

	return {
		ok: true,
		value: {
			display: formatSourceDisplay(declaration),
			git: { commit: locked.commit, resolvedRef: locked.resolvedRef },
			path: appendSubPath(repoDir, declaration.path),
			release,
			useSymlink: false,
		},
	}
}

/**
 * Commit the remote currently serves for the declared ref, following the same
 * fallback order as cloning. Query failures count as "no answer".
 */
export async function queryRemoteCommit(
	declaration: GitSourceDeclaration,
	ctx: GitContext,
): Promise<RemoteCommit | null> {
	for (const ref of refCandidates(declaration.ref)) {
		const result = await ctx.git.remoteCommit(declaration.repo, ref)
		if (!result.ok) {
			ctx.logger.debug(`ls-remote failed for ${declaration.repo} at ${ref}: ${result.error.message}`)
			continue
		}
		if (result.value) {
			return { commit: result.value, ref }
		}
	}
	return null
}

async function createClone(
	ctx: GitContext,
): Promise<IoResult<{ repoDir: string; release: () => Promise<void> }>> {
	let tempRoot: string
	try {
		tempRoot = await mkdtemp(path.join(tmpdir(), TEMP_PREFIX))
	} catch (error) {
		return ioFailure("mkdtemp", tmpdir(), "Unable to create a temporary clone directory.", error)
	}

	const release = async () => {
		const removed = await removePath(tempRoot)
		if (!removed.ok) {
			ctx.logger.warn(`Unable to remove temporary clone ${tempRoot}.`)
		}
	}

	return { ok: true, value: { release, repoDir: path.join(tempRoot, "repo") } }
}
