/**
 * In-process git stand-in
 *
 * Each fake repository maps branch names to a commit id and a fixture directory.
 * "Cloning" copies the fixture into the requested destination.
 */

import { cp } from "node:fs/promises"
import type { GitError, GitOperation } from "@/types/errors"
import type { GitClient, GitResult } from "@/utils/git"

export interface FakeBranch {
	commit: string
	dir: string
}

export interface FakeGitCall {
	method: keyof GitClient
	args: string[]
}

export interface FakeGitClient extends GitClient {
	calls: FakeGitCall[]
	/** Point a branch at a new commit and fixture directory. */
	setBranch(repo: string, ref: string, branch: FakeBranch): void
	/** Make every remote query for a repository fail. */
	setOffline(repo: string, offline: boolean): void
}

export function createFakeGitClient(
	repos: Record<string, Record<string, FakeBranch>> = {},
): FakeGitClient {
	const branches = new Map<string, Map<string, FakeBranch>>()
	for (const [repo, refs] of Object.entries(repos)) {
		branches.set(repo, new Map(Object.entries(refs)))
	}
	const heads = new Map<string, string>()
	const offline = new Set<string>()
	const calls: FakeGitCall[] = []

	function fail(operation: GitOperation, repo: string, message: string): { ok: false; error: GitError } {
		return {
			error: { attempts: [], message, operation, repo, type: "git" },
			ok: false,
		}
	}

	return {
		calls,

		async cloneCommit(repo, commit, dest) {
			calls.push({ args: [repo, commit, dest], method: "cloneCommit" })
			if (offline.has(repo)) {
				return fail("clone", repo, `fatal: unable to access '${repo}'`)
			}
			const match = [...(branches.get(repo)?.values() ?? [])].find(
				(branch) => branch.commit === commit,
			)
			if (!match) {
				return fail("checkout", repo, `fatal: reference is not a tree: ${commit}`)
			}
			await cp(match.dir, dest, { recursive: true })
			heads.set(dest, commit)
			return { ok: true, value: undefined }
		},

		async cloneRef(repo, ref, dest, shallow) {
			calls.push({ args: [repo, ref, dest, String(shallow)], method: "cloneRef" })
			if (offline.has(repo)) {
				return fail("clone", repo, `fatal: unable to access '${repo}'`)
			}
			const branch = branches.get(repo)?.get(ref)
			if (!branch) {
				return fail("clone", repo, `fatal: Remote branch ${ref} not found in upstream origin`)
			}
			await cp(branch.dir, dest, { recursive: true })
			heads.set(dest, branch.commit)
			return { ok: true, value: undefined }
		},

		async headCommit(repoDir): Promise<GitResult<string>> {
			calls.push({ args: [repoDir], method: "headCommit" })
			const commit = heads.get(repoDir)
			if (!commit) {
				return fail("rev-parse", repoDir, "fatal: not a git repository")
			}
			return { ok: true, value: commit }
		},

		async remoteCommit(repo, ref) {
			calls.push({ args: [repo, ref], method: "remoteCommit" })
			if (offline.has(repo)) {
				return fail("ls-remote", repo, `fatal: unable to access '${repo}'`)
			}
			return { ok: true, value: branches.get(repo)?.get(ref)?.commit ?? null }
		},

		setBranch(repo, ref, branch) {
			const refs = branches.get(repo) ?? new Map<string, FakeBranch>()
			refs.set(ref, branch)
			branches.set(repo, refs)
		},

		setOffline(repo, value) {
			if (value) {
				offline.add(repo)
			} else {
				offline.delete(repo)
			}
		},
	}
}
