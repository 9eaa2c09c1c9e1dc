import { execFile, execSync } from "node:child_process"
import { promisify } from "node:util"
import type { Result } from "@assetry/core"
import type { GitError, GitOperation, ValidationError } from "@/types/errors"

const execFileAsync = promisify(execFile)

export type GitResult<T> = Result<T, GitError>

/**
 * Every repository operation the engine needs. The real client spawns `git`;
 * tests substitute an in-process fake.
 */
export interface GitClient {
	cloneRef(repo: string, ref: string, dest: string, shallow: boolean): Promise<GitResult<void>>
	cloneCommit(repo: string, commit: string, dest: string): Promise<GitResult<void>>
	headCommit(repoDir: string): Promise<GitResult<string>>
	/** Commit a branch points at on the remote, or null when the branch does not exist. */
	remoteCommit(repo: string, ref: string): Promise<GitResult<string | null>>
}

export function ensureGitAvailable(): Result<void, ValidationError> {
	try {
		execSync("git --version", { stdio: "ignore" })
		return { ok: true, value: undefined }
	} catch (error) {
		return {
			error: {
				field: "git",
				message: "git is not installed or not in PATH.",
				rawError: error instanceof Error ? error : undefined,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}
}

export function buildCloneArgs(
	repo: string,
	ref: string,
	dest: string,
	shallow: boolean,
): string[] {
	const args = ["clone"]
	if (shallow) {
		args.push("--depth", "1")
	}
	args.push("--branch", ref, "--single-branch", repo, dest)
	return args
}

export function buildLsRemoteArgs(repo: string, ref: string): string[] {
	return ["ls-remote", "--refs", repo, `refs/heads/${ref}`]
}

/** First commit id in `git ls-remote` output, if any. */
export function parseLsRemoteOutput(stdout: string): string | null {
	for (const line of stdout.split("\n")) {
		const [sha] = line.trim().split(/\s+/)
		if (sha) {
			return sha
		}
	}
	return null
}

export function createGitClient(): GitClient {
	return {
		async cloneCommit(repo, commit, dest) {
			const cloned = await runGit(["clone", "--no-checkout", repo, dest], "clone", repo)
			if (!cloned.ok) {
				return cloned
			}

			const checkedOut = await runGit(["-C", dest, "checkout", commit], "checkout", repo)
			if (!checkedOut.ok) {
				return checkedOut
			}

			return { ok: true, value: undefined }
		},

		async cloneRef(repo, ref, dest, shallow) {
			const cloned = await runGit(buildCloneArgs(repo, ref, dest, shallow), "clone", repo)
			if (!cloned.ok) {
				return cloned
			}
			return { ok: true, value: undefined }
		},

		async headCommit(repoDir) {
			const output = await runGit(["-C", repoDir, "rev-parse", "HEAD"], "rev-parse", repoDir)
			if (!output.ok) {
				return output
			}
			return { ok: true, value: output.value.trim() }
		},

		async remoteCommit(repo, ref) {
			const output = await runGit(buildLsRemoteArgs(repo, ref), "ls-remote", repo)
			if (!output.ok) {
				return output
			}
			return { ok: true, value: parseLsRemoteOutput(output.value) }
		},
	}
}

async function runGit(
	args: string[],
	operation: GitOperation,
	repo: string,
): Promise<GitResult<string>> {
	try {
		const { stdout } = await execFileAsync("git", args, {
			encoding: "utf8",
			env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
		})
		return { ok: true, value: stdout }
	} catch (error) {
		return {
			error: {
				attempts: [],
				message: describeGitFailure(error, args),
				operation,
				rawError: error instanceof Error ? error : undefined,
				repo,
				type: "git",
			},
			ok: false,
		}
	}
}

function describeGitFailure(error: unknown, args: string[]): string {
	if (typeof error === "object" && error !== null && "stderr" in error) {
		const stderr = error.stderr
		if (typeof stderr === "string" && stderr.trim()) {
			return stderr.trim()
		}
	}

	const reason = error instanceof Error ? error.message : String(error)
	return `git ${args[0] ?? ""} failed: ${reason}`
}
