import { lstat, mkdir, readdir, readlink, rm, symlink, writeFile } from "node:fs/promises"
import { join } from "node:path"
import type { Entry, SourceDeclaration } from "@assetry/core"
import { describe, expect, it } from "vitest"
import { hashContent } from "@/checksum/checksum"
import { installEntry } from "@/install/install"
import { createLockfile, upsertLockedEntry } from "@/lockfile/lockfile"
import type { Lockfile } from "@/lockfile/types"
import {
	createFakeGitClient,
	createStubPrompter,
	entryId,
	exists,
	isSymlink,
	makeContext,
	readText,
	withTempDir,
	writeTree,
} from "@/tests/helpers"

function fsSource(root: string, path?: string, symlink = true): SourceDeclaration {
	return { path, root, symlink, type: "filesystem" }
}

function makeEntry(overrides: Partial<Entry> & Pick<Entry, "kind">): Entry {
	return { id: entryId("test-entry"), include: [], sources: [], ...overrides }
}

function recordResult(lockfile: Lockfile, result: Awaited<ReturnType<typeof installEntry>>): void {
	if (result.ok && result.value.lockedEntry) {
		upsertLockedEntry(lockfile, result.value.id, result.value.lockedEntry)
	}
}

describe("installEntry with filesystem sources", () => {
	it("links a tree file by file and skips an unchanged second run", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "shared", "rules"), { "a.md": "A", "nested/b.md": "B" })
			const entry = makeEntry({ kind: "cursor_rules", source: fsSource("shared", "rules") })
			const lockfile = createLockfile()
			const ctx = makeContext(dir)

			const first = await installEntry(entry, lockfile, ctx)

			expect(first).toBeOk()
			if (!first.ok) return
			expect(first.value.installed).toBe(true)
			expect(first.value.lockedEntry).toEqual({
				checksum: expect.stringMatching(/^sha256:[0-9a-f]{64}$/),
				commit: undefined,
				dest: ".cursor/rules",
				isSymlink: true,
				lastUpdatedAt: new Date(2024, 2, 5, 9, 7).toISOString(),
				resolvedRef: undefined,
				source: "filesystem:shared",
				symlinkedItems: [
					join(dir, "shared", "rules", "a.md"),
					join(dir, "shared", "rules", "nested", "b.md"),
				],
				targetPath: join(dir, "shared", "rules"),
			})
			expect(await isSymlink(join(dir, ".cursor", "rules", "a.md"))).toBe(true)
			expect(await isSymlink(join(dir, ".cursor", "rules", "nested"))).toBe(false)
			expect(await readText(join(dir, ".cursor", "rules", "nested", "b.md"))).toBe("B")

			recordResult(lockfile, first)
			const linkBefore = await lstat(join(dir, ".cursor", "rules", "a.md"))

			const second = await installEntry(entry, lockfile, ctx)

			expect(second.ok && second.value.skippedNoChange).toBe(true)
			expect(second.ok && second.value.lockedEntry).toBeUndefined()
			const linkAfter = await lstat(join(dir, ".cursor", "rules", "a.md"))
			expect(linkAfter.ino).toBe(linkBefore.ino)
			expect(linkAfter.mtimeMs).toBe(linkBefore.mtimeMs)
		})
	})

	it("repairs a redirected link even when the checksum still matches", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "shared"), { "a.md": "A", "elsewhere.md": "X" })
			await writeTree(join(dir, "src"), { "a.md": "A" })
			const entry = makeEntry({ kind: "cursor_rules", source: fsSource("src") })
			const lockfile = createLockfile()
			const ctx = makeContext(dir)
			recordResult(lockfile, await installEntry(entry, lockfile, ctx))

			const link = join(dir, ".cursor", "rules", "a.md")
			await rm(link)
			await symlink(join(dir, "shared", "elsewhere.md"), link)

			const repaired = await installEntry(entry, lockfile, ctx)

			expect(repaired.ok && repaired.value.installed).toBe(true)
			expect(await readlink(link)).toBe(join(dir, "src", "a.md"))
		})
	})

	it("repairs a link that no longer resolves", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "src"), { "a.md": "A", "b.md": "B" })
			const entry = makeEntry({ kind: "cursor_rules", source: fsSource("src") })
			const lockfile = createLockfile()
			const ctx = makeContext(dir)
			recordResult(lockfile, await installEntry(entry, lockfile, ctx))

			const link = join(dir, ".cursor", "rules", "a.md")
			await rm(link)
			await symlink(join(dir, "gone", "a.md"), link)

			const repaired = await installEntry(entry, lockfile, ctx)

			expect(repaired.ok && repaired.value.skippedNoChange).toBe(false)
			expect(repaired.ok && repaired.value.installed).toBe(true)
			expect(await readlink(link)).toBe(join(dir, "src", "a.md"))
			expect(await readText(link)).toBe("A")
		})
	})

	it("reinstalls when the destination was deleted", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "docs"), { "AGENTS.md": "docs" })
			const entry = makeEntry({ kind: "agents_md", source: fsSource("docs", "AGENTS.md", false) })
			const lockfile = createLockfile()
			const ctx = makeContext(dir)
			recordResult(lockfile, await installEntry(entry, lockfile, ctx))

			await rm(join(dir, "AGENTS.md"))
			const result = await installEntry(entry, lockfile, ctx)

			expect(result.ok && result.value.installed).toBe(true)
			expect(await readText(join(dir, "AGENTS.md"))).toBe("docs")
		})
	})

	it("refuses to overwrite a real file without permission and takes no backup", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "docs"), { "AGENTS.md": "new" })
			await writeFile(join(dir, "AGENTS.md"), "mine")
			const entry = makeEntry({ kind: "agents_md", source: fsSource("docs", "AGENTS.md") })

			const result = await installEntry(entry, createLockfile(), makeContext(dir))

			expect(result).toBeErrOfType("conflict")
			expect(await exists(join(dir, ".assetry-backups"))).toBe(false)
			expect(await readText(join(dir, "AGENTS.md"))).toBe("mine")
		})
	})

	it("backs up and overwrites with the allow flag", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "docs"), { "AGENTS.md": "new" })
			await writeFile(join(dir, "AGENTS.md"), "mine")
			const entry = makeEntry({ kind: "agents_md", source: fsSource("docs", "AGENTS.md", false) })

			const result = await installEntry(
				entry,
				createLockfile(),
				makeContext(dir, { options: { allowOverwrite: true } }),
			)

			const backup = join(dir, ".assetry-backups", "AGENTS.md-2024-03-05-0907")
			expect(result.ok && result.value.backups).toEqual([backup])
			expect(await readText(backup)).toBe("mine")
			expect(await readText(join(dir, "AGENTS.md"))).toBe("new")
		})
	})

	it("asks interactively and stops when declined", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "docs"), { "AGENTS.md": "new" })
			await writeFile(join(dir, "AGENTS.md"), "mine")
			const prompter = createStubPrompter({ answer: false, interactive: true })
			const entry = makeEntry({ kind: "agents_md", source: fsSource("docs", "AGENTS.md") })

			const result = await installEntry(entry, createLockfile(), makeContext(dir, { prompter }))

			expect(result).toBeErrOfType("cancelled")
			expect(prompter.questions).toEqual([
				`Overwrite existing content at ${join(dir, "AGENTS.md")}?`,
			])
		})
	})

	it("replaces an untouched previous copy without asking", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "docs"), { "AGENTS.md": "v1" })
			const entry = makeEntry({ kind: "agents_md", source: fsSource("docs", "AGENTS.md", false) })
			const lockfile = createLockfile()
			const ctx = makeContext(dir)
			recordResult(lockfile, await installEntry(entry, lockfile, ctx))

			await writeFile(join(dir, "docs", "AGENTS.md"), "v2")
			const result = await installEntry(entry, lockfile, ctx)

			expect(result.ok && result.value.installed).toBe(true)
			expect(result.ok && result.value.backups).toEqual([])
			expect(await readText(join(dir, "AGENTS.md"))).toBe("v2")
		})
	})

	it("treats local edits to a previous copy as a conflict", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "docs"), { "AGENTS.md": "v1" })
			const entry = makeEntry({ kind: "agents_md", source: fsSource("docs", "AGENTS.md", false) })
			const lockfile = createLockfile()
			const ctx = makeContext(dir)
			recordResult(lockfile, await installEntry(entry, lockfile, ctx))

			await writeFile(join(dir, "AGENTS.md"), "local edits")
			await writeFile(join(dir, "docs", "AGENTS.md"), "v2")
			const result = await installEntry(entry, lockfile, ctx)

			expect(result).toBeErrOfType("conflict")
			expect(await readText(join(dir, "AGENTS.md"))).toBe("local edits")
			expect(await exists(join(dir, ".assetry-backups"))).toBe(false)
		})
	})

	it("backs up local edits to a previous copy under the allow flag", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "docs"), { "AGENTS.md": "v1" })
			const entry = makeEntry({ kind: "agents_md", source: fsSource("docs", "AGENTS.md", false) })
			const lockfile = createLockfile()
			recordResult(lockfile, await installEntry(entry, lockfile, makeContext(dir)))

			await writeFile(join(dir, "AGENTS.md"), "local edits")
			await writeFile(join(dir, "docs", "AGENTS.md"), "v2")
			const result = await installEntry(
				entry,
				lockfile,
				makeContext(dir, { options: { allowOverwrite: true } }),
			)

			const backup = join(dir, ".assetry-backups", "AGENTS.md-2024-03-05-0907")
			expect(result.ok && result.value.backups).toEqual([backup])
			expect(await readText(backup)).toBe("local edits")
			expect(await readText(join(dir, "AGENTS.md"))).toBe("v2")
		})
	})

	it("treats local edits to previously merged hooks as a conflict", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "hooks-src"), { "hooks.json": "{}" })
			const entry = makeEntry({
				kind: "cursor_hooks",
				source: fsSource("hooks-src", undefined, false),
			})
			const lockfile = createLockfile()
			const ctx = makeContext(dir)
			recordResult(lockfile, await installEntry(entry, lockfile, ctx))

			await writeFile(join(dir, ".cursor", "hooks.json"), "mine")
			await writeFile(join(dir, "hooks-src", "hooks.json"), '{"version":2}')
			const result = await installEntry(entry, lockfile, ctx)

			expect(result).toBeErrOfType("conflict")
			expect(await readText(join(dir, ".cursor", "hooks.json"))).toBe("mine")
		})
	})

	it("makes no writes in dry-run and returns no locked entry", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "docs"), { "AGENTS.md": "new" })
			await writeFile(join(dir, "AGENTS.md"), "mine")
			const entry = makeEntry({ kind: "agents_md", source: fsSource("docs", "AGENTS.md") })

			const result = await installEntry(
				entry,
				createLockfile(),
				makeContext(dir, { options: { dryRun: true } }),
			)

			expect(result).toBeOk()
			expect(result.ok && result.value.installed).toBe(false)
			expect(result.ok && result.value.lockedEntry).toBeUndefined()
			expect(await readText(join(dir, "AGENTS.md"))).toBe("mine")
			expect(await exists(join(dir, ".assetry-backups"))).toBe(false)
		})
	})

	it("copies only items matching the include prefixes", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "rules"), {
				"go-style.md": "go",
				"ts-lint.md": "lint",
				"ts-style/deep.md": "deep",
			})
			const entry = makeEntry({
				include: ["ts-"],
				kind: "cursor_rules",
				source: fsSource("rules", undefined, false),
			})

			const result = await installEntry(entry, createLockfile(), makeContext(dir))

			expect(result).toBeOk()
			expect((await readdir(join(dir, ".cursor", "rules"))).sort()).toEqual([
				"ts-lint.md",
				"ts-style",
			])
			expect(await readText(join(dir, ".cursor", "rules", "ts-style", "deep.md"))).toBe("deep")
		})
	})

	it("warns about skills without a marker file", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "skills"), { "alpha/SKILL.md": "# alpha", "beta/notes.md": "x" })
			const entry = makeEntry({ kind: "cursor_skills_root", source: fsSource("skills") })

			const result = await installEntry(entry, createLockfile(), makeContext(dir))

			expect(result.ok && result.value.warnings).toEqual(["Skill 'beta' is missing SKILL.md"])
		})
	})

	it("fails on the first structural violation in strict mode", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "skills"), { "beta/notes.md": "x" })
			const entry = makeEntry({ kind: "cursor_skills_root", source: fsSource("skills") })

			const result = await installEntry(
				entry,
				createLockfile(),
				makeContext(dir, { options: { strict: true } }),
			)

			expect(result).toBeErrOfType("validation")
			expect(await exists(join(dir, ".cursor", "skills"))).toBe(false)
		})
	})

	it("merges hooks into a shared directory", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "hooks-src"), {
				"hooks.json": '{"version":1}',
				"hooks/format.sh": "echo format",
			})
			await writeTree(join(dir, ".cursor"), { "settings.json": "{}" })
			const entry = makeEntry({
				kind: "cursor_hooks",
				source: fsSource("hooks-src", undefined, false),
			})

			const result = await installEntry(entry, createLockfile(), makeContext(dir))

			expect(result).toBeOk()
			expect(await readText(join(dir, ".cursor", "settings.json"))).toBe("{}")
			expect(await readText(join(dir, ".cursor", "hooks.json"))).toBe('{"version":1}')
			expect(await readText(join(dir, ".cursor", "hooks", "format.sh"))).toBe("echo format")
		})
	})

	it("checks only the named hook paths for conflicts", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "hooks-src"), { "hooks.json": "{}" })
			await writeTree(join(dir, ".cursor"), { "hooks.json": "mine", "rules/x.md": "x" })
			const entry = makeEntry({
				kind: "cursor_hooks",
				source: fsSource("hooks-src", undefined, false),
			})

			const result = await installEntry(entry, createLockfile(), makeContext(dir))

			expect(result).toBeErrOfType("conflict")
			if (!result.ok && result.error.type === "conflict") {
				expect(result.error.path).toBe(join(dir, ".cursor", "hooks.json"))
			}
		})
	})

	it("replaces a symlink in the merge path instead of writing through it", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "hooks-src"), { "hooks.json": "new" })
			await writeTree(join(dir, "outside"), { "hooks.json": "untouched" })
			await mkdir(join(dir, ".cursor"))
			await symlink(join(dir, "outside", "hooks.json"), join(dir, ".cursor", "hooks.json"))
			const entry = makeEntry({
				kind: "cursor_hooks",
				source: fsSource("hooks-src", undefined, false),
			})

			const result = await installEntry(entry, createLockfile(), makeContext(dir))

			expect(result).toBeOk()
			expect(await isSymlink(join(dir, ".cursor", "hooks.json"))).toBe(false)
			expect(await readText(join(dir, ".cursor", "hooks.json"))).toBe("new")
			expect(await readText(join(dir, "outside", "hooks.json"))).toBe("untouched")
		})
	})

	it("reports a missing source path", async () => {
		await withTempDir(async (dir) => {
			const entry = makeEntry({ kind: "cursor_rules", source: fsSource("nowhere") })

			expect(await installEntry(entry, createLockfile(), makeContext(dir))).toBeErrOfType(
				"source_unavailable",
			)
		})
	})

	it("rejects an entry without a source", async () => {
		await withTempDir(async (dir) => {
			expect(
				await installEntry(makeEntry({ kind: "agents_md" }), createLockfile(), makeContext(dir)),
			).toBeErrOfType("validation")
		})
	})
})

describe("installEntry with git sources", () => {
	const REPO = "https://example.com/team/docs.git"
	const gitEntry = makeEntry({
		kind: "agents_md",
		source: { path: "AGENTS.md", ref: "auto", repo: REPO, shallow: true, type: "git" },
	})

	it("records the resolved ref and commit and never links", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "fixture"), { "AGENTS.md": "remote docs" })
			const git = createFakeGitClient({ [REPO]: { main: { commit: "aaa111", dir: join(dir, "fixture") } } })

			const result = await installEntry(gitEntry, createLockfile(), makeContext(dir, { git }))

			expect(result).toBeOk()
			if (!result.ok) return
			expect(result.value.wasSymlink).toBe(false)
			expect(result.value.lockedEntry?.commit).toBe("aaa111")
			expect(result.value.lockedEntry?.resolvedRef).toBe("main")
			expect(result.value.lockedEntry?.source).toBe(REPO)
			expect(await isSymlink(join(dir, "AGENTS.md"))).toBe(false)
			expect(await readText(join(dir, "AGENTS.md"))).toBe("remote docs")
		})
	})

	it("skips a locked install without cloning and reports an available upgrade", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "fixture"), { "AGENTS.md": "v1" })
			const git = createFakeGitClient({ [REPO]: { main: { commit: "aaa111", dir: join(dir, "fixture") } } })
			const lockfile = createLockfile()
			const ctx = makeContext(dir, { git })
			recordResult(lockfile, await installEntry(gitEntry, lockfile, ctx))

			git.setBranch(REPO, "main", { commit: "bbb222", dir: join(dir, "fixture") })
			git.calls.length = 0
			const result = await installEntry(gitEntry, lockfile, ctx)

			expect(result.ok && result.value.skippedNoChange).toBe(true)
			expect(result.ok && result.value.upgradeAvailable).toEqual({
				availableCommit: "bbb222",
				currentCommit: "aaa111",
			})
			expect(git.calls.map((call) => call.method)).toEqual(["remoteCommit"])
		})
	})

	it("still skips when the remote cannot be reached", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "fixture"), { "AGENTS.md": "v1" })
			const git = createFakeGitClient({ [REPO]: { main: { commit: "aaa111", dir: join(dir, "fixture") } } })
			const lockfile = createLockfile()
			const ctx = makeContext(dir, { git })
			recordResult(lockfile, await installEntry(gitEntry, lockfile, ctx))

			git.setOffline(REPO, true)
			const result = await installEntry(gitEntry, lockfile, ctx)

			expect(result.ok && result.value.skippedNoChange).toBe(true)
			expect(result.ok && result.value.upgradeAvailable).toBeUndefined()
		})
	})

	it("restores a missing destination from the locked commit", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "v1"), { "AGENTS.md": "v1" })
			await writeTree(join(dir, "v2"), { "AGENTS.md": "v2" })
			const git = createFakeGitClient({ [REPO]: { main: { commit: "aaa111", dir: join(dir, "v1") } } })
			const lockfile = createLockfile()
			const ctx = makeContext(dir, { git })
			recordResult(lockfile, await installEntry(gitEntry, lockfile, ctx))

			git.setBranch(REPO, "main", { commit: "bbb222", dir: join(dir, "v2") })
			git.setBranch(REPO, "old", { commit: "aaa111", dir: join(dir, "v1") })
			await rm(join(dir, "AGENTS.md"))
			git.calls.length = 0
			const result = await installEntry(gitEntry, lockfile, ctx)

			expect(result.ok && result.value.installed).toBe(true)
			expect(await readText(join(dir, "AGENTS.md"))).toBe("v1")
			expect(git.calls.map((call) => call.method)).toEqual(["cloneCommit"])
			expect(result.ok && result.value.lockedEntry?.resolvedRef).toBe("main")
		})
	})

	it("upgrade mode skips the clone when the remote commit is unchanged", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "fixture"), { "AGENTS.md": "v1" })
			const git = createFakeGitClient({ [REPO]: { main: { commit: "aaa111", dir: join(dir, "fixture") } } })
			const lockfile = createLockfile()
			recordResult(lockfile, await installEntry(gitEntry, lockfile, makeContext(dir, { git })))

			git.calls.length = 0
			const result = await installEntry(
				gitEntry,
				lockfile,
				makeContext(dir, { git, options: { upgrade: true } }),
			)

			expect(result.ok && result.value.skippedNoChange).toBe(true)
			expect(git.calls.map((call) => call.method)).toEqual(["remoteCommit"])
		})
	})

	it("upgrade mode installs a newer commit", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "v1"), { "AGENTS.md": "v1" })
			await writeTree(join(dir, "v2"), { "AGENTS.md": "v2" })
			const git = createFakeGitClient({ [REPO]: { main: { commit: "aaa111", dir: join(dir, "v1") } } })
			const lockfile = createLockfile()
			recordResult(lockfile, await installEntry(gitEntry, lockfile, makeContext(dir, { git })))

			git.setBranch(REPO, "main", { commit: "bbb222", dir: join(dir, "v2") })
			const result = await installEntry(
				gitEntry,
				lockfile,
				makeContext(dir, { git, options: { upgrade: true } }),
			)

			expect(result.ok && result.value.lockedEntry?.commit).toBe("bbb222")
			expect(await readText(join(dir, "AGENTS.md"))).toBe("v2")
		})
	})

	it("installs at a moved destination that already exists instead of skipping", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "fixture"), { "a.md": "A" })
			const git = createFakeGitClient({ [REPO]: { main: { commit: "aaa111", dir: join(dir, "fixture") } } })
			const entry = makeEntry({
				dest: "custom/rules",
				kind: "cursor_rules",
				source: { ref: "auto", repo: REPO, shallow: true, type: "git" },
			})
			const lockfile = createLockfile()
			recordResult(lockfile, await installEntry(entry, lockfile, makeContext(dir, { git })))
			await writeTree(join(dir, ".cursor", "rules"), { "other.md": "mine" })

			git.calls.length = 0
			const result = await installEntry(
				{ ...entry, dest: undefined },
				lockfile,
				makeContext(dir, { git, options: { allowOverwrite: true } }),
			)

			expect(result.ok && result.value.skippedNoChange).toBe(false)
			expect(result.ok && result.value.lockedEntry?.dest).toBe(".cursor/rules")
			expect(git.calls.map((call) => call.method)).toEqual(["cloneCommit"])
			expect(await readText(join(dir, ".cursor", "rules", "a.md"))).toBe("A")
			expect(
				await readText(join(dir, ".assetry-backups", ".cursor-rules-2024-03-05-0907", "other.md")),
			).toBe("mine")
		})
	})

	it("upgrade mode installs at a moved destination even when the commit is unchanged", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "fixture"), { "AGENTS.md": "v1" })
			await writeTree(dir, { "docs/AGENTS.md": "placeholder" })
			const git = createFakeGitClient({ [REPO]: { main: { commit: "aaa111", dir: join(dir, "fixture") } } })
			const lockfile = createLockfile()
			recordResult(lockfile, await installEntry(gitEntry, lockfile, makeContext(dir, { git })))

			const result = await installEntry(
				{ ...gitEntry, dest: "docs/AGENTS.md" },
				lockfile,
				makeContext(dir, { git, options: { allowOverwrite: true, upgrade: true } }),
			)

			expect(result.ok && result.value.installed).toBe(true)
			expect(await readText(join(dir, "docs", "AGENTS.md"))).toBe("v1")
		})
	})
})

describe("installEntry with composite entries", () => {
	it("joins sources with blank lines and hashes the output", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "parts"), { "one.md": "# One\n\n", "two.md": "# Two  \n" })
			const entry = makeEntry({
				kind: "composite_agents_md",
				sources: [fsSource("parts", "one.md"), fsSource("parts", "two.md")],
			})
			const lockfile = createLockfile()
			const ctx = makeContext(dir)

			const result = await installEntry(entry, lockfile, ctx)

			expect(await readText(join(dir, "AGENTS.md"))).toBe("# One\n\n# Two\n")
			expect(result.ok && result.value.lockedEntry?.checksum).toBe(
				hashContent("# One\n\n# Two\n"),
			)
			expect(result.ok && result.value.lockedEntry?.source).toEqual({
				composite: ["filesystem:parts", "filesystem:parts"],
			})
			expect(await isSymlink(join(dir, "AGENTS.md"))).toBe(false)

			recordResult(lockfile, result)
			const second = await installEntry(entry, lockfile, ctx)
			expect(second.ok && second.value.skippedNoChange).toBe(true)
		})
	})

	it("fails when a listed source is not a file", async () => {
		await withTempDir(async (dir) => {
			await writeTree(join(dir, "parts"), { "nested/x.md": "x" })
			const entry = makeEntry({
				kind: "composite_agents_md",
				sources: [fsSource("parts", "nested")],
			})

			expect(await installEntry(entry, createLockfile(), makeContext(dir))).toBeErrOfType(
				"source_unavailable",
			)
		})
	})
})
