import { type Entry, kindTraits, type SourceDeclaration } from "@assetry/core"
import { resolveFilesystemSource } from "@/sources/filesystem"
import { resolveGitSource } from "@/sources/git"
import type { ResolvedSource, SourceResult } from "@/sources/types"
import type { InstallContext } from "@/types/context"

export async function resolveSource(
	declaration: SourceDeclaration,
	ctx: Pick<InstallContext, "baseDir" | "git" | "logger">,
): Promise<SourceResult<ResolvedSource>> {
	switch (declaration.type) {
		case "filesystem":
			return { ok: true, value: resolveFilesystemSource(declaration, ctx.baseDir) }
		case "git":
			return resolveGitSource(declaration, ctx)
		default: {
			const exhaustive: never = declaration
			return exhaustive
		}
	}
}

/** Every source an entry installs from: the composite list, else its single source. */
export function entrySources(entry: Entry): SourceDeclaration[] {
	if (kindTraits(entry.kind).shape === "composite") {
		return entry.sources
	}
	return entry.source ? [entry.source] : []
}

export function usesGit(entries: Entry[]): boolean {
	return entries.some((entry) => entrySources(entry).some((source) => source.type === "git"))
}
