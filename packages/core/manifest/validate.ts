import { parse, TomlError } from "smol-toml"
import { z } from "zod"
import { AUTO_REF } from "../constants"
import type { AbsolutePath, EntryId } from "../types/branded"
import { coerceEntryId } from "../types/coerce"
import type { Entry, ManifestInfo } from "../types/entry"
import type { Result } from "../types/error"
import { ASSET_KINDS, kindTraits } from "./kinds"

const NonEmptySchema = z.string().trim().min(1)

const GitSourceSchema = z
	.object({
		path: NonEmptySchema.optional(),
		ref: NonEmptySchema.default(AUTO_REF),
		repo: NonEmptySchema,
		shallow: z.boolean().default(true),
		type: z.literal("git"),
	})
	.strict()

const FilesystemSourceSchema = z
	.object({
		path: NonEmptySchema.optional(),
		root: NonEmptySchema,
		symlink: z.boolean().default(true),
		type: z.literal("filesystem"),
	})
	.strict()

const SourceSchema = z.discriminatedUnion("type", [
	GitSourceSchema,
	FilesystemSourceSchema,
])

const EntrySchema = z
	.object({
		dest: NonEmptySchema.optional(),
		id: NonEmptySchema,
		include: z.array(NonEmptySchema).default([]),
		kind: z.enum(ASSET_KINDS),
		source: SourceSchema.optional(),
		sources: z.array(SourceSchema).default([]),
	})
	.strict()

const ManifestSchema = z
	.object({
		entries: z.array(EntrySchema).default([]),
	})
	.strict()

export function validateManifest(
	contents: string,
	manifestPath: AbsolutePath,
): Result<ManifestInfo> {
	let raw: unknown
	try {
		raw = parse(contents)
	} catch (error) {
		const detail = error instanceof TomlError ? error.message : String(error)
		return {
			error: {
				message: `Invalid TOML: ${detail}`,
				path: manifestPath,
				rawError: error instanceof Error ? error : undefined,
				source: "assetry.toml",
				type: "parse",
			},
			ok: false,
		}
	}

	const parsed = ManifestSchema.safeParse(raw)
	if (!parsed.success) {
		return {
			error: {
				field: "entries",
				message: "Manifest validation failed.",
				path: manifestPath,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	const entries: Entry[] = []
	const seen = new Set<EntryId>()

	for (const candidate of parsed.data.entries) {
		const id = coerceEntryId(candidate.id)
		if (!id) {
			return {
				error: {
					field: "id",
					message: `Invalid entry id "${candidate.id}": ids must not contain path separators.`,
					path: manifestPath,
					source: "manual",
					type: "validation",
				},
				ok: false,
			}
		}

		if (seen.has(id)) {
			return {
				error: {
					field: "id",
					message: `Duplicate entry id: ${id}`,
					path: manifestPath,
					source: "manual",
					type: "validation",
				},
				ok: false,
			}
		}
		seen.add(id)

		if (kindTraits(candidate.kind).shape === "composite" && candidate.sources.length === 0) {
			return {
				error: {
					field: "sources",
					message: `Composite entry "${id}" requires a "sources" array.`,
					path: manifestPath,
					source: "manual",
					type: "validation",
				},
				ok: false,
			}
		}

		entries.push({
			dest: candidate.dest,
			id,
			include: candidate.include,
			kind: candidate.kind,
			source: candidate.source,
			sources: candidate.sources,
		})
	}

	return { ok: true, value: { entries } }
}
