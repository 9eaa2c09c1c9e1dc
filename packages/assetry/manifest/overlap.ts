import { type AbsolutePath, type Entry, kindTraits } from "@assetry/core"
import { isWithin, resolveDestination } from "@/install/destination"

interface Placement {
	entry: Entry
	dest: AbsolutePath
}

/**
 * Warnings for entries whose destinations coincide or nest, in declared order.
 *
 * Patch kinds merge into a shared directory, so destinations below one are
 * expected. Linked tree kinds add links file by file and may share a
 * destination with each other.
 */
export function detectOverlappingDestinations(entries: Entry[], baseDir: AbsolutePath): string[] {
	const placements = entries.map((entry) => ({ dest: resolveDestination(entry, baseDir), entry }))
	const warnings: string[] = []

	placements.forEach((first, index) => {
		for (const second of placements.slice(index + 1)) {
			const warning = describeOverlap(first, second)
			if (warning) {
				warnings.push(warning)
			}
		}
	})

	return warnings
}

function describeOverlap(first: Placement, second: Placement): string | undefined {
	if (first.dest === second.dest) {
		if (linksPerFile(first.entry) && linksPerFile(second.entry)) {
			return undefined
		}
		return `Entries '${first.entry.id}' and '${second.entry.id}' both install to ${first.dest}`
	}

	const nested = nesting(first, second)
	if (!nested) {
		return undefined
	}
	const [inner, outer] = nested
	if (kindTraits(outer.entry.kind).shape === "patch") {
		return undefined
	}
	return `Entry '${inner.entry.id}' installs to ${inner.dest}, inside the destination of '${outer.entry.id}' (${outer.dest})`
}

function nesting(first: Placement, second: Placement): [Placement, Placement] | undefined {
	if (isWithin(first.dest, second.dest)) {
		return [first, second]
	}
	if (isWithin(second.dest, first.dest)) {
		return [second, first]
	}
	return undefined
}

function linksPerFile(entry: Entry): boolean {
	return (
		kindTraits(entry.kind).shape === "tree" &&
		entry.source?.type === "filesystem" &&
		entry.source.symlink
	)
}
