/**
 * @assetry/core
 *
 * Shared constants, types, and pure utilities for manifests and entries.
 */

export {
	AUTO_REF,
	AUTO_REF_FALLBACKS,
	BACKUP_DIRNAME,
	CURRENT_DIR,
	HOOKS_CONFIG_FILENAME,
	LOCKFILE_FILENAME,
	LOCKFILE_VERSION,
	MANIFEST_FILENAME,
	SKILL_FILENAME,
} from "./constants"
export { formatSourceDisplay, formatSourceLocation } from "./declaration/format"
export type { KindMarker, KindShape, KindTraits } from "./manifest/kinds"
export { ASSET_KINDS, isDirectoryKind, kindTraits } from "./manifest/kinds"
export { validateManifest } from "./manifest/validate"
export type { AbsolutePath, EntryId } from "./types/branded"
export { coerceEntryId } from "./types/coerce"
export type {
	AssetKind,
	Entry,
	FilesystemSourceDeclaration,
	GitSourceDeclaration,
	ManifestInfo,
	SourceDeclaration,
} from "./types/entry"
export type {
	BaseError,
	CoreError,
	IoError,
	NotFoundError,
	ParseError,
	Result,
	ValidationError,
} from "./types/error"
