import type {
	AbsolutePath,
	BaseError,
	IoError,
	NotFoundError,
	ParseError,
	ValidationError,
} from "@assetry/core"

export type { IoError, NotFoundError, ParseError, ValidationError } from "@assetry/core"

export interface SourceUnavailableError extends BaseError {
	type: "source_unavailable"
	path: AbsolutePath
}

export type GitOperation = "clone" | "checkout" | "rev-parse" | "ls-remote"

export interface GitAttempt {
	ref: string
	message: string
}

export interface GitError extends BaseError {
	type: "git"
	operation: GitOperation
	repo: string
	attempts: GitAttempt[]
}

export interface ConflictError extends BaseError {
	type: "conflict"
	path: AbsolutePath
	reason: "overwrite_not_allowed"
}

export interface CancelledError extends BaseError {
	type: "cancelled"
	path?: AbsolutePath
}

export type AssetryError =
	| ValidationError
	| ParseError
	| IoError
	| NotFoundError
	| SourceUnavailableError
	| GitError
	| ConflictError
	| CancelledError
