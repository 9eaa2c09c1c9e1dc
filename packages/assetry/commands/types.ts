import type { BaseError } from "@assetry/core"
import type { ConsolaInstance } from "consola"
import type { ZodError } from "zod"
import type { AssetryError } from "@/types/errors"

// CommandResult models user-facing flow outcomes; engine operations keep { ok, value } results.
export type CommandResult<T = void> =
	| { status: "completed"; value: T }
	| { status: "unchanged"; reason: string }
	| { status: "cancelled" }
	| { status: "failed"; error: AssetryError }

export const CommandResult = {
	cancelled: (): CommandResult<never> => ({ status: "cancelled" }),
	completed: <T>(value: T): CommandResult<T> => ({ status: "completed", value }),
	failed: (error: AssetryError): CommandResult<never> => ({ error, status: "failed" }),
	unchanged: (reason: string): CommandResult<never> => ({
		reason,
		status: "unchanged",
	}),
} as const

export function printOutcome(result: CommandResult<unknown>, logger: ConsolaInstance): void {
	switch (result.status) {
		case "completed":
			logger.success("Done.")
			break
		case "unchanged":
			logger.info(result.reason)
			break
		case "cancelled":
			logger.info("Canceled.")
			break
		case "failed":
			logger.error(formatErrorChain(result.error))
			printRawErrors(result.error, logger)
			process.exitCode = 1
			break
	}
}

export function formatErrorChain(error: BaseError): string {
	return formatErrorChainLines(error, 0).join("\n")
}

function formatErrorChainLines(error: BaseError, indent: number): string[] {
	const prefix = " ".repeat(indent)
	const detailParts = buildDetailParts(error)
	const details = detailParts.length ? ` (${detailParts.join(", ")})` : ""
	const lines = [`${prefix}[${error.type}] ${error.message}${details}`]

	const zodError = "zodError" in error ? error.zodError : undefined
	if (isZodError(zodError)) {
		lines.push(`${prefix}  Zod issues:`)
		for (const issue of zodError.issues) {
			const pathLabel = issue.path.length > 0 ? issue.path.join(".") : "<root>"
			lines.push(`${prefix}  - ${pathLabel}: ${issue.message}`)
		}
	}

	const attempts = "attempts" in error ? error.attempts : undefined
	if (Array.isArray(attempts)) {
		for (const attempt of attempts) {
			if (isGitAttempt(attempt)) {
				lines.push(`${prefix}  - ${attempt.ref}: ${attempt.message}`)
			}
		}
	}

	if (error.cause) {
		lines.push(`${prefix}Caused by:`)
		lines.push(...formatErrorChainLines(error.cause, indent + 2))
	}

	return lines
}

function isZodError(value: unknown): value is ZodError {
	return (
		typeof value === "object" &&
		value !== null &&
		"issues" in value &&
		Array.isArray((value as { issues?: unknown }).issues)
	)
}

function isGitAttempt(value: unknown): value is { ref: string; message: string } {
	return (
		typeof value === "object" &&
		value !== null &&
		"ref" in value &&
		typeof value.ref === "string" &&
		"message" in value &&
		typeof value.message === "string"
	)
}

function printRawErrors(error: BaseError, logger: ConsolaInstance): void {
	if (error.rawError) {
		logger.debug(error.rawError)
	}
	if (error.cause) {
		printRawErrors(error.cause, logger)
	}
}

function buildDetailParts(error: BaseError): string[] {
	const details: string[] = []
	if ("entryId" in error && typeof error.entryId === "string") {
		details.push(`entry=${error.entryId}`)
	}
	if ("dest" in error && typeof error.dest === "string") {
		details.push(`dest=${error.dest}`)
	}
	if ("field" in error && typeof error.field === "string") {
		details.push(`field=${error.field}`)
	}
	if ("path" in error && typeof error.path === "string") {
		details.push(`path=${error.path}`)
	}
	if ("source" in error && typeof error.source === "string") {
		details.push(`source=${error.source}`)
	}
	if ("operation" in error && typeof error.operation === "string") {
		details.push(`operation=${error.operation}`)
	}
	if ("repo" in error && typeof error.repo === "string") {
		details.push(`repo=${error.repo}`)
	}
	if ("stage" in error && typeof error.stage === "string") {
		details.push(`stage=${error.stage}`)
	}
	if ("target" in error && typeof error.target === "string") {
		details.push(`target=${error.target}`)
	}
	return details
}
