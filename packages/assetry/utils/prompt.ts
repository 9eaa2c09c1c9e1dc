import { confirm, isCancel } from "@clack/prompts"

export interface Prompter {
	/** Whether a person can answer prompts in this run. */
	isInteractive: boolean
	/** Resolves false when the question is declined or cancelled. */
	confirm(message: string): Promise<boolean>
}

export function createPrompter(): Prompter {
	return {
		async confirm(message) {
			const answer = await confirm({ initialValue: false, message })
			if (isCancel(answer)) {
				return false
			}
			return answer
		},
		isInteractive: Boolean(process.stdin.isTTY),
	}
}
