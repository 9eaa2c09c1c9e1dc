import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const root = fileURLToPath(new URL(".", import.meta.url))

export default defineConfig({
	resolve: {
		alias: {
			"@": `${root}packages/assetry`,
			"@assetry/core": `${root}packages/core/index.ts`,
		},
	},
	test: {
		coverage: {
			exclude: ["**/node_modules/**", "**/*.test.ts", "packages/assetry/tests/**"],
			include: ["packages/**/*.ts"],
			provider: "v8",
			reporter: ["text", "json", "html"],
		},
		environment: "node",
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: false,
		include: ["packages/**/*.test.ts"],
	},
})
