import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		// config tests chdir into temp dirs, which worker threads do not allow
		pool: "forks",
	},
})
