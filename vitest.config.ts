import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/src/**/*.test.ts"],
		setupFiles: ["./tests/setup.ts"],
		environment: "node",
	},
});
