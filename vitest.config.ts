import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["core/**/*.test.ts", "loaders/**/*.test.ts", "cli/**/*.test.ts"],
		environment: "node",
	},
});
