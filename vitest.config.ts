import { defineConfig } from "vitest/config";

// Workspace packages export their TypeScript sources under "development".
const conditions = ["development"];

export default defineConfig({
	resolve: { conditions },
	ssr: { resolve: { conditions } },
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		environment: "node",
		testTimeout: 10_000,
		restoreMocks: true,
	},
});
