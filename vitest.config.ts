import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		testTimeout: 15_000,
	},
	resolve: {
		alias: [
			{ find: /^@vigil\/core\/(.*)$/, replacement: fromRoot("./packages/core/src/$1/index.ts") },
			{ find: /^@vigil\/core$/, replacement: fromRoot("./packages/core/src/index.ts") },
			{
				find: /^@vigil\/memory-adapter$/,
				replacement: fromRoot("./packages/memory-adapter/src/index.ts"),
			},
			{
				find: /^@vigil\/kysely-adapter$/,
				replacement: fromRoot("./packages/kysely-adapter/src/index.ts"),
			},
			{ find: /^@vigil\/test-utils$/, replacement: fromRoot("./packages/test-utils/src/index.ts") },
			{ find: /^vigil$/, replacement: fromRoot("./packages/vigil/src/index.ts") },
		],
	},
});
