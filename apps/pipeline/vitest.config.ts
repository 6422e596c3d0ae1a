import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["src/**/*.test.ts"],
	},
	resolve: {
		alias: {
			"@crease/shared-types": fileURLToPath(
				new URL("../../packages/shared-types/src", import.meta.url),
			),
		},
	},
});
