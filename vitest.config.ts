import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

const sourceDirectory = fileURLToPath(new URL("./src", import.meta.url));
const testsDirectory = fileURLToPath(new URL("./tests", import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^@\/(.+)\/$/, replacement: `${sourceDirectory}/$1/index.ts` },
			{ find: /^@\//, replacement: `${sourceDirectory}/` },
			{ find: /^@tests\/(.+)\/$/, replacement: `${testsDirectory}/$1/index.ts` },
			{ find: /^@tests\//, replacement: `${testsDirectory}/` },
		],
	},
	test: {
		include: ["tests/**/*.spec.ts"],
		environment: "node",
		env: {
			NODE_ENV: "test",
			LOG_LEVEL: "silent",
			LOG_TO_CONSOLE: "false",
		},
	},
});
