import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = fileURLToPath(new URL("./src", import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			{ find: /^#cli\/(.*)$/, replacement: `${src}/cli/$1` },
			{ find: /^#commands\/(.*)$/, replacement: `${src}/commands/$1` },
			{ find: /^#config\/(.*)$/, replacement: `${src}/config/$1` },
			{ find: /^#config$/, replacement: `${src}/config/index.ts` },
			{ find: /^#core\/(.*)$/, replacement: `${src}/$1` },
			{ find: /^#git\/(.*)$/, replacement: `${src}/git/$1` },
			{ find: /^#install\/(.*)$/, replacement: `${src}/install/$1` },
			{ find: /^#sources\/(.*)$/, replacement: `${src}/sources/$1` },
		],
	},
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		testTimeout: 20000,
	},
});
