import path from "node:path";
import { defineBuildConfig } from "unbuild";

export default defineBuildConfig({
	entries: [
		{ input: "src/bin", name: "cli" },
		{ input: "src/index", name: "index" },
	],
	declaration: false,
	clean: true,
	sourcemap: true,
	rollup: {
		emitCJS: false,
		alias: {
			entries: [
				{
					find: /^#cli\/(.*)$/,
					replacement: path.resolve("src/cli/$1"),
				},
				{
					find: /^#commands\/(.*)$/,
					replacement: path.resolve("src/commands/$1"),
				},
				{
					find: /^#config\/(.*)$/,
					replacement: path.resolve("src/config/$1"),
				},
				{
					find: "#config",
					replacement: path.resolve("src/config/index"),
				},
				{
					find: /^#core\/(.*)$/,
					replacement: path.resolve("src/$1"),
				},
				{
					find: /^#git\/(.*)$/,
					replacement: path.resolve("src/git/$1"),
				},
				{
					find: /^#install\/(.*)$/,
					replacement: path.resolve("src/install/$1"),
				},
				{
					find: /^#sources\/(.*)$/,
					replacement: path.resolve("src/sources/$1"),
				},
			],
		},
		inlineDependencies: ["picocolors"],
		esbuild: {
			minify: true,
		},
	},
});
