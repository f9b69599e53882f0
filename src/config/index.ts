import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import {
	ConfigSchema,
	type EntryDocument,
	type SkillsyncConfig,
} from "#config/schema";
import type { Entry } from "#core/entry";
import { SyncError, ioError } from "#core/errors";
import { exists } from "#core/paths";
import { type SourceRegistry, createSourceRegistry } from "#sources/registry";
import { formatIssues } from "#sources/schema";

export type { EntryDocument, SkillsyncConfig };

export const DEFAULT_CONFIG_FILENAME = "skillsync.config.json";
export const PACKAGE_JSON_FILENAME = "package.json";
export const PACKAGE_CONFIG_KEY = "skillsync";

export type ConfigMode = "config" | "package";

export type LoadedConfig = {
	config: SkillsyncConfig;
	resolvedPath: string;
	mode: ConfigMode;
	baseDir: string;
	entries: Entry[];
};

export type LoadConfigOptions = {
	registry?: SourceRegistry;
	cwd?: string;
};

const isObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const createDefaultConfig = (): SkillsyncConfig => ({
	entries: [
		{
			id: "my-agents",
			kind: "agents_md",
			source: {
				type: "filesystem",
				root: "../shared-assets",
				symlink: true,
				path: "AGENTS.md",
			},
		},
	],
});

export const validateConfig = (input: unknown): SkillsyncConfig => {
	if (!isObject(input)) {
		throw new SyncError("invalid-config", "Config must be a JSON object.");
	}
	const parsed = ConfigSchema.safeParse(input);
	if (!parsed.success) {
		throw new SyncError(
			"invalid-config",
			`Config does not match schema: ${formatIssues(parsed.error.issues, "config")}.`,
		);
	}
	return parsed.data;
};

const parseEntrySource = (
	document: EntryDocument,
	registry: SourceRegistry,
) => {
	try {
		return registry.parseTyped(document.source.type, document.source);
	} catch (error) {
		if (error instanceof SyncError) {
			throw new SyncError(
				error.code,
				`Entry '${document.id}': ${error.message}`,
				{ entryId: document.id, cause: error },
			);
		}
		throw error;
	}
};

/**
 * Build install entries from validated documents. Source documents are
 * checked by the parser registered for their `type`.
 */
export const resolveEntries = (
	config: SkillsyncConfig,
	registry: SourceRegistry = createSourceRegistry(),
): Entry[] =>
	config.entries.map((document) => ({
		id: document.id,
		kind: document.kind,
		source: parseEntrySource(document, registry),
		...(document.dest ? { dest: document.dest } : {}),
		include: document.include ?? [],
	}));

export const serializeEntries = (
	entries: readonly Entry[],
	registry: SourceRegistry = createSourceRegistry(),
): EntryDocument[] =>
	entries.map((entry) => ({
		id: entry.id,
		kind: entry.kind,
		source: registry.serialize(entry.source),
		...(entry.dest ? { dest: entry.dest } : {}),
		...(entry.include.length > 0 ? { include: entry.include } : {}),
	}));

const readJson = async (filePath: string): Promise<unknown> => {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf8");
	} catch (error) {
		throw ioError(error, `Failed to read config at ${filePath}`, filePath);
	}
	try {
		return JSON.parse(raw);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new SyncError(
			"invalid-config",
			`Invalid JSON in ${filePath}: ${message}`,
			{ path: filePath },
		);
	}
};

const readPackageConfig = async (packagePath: string) => {
	const parsed = await readJson(packagePath);
	return isObject(parsed) ? parsed[PACKAGE_CONFIG_KEY] : undefined;
};

const modeFor = (resolvedPath: string): ConfigMode =>
	path.basename(resolvedPath) === PACKAGE_JSON_FILENAME ? "package" : "config";

/**
 * Walk up from `cwd` looking for a manifest. Each directory is checked for
 * `skillsync.config.json`, then for a `package.json` carrying the config key.
 * The walk ends at the first directory holding `.git`.
 */
export const discoverConfig = async (cwd: string = process.cwd()) => {
	let current = path.resolve(cwd);
	while (true) {
		const candidate = path.join(current, DEFAULT_CONFIG_FILENAME);
		if (await exists(candidate)) {
			return candidate;
		}
		const packagePath = path.join(current, PACKAGE_JSON_FILENAME);
		if (
			(await exists(packagePath)) &&
			(await readPackageConfig(packagePath)) !== undefined
		) {
			return packagePath;
		}
		if (await exists(path.join(current, ".git"))) {
			break;
		}
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}
	throw new SyncError(
		"config-not-found",
		`No ${DEFAULT_CONFIG_FILENAME} found in ${path.resolve(cwd)} or any parent directory. Run 'skillsync init' to create one.`,
	);
};

export const resolveConfigPath = (configPath?: string, cwd?: string) =>
	configPath
		? path.resolve(cwd ?? process.cwd(), configPath)
		: discoverConfig(cwd);

export const loadConfig = async (
	configPath?: string,
	options: LoadConfigOptions = {},
): Promise<LoadedConfig> => {
	const resolvedPath = await resolveConfigPath(configPath, options.cwd);
	if (!(await exists(resolvedPath))) {
		throw new SyncError(
			"config-not-found",
			`Config not found at ${resolvedPath}.`,
			{ path: resolvedPath },
		);
	}
	const mode = modeFor(resolvedPath);
	const input =
		mode === "package"
			? await readPackageConfig(resolvedPath)
			: await readJson(resolvedPath);
	if (mode === "package" && input === undefined) {
		throw new SyncError(
			"config-not-found",
			`Missing ${PACKAGE_CONFIG_KEY} config in ${resolvedPath}.`,
			{ path: resolvedPath },
		);
	}
	const config = validateConfig(input);
	return {
		config,
		resolvedPath,
		mode,
		baseDir: path.dirname(resolvedPath),
		entries: resolveEntries(config, options.registry),
	};
};

export const writeConfig = async (
	configPath: string,
	config: SkillsyncConfig,
) => {
	const data = `${JSON.stringify(config, null, 2)}\n`;
	try {
		await writeFile(configPath, data, "utf8");
	} catch (error) {
		throw ioError(error, `Failed to write config to ${configPath}`, configPath);
	}
};

/**
 * Write `entries` back as a manifest, tagging each source through the
 * registry.
 */
export const writeEntries = async (
	configPath: string,
	entries: readonly Entry[],
	registry?: SourceRegistry,
) => writeConfig(configPath, { entries: serializeEntries(entries, registry) });
