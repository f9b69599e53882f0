import path from "node:path";
import {
	DEFAULT_CONFIG_FILENAME,
	createDefaultConfig,
	writeConfig,
} from "#config";
import { SyncError } from "#core/errors";
import { ensureGitignoreEntries } from "#core/gitignore";
import { exists } from "#core/paths";

type InitOptions = {
	configPath?: string;
	cwd?: string;
};

export const initConfig = async (options: InitOptions = {}) => {
	const cwd = options.cwd ?? process.cwd();
	const configPath = path.resolve(
		cwd,
		options.configPath ?? DEFAULT_CONFIG_FILENAME,
	);
	if (await exists(configPath)) {
		throw new SyncError(
			"config-exists",
			`Config already exists at ${configPath}. Init aborted.`,
			{ path: configPath },
		);
	}
	await writeConfig(configPath, createDefaultConfig());
	const gitignore = await ensureGitignoreEntries(path.dirname(configPath));
	return {
		configPath,
		created: true,
		gitignoreUpdated: gitignore.updated,
		gitignorePath: gitignore.gitignorePath,
		gitignoreAdded: gitignore.added,
	};
};
