import { execa } from "execa";
import { buildGitConfigs, buildGitEnv, resolveGitCommand } from "#git/git-env";
import { redactRepoUrl } from "#git/redact";

const DEFAULT_TIMEOUT_MS = 120000; // 120 seconds (2 minutes)

export type GitRunOptions = {
	cwd?: string;
	timeoutMs?: number;
	logger?: (message: string) => void;
};

/**
 * Runs one git command and resolves with its stdout.
 */
export type GitRunner = (
	args: string[],
	options?: GitRunOptions,
) => Promise<string>;

export const runGit: GitRunner = async (args, options) => {
	const commandArgs = [...buildGitConfigs(), ...args];
	options?.logger?.(`git ${commandArgs.map(redactRepoUrl).join(" ")}`);
	const result = await execa(resolveGitCommand(), commandArgs, {
		cwd: options?.cwd,
		timeout: options?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
		maxBuffer: 10 * 1024 * 1024,
		stdin: "ignore",
		env: buildGitEnv(),
	});
	return result.stdout;
};
