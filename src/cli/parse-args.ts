import process from "node:process";

import cac from "cac";
import { ExitCode } from "#cli/exit-code";
import type { CliCommand, CliOptions } from "#cli/types";

const COMMANDS = ["init", "sync", "pull", "validate", "status"] as const;
type Command = (typeof COMMANDS)[number];

const VALUE_FLAGS = new Set(["--config", "--only"]);

export type ParsedArgs = {
	command: Command | null;
	options: CliOptions;
	positionals: string[];
	rawArgs: string[];
	help: boolean;
	parsed: CliCommand;
};

const isCommand = (value: string): value is Command =>
	COMMANDS.some((command) => command === value);

const findCommandIndex = (rawArgs: string[]) => {
	for (let index = 0; index < rawArgs.length; index += 1) {
		const arg = rawArgs[index];
		if (arg.startsWith("-")) {
			const [flag] = arg.split("=");
			if (VALUE_FLAGS.has(flag) && !arg.includes("=")) {
				index += 1;
			}
			continue;
		}
		return index;
	}
	return -1;
};

const getCommandFromArgs = (rawArgs: string[]) => {
	const commandIndex = findCommandIndex(rawArgs);
	if (commandIndex === -1) {
		return null;
	}
	const command = rawArgs[commandIndex];
	if (!isCommand(command)) {
		throw new Error(`Unknown command '${command}'.`);
	}
	return command;
};

const parsePositionals = (rawArgs: string[]) => {
	const commandIndex = findCommandIndex(rawArgs);
	const tail = commandIndex === -1 ? [] : rawArgs.slice(commandIndex + 1);
	const positionals: string[] = [];
	for (let index = 0; index < tail.length; index += 1) {
		const arg = tail[index];
		if (VALUE_FLAGS.has(arg)) {
			index += 1;
			continue;
		}
		if (arg.startsWith("-")) {
			continue;
		}
		positionals.push(arg);
	}
	return positionals;
};

const toStringList = (value: unknown, flag: string): string[] => {
	if (value === undefined) {
		return [];
	}
	const values = Array.isArray(value) ? value : [value];
	return values.map((item) => {
		if (typeof item !== "string" || item.length === 0) {
			throw new Error(`${flag} expects a value.`);
		}
		return item;
	});
};

const toOptionalString = (value: unknown, flag: string) => {
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string" || value.length === 0) {
		throw new Error(`${flag} expects a value.`);
	}
	return value;
};

const buildOptions = (raw: Record<string, unknown>): CliOptions => ({
	config: toOptionalString(raw.config, "--config"),
	only: toStringList(raw.only, "--only"),
	yes: Boolean(raw.yes),
	dryRun: Boolean(raw.dryRun),
	strict: Boolean(raw.strict),
	checkRemote: Boolean(raw.checkRemote),
	json: Boolean(raw.json),
	silent: Boolean(raw.silent),
	verbose: Boolean(raw.verbose),
});

const assertScopedOptions = (command: Command | null, options: CliOptions) => {
	const isSync = command === "sync" || command === "pull";
	if (!isSync) {
		if (options.only.length > 0) {
			throw new Error("--only is only valid for sync.");
		}
		if (options.yes) {
			throw new Error("--yes is only valid for sync.");
		}
		if (options.dryRun) {
			throw new Error("--dry-run is only valid for sync.");
		}
	}
	if (options.strict && !isSync && command !== "validate") {
		throw new Error("--strict is only valid for sync or validate.");
	}
	if (options.checkRemote && command !== "status") {
		throw new Error("--check-remote is only valid for status.");
	}
};

const buildParsedCommand = (
	command: Command | null,
	options: CliOptions,
): CliCommand => {
	switch (command) {
		case "init":
			return { command: "init", options };
		case "sync":
		case "pull":
			return { command: "sync", options };
		case "validate":
			return { command: "validate", options };
		case "status":
			return { command: "status", options };
		default:
			return { command: null, options };
	}
};

export const parseArgs = (argv = process.argv): ParsedArgs => {
	try {
		const cli = cac("skillsync");

		cli
			.option("--config <path>", "Path to config file")
			.option("--json", "Output JSON")
			.option("--silent", "Suppress non-error output")
			.option("--verbose", "Enable verbose logging")
			.help();

		cli.command("init", "Create a config with an example entry");
		cli
			.command("sync", "Install or update entries from their sources")
			.alias("pull")
			.option("--only <id>", "Only sync the given entry (repeatable)")
			.option("-y, --yes", "Overwrite conflicting content without asking")
			.option("--dry-run", "Preview changes without writing files")
			.option("--strict", "Fail on missing skill markers");
		cli
			.command("validate", "Check the config and its sources")
			.option("--strict", "Fail on the first warning");
		cli
			.command("status", "Show installed entries from the lock file")
			.option("--check-remote", "Check git sources for upstream changes");

		const result = cli.parse(argv, { run: false });
		const rawArgs = argv.slice(2);
		const command = getCommandFromArgs(rawArgs);
		const options = buildOptions(result.options);
		assertScopedOptions(command, options);
		return {
			command,
			options,
			positionals: parsePositionals(rawArgs),
			rawArgs,
			help: Boolean(result.options.help),
			parsed: buildParsedCommand(command, options),
		};
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		console.error(message);
		process.exit(ExitCode.InvalidArgument);
	}
};
