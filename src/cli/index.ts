import process from "node:process";
import pc from "picocolors";
import { ExitCode } from "#cli/exit-code";
import { parseArgs } from "#cli/parse-args";
import type { CliCommand } from "#cli/types";
import { setSilentMode, setVerboseMode, symbols, ui } from "#cli/ui";
import { errorMessage, isSyncError } from "#core/errors";

export const CLI_NAME = "skillsync";

const HELP_TEXT = `
Usage: ${CLI_NAME} <command> [options]

Commands:
  init      Create a config with an example entry
  sync      Install or update entries (alias: pull)
  validate  Check the config and its sources
  status    Show installed entries from the lock file

Sync options:
  --only <id>   Only sync the given entry (repeatable)
  -y, --yes     Overwrite conflicting content without asking
  --dry-run     Preview changes without writing files
  --strict      Fail on missing skill markers

Global options:
  --config <path>
  --check-remote (status only)
  --json
  --silent
  --verbose
`;

const printHelp = () => {
	process.stdout.write(HELP_TEXT.trimStart());
};

const printError = (message: string) => {
	process.stderr.write(`${symbols.error} ${message}\n`);
};

const printJson = (value: unknown) => {
	process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
};

const runCommand = async (parsed: CliCommand) => {
	const { options } = parsed;
	switch (parsed.command) {
		case "init": {
			const { initConfig } = await import("#commands/init");
			const result = await initConfig({ configPath: options.config });
			if (options.json) {
				printJson(result);
				return;
			}
			ui.line(
				`${symbols.success} Wrote ${pc.gray(ui.path(result.configPath))}`,
			);
			for (const entry of result.gitignoreAdded) {
				ui.line(
					`${symbols.info} Added ${entry} to ${pc.gray(ui.path(result.gitignorePath))}`,
				);
			}
			return;
		}
		case "sync": {
			const { printSyncSummary, runSync } = await import("#commands/sync");
			const report = await runSync({
				configPath: options.config,
				only: options.only,
				yes: options.yes,
				dryRun: options.dryRun,
				strict: options.strict,
			});
			if (options.json) {
				printJson(report);
			} else {
				printSyncSummary(report);
			}
			return;
		}
		case "validate": {
			const { printValidation, validateProject } = await import(
				"#commands/validate"
			);
			const report = await validateProject({
				configPath: options.config,
				strict: options.strict,
			});
			if (options.json) {
				printJson(report);
			} else {
				printValidation(report);
			}
			return;
		}
		case "status": {
			const { getStatus, printStatus } = await import("#commands/status");
			const status = await getStatus({
				configPath: options.config,
				checkRemote: options.checkRemote,
			});
			if (options.json) {
				printJson(status);
			} else {
				printStatus(status);
			}
			return;
		}
		case null:
			printHelp();
			process.exit(ExitCode.InvalidArgument);
	}
};

/**
 * The main entry point of the CLI
 */
export async function main(): Promise<void> {
	try {
		process.on("uncaughtException", errorHandler);
		process.on("unhandledRejection", errorHandler);

		const parsed = parseArgs();

		// JSON output owns stdout
		setSilentMode(parsed.options.silent || parsed.options.json);
		setVerboseMode(parsed.options.verbose);

		if (parsed.help) {
			process.exit(ExitCode.Success);
		}

		if (parsed.positionals.length > 0) {
			printError(`${CLI_NAME}: unexpected arguments.`);
			printHelp();
			process.exit(ExitCode.InvalidArgument);
		}

		await runCommand(parsed.parsed);
	} catch (error) {
		errorHandler(error);
	}
}

function errorHandler(error: unknown): void {
	printError(errorMessage(error));
	if (isSyncError(error) && error.cause !== undefined) {
		ui.debug(`Caused by: ${errorMessage(error.cause)}`);
	}
	process.exit(ExitCode.FatalError);
}
