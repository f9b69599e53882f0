export type CliOptions = {
	config?: string;
	only: string[];
	yes: boolean;
	dryRun: boolean;
	strict: boolean;
	checkRemote: boolean;
	json: boolean;
	silent: boolean;
	verbose: boolean;
};

export type CliCommand =
	| { command: "init"; options: CliOptions }
	| { command: "sync"; options: CliOptions }
	| { command: "validate"; options: CliOptions }
	| { command: "status"; options: CliOptions }
	| { command: null; options: CliOptions };
