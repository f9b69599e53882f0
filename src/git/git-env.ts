const resolveGitCommand = (): string => {
	// Allow tests and unusual installs to point at another git binary
	const override = process.env.SKILLSYNC_GIT_COMMAND;
	if (override) {
		return override;
	}
	return "git";
};

const buildGitEnv = (): NodeJS.ProcessEnv => {
	const pathValue = process.env.PATH ?? process.env.Path;
	const pathExtValue =
		process.env.PATHEXT ??
		(process.platform === "win32" ? ".COM;.EXE;.BAT;.CMD" : undefined);
	return {
		...process.env,
		...(pathValue ? { PATH: pathValue, Path: pathValue } : {}),
		...(pathExtValue ? { PATHEXT: pathExtValue } : {}),
		GIT_TERMINAL_PROMPT: "0",
		GIT_CONFIG_NOSYSTEM: "1",
		GIT_CONFIG_NOGLOBAL: "1",
		...(process.platform === "win32" ? {} : { GIT_ASKPASS: "/bin/false" }),
	};
};

const buildGitConfigs = () => [
	"-c",
	"core.hooksPath=/dev/null",
	"-c",
	"submodule.recurse=false",
	"-c",
	"protocol.ext.allow=never",
];

export { buildGitConfigs, buildGitEnv, resolveGitCommand };
