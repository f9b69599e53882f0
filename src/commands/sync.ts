import pc from "picocolors";
import { symbols, ui } from "#cli/ui";
import { loadConfig } from "#config";
import { LockStore } from "#core/lock";
import { resolveLockPath } from "#core/paths";
import {
	type InstallDeps,
	type InstallResult,
	installAll,
} from "#install/reconcile";
import type { SourceRegistry } from "#sources/registry";

export type SyncOptions = {
	configPath?: string;
	cwd?: string;
	only?: string[];
	yes: boolean;
	dryRun: boolean;
	strict: boolean;
	registry?: SourceRegistry;
	deps?: InstallDeps;
};

export type SyncSummary = {
	installed: number;
	unchanged: number;
	planned: number;
	cancelled: number;
	warnings: number;
};

export const summarize = (results: readonly InstallResult[]): SyncSummary => ({
	installed: results.filter((result) => result.status === "installed").length,
	unchanged: results.filter((result) => result.status === "unchanged").length,
	planned: results.filter((result) => result.status === "planned").length,
	cancelled: results.filter((result) => result.status === "cancelled").length,
	warnings: results.reduce((total, result) => total + result.warnings.length, 0),
});

export const runSync = async (options: SyncOptions) => {
	const { resolvedPath, baseDir, entries } = await loadConfig(
		options.configPath,
		{ registry: options.registry, cwd: options.cwd },
	);
	ui.header("Config", ui.path(resolvedPath));
	const only = options.only ?? [];
	if (only.length > 0) {
		ui.debug(`Filtering to ${only.length} of ${entries.length} entries`);
	}

	const lockPath = resolveLockPath(baseDir);
	const lock = await LockStore.loadOrEmpty(lockPath);
	ui.debug(
		lock.size > 0
			? `Loaded ${lock.size} locked entries from ${lockPath}`
			: "No existing lock entries",
	);

	const results = await installAll(
		entries,
		lock,
		{
			baseDir,
			dryRun: options.dryRun,
			yes: options.yes,
			strict: options.strict,
			only,
		},
		options.deps,
	);

	if (!options.dryRun) {
		for (const result of results) {
			if (result.lockedEntry) {
				lock.upsert(result.id, result.lockedEntry);
			}
		}
		await lock.save(lockPath);
		ui.debug(`Wrote ${lockPath}`);
	}

	return {
		configPath: resolvedPath,
		lockPath,
		dryRun: options.dryRun,
		results,
		summary: summarize(results),
	};
};

export const printSyncSummary = (
	report: Awaited<ReturnType<typeof runSync>>,
) => {
	const { summary } = report;
	ui.line();
	if (report.dryRun) {
		ui.line(
			`${symbols.info} [dry-run] Would install ${summary.planned} entries, ${summary.unchanged} already up to date`,
		);
	} else {
		ui.line(
			`${symbols.success} Installed ${summary.installed} entries, ${summary.unchanged} already up to date`,
		);
	}
	for (const result of report.results) {
		if (result.status === "cancelled") {
			ui.item(symbols.warn, result.id, "cancelled");
		} else if (result.backupPath) {
			ui.item(
				symbols.info,
				result.id,
				`backup ${pc.dim("->")} ${ui.path(result.backupPath)}`,
			);
		}
	}
	if (summary.warnings > 0) {
		ui.line(`${symbols.warn} ${summary.warnings} warning(s) generated`);
	}
};
