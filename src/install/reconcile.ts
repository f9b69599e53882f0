import { lstat, readlink } from "node:fs/promises";
import path from "node:path";
import {
	confirm as clackConfirm,
	isCancel as clackIsCancel,
} from "@clack/prompts";
import { symbols, ui } from "#cli/ui";
import { createBackup, hasConflict } from "#core/backup";
import { type Entry, resolveDestination, strategyFor } from "#core/entry";
import { SyncError } from "#core/errors";
import { fingerprintPath } from "#core/fingerprint";
import type { LockStore, LockedEntry } from "#core/lock";
import { exists } from "#core/paths";
import { validateSkillsRoot } from "#install/skills";
import {
	type TargetMode,
	installDirectory,
	installFile,
	installSkillsRoot,
} from "#install/targets";
import {
	type ResolvedSource,
	withResolvedSource,
} from "#sources/resolved-source";

export type InstallOptions = {
	baseDir: string;
	dryRun: boolean;
	yes: boolean;
	strict: boolean;
};

export type InstallDeps = {
	confirm?: (message: string) => Promise<boolean>;
	isInteractive?: () => boolean;
	now?: () => Date;
};

export type InstallStatus = "installed" | "unchanged" | "planned" | "cancelled";

export type InstallResult = {
	id: string;
	status: InstallStatus;
	installed: boolean;
	skippedNoChange: boolean;
	backedUp: boolean;
	backupPath?: string;
	dest?: string;
	lockedEntry?: LockedEntry;
	warnings: string[];
};

const promptConfirm = async (message: string) => {
	const answer = await clackConfirm({ message, initialValue: false });
	if (clackIsCancel(answer)) {
		return false;
	}
	return answer;
};

const resolveDeps = (deps: InstallDeps) => ({
	confirm: deps.confirm ?? promptConfirm,
	isInteractive: deps.isInteractive ?? (() => Boolean(process.stdin.isTTY)),
	now: deps.now ?? (() => new Date()),
});

const result = (
	id: string,
	status: InstallStatus,
	extra: Partial<Omit<InstallResult, "id" | "status">> = {},
): InstallResult => ({
	id,
	status,
	installed: status === "installed",
	skippedNoChange: status === "unchanged",
	backedUp: false,
	warnings: [],
	...extra,
});

const isLinkTo = async (dest: string, sourcePath: string) => {
	try {
		const stats = await lstat(dest);
		if (!stats.isSymbolicLink()) {
			return false;
		}
		const target = path.resolve(path.dirname(dest), await readlink(dest));
		return target === path.resolve(sourcePath);
	} catch {
		return false;
	}
};

/**
 * Content this tool installed and nobody has edited since: a link into the
 * source, or a tree whose fingerprint still matches what the lock recorded.
 */
const isManagedDestination = async (
	dest: string,
	sourcePath: string,
	locked: LockedEntry | undefined,
) => {
	if (await isLinkTo(dest, sourcePath)) {
		return true;
	}
	if (!locked?.installedChecksum || path.resolve(locked.dest) !== dest) {
		return false;
	}
	return (await fingerprintPath(dest)) === locked.installedChecksum;
};

const applyEntry = async (
	entry: Entry,
	resolved: ResolvedSource,
	dest: string,
) => {
	const mode: TargetMode = resolved.useSymlink ? "symlink" : "copy";
	switch (strategyFor(entry.kind)) {
		case "file":
			await installFile({ sourcePath: resolved.path, dest, mode });
			return;
		case "directory":
			await installDirectory({
				sourcePath: resolved.path,
				dest,
				mode,
				include: entry.include,
			});
			return;
		case "skills":
			await installSkillsRoot({
				sourcePath: resolved.path,
				dest,
				include: entry.include,
			});
			return;
	}
};

const reconcile = async (
	entry: Entry,
	resolved: ResolvedSource,
	lock: LockStore,
	options: InstallOptions,
	deps: ReturnType<typeof resolveDeps>,
): Promise<InstallResult> => {
	const sourcePath = resolved.path;
	ui.debug(`Source path: ${sourcePath}`);
	if (!(await exists(sourcePath))) {
		throw new SyncError(
			"source-not-found",
			`Source path not found for entry '${entry.id}': ${sourcePath}`,
			{ path: sourcePath, entryId: entry.id },
		);
	}

	const checksum = await fingerprintPath(sourcePath);
	ui.debug(`Source checksum: ${checksum}`);
	if (lock.checksumMatches(entry.id, checksum)) {
		ui.debug(`Entry ${entry.id} is up to date (checksum match)`);
		return result(entry.id, "unchanged");
	}

	const dest = resolveDestination(entry, options.baseDir);
	const warnings =
		strategyFor(entry.kind) === "skills"
			? await validateSkillsRoot({
					sourceDir: sourcePath,
					entryId: entry.id,
					include: entry.include,
					strict: options.strict,
				})
			: [];
	for (const warning of warnings) {
		ui.warn(warning);
	}

	let backupPath: string | undefined;
	const conflict =
		(await hasConflict(dest)) &&
		!(await isManagedDestination(dest, sourcePath, lock.get(entry.id)));
	if (conflict) {
		ui.debug(`Conflict detected at ${dest}`);
		if (options.dryRun) {
			ui.step("Would back up and overwrite", entry.id, ui.path(dest));
			return result(entry.id, "planned", { dest, warnings });
		}
		let authorized = options.yes;
		if (!authorized) {
			if (!deps.isInteractive()) {
				throw new SyncError(
					"confirmation-required",
					`Refusing to overwrite existing content at ${dest} for entry '${entry.id}' without confirmation. Re-run with --yes.`,
					{ path: dest, entryId: entry.id },
				);
			}
			authorized = await deps.confirm(
				`Overwrite existing content at ${ui.path(dest)}?`,
			);
		}
		if (!authorized) {
			ui.line(`${symbols.warn} Skipped ${entry.id}: overwrite declined`);
			return result(entry.id, "cancelled", { dest, warnings });
		}
		backupPath = await createBackup(options.baseDir, dest, deps.now());
		ui.line(`${symbols.info} Created backup at ${ui.path(backupPath)}`);
	}

	if (options.dryRun) {
		ui.step("Would install", entry.id, ui.path(dest));
		return result(entry.id, "planned", { dest, warnings });
	}

	await applyEntry(entry, resolved, dest);
	ui.line(`${symbols.success} Installed ${entry.id} to ${ui.path(dest)}`);

	const lockedEntry: LockedEntry = {
		source: resolved.display,
		dest,
		checksum,
		installedChecksum: await fingerprintPath(dest),
		...(resolved.git
			? {
					ref: resolved.git.resolvedRef,
					resolvedCommit: resolved.git.resolvedCommit,
				}
			: {}),
		updatedAt: deps.now().toISOString(),
	};
	return result(entry.id, "installed", {
		dest,
		lockedEntry,
		warnings,
		backedUp: backupPath !== undefined,
		backupPath,
	});
};

/**
 * Bring one entry's destination in line with its source. The lock is only
 * read; a successful install reports the `lockedEntry` to record.
 */
export const installEntry = async (
	entry: Entry,
	lock: LockStore,
	options: InstallOptions,
	deps: InstallDeps = {},
): Promise<InstallResult> => {
	ui.debug(`Processing entry: ${entry.id}`);
	return withResolvedSource(entry.source, options.baseDir, (resolved) =>
		reconcile(entry, resolved, lock, options, resolveDeps(deps)),
	);
};

export const validateEntryIds = (entries: readonly Entry[]) => {
	const seen = new Set<string>();
	for (const entry of entries) {
		if (seen.has(entry.id)) {
			throw new SyncError("duplicate-id", `Duplicate entry ID: ${entry.id}`, {
				entryId: entry.id,
			});
		}
		seen.add(entry.id);
	}
};

export const selectEntries = (
	entries: readonly Entry[],
	only: readonly string[] = [],
) => {
	if (only.length === 0) {
		return [...entries];
	}
	const known = new Set(entries.map((entry) => entry.id));
	for (const id of only) {
		if (!known.has(id)) {
			throw new SyncError("entry-not-found", `Entry not found: ${id}`, {
				entryId: id,
			});
		}
	}
	return entries.filter((entry) => only.includes(entry.id));
};

/**
 * Install entries one at a time in manifest order. The first hard error
 * stops the run; results gathered so far are not returned.
 */
export const installAll = async (
	entries: readonly Entry[],
	lock: LockStore,
	options: InstallOptions & { only?: readonly string[] },
	deps: InstallDeps = {},
) => {
	validateEntryIds(entries);
	const selected = selectEntries(entries, options.only);
	const results: InstallResult[] = [];
	for (const entry of selected) {
		results.push(await installEntry(entry, lock, options, deps));
	}
	return results;
};
