import pc from "picocolors";
import { symbols, ui } from "#cli/ui";
import { loadConfig } from "#config";
import { type LockedEntry, LockStore } from "#core/lock";
import { resolveLockPath } from "#core/paths";
import type { SourceRegistry } from "#sources/registry";

type StatusOptions = {
	configPath?: string;
	cwd?: string;
	checkRemote: boolean;
	registry?: SourceRegistry;
};

export type RemoteState = "up-to-date" | "changed" | "unknown";

export type EntryStatus = {
	id: string;
	locked: LockedEntry;
	configured: boolean;
	remote?: RemoteState;
};

const toRemoteState = (changed: boolean | null): RemoteState => {
	if (changed === null) {
		return "unknown";
	}
	return changed ? "changed" : "up-to-date";
};

export const getStatus = async (options: StatusOptions) => {
	const { resolvedPath, baseDir, entries } = await loadConfig(
		options.configPath,
		{ registry: options.registry, cwd: options.cwd },
	);
	const lockPath = resolveLockPath(baseDir);
	const lock = await LockStore.load(lockPath);
	const configured = new Map(entries.map((entry) => [entry.id, entry]));

	const statuses: EntryStatus[] = [];
	for (const [id, locked] of lock.entries()) {
		const entry = configured.get(id);
		const status: EntryStatus = { id, locked, configured: Boolean(entry) };
		if (options.checkRemote && entry) {
			status.remote = entry.source.hasRemoteChanged
				? toRemoteState(await entry.source.hasRemoteChanged(locked))
				: "unknown";
		}
		statuses.push(status);
	}

	return {
		configPath: resolvedPath,
		lockPath,
		entries: statuses,
		notInstalled: entries
			.filter((entry) => !lock.get(entry.id))
			.map((entry) => entry.id),
	};
};

const REMOTE_LABELS: Record<RemoteState, string> = {
	"up-to-date": pc.green("up-to-date"),
	changed: pc.yellow("upstream changed"),
	unknown: pc.dim("unknown"),
};

export const printStatus = (status: Awaited<ReturnType<typeof getStatus>>) => {
	ui.header("Lock", ui.path(status.lockPath));
	if (status.entries.length === 0) {
		ui.line(`${symbols.info} No entries installed.`);
	}
	for (const entry of status.entries) {
		const icon = entry.remote === "changed" ? symbols.warn : symbols.success;
		ui.item(icon, entry.id, entry.configured ? undefined : "not in config");
		ui.line(`    source:   ${entry.locked.source}`);
		ui.line(`    dest:     ${ui.path(entry.locked.dest)}`);
		ui.line(`    checksum: ${pc.gray(ui.hash(entry.locked.checksum))}`);
		if (entry.locked.resolvedCommit) {
			ui.line(
				`    commit:   ${pc.gray(entry.locked.resolvedCommit.slice(0, 7))}${entry.locked.ref ? ` ${pc.dim(`(${entry.locked.ref})`)}` : ""}`,
			);
		}
		ui.line(`    updated:  ${entry.locked.updatedAt}`);
		if (entry.remote) {
			ui.line(`    remote:   ${REMOTE_LABELS[entry.remote]}`);
		}
	}
	for (const id of status.notInstalled) {
		ui.item(symbols.warn, id, "not installed");
	}
};
