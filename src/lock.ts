import { randomBytes } from "node:crypto";
import { readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { SyncError, errorMessage, getErrnoCode, ioError } from "#core/errors";

export interface LockedEntry {
	source: string;
	dest: string;
	checksum: string;
	installedChecksum?: string;
	ref?: string;
	resolvedCommit?: string;
	updatedAt: string;
}

export interface LockData {
	version: 1;
	generatedAt: string;
	entries: Record<string, LockedEntry>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const assertString = (value: unknown, label: string): string => {
	if (typeof value !== "string" || value.length === 0) {
		throw new Error(`${label} must be a non-empty string.`);
	}
	return value;
};

const optionalString = (value: unknown, label: string) =>
	value === undefined ? undefined : assertString(value, label);

const validateEntry = (value: unknown, key: string): LockedEntry => {
	if (!isRecord(value)) {
		throw new Error(`entries.${key} must be an object.`);
	}
	const entry: LockedEntry = {
		source: assertString(value.source, `entries.${key}.source`),
		dest: assertString(value.dest, `entries.${key}.dest`),
		checksum: assertString(value.checksum, `entries.${key}.checksum`),
		updatedAt: assertString(value.updatedAt, `entries.${key}.updatedAt`),
	};
	const installedChecksum = optionalString(
		value.installedChecksum,
		`entries.${key}.installedChecksum`,
	);
	const ref = optionalString(value.ref, `entries.${key}.ref`);
	const resolvedCommit = optionalString(
		value.resolvedCommit,
		`entries.${key}.resolvedCommit`,
	);
	return {
		...entry,
		...(installedChecksum ? { installedChecksum } : {}),
		...(ref ? { ref } : {}),
		...(resolvedCommit ? { resolvedCommit } : {}),
	};
};

export const validateLock = (input: unknown): LockData => {
	if (!isRecord(input)) {
		throw new Error("Lock file must be a JSON object.");
	}
	if (input.version !== 1) {
		throw new Error("Lock file version must be 1.");
	}
	const generatedAt = assertString(input.generatedAt, "generatedAt");
	if (!isRecord(input.entries)) {
		throw new Error("entries must be an object.");
	}
	const entries: Record<string, LockedEntry> = {};
	for (const [key, value] of Object.entries(input.entries)) {
		entries[key] = validateEntry(value, key);
	}
	return { version: 1, generatedAt, entries };
};

/**
 * In-memory view of the lockfile. Mutations stay in memory until `save`,
 * which the caller invokes once per run.
 *
 * Entries are written in insertion order, except that ids which are
 * canonical non-negative integers ("2", "10") come first in ascending
 * numeric order. That is how JSON objects order such keys.
 */
export class LockStore {
	private readonly data: Map<string, LockedEntry>;

	constructor(entries: Record<string, LockedEntry> = {}) {
		this.data = new Map(Object.entries(entries));
	}

	static empty() {
		return new LockStore();
	}

	static async load(lockPath: string) {
		let raw: string;
		try {
			raw = await readFile(lockPath, "utf8");
		} catch (error) {
			if (getErrnoCode(error) === "ENOENT") {
				throw new SyncError(
					"lock-not-found",
					`No lock file found at ${lockPath}. Run sync first.`,
					{ path: lockPath, cause: error },
				);
			}
			throw ioError(error, `Failed to read lock file at ${lockPath}`, lockPath);
		}
		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (error) {
			throw new SyncError(
				"malformed-lock",
				`Invalid JSON in ${lockPath}: ${errorMessage(error)}`,
				{ path: lockPath, cause: error },
			);
		}
		try {
			return new LockStore(validateLock(parsed).entries);
		} catch (error) {
			throw new SyncError(
				"malformed-lock",
				`Invalid lock file at ${lockPath}: ${errorMessage(error)}`,
				{ path: lockPath, cause: error },
			);
		}
	}

	static async loadOrEmpty(lockPath: string) {
		try {
			return await LockStore.load(lockPath);
		} catch (error) {
			if (error instanceof SyncError && error.code === "lock-not-found") {
				return LockStore.empty();
			}
			throw error;
		}
	}

	get size() {
		return this.data.size;
	}

	get(id: string) {
		return this.data.get(id);
	}

	checksumMatches(id: string, checksum: string) {
		return this.data.get(id)?.checksum === checksum;
	}

	upsert(id: string, entry: LockedEntry) {
		this.data.set(id, entry);
	}

	entries() {
		return Array.from(this.data.entries());
	}

	toJSON(generatedAt = new Date().toISOString()): LockData {
		return {
			version: 1,
			generatedAt,
			entries: Object.fromEntries(this.data),
		};
	}

	async save(lockPath: string) {
		const data = `${JSON.stringify(this.toJSON(), null, 2)}\n`;
		const tempPath = path.join(
			path.dirname(lockPath),
			`.${path.basename(lockPath)}.tmp-${randomBytes(6).toString("hex")}`,
		);
		try {
			await writeFile(tempPath, data, "utf8");
			await rename(tempPath, lockPath);
		} catch (error) {
			await rm(tempPath, { force: true });
			throw ioError(error, `Failed to write lock file at ${lockPath}`, lockPath);
		}
	}
}
