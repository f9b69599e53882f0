import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { isSyncError } from "#core/errors";
import { type LockedEntry, LockStore, validateLock } from "#core/lock";

const entry: LockedEntry = {
	source: "filesystem:../shared",
	dest: "/work/project/AGENTS.md",
	checksum: "sha256:abc",
	installedChecksum: "sha256:abc",
	updatedAt: "2024-05-01T10:00:00.000Z",
};

describe("LockStore", () => {
	let tempDir: string;
	let lockPath: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(path.join(tmpdir(), "skillsync-lock-"));
		lockPath = path.join(tempDir, "skillsync.lock");
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it("round-trips entries through save and load", async () => {
		const lock = LockStore.empty();
		lock.upsert("agents", entry);
		lock.upsert("rules", {
			source: "https://example.com/rules.git",
			dest: "/work/project/.cursor/rules",
			checksum: "sha256:def",
			ref: "main",
			resolvedCommit: "0123456789abcdef0123456789abcdef01234567",
			updatedAt: "2024-05-01T10:00:00.000Z",
		});
		await lock.save(lockPath);

		const loaded = await LockStore.load(lockPath);
		expect(loaded.size).toBe(2);
		expect(loaded.get("agents")).toEqual(entry);
		expect(loaded.get("rules")?.resolvedCommit).toBe(
			"0123456789abcdef0123456789abcdef01234567",
		);
	});

	it("writes version 1 JSON and leaves no temp files behind", async () => {
		const lock = LockStore.empty();
		lock.upsert("agents", entry);
		await lock.save(lockPath);

		const parsed: unknown = JSON.parse(await readFile(lockPath, "utf8"));
		expect(parsed).toMatchObject({ version: 1, entries: { agents: entry } });
		expect(await readdir(tempDir)).toEqual(["skillsync.lock"]);
	});

	it("keeps insertion order, with integer-like ids first", async () => {
		const lock = LockStore.empty();
		for (const id of ["rules", "10", "agents", "2"]) {
			lock.upsert(id, entry);
		}
		await lock.save(lockPath);

		const written = JSON.parse(await readFile(lockPath, "utf8"));
		expect(Object.keys(written.entries)).toEqual(["2", "10", "rules", "agents"]);
		const loaded = await LockStore.load(lockPath);
		expect(loaded.entries().map(([id]) => id)).toEqual([
			"2",
			"10",
			"rules",
			"agents",
		]);
	});

	it("replaces an entry on upsert", () => {
		const lock = LockStore.empty();
		lock.upsert("agents", entry);
		lock.upsert("agents", { ...entry, checksum: "sha256:new" });

		expect(lock.size).toBe(1);
		expect(lock.checksumMatches("agents", "sha256:new")).toBe(true);
		expect(lock.checksumMatches("agents", "sha256:abc")).toBe(false);
		expect(lock.checksumMatches("other", "sha256:new")).toBe(false);
	});

	it("raises lock-not-found for a missing file", async () => {
		const error = await LockStore.load(lockPath).catch(
			(reason: unknown) => reason,
		);

		expect(isSyncError(error, "lock-not-found")).toBe(true);
	});

	it("treats a missing file as empty in loadOrEmpty", async () => {
		const lock = await LockStore.loadOrEmpty(lockPath);

		expect(lock.size).toBe(0);
	});

	it("raises malformed-lock for invalid JSON", async () => {
		await writeFile(lockPath, "{ not json", "utf8");

		const error = await LockStore.loadOrEmpty(lockPath).catch(
			(reason: unknown) => reason,
		);
		expect(isSyncError(error, "malformed-lock")).toBe(true);
	});

	it("raises malformed-lock for a wrong shape", async () => {
		await writeFile(
			lockPath,
			JSON.stringify({ version: 2, generatedAt: "x", entries: {} }),
			"utf8",
		);

		await expect(LockStore.load(lockPath)).rejects.toThrow(
			`Invalid lock file at ${lockPath}: Lock file version must be 1.`,
		);
	});
});

describe("validateLock", () => {
	it("names the offending field", () => {
		expect(() =>
			validateLock({
				version: 1,
				generatedAt: "2024-05-01T10:00:00.000Z",
				entries: { agents: { ...entry, dest: "" } },
			}),
		).toThrow("entries.agents.dest must be a non-empty string.");
	});

	it("drops absent optional fields", () => {
		const { installedChecksum: _installed, ...minimal } = entry;
		const lock = validateLock({
			version: 1,
			generatedAt: "2024-05-01T10:00:00.000Z",
			entries: { agents: minimal },
		});

		expect(lock.entries.agents).toEqual(minimal);
	});
});
