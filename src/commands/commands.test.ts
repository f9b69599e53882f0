import { readFile, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import {
	afterEach,
	beforeAll,
	beforeEach,
	describe,
	expect,
	it,
	vi,
} from "vitest";
import { setSilentMode } from "#cli/ui";
import { initConfig } from "#commands/init";
import { getStatus } from "#commands/status";
import { runSync, summarize } from "#commands/sync";
import { validateProject } from "#commands/validate";
import { isSyncError } from "#core/errors";
import { LockStore } from "#core/lock";
import { exists } from "#core/paths";
import { createSourceRegistry } from "#sources/registry";
import { createFakeGit, makeTempDir, writeTree } from "#core/test/fixtures";

const COMMIT = "0123456789abcdef0123456789abcdef01234567";
const NEWER = "fedcba9876543210fedcba9876543210fedcba98";

const sharedEntries = [
	{
		id: "agents",
		kind: "agents_md",
		source: { type: "filesystem", root: "../shared", path: "AGENTS.md" },
	},
	{
		id: "skills",
		kind: "cursor_skills_root",
		source: { type: "filesystem", root: "../shared", path: "skills" },
	},
];

describe("commands", () => {
	let tempDir: string;
	let projectDir: string;
	let configPath: string;

	const writeConfigFile = (entries: unknown[]) =>
		writeFile(configPath, JSON.stringify({ entries }), "utf8");

	beforeAll(() => {
		setSilentMode(true);
	});

	beforeEach(async () => {
		tempDir = await makeTempDir();
		projectDir = path.join(tempDir, "project");
		configPath = path.join(projectDir, "skillsync.config.json");
		await writeTree(path.join(tempDir, "shared"), {
			"AGENTS.md": "# Agents",
			"skills/review/SKILL.md": "review",
			"skills/draft/notes.md": "draft",
		});
		await writeTree(projectDir, {});
		await writeConfigFile(sharedEntries);
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await rm(tempDir, { recursive: true, force: true });
	});

	describe("runSync", () => {
		const syncOptions = { yes: false, dryRun: false, strict: false };

		it("installs every entry and saves the lock once", async () => {
			const save = vi.spyOn(LockStore.prototype, "save");

			const report = await runSync({ ...syncOptions, configPath });

			expect(save).toHaveBeenCalledTimes(1);
			expect(report.summary).toEqual({
				installed: 2,
				unchanged: 0,
				planned: 0,
				cancelled: 0,
				warnings: 1,
			});
			const lock = await LockStore.load(
				path.join(projectDir, "skillsync.lock"),
			);
			expect(lock.entries().map(([id]) => id)).toEqual(["agents", "skills"]);
			expect(
				await readFile(
					path.join(projectDir, ".cursor", "skills", "review", "SKILL.md"),
					"utf8",
				),
			).toBe("review");
		});

		it("is idempotent", async () => {
			await runSync({ ...syncOptions, configPath });
			const agentsPath = path.join(projectDir, "AGENTS.md");
			const before = await stat(agentsPath);

			const second = await runSync({ ...syncOptions, configPath });

			expect(second.summary.unchanged).toBe(2);
			expect(second.summary.installed).toBe(0);
			const after = await stat(agentsPath);
			expect(after.ino).toBe(before.ino);
			expect(after.mtimeMs).toBe(before.mtimeMs);
		});

		it("syncs only the selected entries", async () => {
			const report = await runSync({
				...syncOptions,
				configPath,
				only: ["agents"],
			});

			expect(report.results.map((result) => result.id)).toEqual(["agents"]);
			expect(await exists(path.join(projectDir, ".cursor"))).toBe(false);
		});

		it("writes neither files nor the lock in dry-run", async () => {
			const report = await runSync({
				...syncOptions,
				configPath,
				dryRun: true,
			});

			expect(report.summary.planned).toBe(2);
			expect(await exists(path.join(projectDir, "skillsync.lock"))).toBe(false);
			expect(await exists(path.join(projectDir, "AGENTS.md"))).toBe(false);
		});

		it("keeps the previous lock when an entry fails", async () => {
			await runSync({ ...syncOptions, configPath, only: ["agents"] });
			const lockPath = path.join(projectDir, "skillsync.lock");
			const before = await readFile(lockPath, "utf8");

			const error = await runSync({
				...syncOptions,
				configPath,
				strict: true,
			}).catch((reason: unknown) => reason);

			expect(isSyncError(error, "skill-marker-missing")).toBe(true);
			expect(await readFile(lockPath, "utf8")).toBe(before);
		});
	});

	describe("getStatus", () => {
		it("requires a lock file", async () => {
			const error = await getStatus({ configPath, checkRemote: false }).catch(
				(reason: unknown) => reason,
			);

			expect(isSyncError(error, "lock-not-found")).toBe(true);
		});

		it("lists locked and missing entries", async () => {
			await runSync({
				configPath,
				only: ["agents"],
				yes: false,
				dryRun: false,
				strict: false,
			});

			const status = await getStatus({ configPath, checkRemote: false });

			expect(status.entries.map((entry) => entry.id)).toEqual(["agents"]);
			expect(status.entries[0]?.locked.dest).toBe(
				path.join(projectDir, "AGENTS.md"),
			);
			expect(status.entries[0]?.remote).toBeUndefined();
			expect(status.notInstalled).toEqual(["skills"]);
		});

		it("asks git sources about upstream changes", async () => {
			const { git } = createFakeGit({
				files: { "AGENTS.md": "remote" },
				commit: COMMIT,
				remoteCommit: NEWER,
			});
			const registry = createSourceRegistry({ git: { git } });
			await writeConfigFile([
				sharedEntries[0],
				{
					id: "remote",
					kind: "agents_md",
					source: {
						type: "git",
						repo: "https://example.com/a.git",
						path: "AGENTS.md",
					},
					dest: "REMOTE.md",
				},
			]);
			await runSync({
				configPath,
				registry,
				yes: false,
				dryRun: false,
				strict: false,
			});

			const status = await getStatus({
				configPath,
				checkRemote: true,
				registry,
			});

			expect(
				status.entries.map((entry) => [entry.id, entry.remote]),
			).toEqual([
				["agents", "unknown"],
				["remote", "changed"],
			]);
			expect(status.entries[1]?.locked.resolvedCommit).toBe(COMMIT);
		});
	});

	describe("validateProject", () => {
		it("collects warnings in non-strict mode", async () => {
			await writeConfigFile([
				...sharedEntries,
				{
					id: "missing",
					kind: "cursor_rules",
					source: { type: "filesystem", root: "../nowhere" },
				},
			]);

			const report = await validateProject({ configPath, strict: false });

			expect(report.warnings).toBe(2);
			expect(report.results.map((result) => [result.id, result.ok])).toEqual([
				["agents", true],
				["skills", false],
				["missing", false],
			]);
			expect(report.results[2]?.warnings).toEqual([
				`Source path not found: ${path.join(tempDir, "nowhere")}`,
			]);
		});

		it("fails on the first problem in strict mode", async () => {
			const error = await validateProject({ configPath, strict: true }).catch(
				(reason: unknown) => reason,
			);

			expect(isSyncError(error, "skill-marker-missing")).toBe(true);
		});

		it("reports an unreachable git source as a warning", async () => {
			const registry = createSourceRegistry({
				git: {
					git: async () => {
						throw new Error("could not resolve host");
					},
				},
			});
			await writeConfigFile([
				{
					id: "remote",
					kind: "agents_md",
					source: { type: "git", repo: "https://example.com/a.git" },
				},
			]);

			const report = await validateProject({
				configPath,
				strict: false,
				registry,
			});

			expect(report.results[0]?.ok).toBe(false);
			expect(report.results[0]?.warnings[0]).toMatch(
				/^Source could not be resolved: Unable to clone https:\/\/example\.com\/a\.git/,
			);
		});
	});

	describe("initConfig", () => {
		it("writes the default config and ignores generated files", async () => {
			const cwd = path.join(tempDir, "fresh");
			await writeTree(cwd, { ".gitignore": "node_modules" });

			const result = await initConfig({ cwd });

			expect(result.configPath).toBe(path.join(cwd, "skillsync.config.json"));
			expect(result.gitignoreAdded).toEqual([
				"skillsync.lock",
				".skillsync-backups/",
			]);
			expect(await readFile(path.join(cwd, ".gitignore"), "utf8")).toBe(
				"node_modules\n\n# skillsync\nskillsync.lock\n.skillsync-backups/\n",
			);
			const written: unknown = JSON.parse(
				await readFile(result.configPath, "utf8"),
			);
			expect(written).toMatchObject({
				entries: [{ id: "my-agents", kind: "agents_md" }],
			});
		});

		it("refuses to overwrite an existing config", async () => {
			const error = await initConfig({ cwd: projectDir }).catch(
				(reason: unknown) => reason,
			);

			expect(isSyncError(error, "config-exists")).toBe(true);
		});

		it("only adds missing ignore entries", async () => {
			const cwd = path.join(tempDir, "fresh");
			await writeTree(cwd, { ".gitignore": "/skillsync.lock\n" });

			const result = await initConfig({ cwd });

			expect(result.gitignoreAdded).toEqual([".skillsync-backups/"]);
			expect(await readFile(path.join(cwd, ".gitignore"), "utf8")).toBe(
				"/skillsync.lock\n\n# skillsync\n.skillsync-backups/\n",
			);
		});
	});

	it("summarizes result counts", () => {
		expect(
			summarize([
				{
					id: "a",
					status: "cancelled",
					installed: false,
					skippedNoChange: false,
					backedUp: false,
					warnings: ["w"],
				},
			]),
		).toEqual({
			installed: 0,
			unchanged: 0,
			planned: 0,
			cancelled: 1,
			warnings: 1,
		});
	});
});
