import { createHash } from "node:crypto";
import { rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { isSyncError } from "#core/errors";
import {
	fingerprintPath,
	fingerprintString,
	listTrackedFiles,
} from "#core/fingerprint";
import { makeTempDir, writeTree } from "#core/test/fixtures";

const sha256 = (...parts: string[]) => {
	const hash = createHash("sha256");
	for (const part of parts) {
		hash.update(part);
	}
	return `sha256:${hash.digest("hex")}`;
};

describe("fingerprintPath", () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await makeTempDir("skillsync-fp-");
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it("hashes a single file by its bytes", async () => {
		const filePath = path.join(tempDir, "AGENTS.md");
		await writeFile(filePath, "# Agents\n", "utf8");

		expect(await fingerprintPath(filePath)).toBe(sha256("# Agents\n"));
	});

	it("folds relative path, NUL and content for every file in a tree", async () => {
		await writeTree(tempDir, { "sub/b.txt": "B", "a.txt": "A" });

		expect(await fingerprintPath(tempDir)).toBe(
			sha256("a.txt", "\0", "A", "sub/b.txt", "\0", "B"),
		);
	});

	it("matches fingerprintString for a file with the same text", async () => {
		const filePath = path.join(tempDir, "rule.mdc");
		await writeFile(filePath, "Prefer small functions.", "utf8");

		expect(await fingerprintPath(filePath)).toBe(
			fingerprintString("Prefer small functions."),
		);
	});

	it("returns the empty digest for an empty directory", async () => {
		expect(await fingerprintPath(tempDir)).toBe(
			"sha256:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
		);
	});

	it("does not depend on where the tree lives", async () => {
		const left = path.join(tempDir, "left");
		const right = path.join(tempDir, "nested", "right");
		const files = { "rules/one.mdc": "one", "rules/two.mdc": "two" };
		await writeTree(left, files);
		await writeTree(right, files);

		expect(await fingerprintPath(left)).toBe(await fingerprintPath(right));
	});

	it("ignores version-control metadata", async () => {
		await writeTree(tempDir, { "skill/SKILL.md": "skill" });
		const before = await fingerprintPath(tempDir);
		await writeTree(tempDir, { ".git/HEAD": "ref: refs/heads/main\n" });

		expect(await fingerprintPath(tempDir)).toBe(before);
	});

	it("changes when content changes", async () => {
		await writeTree(tempDir, { "a.txt": "v1" });
		const before = await fingerprintPath(tempDir);
		await writeTree(tempDir, { "a.txt": "v2" });

		expect(await fingerprintPath(tempDir)).not.toBe(before);
	});

	it("changes when a tracked file is added or removed", async () => {
		await writeTree(tempDir, { "a.txt": "A" });
		const initial = await fingerprintPath(tempDir);
		await writeTree(tempDir, { "sub/new.txt": "" });
		const added = await fingerprintPath(tempDir);
		await rm(path.join(tempDir, "sub", "new.txt"));

		expect(added).not.toBe(initial);
		expect(added).toBe(sha256("a.txt", "\0", "A", "sub/new.txt", "\0", ""));
		expect(await fingerprintPath(tempDir)).toBe(initial);
	});

	it("changes when a file is renamed with the same content", async () => {
		const left = path.join(tempDir, "left");
		const right = path.join(tempDir, "right");
		await writeTree(left, { "a.txt": "same" });
		await writeTree(right, { "b.txt": "same" });

		expect(await fingerprintPath(left)).not.toBe(await fingerprintPath(right));
	});

	it("raises an io error for a missing path", async () => {
		const error = await fingerprintPath(path.join(tempDir, "missing")).catch(
			(reason: unknown) => reason,
		);

		expect(isSyncError(error, "io")).toBe(true);
	});
});

describe("listTrackedFiles", () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await makeTempDir("skillsync-fp-");
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it("lists dotfiles in code-unit order without .git", async () => {
		await writeTree(tempDir, {
			"b.txt": "b",
			"A.txt": "a",
			".hidden": "h",
			".git/config": "c",
			"dir/.git": "gitdir: elsewhere",
		});

		expect(await listTrackedFiles(tempDir)).toEqual([
			".hidden",
			"A.txt",
			"b.txt",
		]);
	});
});
