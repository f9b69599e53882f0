import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { ioError } from "#core/errors";
import {
	BACKUP_DIR,
	DEFAULT_LOCK_FILENAME,
	exists,
	toPosixPath,
} from "#core/paths";

export const GITIGNORE_HEADER = "# skillsync";
export const GITIGNORE_ENTRIES = [DEFAULT_LOCK_FILENAME, `${BACKUP_DIR}/`];

const normalizeEntry = (value: string) => {
	const trimmed = value.trim();
	if (!trimmed || trimmed.startsWith("#") || trimmed.startsWith("!")) {
		return "";
	}
	let normalized = trimmed.replace(/^\//, "");
	normalized = normalized.replace(/^\.\//, "");
	normalized = normalized.replace(/\/+$/, "");
	return toPosixPath(normalized);
};

const readGitignore = async (gitignorePath: string) => {
	if (!(await exists(gitignorePath))) {
		return "";
	}
	try {
		return await readFile(gitignorePath, "utf8");
	} catch (error) {
		throw ioError(error, "Failed to read .gitignore", gitignorePath);
	}
};

/**
 * Entries from `wanted` that `.gitignore` in `rootDir` does not cover yet.
 * A leading slash or trailing slash on either side does not matter.
 */
export const getMissingGitignoreEntries = async (
	rootDir: string,
	wanted: readonly string[] = GITIGNORE_ENTRIES,
) => {
	const gitignorePath = path.resolve(rootDir, ".gitignore");
	const contents = await readGitignore(gitignorePath);
	const existing = new Set(
		contents
			.split(/\r?\n/)
			.map((line) => normalizeEntry(line))
			.filter(Boolean),
	);
	return {
		gitignorePath,
		contents,
		missing: wanted.filter((entry) => !existing.has(normalizeEntry(entry))),
	};
};

export const ensureGitignoreEntries = async (
	rootDir: string,
	wanted: readonly string[] = GITIGNORE_ENTRIES,
) => {
	const { gitignorePath, contents, missing } =
		await getMissingGitignoreEntries(rootDir, wanted);
	if (missing.length === 0) {
		return { updated: false, gitignorePath, added: [] };
	}
	const prefix =
		contents.length === 0 ? "" : contents.endsWith("\n") ? "\n" : "\n\n";
	const next = `${contents}${prefix}${GITIGNORE_HEADER}\n${missing.join("\n")}\n`;
	try {
		await writeFile(gitignorePath, next, "utf8");
	} catch (error) {
		throw ioError(error, "Failed to write .gitignore", gitignorePath);
	}
	return { updated: true, gitignorePath, added: missing };
};
