import { createHash } from "node:crypto";
import type { Stats } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { ioError } from "#core/errors";
import { toPosixPath } from "#core/paths";

export const FINGERPRINT_ALGORITHM = "sha256";

// Version-control metadata differs between clones of the same content.
const IGNORED_PATTERNS = ["**/.git", "**/.git/**"];
const PATH_SEPARATOR = Buffer.from([0]);

const format = (digest: string) => `${FINGERPRINT_ALGORITHM}:${digest}`;

const compareCodeUnits = (left: string, right: string) =>
	left < right ? -1 : left > right ? 1 : 0;

const readBytes = async (filePath: string) => {
	try {
		return await readFile(filePath);
	} catch (error) {
		throw ioError(error, `Failed to read ${filePath} for fingerprint`, filePath);
	}
};

export const listTrackedFiles = async (rootDir: string) => {
	let files: string[];
	try {
		files = await fg("**/*", {
			cwd: rootDir,
			ignore: IGNORED_PATTERNS,
			dot: true,
			onlyFiles: true,
			followSymbolicLinks: true,
			suppressErrors: false,
		});
	} catch (error) {
		throw ioError(error, `Failed to list files in ${rootDir}`, rootDir);
	}
	return files.map(toPosixPath).sort(compareCodeUnits);
};

/**
 * Content fingerprint of a file or a directory tree, as `sha256:<hex>`.
 *
 * Directories fold `relative path, NUL, bytes` for every tracked file in
 * sorted order, so the result is independent of traversal order and of where
 * the tree lives on disk.
 */
export const fingerprintPath = async (target: string) => {
	let stats: Stats;
	try {
		stats = await stat(target);
	} catch (error) {
		throw ioError(error, `Failed to fingerprint ${target}`, target);
	}
	const hash = createHash(FINGERPRINT_ALGORITHM);
	if (stats.isFile()) {
		hash.update(await readBytes(target));
		return format(hash.digest("hex"));
	}
	if (stats.isDirectory()) {
		for (const relativePath of await listTrackedFiles(target)) {
			hash.update(Buffer.from(relativePath, "utf8"));
			hash.update(PATH_SEPARATOR);
			hash.update(await readBytes(path.join(target, relativePath)));
		}
	}
	return format(hash.digest("hex"));
};

export const fingerprintString = (content: string) =>
	format(
		createHash(FINGERPRINT_ALGORITHM).update(content, "utf8").digest("hex"),
	);
