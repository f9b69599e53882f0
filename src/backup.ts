import { copyFile, cp, mkdir, readdir, stat } from "node:fs/promises";
import path from "node:path";
import { getErrnoCode, ioError } from "#core/errors";
import { exists, resolveBackupRoot } from "#core/paths";

const statOrNull = async (target: string) => {
	try {
		return await stat(target);
	} catch (error) {
		const code = getErrnoCode(error);
		if (code === "ENOENT" || code === "ENOTDIR") {
			return null;
		}
		throw ioError(error, `Failed to inspect ${target}`, target);
	}
};

/**
 * True when `dest` holds content an install would destroy. An empty
 * directory is left over from an interrupted install and does not count.
 */
export const hasConflict = async (dest: string) => {
	const stats = await statOrNull(dest);
	if (!stats) {
		return false;
	}
	if (stats.isFile()) {
		return true;
	}
	if (stats.isDirectory()) {
		try {
			return (await readdir(dest)).length > 0;
		} catch (error) {
			throw ioError(error, `Failed to read directory ${dest}`, dest);
		}
	}
	return false;
};

const pad = (value: number) => String(value).padStart(2, "0");

export const formatBackupTimestamp = (date: Date) =>
	`${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}-${pad(date.getHours())}${pad(date.getMinutes())}`;

export const flattenBackupName = (baseDir: string, dest: string) => {
	const relative = path.relative(baseDir, dest);
	const inside =
		relative.length > 0 &&
		!relative.startsWith("..") &&
		!path.isAbsolute(relative);
	return (inside ? relative : dest)
		.replace(/[/\\:]/g, "-")
		.replace(/^-+/, "");
};

const nextFreePath = async (candidate: string) => {
	if (!(await exists(candidate))) {
		return candidate;
	}
	for (let suffix = 1; ; suffix += 1) {
		const next = `${candidate}-${suffix}`;
		if (!(await exists(next))) {
			return next;
		}
	}
};

/**
 * Copy the current content of `dest` into the backup area and return where
 * it went. The original stays in place.
 */
export const createBackup = async (
	baseDir: string,
	dest: string,
	now: Date = new Date(),
) => {
	const backupRoot = resolveBackupRoot(baseDir);
	try {
		await mkdir(backupRoot, { recursive: true });
	} catch (error) {
		throw ioError(
			error,
			`Failed to create backup directory at ${backupRoot}`,
			backupRoot,
		);
	}
	const name = `${flattenBackupName(baseDir, dest)}-${formatBackupTimestamp(now)}`;
	const backupPath = await nextFreePath(path.join(backupRoot, name));
	const stats = await statOrNull(dest);
	try {
		if (stats?.isFile()) {
			await copyFile(dest, backupPath);
		} else if (stats?.isDirectory()) {
			await cp(dest, backupPath, { recursive: true, dereference: true });
		}
	} catch (error) {
		throw ioError(error, `Failed to back up ${dest}`, dest);
	}
	return backupPath;
};
