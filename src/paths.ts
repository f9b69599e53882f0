import { access } from "node:fs/promises";
import path from "node:path";

export const DEFAULT_LOCK_FILENAME = "skillsync.lock";
export const BACKUP_DIR = ".skillsync-backups";

export const toPosixPath = (value: string) => value.replace(/\\/g, "/");

export const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

export const resolveLockPath = (baseDir: string) =>
	path.join(baseDir, DEFAULT_LOCK_FILENAME);

export const resolveBackupRoot = (baseDir: string) =>
	path.join(baseDir, BACKUP_DIR);

/**
 * Resolve `target` against `baseDir` unless it is already absolute.
 */
export const resolveFrom = (baseDir: string, target: string) =>
	path.isAbsolute(target) ? path.normalize(target) : path.join(baseDir, target);
