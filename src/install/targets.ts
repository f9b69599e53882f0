import { randomBytes } from "node:crypto";
import type { Dirent } from "node:fs";
import {
	copyFile,
	cp,
	lstat,
	mkdir,
	readdir,
	rename,
	rm,
	symlink,
} from "node:fs/promises";
import path from "node:path";
import { ui } from "#cli/ui";
import { matchesInclude } from "#core/entry";
import { errorMessage, getErrnoCode, ioError } from "#core/errors";
import { listSkillDirs } from "#install/skills";

export type TargetMode = "symlink" | "copy";

export type TargetDeps = {
	copyFile: typeof copyFile;
	cp: typeof cp;
	lstat: typeof lstat;
	mkdir: typeof mkdir;
	readdir: typeof readdir;
	rename: typeof rename;
	rm: typeof rm;
	symlink: typeof symlink;
	warn: (message: string) => void;
};

type TargetParams = {
	sourcePath: string;
	dest: string;
	mode?: TargetMode;
	include?: readonly string[];
	deps?: TargetDeps;
};

const SYMLINK_FALLBACK_CODES = new Set(["EPERM", "EACCES", "ENOTSUP", "EINVAL"]);

const defaultDeps = (): TargetDeps => ({
	copyFile,
	cp,
	lstat,
	mkdir,
	readdir,
	rename,
	rm,
	symlink,
	warn: ui.warn,
});

const skipGitMetadata = (source: string) => path.basename(source) !== ".git";

const removeTarget = async (dest: string, deps: TargetDeps) => {
	try {
		await deps.rm(dest, { recursive: true, force: true });
	} catch (error) {
		throw ioError(error, `Failed to remove existing ${dest}`, dest);
	}
};

const isDirectory = async (target: string, deps: TargetDeps) => {
	try {
		return (await deps.lstat(target)).isDirectory();
	} catch (error) {
		if (getErrnoCode(error) === "ENOENT") {
			return false;
		}
		throw ioError(error, `Failed to inspect ${target}`, target);
	}
};

const ensureDir = async (dir: string, deps: TargetDeps) => {
	try {
		await deps.mkdir(dir, { recursive: true });
	} catch (error) {
		throw ioError(error, `Failed to create directory ${dir}`, dir);
	}
};

/**
 * Create a symlink at `dest`. Returns false when the platform refuses and the
 * caller should copy instead.
 */
const trySymlink = async (
	sourcePath: string,
	dest: string,
	kind: "file" | "dir",
	deps: TargetDeps,
) => {
	const type = kind === "dir" && process.platform === "win32" ? "junction" : kind;
	try {
		await deps.symlink(path.resolve(sourcePath), dest, type);
		return true;
	} catch (error) {
		const code = getErrnoCode(error);
		if (code && SYMLINK_FALLBACK_CODES.has(code)) {
			deps.warn(
				`Failed to create symlink at ${dest}. Falling back to copy. ${errorMessage(error)}`,
			);
			return false;
		}
		throw ioError(error, `Failed to link ${sourcePath} to ${dest}`, dest);
	}
};

/**
 * Deep copy with links resolved, so the copy holds no reference back into
 * the source.
 */
const copyTree = async (source: string, dest: string, deps: TargetDeps) => {
	try {
		await deps.cp(source, dest, {
			recursive: true,
			dereference: true,
			filter: skipGitMetadata,
		});
	} catch (error) {
		throw ioError(error, `Failed to copy ${source} to ${dest}`, dest);
	}
};

/**
 * Install one file. The copy lands in a sibling temp file first and is
 * renamed over `dest`, so `dest` either keeps its old content or holds the
 * complete new one.
 */
export const installFile = async (params: TargetParams) => {
	const deps = params.deps ?? defaultDeps();
	await ensureDir(path.dirname(params.dest), deps);
	if (params.mode === "symlink") {
		await removeTarget(params.dest, deps);
		if (await trySymlink(params.sourcePath, params.dest, "file", deps)) {
			return;
		}
	} else if (await isDirectory(params.dest, deps)) {
		// rename cannot replace a directory
		await removeTarget(params.dest, deps);
	}
	const tempPath = path.join(
		path.dirname(params.dest),
		`.${path.basename(params.dest)}.tmp-${randomBytes(6).toString("hex")}`,
	);
	try {
		await deps.copyFile(params.sourcePath, tempPath);
		await deps.rename(tempPath, params.dest);
	} catch (error) {
		await deps.rm(tempPath, { force: true });
		throw ioError(
			error,
			`Failed to copy ${params.sourcePath} to ${params.dest}`,
			params.dest,
		);
	}
};

/**
 * Replace `dest` with the children of `sourcePath` that pass `include`.
 * Without a filter a symlink install links the whole directory.
 */
export const installDirectory = async (params: TargetParams) => {
	const deps = params.deps ?? defaultDeps();
	const include = params.include ?? [];
	await ensureDir(path.dirname(params.dest), deps);
	await removeTarget(params.dest, deps);
	if (
		params.mode === "symlink" &&
		include.length === 0 &&
		(await trySymlink(params.sourcePath, params.dest, "dir", deps))
	) {
		return;
	}
	await ensureDir(params.dest, deps);
	let children: Dirent[];
	try {
		children = await deps.readdir(params.sourcePath, { withFileTypes: true });
	} catch (error) {
		throw ioError(
			error,
			`Failed to read directory ${params.sourcePath}`,
			params.sourcePath,
		);
	}
	for (const child of children) {
		if (child.name === ".git" || !matchesInclude(child.name, include)) {
			continue;
		}
		await copyTree(
			path.join(params.sourcePath, child.name),
			path.join(params.dest, child.name),
			deps,
		);
	}
};

/**
 * Replace `dest` with a copy of every skill directory under `sourcePath`.
 * Loose files at the root are not skills and are left out.
 */
export const installSkillsRoot = async (params: TargetParams) => {
	const deps = params.deps ?? defaultDeps();
	await removeTarget(params.dest, deps);
	await ensureDir(params.dest, deps);
	for (const name of await listSkillDirs(params.sourcePath, params.include)) {
		await installDirectory({
			sourcePath: path.join(params.sourcePath, name),
			dest: path.join(params.dest, name),
			mode: "copy",
			deps,
		});
	}
};
