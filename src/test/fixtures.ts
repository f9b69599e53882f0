import { mkdir, mkdtemp, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import type { GitRunner } from "#git/run";

export const makeTempDir = (prefix = "skillsync-test-") =>
	mkdtemp(path.join(tmpdir(), prefix));

export const writeTree = async (
	root: string,
	files: Record<string, string>,
) => {
	await mkdir(root, { recursive: true });
	for (const [relativePath, content] of Object.entries(files)) {
		const filePath = path.join(root, relativePath);
		await mkdir(path.dirname(filePath), { recursive: true });
		await writeFile(filePath, content, "utf8");
	}
};

/**
 * Create each link in `links` (path to link target) under `root`.
 */
export const writeLinks = async (
	root: string,
	links: Record<string, string>,
) => {
	for (const [relativePath, target] of Object.entries(links)) {
		const linkPath = path.join(root, relativePath);
		await mkdir(path.dirname(linkPath), { recursive: true });
		await symlink(target, linkPath);
	}
};

export type FakeGitOptions = {
	files: Record<string, string>;
	links?: Record<string, string>;
	commit: string;
	missingRefs?: string[];
	remoteCommit?: string;
};

/**
 * In-process stand-in for the git binary. `clone` writes `files` into the
 * target directory, `rev-parse` and `ls-remote` answer with fixed commits.
 */
export const createFakeGit = (options: FakeGitOptions) => {
	const calls: string[][] = [];
	const git: GitRunner = async (args) => {
		calls.push(args);
		if (args[0] === "clone") {
			const branchIndex = args.indexOf("--branch");
			const branch = branchIndex === -1 ? undefined : args[branchIndex + 1];
			if (branch && options.missingRefs?.includes(branch)) {
				throw new Error(`Remote branch ${branch} not found in upstream origin`);
			}
			const outDir = args[args.length - 1];
			await writeTree(outDir, options.files);
			await writeLinks(outDir, options.links ?? {});
			return "";
		}
		if (args.includes("rev-parse")) {
			return `${options.commit}\n`;
		}
		if (args[0] === "ls-remote") {
			const ref = args[2];
			if (options.missingRefs?.includes(ref)) {
				return "";
			}
			return `${options.remoteCommit ?? options.commit}\trefs/heads/${ref}\n`;
		}
		return "";
	};
	return { git, calls };
};
