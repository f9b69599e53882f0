import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { SyncError, errorMessage, getErrnoCode } from "#core/errors";
import { redactRepoUrl } from "#git/redact";
import { type GitRunner, runGit } from "#git/run";

export const AUTO_REF = "auto";
export const AUTO_REF_CANDIDATES = ["main", "master"] as const;

const DEFAULT_RM_RETRIES = 3;
const DEFAULT_RM_BACKOFF_MS = 100;
const FULL_COMMIT_RE = /^[0-9a-f]{40}$/i;
const SHORT_COMMIT_RE = /^[0-9a-f]{7,39}$/i;

export type CloneParams = {
	repo: string;
	ref: string;
	shallow: boolean;
	timeoutMs?: number;
	logger?: (message: string) => void;
};

export type CloneResult = {
	repoDir: string;
	resolvedRef: string;
	resolvedCommit: string;
	cleanup: () => Promise<void>;
};

export const removeDir = async (
	dirPath: string,
	retries = DEFAULT_RM_RETRIES,
) => {
	for (let attempt = 0; attempt <= retries; attempt += 1) {
		try {
			await rm(dirPath, { recursive: true, force: true });
			return;
		} catch (error) {
			const code = getErrnoCode(error);
			if (code !== "ENOTEMPTY" && code !== "EBUSY" && code !== "EPERM") {
				throw error;
			}
			if (attempt === retries) {
				throw error;
			}
			await new Promise((resolve) =>
				setTimeout(resolve, DEFAULT_RM_BACKOFF_MS * (attempt + 1)),
			);
		}
	}
};

export const refCandidates = (ref: string): string[] =>
	ref === AUTO_REF ? [...AUTO_REF_CANDIDATES] : [ref];

export const isCommitRef = (ref: string) => FULL_COMMIT_RE.test(ref);

const cloneCommit = async (
	params: CloneParams,
	ref: string,
	outDir: string,
	git: GitRunner,
) => {
	const runOptions = { timeoutMs: params.timeoutMs, logger: params.logger };
	await git(
		[
			"clone",
			"--no-checkout",
			"--recurse-submodules=no",
			"--no-tags",
			params.repo,
			outDir,
		],
		runOptions,
	);
	// fetching by object id takes the full id
	if (params.shallow && isCommitRef(ref)) {
		await git(
			["-C", outDir, "fetch", "--depth", "1", "origin", ref],
			runOptions,
		);
	}
	await git(["-C", outDir, "checkout", "--quiet", "--detach", ref], runOptions);
};

const cloneBranch = async (
	params: CloneParams,
	ref: string,
	outDir: string,
	git: GitRunner,
) => {
	await git(
		[
			"clone",
			...(params.shallow ? ["--depth", "1"] : []),
			"--recurse-submodules=no",
			"--no-tags",
			"--single-branch",
			"--branch",
			ref,
			params.repo,
			outDir,
		],
		{ timeoutMs: params.timeoutMs, logger: params.logger },
	);
};

/**
 * A full object id is checked out directly. A short hex ref is tried as a
 * branch or tag first, and read as an abbreviated commit when no such name
 * exists.
 */
const cloneRef = async (
	params: CloneParams,
	ref: string,
	outDir: string,
	git: GitRunner,
) => {
	if (isCommitRef(ref)) {
		await cloneCommit(params, ref, outDir, git);
		return;
	}
	try {
		await cloneBranch(params, ref, outDir, git);
	} catch (error) {
		if (!SHORT_COMMIT_RE.test(ref)) {
			throw error;
		}
		await removeDir(outDir);
		await cloneCommit(params, ref, outDir, git);
	}
};

/**
 * Clone `params.repo` into a fresh temporary directory. With the `auto` ref,
 * `main` is tried before `master`. The caller owns the returned directory
 * and must call `cleanup` when done with it.
 */
export const cloneAndResolve = async (
	params: CloneParams,
	git: GitRunner = runGit,
): Promise<CloneResult> => {
	const tempRoot = await mkdtemp(path.join(tmpdir(), "skillsync-git-"));
	const repoDir = path.join(tempRoot, "repo");
	try {
		const failures: string[] = [];
		let resolvedRef: string | null = null;
		for (const candidate of refCandidates(params.ref)) {
			try {
				await cloneRef(params, candidate, repoDir, git);
				resolvedRef = candidate;
				break;
			} catch (error) {
				failures.push(`${candidate}: ${errorMessage(error)}`);
				await removeDir(repoDir);
			}
		}
		if (!resolvedRef) {
			throw new SyncError(
				"git",
				`Unable to clone ${redactRepoUrl(params.repo)} at ref '${params.ref}' (${failures.join("; ")}).`,
			);
		}
		const head = await git(["-C", repoDir, "rev-parse", "HEAD"], {
			timeoutMs: params.timeoutMs,
			logger: params.logger,
		});
		return {
			repoDir,
			resolvedRef,
			resolvedCommit: head.trim(),
			cleanup: async () => {
				await removeDir(tempRoot);
			},
		};
	} catch (error) {
		await removeDir(tempRoot);
		throw error;
	}
};
