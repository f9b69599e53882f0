import { isCommitRef, refCandidates } from "#git/clone";
import { type GitRunner, runGit } from "#git/run";

const DEFAULT_TIMEOUT_MS = 30000; // 30 seconds

type ResolveRemoteParams = {
	repo: string;
	ref: string;
	timeoutMs?: number;
};

export const parseLsRemote = (stdout: string) => {
	const lines = stdout.trim().split("\n").filter(Boolean);
	if (lines.length === 0) {
		return null;
	}
	const first = lines[0]?.split(/\s+/)[0];
	return first || null;
};

/**
 * Look up the commit a ref points at without cloning. Returns `null` when
 * no candidate ref exists upstream.
 */
export const resolveRemoteCommit = async (
	params: ResolveRemoteParams,
	git: GitRunner = runGit,
) => {
	if (isCommitRef(params.ref)) {
		return { ref: params.ref, resolvedCommit: params.ref };
	}
	for (const candidate of refCandidates(params.ref)) {
		const stdout = await git(["ls-remote", params.repo, candidate], {
			timeoutMs: params.timeoutMs ?? DEFAULT_TIMEOUT_MS,
		});
		const resolvedCommit = parseLsRemote(stdout);
		if (resolvedCommit) {
			return { ref: candidate, resolvedCommit };
		}
	}
	return null;
};
