import { SyncError } from "#core/errors";
import type { SourceAdapter } from "#sources/types";

export type GitResolution = {
	resolvedRef: string;
	resolvedCommit: string;
};

type ResolvedSourceInit = {
	path: string;
	display: string;
	useSymlink: boolean;
	git?: GitResolution;
	release?: () => Promise<void>;
};

/**
 * Local content produced by `SourceAdapter.resolve`. It is the only owner of
 * whatever backs `path` (a temporary clone, for instance), and the path is
 * unreadable once released.
 */
export class ResolvedSource {
	readonly display: string;
	readonly useSymlink: boolean;
	readonly git?: GitResolution;
	private readonly contentPath: string;
	private readonly releaseResource?: () => Promise<void>;
	private released = false;

	constructor(init: ResolvedSourceInit) {
		this.contentPath = init.path;
		this.display = init.display;
		this.useSymlink = init.useSymlink;
		this.git = init.git;
		this.releaseResource = init.release;
	}

	get path() {
		if (this.released) {
			throw new SyncError(
				"source-released",
				`Resolved content for ${this.display} was already released.`,
				{ path: this.contentPath },
			);
		}
		return this.contentPath;
	}

	get isReleased() {
		return this.released;
	}

	async release() {
		if (this.released) {
			return;
		}
		this.released = true;
		await this.releaseResource?.();
	}
}

/**
 * Resolve `source`, hand the result to `fn` and release it on every exit path.
 */
export const withResolvedSource = async <T>(
	source: SourceAdapter,
	baseDir: string,
	fn: (resolved: ResolvedSource) => Promise<T>,
): Promise<T> => {
	const resolved = await source.resolve(baseDir);
	try {
		return await fn(resolved);
	} finally {
		await resolved.release();
	}
};
