import path from "node:path";
import * as z from "zod";
import type { LockedEntry } from "#core/lock";
import { AUTO_REF, cloneAndResolve } from "#git/clone";
import { resolveRemoteCommit } from "#git/resolve-remote";
import { type GitRunner, runGit } from "#git/run";
import { ResolvedSource } from "#sources/resolved-source";
import { parseSourceDocument } from "#sources/schema";
import type { SourceAdapter, SourceDocument } from "#sources/types";

export const GitSourceSchema = z
	.object({
		type: z.literal("git"),
		repo: z.string().min(1).optional(),
		url: z.string().min(1).optional(),
		ref: z.string().min(1).optional(),
		shallow: z.boolean().optional(),
		path: z.string().min(1).optional(),
	})
	.strict()
	.refine((value) => Boolean(value.repo ?? value.url), {
		message: "is required",
		path: ["repo"],
	});

export type GitSourceOptions = {
	repo: string;
	ref?: string;
	shallow?: boolean;
	path?: string;
};

export type GitSourceDeps = {
	git?: GitRunner;
	logger?: (message: string) => void;
	timeoutMs?: number;
};

export class GitSource implements SourceAdapter {
	readonly type = "git";
	readonly repo: string;
	readonly ref: string;
	readonly shallow: boolean;
	readonly subPath?: string;
	private readonly deps: GitSourceDeps;

	constructor(options: GitSourceOptions, deps: GitSourceDeps = {}) {
		this.repo = options.repo;
		this.ref = options.ref ?? AUTO_REF;
		this.shallow = options.shallow ?? true;
		this.subPath = options.path;
		this.deps = deps;
	}

	displayName() {
		return this.repo;
	}

	path() {
		return this.subPath ?? ".";
	}

	// The clone is temporary, so links into it would dangle.
	supportsSymlink() {
		return false;
	}

	async resolve(_baseDir: string) {
		const clone = await cloneAndResolve(
			{
				repo: this.repo,
				ref: this.ref,
				shallow: this.shallow,
				timeoutMs: this.deps.timeoutMs,
				logger: this.deps.logger,
			},
			this.deps.git ?? runGit,
		);
		const subPath = this.path();
		return new ResolvedSource({
			path: subPath === "." ? clone.repoDir : path.join(clone.repoDir, subPath),
			display: this.displayName(),
			useSymlink: false,
			git: {
				resolvedRef: clone.resolvedRef,
				resolvedCommit: clone.resolvedCommit,
			},
			release: clone.cleanup,
		});
	}

	async hasRemoteChanged(locked: LockedEntry | undefined) {
		if (!locked?.resolvedCommit) {
			return null;
		}
		const remote = await resolveRemoteCommit(
			{
				repo: this.repo,
				ref: locked.ref ?? this.ref,
				timeoutMs: this.deps.timeoutMs,
			},
			this.deps.git ?? runGit,
		);
		if (!remote) {
			return null;
		}
		return remote.resolvedCommit !== locked.resolvedCommit;
	}

	toJSON(): SourceDocument {
		return {
			type: this.type,
			repo: this.repo,
			ref: this.ref,
			...(this.subPath ? { path: this.subPath } : {}),
			shallow: this.shallow,
		};
	}
}

export const parseGitSource = (
	document: SourceDocument,
	deps: GitSourceDeps = {},
) => {
	const parsed = parseSourceDocument(GitSourceSchema, document);
	return new GitSource(
		{
			repo: parsed.repo ?? parsed.url ?? "",
			ref: parsed.ref,
			shallow: parsed.shallow,
			path: parsed.path,
		},
		deps,
	);
};
