import type { LockedEntry } from "#core/lock";
import type { ResolvedSource } from "#sources/resolved-source";

export type SourceDocument = Record<string, unknown> & { type: string };

/**
 * A declared origin of asset content, resolved to a local path at install
 * time. New kinds of source register a parser with the `SourceRegistry`.
 */
export interface SourceAdapter {
	readonly type: string;
	displayName(): string;
	/**
	 * The returned value owns any temporary resources behind the path.
	 * Callers must `release()` it once they are done reading.
	 */
	resolve(baseDir: string): Promise<ResolvedSource>;
	supportsSymlink(): boolean;
	/** Sub-path within the source, `"."` for its root. */
	path(): string;
	/**
	 * Cheap upstream check. `null` means unknown, so the content has to be
	 * fetched to tell.
	 */
	hasRemoteChanged?(locked: LockedEntry | undefined): Promise<boolean | null>;
	toJSON(): SourceDocument;
}

export type SourceParser = (document: SourceDocument) => SourceAdapter;
