export type ErrnoException = NodeJS.ErrnoException;

export const isErrnoException = (error: unknown): error is ErrnoException =>
	error instanceof Error &&
	"code" in error &&
	(typeof error.code === "string" ||
		typeof error.code === "number" ||
		error.code === undefined);

export const getErrnoCode = (error: unknown): string | undefined =>
	isErrnoException(error) && typeof error.code === "string"
		? error.code
		: undefined;

export type SyncErrorCode =
	| "source-not-found"
	| "source-released"
	| "invalid-source-type"
	| "missing-source-type"
	| "invalid-source"
	| "git"
	| "confirmation-required"
	| "cancelled"
	| "skill-marker-missing"
	| "duplicate-id"
	| "entry-not-found"
	| "lock-not-found"
	| "malformed-lock"
	| "config-not-found"
	| "config-exists"
	| "invalid-config"
	| "io";

type SyncErrorOptions = {
	path?: string;
	entryId?: string;
	errno?: string;
	cause?: unknown;
};

export class SyncError extends Error {
	readonly code: SyncErrorCode;
	readonly path?: string;
	readonly entryId?: string;
	readonly errno?: string;

	constructor(
		code: SyncErrorCode,
		message: string,
		options?: SyncErrorOptions,
	) {
		super(
			message,
			options?.cause === undefined ? undefined : { cause: options.cause },
		);
		this.name = "SyncError";
		this.code = code;
		this.path = options?.path;
		this.entryId = options?.entryId;
		this.errno = options?.errno;
	}
}

export const isSyncError = (
	error: unknown,
	code?: SyncErrorCode,
): error is SyncError =>
	error instanceof SyncError && (code === undefined || error.code === code);

export const errorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

/**
 * Wrap an OS-level failure with a readable context, keeping the errno code.
 */
export const ioError = (error: unknown, context: string, target?: string) =>
	new SyncError("io", `${context}: ${errorMessage(error)}`, {
		path: target,
		errno: getErrnoCode(error),
		cause: error,
	});
