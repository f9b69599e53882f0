const CREDENTIAL_RE = /^(https?:\/\/)([^@/]+)@/i;

/**
 * Hide credentials embedded in an HTTP(S) remote before it reaches output.
 */
export const redactRepoUrl = (repo: string) =>
	repo.replace(CREDENTIAL_RE, "$1***@");
