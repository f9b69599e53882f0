import type * as z from "zod";
import { SyncError } from "#core/errors";
import type { SourceDocument } from "#sources/types";

export const formatIssues = (issues: z.ZodIssue[], fallback: string) =>
	issues
		.map((issue) => `${issue.path.join(".") || fallback} ${issue.message}`)
		.join("; ");

export const parseSourceDocument = <T extends z.ZodTypeAny>(
	schema: T,
	document: SourceDocument,
): z.infer<T> => {
	const parsed = schema.safeParse(document);
	if (!parsed.success) {
		throw new SyncError(
			"invalid-source",
			`Invalid ${document.type} source: ${formatIssues(parsed.error.issues, "source")}.`,
		);
	}
	return parsed.data;
};
