import * as z from "zod";
import { ASSET_KIND_NAMES } from "#core/entry";

export const AssetKindSchema = z.enum(ASSET_KIND_NAMES);

export const SourceDocumentSchema = z
	.object({
		type: z.string().min(1),
	})
	.passthrough();

export const EntrySchema = z
	.object({
		id: z.string().min(1),
		kind: AssetKindSchema,
		source: SourceDocumentSchema,
		dest: z.string().min(1).optional(),
		include: z.array(z.string().min(1)).optional(),
	})
	.strict();

export const ConfigSchema = z
	.object({
		$schema: z.string().min(1).optional(),
		entries: z.array(EntrySchema),
	})
	.strict()
	.superRefine((value, ctx) => {
		const seen = new Set<string>();
		const duplicates = new Set<string>();
		value.entries.forEach((entry) => {
			if (seen.has(entry.id)) {
				duplicates.add(entry.id);
			} else {
				seen.add(entry.id);
			}
		});
		if (duplicates.size > 0) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["entries"],
				message: `Duplicate entry IDs found: ${Array.from(duplicates).join(", ")}`,
			});
		}
	});

export type EntryDocument = z.infer<typeof EntrySchema>;
export type SkillsyncConfig = z.infer<typeof ConfigSchema>;
