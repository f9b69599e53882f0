import path from "node:path";
import * as z from "zod";
import { resolveFrom } from "#core/paths";
import { ResolvedSource } from "#sources/resolved-source";
import { parseSourceDocument } from "#sources/schema";
import type { SourceAdapter, SourceDocument } from "#sources/types";

export const FilesystemSourceSchema = z
	.object({
		type: z.literal("filesystem"),
		root: z.string().min(1),
		path: z.string().min(1).optional(),
		symlink: z.boolean().optional(),
	})
	.strict();

export type FilesystemSourceOptions = Omit<
	z.infer<typeof FilesystemSourceSchema>,
	"type"
>;

export class FilesystemSource implements SourceAdapter {
	readonly type = "filesystem";
	readonly root: string;
	readonly subPath?: string;
	readonly symlink: boolean;

	constructor(options: FilesystemSourceOptions) {
		this.root = options.root;
		this.subPath = options.path;
		this.symlink = options.symlink ?? false;
	}

	displayName() {
		return `filesystem:${this.root}`;
	}

	path() {
		return this.subPath ?? ".";
	}

	supportsSymlink() {
		return true;
	}

	async resolve(baseDir: string) {
		const rootPath = resolveFrom(baseDir, this.root);
		const subPath = this.path();
		return new ResolvedSource({
			path: subPath === "." ? rootPath : path.join(rootPath, subPath),
			display: this.displayName(),
			useSymlink: this.symlink,
		});
	}

	toJSON(): SourceDocument {
		return {
			type: this.type,
			root: this.root,
			...(this.subPath ? { path: this.subPath } : {}),
			...(this.symlink ? { symlink: true } : {}),
		};
	}
}

export const parseFilesystemSource = (document: SourceDocument) => {
	const { type: _type, ...options } = parseSourceDocument(
		FilesystemSourceSchema,
		document,
	);
	return new FilesystemSource(options);
};
