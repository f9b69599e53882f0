import { SyncError } from "#core/errors";
import { parseFilesystemSource } from "#sources/filesystem";
import { type GitSourceDeps, parseGitSource } from "#sources/git";
import type {
	SourceAdapter,
	SourceDocument,
	SourceParser,
} from "#sources/types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Maps a source `type` tag to the parser that builds it.
 */
export class SourceRegistry {
	private readonly parsers = new Map<string, SourceParser>();

	register(type: string, parser: SourceParser) {
		this.parsers.set(type, parser);
		return this;
	}

	registeredTypes() {
		return Array.from(this.parsers.keys());
	}

	has(type: string) {
		return this.parsers.has(type);
	}

	parse(value: unknown): SourceAdapter {
		if (!isRecord(value) || typeof value.type !== "string") {
			throw new SyncError(
				"missing-source-type",
				"Source must have a 'type' field.",
			);
		}
		return this.parseTyped(value.type, { ...value, type: value.type });
	}

	parseTyped(type: string, document: SourceDocument): SourceAdapter {
		const parser = this.parsers.get(type);
		if (!parser) {
			throw new SyncError(
				"invalid-source-type",
				`Invalid source type '${type}'. Valid source types are: ${this.registeredTypes().join(", ")}.`,
			);
		}
		return parser(document);
	}

	/**
	 * Tagged document for `source`, suitable for writing back to the manifest.
	 */
	serialize(source: SourceAdapter): SourceDocument {
		if (!this.parsers.has(source.type)) {
			throw new SyncError(
				"invalid-source-type",
				`Cannot serialize unregistered source type '${source.type}'.`,
			);
		}
		return { ...source.toJSON(), type: source.type };
	}
}

export type SourceRegistryOptions = {
	git?: GitSourceDeps;
};

export const createSourceRegistry = (options: SourceRegistryOptions = {}) =>
	new SourceRegistry()
		.register("filesystem", parseFilesystemSource)
		.register("git", (document) => parseGitSource(document, options.git));
