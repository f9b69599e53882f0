import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import { SyncError, ioError } from "#core/errors";
import { SKILL_MARKER_FILENAME, matchesInclude } from "#core/entry";
import { exists } from "#core/paths";

/**
 * Immediate child directories of a skill root that pass `include`, sorted by
 * name. Version-control metadata is never a skill.
 */
export const listSkillDirs = async (
	sourceDir: string,
	include: readonly string[] = [],
) => {
	let entries: Dirent[];
	try {
		entries = await readdir(sourceDir, { withFileTypes: true });
	} catch (error) {
		throw ioError(
			error,
			`Failed to read skills directory ${sourceDir}`,
			sourceDir,
		);
	}
	return entries
		.filter((entry) => entry.isDirectory() && entry.name !== ".git")
		.map((entry) => entry.name)
		.filter((name) => matchesInclude(name, include))
		.sort();
};

/**
 * Check each skill directory for its marker file. Returns one warning per
 * missing marker, or throws on the first one when `strict` is set.
 */
export const validateSkillsRoot = async (params: {
	sourceDir: string;
	entryId: string;
	include?: readonly string[];
	strict: boolean;
}) => {
	const warnings: string[] = [];
	for (const name of await listSkillDirs(params.sourceDir, params.include)) {
		const markerPath = path.join(params.sourceDir, name, SKILL_MARKER_FILENAME);
		if (await exists(markerPath)) {
			continue;
		}
		if (params.strict) {
			throw new SyncError(
				"skill-marker-missing",
				`Skill '${name}' in entry '${params.entryId}' is missing ${SKILL_MARKER_FILENAME}.`,
				{ path: markerPath, entryId: params.entryId },
			);
		}
		warnings.push(
			`Skill '${name}' in entry '${params.entryId}' is missing ${SKILL_MARKER_FILENAME}`,
		);
	}
	return warnings;
};
