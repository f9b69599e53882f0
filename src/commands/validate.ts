import { symbols, ui } from "#cli/ui";
import { loadConfig } from "#config";
import { type Entry, strategyFor } from "#core/entry";
import { SyncError, errorMessage } from "#core/errors";
import { exists } from "#core/paths";
import { validateSkillsRoot } from "#install/skills";
import type { SourceRegistry } from "#sources/registry";
import type { ResolvedSource } from "#sources/resolved-source";

type ValidateOptions = {
	configPath?: string;
	cwd?: string;
	strict: boolean;
	registry?: SourceRegistry;
};

export type EntryValidation = {
	id: string;
	source: string;
	ok: boolean;
	warnings: string[];
};

const checkEntry = async (
	entry: Entry,
	baseDir: string,
	strict: boolean,
): Promise<EntryValidation> => {
	const label = entry.source.displayName();
	let resolved: ResolvedSource;
	try {
		resolved = await entry.source.resolve(baseDir);
	} catch (error) {
		if (strict) {
			throw error;
		}
		return {
			id: entry.id,
			source: label,
			ok: false,
			warnings: [`Source could not be resolved: ${errorMessage(error)}`],
		};
	}
	try {
		const sourcePath = resolved.path;
		if (!(await exists(sourcePath))) {
			if (strict) {
				throw new SyncError(
					"source-not-found",
					`Source path not found for entry '${entry.id}': ${sourcePath}`,
					{ path: sourcePath, entryId: entry.id },
				);
			}
			return {
				id: entry.id,
				source: label,
				ok: false,
				warnings: [`Source path not found: ${sourcePath}`],
			};
		}
		const warnings =
			strategyFor(entry.kind) === "skills"
				? await validateSkillsRoot({
						sourceDir: sourcePath,
						entryId: entry.id,
						include: entry.include,
						strict,
					})
				: [];
		return { id: entry.id, source: label, ok: warnings.length === 0, warnings };
	} finally {
		await resolved.release();
	}
};

/**
 * Check the manifest schema, then that every source resolves to an existing
 * path. Problems are collected as warnings unless `strict` is set.
 */
export const validateProject = async (options: ValidateOptions) => {
	const { resolvedPath, baseDir, entries } = await loadConfig(
		options.configPath,
		{ registry: options.registry, cwd: options.cwd },
	);
	ui.header("Config", ui.path(resolvedPath));
	const results: EntryValidation[] = [];
	for (const entry of entries) {
		ui.debug(`Validating ${entry.id}`);
		results.push(await checkEntry(entry, baseDir, options.strict));
	}
	return {
		configPath: resolvedPath,
		results,
		warnings: results.reduce(
			(total, result) => total + result.warnings.length,
			0,
		),
	};
};

export const printValidation = (
	report: Awaited<ReturnType<typeof validateProject>>,
) => {
	for (const result of report.results) {
		ui.item(result.ok ? symbols.success : symbols.warn, result.id, result.source);
		for (const warning of result.warnings) {
			ui.line(`    ${warning}`);
		}
	}
	ui.line();
	if (report.warnings === 0) {
		ui.line(
			`${symbols.success} Config is valid. All ${report.results.length} entries validated successfully.`,
		);
		return;
	}
	ui.line(
		`${symbols.warn} Config is valid with ${report.warnings} warning(s). Use --strict to fail on warnings.`,
	);
};
