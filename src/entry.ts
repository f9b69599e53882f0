import { resolveFrom } from "#core/paths";
import type { SourceAdapter } from "#sources/types";

export type InstallStrategy = "file" | "directory" | "skills";

export const ASSET_KIND_NAMES = [
	"agents_md",
	"cursor_rules",
	"cursor_skills_root",
	"agent_skill",
] as const;

export type AssetKind = (typeof ASSET_KIND_NAMES)[number];

export const ASSET_KINDS: Record<
	AssetKind,
	{ strategy: InstallStrategy; defaultDest: string }
> = {
	agents_md: { strategy: "file", defaultDest: "AGENTS.md" },
	cursor_rules: { strategy: "directory", defaultDest: ".cursor/rules" },
	cursor_skills_root: { strategy: "skills", defaultDest: ".cursor/skills" },
	agent_skill: { strategy: "skills", defaultDest: ".claude/skills" },
};

/** Marker every skill directory must carry. */
export const SKILL_MARKER_FILENAME = "SKILL.md";

export interface Entry {
	id: string;
	kind: AssetKind;
	source: SourceAdapter;
	dest?: string;
	include: string[];
}

export const strategyFor = (kind: AssetKind): InstallStrategy =>
	ASSET_KINDS[kind].strategy;

export const resolveDestination = (entry: Entry, baseDir: string) =>
	resolveFrom(baseDir, entry.dest ?? ASSET_KINDS[entry.kind].defaultDest);

/**
 * Name-prefix filter for immediate children. No prefixes means everything.
 */
export const matchesInclude = (name: string, include: readonly string[]) =>
	include.length === 0 || include.some((prefix) => name.startsWith(prefix));
