export {
	DEFAULT_CONFIG_FILENAME,
	type LoadedConfig,
	type SkillsyncConfig,
	createDefaultConfig,
	discoverConfig,
	loadConfig,
	validateConfig,
	writeConfig,
	writeEntries,
} from "#config";
export { createBackup, hasConflict } from "#core/backup";
export {
	ASSET_KINDS,
	type AssetKind,
	type Entry,
	SKILL_MARKER_FILENAME,
} from "#core/entry";
export { SyncError, type SyncErrorCode, isSyncError } from "#core/errors";
export { fingerprintPath, fingerprintString } from "#core/fingerprint";
export { type LockedEntry, LockStore } from "#core/lock";
export { BACKUP_DIR, DEFAULT_LOCK_FILENAME } from "#core/paths";
export { initConfig } from "#commands/init";
export { getStatus } from "#commands/status";
export { runSync } from "#commands/sync";
export { validateProject } from "#commands/validate";
export {
	type InstallDeps,
	type InstallOptions,
	type InstallResult,
	installAll,
	installEntry,
} from "#install/reconcile";
export { FilesystemSource } from "#sources/filesystem";
export { GitSource } from "#sources/git";
export { SourceRegistry, createSourceRegistry } from "#sources/registry";
export { ResolvedSource, withResolvedSource } from "#sources/resolved-source";
export type { SourceAdapter, SourceDocument } from "#sources/types";
