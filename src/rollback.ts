import { loadConfig, type MirrorConfig } from "./config";
import { assertSafePackageName, normalizePackageName } from "./package-name";
import { IndexGenerator } from "./simple/generator";
import { createStorage, type StorageBackend } from "./storage";

type RollbackOptions = {
	configPath?: string;
	packageName: string;
	/** Snapshot file name; omitted to list the available snapshots. */
	snapshot: string | null;
};

type RollbackDeps = {
	config?: MirrorConfig;
	storage?: StorageBackend;
	now?: () => Date;
};

export const rollbackIndex = async (
	options: RollbackOptions,
	deps: RollbackDeps = {},
) => {
	const config = deps.config ?? (await loadConfig(options.configPath)).config;
	const storage = deps.storage ?? createStorage(config);
	const packageName = normalizePackageName(
		assertSafePackageName(options.packageName, "package name"),
	);
	const indexes = new IndexGenerator(storage, {
		simpleFormat: config.simpleFormat,
		keepIndexVersions: config.keepIndexVersions,
		hashIndex: config.hashIndex,
		releaseFiles: config.releaseFiles,
		now: deps.now,
	});
	if (options.snapshot === null) {
		return {
			packageName,
			restored: null,
			changed: [],
			snapshots: await indexes.listSnapshots(packageName),
		};
	}
	const changed = await indexes.rollback(packageName, options.snapshot);
	return {
		packageName,
		restored: options.snapshot,
		changed,
		snapshots: await indexes.listSnapshots(packageName),
	};
};
