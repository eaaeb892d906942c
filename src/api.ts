export { ChangesetResolver, mergePending } from "./changeset";
export type { Changeset, ChangesetEntry } from "./changeset";
export { cleanupLegacyDirectories, legacyDirectories } from "./cleanup";
export {
	DEFAULT_CONFIG_FILENAME,
	DEFAULT_MASTER,
	loadConfig,
	validateConfig,
} from "./config";
export type { MirrorConfig, MirrorOptions } from "./config";
export { formatDiffLines, writeDiffFile } from "./diff-file";
export { DownloadPool } from "./download";
export type { DownloadResult, FileRequest } from "./download";
export {
	CancelledError,
	ConfigError,
	ConsistencyError,
	IntegrityError,
	MirrorError,
	NetworkError,
	PackageNotFoundError,
	StalePageError,
	StorageError,
} from "./errors";
export { createLogger, silentLogger } from "./logger";
export type { Logger } from "./logger";
export { normalizePackageName } from "./package-name";
export { getPackageLayout, resolveArtifactPath } from "./paths";
export { WorkerPool } from "./pool/worker-pool";
export type { JobOutcome, Ticket } from "./pool/worker-pool";
export { rollbackIndex } from "./rollback";
export { SerialTracker } from "./serial";
export { IndexGenerator } from "./simple/generator";
export type { IndexSnapshot } from "./simple/generator";
export { renderHtml, renderJson } from "./simple/render";
export { readMirrorState, writeMirrorState } from "./state/mirror-state";
export type { MirrorState } from "./state/mirror-state";
export { PackageRecordStore } from "./state/package-records";
export type { PackageRecord, ReleaseFile } from "./state/package-records";
export { getStatus } from "./status";
export {
	createStorage,
	FilesystemStorage,
	ObjectStoreStorage,
	S3ObjectStoreClient,
} from "./storage";
export type { ObjectStoreClient, StorageBackend } from "./storage";
export { buildPackageRecord, SyncCoordinator } from "./sync";
export type {
	DeletePackagesOptions,
	MirrorRunOptions,
	SyncEvent,
	SyncOutcome,
	SyncPackagesOptions,
	SyncPhase,
	SyncReport,
	SyncRun,
} from "./sync";
export { UpstreamClient } from "./upstream/client";
export { VerifierPool } from "./verify";
export type { VerifyResult } from "./verify";
