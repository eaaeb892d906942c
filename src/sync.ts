import { randomUUID } from "node:crypto";
import { createReadStream } from "node:fs";
import { rm } from "node:fs/promises";
import path from "node:path";
import {
	type Changeset,
	type ChangesetEntry,
	ChangesetResolver,
	mergePending,
} from "./changeset";
import { cleanupLegacyDirectories } from "./cleanup";
import type { MirrorConfig } from "./config";
import { appendRunLog, writeDiffFile } from "./diff-file";
import { type DownloadResult, DownloadPool, type FileRequest } from "./download";
import {
	CancelledError,
	ConfigError,
	isFatalError,
	MirrorError,
	type MirrorErrorKind,
	PackageNotFoundError,
	toErrorMessage,
} from "./errors";
import { silentLogger, type Logger } from "./logger";
import { assertSafePackageName, normalizePackageName } from "./package-name";
import { getPackageLayout, resolveArtifactPath } from "./paths";
import { createRunSignal } from "./pool/run-signal";
import type { Ticket } from "./pool/worker-pool";
import { SerialTracker } from "./serial";
import { IndexGenerator } from "./simple/generator";
import { type MirrorState, readMirrorState, writeMirrorState } from "./state/mirror-state";
import {
	type PackageRecord,
	PackageRecordStore,
	type ReleaseFile,
} from "./state/package-records";
import { createStorage, type ObjectStoreClient, type StorageBackend } from "./storage";
import { type PackageMetadataResult, UpstreamClient } from "./upstream/client";
import type { UpstreamFile } from "./upstream/schemas";
import { VerifierPool, type VerifyResult } from "./verify";

export type SyncPhase =
	| "Idle"
	| "FetchingSerial"
	| "ResolvingChangeset"
	| "Downloading"
	| "Verifying"
	| "Committing"
	| "Indexing"
	| "Finalizing"
	| "Done"
	| "Failed";

export type SyncOutcome = "Success" | "PartialFailure" | "Aborted";

export type RunKind = "mirror" | "sync" | "verify" | "delete";

export type ErrorRecord = {
	packageName: string | null;
	filename: string | null;
	kind: MirrorErrorKind | "unknown";
	message: string;
};

export type SyncRun = {
	runId: string;
	kind: RunKind;
	startTime: string;
	endTime: string | null;
	outcome: SyncOutcome | null;
	/** Storage keys written or deleted by the run. */
	changedPaths: string[];
	errors: ErrorRecord[];
};

export type SyncReport = {
	run: SyncRun;
	phase: SyncPhase;
	fromSerial: number;
	targetSerial: number;
	state: MirrorState;
	changesetMode: Changeset["mode"] | null;
	usedOverride: boolean;
	committed: string[];
	failed: string[];
	/** Packages upstream no longer has. */
	missing: string[];
	diffFilePath: string | null;
};

export type SyncEvent =
	| { type: "phase"; phase: SyncPhase }
	| {
			type: "package";
			name: string;
			status: "committed" | "failed" | "missing" | "deleted";
	  }
	| { type: "file"; name: string; filename: string; status: "verified" | "failed" };

export type SyncDeps = {
	storage?: StorageBackend;
	client?: UpstreamClient;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
	objectStoreClient?: ObjectStoreClient;
	logger?: Logger;
	signal?: AbortSignal;
	now?: () => Date;
	onEvent?: (event: SyncEvent) => void;
};

export type MirrorRunOptions = {
	/** Re-check every upstream package instead of reading the changelog. */
	forceCheck?: boolean;
};

export type SyncPackagesOptions = {
	/** Leave the root listing untouched. */
	skipRootIndex?: boolean;
};

export type DeletePackagesOptions = {
	/** Report what would be removed without touching storage. */
	dryRun?: boolean;
};

type FileAttempt = Pick<FileRequest, "ignoreExisting" | "forceMirror">;

type PackageWork = {
	entry: ChangesetEntry;
	normalizedName: string;
	record: PackageRecord;
	/** Passing verifications keyed by local path. */
	verified: Map<string, VerifyResult>;
};

type BatchContext = {
	run: SyncRun;
	signal: AbortSignal;
	downloads: DownloadPool;
	verifiers: VerifierPool;
	work: Map<string, PackageWork>;
	failed: Set<string>;
	missing: Set<string>;
	/** Highest serial a record written by this batch may carry. */
	serialCap: number;
	halted: boolean;
	fatal: unknown;
};

type BatchResult = {
	aborted: boolean;
	committed: string[];
	failed: string[];
	missing: string[];
};

const toErrorRecord = (
	error: unknown,
	packageName: string | null = null,
	filename: string | null = null,
): ErrorRecord => ({
	packageName,
	filename,
	kind: error instanceof MirrorError ? error.kind : "unknown",
	message: toErrorMessage(error),
});

const yankedValue = (file: UpstreamFile) => {
	if (!file.yanked) return false;
	return file.yanked_reason ? file.yanked_reason : true;
};

/**
 * Builds the package record for fresh metadata, carrying the last stored
 * size and mtime over for files whose content is unchanged. The serial
 * never exceeds `serialCap`.
 */
export const buildPackageRecord = (
	result: PackageMetadataResult,
	entry: ChangesetEntry,
	previous: PackageRecord | null,
	serialCap = Number.POSITIVE_INFINITY,
): PackageRecord => {
	const { metadata } = result;
	const known = new Map(
		(previous?.releaseFiles ?? []).map((file) => [file.localPath, file]),
	);
	const seen = new Set<string>();
	const releaseFiles: ReleaseFile[] = [];
	for (const [version, files] of Object.entries(metadata.releases)) {
		for (const file of files) {
			const sha256 = file.digests.sha256;
			const localPath = resolveArtifactPath(file.url, file.filename, sha256);
			if (seen.has(localPath)) continue;
			seen.add(localPath);
			const last = known.get(localPath);
			const unchanged = last !== undefined && last.upstreamHash === sha256;
			releaseFiles.push({
				filename: file.filename,
				sourceUrl: file.url,
				upstreamHash: sha256,
				size: file.size,
				localPath,
				status: "Pending",
				version,
				uploadTime: file.upload_time_iso_8601 ?? null,
				requiresPython: file.requires_python ?? null,
				yanked: yankedValue(file),
				lastKnownSize: unchanged ? last.lastKnownSize : null,
				lastKnownMtime: unchanged ? last.lastKnownMtime : null,
			});
		}
	}
	return {
		name: metadata.info.name,
		normalizedName: normalizePackageName(entry.name),
		serial: Math.min(
			metadata.last_serial ?? result.serial ?? entry.serial ?? previous?.serial ?? 0,
			serialCap,
		),
		releaseFiles,
		metadataBlob: result.raw,
	};
};

/**
 * Drives a run through its phases: serial check, changeset, download and
 * verification, commit, indexing and finalization. The local serial only
 * advances once every package in the changeset committed.
 */
export class SyncCoordinator {
	readonly storage: StorageBackend;
	readonly client: UpstreamClient;
	readonly records: PackageRecordStore;
	readonly indexes: IndexGenerator;
	private readonly tracker: SerialTracker;
	private readonly resolver: ChangesetResolver;
	private readonly logger: Logger;
	private readonly now: () => Date;
	private currentPhase: SyncPhase = "Idle";

	constructor(
		readonly config: MirrorConfig,
		private readonly deps: SyncDeps = {},
	) {
		this.logger = deps.logger ?? silentLogger;
		this.now = deps.now ?? (() => new Date());
		this.storage =
			deps.storage ??
			createStorage(config, { objectStoreClient: deps.objectStoreClient });
		this.client =
			deps.client ??
			new UpstreamClient({
				master: config.master,
				timeoutMs: config.timeoutMs,
				globalTimeoutMs: config.globalTimeoutMs,
				fetchFn: deps.fetchFn,
				logger: this.logger,
			});
		this.records = new PackageRecordStore(this.storage);
		this.indexes = new IndexGenerator(this.storage, {
			simpleFormat: config.simpleFormat,
			keepIndexVersions: config.keepIndexVersions,
			hashIndex: config.hashIndex,
			releaseFiles: config.releaseFiles,
			now: this.now,
		});
		this.tracker = new SerialTracker(this.client, {
			allowMismatch: config.allowUpstreamSerialMismatch,
			logger: this.logger,
		});
		this.resolver = new ChangesetResolver(this.client, this.records, {
			maxRange: config.changelogMaxRange,
			logger: this.logger,
		});
	}

	get phase() {
		return this.currentPhase;
	}

	/**
	 * Full incremental mirror run against upstream. `forceCheck` lists every
	 * upstream package instead of reading the changelog.
	 */
	async runMirror(options: MirrorRunOptions = {}): Promise<SyncReport> {
		const run = this.startRun("mirror");
		const runSignal = createRunSignal(this.deps.signal, this.config.runTimeoutMs);
		const signal = runSignal.signal;
		let state: MirrorState | null = null;
		let target = 0;
		let usedOverride = false;
		let changesetMode: Changeset["mode"] | null = null;
		try {
			state = await readMirrorState(this.storage);
			target = state.currentSerial;
			this.enter("FetchingSerial");
			const upstream = await this.tracker.fetchUpstreamSerial(signal);
			const reconciliation = this.tracker.reconcile(state.currentSerial, upstream);
			target = reconciliation.serial;
			usedOverride = reconciliation.usedOverride;

			this.enter("ResolvingChangeset");
			let changeset: Changeset = {
				packages: new Map(),
				mode: "changelog",
				highestSerial: null,
			};
			if (options.forceCheck) {
				this.logger.info("Checking every upstream package.");
			}
			if (reconciliation.needsSync || options.forceCheck) {
				changeset = options.forceCheck
					? await this.resolver.listAll(signal)
					: await this.resolver.resolve(state.currentSerial, upstream, signal);
				if (changeset.mode === "changelog") {
					const checked = this.tracker.checkChangelog(
						state.currentSerial,
						upstream,
						changeset.highestSerial,
					);
					target = checked.serial;
					usedOverride ||= checked.usedOverride;
				} else {
					target = Math.max(upstream, changeset.highestSerial ?? 0);
				}
				changesetMode = changeset.mode;
			}
			changeset = mergePending(changeset, state.pendingPackages);

			if (
				changeset.packages.size === 0 &&
				!usedOverride &&
				target === state.currentSerial
			) {
				this.logger.info(`Mirror is up to date at serial ${state.currentSerial}.`);
				return await this.finishUpToDate(run, state, changesetMode);
			}
			this.logger.info(
				`Syncing ${changeset.packages.size} package(s) from serial ${state.currentSerial} to ${target}.`,
			);
			const batch = await this.processBatch(changeset.packages, run, signal, target);
			return await this.finalize(run, state, batch, {
				target,
				advanceSerial: true,
				rootIndex: this.config.rootIndex,
				usedOverride,
				changesetMode,
			});
		} catch (error) {
			return this.fail(run, state, error, runSignal.timedOut(), {
				target,
				usedOverride,
				changesetMode,
			});
		} finally {
			runSignal.dispose();
		}
	}

	/**
	 * Mirrors the named packages regardless of the changelog. The serial is
	 * left alone; pending entries for the packages are cleared on success.
	 */
	async syncPackages(
		names: string[],
		options: SyncPackagesOptions = {},
	): Promise<SyncReport> {
		const run = this.startRun("sync");
		const runSignal = createRunSignal(this.deps.signal, this.config.runTimeoutMs);
		let state: MirrorState | null = null;
		try {
			const packages = new Map<string, ChangesetEntry>();
			for (const name of names) {
				packages.set(toSafeName(name), { name, serial: null });
			}
			state = await readMirrorState(this.storage);
			const batch = await this.processBatch(
				packages,
				run,
				runSignal.signal,
				state.currentSerial,
			);
			return await this.finalize(run, state, batch, {
				target: state.targetSerial,
				advanceSerial: false,
				rootIndex: this.config.rootIndex && !options.skipRootIndex,
				usedOverride: false,
				changesetMode: null,
			});
		} catch (error) {
			return this.fail(run, state, error, runSignal.timedOut(), {
				target: state?.targetSerial ?? 0,
				usedOverride: false,
				changesetMode: null,
			});
		} finally {
			runSignal.dispose();
		}
	}

	/**
	 * Re-checks every stored release file against its record without
	 * downloading anything. Nothing but the run log is written.
	 */
	async verifyMirror(): Promise<SyncReport> {
		const run = this.startRun("verify");
		const runSignal = createRunSignal(this.deps.signal, this.config.runTimeoutMs);
		let state: MirrorState | null = null;
		const verifiers = new VerifierPool({
			storage: this.storage,
			compareMethod: this.config.compareMethod,
			verifiers: this.config.verifiers,
			queueSize: this.config.verifyQueueSize,
			signal: runSignal.signal,
		});
		try {
			state = await readMirrorState(this.storage);
			this.enter("Verifying");
			const checks: Array<Promise<void>> = [];
			const failed = new Set<string>();
			for (const name of await this.records.names()) {
				const record = await this.records.get(name);
				if (!record) continue;
				for (const file of record.releaseFiles) {
					if (file.status !== "Verified") continue;
					const ticket = await verifiers.submit({
						packageName: name,
						file,
						location: "stored",
						stagedPath: null,
						source: "existing",
						bytes: 0,
					});
					checks.push(
						ticket.result.then((outcome) => {
							const error = outcome.ok ? outcome.value.error : outcome.error;
							if (error === null) {
								this.emit({ type: "file", name, filename: file.filename, status: "verified" });
								return;
							}
							failed.add(name);
							run.errors.push(toErrorRecord(error, name, file.filename));
							this.logger.warn(`${name}: ${toErrorMessage(error)}`);
							this.emit({ type: "file", name, filename: file.filename, status: "failed" });
						}),
					);
				}
			}
			await Promise.all(checks);
			throwIfCancelled(runSignal.signal, runSignal.timedOut());
			this.enter("Finalizing");
			run.outcome = run.errors.length > 0 ? "PartialFailure" : "Success";
			await this.recordRun(run, state.currentSerial, state.currentSerial);
			this.enter("Done");
			return this.report(run, state, {
				fromSerial: state.currentSerial,
				target: state.targetSerial,
				failed: Array.from(failed).sort(),
			});
		} catch (error) {
			return this.fail(run, state, error, runSignal.timedOut(), {
				target: state?.targetSerial ?? 0,
				usedOverride: false,
				changesetMode: null,
			});
		} finally {
			await verifiers.close();
			runSignal.dispose();
		}
	}

	/**
	 * Removes packages from the mirror: release files, listings, metadata
	 * and records. The serial is left alone. A dry run writes nothing and
	 * reports the keys it would remove.
	 */
	async deletePackages(
		names: string[],
		options: DeletePackagesOptions = {},
	): Promise<SyncReport> {
		const run = this.startRun("delete");
		const dryRun = options.dryRun ?? false;
		let state: MirrorState | null = null;
		try {
			const targets = new Set(names.map(toSafeName));
			state = await readMirrorState(this.storage);
			this.enter("Committing");
			const deleted: string[] = [];
			const missing: string[] = [];
			for (const normalized of targets) {
				const record = await this.records.get(normalized);
				const keys = await this.storedKeys(normalized, record);
				if (keys.length === 0 && record === null) {
					this.logger.warn(`${normalized} is not in the mirror.`);
					missing.push(normalized);
					this.emit({ type: "package", name: normalized, status: "missing" });
					continue;
				}
				for (const key of keys) {
					this.logger.info(`${dryRun ? "Would delete" : "Deleting"} ${key}`);
					if (!dryRun) {
						await this.storage.delete(key);
					}
				}
				if (!dryRun) {
					await this.records.delete(normalized);
				}
				run.changedPaths.push(...keys);
				deleted.push(normalized);
				this.emit({ type: "package", name: normalized, status: "deleted" });
			}
			if (dryRun) {
				run.outcome = "Success";
				run.endTime = this.now().toISOString();
				this.enter("Done");
				return this.report(run, state, {
					fromSerial: state.currentSerial,
					target: state.targetSerial,
					committed: deleted,
					missing,
				});
			}
			this.enter("Indexing");
			if (this.config.rootIndex && deleted.length > 0) {
				const remaining = await this.records.names();
				run.changedPaths.push(
					...(await this.indexes.writeRoot(remaining, state.currentSerial)),
				);
			}
			this.enter("Finalizing");
			const now = this.now();
			const pending = new Set(
				Array.from(state.pendingPackages, (name) => normalizePackageName(name)),
			);
			let pendingChanged = false;
			for (const name of deleted) {
				pendingChanged = pending.delete(name) || pendingChanged;
			}
			const next: MirrorState = { ...state, pendingPackages: pending };
			if (pendingChanged) {
				await writeMirrorState(this.storage, next);
			}
			const diffFilePath = await this.writeDiff(run, now);
			run.outcome = "Success";
			await this.recordRun(run, state.currentSerial, state.currentSerial);
			this.enter("Done");
			return this.report(run, next, {
				fromSerial: state.currentSerial,
				target: state.targetSerial,
				committed: deleted,
				missing,
				diffFilePath,
			});
		} catch (error) {
			return this.fail(run, state, error, false, {
				target: state?.targetSerial ?? 0,
				usedOverride: false,
				changesetMode: null,
			});
		}
	}

	/**
	 * Web keys that belong to a package: its release files, listing
	 * directory and metadata document.
	 */
	private async storedKeys(normalizedName: string, record: PackageRecord | null) {
		const layout = getPackageLayout(normalizedName, this.config.hashIndex);
		const keys = new Set<string>();
		for (const file of record?.releaseFiles ?? []) {
			if (await this.storage.exists(file.localPath)) {
				keys.add(file.localPath);
			}
		}
		for (const key of await this.storage.list(layout.simpleDir)) {
			keys.add(key);
		}
		for (const key of await this.storage.list(path.posix.dirname(layout.metadataPath))) {
			keys.add(key);
		}
		return Array.from(keys).sort();
	}

	private async processBatch(
		packages: Map<string, ChangesetEntry>,
		run: SyncRun,
		signal: AbortSignal,
		serialCap: number,
	): Promise<BatchResult> {
		const stagingDir = path.join(this.config.directory, ".staging", run.runId);
		const verifiers = new VerifierPool({
			storage: this.storage,
			compareMethod: this.config.compareMethod,
			verifiers: this.config.verifiers,
			queueSize: this.config.verifyQueueSize,
			signal,
		});
		const downloads = new DownloadPool({
			client: this.client,
			storage: this.storage,
			stagingDir,
			workers: this.config.workers,
			retries: this.config.retries,
			retryBackoffMs: this.config.retryBackoffMs,
			downloadMirror: this.config.downloadMirror,
			mirrorOnly: this.config.downloadMirrorNoFallback,
			signal,
			logger: this.logger,
		});
		const context: BatchContext = {
			run,
			signal,
			downloads,
			verifiers,
			work: new Map(),
			failed: new Set(),
			missing: new Set(),
			serialCap,
			halted: false,
			fatal: null,
		};
		try {
			const settling: Array<Promise<void>> = [];
			try {
				this.enter("Downloading");
				await Promise.all(
					Array.from(packages, ([normalized, entry]) =>
						this.fetchPackage(context, normalized, entry, settling),
					),
				);
				this.enter("Verifying");
				await Promise.all(settling);
			} finally {
				await downloads.close();
				await verifiers.close();
			}
			if (context.fatal !== null) {
				throw context.fatal;
			}
			throwIfCancelled(signal, false);
			const failed = Array.from(context.failed).sort();
			const missing = Array.from(context.missing).sort();
			if (context.halted) {
				this.logger.error("Stopping after the first error; nothing was committed.");
				return { aborted: true, committed: [], failed, missing };
			}
			const ready = Array.from(context.work.values())
				.filter((work) => this.isReady(context, work))
				.sort((a, b) => a.normalizedName.localeCompare(b.normalizedName));

			this.enter("Committing");
			for (const work of ready) {
				await this.commitFiles(run, work);
			}
			this.enter("Indexing");
			for (const work of ready) {
				run.changedPaths.push(...(await this.indexes.write(work.record)));
				// The record goes last: a package whose listing was never written
				// must still look stale to the next full scan.
				await this.records.put(work.record);
				if (this.config.cleanup) {
					run.changedPaths.push(
						...(await cleanupLegacyDirectories(
							this.storage,
							work.entry.name,
							work.normalizedName,
							this.config.hashIndex,
						)),
					);
				}
				this.emit({ type: "package", name: work.normalizedName, status: "committed" });
			}
			return {
				aborted: false,
				committed: ready.map((work) => work.normalizedName),
				failed,
				missing,
			};
		} finally {
			await rm(stagingDir, { recursive: true, force: true });
		}
	}

	private isReady(context: BatchContext, work: PackageWork) {
		if (context.failed.has(work.normalizedName)) {
			return false;
		}
		return (
			!this.config.releaseFiles ||
			work.verified.size === work.record.releaseFiles.length
		);
	}

	private async fetchPackage(
		context: BatchContext,
		normalized: string,
		entry: ChangesetEntry,
		settling: Array<Promise<void>>,
	) {
		if (context.halted || context.signal.aborted) return;
		let work: PackageWork;
		try {
			const ticket = await context.downloads.submitMetadata(entry);
			const outcome = await ticket.result;
			if (!outcome.ok) {
				if (outcome.error instanceof PackageNotFoundError) {
					this.logger.warn(`${entry.name} no longer exists upstream; skipping.`);
					context.missing.add(normalized);
					this.emit({ type: "package", name: normalized, status: "missing" });
					return;
				}
				throw outcome.error;
			}
			const previous = await this.records.get(normalized);
			work = {
				entry,
				normalizedName: normalized,
				record: buildPackageRecord(outcome.value, entry, previous, context.serialCap),
				verified: new Map(),
			};
		} catch (error) {
			this.recordFailure(context, normalized, null, error);
			return;
		}
		context.work.set(normalized, work);
		if (!this.config.releaseFiles) return;
		for (const file of work.record.releaseFiles) {
			if (context.halted || context.signal.aborted) return;
			const dispatched = await this.dispatchFile(context, work, file, {});
			if (dispatched) {
				settling.push(dispatched.settled);
			}
		}
	}

	/**
	 * Queues a file download whose result is handed straight to the verifier
	 * pool. Resolves once queued, with a promise for the file's final outcome.
	 */
	private async dispatchFile(
		context: BatchContext,
		work: PackageWork,
		file: ReleaseFile,
		attempt: FileAttempt,
	): Promise<{ settled: Promise<void> } | null> {
		let ticket: Ticket<Ticket<VerifyResult>>;
		try {
			ticket = await context.downloads.submit(
				{ packageName: work.normalizedName, file, ...attempt },
				(result) => context.verifiers.submit(result),
			);
		} catch (error) {
			this.recordFailure(context, work.normalizedName, file.filename, error);
			return null;
		}
		return { settled: this.settleFile(context, work, file, attempt, ticket) };
	}

	private async settleFile(
		context: BatchContext,
		work: PackageWork,
		file: ReleaseFile,
		attempt: FileAttempt,
		ticket: Ticket<Ticket<VerifyResult>>,
	) {
		const downloaded = await ticket.result;
		if (!downloaded.ok) {
			this.recordFailure(context, work.normalizedName, file.filename, downloaded.error);
			return;
		}
		const checked = await downloaded.value.result;
		if (!checked.ok) {
			this.recordFailure(context, work.normalizedName, file.filename, checked.error);
			return;
		}
		const verification = checked.value;
		if (verification.ok) {
			work.verified.set(file.localPath, verification);
			this.emit({
				type: "file",
				name: work.normalizedName,
				filename: file.filename,
				status: "verified",
			});
			return;
		}
		const retry = this.nextAttempt(verification.download, attempt);
		if (retry && !context.halted && !context.signal.aborted) {
			this.logger.warn(
				`${verification.error?.message ?? "Verification failed."} Fetching ${file.filename} again${retry.forceMirror ? " from the download mirror" : ""}.`,
			);
			const next = await this.dispatchFile(context, work, file, retry);
			if (next) {
				await next.settled;
			}
			return;
		}
		this.recordFailure(
			context,
			work.normalizedName,
			file.filename,
			verification.error ?? new Error(`Verification of ${file.filename} failed.`),
		);
	}

	/**
	 * A stored copy that fails verification is downloaded again; a primary
	 * download that fails is fetched once more from the download mirror.
	 */
	private nextAttempt(download: DownloadResult, attempt: FileAttempt): FileAttempt | null {
		if (download.location === "stored" && !attempt.ignoreExisting) {
			return { ignoreExisting: true };
		}
		if (
			download.source === "primary" &&
			this.config.downloadMirror !== null &&
			!attempt.forceMirror
		) {
			return { ignoreExisting: true, forceMirror: true };
		}
		return null;
	}

	private recordFailure(
		context: BatchContext,
		packageName: string,
		filename: string | null,
		error: unknown,
	) {
		if (error instanceof CancelledError && (context.signal.aborted || context.halted)) {
			return;
		}
		const firstFailure = !context.failed.has(packageName);
		context.failed.add(packageName);
		context.run.errors.push(toErrorRecord(error, packageName, filename));
		this.logger.error(
			`${packageName}${filename ? ` (${filename})` : ""}: ${toErrorMessage(error)}`,
		);
		if (filename) {
			this.emit({ type: "file", name: packageName, filename, status: "failed" });
		}
		if (firstFailure) {
			this.emit({ type: "package", name: packageName, status: "failed" });
		}
		if (isFatalError(error)) {
			context.fatal ??= error;
			this.halt(context);
		} else if (this.config.stopOnError) {
			this.halt(context);
		}
	}

	/**
	 * Stops new work: jobs still waiting for a download worker are dropped,
	 * jobs already running drain.
	 */
	private halt(context: BatchContext) {
		if (context.halted) return;
		context.halted = true;
		context.downloads.cancelQueued();
	}

	/**
	 * Moves verified files and the metadata document into place. The listing
	 * and the record are written afterwards, so a listing never links to a
	 * missing file.
	 */
	private async commitFiles(run: SyncRun, work: PackageWork) {
		const releaseFiles: ReleaseFile[] = [];
		for (const file of work.record.releaseFiles) {
			if (!this.config.releaseFiles) {
				releaseFiles.push(file);
				continue;
			}
			const verification = work.verified.get(file.localPath);
			let stored = verification?.stored ?? null;
			const stagedPath = verification?.download.stagedPath ?? null;
			if (stagedPath !== null) {
				await this.storage.put(file.localPath, createReadStream(stagedPath));
				run.changedPaths.push(file.localPath);
				stored = await this.storage.stat(file.localPath);
			}
			releaseFiles.push({
				...file,
				status: "Verified",
				lastKnownSize: stored?.size ?? file.size,
				lastKnownMtime: stored?.mtimeMs ?? null,
			});
		}
		const record: PackageRecord = { ...work.record, releaseFiles };
		if (this.config.json && record.metadataBlob !== null) {
			const { metadataPath } = getPackageLayout(record.normalizedName, this.config.hashIndex);
			await this.storage.put(metadataPath, record.metadataBlob);
			run.changedPaths.push(metadataPath);
		}
		work.record = record;
	}

	private async finalize(
		run: SyncRun,
		state: MirrorState,
		batch: BatchResult,
		options: {
			target: number;
			advanceSerial: boolean;
			rootIndex: boolean;
			usedOverride: boolean;
			changesetMode: Changeset["mode"] | null;
		},
	): Promise<SyncReport> {
		if (batch.aborted) {
			run.outcome = "Aborted";
			await this.recordRun(run, state.currentSerial, options.target);
			this.enter("Failed");
			return this.report(run, state, {
				fromSerial: state.currentSerial,
				target: options.target,
				usedOverride: options.usedOverride,
				changesetMode: options.changesetMode,
				failed: batch.failed,
				missing: batch.missing,
			});
		}
		this.enter("Finalizing");
		if (options.rootIndex && batch.committed.length > 0) {
			const names = await this.records.names();
			run.changedPaths.push(...(await this.indexes.writeRoot(names, options.target)));
		}
		const pending = new Set(
			Array.from(state.pendingPackages, (name) => normalizePackageName(name)),
		);
		for (const name of [...batch.committed, ...batch.missing]) {
			pending.delete(name);
		}
		for (const name of batch.failed) {
			pending.add(name);
		}
		const now = this.now();
		const currentSerial =
			options.advanceSerial && batch.failed.length === 0
				? options.target
				: state.currentSerial;
		const next: MirrorState = {
			currentSerial,
			targetSerial: options.advanceSerial ? options.target : state.targetSerial,
			lastSyncTimestamp: now.toISOString(),
			pendingPackages: pending,
		};
		await writeMirrorState(this.storage, next);
		if (batch.failed.length > 0 && options.advanceSerial) {
			this.logger.warn(
				`Holding serial at ${currentSerial}; ${batch.failed.length} package(s) left pending.`,
			);
		}
		const diffFilePath = await this.writeDiff(run, now);
		run.outcome = run.errors.length > 0 ? "PartialFailure" : "Success";
		await this.recordRun(run, state.currentSerial, options.target);
		this.enter("Done");
		return this.report(run, next, {
			fromSerial: state.currentSerial,
			target: options.target,
			usedOverride: options.usedOverride,
			changesetMode: options.changesetMode,
			committed: batch.committed,
			failed: batch.failed,
			missing: batch.missing,
			diffFilePath,
		});
	}

	/**
	 * Nothing to do: no storage writes, only an empty diff file.
	 */
	private async finishUpToDate(
		run: SyncRun,
		state: MirrorState,
		changesetMode: Changeset["mode"] | null,
	) {
		this.enter("Finalizing");
		const diffFilePath = await this.writeDiff(run, this.now());
		run.outcome = "Success";
		run.endTime = this.now().toISOString();
		this.enter("Done");
		return this.report(run, state, {
			fromSerial: state.currentSerial,
			target: state.currentSerial,
			changesetMode,
			diffFilePath,
		});
	}

	private async fail(
		run: SyncRun,
		state: MirrorState | null,
		error: unknown,
		timedOut: boolean,
		options: {
			target: number;
			usedOverride: boolean;
			changesetMode: Changeset["mode"] | null;
		},
	): Promise<SyncReport> {
		const reported =
			error instanceof CancelledError && timedOut
				? new CancelledError("Run exceeded run-timeout.")
				: error;
		run.errors.push(toErrorRecord(reported));
		run.outcome = "Aborted";
		this.logger.error(toErrorMessage(reported));
		if (state) {
			try {
				await this.recordRun(run, state.currentSerial, options.target);
			} catch (logError) {
				this.logger.error(`Unable to record run: ${toErrorMessage(logError)}`);
			}
		}
		this.enter("Failed");
		const current = state ?? {
			currentSerial: 0,
			targetSerial: 0,
			lastSyncTimestamp: null,
			pendingPackages: new Set<string>(),
		};
		return this.report(run, current, {
			fromSerial: current.currentSerial,
			target: options.target,
			usedOverride: options.usedOverride,
			changesetMode: options.changesetMode,
		});
	}

	private async writeDiff(run: SyncRun, now: Date) {
		if (!this.config.diffFile) {
			return null;
		}
		const target = await writeDiffFile(
			this.config.diffFile,
			{ appendEpoch: this.config.diffAppendEpoch, now },
			run.changedPaths.map((key) => this.storage.describe(key)),
		);
		this.logger.debug(`Wrote diff file ${target}`);
		return target;
	}

	private async recordRun(run: SyncRun, fromSerial: number, toSerial: number) {
		run.endTime = this.now().toISOString();
		await appendRunLog(this.storage, {
			runId: run.runId,
			kind: run.kind,
			startTime: run.startTime,
			endTime: run.endTime,
			outcome: run.outcome ?? "Aborted",
			fromSerial,
			toSerial,
			changedCount: new Set(run.changedPaths).size,
			errors: run.errors.map((error) => ({
				packageName: error.packageName,
				message: error.message,
			})),
		});
	}

	private report(
		run: SyncRun,
		state: MirrorState,
		details: {
			fromSerial: number;
			target: number;
			usedOverride?: boolean;
			changesetMode?: Changeset["mode"] | null;
			committed?: string[];
			failed?: string[];
			missing?: string[];
			diffFilePath?: string | null;
		},
	): SyncReport {
		return {
			run,
			phase: this.currentPhase,
			fromSerial: details.fromSerial,
			targetSerial: details.target,
			state,
			changesetMode: details.changesetMode ?? null,
			usedOverride: details.usedOverride ?? false,
			committed: details.committed ?? [],
			failed: details.failed ?? [],
			missing: details.missing ?? [],
			diffFilePath: details.diffFilePath ?? null,
		};
	}

	private startRun(kind: RunKind): SyncRun {
		this.currentPhase = "Idle";
		return {
			runId: randomUUID(),
			kind,
			startTime: this.now().toISOString(),
			endTime: null,
			outcome: null,
			changedPaths: [],
			errors: [],
		};
	}

	private enter(phase: SyncPhase) {
		this.currentPhase = phase;
		this.logger.debug(`Phase: ${phase}`);
		this.emit({ type: "phase", phase });
	}

	private emit(event: SyncEvent) {
		this.deps.onEvent?.(event);
	}
}

const toSafeName = (name: string) => {
	try {
		assertSafePackageName(name, "package name");
	} catch (error) {
		throw new ConfigError(toErrorMessage(error));
	}
	return normalizePackageName(name);
};

const throwIfCancelled = (signal: AbortSignal, timedOut: boolean) => {
	if (signal.aborted) {
		throw new CancelledError(timedOut ? "Run exceeded run-timeout." : undefined);
	}
};
