import { mkdir, rm } from "node:fs/promises";
import path from "node:path";
import pRetry, { AbortError } from "p-retry";
import type { ChangesetEntry } from "./changeset";
import {
	CancelledError,
	MirrorError,
	NetworkError,
	PackageNotFoundError,
	toErrorMessage,
} from "./errors";
import { silentLogger, type Logger } from "./logger";
import { type Ticket, WorkerPool } from "./pool/worker-pool";
import type { ReleaseFile } from "./state/package-records";
import type { StorageBackend } from "./storage";
import type { PackageMetadataResult, UpstreamClient } from "./upstream/client";

export type DownloadSource = "primary" | "mirror" | "existing";

export type FileRequest = {
	/** Normalized package name. */
	packageName: string;
	file: ReleaseFile;
	/** Download even when the storage already holds the file. */
	ignoreExisting?: boolean;
	/** Fetch from the download mirror only. */
	forceMirror?: boolean;
};

export type DownloadResult = {
	packageName: string;
	file: ReleaseFile;
	/** `stored` means the file was already in the mirror and nothing was fetched. */
	location: "staged" | "stored";
	stagedPath: string | null;
	source: DownloadSource;
	bytes: number;
};

export type DownloadPoolOptions = {
	client: Pick<UpstreamClient, "downloadFile" | "getPackageMetadata">;
	storage: StorageBackend;
	/** Local directory fetched files are written to before verification. */
	stagingDir: string;
	workers: number;
	retries: number;
	retryBackoffMs: number;
	downloadMirror: string | null;
	/** Never fall back to the primary host. */
	mirrorOnly: boolean;
	signal?: AbortSignal;
	logger?: Logger;
};

const isPermanent = (error: unknown) => {
	if (error instanceof PackageNotFoundError) {
		return true;
	}
	if (!(error instanceof NetworkError) || error.status === undefined) {
		return false;
	}
	return (
		error.status >= 400 &&
		error.status < 500 &&
		error.status !== 408 &&
		error.status !== 429
	);
};

const isRetryable = (error: unknown) =>
	error instanceof MirrorError &&
	!error.fatal &&
	error.kind !== "package-not-found" &&
	error.kind !== "integrity";

/**
 * Fetches package metadata and release files with bounded concurrency.
 *
 * File attempts go primary, then the download mirror once, then back to the
 * primary with exponential backoff. A finished download is handed off from
 * inside the worker, so a full verification queue holds the worker and
 * throttles further downloads.
 */
export class DownloadPool {
	private readonly pool: WorkerPool;
	private readonly logger: Logger;
	private readonly mirror: string | null;
	private stagingReady: Promise<unknown> | null = null;
	private stagedCount = 0;

	constructor(private readonly options: DownloadPoolOptions) {
		this.logger = options.logger ?? silentLogger;
		this.mirror = options.downloadMirror?.replace(/\/+$/, "") ?? null;
		this.pool = new WorkerPool({
			name: "download",
			concurrency: options.workers,
			queueSize: options.workers * 2,
			signal: options.signal,
		});
	}

	get pending() {
		return this.pool.pending;
	}

	submitMetadata(entry: ChangesetEntry): Promise<Ticket<PackageMetadataResult>> {
		return this.pool.submit((signal) =>
			this.withRetries(`metadata for ${entry.name}`, signal, () =>
				this.options.client.getPackageMetadata(entry.name, entry.serial, signal),
			),
		);
	}

	submit<H>(
		request: FileRequest,
		handoff: (result: DownloadResult) => Promise<H>,
	): Promise<Ticket<H>> {
		return this.pool.submit(async (signal) => {
			const result = await this.fetchFile(request, signal);
			return handoff(result);
		});
	}

	/** Drops metadata and file jobs that have not started yet. */
	cancelQueued() {
		this.pool.cancelQueued();
	}

	async close() {
		await this.pool.close();
	}

	mirrorUrlFor(sourceUrl: string) {
		if (!this.mirror) {
			return null;
		}
		const { pathname } = new URL(sourceUrl);
		return `${this.mirror}${pathname}`;
	}

	private async fetchFile(
		request: FileRequest,
		signal: AbortSignal | undefined,
	): Promise<DownloadResult> {
		const { file, packageName } = request;
		if (
			!request.ignoreExisting &&
			(await this.options.storage.exists(file.localPath))
		) {
			return {
				packageName,
				file,
				location: "stored",
				stagedPath: null,
				source: "existing",
				bytes: 0,
			};
		}
		await this.ensureStagingDir();
		this.stagedCount += 1;
		// One staged file per attempt; equal digests from different entries must not share it.
		const stagedPath = path.join(
			this.options.stagingDir,
			`${file.upstreamHash}.${this.stagedCount}.part`,
		);
		const mirrorUrl = this.mirrorUrlFor(file.sourceUrl);
		const onlyMirror =
			mirrorUrl !== null && (this.options.mirrorOnly || request.forceMirror === true);
		const sourceFor = (attempt: number) => {
			if (mirrorUrl !== null && (onlyMirror || attempt === 2)) {
				return { source: "mirror" as const, url: mirrorUrl };
			}
			return { source: "primary" as const, url: file.sourceUrl };
		};
		let primaryGone = false;
		try {
			const fetched = await pRetry(
				async (attempt) => {
					const { source, url } = sourceFor(attempt);
					try {
						const bytes = await this.options.client.downloadFile(url, stagedPath, signal);
						return { source, bytes };
					} catch (error) {
						if (!isRetryable(error)) {
							throw new AbortError(toAbortable(error));
						}
						if (!isPermanent(error)) {
							throw error;
						}
						if (source === "primary") {
							primaryGone = true;
							if (mirrorUrl !== null && !onlyMirror && attempt === 1) {
								throw error;
							}
						} else if (!onlyMirror && !primaryGone) {
							throw error;
						}
						throw new AbortError(toAbortable(error));
					}
				},
				{
					retries: this.options.retries + (mirrorUrl !== null && !onlyMirror ? 1 : 0),
					minTimeout: this.options.retryBackoffMs,
					factor: 2,
					randomize: this.options.retryBackoffMs > 0,
					signal,
					onFailedAttempt: (error) => {
						this.logger.debug(
							`Attempt ${error.attemptNumber} for ${file.filename} failed: ${error.message}`,
						);
					},
				},
			);
			return {
				packageName,
				file,
				location: "staged",
				stagedPath,
				source: fetched.source,
				bytes: fetched.bytes,
			};
		} catch (error) {
			await rm(stagedPath, { force: true });
			if (signal?.aborted) {
				throw new CancelledError();
			}
			throw error;
		}
	}

	private async withRetries<T>(
		label: string,
		signal: AbortSignal | undefined,
		run: () => Promise<T>,
	): Promise<T> {
		try {
			return await pRetry(
				async () => {
					try {
						return await run();
					} catch (error) {
						if (!isRetryable(error) || isPermanent(error)) {
							throw new AbortError(toAbortable(error));
						}
						throw error;
					}
				},
				{
					retries: this.options.retries,
					minTimeout: this.options.retryBackoffMs,
					factor: 2,
					randomize: this.options.retryBackoffMs > 0,
					signal,
					onFailedAttempt: (error) => {
						this.logger.debug(
							`Attempt ${error.attemptNumber} for ${label} failed: ${error.message}`,
						);
					},
				},
			);
		} catch (error) {
			if (signal?.aborted) {
				throw new CancelledError();
			}
			throw error;
		}
	}

	private ensureStagingDir() {
		this.stagingReady ??= mkdir(this.options.stagingDir, { recursive: true });
		return this.stagingReady;
	}
}

const toAbortable = (error: unknown) =>
	error instanceof Error ? error : new Error(String(error));
