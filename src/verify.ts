import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import type { Readable } from "node:stream";
import type { CompareMethod } from "./config";
import type { DownloadResult } from "./download";
import { IntegrityError } from "./errors";
import { type Ticket, WorkerPool } from "./pool/worker-pool";
import type { ReleaseFile } from "./state/package-records";
import type { StorageBackend, StorageStat } from "./storage";

export type VerifyResult = {
	download: DownloadResult;
	ok: boolean;
	error: IntegrityError | null;
	/** Stat of the stored copy for files verified in place. */
	stored: StorageStat | null;
};

export type VerifierPoolOptions = {
	storage: StorageBackend;
	compareMethod: CompareMethod;
	verifiers: number;
	/** Downloads waiting beyond this many hold their download worker. */
	queueSize: number;
	signal?: AbortSignal;
};

export const hashStream = async (stream: Readable) => {
	const hash = createHash("sha256");
	for await (const chunk of stream) {
		hash.update(chunk);
	}
	return hash.digest("hex");
};

export const hashFile = (filePath: string) => hashStream(createReadStream(filePath));

const sizeLabel = (size: number) => `size ${size}`;

/**
 * Stat comparison against the last values recorded for a stored file. Falls
 * back to the declared upstream size when nothing was recorded yet.
 */
export const statMatches = (file: ReleaseFile, current: StorageStat) => {
	const expectedSize = file.lastKnownSize ?? file.size;
	if (current.size !== expectedSize) {
		return false;
	}
	return file.lastKnownMtime === null || file.lastKnownMtime === current.mtimeMs;
};

/**
 * Checks downloaded and already-stored files against the upstream sha256
 * (`hash`) or recorded size and mtime (`stat`).
 */
export class VerifierPool {
	private readonly pool: WorkerPool;

	constructor(private readonly options: VerifierPoolOptions) {
		this.pool = new WorkerPool({
			name: "verify",
			concurrency: options.verifiers,
			queueSize: options.queueSize,
			signal: options.signal,
		});
	}

	get pending() {
		return this.pool.pending;
	}

	submit(download: DownloadResult): Promise<Ticket<VerifyResult>> {
		return this.pool.submit(() => this.verify(download));
	}

	async close() {
		await this.pool.close();
	}

	async verify(download: DownloadResult): Promise<VerifyResult> {
		return download.location === "staged" && download.stagedPath !== null
			? this.verifyStaged(download, download.stagedPath)
			: this.verifyStored(download);
	}

	private async verifyStaged(
		download: DownloadResult,
		stagedPath: string,
	): Promise<VerifyResult> {
		const { file } = download;
		if (this.options.compareMethod === "stat") {
			const info = await stat(stagedPath);
			return this.result(download, null, file.size, info.size, sizeLabel);
		}
		const actual = await hashFile(stagedPath);
		return this.compareHash(download, null, actual);
	}

	private async verifyStored(download: DownloadResult): Promise<VerifyResult> {
		const { file } = download;
		const { storage } = this.options;
		const current = await storage.stat(file.localPath);
		if (!current) {
			const error = new IntegrityError(
				storage.describe(file.localPath),
				file.upstreamHash,
				"missing",
			);
			return { download, ok: false, error, stored: null };
		}
		if (this.options.compareMethod === "stat") {
			if (statMatches(file, current)) {
				return { download, ok: true, error: null, stored: current };
			}
			const error = new IntegrityError(
				storage.describe(file.localPath),
				sizeLabel(file.lastKnownSize ?? file.size),
				sizeLabel(current.size),
			);
			return { download, ok: false, error, stored: current };
		}
		const actual = await hashStream(await storage.get(file.localPath));
		return this.compareHash(download, current, actual);
	}

	private compareHash(
		download: DownloadResult,
		stored: StorageStat | null,
		actual: string,
	) {
		return this.result(
			download,
			stored,
			download.file.upstreamHash,
			actual,
			(value) => value,
		);
	}

	private result<T>(
		download: DownloadResult,
		stored: StorageStat | null,
		expected: T,
		actual: T,
		describe: (value: T) => string,
	): VerifyResult {
		if (expected === actual) {
			return { download, ok: true, error: null, stored };
		}
		const location =
			download.stagedPath ?? this.options.storage.describe(download.file.localPath);
		return {
			download,
			ok: false,
			error: new IntegrityError(location, describe(expected), describe(actual)),
			stored,
		};
	}
}
