import { randomUUID } from "node:crypto";
import type { Readable } from "node:stream";
import { StorageError, toErrorMessage } from "../errors";
import { assertSafeKey } from "../paths";
import type { StorageBackend, StorageBody, StorageStat } from "./types";

export type ObjectHead = {
	size: number;
	lastModifiedMs: number;
};

export type ObjectBody = Readable | Uint8Array;

/**
 * Minimal object-store surface. Implementations return `null` for missing
 * objects instead of throwing. Bodies are streamed both ways so release
 * files never have to fit in memory.
 */
export interface ObjectStoreClient {
	putObject(key: string, body: ObjectBody): Promise<void>;
	getObject(key: string): Promise<Readable | null>;
	headObject(key: string): Promise<ObjectHead | null>;
	deleteObject(key: string): Promise<void>;
	listObjects(prefix: string): Promise<string[]>;
	copyObject(from: string, to: string): Promise<void>;
}

const STAGING_PREFIX = ".staging/";

const toObjectBody = (body: StorageBody): ObjectBody =>
	typeof body === "string" ? new TextEncoder().encode(body) : body;

/**
 * Storage over a remote object store. Objects are uploaded to a staging key
 * and finalized with a server-side copy, so readers of the final key never see
 * a partial upload.
 */
export class ObjectStoreStorage implements StorageBackend {
	readonly kind = "object-store";
	private readonly prefix: string;
	private readonly bucket: string;

	constructor(
		private readonly client: ObjectStoreClient,
		options: { prefix?: string; bucket?: string } = {},
	) {
		const prefix = (options.prefix ?? "").replace(/^\/+|\/+$/g, "");
		this.prefix = prefix ? `${prefix}/` : "";
		this.bucket = options.bucket ?? "mirror";
	}

	private objectKey(key: string) {
		return `${this.prefix}${assertSafeKey(key)}`;
	}

	describe(key: string) {
		return `s3://${this.bucket}/${this.objectKey(key)}`;
	}

	async put(key: string, body: StorageBody) {
		const finalKey = this.objectKey(key);
		const stagingKey = `${this.prefix}${STAGING_PREFIX}${randomUUID()}`;
		try {
			await this.client.putObject(stagingKey, toObjectBody(body));
			await this.client.copyObject(stagingKey, finalKey);
			await this.client.deleteObject(stagingKey);
		} catch (error) {
			try {
				await this.client.deleteObject(stagingKey);
			} catch {
				// Ignore cleanup errors to preserve root cause.
			}
			throw new StorageError(
				`Failed to upload ${key}: ${toErrorMessage(error)}`,
				key,
				{ cause: error },
			);
		}
	}

	async get(key: string) {
		const stream = await this.wrap(key, "read", () =>
			this.client.getObject(this.objectKey(key)),
		);
		if (!stream) {
			throw new StorageError(`Missing ${key}.`, key);
		}
		return stream;
	}

	async exists(key: string) {
		return (await this.stat(key)) !== null;
	}

	async stat(key: string): Promise<StorageStat | null> {
		const head = await this.wrap(key, "stat", () =>
			this.client.headObject(this.objectKey(key)),
		);
		return head ? { size: head.size, mtimeMs: head.lastModifiedMs } : null;
	}

	async delete(key: string) {
		await this.wrap(key, "delete", () =>
			this.client.deleteObject(this.objectKey(key)),
		);
	}

	async list(prefix: string) {
		const base = prefix ? assertSafeKey(prefix.replace(/\/+$/, "")) : "";
		const keys = await this.wrap(prefix, "list", () =>
			this.client.listObjects(base ? `${this.prefix}${base}/` : this.prefix),
		);
		return keys
			.map((key) => key.slice(this.prefix.length))
			.filter((key) => !key.startsWith(STAGING_PREFIX))
			.sort();
	}

	async copy(from: string, to: string) {
		await this.wrap(to, "copy", () =>
			this.client.copyObject(this.objectKey(from), this.objectKey(to)),
		);
	}

	private async wrap<T>(key: string, action: string, run: () => Promise<T>) {
		try {
			return await run();
		} catch (error) {
			throw new StorageError(
				`Failed to ${action} ${key}: ${toErrorMessage(error)}`,
				key,
				{ cause: error },
			);
		}
	}
}
