import type { MirrorConfig } from "../config";
import { ConfigError } from "../errors";
import { FilesystemStorage } from "./filesystem";
import { type ObjectStoreClient, ObjectStoreStorage } from "./object-store";
import { S3ObjectStoreClient } from "./s3-client";
import type { StorageBackend } from "./types";

export { FilesystemStorage } from "./filesystem";
export {
	type ObjectHead,
	type ObjectStoreClient,
	ObjectStoreStorage,
} from "./object-store";
export { S3ObjectStoreClient } from "./s3-client";
export type { StorageBackend, StorageBody, StorageStat } from "./types";

/**
 * Picks the backend once at startup. `objectStoreClient` replaces the S3
 * client, e.g. with an in-process stand-in.
 */
export const createStorage = (
	config: MirrorConfig,
	deps: { objectStoreClient?: ObjectStoreClient } = {},
): StorageBackend => {
	switch (config.storageBackend) {
		case "filesystem":
			return new FilesystemStorage(config.directory);
		case "object-store": {
			const options = config.objectStore;
			if (!options) {
				throw new ConfigError(
					"storage-backend object-store requires an object-store section.",
				);
			}
			return new ObjectStoreStorage(
				deps.objectStoreClient ?? new S3ObjectStoreClient(options),
				{ prefix: options.prefix, bucket: options.bucket },
			);
		}
	}
};

export const readText = async (storage: StorageBackend, key: string) => {
	if (!(await storage.exists(key))) {
		return null;
	}
	const stream = await storage.get(key);
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
	}
	return Buffer.concat(chunks).toString("utf8");
};

export const readJson = async (storage: StorageBackend, key: string) => {
	const raw = await readText(storage, key);
	if (raw === null) {
		return null;
	}
	try {
		const parsed: unknown = JSON.parse(raw);
		return parsed;
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid JSON in ${key}: ${message}`);
	}
};

export const writeJson = async (
	storage: StorageBackend,
	key: string,
	value: unknown,
) => {
	await storage.put(key, `${JSON.stringify(value, null, 2)}\n`);
};

export const deletePrefix = async (storage: StorageBackend, prefix: string) => {
	const keys = await storage.list(prefix);
	for (const key of keys) {
		await storage.delete(key);
	}
	return keys;
};
