import type { Readable } from "node:stream";
import type { StorageBackendKind } from "../config";

export type StorageBody = Readable | Uint8Array | string;

export type StorageStat = {
	size: number;
	mtimeMs: number;
};

/**
 * Capability interface over the mirror tree. Keys are relative posix paths.
 *
 * `put` must be atomic for concurrent readers: content is staged under a
 * temporary name and moved into place in one step, so a reader sees either
 * the previous object or the complete new one.
 */
export interface StorageBackend {
	readonly kind: StorageBackendKind;
	put(key: string, body: StorageBody): Promise<void>;
	get(key: string): Promise<Readable>;
	exists(key: string): Promise<boolean>;
	stat(key: string): Promise<StorageStat | null>;
	delete(key: string): Promise<void>;
	list(prefix: string): Promise<string[]>;
	copy(from: string, to: string): Promise<void>;
	/** Human-readable location written to diff files. */
	describe(key: string): string;
}
