import { randomBytes } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import {
	copyFile,
	mkdir,
	rename,
	rm,
	rmdir,
	stat,
	writeFile,
} from "node:fs/promises";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import fg from "fast-glob";
import { getErrnoCode, StorageError, toErrorMessage } from "../errors";
import { assertSafeKey, toPosixPath } from "../paths";
import type { StorageBackend, StorageBody, StorageStat } from "./types";

const TEMP_MARKER = ".tmp-";
const IGNORED_DIRS = [".staging/**"];

export class FilesystemStorage implements StorageBackend {
	readonly kind = "filesystem";

	constructor(private readonly root: string) {}

	resolve(key: string) {
		return path.join(this.root, assertSafeKey(key));
	}

	describe(key: string) {
		return toPosixPath(this.resolve(key));
	}

	async put(key: string, body: StorageBody) {
		const target = this.resolve(key);
		const temp = `${target}${TEMP_MARKER}${randomBytes(6).toString("hex")}`;
		try {
			await mkdir(path.dirname(target), { recursive: true });
			if (body instanceof Readable) {
				await pipeline(body, createWriteStream(temp));
			} else {
				await writeFile(temp, body);
			}
			await rename(temp, target);
		} catch (error) {
			await rm(temp, { force: true });
			throw new StorageError(
				`Failed to write ${key}: ${toErrorMessage(error)}`,
				key,
				{ cause: error },
			);
		}
	}

	async get(key: string) {
		const target = this.resolve(key);
		if (!(await this.stat(key))) {
			throw new StorageError(`Missing ${key}.`, key);
		}
		return createReadStream(target);
	}

	async exists(key: string) {
		return (await this.stat(key)) !== null;
	}

	async stat(key: string): Promise<StorageStat | null> {
		try {
			const info = await stat(this.resolve(key));
			if (!info.isFile()) {
				return null;
			}
			return { size: info.size, mtimeMs: info.mtimeMs };
		} catch (error) {
			const code = getErrnoCode(error);
			if (code === "ENOENT" || code === "ENOTDIR") {
				return null;
			}
			throw new StorageError(
				`Failed to stat ${key}: ${toErrorMessage(error)}`,
				key,
				{ cause: error },
			);
		}
	}

	async delete(key: string) {
		const target = this.resolve(key);
		try {
			await rm(target, { force: true });
		} catch (error) {
			throw new StorageError(
				`Failed to delete ${key}: ${toErrorMessage(error)}`,
				key,
				{ cause: error },
			);
		}
		await this.pruneEmptyParents(path.dirname(target));
	}

	async list(prefix: string) {
		const base = prefix ? assertSafeKey(prefix.replace(/\/+$/, "")) : "";
		const pattern = base ? `${fg.escapePath(base)}/**` : "**";
		const files = await fg(pattern, {
			cwd: this.root,
			dot: true,
			onlyFiles: true,
			followSymbolicLinks: false,
			ignore: IGNORED_DIRS,
		});
		return files
			.map(toPosixPath)
			.filter((file) => !file.includes(TEMP_MARKER))
			.sort();
	}

	async copy(from: string, to: string) {
		const source = this.resolve(from);
		const target = this.resolve(to);
		const temp = `${target}${TEMP_MARKER}${randomBytes(6).toString("hex")}`;
		try {
			await mkdir(path.dirname(target), { recursive: true });
			await copyFile(source, temp);
			await rename(temp, target);
		} catch (error) {
			await rm(temp, { force: true });
			throw new StorageError(
				`Failed to copy ${from} to ${to}: ${toErrorMessage(error)}`,
				to,
				{ cause: error },
			);
		}
	}

	private async pruneEmptyParents(directory: string) {
		const root = path.resolve(this.root);
		let current = path.resolve(directory);
		while (current.startsWith(root + path.sep)) {
			try {
				await rmdir(current);
			} catch (error) {
				const code = getErrnoCode(error);
				if (code === "ENOTEMPTY" || code === "EEXIST" || code === "ENOENT") {
					return;
				}
				throw error;
			}
			current = path.dirname(current);
		}
	}
}
