import { mkdir, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { resolveDiffFilePath, RUNS_LOG_PATH } from "./paths";
import { readText, type StorageBackend } from "./storage";

export const formatDiffLines = (paths: Iterable<string>) => {
	const unique = Array.from(new Set(paths)).sort();
	return unique.length > 0 ? `${unique.join("\n")}\n` : "";
};

/**
 * Writes the list of changed locations for external sync tooling. The file
 * is always written, empty when nothing changed. Returns the path written.
 */
export const writeDiffFile = async (
	diffFile: string,
	options: { appendEpoch: boolean; now: Date },
	paths: Iterable<string>,
) => {
	const epochSeconds = Math.floor(options.now.getTime() / 1000);
	const target = resolveDiffFilePath(diffFile, options.appendEpoch, epochSeconds);
	await mkdir(path.dirname(target), { recursive: true });
	const temp = `${target}.tmp-${process.pid}`;
	await writeFile(temp, formatDiffLines(paths), "utf8");
	await rename(temp, target);
	return target;
};

export type RunLogEntry = {
	runId: string;
	kind: "mirror" | "sync" | "verify" | "delete";
	startTime: string;
	endTime: string;
	outcome: string;
	fromSerial: number;
	toSerial: number;
	changedCount: number;
	errors: Array<{ packageName: string | null; message: string }>;
};

export const RUN_LOG_LIMIT = 500;

/**
 * Appends one JSON line to `state/runs.jsonl`, keeping only the newest
 * `limit` runs.
 */
export const appendRunLog = async (
	storage: StorageBackend,
	entry: RunLogEntry,
	limit = RUN_LOG_LIMIT,
) => {
	const existing = (await readText(storage, RUNS_LOG_PATH)) ?? "";
	const lines = existing.split("\n").filter((line) => line.length > 0);
	lines.push(JSON.stringify(entry));
	await storage.put(RUNS_LOG_PATH, `${lines.slice(-Math.max(1, limit)).join("\n")}\n`);
};
