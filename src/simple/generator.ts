import path from "node:path";
import * as z from "zod";
import type { SimpleFormat } from "../config";
import { getPackageLayout, type PackageLayout, SIMPLE_DIR, shardFor } from "../paths";
import type { PackageRecord } from "../state/package-records";
import { readJson, type StorageBackend, writeJson } from "../storage";
import {
	renderHtml,
	renderJson,
	renderRootHtml,
	renderRootJson,
	type RootEntry,
} from "./render";

export type IndexFormat = "html" | "json";

export type IndexGeneratorOptions = {
	simpleFormat: SimpleFormat;
	/** Historical snapshots kept per format; 0 disables history. */
	keepIndexVersions: number;
	hashIndex: boolean;
	releaseFiles: boolean;
	now?: () => Date;
};

const PointerSchema = z.object({
	serial: z.number().int().min(0),
	generatedAt: z.string(),
	/** Storage key of the live body per format. */
	bodies: z.object({
		html: z.string().optional(),
		json: z.string().optional(),
	}),
});

export type IndexPointer = z.infer<typeof PointerSchema>;

export type IndexSnapshot = {
	packageName: string;
	key: string;
	format: IndexFormat;
	serialAtGeneration: number;
	/** Filesystem-safe form of the generation time. */
	generationTimestamp: string;
};

const SNAPSHOT_PATTERN = /^index_(\d+)_([0-9TZ-]+)\.(html|json)$/;

/** `2026-10-19T09:57:00.123Z` becomes `2026-10-19T09-57-00-123Z`. */
export const formatSnapshotStamp = (date: Date) =>
	date.toISOString().replace(/[:.]/g, "-");

export const snapshotFileName = (
	serial: number,
	stamp: string,
	format: IndexFormat,
) => `index_${serial}_${stamp}.${format}`;

export const parseSnapshotFileName = (fileName: string) => {
	const match = SNAPSHOT_PATTERN.exec(fileName);
	if (!match) {
		return null;
	}
	const [, serial, stamp, format] = match;
	if (serial === undefined || stamp === undefined) {
		return null;
	}
	return {
		serial: Number.parseInt(serial, 10),
		stamp,
		format: format === "json" ? ("json" as const) : ("html" as const),
	};
};

const compareSnapshots = (a: IndexSnapshot, b: IndexSnapshot) =>
	a.serialAtGeneration - b.serialAtGeneration ||
	(a.generationTimestamp < b.generationTimestamp
		? -1
		: a.generationTimestamp > b.generationTimestamp
			? 1
			: 0);

/**
 * Writes per-package simple indexes. With retention enabled the body being
 * replaced is copied into `versions/` first, the new body goes live with a
 * single atomic put, and history beyond the retention count is pruned.
 */
export class IndexGenerator {
	private readonly now: () => Date;

	constructor(
		private readonly storage: StorageBackend,
		private readonly options: IndexGeneratorOptions,
	) {
		this.now = options.now ?? (() => new Date());
	}

	get formats(): IndexFormat[] {
		switch (this.options.simpleFormat) {
			case "HTML":
				return ["html"];
			case "JSON":
				return ["json"];
			case "ALL":
				return ["html", "json"];
		}
	}

	layout(normalizedName: string) {
		return getPackageLayout(normalizedName, this.options.hashIndex);
	}

	render(record: PackageRecord) {
		const layout = this.layout(record.normalizedName);
		const renderOptions = {
			simpleDir: layout.simpleDir,
			releaseFiles: this.options.releaseFiles,
		};
		return {
			html: this.formats.includes("html") ? renderHtml(record, renderOptions) : null,
			json: this.formats.includes("json") ? renderJson(record, renderOptions) : null,
		};
	}

	/**
	 * Regenerates the listing for `record`. Returns every key written or
	 * deleted.
	 */
	async write(record: PackageRecord) {
		const layout = this.layout(record.normalizedName);
		const rendered = this.render(record);
		const changed = await this.preserveCurrent(record.normalizedName);
		const bodies: IndexPointer["bodies"] = {};
		for (const format of this.formats) {
			const body = format === "html" ? rendered.html : rendered.json;
			if (body === null) continue;
			const key = bodyKey(layout, format);
			await this.storage.put(key, body);
			bodies[format] = key;
			changed.push(key);
		}
		for (const format of (["html", "json"] as const).filter(
			(candidate) => !this.formats.includes(candidate),
		)) {
			const key = bodyKey(layout, format);
			if (await this.storage.exists(key)) {
				await this.storage.delete(key);
				changed.push(key);
			}
		}
		const pointer: IndexPointer = {
			serial: record.serial,
			generatedAt: this.now().toISOString(),
			bodies,
		};
		await writeJson(this.storage, layout.pointerPath, pointer);
		changed.push(layout.pointerPath);
		changed.push(...(await this.prune(record.normalizedName)));
		return changed;
	}

	async readPointer(normalizedName: string): Promise<IndexPointer | null> {
		const raw = await readJson(this.storage, this.layout(normalizedName).pointerPath);
		if (raw === null) {
			return null;
		}
		const parsed = PointerSchema.safeParse(raw);
		return parsed.success ? parsed.data : null;
	}

	/**
	 * Snapshots for a package, oldest first.
	 */
	async listSnapshots(normalizedName: string): Promise<IndexSnapshot[]> {
		const { versionsDir } = this.layout(normalizedName);
		const keys = await this.storage.list(versionsDir);
		const snapshots: IndexSnapshot[] = [];
		for (const key of keys) {
			if (path.posix.dirname(key) !== versionsDir) continue;
			const parsed = parseSnapshotFileName(path.posix.basename(key));
			if (!parsed) continue;
			snapshots.push({
				packageName: normalizedName,
				key,
				format: parsed.format,
				serialAtGeneration: parsed.serial,
				generationTimestamp: parsed.stamp,
			});
		}
		return snapshots.sort(compareSnapshots);
	}

	/**
	 * Makes a stored snapshot the current listing again. The listing it
	 * replaces is preserved like any other regeneration.
	 */
	async rollback(normalizedName: string, snapshotFile: string) {
		const layout = this.layout(normalizedName);
		const parsed = parseSnapshotFileName(path.posix.basename(snapshotFile));
		if (!parsed) {
			throw new Error(`Not an index snapshot: ${snapshotFile}`);
		}
		const source = `${layout.versionsDir}/${path.posix.basename(snapshotFile)}`;
		if (!(await this.storage.exists(source))) {
			throw new Error(`Snapshot ${source} does not exist.`);
		}
		const changed = await this.preserveCurrent(normalizedName);
		const target = bodyKey(layout, parsed.format);
		await this.storage.copy(source, target);
		changed.push(target);
		const previous = await this.readPointer(normalizedName);
		const pointer: IndexPointer = {
			serial: parsed.serial,
			generatedAt: this.now().toISOString(),
			bodies: { ...previous?.bodies, [parsed.format]: target },
		};
		await writeJson(this.storage, layout.pointerPath, pointer);
		changed.push(layout.pointerPath);
		changed.push(...(await this.prune(normalizedName)));
		return changed;
	}

	/**
	 * Writes `web/simple/index.html` and/or `index.json` listing every
	 * mirrored project.
	 */
	async writeRoot(normalizedNames: string[], serial: number) {
		const entries: RootEntry[] = [...normalizedNames].sort().map((name) => ({
			normalizedName: name,
			href: this.options.hashIndex ? `${shardFor(name)}/${name}/` : `${name}/`,
		}));
		const changed: string[] = [];
		if (this.formats.includes("html")) {
			const key = `${SIMPLE_DIR}/index.html`;
			await this.storage.put(key, renderRootHtml(entries));
			changed.push(key);
		}
		if (this.formats.includes("json")) {
			const key = `${SIMPLE_DIR}/index.json`;
			await this.storage.put(key, renderRootJson(entries, serial));
			changed.push(key);
		}
		return changed;
	}

	private async preserveCurrent(normalizedName: string) {
		const changed: string[] = [];
		if (this.options.keepIndexVersions <= 0) {
			return changed;
		}
		const layout = this.layout(normalizedName);
		const pointer = await this.readPointer(normalizedName);
		const serial = pointer?.serial ?? 0;
		let stamp: string | null = null;
		for (const format of ["html", "json"] as const) {
			const current = pointer ? pointer.bodies[format] : bodyKey(layout, format);
			if (current === undefined || !(await this.storage.exists(current))) continue;
			stamp ??= formatSnapshotStamp(
				pointer ? new Date(pointer.generatedAt) : this.now(),
			);
			const snapshot = await this.freeSnapshotKey(layout, serial, stamp, format);
			await this.storage.copy(current, snapshot);
			changed.push(snapshot);
		}
		return changed;
	}

	/** Suffixes the stamp when a snapshot with the same name already exists. */
	private async freeSnapshotKey(
		layout: PackageLayout,
		serial: number,
		stamp: string,
		format: IndexFormat,
	) {
		let key = `${layout.versionsDir}/${snapshotFileName(serial, stamp, format)}`;
		for (let suffix = 1; await this.storage.exists(key); suffix += 1) {
			key = `${layout.versionsDir}/${snapshotFileName(serial, `${stamp}-${suffix}`, format)}`;
		}
		return key;
	}

	private async prune(normalizedName: string) {
		const keep = Math.max(0, this.options.keepIndexVersions);
		const snapshots = await this.listSnapshots(normalizedName);
		const removed: string[] = [];
		for (const format of ["html", "json"] as const) {
			const ofFormat = snapshots.filter((snapshot) => snapshot.format === format);
			const excess = ofFormat.slice(0, Math.max(0, ofFormat.length - keep));
			for (const snapshot of excess) {
				await this.storage.delete(snapshot.key);
				removed.push(snapshot.key);
			}
		}
		return removed;
	}
}

const bodyKey = (layout: PackageLayout, format: IndexFormat) =>
	format === "html" ? layout.htmlPath : layout.jsonPath;
