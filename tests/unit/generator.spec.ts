import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type SimpleFormat, validateConfig } from "../../src/config";
import { rollbackIndex } from "../../src/rollback";
import {
	formatSnapshotStamp,
	IndexGenerator,
	parseSnapshotFileName,
} from "../../src/simple/generator";
import type { PackageRecord } from "../../src/state/package-records";
import { FilesystemStorage, readJson, readText } from "../../src/storage";

const recordAt = (serial: number): PackageRecord => ({
	name: "Alpha",
	normalizedName: "alpha",
	serial,
	releaseFiles: [],
	metadataBlob: null,
});

const stamp = (second: number) =>
	formatSnapshotStamp(new Date(Date.UTC(2026, 0, 1, 0, 0, second)));

describe("IndexGenerator", () => {
	let root: string;
	let storage: FilesystemStorage;
	let tick: number;
	const now = () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));

	const generator = (
		options: Partial<{ simpleFormat: SimpleFormat; keepIndexVersions: number; hashIndex: boolean }> = {},
	) =>
		new IndexGenerator(storage, {
			simpleFormat: options.simpleFormat ?? "ALL",
			keepIndexVersions: options.keepIndexVersions ?? 0,
			hashIndex: options.hashIndex ?? false,
			releaseFiles: true,
			now,
		});

	beforeEach(async () => {
		root = await mkdtemp(path.join(tmpdir(), "index-mirror-index-"));
		storage = new FilesystemStorage(root);
		tick = 0;
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	it("writes both bodies and the pointer", async () => {
		const changed = await generator().write(recordAt(1));
		expect(changed).toEqual([
			"web/simple/alpha/index.html",
			"web/simple/alpha/index.json",
			"web/simple/alpha/current.json",
		]);
		expect(await readJson(storage, "web/simple/alpha/current.json")).toEqual({
			serial: 1,
			generatedAt: "2026-01-01T00:00:00.000Z",
			bodies: {
				html: "web/simple/alpha/index.html",
				json: "web/simple/alpha/index.json",
			},
		});
		expect(await storage.list("web/simple/alpha/versions")).toEqual([]);
	});

	it("shards listings with hash-index", async () => {
		const changed = await generator({ hashIndex: true, simpleFormat: "HTML" }).write(
			recordAt(1),
		);
		expect(changed).toEqual([
			"web/simple/a/alpha/index.html",
			"web/simple/a/alpha/current.json",
		]);
	});

	it("removes the body of a format that is no longer selected", async () => {
		await generator().write(recordAt(1));
		const changed = await generator({ simpleFormat: "HTML" }).write(recordAt(2));
		expect(changed).toContain("web/simple/alpha/index.json");
		expect(await storage.exists("web/simple/alpha/index.json")).toBe(false);
		expect(await storage.exists("web/simple/alpha/index.html")).toBe(true);
	});

	it("keeps the configured number of snapshots per format", async () => {
		const indexes = generator({ keepIndexVersions: 2 });
		for (const serial of [1, 2, 3, 4]) {
			await indexes.write(recordAt(serial));
		}
		const snapshots = await indexes.listSnapshots("alpha");
		expect(snapshots.map((snapshot) => path.posix.basename(snapshot.key))).toEqual([
			`index_2_${stamp(1)}.html`,
			`index_2_${stamp(1)}.json`,
			`index_3_${stamp(2)}.html`,
			`index_3_${stamp(2)}.json`,
		]);
		expect(snapshots[0]).toEqual({
			packageName: "alpha",
			key: `web/simple/alpha/versions/index_2_${stamp(1)}.html`,
			format: "html",
			serialAtGeneration: 2,
			generationTimestamp: stamp(1),
		});
		const preserved = await readText(storage, snapshots[2]?.key ?? "");
		expect(preserved?.trimEnd().split("\n").at(-1)).toBe("<!--SERIAL 3-->");
	});

	it("does not overwrite a snapshot taken in the same millisecond", async () => {
		const frozen = new Date(Date.UTC(2026, 0, 1));
		const indexes = new IndexGenerator(storage, {
			simpleFormat: "HTML",
			keepIndexVersions: 5,
			hashIndex: false,
			releaseFiles: true,
			now: () => frozen,
		});
		for (let round = 0; round < 3; round += 1) {
			await indexes.write(recordAt(1));
		}
		const names = (await indexes.listSnapshots("alpha")).map((snapshot) =>
			path.posix.basename(snapshot.key),
		);
		expect(names).toEqual([
			`index_1_${formatSnapshotStamp(frozen)}.html`,
			`index_1_${formatSnapshotStamp(frozen)}-1.html`,
		]);
	});

	it("preserves the bodies the pointer names", async () => {
		const indexes = generator({ simpleFormat: "HTML", keepIndexVersions: 2 });
		await indexes.write(recordAt(1));
		await storage.put("web/simple/alpha/index.json", "{}");
		const changed = await indexes.write(recordAt(2));
		expect(changed).toEqual([
			`web/simple/alpha/versions/index_1_${stamp(0)}.html`,
			"web/simple/alpha/index.html",
			"web/simple/alpha/index.json",
			"web/simple/alpha/current.json",
		]);
	});

	it("reports snapshot copies and pruned keys as changed", async () => {
		const indexes = generator({ simpleFormat: "HTML", keepIndexVersions: 1 });
		await indexes.write(recordAt(1));
		await indexes.write(recordAt(2));
		const changed = await indexes.write(recordAt(3));
		expect(changed).toEqual([
			`web/simple/alpha/versions/index_2_${stamp(1)}.html`,
			"web/simple/alpha/index.html",
			"web/simple/alpha/current.json",
			`web/simple/alpha/versions/index_1_${stamp(0)}.html`,
		]);
	});

	it("restores a snapshot and preserves the listing it replaces", async () => {
		const indexes = generator({ keepIndexVersions: 3 });
		for (const serial of [1, 2, 3]) {
			await indexes.write(recordAt(serial));
		}
		const changed = await indexes.rollback("alpha", `index_1_${stamp(0)}.html`);
		expect(changed).toEqual([
			`web/simple/alpha/versions/index_3_${stamp(2)}.html`,
			`web/simple/alpha/versions/index_3_${stamp(2)}.json`,
			"web/simple/alpha/index.html",
			"web/simple/alpha/current.json",
		]);
		const html = await readText(storage, "web/simple/alpha/index.html");
		expect(html?.trimEnd().split("\n").at(-1)).toBe("<!--SERIAL 1-->");
		expect(await indexes.readPointer("alpha")).toEqual({
			serial: 1,
			generatedAt: "2026-01-01T00:00:03.000Z",
			bodies: {
				html: "web/simple/alpha/index.html",
				json: "web/simple/alpha/index.json",
			},
		});
	});

	it("refuses unknown snapshots", async () => {
		const indexes = generator({ keepIndexVersions: 2 });
		await indexes.write(recordAt(1));
		await expect(indexes.rollback("alpha", "index_9_2026-01-01T00-00-00-000Z.html")).rejects.toThrow(
			"Snapshot web/simple/alpha/versions/index_9_2026-01-01T00-00-00-000Z.html does not exist.",
		);
		await expect(indexes.rollback("alpha", "current.json")).rejects.toThrow(
			"Not an index snapshot: current.json",
		);
	});

	it("writes root indexes sorted by name", async () => {
		const changed = await generator({ hashIndex: true }).writeRoot(["beta", "alpha"], 12);
		expect(changed).toEqual(["web/simple/index.html", "web/simple/index.json"]);
		const html = await readText(storage, "web/simple/index.html");
		expect(html?.split("\n").slice(7, 9)).toEqual([
			'    <a href="a/alpha/">alpha</a><br/>',
			'    <a href="b/beta/">beta</a><br/>',
		]);
	});

	it("lists and restores snapshots through rollbackIndex", async () => {
		const config = validateConfig(
			{ directory: root, keep_index_versions: 2, "simple-format": "HTML" },
			root,
		);
		const indexes = generator({ simpleFormat: "HTML", keepIndexVersions: 2 });
		await indexes.write(recordAt(1));
		await indexes.write(recordAt(2));
		const listed = await rollbackIndex(
			{ packageName: "Alpha", snapshot: null },
			{ config, storage, now },
		);
		expect(listed.packageName).toBe("alpha");
		expect(listed.restored).toBeNull();
		expect(listed.snapshots.map((snapshot) => snapshot.serialAtGeneration)).toEqual([1]);
		const restored = await rollbackIndex(
			{ packageName: "alpha", snapshot: `index_1_${stamp(0)}.html` },
			{ config, storage, now },
		);
		expect(restored.restored).toBe(`index_1_${stamp(0)}.html`);
		expect(restored.snapshots.map((snapshot) => snapshot.serialAtGeneration)).toEqual([
			1, 2,
		]);
	});
});

describe("parseSnapshotFileName", () => {
	it("parses serial, stamp and format", () => {
		expect(parseSnapshotFileName("index_12_2026-01-01T00-00-00-000Z.json")).toEqual({
			serial: 12,
			stamp: "2026-01-01T00-00-00-000Z",
			format: "json",
		});
		expect(parseSnapshotFileName("index.html")).toBeNull();
	});
});
