import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	INITIAL_STATE,
	readMirrorState,
	writeMirrorState,
} from "../../src/state/mirror-state";
import {
	type PackageRecord,
	PackageRecordStore,
	type ReleaseFile,
} from "../../src/state/package-records";
import { FilesystemStorage, readJson, writeJson } from "../../src/storage";

const releaseFile = (overrides: Partial<ReleaseFile> = {}): ReleaseFile => ({
	filename: "foo-1.0.tar.gz",
	sourceUrl: "https://files.test/packages/ab/cd/ef/foo-1.0.tar.gz",
	upstreamHash: "a".repeat(64),
	size: 10,
	localPath: "web/packages/ab/cd/ef/foo-1.0.tar.gz",
	status: "Verified",
	version: "1.0",
	uploadTime: null,
	requiresPython: null,
	yanked: false,
	lastKnownSize: 10,
	lastKnownMtime: 1_700_000_000_000,
	...overrides,
});

describe("mirror state", () => {
	let root: string;
	let storage: FilesystemStorage;

	beforeEach(async () => {
		root = await mkdtemp(path.join(tmpdir(), "index-mirror-state-"));
		storage = new FilesystemStorage(root);
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	it("starts from serial zero", async () => {
		expect(await readMirrorState(storage)).toBe(INITIAL_STATE);
	});

	it("persists pending packages sorted", async () => {
		await writeMirrorState(storage, {
			currentSerial: 100,
			targetSerial: 103,
			lastSyncTimestamp: "2026-10-19T12:00:00.000Z",
			pendingPackages: new Set(["zeta", "beta"]),
		});
		expect(await readJson(storage, "state/status.json")).toEqual({
			version: 1,
			currentSerial: 100,
			targetSerial: 103,
			lastSyncTimestamp: "2026-10-19T12:00:00.000Z",
			pendingPackages: ["beta", "zeta"],
		});
		const state = await readMirrorState(storage);
		expect(state.currentSerial).toBe(100);
		expect(Array.from(state.pendingPackages)).toEqual(["beta", "zeta"]);
	});

	it("rejects unknown state versions", async () => {
		await writeJson(storage, "state/status.json", { version: 2 });
		await expect(readMirrorState(storage)).rejects.toThrow(
			"Invalid mirror state at state/status.json: Mirror state version must be 1.",
		);
	});
});

describe("PackageRecordStore", () => {
	let root: string;
	let records: PackageRecordStore;

	beforeEach(async () => {
		root = await mkdtemp(path.join(tmpdir(), "index-mirror-records-"));
		records = new PackageRecordStore(new FilesystemStorage(root));
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	it("stores records without the metadata blob", async () => {
		const record: PackageRecord = {
			name: "Foo_Bar",
			normalizedName: "foo-bar",
			serial: 7,
			releaseFiles: [releaseFile()],
			metadataBlob: '{"info":{}}',
		};
		expect(await records.put(record)).toBe("state/packages/foo-bar.json");
		expect(await records.get("foo-bar")).toEqual({ ...record, metadataBlob: null });
		expect(await records.get("missing")).toBeNull();
	});

	it("lists names and serials", async () => {
		for (const [name, serial] of [
			["beta", 4],
			["alpha", 9],
		] as const) {
			await records.put({
				name,
				normalizedName: name,
				serial,
				releaseFiles: [],
				metadataBlob: null,
			});
		}
		expect(await records.names()).toEqual(["alpha", "beta"]);
		expect(Object.fromEntries(await records.serials())).toEqual({ alpha: 9, beta: 4 });
	});

	it("rejects malformed records", async () => {
		const storage = new FilesystemStorage(root);
		await writeJson(storage, "state/packages/bad.json", {
			version: 1,
			name: "bad",
			normalizedName: "bad",
			serial: -1,
			releaseFiles: [],
		});
		await expect(records.get("bad")).rejects.toThrow(
			"Invalid package record at state/packages/bad.json",
		);
	});
});
