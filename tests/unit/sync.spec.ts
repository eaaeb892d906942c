import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { validateConfig } from "../../src/config";
import { resolveArtifactPath } from "../../src/paths";
import { readMirrorState, writeMirrorState } from "../../src/state/mirror-state";
import { FilesystemStorage } from "../../src/storage";
import { type SyncDeps, type SyncEvent, SyncCoordinator } from "../../src/sync";
import { FakeIndex, MASTER, MIRROR_HOST, sha256 } from "../helpers/fake-index";
import { MemoryObjectStore, recordWrites } from "../helpers/memory-store";

const NOW = new Date("2026-10-19T12:00:00.000Z");
const ALPHA = "alpha-1.0.tar.gz";

describe("SyncCoordinator", () => {
	let root: string;
	let directory: string;
	let diffFile: string;
	let index: FakeIndex;
	let storage: FilesystemStorage;

	const createCoordinator = (
		options: Record<string, unknown> = {},
		deps: SyncDeps = {},
	) => {
		const config = validateConfig(
			{
				directory: "mirror",
				master: MASTER,
				workers: 2,
				verifiers: 2,
				retries: 0,
				"retry-backoff-ms": 0,
				"diff-file": "diff.txt",
				...options,
			},
			root,
		);
		return new SyncCoordinator(config, { fetchFn: index.fetch, now: () => NOW, ...deps });
	};

	const alphaPath = (filename = ALPHA, content = "alpha one") =>
		resolveArtifactPath(index.fileUrl("alpha", filename), filename, sha256(content));

	const publishAlpha = () =>
		index.publish("alpha", [{ filename: ALPHA, version: "1.0", content: "alpha one" }]);

	const publishBeta = () =>
		index.publish("beta", [{ filename: "beta-1.0.tar.gz", version: "1.0", content: "beta one" }]);

	const betaPath = () =>
		resolveArtifactPath(
			index.fileUrl("beta", "beta-1.0.tar.gz"),
			"beta-1.0.tar.gz",
			sha256("beta one"),
		);

	const metadataRequests = () => index.requests.filter((url) => url.endsWith("/json"));

	const setState = (currentSerial: number) =>
		writeMirrorState(storage, {
			currentSerial,
			targetSerial: currentSerial,
			lastSyncTimestamp: null,
			pendingPackages: new Set(),
		});

	beforeEach(async () => {
		root = await mkdtemp(path.join(tmpdir(), "index-mirror-sync-"));
		directory = path.join(root, "mirror");
		diffFile = path.join(root, "diff.txt");
		index = new FakeIndex();
		storage = new FilesystemStorage(directory);
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	describe("runMirror", () => {
		it("mirrors every package on the first run", async () => {
			publishAlpha();
			index.publish("Beta_Pkg", [
				{ filename: "Beta_Pkg-1.0.tar.gz", version: "1.0", content: "beta one" },
			]);
			const events: SyncEvent[] = [];
			const report = await createCoordinator({}, { onEvent: (event) => events.push(event) }).runMirror();

			expect(report.run.outcome).toBe("Success");
			expect(report.changesetMode).toBe("full-scan");
			expect(report.committed).toEqual(["alpha", "beta-pkg"]);
			expect(report.targetSerial).toBe(2);
			expect(await readMirrorState(storage)).toEqual({
				currentSerial: 2,
				targetSerial: 2,
				lastSyncTimestamp: "2026-10-19T12:00:00.000Z",
				pendingPackages: new Set(),
			});
			expect(await readFile(path.join(directory, alphaPath()), "utf8")).toBe("alpha one");
			expect(existsSync(path.join(directory, "web/simple/alpha/index.html"))).toBe(true);
			expect(existsSync(path.join(directory, "web/simple/beta-pkg/index.json"))).toBe(true);
			expect(existsSync(path.join(directory, "web/simple/index.html"))).toBe(true);
			expect(existsSync(path.join(directory, ".staging", report.run.runId))).toBe(false);

			expect(
				events.flatMap((event) => (event.type === "phase" ? [event.phase] : [])),
			).toEqual([
				"FetchingSerial",
				"ResolvingChangeset",
				"Downloading",
				"Verifying",
				"Committing",
				"Indexing",
				"Finalizing",
				"Done",
			]);
			expect(events.filter((event) => event.type === "package")).toEqual([
				{ type: "package", name: "alpha", status: "committed" },
				{ type: "package", name: "beta-pkg", status: "committed" },
			]);
		});

		it("changes nothing when already up to date", async () => {
			publishAlpha();
			await createCoordinator().runMirror();
			const recorded = recordWrites(new FilesystemStorage(directory));
			const report = await createCoordinator({}, { storage: recorded.storage }).runMirror();

			expect(report.run.outcome).toBe("Success");
			expect(report.changesetMode).toBeNull();
			expect(report.diffFilePath).toBe(diffFile);
			expect(recorded.writes).toEqual([]);
			expect(await readFile(diffFile, "utf8")).toBe("");
		});

		it("lists every changed location in the diff file", async () => {
			publishAlpha();
			const report = await createCoordinator().runMirror();
			const expected = [
				alphaPath(),
				"web/simple/alpha/index.html",
				"web/simple/alpha/index.json",
				"web/simple/alpha/current.json",
				"web/simple/index.html",
				"web/simple/index.json",
			]
				.map((key) => storage.describe(key))
				.sort();
			expect(report.diffFilePath).toBe(diffFile);
			expect(await readFile(diffFile, "utf8")).toBe(`${expected.join("\n")}\n`);
		});

		it("refuses an upstream serial behind the local one", async () => {
			await setState(10);
			index.serial = 5;
			const report = await createCoordinator().runMirror();

			expect(report.run.outcome).toBe("Aborted");
			expect(report.phase).toBe("Failed");
			expect(report.run.errors[0]?.kind).toBe("consistency");
			expect((await readMirrorState(storage)).currentSerial).toBe(10);
		});

		it("adopts the upstream serial under the mismatch override", async () => {
			await setState(10);
			index.serial = 5;
			const report = await createCoordinator({
				"allow-upstream-serial-mismatch": true,
			}).runMirror();

			expect(report.run.outcome).toBe("Success");
			expect(report.usedOverride).toBe(true);
			const state = await readMirrorState(storage);
			expect(state.currentSerial).toBe(5);
			expect(state.targetSerial).toBe(5);
		});

		it("holds the serial and records pending packages on partial failure", async () => {
			await setState(100);
			index.serial = 100;
			publishAlpha();
			index.publish("beta", [{ filename: "beta-1.0.tar.gz", version: "1.0", content: "beta one" }]);
			index.publish("alpha", [{ filename: "alpha-2.0.tar.gz", version: "2.0", content: "alpha two" }]);
			index.metadataFailures.set("beta", 500);

			const report = await createCoordinator().runMirror();
			expect(report.run.outcome).toBe("PartialFailure");
			expect(report.changesetMode).toBe("changelog");
			expect(report.committed).toEqual(["alpha"]);
			expect(report.failed).toEqual(["beta"]);
			expect(report.run.errors).toHaveLength(1);
			expect(report.run.errors[0]).toMatchObject({
				packageName: "beta",
				filename: null,
				kind: "network",
			});
			expect(await readMirrorState(storage)).toEqual({
				currentSerial: 100,
				targetSerial: 103,
				lastSyncTimestamp: "2026-10-19T12:00:00.000Z",
				pendingPackages: new Set(["beta"]),
			});
			expect(report.run.changedPaths).toContain(alphaPath("alpha-2.0.tar.gz", "alpha two"));

			index.metadataFailures.delete("beta");
			const retry = await createCoordinator().runMirror();
			expect(retry.run.outcome).toBe("Success");
			expect(retry.committed).toEqual(["alpha", "beta"]);
			expect(await readMirrorState(storage)).toEqual({
				currentSerial: 103,
				targetSerial: 103,
				lastSyncTimestamp: "2026-10-19T12:00:00.000Z",
				pendingPackages: new Set(),
			});
		});

		it("commits nothing when stopping on the first error", async () => {
			publishAlpha();
			index.publish("beta", [{ filename: "beta-1.0.tar.gz", version: "1.0", content: "beta one" }]);
			index.metadataFailures.set("beta", 500);
			const coordinator = createCoordinator({ "stop-on-error": true });

			const report = await coordinator.runMirror();
			expect(report.run.outcome).toBe("Aborted");
			expect(report.committed).toEqual([]);
			expect(report.diffFilePath).toBeNull();
			expect(existsSync(diffFile)).toBe(false);
			expect(existsSync(path.join(directory, "state/status.json"))).toBe(false);
			expect(existsSync(path.join(directory, "web/simple/alpha"))).toBe(false);
			expect(await coordinator.records.names()).toEqual([]);
			expect(existsSync(path.join(directory, ".staging", report.run.runId))).toBe(false);

			const log = (await readFile(path.join(directory, "state/runs.jsonl"), "utf8"))
				.trim()
				.split("\n");
			expect(log).toHaveLength(1);
			expect(JSON.parse(log[0] ?? "{}")).toMatchObject({
				kind: "mirror",
				outcome: "Aborted",
				fromSerial: 0,
				toSerial: 2,
			});
		});

		it("stops fetching metadata after the first failure", async () => {
			const names = Array.from(
				{ length: 13 },
				(_, position) => `pkg-${String(position + 1).padStart(2, "0")}`,
			);
			for (const name of names) {
				index.publish(name, [
					{ filename: `${name}-1.0.tar.gz`, version: "1.0", content: `${name} one` },
				]);
			}
			index.metadataFailures.set("pkg-01", 500);

			const report = await createCoordinator({ workers: 1, "stop-on-error": true }).runMirror();
			expect(report.run.outcome).toBe("Aborted");
			expect(report.run.errors).toHaveLength(1);
			expect(report.failed).toEqual(["pkg-01"]);
			expect(metadataRequests()).toEqual([`${MASTER}/pypi/pkg-01/json`]);
		});

		it("commits nothing when a release file fails under stop-on-error", async () => {
			publishAlpha();
			publishBeta();
			index.fileFailures.set(index.fileUrl("alpha", ALPHA), 404);
			const coordinator = createCoordinator({ "stop-on-error": true });

			const report = await coordinator.runMirror();
			expect(report.run.outcome).toBe("Aborted");
			expect(report.committed).toEqual([]);
			expect(report.failed).toEqual(["alpha"]);
			expect(report.run.errors).toHaveLength(1);
			expect(report.run.errors[0]).toMatchObject({ packageName: "alpha", filename: ALPHA });
			expect(existsSync(path.join(directory, betaPath()))).toBe(false);
			expect(await coordinator.records.names()).toEqual([]);
			expect(existsSync(path.join(directory, "state/status.json"))).toBe(false);
		});

		it("leaves the state alone when storage fails and recovers on the next run", async () => {
			await setState(0);
			publishAlpha();
			const failing = recordWrites(new FilesystemStorage(directory), {
				failPuts: ["web/simple/alpha/index.html"],
			});
			const broken = createCoordinator({}, { storage: failing.storage });

			const first = await broken.runMirror();
			expect(first.run.outcome).toBe("Aborted");
			expect(first.phase).toBe("Failed");
			expect(first.run.errors[0]?.kind).toBe("storage");
			expect(await broken.records.names()).toEqual([]);
			expect(await readMirrorState(storage)).toEqual({
				currentSerial: 0,
				targetSerial: 0,
				lastSyncTimestamp: null,
				pendingPackages: new Set(),
			});

			const second = await createCoordinator().runMirror();
			expect(second.run.outcome).toBe("Success");
			expect(second.committed).toEqual(["alpha"]);
			expect((await readMirrorState(storage)).currentSerial).toBe(1);
			expect(existsSync(path.join(directory, "web/simple/alpha/index.html"))).toBe(true);
		});

		it("advances the serial when every listed package is already current", async () => {
			publishAlpha();
			await createCoordinator().runMirror();
			await setState(0);

			const report = await createCoordinator().runMirror();
			expect(report.run.outcome).toBe("Success");
			expect(report.changesetMode).toBe("full-scan");
			expect(report.committed).toEqual([]);
			expect((await readMirrorState(storage)).currentSerial).toBe(1);
		});

		it("caps record serials at the serial the run commits to", async () => {
			publishAlpha();
			let republished = false;
			const fetchFn: typeof fetch = async (input, init) => {
				const url =
					typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
				if (!republished && url === `${MASTER}/pypi/alpha/json`) {
					republished = true;
					index.publish("alpha", [
						{ filename: "alpha-2.0.tar.gz", version: "2.0", content: "alpha two" },
					]);
				}
				return index.fetch(input, init);
			};
			const coordinator = createCoordinator({}, { fetchFn });

			const report = await coordinator.runMirror();
			expect(report.run.outcome).toBe("Success");
			expect((await readMirrorState(storage)).currentSerial).toBe(1);
			expect((await coordinator.records.get("alpha"))?.serial).toBe(1);

			const next = await createCoordinator().runMirror();
			expect(next.committed).toEqual(["alpha"]);
			expect(next.state.currentSerial).toBe(2);
			expect((await coordinator.records.get("alpha"))?.serial).toBe(2);
		});

		it("scans the full package list when the changelog is unavailable", async () => {
			publishAlpha();
			await createCoordinator().runMirror();
			publishBeta();
			index.changelogDown = true;

			const report = await createCoordinator().runMirror();
			expect(report.run.outcome).toBe("Success");
			expect(report.changesetMode).toBe("full-scan");
			expect(report.committed).toEqual(["beta"]);
			expect((await readMirrorState(storage)).currentSerial).toBe(2);
		});

		it("rechecks every package with forceCheck", async () => {
			publishAlpha();
			await createCoordinator().runMirror();
			const before = metadataRequests().length;

			const report = await createCoordinator().runMirror({ forceCheck: true });
			expect(report.run.outcome).toBe("Success");
			expect(report.changesetMode).toBe("full-scan");
			expect(report.committed).toEqual(["alpha"]);
			expect(metadataRequests().length).toBe(before + 1);
		});

		it("aborts once the run exceeds run-timeout", async () => {
			const hang: typeof fetch = (_input, init) =>
				new Promise<Response>((_resolve, reject) => {
					init?.signal?.addEventListener("abort", () => reject(new Error("aborted")), {
						once: true,
					});
				});
			const report = await createCoordinator({ "run-timeout": 0.05 }, { fetchFn: hang }).runMirror();

			expect(report.run.outcome).toBe("Aborted");
			expect(report.phase).toBe("Failed");
			expect(report.run.errors[0]).toMatchObject({
				kind: "cancelled",
				message: "Run exceeded run-timeout.",
			});
			expect(existsSync(path.join(directory, "state/status.json"))).toBe(false);
		});

		it("falls back to the download mirror when the primary is missing a file", async () => {
			publishAlpha();
			index.fileFailures.set(index.fileUrl("alpha", ALPHA), 404);
			const report = await createCoordinator({ "download-mirror": MIRROR_HOST }).runMirror();

			expect(report.run.outcome).toBe("Success");
			expect(await readFile(path.join(directory, alphaPath()), "utf8")).toBe("alpha one");
			expect(index.requests).toContain(index.fileUrl("alpha", ALPHA, MIRROR_HOST));
			const lines = (await readFile(diffFile, "utf8")).trimEnd().split("\n");
			expect(lines.filter((line) => line === storage.describe(alphaPath()))).toHaveLength(1);
		});

		it("refetches a corrupt primary download from the mirror", async () => {
			publishAlpha();
			index.corruptFiles.add(index.fileUrl("alpha", ALPHA));
			const report = await createCoordinator({ "download-mirror": MIRROR_HOST }).runMirror();

			expect(report.run.outcome).toBe("Success");
			expect(await readFile(path.join(directory, alphaPath()), "utf8")).toBe("alpha one");
		});

		it("fails the package when a corrupt download has no mirror", async () => {
			publishAlpha();
			index.corruptFiles.add(index.fileUrl("alpha", ALPHA));
			const report = await createCoordinator().runMirror();

			expect(report.run.outcome).toBe("PartialFailure");
			expect(report.failed).toEqual(["alpha"]);
			expect(report.run.errors[0]).toMatchObject({
				packageName: "alpha",
				filename: ALPHA,
				kind: "integrity",
			});
			expect(existsSync(path.join(directory, alphaPath()))).toBe(false);
			expect(await readMirrorState(storage)).toEqual({
				currentSerial: 0,
				targetSerial: 1,
				lastSyncTimestamp: "2026-10-19T12:00:00.000Z",
				pendingPackages: new Set(["alpha"]),
			});
		});

		it("reports cancellation", async () => {
			publishAlpha();
			const controller = new AbortController();
			controller.abort();
			const report = await createCoordinator({}, { signal: controller.signal }).runMirror();

			expect(report.run.outcome).toBe("Aborted");
			expect(report.run.errors[0]?.kind).toBe("cancelled");
		});

		it("mirrors into an object store", async () => {
			publishAlpha();
			const store = new MemoryObjectStore();
			const report = await createCoordinator(
				{
					"storage-backend": "object-store",
					"object-store": { bucket: "test-bucket", prefix: "mirror" },
				},
				{ objectStoreClient: store },
			).runMirror();

			expect(report.run.outcome).toBe("Success");
			expect(store.text(`mirror/${alphaPath()}`)).toBe("alpha one");
			expect(JSON.parse(store.text("mirror/state/status.json") ?? "{}")).toMatchObject({
				currentSerial: 1,
			});
			expect(Array.from(store.objects.keys()).filter((key) => key.includes(".staging/"))).toEqual(
				[],
			);
			const lines = (await readFile(diffFile, "utf8")).trim().split("\n");
			expect(lines).toHaveLength(6);
			expect(lines.every((line) => line.startsWith("s3://test-bucket/mirror/"))).toBe(true);
		});
	});

	describe("syncPackages", () => {
		it("reports packages upstream no longer has", async () => {
			const report = await createCoordinator().syncPackages(["ghost"]);
			expect(report.run.outcome).toBe("Success");
			expect(report.missing).toEqual(["ghost"]);
			expect(report.committed).toEqual([]);
		});

		it("leaves the root index alone with skipRootIndex", async () => {
			publishAlpha();
			const report = await createCoordinator().syncPackages(["alpha"], { skipRootIndex: true });
			expect(report.committed).toEqual(["alpha"]);
			expect(existsSync(path.join(directory, "web/simple/alpha/index.html"))).toBe(true);
			expect(existsSync(path.join(directory, "web/simple/index.html"))).toBe(false);
		});

		it("rejects unsafe package names", async () => {
			const report = await createCoordinator().syncPackages(["../evil"]);
			expect(report.run.outcome).toBe("Aborted");
			expect(report.run.errors[0]?.kind).toBe("config");
		});
	});

	describe("deletePackages", () => {
		beforeEach(async () => {
			publishAlpha();
			publishBeta();
			await createCoordinator().runMirror();
		});

		it("removes files, listings and records", async () => {
			await writeMirrorState(storage, {
				currentSerial: 2,
				targetSerial: 2,
				lastSyncTimestamp: null,
				pendingPackages: new Set(["alpha"]),
			});
			const coordinator = createCoordinator();
			const report = await coordinator.deletePackages(["Alpha", "ghost"]);

			expect(report.run.kind).toBe("delete");
			expect(report.run.outcome).toBe("Success");
			expect(report.committed).toEqual(["alpha"]);
			expect(report.missing).toEqual(["ghost"]);
			expect(existsSync(path.join(directory, alphaPath()))).toBe(false);
			expect(existsSync(path.join(directory, "web/simple/alpha"))).toBe(false);
			expect(existsSync(path.join(directory, betaPath()))).toBe(true);
			expect(await coordinator.records.names()).toEqual(["beta"]);
			expect(await readMirrorState(storage)).toEqual({
				currentSerial: 2,
				targetSerial: 2,
				lastSyncTimestamp: null,
				pendingPackages: new Set(),
			});
			const root = await readFile(path.join(directory, "web/simple/index.html"), "utf8");
			expect(root).toContain('<a href="beta/">beta</a>');
			expect(root).not.toContain('<a href="alpha/">alpha</a>');
			const lines = (await readFile(diffFile, "utf8")).trimEnd().split("\n");
			expect(lines).toContain(storage.describe(alphaPath()));
			expect(lines).toContain(storage.describe("web/simple/alpha/index.html"));
			expect(lines).toContain(storage.describe("web/simple/index.html"));
		});

		it("only lists keys on a dry run", async () => {
			const recorded = recordWrites(new FilesystemStorage(directory));
			const coordinator = createCoordinator({}, { storage: recorded.storage });
			const report = await coordinator.deletePackages(["alpha"], { dryRun: true });

			expect(report.committed).toEqual(["alpha"]);
			expect(report.run.changedPaths).toContain(alphaPath());
			expect(report.diffFilePath).toBeNull();
			expect(recorded.writes).toEqual([]);
			expect(await coordinator.records.names()).toEqual(["alpha", "beta"]);
		});
	});

	describe("verifyMirror", () => {
		it("detects tampered files and repairs them on the next sync", async () => {
			publishAlpha();
			await createCoordinator().runMirror();
			await writeFile(path.join(directory, alphaPath()), "alpha ONE");

			const verified = await createCoordinator().verifyMirror();
			expect(verified.run.outcome).toBe("PartialFailure");
			expect(verified.failed).toEqual(["alpha"]);
			expect(verified.run.errors[0]).toMatchObject({
				packageName: "alpha",
				filename: ALPHA,
				kind: "integrity",
			});

			const repaired = await createCoordinator().syncPackages(["alpha"]);
			expect(repaired.run.outcome).toBe("Success");
			expect(repaired.committed).toEqual(["alpha"]);
			expect(await readFile(path.join(directory, alphaPath()), "utf8")).toBe("alpha one");
			expect((await readMirrorState(storage)).currentSerial).toBe(1);
		});
	});
});
