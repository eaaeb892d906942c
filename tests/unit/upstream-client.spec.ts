import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	CancelledError,
	NetworkError,
	PackageNotFoundError,
	StalePageError,
} from "../../src/errors";
import { UpstreamClient } from "../../src/upstream/client";
import { FakeIndex, MASTER } from "../helpers/fake-index";

describe("UpstreamClient", () => {
	let index: FakeIndex;
	let client: UpstreamClient;

	beforeEach(() => {
		index = new FakeIndex();
		index.publish("alpha", [
			{ filename: "alpha-1.0.tar.gz", version: "1.0", content: "alpha one" },
		]);
		index.publish("Beta_Pkg", [
			{ filename: "Beta_Pkg-0.1.tar.gz", version: "0.1", content: "beta" },
		]);
		index.publish("alpha", [
			{ filename: "alpha-2.0.tar.gz", version: "2.0", content: "alpha two" },
		]);
		client = new UpstreamClient({
			master: `${MASTER}/`,
			timeoutMs: 5_000,
			globalTimeoutMs: 10_000,
			fetchFn: index.fetch,
		});
	});

	it("reads the upstream serial", async () => {
		expect(client.xmlrpcUrl).toBe("https://index.test/pypi");
		await expect(client.fetchSerial()).resolves.toBe(3);
	});

	it("keeps the highest serial per package from the changelog", async () => {
		const changed = await client.changedPackages(0);
		expect(Array.from(changed)).toEqual([
			["alpha", 3],
			["Beta_Pkg", 2],
		]);
		expect(Array.from(await client.changedPackages(2))).toEqual([["alpha", 3]]);
	});

	it("lists every package with its serial", async () => {
		const packages = await client.allPackages();
		expect(Object.fromEntries(packages)).toEqual({ alpha: 3, Beta_Pkg: 2 });
	});

	it("treats an empty package list as an error", async () => {
		const empty = new FakeIndex();
		const emptyClient = new UpstreamClient({
			master: MASTER,
			timeoutMs: 5_000,
			globalTimeoutMs: 10_000,
			fetchFn: empty.fetch,
		});
		await expect(emptyClient.allPackages()).rejects.toThrow(
			"Unable to get full list of packages.",
		);
	});

	it("surfaces changelog outages as network errors", async () => {
		index.changelogDown = true;
		const error = await client.changedPackages(1).catch((caught: unknown) => caught);
		expect(error).toBeInstanceOf(NetworkError);
		expect(error instanceof NetworkError ? error.status : null).toBe(503);
	});

	it("fetches package metadata with its serial", async () => {
		const result = await client.getPackageMetadata("Beta_Pkg", 2);
		expect(result.serial).toBe(2);
		expect(result.metadata.info.name).toBe("Beta_Pkg");
		expect(Object.keys(result.metadata.releases)).toEqual(["0.1"]);
		expect(JSON.parse(result.raw)).toEqual(index.metadata("Beta_Pkg"));
	});

	it("rejects metadata older than the required serial", async () => {
		index.staleSerial = 1;
		await expect(client.getPackageMetadata("alpha", 3)).rejects.toBeInstanceOf(
			StalePageError,
		);
		await expect(client.getPackageMetadata("alpha", null)).resolves.toMatchObject({
			serial: 1,
		});
	});

	it("maps 404 to PackageNotFoundError and other failures to NetworkError", async () => {
		await expect(client.getPackageMetadata("ghost", null)).rejects.toBeInstanceOf(
			PackageNotFoundError,
		);
		index.metadataFailures.set("alpha", 500);
		await expect(client.getPackageMetadata("alpha", null)).rejects.toThrow(
			"Upstream returned 500",
		);
	});

	it("raises CancelledError for an aborted signal", async () => {
		const controller = new AbortController();
		controller.abort();
		await expect(client.fetchSerial(controller.signal)).rejects.toBeInstanceOf(
			CancelledError,
		);
	});

	describe("downloadFile", () => {
		let root: string;

		beforeEach(async () => {
			root = await mkdtemp(path.join(tmpdir(), "index-mirror-client-"));
		});

		afterEach(async () => {
			await rm(root, { recursive: true, force: true });
		});

		it("streams the body to disk", async () => {
			const destination = path.join(root, "alpha.part");
			const bytes = await client.downloadFile(
				index.fileUrl("alpha", "alpha-2.0.tar.gz"),
				destination,
			);
			expect(bytes).toBe(9);
			expect(await readFile(destination, "utf8")).toBe("alpha two");
		});

		it("reports the status of failed downloads", async () => {
			const url = index.fileUrl("alpha", "alpha-1.0.tar.gz");
			index.fileFailures.set(url, 503);
			const error = await client
				.downloadFile(url, path.join(root, "x.part"))
				.catch((caught: unknown) => caught);
			expect(error).toBeInstanceOf(NetworkError);
			expect(error instanceof NetworkError ? error.status : null).toBe(503);
		});
	});
});
