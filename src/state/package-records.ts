import * as z from "zod";
import { getPackageLayout, RECORDS_DIR } from "../paths";
import { readJson, type StorageBackend, writeJson } from "../storage";

export const ReleaseFileStatusSchema = z.enum([
	"Pending",
	"Downloaded",
	"Verified",
	"Failed",
]);

export const ReleaseFileSchema = z.object({
	filename: z.string().min(1),
	sourceUrl: z.string().url(),
	upstreamHash: z.string().regex(/^[a-f0-9]{64}$/),
	size: z.number().int().min(0),
	localPath: z.string().min(1),
	status: ReleaseFileStatusSchema,
	version: z.string(),
	uploadTime: z.string().nullable(),
	requiresPython: z.string().nullable(),
	yanked: z.union([z.boolean(), z.string()]),
	lastKnownSize: z.number().int().min(0).nullable(),
	lastKnownMtime: z.number().min(0).nullable(),
});

const PersistedRecordSchema = z.object({
	version: z.literal(1),
	name: z.string().min(1),
	normalizedName: z.string().min(1),
	serial: z.number().int().min(0),
	releaseFiles: z.array(ReleaseFileSchema),
});

export type ReleaseFileStatus = z.infer<typeof ReleaseFileStatusSchema>;
export type ReleaseFile = z.infer<typeof ReleaseFileSchema>;

export type PackageRecord = {
	/** Display name as upstream spells it. */
	name: string;
	normalizedName: string;
	serial: number;
	releaseFiles: ReleaseFile[];
	/** Raw upstream metadata document; only held in memory during a run. */
	metadataBlob: string | null;
};

/**
 * Package records live under `state/packages/<normalized>.json`. The metadata
 * blob is not persisted here; `web/json/<name>/index.json` carries it when the
 * `json` option is enabled.
 */
export class PackageRecordStore {
	constructor(private readonly storage: StorageBackend) {}

	async get(normalizedName: string): Promise<PackageRecord | null> {
		const key = getPackageLayout(normalizedName, false).recordPath;
		const raw = await readJson(this.storage, key);
		if (raw === null) {
			return null;
		}
		const parsed = PersistedRecordSchema.safeParse(raw);
		if (!parsed.success) {
			const details = parsed.error.issues
				.map((issue) => `${issue.path.join(".") || "record"} ${issue.message}`)
				.join("; ");
			throw new Error(`Invalid package record at ${key}: ${details}.`);
		}
		const { version: _version, ...record } = parsed.data;
		return { ...record, metadataBlob: null };
	}

	async put(record: PackageRecord) {
		const key = getPackageLayout(record.normalizedName, false).recordPath;
		await writeJson(this.storage, key, {
			version: 1,
			name: record.name,
			normalizedName: record.normalizedName,
			serial: record.serial,
			releaseFiles: record.releaseFiles,
		});
		return key;
	}

	/** Removes the record. Returns the key when one was deleted. */
	async delete(normalizedName: string) {
		const key = getPackageLayout(normalizedName, false).recordPath;
		if (!(await this.storage.exists(key))) {
			return null;
		}
		await this.storage.delete(key);
		return key;
	}

	async names() {
		const keys = await this.storage.list(RECORDS_DIR);
		return keys
			.filter((key) => key.endsWith(".json"))
			.map((key) => key.slice(RECORDS_DIR.length + 1, -".json".length))
			.filter((name) => !name.includes("/"));
	}

	/**
	 * Local serial per normalized package name, used by full reconciliation.
	 */
	async serials() {
		const serials = new Map<string, number>();
		for (const name of await this.names()) {
			const record = await this.get(name);
			if (record) {
				serials.set(name, record.serial);
			}
		}
		return serials;
	}
}
