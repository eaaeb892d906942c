import { CancelledError, NetworkError, toErrorMessage } from "./errors";
import { silentLogger, type Logger } from "./logger";
import { normalizePackageName } from "./package-name";
import type { PackageRecordStore } from "./state/package-records";
import type { UpstreamClient } from "./upstream/client";

export type ChangesetEntry = {
	/** Name as upstream spells it. */
	name: string;
	/** Serial the metadata page must be at least at, when known. */
	serial: number | null;
};

export type Changeset = {
	/** Keyed by normalized name. */
	packages: Map<string, ChangesetEntry>;
	mode: "changelog" | "full-scan";
	/** Highest serial seen in the changelog or package list. */
	highestSerial: number | null;
};

export type ChangesetResolverOptions = {
	/** Serial ranges wider than this are resolved by a full scan. */
	maxRange: number;
	logger?: Logger;
};

const addEntry = (
	packages: Map<string, ChangesetEntry>,
	name: string,
	serial: number | null,
) => {
	const normalized = normalizePackageName(name);
	const existing = packages.get(normalized);
	if (
		!existing ||
		(serial !== null && (existing.serial === null || serial > existing.serial))
	) {
		packages.set(normalized, { name, serial });
	}
};

/**
 * Works out which packages changed between two serials, preferring the
 * incremental changelog and falling back to comparing the full package list
 * against local records.
 */
export class ChangesetResolver {
	private readonly logger: Logger;

	constructor(
		private readonly client: Pick<
			UpstreamClient,
			"changedPackages" | "allPackages"
		>,
		private readonly records: Pick<PackageRecordStore, "serials">,
		private readonly options: ChangesetResolverOptions,
	) {
		this.logger = options.logger ?? silentLogger;
	}

	async resolve(
		fromSerial: number,
		toSerial: number,
		signal?: AbortSignal,
	): Promise<Changeset> {
		if (fromSerial === 0) {
			this.logger.info("No local serial; scanning the full package list.");
			return this.fullScan(signal);
		}
		if (toSerial - fromSerial > this.options.maxRange) {
			this.logger.info(
				`Serial range ${fromSerial}..${toSerial} exceeds ${this.options.maxRange}; scanning the full package list.`,
			);
			return this.fullScan(signal);
		}
		let changed: Map<string, number>;
		try {
			changed = await this.client.changedPackages(fromSerial, signal);
		} catch (error) {
			if (error instanceof CancelledError || !(error instanceof NetworkError)) {
				throw error;
			}
			this.logger.warn(
				`Changelog unavailable (${toErrorMessage(error)}); scanning the full package list.`,
			);
			return this.fullScan(signal);
		}
		const packages = new Map<string, ChangesetEntry>();
		let highestSerial: number | null = null;
		for (const [name, serial] of changed) {
			addEntry(packages, name, serial);
			highestSerial = Math.max(highestSerial ?? 0, serial);
		}
		return { packages, mode: "changelog", highestSerial };
	}

	/**
	 * Every upstream package, whatever the local records say.
	 */
	listAll(signal?: AbortSignal) {
		return this.fullScan(signal, false);
	}

	private async fullScan(signal?: AbortSignal, compareRecords = true): Promise<Changeset> {
		const [upstream, local] = await Promise.all([
			this.client.allPackages(signal),
			compareRecords ? this.records.serials() : new Map<string, number>(),
		]);
		const packages = new Map<string, ChangesetEntry>();
		let highestSerial: number | null = null;
		for (const [name, serial] of upstream) {
			highestSerial = Math.max(highestSerial ?? 0, serial);
			const known = local.get(normalizePackageName(name));
			if (known === undefined || known < serial) {
				addEntry(packages, name, serial);
			}
		}
		return { packages, mode: "full-scan", highestSerial };
	}
}

/**
 * Adds packages left pending by an earlier run. Their serial is unknown, so
 * any metadata page is accepted for them.
 */
export const mergePending = (
	changeset: Changeset,
	pending: Iterable<string>,
): Changeset => {
	const packages = new Map(changeset.packages);
	for (const name of pending) {
		if (!packages.has(normalizePackageName(name))) {
			addEntry(packages, name, null);
		}
	}
	return { ...changeset, packages };
};
