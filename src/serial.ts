import { ConsistencyError } from "./errors";
import { silentLogger, type Logger } from "./logger";
import type { UpstreamClient } from "./upstream/client";

export type Reconciliation = {
	/** Serial the run works towards. */
	serial: number;
	/** Set when `allow-upstream-serial-mismatch` accepted a discrepancy. */
	usedOverride: boolean;
	/** False when local state already matches upstream. */
	needsSync: boolean;
};

export type SerialTrackerOptions = {
	allowMismatch: boolean;
	logger?: Logger;
};

/**
 * Compares the local high-water mark with upstream and decides what a run
 * may commit to. The local serial only moves backwards under the override.
 */
export class SerialTracker {
	private readonly logger: Logger;

	constructor(
		private readonly client: Pick<UpstreamClient, "fetchSerial">,
		private readonly options: SerialTrackerOptions,
	) {
		this.logger = options.logger ?? silentLogger;
	}

	fetchUpstreamSerial(signal?: AbortSignal) {
		return this.client.fetchSerial(signal);
	}

	reconcile(local: number, upstream: number): Reconciliation {
		if (upstream === local) {
			return { serial: local, usedOverride: false, needsSync: false };
		}
		if (upstream > local) {
			return { serial: upstream, usedOverride: false, needsSync: true };
		}
		const message = `Upstream serial ${upstream} is behind local serial ${local}.`;
		if (!this.options.allowMismatch) {
			throw new ConsistencyError(
				`${message} Refusing to move backwards without allow-upstream-serial-mismatch.`,
				local,
				upstream,
			);
		}
		this.logger.warn(`${message} Adopting upstream serial.`);
		return { serial: upstream, usedOverride: true, needsSync: false };
	}

	/**
	 * Checks that the changelog covers everything up to `upstream`. Entries
	 * past `upstream` (written while the run started) raise the target.
	 */
	checkChangelog(
		local: number,
		upstream: number,
		changelogMax: number | null,
	): Reconciliation {
		const covered = changelogMax ?? local;
		if (covered >= upstream) {
			return { serial: covered, usedOverride: false, needsSync: true };
		}
		const message = `Changelog ends at serial ${covered} but upstream reports ${upstream}.`;
		if (!this.options.allowMismatch) {
			throw new ConsistencyError(message, local, upstream);
		}
		this.logger.warn(`${message} Continuing with upstream serial.`);
		return { serial: upstream, usedOverride: true, needsSync: true };
	}
}
