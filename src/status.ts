import pc from "picocolors";
import { ui } from "./cli/ui";
import { type MirrorConfig, loadConfig } from "./config";
import { RUNS_LOG_PATH } from "./paths";
import { readMirrorState } from "./state/mirror-state";
import { PackageRecordStore } from "./state/package-records";
import { createStorage, readText, type StorageBackend } from "./storage";

type StatusOptions = {
	configPath?: string;
};

type StatusDeps = {
	storage?: StorageBackend;
	config?: MirrorConfig;
};

const lastRun = (log: string | null) => {
	const lines = (log ?? "").split("\n").filter((line) => line.trim().length > 0);
	const last = lines.at(-1);
	if (!last) {
		return null;
	}
	try {
		const parsed: unknown = JSON.parse(last);
		if (typeof parsed !== "object" || parsed === null) {
			return null;
		}
		const outcome = "outcome" in parsed ? parsed.outcome : null;
		const endTime = "endTime" in parsed ? parsed.endTime : null;
		return {
			outcome: typeof outcome === "string" ? outcome : null,
			endTime: typeof endTime === "string" ? endTime : null,
		};
	} catch {
		return null;
	}
};

export const getStatus = async (options: StatusOptions, deps: StatusDeps = {}) => {
	const config = deps.config ?? (await loadConfig(options.configPath)).config;
	const storage = deps.storage ?? createStorage(config);
	const state = await readMirrorState(storage);
	const packageCount = (await new PackageRecordStore(storage).names()).length;
	return {
		directory: config.directory,
		storageBackend: config.storageBackend,
		master: config.master,
		currentSerial: state.currentSerial,
		targetSerial: state.targetSerial,
		lastSyncTimestamp: state.lastSyncTimestamp,
		pendingPackages: Array.from(state.pendingPackages).sort(),
		packageCount,
		lastRun: lastRun(await readText(storage, RUNS_LOG_PATH)),
	};
};

export type MirrorStatus = Awaited<ReturnType<typeof getStatus>>;

export const printStatus = (status: MirrorStatus) => {
	ui.header("Mirror", `${ui.path(status.directory)} (${status.storageBackend})`);
	ui.header("Upstream", status.master);
	ui.header("Serial", ui.serial(status.currentSerial, status.targetSerial));
	ui.header("Packages", String(status.packageCount));
	ui.header("Last sync", status.lastSyncTimestamp ?? "never");
	if (status.lastRun?.outcome) {
		ui.header("Last run", `${status.lastRun.outcome} ${pc.dim(status.lastRun.endTime ?? "")}`);
	}
	if (status.pendingPackages.length > 0) {
		ui.line(ui.pending(status.pendingPackages));
	}
};
