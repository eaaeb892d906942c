import { readJson, type StorageBackend, writeJson } from "../storage";
import { STATUS_PATH } from "../paths";

export type MirrorState = {
	currentSerial: number;
	targetSerial: number;
	lastSyncTimestamp: string | null;
	pendingPackages: ReadonlySet<string>;
};

type PersistedMirrorState = {
	version: 1;
	currentSerial: number;
	targetSerial: number;
	lastSyncTimestamp: string | null;
	pendingPackages: string[];
};

export const INITIAL_STATE: MirrorState = Object.freeze({
	currentSerial: 0,
	targetSerial: 0,
	lastSyncTimestamp: null,
	pendingPackages: new Set<string>(),
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const assertSerial = (value: unknown, label: string): number => {
	if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
		throw new Error(`${label} must be a non-negative integer.`);
	}
	return value;
};

export const validateMirrorState = (input: unknown): MirrorState => {
	if (!isRecord(input)) {
		throw new Error("Mirror state must be a JSON object.");
	}
	if (input.version !== 1) {
		throw new Error("Mirror state version must be 1.");
	}
	const lastSync = input.lastSyncTimestamp;
	if (lastSync !== null && typeof lastSync !== "string") {
		throw new Error("lastSyncTimestamp must be a string or null.");
	}
	const pending = input.pendingPackages;
	if (!Array.isArray(pending) || pending.some((name) => typeof name !== "string")) {
		throw new Error("pendingPackages must be an array of strings.");
	}
	return {
		currentSerial: assertSerial(input.currentSerial, "currentSerial"),
		targetSerial: assertSerial(input.targetSerial, "targetSerial"),
		lastSyncTimestamp: lastSync,
		pendingPackages: new Set(pending.filter((name): name is string => typeof name === "string")),
	};
};

export const readMirrorState = async (storage: StorageBackend) => {
	const raw = await readJson(storage, STATUS_PATH);
	if (raw === null) {
		return INITIAL_STATE;
	}
	try {
		return validateMirrorState(raw);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid mirror state at ${STATUS_PATH}: ${message}`);
	}
};

/**
 * Persists the state in a single atomic `put`.
 */
export const writeMirrorState = async (
	storage: StorageBackend,
	state: MirrorState,
) => {
	const persisted: PersistedMirrorState = {
		version: 1,
		currentSerial: state.currentSerial,
		targetSerial: state.targetSerial,
		lastSyncTimestamp: state.lastSyncTimestamp,
		pendingPackages: Array.from(state.pendingPackages).sort(),
	};
	await writeJson(storage, STATUS_PATH, persisted);
};
