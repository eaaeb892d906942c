import { access, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { ConfigError, toErrorMessage } from "../errors";
import {
	type CompareMethod,
	type MirrorOptions,
	MirrorOptionsSchema,
	type ObjectStoreOptions,
	type SimpleFormat,
	type StorageBackendKind,
} from "./schema";

export type {
	CompareMethod,
	MirrorOptions,
	ObjectStoreOptions,
	SimpleFormat,
	StorageBackendKind,
};

export const DEFAULT_CONFIG_FILENAME = "mirror.config.json";
export const DEFAULT_MASTER = "https://pypi.org";

/**
 * Validated, immutable run configuration. Durations are milliseconds.
 */
export type MirrorConfig = Readonly<{
	directory: string;
	json: boolean;
	releaseFiles: boolean;
	cleanup: boolean;
	master: string;
	timeoutMs: number;
	globalTimeoutMs: number;
	workers: number;
	verifiers: number;
	hashIndex: boolean;
	simpleFormat: SimpleFormat;
	stopOnError: boolean;
	allowUpstreamSerialMismatch: boolean;
	storageBackend: StorageBackendKind;
	keepIndexVersions: number;
	compareMethod: CompareMethod;
	downloadMirror: string | null;
	downloadMirrorNoFallback: boolean;
	diffFile: string | null;
	diffAppendEpoch: boolean;
	retries: number;
	retryBackoffMs: number;
	verifyQueueSize: number;
	changelogMaxRange: number;
	runTimeoutMs: number | null;
	rootIndex: boolean;
	objectStore: ObjectStoreOptions | null;
}>;

export const DEFAULT_OPTIONS = {
	json: false,
	"release-files": true,
	cleanup: false,
	master: DEFAULT_MASTER,
	timeout: 10,
	"global-timeout": 18000,
	workers: 3,
	verifiers: 3,
	"hash-index": false,
	"simple-format": "ALL",
	"stop-on-error": false,
	"allow-upstream-serial-mismatch": false,
	"storage-backend": "filesystem",
	keep_index_versions: 0,
	"compare-method": "hash",
	"download-mirror-no-fallback": false,
	"diff-append-epoch": false,
	retries: 3,
	"retry-backoff-ms": 1000,
	"changelog-max-range": 100000,
	"root-index": true,
} as const satisfies Omit<MirrorOptions, "directory">;

const isHttps = (value: string) => value.startsWith("https://");

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");

const assertCombinations = (options: MirrorOptions) => {
	const master = options.master ?? DEFAULT_MASTER;
	if (!isHttps(master)) {
		throw new ConfigError(`Master URL ${master} is not https scheme.`);
	}
	const mirror = options["download-mirror"];
	if (mirror && !isHttps(mirror)) {
		throw new ConfigError(`Download mirror ${mirror} is not https scheme.`);
	}
	if (options["download-mirror-no-fallback"] && !mirror) {
		throw new ConfigError(
			"download-mirror-no-fallback requires download-mirror to be set.",
		);
	}
	if (options["storage-backend"] === "object-store" && !options["object-store"]) {
		throw new ConfigError(
			"storage-backend object-store requires an object-store section.",
		);
	}
	if (options["diff-append-epoch"] && !options["diff-file"]) {
		throw new ConfigError("diff-append-epoch requires diff-file to be set.");
	}
	const timeout = options.timeout ?? DEFAULT_OPTIONS.timeout;
	const globalTimeout =
		options["global-timeout"] ?? DEFAULT_OPTIONS["global-timeout"];
	if (globalTimeout < timeout) {
		throw new ConfigError(
			`global-timeout (${globalTimeout}) must not be shorter than timeout (${timeout}).`,
		);
	}
};

/**
 * Validates raw options once and freezes them into a {@link MirrorConfig}.
 * Relative `directory` and `diff-file` paths resolve against `baseDir`.
 */
export const validateConfig = (
	input: unknown,
	baseDir: string = process.cwd(),
): MirrorConfig => {
	if (typeof input !== "object" || input === null || Array.isArray(input)) {
		throw new ConfigError("Config must be a JSON object.");
	}
	const parsed = MirrorOptionsSchema.safeParse(input);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "config"} ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Config does not match schema: ${details}.`);
	}
	const options = parsed.data;
	assertCombinations(options);
	const verifiers = options.verifiers ?? DEFAULT_OPTIONS.verifiers;
	const diffFile = options["diff-file"];
	const runTimeout = options["run-timeout"];
	const mirror = options["download-mirror"];
	return Object.freeze({
		directory: path.resolve(baseDir, options.directory),
		json: options.json ?? DEFAULT_OPTIONS.json,
		releaseFiles: options["release-files"] ?? DEFAULT_OPTIONS["release-files"],
		cleanup: options.cleanup ?? DEFAULT_OPTIONS.cleanup,
		master: trimTrailingSlash(options.master ?? DEFAULT_OPTIONS.master),
		timeoutMs: (options.timeout ?? DEFAULT_OPTIONS.timeout) * 1000,
		globalTimeoutMs:
			(options["global-timeout"] ?? DEFAULT_OPTIONS["global-timeout"]) * 1000,
		workers: options.workers ?? DEFAULT_OPTIONS.workers,
		verifiers,
		hashIndex: options["hash-index"] ?? DEFAULT_OPTIONS["hash-index"],
		simpleFormat: options["simple-format"] ?? DEFAULT_OPTIONS["simple-format"],
		stopOnError: options["stop-on-error"] ?? DEFAULT_OPTIONS["stop-on-error"],
		allowUpstreamSerialMismatch:
			options["allow-upstream-serial-mismatch"] ??
			DEFAULT_OPTIONS["allow-upstream-serial-mismatch"],
		storageBackend:
			options["storage-backend"] ?? DEFAULT_OPTIONS["storage-backend"],
		keepIndexVersions:
			options.keep_index_versions ?? DEFAULT_OPTIONS.keep_index_versions,
		compareMethod:
			options["compare-method"] ?? DEFAULT_OPTIONS["compare-method"],
		downloadMirror: mirror ? trimTrailingSlash(mirror) : null,
		downloadMirrorNoFallback:
			options["download-mirror-no-fallback"] ??
			DEFAULT_OPTIONS["download-mirror-no-fallback"],
		diffFile: diffFile ? path.resolve(baseDir, diffFile) : null,
		diffAppendEpoch:
			options["diff-append-epoch"] ?? DEFAULT_OPTIONS["diff-append-epoch"],
		retries: options.retries ?? DEFAULT_OPTIONS.retries,
		retryBackoffMs:
			options["retry-backoff-ms"] ?? DEFAULT_OPTIONS["retry-backoff-ms"],
		verifyQueueSize: options["verify-queue-size"] ?? verifiers * 2,
		changelogMaxRange:
			options["changelog-max-range"] ?? DEFAULT_OPTIONS["changelog-max-range"],
		runTimeoutMs: runTimeout ? runTimeout * 1000 : null,
		rootIndex: options["root-index"] ?? DEFAULT_OPTIONS["root-index"],
		objectStore: options["object-store"] ?? null,
	});
};

export const resolveConfigPath = (configPath?: string) =>
	configPath
		? path.resolve(configPath)
		: path.resolve(process.cwd(), DEFAULT_CONFIG_FILENAME);

export const configExists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

export const loadConfig = async (configPath?: string) => {
	const resolvedPath = resolveConfigPath(configPath);
	let raw: string;
	try {
		raw = await readFile(resolvedPath, "utf8");
	} catch (error) {
		throw new ConfigError(
			`Failed to read config at ${resolvedPath}: ${toErrorMessage(error)}`,
		);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new ConfigError(
			`Invalid JSON in ${resolvedPath}: ${toErrorMessage(error)}`,
		);
	}
	return {
		config: validateConfig(parsed, path.dirname(resolvedPath)),
		resolvedPath,
	};
};

export const buildExampleOptions = (
	overrides: Partial<MirrorOptions> & { directory: string },
): MirrorOptions => ({
	master: DEFAULT_MASTER,
	timeout: DEFAULT_OPTIONS.timeout,
	"global-timeout": DEFAULT_OPTIONS["global-timeout"],
	workers: DEFAULT_OPTIONS.workers,
	verifiers: DEFAULT_OPTIONS.verifiers,
	json: DEFAULT_OPTIONS.json,
	"release-files": DEFAULT_OPTIONS["release-files"],
	"simple-format": DEFAULT_OPTIONS["simple-format"],
	"stop-on-error": DEFAULT_OPTIONS["stop-on-error"],
	"compare-method": DEFAULT_OPTIONS["compare-method"],
	keep_index_versions: DEFAULT_OPTIONS.keep_index_versions,
	...overrides,
});

export const writeConfig = async (configPath: string, options: MirrorOptions) => {
	const data = `${JSON.stringify(options, null, 2)}\n`;
	await writeFile(configPath, data, "utf8");
};
