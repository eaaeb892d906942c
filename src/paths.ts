import path from "node:path";

export const WEB_DIR = "web";
export const SIMPLE_DIR = "web/simple";
export const JSON_DIR = "web/json";
export const PACKAGES_DIR = "web/packages";
export const STATE_DIR = "state";
export const STATUS_PATH = "state/status.json";
export const RECORDS_DIR = "state/packages";
export const RUNS_LOG_PATH = "state/runs.jsonl";
export const VERSIONS_DIR = "versions";
export const CURRENT_POINTER = "current.json";

export const toPosixPath = (value: string) => value.replace(/\\/g, "/");

/**
 * Storage keys are relative posix paths. Rejects anything that could escape
 * the mirror root.
 */
export const assertSafeKey = (key: string) => {
	const normalized = path.posix.normalize(toPosixPath(key));
	if (
		key.length === 0 ||
		normalized !== key ||
		normalized.startsWith("../") ||
		normalized === ".." ||
		path.posix.isAbsolute(normalized)
	) {
		throw new Error(`Security: Invalid storage path: ${key}`);
	}
	return normalized;
};

/**
 * Bucket for `hash-index` sharding: the first character of the normalized
 * name. This is a fixed contract; consumers locate `web/simple/<c>/<name>/`.
 */
export const shardFor = (normalizedName: string) => normalizedName.slice(0, 1);

export const getPackageLayout = (normalizedName: string, hashIndex: boolean) => {
	const simpleDir = hashIndex
		? `${SIMPLE_DIR}/${shardFor(normalizedName)}/${normalizedName}`
		: `${SIMPLE_DIR}/${normalizedName}`;
	return {
		simpleDir,
		htmlPath: `${simpleDir}/index.html`,
		jsonPath: `${simpleDir}/index.json`,
		pointerPath: `${simpleDir}/${CURRENT_POINTER}`,
		versionsDir: `${simpleDir}/${VERSIONS_DIR}`,
		metadataPath: `${JSON_DIR}/${normalizedName}/index.json`,
		recordPath: `${RECORDS_DIR}/${normalizedName}.json`,
	};
};

export type PackageLayout = ReturnType<typeof getPackageLayout>;

/**
 * Maps an upstream file URL onto the local packages tree, keeping the path
 * below `/packages/` so artifact locations mirror upstream.
 */
export const resolveArtifactPath = (
	fileUrl: string,
	filename: string,
	sha256: string,
) => {
	const { pathname } = new URL(fileUrl);
	const marker = "/packages/";
	const index = pathname.indexOf(marker);
	if (index !== -1) {
		const rest = decodeURIComponent(pathname.slice(index + marker.length));
		if (rest.length > 0) {
			return assertSafeKey(`${PACKAGES_DIR}/${rest}`);
		}
	}
	return assertSafeKey(
		`${PACKAGES_DIR}/${sha256.slice(0, 2)}/${sha256.slice(2, 4)}/${sha256.slice(4)}/${filename}`,
	);
};

/**
 * Relative href from a package's simple directory to an artifact.
 */
export const relativeHref = (fromDir: string, target: string) =>
	path.posix.relative(fromDir, target);

export const resolveDiffFilePath = (
	diffFile: string,
	appendEpoch: boolean,
	epochSeconds: number,
) => (appendEpoch ? `${diffFile}-${epochSeconds}` : diffFile);
