import { JSON_DIR, SIMPLE_DIR, shardFor } from "./paths";
import { deletePrefix, type StorageBackend } from "./storage";

/**
 * Directories older releases wrote under the raw upstream spelling of a
 * package name, e.g. `web/simple/Foo_Bar/` next to `web/simple/foo-bar/`.
 */
export const legacyDirectories = (
	name: string,
	normalizedName: string,
	hashIndex: boolean,
) => {
	// A case-only difference resolves to the live directory on
	// case-insensitive filesystems.
	if (
		name.toLowerCase() === normalizedName ||
		name.includes("/") ||
		name.startsWith(".")
	) {
		return [];
	}
	const simple = hashIndex
		? `${SIMPLE_DIR}/${shardFor(name)}/${name}`
		: `${SIMPLE_DIR}/${name}`;
	return [simple, `${JSON_DIR}/${name}`];
};

/**
 * Removes legacy directories for a package. Returns the deleted keys.
 */
export const cleanupLegacyDirectories = async (
	storage: StorageBackend,
	name: string,
	normalizedName: string,
	hashIndex: boolean,
) => {
	const removed: string[] = [];
	for (const directory of legacyDirectories(name, normalizedName, hashIndex)) {
		removed.push(...(await deletePrefix(storage, directory)));
	}
	return removed;
};
