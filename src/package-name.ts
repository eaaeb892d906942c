const INVALID_NAME_PATTERN = /[<>:"/\\|?*\s]/;
const SEPARATOR_RUN = /[-_.]+/g;
const MAX_NAME_LENGTH = 200;

/**
 * Canonical index name: case-folded, with every run of `-`, `_` and `.`
 * collapsed into a single `-`.
 */
export const normalizePackageName = (name: string) =>
	name.toLowerCase().replace(SEPARATOR_RUN, "-");

export const assertSafePackageName = (value: unknown, label: string): string => {
	if (typeof value !== "string" || value.length === 0) {
		throw new Error(`${label} must be a non-empty string.`);
	}
	if (value.length > MAX_NAME_LENGTH) {
		throw new Error(`${label} exceeds maximum length of ${MAX_NAME_LENGTH}.`);
	}
	for (const char of value) {
		const code = char.codePointAt(0);
		if (code !== undefined && (code <= 0x1f || code === 0x7f)) {
			throw new Error(`${label} must not contain control characters.`);
		}
	}
	if (INVALID_NAME_PATTERN.test(value) || value === "." || value === "..") {
		throw new Error(
			`${label} must not contain whitespace, path separators or reserved characters.`,
		);
	}
	return value;
};
