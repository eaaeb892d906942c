export const getErrnoCode = (error: unknown): string | undefined =>
	error instanceof Error && "code" in error && typeof error.code === "string"
		? error.code
		: undefined;

export const toErrorMessage = (error: unknown) =>
	error instanceof Error ? error.message : String(error);

export type MirrorErrorKind =
	| "network"
	| "consistency"
	| "integrity"
	| "storage"
	| "config"
	| "stale-page"
	| "package-not-found"
	| "cancelled";

export abstract class MirrorError extends Error {
	abstract readonly kind: MirrorErrorKind;
	/** Fatal errors abort the whole run instead of a single job. */
	abstract readonly fatal: boolean;
}

export class NetworkError extends MirrorError {
	readonly kind = "network";
	readonly fatal = false;

	constructor(
		message: string,
		public readonly url: string,
		public readonly status?: number,
	) {
		super(message);
		this.name = "NetworkError";
	}
}

export class StalePageError extends MirrorError {
	readonly kind = "stale-page";
	readonly fatal = false;

	constructor(
		public readonly url: string,
		public readonly requiredSerial: number,
		public readonly gotSerial: number | null,
	) {
		super(
			`Expected upstream serial ${requiredSerial} for ${url} but got ${gotSerial ?? "none"}.`,
		);
		this.name = "StalePageError";
	}
}

export class PackageNotFoundError extends MirrorError {
	readonly kind = "package-not-found";
	readonly fatal = false;

	constructor(public readonly packageName: string) {
		super(`Package ${packageName} was not found upstream.`);
		this.name = "PackageNotFoundError";
	}
}

export class ConsistencyError extends MirrorError {
	readonly kind = "consistency";
	readonly fatal = true;

	constructor(
		message: string,
		public readonly localSerial: number,
		public readonly upstreamSerial: number,
	) {
		super(message);
		this.name = "ConsistencyError";
	}
}

export class IntegrityError extends MirrorError {
	readonly kind = "integrity";
	readonly fatal = false;

	constructor(
		public readonly path: string,
		public readonly expected: string,
		public readonly actual: string,
	) {
		super(`Integrity check failed for ${path}: expected ${expected}, got ${actual}.`);
		this.name = "IntegrityError";
	}
}

export class StorageError extends MirrorError {
	readonly kind = "storage";
	readonly fatal = true;

	constructor(
		message: string,
		public readonly path: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "StorageError";
	}
}

export class ConfigError extends MirrorError {
	readonly kind = "config";
	readonly fatal = true;

	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export class CancelledError extends MirrorError {
	readonly kind = "cancelled";
	readonly fatal = true;

	constructor(message = "Run was cancelled.") {
		super(message);
		this.name = "CancelledError";
	}
}

export const isFatalError = (error: unknown) =>
	error instanceof MirrorError ? error.fatal : false;
