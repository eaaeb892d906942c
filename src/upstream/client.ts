import { open } from "node:fs/promises";
import {
	CancelledError,
	NetworkError,
	PackageNotFoundError,
	StalePageError,
	toErrorMessage,
} from "../errors";
import { silentLogger, type Logger } from "../logger";
import { type PackageMetadata, PackageMetadataSchema } from "./schemas";
import {
	decodeMethodResponse,
	encodeMethodCall,
	type XmlRpcParam,
	type XmlRpcValue,
} from "./xmlrpc";

export const USER_AGENT = "index-mirror/0.1.0";
export const SERIAL_HEADER = "X-PYPI-LAST-SERIAL";

export type UpstreamClientOptions = {
	master: string;
	/** Deadline for connecting and for each body read. */
	timeoutMs: number;
	/** Ceiling for a whole request, body included. */
	globalTimeoutMs: number;
	/** Custom fetch implementation (for testing) */
	fetchFn?: typeof fetch;
	logger?: Logger;
};

export type PackageMetadataResult = {
	metadata: PackageMetadata;
	raw: string;
	serial: number | null;
};

type RequestOptions = {
	method: "GET" | "POST";
	headers?: Record<string, string>;
	body?: string;
};

type Deadline = {
	signal: AbortSignal;
	touch: () => void;
	reason: () => string | null;
	dispose: () => void;
};

/**
 * Links an idle timer (reset on every read), an overall ceiling and an
 * optional parent signal into one abort signal.
 */
const createDeadline = (
	idleMs: number,
	totalMs: number,
	parent?: AbortSignal,
): Deadline => {
	const controller = new AbortController();
	let reason: string | null = null;
	const abort = (why: string) => {
		if (controller.signal.aborted) return;
		reason = why;
		controller.abort();
	};
	const total = setTimeout(
		() => abort(`exceeded global timeout of ${totalMs}ms`),
		totalMs,
	);
	let idle = setTimeout(() => abort(`no response within ${idleMs}ms`), idleMs);
	const onParentAbort = () => abort("cancelled");
	parent?.addEventListener("abort", onParentAbort, { once: true });
	if (parent?.aborted) {
		abort("cancelled");
	}
	return {
		signal: controller.signal,
		touch: () => {
			clearTimeout(idle);
			idle = setTimeout(() => abort(`read stalled for ${idleMs}ms`), idleMs);
		},
		reason: () => reason,
		dispose: () => {
			clearTimeout(total);
			clearTimeout(idle);
			parent?.removeEventListener("abort", onParentAbort);
		},
	};
};

const parseSerialHeader = (response: Response) => {
	const raw = response.headers.get(SERIAL_HEADER);
	if (raw === null) return null;
	const value = Number.parseInt(raw, 10);
	return Number.isFinite(value) ? value : null;
};

const toSerialMap = (value: XmlRpcValue, method: string) => {
	if (typeof value !== "object" || value === null || Array.isArray(value)) {
		throw new NetworkError(`${method} returned an unexpected payload.`, method);
	}
	const packages = new Map<string, number>();
	for (const [name, serial] of Object.entries(value)) {
		if (typeof serial === "number") {
			packages.set(name, serial);
		}
	}
	return packages;
};

/**
 * Client for the upstream index: XML-RPC changelog calls, JSON metadata and
 * streamed file downloads. Every request is bounded by the per-read timeout
 * and the global ceiling.
 */
export class UpstreamClient {
	readonly master: string;
	private readonly timeoutMs: number;
	private readonly globalTimeoutMs: number;
	private readonly fetchFn: typeof fetch;
	private readonly logger: Logger;

	constructor(options: UpstreamClientOptions) {
		this.master = options.master.replace(/\/+$/, "");
		this.timeoutMs = options.timeoutMs;
		this.globalTimeoutMs = options.globalTimeoutMs;
		this.fetchFn = options.fetchFn ?? globalThis.fetch;
		this.logger = options.logger ?? silentLogger;
	}

	get xmlrpcUrl() {
		return `${this.master}/pypi`;
	}

	async rpc(method: string, params: XmlRpcParam[] = [], signal?: AbortSignal) {
		const body = await this.request(
			this.xmlrpcUrl,
			{
				method: "POST",
				headers: { "Content-Type": "text/xml" },
				body: encodeMethodCall(method, params),
			},
			signal,
			async (response, deadline) => this.readText(response, deadline),
		);
		try {
			return decodeMethodResponse(body);
		} catch (error) {
			throw new NetworkError(
				`${method} @ ${this.xmlrpcUrl} failed: ${toErrorMessage(error)}`,
				this.xmlrpcUrl,
			);
		}
	}

	async fetchSerial(signal?: AbortSignal) {
		const value = await this.rpc("changelog_last_serial", [], signal);
		if (typeof value !== "number") {
			throw new NetworkError(
				"changelog_last_serial returned a non-numeric serial.",
				this.xmlrpcUrl,
			);
		}
		return value;
	}

	/**
	 * Highest serial per package touched since `since`.
	 */
	async changedPackages(since: number, signal?: AbortSignal) {
		const value = await this.rpc("changelog_since_serial", [since], signal);
		const packages = new Map<string, number>();
		if (!Array.isArray(value)) {
			return packages;
		}
		for (const entry of value) {
			if (!Array.isArray(entry) || entry.length < 5) continue;
			const [name, , , , serial] = entry;
			if (typeof name !== "string" || typeof serial !== "number") continue;
			if (serial > (packages.get(name) ?? 0)) {
				packages.set(name, serial);
			}
		}
		return packages;
	}

	async allPackages(signal?: AbortSignal) {
		const value = await this.rpc("list_packages_with_serial", [], signal);
		const packages = toSerialMap(value, "list_packages_with_serial");
		if (packages.size === 0) {
			throw new NetworkError(
				"Unable to get full list of packages.",
				this.xmlrpcUrl,
			);
		}
		return packages;
	}

	/**
	 * Fetches `/pypi/<name>/json`. A response whose serial header is older
	 * than `requiredSerial` comes from a stale cache and is rejected.
	 */
	async getPackageMetadata(
		name: string,
		requiredSerial: number | null,
		signal?: AbortSignal,
	): Promise<PackageMetadataResult> {
		const url = `${this.master}/pypi/${encodeURIComponent(name)}/json`;
		return this.request(
			url,
			{ method: "GET", headers: { Accept: "application/json" } },
			signal,
			async (response, deadline) => {
				const serial = parseSerialHeader(response);
				if (requiredSerial !== null && (serial === null || serial < requiredSerial)) {
					throw new StalePageError(url, requiredSerial, serial);
				}
				const raw = await this.readText(response, deadline);
				let parsed: unknown;
				try {
					parsed = JSON.parse(raw);
				} catch (error) {
					throw new NetworkError(
						`Invalid JSON from ${url}: ${toErrorMessage(error)}`,
						url,
					);
				}
				const result = PackageMetadataSchema.safeParse(parsed);
				if (!result.success) {
					throw new NetworkError(
						`Unexpected metadata from ${url}: ${result.error.issues[0]?.message ?? "invalid"}`,
						url,
					);
				}
				return { metadata: result.data, raw, serial };
			},
			{ notFound: () => new PackageNotFoundError(name) },
		);
	}

	/**
	 * Streams `url` into `destination`, returning the number of bytes written.
	 */
	async downloadFile(url: string, destination: string, signal?: AbortSignal) {
		this.logger.debug(`Fetching ${url}`);
		return this.request(
			url,
			{ method: "GET" },
			signal,
			async (response, deadline) => {
				const handle = await open(destination, "w");
				let bytes = 0;
				try {
					if (response.body) {
						const reader = response.body.getReader();
						while (true) {
							const { done, value } = await reader.read();
							if (done) break;
							deadline.touch();
							await handle.write(value);
							bytes += value.byteLength;
						}
					}
				} finally {
					await handle.close();
				}
				return bytes;
			},
		);
	}

	private async readText(response: Response, deadline: Deadline) {
		if (!response.body) {
			return "";
		}
		const reader = response.body.getReader();
		const decoder = new TextDecoder();
		let text = "";
		while (true) {
			const { done, value } = await reader.read();
			if (done) break;
			deadline.touch();
			text += decoder.decode(value, { stream: true });
		}
		return text + decoder.decode();
	}

	private async request<T>(
		url: string,
		init: RequestOptions,
		signal: AbortSignal | undefined,
		consume: (response: Response, deadline: Deadline) => Promise<T>,
		handlers: { notFound?: () => Error } = {},
	): Promise<T> {
		const deadline = createDeadline(this.timeoutMs, this.globalTimeoutMs, signal);
		try {
			const response = await this.fetchFn(url, {
				...init,
				headers: { "User-Agent": USER_AGENT, ...init.headers },
				signal: deadline.signal,
			});
			deadline.touch();
			if (response.status === 404 && handlers.notFound) {
				throw handlers.notFound();
			}
			if (!response.ok) {
				throw new NetworkError(
					`Upstream returned ${response.status} (${response.statusText}) for ${url}`,
					url,
					response.status,
				);
			}
			return await consume(response, deadline);
		} catch (error) {
			if (signal?.aborted) {
				throw new CancelledError();
			}
			const reason = deadline.reason();
			if (reason) {
				throw new NetworkError(`Request to ${url} ${reason}.`, url);
			}
			if (error instanceof Error && error.name !== "TypeError") {
				throw error;
			}
			throw new NetworkError(
				`Request to ${url} failed: ${toErrorMessage(error)}`,
				url,
			);
		} finally {
			deadline.dispose();
		}
	}
}
