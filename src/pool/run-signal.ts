export type RunSignal = {
	signal: AbortSignal;
	timedOut: () => boolean;
	dispose: () => void;
};

/**
 * Signal for one run: aborts when `parent` aborts or after `timeoutMs`.
 */
export const createRunSignal = (
	parent: AbortSignal | undefined,
	timeoutMs: number | null,
): RunSignal => {
	const controller = new AbortController();
	let timedOut = false;
	const onParentAbort = () => controller.abort();
	if (parent?.aborted) {
		controller.abort();
	} else {
		parent?.addEventListener("abort", onParentAbort, { once: true });
	}
	const timer =
		timeoutMs === null
			? null
			: setTimeout(() => {
					timedOut = true;
					controller.abort();
				}, timeoutMs);
	return {
		signal: controller.signal,
		timedOut: () => timedOut,
		dispose: () => {
			if (timer) clearTimeout(timer);
			parent?.removeEventListener("abort", onParentAbort);
		},
	};
};
