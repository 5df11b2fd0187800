import { SemanticSearchError } from "../errors.js";

export interface DeadlineOptions {
	timeoutMs: number;
	signal?: AbortSignal;
	context?: string;
}

/**
 * Run `task` with its own AbortSignal, rejecting on timeout or when the caller's
 * signal aborts, whether or not the task itself honours the signal
 */
export async function withDeadline<T>(
	task: (signal: AbortSignal) => Promise<T>,
	options: DeadlineOptions,
): Promise<T> {
	const { timeoutMs, signal, context = "Semantic search" } = options;

	if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
		throw new Error(`Invalid timeout value: ${timeoutMs}. Must be a positive finite number.`);
	}

	const controller = new AbortController();
	const onCallerAbort = (): void => {
		controller.abort(new SemanticSearchError("ABORTED", `${context} was cancelled`));
	};
	const timeoutId = setTimeout(() => {
		controller.abort(
			new SemanticSearchError("TIMEOUT", `${context} timed out after ${timeoutMs}ms`, { timeoutMs }),
		);
	}, timeoutMs);

	if (signal?.aborted) {
		onCallerAbort();
	} else {
		signal?.addEventListener("abort", onCallerAbort, { once: true });
	}

	const aborted = new Promise<never>((_, reject) => {
		const fail = (): void => reject(controller.signal.reason);
		if (controller.signal.aborted) {
			fail();
		} else {
			controller.signal.addEventListener("abort", fail, { once: true });
		}
	});

	try {
		return await Promise.race([task(controller.signal), aborted]);
	} finally {
		clearTimeout(timeoutId);
		signal?.removeEventListener("abort", onCallerAbort);
	}
}
