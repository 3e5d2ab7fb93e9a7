import pLimit from "p-limit";
import type {
	CheckOptions,
	CheckResult,
	ProbeResult,
	ProbeStatus,
} from "./types.js";

export const DEFAULT_BASE_URL = "https://www.instagram.com";
export const DEFAULT_USER_AGENT = "handle-sweep/0.1";

const DEFAULT_TIMEOUT_MS = 10000;

// Retry configuration
const MAX_RETRIES = 2;
const RETRY_DELAY_MS = 1000;

// Rate limiting: first pause, doubled per consecutive block up to the cap
const BLOCK_PAUSE_MS = 90_000;
const MAX_BLOCK_PAUSE_MS = 900_000;

/**
 * Delays execution for the specified duration, returning early on abort.
 * @param ms - Milliseconds to sleep
 * @param signal - Optional signal that cuts the sleep short
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	if (ms <= 0 || signal?.aborted) return Promise.resolve();
	return new Promise((resolve) => {
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Length of the pause after the given number of consecutive blocks: the
 * first pause is `blockPauseMs`, each further one doubles, up to the cap.
 */
export function blockPauseFor(streak: number, options: CheckOptions = {}): number {
	const base = options.blockPauseMs ?? BLOCK_PAUSE_MS;
	const cap = options.maxBlockPauseMs ?? MAX_BLOCK_PAUSE_MS;
	return Math.min(base * 2 ** Math.max(streak - 1, 0), cap);
}

/**
 * Maps a profile lookup status code to an availability outcome.
 */
export function classifyStatus(httpStatus: number): ProbeStatus {
	if (httpStatus === 404) return "available";
	if (httpStatus === 200) return "taken";
	if (httpStatus === 403 || httpStatus === 429) return "blocked";
	return "unknown";
}

/**
 * Builds the public profile URL for a username.
 */
export function profileUrl(username: string, baseUrl = DEFAULT_BASE_URL): string {
	return `${baseUrl.replace(/\/+$/, "")}/${encodeURIComponent(username)}/`;
}

/**
 * Issues one profile lookup. Redirects are not followed, so a login wall
 * surfaces as an unknown status instead of a misleading 200.
 * @throws Error on network failure or timeout
 */
export async function probeUsername(
	username: string,
	options: CheckOptions = {},
): Promise<ProbeResult> {
	const timeout = AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
	const response = await fetch(profileUrl(username, options.baseUrl), {
		redirect: "manual",
		signal: options.signal
			? AbortSignal.any([timeout, options.signal])
			: timeout,
		headers: {
			"User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
			Accept: "text/html",
		},
	});
	// Only the status matters
	await response.body?.cancel();

	return {
		status: classifyStatus(response.status),
		httpStatus: response.status,
	};
}

/**
 * Checks whether a username is registered.
 * Errors and unexpected statuses are retried with linear backoff. Block
 * responses (403/429) pause and retry the same username without consuming
 * the retry budget, so a throttled worker resumes on its own.
 * @param username - Username to check (assumed valid)
 * @param options - Endpoint, timing and retry settings
 * @returns Check result; never throws
 */
export async function checkUsername(
	username: string,
	options: CheckOptions = {},
): Promise<CheckResult> {
	const retries = options.retries ?? MAX_RETRIES;
	const retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
	const { signal } = options;

	let attempts = 0;
	let failures = 0;
	let consecutiveBlocks = 0;
	let httpStatus: number | undefined;
	let lastError = "Unknown error";

	while (!signal?.aborted) {
		attempts++;
		try {
			const probe = await probeUsername(username, options);
			httpStatus = probe.httpStatus;

			if (probe.status === "available" || probe.status === "taken") {
				return { username, status: probe.status, httpStatus, attempts };
			}

			if (probe.status === "blocked") {
				consecutiveBlocks++;
				const pauseMs = blockPauseFor(consecutiveBlocks, options);
				options.onBlocked?.(username, pauseMs);
				await sleep(pauseMs, signal);
				continue;
			}

			lastError = `Unexpected HTTP ${probe.httpStatus}`;
		} catch (e) {
			lastError = e instanceof Error ? e.message : String(e);
		}

		consecutiveBlocks = 0;
		failures++;
		if (failures > retries) break;
		await sleep(retryDelayMs * failures, signal);
	}

	if (signal?.aborted) lastError = "aborted";
	return { username, status: "error", httpStatus, attempts, error: lastError };
}

/**
 * Checks an explicit list of usernames with bounded concurrency.
 * @param usernames - Usernames to check
 * @param options - Shared check options
 * @param concurrency - Maximum requests in flight
 * @returns Results in the same order as input
 */
export async function checkUsernames(
	usernames: string[],
	options: CheckOptions = {},
	concurrency = 5,
): Promise<CheckResult[]> {
	const limit = pLimit(concurrency);
	return Promise.all(
		usernames.map((username) => limit(() => checkUsername(username, options))),
	);
}
