import { blockPauseFor, checkUsername, sleep } from "./checker.js";
import { createProgressTracker, type ProgressTracker } from "./checkpoint.js";
import { generateUsernames } from "./generate.js";
import type { AvailableSink } from "./output.js";
import type { ScanOptions, ScanSummary } from "./types.js";

/**
 * Picks a delay uniformly from the range.
 */
export function randomDelay(minMs: number, maxMs: number): number {
	return minMs + Math.random() * (maxMs - minMs);
}

/**
 * Generates candidates and checks each one, recording available usernames.
 * Workers pull from one shared generator, so every candidate is pulled
 * exactly once and results arrive in no particular order. Each worker sleeps
 * a random delay after every check to stay under the rate limit.
 *
 * A check that still fails after its retries is treated as sustained
 * blocking: the worker pauses (doubling while failures continue across all
 * workers) and checks the same candidate again, so the checkpoint never moves
 * past an unanswered name. If a worker throws, the others are stopped and
 * awaited before the error is rethrown.
 * @param options - Length range, worker count, delays and check settings
 * @param sink - Destination for available usernames
 * @param tracker - Progress tracker for checkpointing (created if omitted)
 * @returns Totals, with `completed` false if aborted or limited
 * @throws Error if the options are invalid or recording a result fails
 */
export async function scanUsernames(
	options: ScanOptions,
	sink: AvailableSink,
	tracker: ProgressTracker = createProgressTracker(options.startAfter),
): Promise<ScanSummary> {
	if (!Number.isInteger(options.threads) || options.threads <= 0) {
		throw new Error("threads must be a positive integer");
	}
	if (options.minDelayMs < 0 || options.minDelayMs > options.maxDelayMs) {
		throw new Error("delay range must satisfy 0 <= min <= max");
	}

	const candidates = generateUsernames(options);

	// Aborted by the caller or by the first failing worker
	const controller = new AbortController();
	const forwardAbort = () => controller.abort();
	if (options.signal?.aborted) controller.abort();
	options.signal?.addEventListener("abort", forwardAbort, { once: true });
	const { signal } = controller;
	const checkOptions = { ...options.check, signal };

	const summary: ScanSummary = {
		checked: 0,
		available: 0,
		taken: 0,
		errors: 0,
		completed: false,
	};
	let pulled = 0;
	let exhausted = false;
	let failureStreak = 0;

	const next = (): string | undefined => {
		if (signal.aborted || exhausted) return undefined;
		if (options.limit !== undefined && pulled >= options.limit) {
			return undefined;
		}
		const item = candidates.next();
		if (item.done) {
			exhausted = true;
			return undefined;
		}
		pulled++;
		return item.value;
	};

	const worker = async (): Promise<void> => {
		for (let username = next(); username !== undefined; username = next()) {
			const done = tracker.begin(username);
			let result = await checkUsername(username, checkOptions);

			while (result.status === "error" && !signal.aborted) {
				summary.errors++;
				failureStreak++;
				options.onResult?.(result);
				const pauseMs = blockPauseFor(failureStreak, checkOptions);
				checkOptions.onBlocked?.(username, pauseMs);
				await sleep(pauseMs, signal);
				result = await checkUsername(username, checkOptions);
			}

			// An aborted check is left for the next run
			if (result.status === "error") return;

			failureStreak = 0;
			if (result.status === "available") {
				await sink.append(username);
				summary.available++;
			} else {
				summary.taken++;
			}
			summary.checked++;
			done();
			options.onResult?.(result);

			await sleep(randomDelay(options.minDelayMs, options.maxDelayMs), signal);
		}
	};

	const outcomes = await Promise.allSettled(
		Array.from({ length: options.threads }, () =>
			worker().catch((error: unknown) => {
				controller.abort();
				throw error;
			}),
		),
	);
	options.signal?.removeEventListener("abort", forwardAbort);

	const failure = outcomes.find(
		(outcome): outcome is PromiseRejectedResult => outcome.status === "rejected",
	);
	if (failure) throw failure.reason;

	summary.lastChecked = tracker.watermark;
	summary.completed = exhausted && !signal.aborted;
	return summary;
}
