/**
 * Final availability of a username after all retries.
 */
export type CheckStatus = "available" | "taken" | "error";

/**
 * Outcome of a single profile lookup.
 */
export type ProbeStatus = "available" | "taken" | "blocked" | "unknown";

/**
 * Result of checking a username's availability.
 */
export interface CheckResult {
	/** Username that was checked */
	username: string;
	/** Availability inferred from the profile lookup */
	status: CheckStatus;
	/** HTTP status of the last response, if any arrived */
	httpStatus?: number;
	/** Number of requests made, including retries after blocks */
	attempts: number;
	/** Error message if the check failed */
	error?: string;
}

/**
 * Result of a single request against the profile URL.
 */
export interface ProbeResult {
	status: ProbeStatus;
	httpStatus: number;
}

/**
 * Options for candidate generation.
 */
export interface GenerateOptions {
	/** Shortest candidate length (default: 1) */
	minLength?: number;
	/** Longest candidate length (default: 30) */
	maxLength?: number;
	/** Resume strictly after this candidate */
	startAfter?: string;
}

/**
 * Options for availability checks.
 */
export interface CheckOptions {
	/** Profile host without trailing slash (default: https://www.instagram.com) */
	baseUrl?: string;
	/** User-Agent header sent with each lookup */
	userAgent?: string;
	/** Per-request timeout in ms (default: 10000) */
	timeoutMs?: number;
	/** Extra attempts after an error (default: 2) */
	retries?: number;
	/** Base backoff between error retries in ms (default: 1000) */
	retryDelayMs?: number;
	/** First pause after a block response in ms (default: 90000) */
	blockPauseMs?: number;
	/** Ceiling for the doubling block pause in ms (default: 900000) */
	maxBlockPauseMs?: number;
	/** Called before each block pause */
	onBlocked?: (username: string, pauseMs: number) => void;
	signal?: AbortSignal;
}

/**
 * Options for a full scan over the candidate space.
 */
export interface ScanOptions extends GenerateOptions {
	/** Number of concurrent workers */
	threads: number;
	/** Stop after this many candidates */
	limit?: number;
	/** Lower bound of the per-worker delay between requests in ms */
	minDelayMs: number;
	/** Upper bound of the per-worker delay between requests in ms */
	maxDelayMs: number;
	check?: CheckOptions;
	/** Called for each answered candidate and for each failed check before a pause */
	onResult?: (result: CheckResult) => void;
	signal?: AbortSignal;
}

/**
 * Totals for a finished or aborted scan.
 */
export interface ScanSummary {
	checked: number;
	available: number;
	taken: number;
	/** Failed checks, each followed by a pause and another try */
	errors: number;
	/** Last candidate with every earlier candidate also checked */
	lastChecked?: string;
	/** False when the scan stopped before the candidate space was exhausted */
	completed: boolean;
}
