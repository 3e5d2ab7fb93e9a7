import { beforeEach, describe, expect, it, vi } from "vitest";
import { createProgressTracker } from "../src/checkpoint.js";
import type { AvailableSink } from "../src/output.js";
import { randomDelay, scanUsernames } from "../src/scan.js";
import type { CheckResult, ScanOptions } from "../src/types.js";

const fetchMock = vi.fn<typeof fetch>();

/** Serves 404 for the given names and 200 for everything else */
function serveFree(...free: string[]): void {
	fetchMock.mockImplementation(async (input) => {
		const name = String(input).split("/").at(-2) ?? "";
		return new Response(null, { status: free.includes(name) ? 404 : 200 });
	});
}

function requestedNames(): string[] {
	return fetchMock.mock.calls.map(([input]) => String(input).split("/").at(-2) ?? "");
}

function memorySink(): AvailableSink & { names: string[] } {
	const names: string[] = [];
	return {
		names,
		append: async (username) => {
			if (names.includes(username)) return false;
			names.push(username);
			return true;
		},
		get size() {
			return names.length;
		},
	};
}

const base: ScanOptions = {
	minLength: 1,
	maxLength: 1,
	threads: 3,
	minDelayMs: 0,
	maxDelayMs: 0,
	check: { retryDelayMs: 0, blockPauseMs: 0, retries: 0 },
};

beforeEach(() => {
	fetchMock.mockReset();
	vi.stubGlobal("fetch", fetchMock);
});

describe("scanUsernames", () => {
	it("records a 404 candidate as available", async () => {
		serveFree("ab");
		const sink = memorySink();

		const summary = await scanUsernames(
			{ ...base, minLength: 2, maxLength: 2, startAfter: "aa", limit: 1 },
			sink,
		);

		expect(requestedNames()).toEqual(["ab"]);
		expect(sink.names).toEqual(["ab"]);
		expect(summary).toEqual({
			checked: 1,
			available: 1,
			taken: 0,
			errors: 0,
			lastChecked: "ab",
			completed: false,
		});
	});

	it("checks every candidate once and records each available name once", async () => {
		serveFree("a", "q", "7", "_");
		const sink = memorySink();
		const results: CheckResult[] = [];

		const summary = await scanUsernames(
			{ ...base, onResult: (r) => results.push(r) },
			sink,
		);

		const requested = requestedNames();
		expect(requested).toHaveLength(37);
		expect(new Set(requested).size).toBe(37);
		expect([...sink.names].sort()).toEqual(["7", "_", "a", "q"]);
		expect(results.filter((r) => r.status === "available")).toHaveLength(4);
		expect(summary).toEqual({
			checked: 37,
			available: 4,
			taken: 33,
			errors: 0,
			lastChecked: "_",
			completed: true,
		});
	});

	it("never requests names that break the dot rules", async () => {
		serveFree();

		await scanUsernames(
			{ ...base, threads: 1, minLength: 3, maxLength: 3, startAfter: "a9_", limit: 40 },
			memorySink(),
		);

		const requested = requestedNames();
		expect(requested.slice(0, 2)).toEqual(["a.a", "a.b"]);
		expect(requested).not.toContain("a..");
		expect(requested.every((n) => !n.includes("..") && !n.endsWith("."))).toBe(true);
	});

	it("resumes after the checkpointed candidate", async () => {
		serveFree();

		const summary = await scanUsernames(
			{ ...base, threads: 1, startAfter: "x" },
			memorySink(),
		);

		expect(requestedNames()).toEqual([
			"y",
			"z",
			"0",
			"1",
			"2",
			"3",
			"4",
			"5",
			"6",
			"7",
			"8",
			"9",
			"_",
		]);
		expect(summary.completed).toBe(true);
	});

	it("stops at the limit", async () => {
		serveFree();

		const summary = await scanUsernames({ ...base, threads: 2, limit: 5 }, memorySink());

		expect(summary.checked).toBe(5);
		expect(summary.lastChecked).toBe("e");
		expect(summary.completed).toBe(false);
	});

	it("pauses and rechecks a candidate whose check keeps failing", async () => {
		let failuresLeft = 1;
		fetchMock.mockImplementation(async (input) => {
			if (String(input).endsWith("/b/") && failuresLeft > 0) {
				failuresLeft--;
				return new Response(null, { status: 500 });
			}
			return new Response(null, { status: 200 });
		});
		const onBlocked = vi.fn();
		const results: CheckResult[] = [];

		const summary = await scanUsernames(
			{
				...base,
				threads: 1,
				limit: 3,
				check: { ...base.check, blockPauseMs: 10, onBlocked },
				onResult: (r) => results.push(r),
			},
			memorySink(),
		);

		expect(requestedNames()).toEqual(["a", "b", "b", "c"]);
		expect(onBlocked.mock.calls).toEqual([["b", 10]]);
		expect(results.map((r) => [r.username, r.status])).toEqual([
			["a", "taken"],
			["b", "error"],
			["b", "taken"],
			["c", "taken"],
		]);
		expect(summary).toEqual({
			checked: 3,
			available: 0,
			taken: 3,
			errors: 1,
			lastChecked: "c",
			completed: false,
		});
	});

	it("treats endless redirects as blocking and never marks the name done", async () => {
		fetchMock.mockImplementation(async () => new Response(null, { status: 302 }));
		const controller = new AbortController();
		const pauses: Array<[string, number]> = [];

		const summary = await scanUsernames(
			{
				...base,
				threads: 1,
				signal: controller.signal,
				check: {
					...base.check,
					blockPauseMs: 10,
					maxBlockPauseMs: 15,
					onBlocked: (username, pauseMs) => {
						pauses.push([username, pauseMs]);
						if (pauses.length === 2) controller.abort();
					},
				},
			},
			memorySink(),
		);

		expect(pauses).toEqual([
			["a", 10],
			["a", 15],
		]);
		expect(fetchMock).toHaveBeenCalledTimes(2);
		expect(summary).toEqual({
			checked: 0,
			available: 0,
			taken: 0,
			errors: 2,
			lastChecked: undefined,
			completed: false,
		});
	});

	it("stops every worker before rethrowing a sink failure", async () => {
		serveFree(..."abcdefghijklmnopqrstuvwxyz0123456789_");
		let appends = 0;
		const sink: AvailableSink = {
			append: async () => {
				appends++;
				if (appends === 1) throw new Error("ENOSPC: no space left on device");
				return true;
			},
			size: 0,
		};

		await expect(
			scanUsernames({ ...base, minDelayMs: 20, maxDelayMs: 20 }, sink),
		).rejects.toThrow("ENOSPC");
		const requestsAtFailure = fetchMock.mock.calls.length;
		await new Promise((resolve) => setTimeout(resolve, 50));

		expect(requestsAtFailure).toBe(3);
		expect(fetchMock.mock.calls.length).toBe(requestsAtFailure);
	});

	it("stops pulling candidates once aborted", async () => {
		serveFree();
		const controller = new AbortController();

		const summary = await scanUsernames(
			{
				...base,
				threads: 1,
				signal: controller.signal,
				onResult: () => controller.abort(),
			},
			memorySink(),
		);

		expect(summary.checked).toBe(1);
		expect(summary.lastChecked).toBe("a");
		expect(summary.completed).toBe(false);
	});

	it("advances the shared tracker", async () => {
		serveFree();
		const tracker = createProgressTracker();

		await scanUsernames({ ...base, limit: 10 }, memorySink(), tracker);

		expect(tracker.watermark).toBe("j");
		expect(tracker.pending).toBe(0);
	});

	it("rejects a non-positive thread count", async () => {
		await expect(scanUsernames({ ...base, threads: 0 }, memorySink())).rejects.toThrow(
			"threads must be a positive integer",
		);
	});

	it("rejects an inverted delay range", async () => {
		await expect(
			scanUsernames({ ...base, minDelayMs: 10, maxDelayMs: 5 }, memorySink()),
		).rejects.toThrow("delay range must satisfy 0 <= min <= max");
	});
});

describe("randomDelay", () => {
	it("stays within the range", () => {
		vi.spyOn(Math, "random").mockReturnValue(0.5);
		expect(randomDelay(800, 1500)).toBe(1150);
	});
});
