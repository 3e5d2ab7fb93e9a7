#!/usr/bin/env node
import chalk from "chalk";
import Table from "cli-table3";
import { program } from "commander";
import ora, { type Ora } from "ora";
import {
	DEFAULT_BASE_URL,
	DEFAULT_USER_AGENT,
	checkUsernames,
} from "./checker.js";
import {
	DEFAULT_CHECKPOINT_FILE,
	createCheckpointStore,
	createProgressTracker,
	loadCheckpoint,
	startCheckpointSaver,
} from "./checkpoint.js";
import {
	MAX_USERNAME_LENGTH,
	countUsernames,
	countUsernamesByLength,
} from "./generate.js";
import {
	parseLength,
	parseNonNegativeInt,
	parsePositiveInt,
	parsePositiveSeconds,
	parseSeconds,
	partitionUsernames,
} from "./options.js";
import { DEFAULT_OUTPUT_FILE, openAvailableFile } from "./output.js";
import { scanUsernames } from "./scan.js";
import type { CheckOptions, CheckResult } from "./types.js";

const CHECKPOINT_INTERVAL_MS = 5000;

/**
 * Builds check settings from CLI options and environment variables.
 * Flags win over SWEEP_BASE_URL; SWEEP_USER_AGENT overrides the default agent.
 */
function getCheckOptions(options: {
	baseUrl?: string;
	timeout: number;
	retries: number;
	blockPause: number;
}): CheckOptions {
	return {
		baseUrl: options.baseUrl ?? process.env.SWEEP_BASE_URL ?? DEFAULT_BASE_URL,
		userAgent: process.env.SWEEP_USER_AGENT || DEFAULT_USER_AGENT,
		timeoutMs: options.timeout,
		retries: options.retries,
		blockPauseMs: options.blockPause,
	};
}

/**
 * Exits with a readable message, as JSON on stderr when requested.
 */
function fail(error: unknown, isJson: boolean, spinner: Ora | null): never {
	const message = error instanceof Error ? error.message : "Unknown error";
	if (isJson) {
		console.error(JSON.stringify({ error: message }));
	} else if (spinner) {
		spinner.fail(chalk.red(message));
	} else {
		console.error(chalk.red(`Error: ${message}`));
	}
	process.exit(1);
}

/**
 * Formats a check result status with appropriate color.
 */
function formatStatus(result: CheckResult): string {
	if (result.status === "available") return chalk.green("available");
	if (result.status === "taken") return chalk.dim("taken");
	return chalk.red(`error: ${result.error ?? "unknown"}`);
}

/**
 * Prints a line above the spinner without breaking its animation.
 */
function printAbove(spinner: Ora | null, line: string): void {
	spinner?.clear();
	console.log(line);
	spinner?.render();
}

program
	.name("handle-sweep")
	.description("Enumerate Instagram usernames and record the unregistered ones")
	.version("0.1.0");

program
	.command("scan", { isDefault: true })
	.description("Generate candidates in order and check each one")
	.option(
		"--threads <n>",
		"Number of concurrent workers",
		(v) => parsePositiveInt(v, "threads"),
		5,
	)
	.option(
		"--min-length <n>",
		"Shortest username to generate",
		(v) => parseLength(v, "min-length"),
		1,
	)
	.option(
		"--max-length <n>",
		`Longest username to generate (up to ${MAX_USERNAME_LENGTH})`,
		(v) => parseLength(v, "max-length"),
		4,
	)
	.option("-o, --output <file>", "File to append available names to", DEFAULT_OUTPUT_FILE)
	.option("--checkpoint <file>", "Progress file for resuming", DEFAULT_CHECKPOINT_FILE)
	.option("--no-resume", "Start from the beginning, ignoring the checkpoint")
	.option("--limit <n>", "Stop after this many candidates", (v) =>
		parsePositiveInt(v, "limit"),
	)
	.option(
		"--min-delay <s>",
		"Minimum pause between requests per worker",
		(v) => parseSeconds(v, "min-delay"),
		800,
	)
	.option(
		"--max-delay <s>",
		"Maximum pause between requests per worker",
		(v) => parseSeconds(v, "max-delay"),
		1500,
	)
	.option(
		"--block-pause <s>",
		"First pause after a rate limit response (doubles while blocked)",
		(v) => parseSeconds(v, "block-pause"),
		90_000,
	)
	.option(
		"--timeout <s>",
		"Request timeout",
		(v) => parsePositiveSeconds(v, "timeout"),
		10_000,
	)
	.option(
		"--retries <n>",
		"Retries after a network error",
		(v) => parseNonNegativeInt(v, "retries"),
		2,
	)
	.option("--base-url <url>", "Profile host to query")
	.option("--verbose", "Also print taken names and errors", false)
	.option("--json", "Print the summary as JSON", false)
	.action(async (options) => {
		const isJson: boolean = options.json;

		if (options.minLength > options.maxLength) {
			fail(new Error("min-length must not exceed max-length"), isJson, null);
		}
		if (options.minDelay > options.maxDelay) {
			fail(new Error("min-delay must not exceed max-delay"), isJson, null);
		}

		let spinner: Ora | null = null;
		try {
			const startAfter = options.resume
				? await loadCheckpoint(options.checkpoint)
				: undefined;
			const sink = await openAvailableFile(options.output);
			const tracker = createProgressTracker(startAfter);
			const store = createCheckpointStore(options.checkpoint);
			const reportSaveError = (error: unknown) =>
				printAbove(
					spinner,
					chalk.yellow(
						`[CHECKPOINT] ${error instanceof Error ? error.message : String(error)}`,
					),
				);
			const stopSaver = startCheckpointSaver(
				store,
				tracker,
				CHECKPOINT_INTERVAL_MS,
				reportSaveError,
			);

			const controller = new AbortController();
			const stop = () => controller.abort();
			process.once("SIGINT", stop);
			process.once("SIGTERM", stop);

			const total = countUsernames(options.minLength, options.maxLength);
			spinner = isJson
				? null
				: ora({
						text: startAfter
							? `Resuming after "${startAfter}" (${total.toLocaleString()} candidates in range)`
							: `Checking ${total.toLocaleString()} candidates...`,
						color: "cyan",
					}).start();

			let checked = 0;
			let found = 0;
			const checkOptions: CheckOptions = {
				...getCheckOptions(options),
				onBlocked: (_username, pauseMs) => {
					if (!isJson) {
						printAbove(
							spinner,
							chalk.yellow(
								`[RATE LIMIT] pausing ${Math.round(pauseMs / 1000)}s`,
							),
						);
					}
				},
			};

			const summary = await scanUsernames(
				{
					minLength: options.minLength,
					maxLength: options.maxLength,
					startAfter,
					threads: options.threads,
					limit: options.limit,
					minDelayMs: options.minDelay,
					maxDelayMs: options.maxDelay,
					check: checkOptions,
					signal: controller.signal,
					onResult: (result) => {
						if (result.status !== "error") checked++;
						if (result.status === "available") {
							found++;
							if (!isJson) {
								printAbove(spinner, chalk.green(`[AVAILABLE] ${result.username}`));
							}
							store.save(tracker.watermark).catch(reportSaveError);
						} else if (options.verbose && !isJson) {
							printAbove(
								spinner,
								result.status === "taken"
									? chalk.dim(`[TAKEN] ${result.username}`)
									: chalk.red(`[ERROR] ${result.username}: ${result.error}`),
							);
						}
						if (spinner) {
							spinner.text = `Checked ${checked} (${found} available) - at "${result.username}"`;
						}
					},
				},
				sink,
				tracker,
			);

			process.off("SIGINT", stop);
			process.off("SIGTERM", stop);
			await stopSaver();

			if (isJson) {
				console.log(JSON.stringify(summary, null, 2));
				return;
			}

			const headline = `Checked ${summary.checked} candidates, ${summary.available} available`;
			if (summary.completed) {
				spinner?.succeed(headline);
			} else {
				spinner?.warn(
					`${headline} (stopped${summary.lastChecked ? ` after "${summary.lastChecked}"` : ""})`,
				);
			}

			const table = new Table({
				head: [chalk.bold("Result"), chalk.bold("Count")],
				style: { head: [], border: [] },
			});
			table.push(
				[chalk.green("available"), summary.available.toString()],
				[chalk.dim("taken"), summary.taken.toString()],
				[chalk.red("error"), summary.errors.toString()],
			);
			console.log(table.toString());
			console.log(chalk.dim(`Available names appended to ${options.output}`));
		} catch (error) {
			fail(error, isJson, spinner);
		}
	});

program
	.command("check")
	.description("Check availability of specific usernames")
	.argument("<usernames...>", "Usernames to check (e.g., ab c_d)")
	.option(
		"--threads <n>",
		"Maximum concurrent requests",
		(v) => parsePositiveInt(v, "threads"),
		5,
	)
	.option(
		"--timeout <s>",
		"Request timeout",
		(v) => parsePositiveSeconds(v, "timeout"),
		10_000,
	)
	.option(
		"--retries <n>",
		"Retries after a network error",
		(v) => parseNonNegativeInt(v, "retries"),
		2,
	)
	.option(
		"--block-pause <s>",
		"First pause after a rate limit response",
		(v) => parseSeconds(v, "block-pause"),
		90_000,
	)
	.option("--base-url <url>", "Profile host to query")
	.option("--available-only", "Only show available usernames", false)
	.option("--json", "Output as JSON", false)
	.action(async (usernames: string[], options) => {
		const isJson: boolean = options.json;
		const { valid, invalid } = partitionUsernames(usernames);

		const spinner = isJson
			? null
			: ora({
					text: `Checking ${valid.length} usernames...`,
					color: "cyan",
				}).start();

		try {
			let results = await checkUsernames(
				valid,
				getCheckOptions(options),
				options.threads,
			);

			if (options.availableOnly) {
				results = results.filter((r) => r.status === "available");
			}

			if (isJson) {
				console.log(
					JSON.stringify(
						{ results, invalid: options.availableOnly ? [] : invalid },
						null,
						2,
					),
				);
				return;
			}

			spinner?.succeed(`Checked ${valid.length} usernames`);
			console.log();

			const table = new Table({
				head: [chalk.bold("Username"), chalk.bold("Status")],
				style: { head: [], border: [] },
			});

			for (const r of results) {
				table.push([
					r.status === "available" ? chalk.white(r.username) : chalk.dim(r.username),
					formatStatus(r),
				]);
			}
			if (!options.availableOnly) {
				for (const name of invalid) {
					table.push([chalk.dim(name), chalk.yellow("invalid")]);
				}
			}

			console.log(table.toString());
		} catch (error) {
			fail(error, isJson, spinner);
		}
	});

program
	.command("count")
	.description("Show how many candidates a length range contains")
	.option(
		"--min-length <n>",
		"Shortest username",
		(v) => parseLength(v, "min-length"),
		1,
	)
	.option(
		"--max-length <n>",
		"Longest username",
		(v) => parseLength(v, "max-length"),
		4,
	)
	.option("--json", "Output as JSON", false)
	.action((options) => {
		const isJson: boolean = options.json;
		try {
			const rows = countUsernamesByLength(options.minLength, options.maxLength);
			const total = countUsernames(options.minLength, options.maxLength);

			if (isJson) {
				console.log(
					JSON.stringify(
						{
							lengths: rows.map((r) => ({
								length: r.length,
								count: r.count.toString(),
							})),
							total: total.toString(),
						},
						null,
						2,
					),
				);
				return;
			}

			const table = new Table({
				head: [chalk.bold("Length"), chalk.bold("Candidates")],
				style: { head: [], border: [] },
			});
			for (const r of rows) {
				table.push([r.length.toString(), r.count.toLocaleString()]);
			}
			table.push([chalk.bold("total"), chalk.bold(total.toLocaleString())]);
			console.log(table.toString());
		} catch (error) {
			fail(error, isJson, null);
		}
	});

await program.parseAsync();
