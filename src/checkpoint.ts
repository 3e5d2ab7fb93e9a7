import { readFile, rename, writeFile } from "node:fs/promises";
import pLimit from "p-limit";
import { z } from "zod";
import { isValidUsername } from "./generate.js";

export const DEFAULT_CHECKPOINT_FILE = ".instagram_checkpoint.json";

const CheckpointSchema = z.object({
	last: z
		.string()
		.refine((name) => isValidUsername(name), "not a valid username")
		.nullable(),
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;

/**
 * Tracks which candidates are in flight so the saved position never skips a
 * candidate that a slower worker has not finished.
 */
export interface ProgressTracker {
	/** Marks a candidate as pulled; returns the function that marks it done */
	begin(username: string): () => void;
	/** Last candidate with every earlier candidate also done */
	readonly watermark: string | undefined;
	/** Candidates pulled but not yet done */
	readonly pending: number;
}

/**
 * Creates a tracker for candidates pulled in generation order.
 * @param initial - Watermark carried over from a loaded checkpoint
 */
export function createProgressTracker(initial?: string): ProgressTracker {
	const queue: Array<{ username: string; done: boolean }> = [];
	let watermark = initial;

	return {
		begin(username) {
			const entry = { username, done: false };
			queue.push(entry);
			return () => {
				entry.done = true;
				while (queue[0]?.done) {
					watermark = queue.shift()?.username;
				}
			};
		},
		get watermark() {
			return watermark;
		},
		get pending() {
			return queue.length;
		},
	};
}

/**
 * Reads a checkpoint file.
 * @param path - Checkpoint file path
 * @returns Saved position, or undefined if no checkpoint exists
 * @throws Error if the file exists but is not a valid checkpoint
 */
export async function loadCheckpoint(path: string): Promise<string | undefined> {
	let raw: string;
	try {
		raw = await readFile(path, "utf8");
	} catch (e) {
		if (e instanceof Error && "code" in e && e.code === "ENOENT") {
			return undefined;
		}
		throw e;
	}

	let data: unknown;
	try {
		data = JSON.parse(raw);
	} catch {
		throw new Error(`Checkpoint ${path} is not valid JSON`);
	}

	const parsed = CheckpointSchema.safeParse(data);
	if (!parsed.success) {
		throw new Error(
			`Checkpoint ${path} is malformed: ${parsed.error.issues[0]?.message ?? "invalid"}`,
		);
	}
	return parsed.data.last ?? undefined;
}

/**
 * Serialized, atomic writer for one checkpoint file.
 */
export interface CheckpointStore {
	save(last: string | undefined): Promise<void>;
}

/**
 * Creates a checkpoint writer. Each save goes to a temporary sibling that is
 * renamed over the target, and saves run one at a time.
 */
export function createCheckpointStore(path: string): CheckpointStore {
	const lock = pLimit(1);
	const tmp = `${path}.tmp`;

	return {
		save: (last) =>
			lock(async () => {
				const checkpoint: Checkpoint = { last: last ?? null };
				await writeFile(tmp, JSON.stringify(checkpoint), "utf8");
				await rename(tmp, path);
			}),
	};
}

/**
 * Saves the tracker's watermark on a fixed interval until stopped.
 * @param onError - Receives save failures; the saver keeps running
 * @returns Function that stops the timer and performs a final save
 */
export function startCheckpointSaver(
	store: CheckpointStore,
	tracker: ProgressTracker,
	intervalMs: number,
	onError: (error: unknown) => void,
): () => Promise<void> {
	const timer = setInterval(() => {
		store.save(tracker.watermark).catch(onError);
	}, intervalMs);
	timer.unref();

	return async () => {
		clearInterval(timer);
		await store.save(tracker.watermark);
	};
}
