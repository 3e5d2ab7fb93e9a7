import { appendFile, readFile } from "node:fs/promises";
import pLimit from "p-limit";

export const DEFAULT_OUTPUT_FILE = "available_instagram.txt";

/**
 * Destination for usernames found to be available.
 */
export interface AvailableSink {
	/**
	 * Records a username.
	 * @returns False if it was already recorded
	 */
	append(username: string): Promise<boolean>;
	/** Usernames recorded so far, including those loaded from earlier runs */
	readonly size: number;
}

function isMissingFile(e: unknown): boolean {
	return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * Opens the output file for appending, one username per line.
 * Lines already in the file are loaded first so a resumed run never writes a
 * name twice. Appends go through a single-slot queue, so concurrent workers
 * cannot interleave partial lines.
 * @param path - Output file path
 */
export async function openAvailableFile(path: string): Promise<AvailableSink> {
	const written = new Set<string>();
	let needsNewline = false;

	try {
		const existing = await readFile(path, "utf8");
		needsNewline = existing.length > 0 && !existing.endsWith("\n");
		for (const line of existing.split(/\r?\n/)) {
			const name = line.trim();
			if (name) written.add(name);
		}
	} catch (e) {
		if (!isMissingFile(e)) throw e;
	}

	const lock = pLimit(1);

	return {
		append: (username) =>
			lock(async () => {
				if (written.has(username)) return false;
				const prefix = needsNewline ? "\n" : "";
				await appendFile(path, `${prefix}${username}\n`, "utf8");
				needsNewline = false;
				written.add(username);
				return true;
			}),
		get size() {
			return written.size;
		},
	};
}
