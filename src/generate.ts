import type { GenerateOptions } from "./types.js";

/** Characters allowed in a username, in generation order */
export const USERNAME_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789._";

export const MIN_USERNAME_LENGTH = 1;
export const MAX_USERNAME_LENGTH = 30;

/**
 * Checks a string against the platform's username rules.
 * @param username - Candidate to validate
 * @param minLength - Shortest accepted length
 * @param maxLength - Longest accepted length
 * @returns True if the candidate could be registered
 */
export function isValidUsername(
	username: string,
	minLength = MIN_USERNAME_LENGTH,
	maxLength = MAX_USERNAME_LENGTH,
): boolean {
	if (username.length < minLength || username.length > maxLength) return false;
	if (username.startsWith(".") || username.endsWith(".")) return false;
	if (username.includes("..")) return false;
	for (const char of username) {
		if (!USERNAME_ALPHABET.includes(char)) return false;
	}
	return true;
}

/**
 * Orders usernames the way the generator yields them: shorter first, then by
 * alphabet position character by character.
 */
export function compareUsernames(a: string, b: string): number {
	if (a.length !== b.length) return a.length - b.length;
	for (let i = 0; i < a.length; i++) {
		const diff =
			USERNAME_ALPHABET.indexOf(a.charAt(i)) -
			USERNAME_ALPHABET.indexOf(b.charAt(i));
		if (diff !== 0) return diff;
	}
	return 0;
}

function resolveBounds(
	minLength = MIN_USERNAME_LENGTH,
	maxLength = MAX_USERNAME_LENGTH,
): [number, number] {
	if (
		!Number.isInteger(minLength) ||
		!Number.isInteger(maxLength) ||
		minLength < MIN_USERNAME_LENGTH ||
		maxLength > MAX_USERNAME_LENGTH ||
		minLength > maxLength
	) {
		throw new Error(
			`Length range must satisfy ${MIN_USERNAME_LENGTH} <= min <= max <= ${MAX_USERNAME_LENGTH} (got ${minLength}..${maxLength})`,
		);
	}
	return [minLength, maxLength];
}

/**
 * Extends `prefix` to `length` characters, skipping any branch that would
 * break the dot rules. While `floor` is set the walk stays on the floor's
 * path and the floor itself is not yielded.
 */
function* extend(
	prefix: string,
	length: number,
	floor: string | undefined,
): Generator<string> {
	if (prefix.length === length) {
		if (floor === undefined) yield prefix;
		return;
	}

	const position = prefix.length;
	const start = floor ? USERNAME_ALPHABET.indexOf(floor.charAt(position)) : 0;

	for (let i = start; i < USERNAME_ALPHABET.length; i++) {
		const char = USERNAME_ALPHABET.charAt(i);
		if (
			char === "." &&
			(position === 0 || position === length - 1 || prefix.endsWith("."))
		) {
			continue;
		}
		yield* extend(prefix + char, length, i === start ? floor : undefined);
	}
}

/**
 * Lazily yields every valid username in the length range, shortest first.
 * The sequence is finite and deterministic, so passing the last processed
 * candidate as `startAfter` resumes exactly where a previous run stopped.
 * @throws Error if the bounds are out of range or `startAfter` is not a valid username
 */
export function* generateUsernames(
	options: GenerateOptions = {},
): Generator<string> {
	const [minLength, maxLength] = resolveBounds(
		options.minLength,
		options.maxLength,
	);
	const { startAfter } = options;

	if (startAfter !== undefined && !isValidUsername(startAfter)) {
		throw new Error(`Cannot resume after invalid username "${startAfter}"`);
	}

	for (let length = minLength; length <= maxLength; length++) {
		if (startAfter !== undefined && length < startAfter.length) continue;
		const floor = startAfter?.length === length ? startAfter : undefined;
		yield* extend("", length, floor);
	}
}

/**
 * Counts the usernames of a single length without enumerating them.
 * Tracks strings ending in a dot separately, since only those restrict the
 * next character.
 */
function countForLength(length: number): bigint {
	const letters = BigInt(USERNAME_ALPHABET.length - 1);
	let endsPlain = letters;
	let endsDot = 0n;
	for (let i = 1; i < length; i++) {
		const nextPlain = (endsPlain + endsDot) * letters;
		endsDot = endsPlain;
		endsPlain = nextPlain;
	}
	return endsPlain;
}

/**
 * Number of candidates `generateUsernames` yields for the range.
 * @returns Exact count, which exceeds Number.MAX_SAFE_INTEGER for long names
 */
export function countUsernames(minLength?: number, maxLength?: number): bigint {
	const [min, max] = resolveBounds(minLength, maxLength);
	let total = 0n;
	for (let length = min; length <= max; length++) {
		total += countForLength(length);
	}
	return total;
}

/**
 * Per-length candidate totals for display.
 */
export function countUsernamesByLength(
	minLength?: number,
	maxLength?: number,
): Array<{ length: number; count: bigint }> {
	const [min, max] = resolveBounds(minLength, maxLength);
	const rows: Array<{ length: number; count: bigint }> = [];
	for (let length = min; length <= max; length++) {
		rows.push({ length, count: countForLength(length) });
	}
	return rows;
}
