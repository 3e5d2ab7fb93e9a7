import { InvalidArgumentError } from "commander";
import { MAX_USERNAME_LENGTH, isValidUsername } from "./generate.js";

/**
 * Converts a CLI value to a number, rejecting blanks and trailing garbage.
 */
function toNumber(value: string): number {
	return value.trim() === "" ? Number.NaN : Number(value);
}

/**
 * Parses and validates a positive integer CLI argument.
 * @param value - Raw string value from CLI
 * @param name - Argument name for error messages
 * @returns Parsed positive integer
 * @throws InvalidArgumentError if not a positive integer
 */
export function parsePositiveInt(value: string, name: string): number {
	const parsed = toNumber(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new InvalidArgumentError(`${name} must be a positive integer`);
	}
	return parsed;
}

/**
 * Parses and validates a non-negative integer CLI argument.
 * @throws InvalidArgumentError if negative or not an integer
 */
export function parseNonNegativeInt(value: string, name: string): number {
	const parsed = toNumber(value);
	if (!Number.isInteger(parsed) || parsed < 0) {
		throw new InvalidArgumentError(`${name} must be a non-negative integer`);
	}
	return parsed;
}

/**
 * Parses a duration given in seconds into milliseconds.
 * @throws InvalidArgumentError if negative or not a number
 */
export function parseSeconds(value: string, name: string): number {
	const parsed = toNumber(value);
	if (!Number.isFinite(parsed) || parsed < 0) {
		throw new InvalidArgumentError(`${name} must be a non-negative number`);
	}
	return Math.round(parsed * 1000);
}

/**
 * Parses a duration in seconds that must be above zero, such as a timeout.
 * @throws InvalidArgumentError if zero, negative or not a number
 */
export function parsePositiveSeconds(value: string, name: string): number {
	const parsed = toNumber(value);
	if (!Number.isFinite(parsed) || parsed <= 0) {
		throw new InvalidArgumentError(`${name} must be a positive number`);
	}
	return Math.max(1, Math.round(parsed * 1000));
}

/**
 * Parses a username length bound.
 * @throws InvalidArgumentError if outside 1..30
 */
export function parseLength(value: string, name: string): number {
	const parsed = parsePositiveInt(value, name);
	if (parsed > MAX_USERNAME_LENGTH) {
		throw new InvalidArgumentError(
			`${name} must be at most ${MAX_USERNAME_LENGTH}`,
		);
	}
	return parsed;
}

/**
 * Normalizes usernames typed on the command line and splits off the ones
 * that can never be registered, so they are never requested.
 * @returns Valid names to check and invalid names to report, in input order
 */
export function partitionUsernames(input: string[]): {
	valid: string[];
	invalid: string[];
} {
	const valid: string[] = [];
	const invalid: string[] = [];
	for (const raw of input) {
		const name = raw.trim().toLowerCase().replace(/^@/, "");
		if (isValidUsername(name)) {
			valid.push(name);
		} else {
			invalid.push(name);
		}
	}
	return { valid, invalid };
}
