export {
	blockPauseFor,
	checkUsername,
	checkUsernames,
	classifyStatus,
	probeUsername,
	profileUrl,
} from "./checker.js";
export {
	createCheckpointStore,
	createProgressTracker,
	loadCheckpoint,
	startCheckpointSaver,
} from "./checkpoint.js";
export type { CheckpointStore, ProgressTracker } from "./checkpoint.js";
export {
	USERNAME_ALPHABET,
	compareUsernames,
	countUsernames,
	generateUsernames,
	isValidUsername,
} from "./generate.js";
export { openAvailableFile } from "./output.js";
export type { AvailableSink } from "./output.js";
export { scanUsernames } from "./scan.js";
export type {
	CheckOptions,
	CheckResult,
	CheckStatus,
	GenerateOptions,
	ProbeResult,
	ProbeStatus,
	ScanOptions,
	ScanSummary,
} from "./types.js";
