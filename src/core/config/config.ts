import { HashJoinEngine } from "../../merge/hash-join-engine.ts";
import type { JoinEngine } from "../../merge/engine.ts";
import type { MergeHow, MergeWarning } from "../../merge/types.ts";
import { createLogger } from "../../utils/logger.ts";

const warnLog = createLogger("merge").extend("warn");

/**
 * Merge defaults applied when a call leaves an option out.
 */
export interface MergeConfig {
	/** Join kind (default: "inner") */
	defaultHow: MergeHow;

	/** Suffixes for overlapping names (default: none) */
	defaultSuffixes: readonly [string, string];

	/** Partition-sorted column order (default: false) */
	defaultSort: boolean;

	/** Engine executing the physical join (default: in-process hash join) */
	engine: JoinEngine;

	/** Warning handler (default: log on `tablemerge:merge:warn`) */
	onWarning: (warning: MergeWarning) => void;
}

function logWarning(warning: MergeWarning): void {
	warnLog("%s", warning.message);
}

/**
 * Default configuration.
 */
const DEFAULT_CONFIG: MergeConfig = {
	defaultHow: "inner",
	defaultSuffixes: ["", ""],
	defaultSort: false,
	engine: new HashJoinEngine(),
	onWarning: logWarning,
};

/** Current global configuration */
let currentConfig: MergeConfig = { ...DEFAULT_CONFIG };

/**
 * Configure merge defaults.
 *
 * @example
 * ```ts
 * import { configure } from 'tablemerge';
 *
 * // Always suffix overlapping columns
 * configure({ defaultSuffixes: ['_x', '_y'] });
 *
 * // Route warnings to your own logger
 * configure({ onWarning: (w) => logger.warn(w.message) });
 * ```
 */
export function configure(options: Partial<MergeConfig>): void {
	currentConfig = { ...currentConfig, ...options };
}

/**
 * Get current configuration.
 */
export function getConfig(): Readonly<MergeConfig> {
	return currentConfig;
}

/**
 * Reset configuration to defaults.
 */
export function resetConfig(): void {
	currentConfig = { ...DEFAULT_CONFIG };
}

/**
 * Get default configuration.
 */
export function getDefaultConfig(): Readonly<MergeConfig> {
	return DEFAULT_CONFIG;
}
