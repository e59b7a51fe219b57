/**
 * Global configuration module.
 */

export { configure, getConfig, resetConfig, getDefaultConfig } from "./config.ts";
export type { MergeConfig } from "./config.ts";
