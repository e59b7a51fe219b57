import debug from "debug";

// Base namespace for the project
const BASE_NAMESPACE = "tablemerge";

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('merge') -> returns a debugger for 'tablemerge:merge'
 *
 * Usage:
 * const log = createLogger('merge');
 * log('Joining on %o', keys);
 * const warnLog = log.extend('warn'); // Creates 'tablemerge:merge:warn'
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'merge', 'engine')
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'tablemerge:*')
 *   - 'tablemerge:merge:warn' - upcast warnings only
 *   - 'tablemerge:*,-tablemerge:engine' - everything but engine traces
 * @param logFn - Optional custom log function. Defaults to stderr.
 */
export function enableLogging(
	pattern = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void,
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/** Disable all debug logging. */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without 'tablemerge:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
