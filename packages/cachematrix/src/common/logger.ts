import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'cachematrix';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('solve') -> returns a debugger for 'cachematrix:solve'
 * Example: createLogger('matrix:self-caching') -> returns a debugger for 'cachematrix:matrix:self-caching'
 *
 * Usage:
 * const log = createLogger('solve');
 * log('Inverting %dx%d matrix', rows, columns);
 * const errorLog = log.extend('error'); // Creates 'cachematrix:solve:error'
 * errorLog('Inversion failed: %O', error);
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'solve', 'harness', 'matrix:external')
 * @returns A debug instance.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable cachematrix debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'cachematrix:*')
 *   Examples:
 *   - 'cachematrix:*' - all logs
 *   - 'cachematrix:matrix:*' - "computing inverse" messages from both caching designs
 *   - 'cachematrix:*,-cachematrix:harness' - all except harness progress
 * @param logFn - Optional custom log function. Defaults to the debug library's stderr writer.
 *
 * @example
 * ```typescript
 * import { enableLogging } from 'cachematrix';
 *
 * enableLogging('cachematrix:matrix:*');
 * ```
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/**
 * Disable all debug logging.
 */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without 'cachematrix:' prefix)
 * @returns true if logging is enabled for this namespace
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
