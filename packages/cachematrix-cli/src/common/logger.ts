/**
 * Debug logger setup for cachematrix-cli.
 *
 * Uses the 'debug' library for configurable, namespace-based logging.
 */

import debug from 'debug';

const ROOT_NAMESPACE = 'cachematrix-cli';

/**
 * Create a namespaced logger.
 *
 * @param namespace - Sub-namespace (e.g., 'config', 'run')
 * @returns A debug logger function
 */
export function createLogger(namespace: string): debug.Debugger {
  return debug(`${ROOT_NAMESPACE}:${namespace}`);
}

export const configLog = createLogger('config');
export const runLog = createLogger('run');
