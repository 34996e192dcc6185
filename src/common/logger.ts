import debug from 'debug';

const BASE_NAMESPACE = 'circuit-compiler';

/**
 * Creates a namespaced debug logger.
 *
 * ```ts
 * const log = createLogger('passes:dead-code');
 * log('Removed %d operators', removed);
 * ```
 *
 * Output is enabled with `DEBUG=circuit-compiler:*`.
 */
export function createLogger(subNamespace: string): debug.Debugger {
  return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}
