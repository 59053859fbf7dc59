/**
 * Scoped logging
 *
 * Every component logs through a `[Component]` prefix. The sink defaults to
 * the console; applications can hand in their own leveled logger through the
 * client config and keep the prefixes.
 */

import type { Logger } from '../types.mjs';

export type { Logger };

/**
 * Create a logger that prefixes every line with `[scope]`
 */
export function createLogger(scope: string, sink: Logger = console): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args: unknown[]) => sink.debug(prefix, ...args),
    info: (...args: unknown[]) => sink.info(prefix, ...args),
    warn: (...args: unknown[]) => sink.warn(prefix, ...args),
    error: (...args: unknown[]) => sink.error(prefix, ...args),
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
