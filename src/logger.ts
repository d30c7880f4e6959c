/**
 * framecode — Logger
 *
 * One pino root logger for the package, with a child per module.
 * Silent unless FRAMECODE_LOG_LEVEL says otherwise.
 */

import pino, { type Logger } from 'pino';
import { loadLogConfig, type LogConfig } from './config';

export type { Logger } from 'pino';

/** Build a root logger. Exposed for tests and embedding applications. */
export function createRootLogger(config: LogConfig = loadLogConfig()): Logger {
  return pino({ name: 'framecode', level: config.level });
}

const root = createRootLogger();

/** Child logger bound to a module name, e.g. `createLogger('parser')`. */
export function createLogger(module: string, parent: Logger = root): Logger {
  return parent.child({ module });
}
