/**
 * Logger utility using Pino
 *
 * Structured JSON logging with child loggers per component. The level comes
 * from LOG_LEVEL through the configuration service.
 */

import pino, { type Logger } from 'pino';
import { ConfigurationService } from '../config/ConfigurationService.js';

export type { Logger };

/**
 * Base logger instance
 */
export const logger: Logger = pino({
  name: 'multi-node-provider',
  level: ConfigurationService.getInstance().getLogLevel(),
});

/**
 * Create a child logger for a specific component
 *
 * @example
 * const log = createChildLogger('failover');
 * log.warn({ error: 'connect ECONNREFUSED ****' }, 'Provider not responding.');
 */
export function createChildLogger(component: string): Logger {
  return logger.child({ component });
}
