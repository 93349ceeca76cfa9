// Logger: shared winston logger with per-component children
import { createLogger, format, transports, type Logger } from 'winston';

import { config } from '../config/index.js';

const lineFormat = format.printf(({ timestamp, level, message, component, ...meta }) => {
  const tag = typeof component === 'string' ? ` [${component}]` : '';
  const metaStr = Object.keys(meta).length > 0
    ? ` ${JSON.stringify(meta, bigintReplacer)}`
    : '';
  return `${String(timestamp)} [${level}]${tag} ${String(message)}${metaStr}`;
});

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export const logger: Logger = createLogger({
  level: config.logLevel,
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true })
  ),
  transports: [
    new transports.Console({
      format: config.logJson
        ? format.json({ replacer: bigintReplacer })
        : format.combine(format.colorize(), lineFormat)
    })
  ]
});

/**
 * Child logger tagged with a component name
 */
export function getLogger(component: string): Logger {
  return logger.child({ component });
}
