//
//
//

import winston, { createLogger, Logger } from 'winston';

const DEFAULT_LEVEL = 'info';

let level = DEFAULT_LEVEL;

/**
 * Sets the level used by loggers created from now on. Names winston does
 * not know fall back to info, so errors are never dropped.
 */
export function setLogLevel(newLevel: string) {
  level = newLevel in winston.config.npm.levels ? newLevel : DEFAULT_LEVEL;
}

export function getLogger(label: string): Logger {
  return createLogger({
    level,
    silent: process.env.NODE_ENV === 'test',
    format: winston.format.combine(
      winston.format.label({ label }),
      winston.format.colorize(),
      winston.format.simple()
    ),
    transports: [new winston.transports.Console()],
  });
}
