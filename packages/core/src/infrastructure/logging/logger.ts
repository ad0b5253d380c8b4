import winston from 'winston';

export type Logger = winston.Logger;

export interface LoggerOptions {
  /** Minimum level written. Default: `LOG_LEVEL` or `info`. */
  readonly level?: string;
  /** Name printed in each line's `[service]` tag. Default: `aep-ingest`. */
  readonly service?: string;
  /** Disable colour codes, e.g. when stderr is not a terminal. Default: `false`. */
  readonly plain?: boolean;
}

/**
 * Console logger writing every level to stderr, so command output on stdout
 * stays machine-readable.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const formats = [
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    ...(options.plain ? [] : [winston.format.colorize()]),
    winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
      const serviceName = typeof service === 'string' ? service : 'aep-ingest';
      const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} [${serviceName}] ${level}: ${String(message)}${metaStr}`;
    }),
  ];

  return winston.createLogger({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    format: winston.format.combine(...formats),
    defaultMeta: { service: options.service ?? 'aep-ingest' },
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      }),
    ],
  });
}

/** Logger that drops everything. Used by the SDK when the caller provides none. */
export function createSilentLogger(): Logger {
  return winston.createLogger({
    silent: true,
    transports: [new winston.transports.Console({ silent: true })],
  });
}
