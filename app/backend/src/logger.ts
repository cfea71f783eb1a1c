import winston from 'winston';

const lineFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(
    ({ level, message, timestamp, service }) =>
      `[${timestamp as string}] ${level} ${service as string}: ${message as string}`
  )
);

/** `LOG_FORMAT=json` switches to one JSON object per line for log shippers. */
export function resolveLogFormat(format: string | undefined) {
  return format === 'json'
    ? winston.format.combine(winston.format.timestamp(), winston.format.json())
    : lineFormat;
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  silent: process.env.LOG_SILENT === 'true',
  defaultMeta: { service: 'qr-compose' },
  transports: [new winston.transports.Console()],
  format: resolveLogFormat(process.env.LOG_FORMAT),
});
