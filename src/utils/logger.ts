import { createLogger, format, transports } from 'winston';

function resolveLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL.toLowerCase();
  }
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

const consoleFormat = format.printf(({ timestamp, level, message, stack, ...meta }) => {
  const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}${details}${trace}`;
});

export const logger = createLogger({
  level: resolveLevel(),
  format: format.combine(
    format.errors({ stack: true }),
    format.timestamp(),
    format.splat(),
    consoleFormat
  ),
  transports: [new transports.Console()]
});
