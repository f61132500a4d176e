import 'dotenv/config';
import { createLogger, format, transports } from 'winston';

const LEVELS = ['error', 'warn', 'info', 'debug'] as const;
type Level = (typeof LEVELS)[number];

function resolveLevel(value: string | undefined): Level {
  return LEVELS.find((level) => level === value) ?? 'info';
}

const logger = createLogger({
  level: resolveLevel(process.env.LOG_LEVEL),
  format: format.combine(
    format.timestamp(),
    format.printf(({ level, message, timestamp }) => `${timestamp} ${level.padEnd(5)} | ${message}`)
  ),
  transports: [
    new transports.Console({
      silent: process.env.NODE_ENV === 'test',
    }),
  ],
});

export default logger;
