import type { LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

// Signed wizard cookies stay out of request logs.
const REDACTED_PATHS = ['req.headers.cookie', 'res.headers["set-cookie"]'];

export const createLogger = (level: string): LoggerOptions => ({
  name: 'station-analyzer',
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label })
  },
  redact: { paths: REDACTED_PATHS, censor: '[redacted]' }
});
