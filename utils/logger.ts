// utils/logger.ts
import pino, { TransportSingleOptions } from 'pino';

// Pino default levels: trace:10, debug:20, info:30, warn:40, error:50, fatal:60
const customLevels = {
  http: 25, // between debug and info
};

const env = process.env.NODE_ENV;

// Development: pretty printing. Production: JSON lines.
const transport: TransportSingleOptions | undefined = env === 'development'
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    }
  : undefined;

const resolveLevel = (): string => {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (env === 'test') return 'silent';
  return env === 'development' ? 'debug' : 'info';
};

const logger = pino({
  level: resolveLevel(),
  customLevels,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport,
});

export default logger;
