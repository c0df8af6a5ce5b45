import pino from 'pino';

const isDevelopment = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
const disablePrettyPrint = process.env.DISABLE_PRETTY_PRINT_LOGGING === 'true';

// pino-pretty only in development, and only when not switched off (e.g. when shipping JSON logs)
const usePrettyPrint = isDevelopment && !disablePrettyPrint;

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label) => {
      return { level: label.toUpperCase() };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'library-api',
    environment: process.env.NODE_ENV || 'development',
  },
  ...(usePrettyPrint && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  }),
});

export default logger;

/**
 * Child logger tagged with the component that writes through it.
 */
export function componentLogger(component: string): pino.Logger {
  return logger.child({ component });
}
