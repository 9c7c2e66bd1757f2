import pino from 'pino';

const isDevMode = (process.env.NODE_ENV || 'development') === 'development';
// stdio transports own stdout
const logToStderr = process.env.LOG_STDERR === 'true';

const logger = pino({
  level: process.env.LOG_LEVEL || (isDevMode ? 'debug' : 'info'),
  // Replace default base (pid, hostname) with service-level fields for log aggregation
  base: {
    service: 'identity-registry',
    env: process.env.DEPLOY_ENV || process.env.NODE_ENV || 'development',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Level as string ("info") instead of number (30)
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  ...(isDevMode && !logToStderr
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss',
            ignore: 'pid,hostname,component,service,env',
            singleLine: true,
            messageFormat: '[{component}] {msg}',
          },
        },
      }
    : {}),
  redact: {
    paths: [
      'signature',
      'authorization',
      'headers.authorization',
      'headers["x-registry-signature"]',
      'req.headers["x-registry-signature"]',
    ],
    censor: '[REDACTED]',
  },
}, logToStderr ? pino.destination(2) : undefined);

export { logger };

export function createLogger(component: string) {
  return logger.child({ component });
}
