import pino from 'pino';

const isDevMode = (process.env.NODE_ENV || 'development') === 'development';

const logger = pino({
  level: process.env.LOG_LEVEL || (isDevMode ? 'debug' : 'info'),
  // Service-level fields instead of pid/hostname
  base: {
    service: 'toolbound-chat',
    env: process.env.DEPLOY_ENV || process.env.NODE_ENV || 'development',
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  ...(isDevMode
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
      'apiKey',
      'llmApiKey',
      'jiraApiToken',
      'password',
      'authorization',
      'headers.KeyId',
      'headers.authorization',
    ],
    censor: '[REDACTED]',
  },
});

export { logger };

export function createLogger(component: string) {
  return logger.child({ component });
}
