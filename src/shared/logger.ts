import pino from 'pino';

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    process.env['NODE_ENV'] !== 'production'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: ['api_key', 'apiKey', 'key', '*.api_key', 'youtube.api_key'],
    censor: '***REDACTED***',
  },
});

/**
 * Apply a level chosen on the command line after the logger was created.
 */
export function setLogLevel(level: string | undefined): void {
  if (!level) return;
  const normalized = level.toLowerCase() === 'warning' ? 'warn' : level.toLowerCase();
  if (!(normalized in logger.levels.values)) {
    logger.warn({ level }, 'Unknown log level, keeping current');
    return;
  }
  logger.level = normalized;
}
