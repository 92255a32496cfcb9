import winston from 'winston';

/**
 * Console line: timestamp, level and message, followed by any context object
 * the caller passed as JSON
 */
export function formatConsoleLine(info: winston.Logform.TransformableInfo): string {
  const { timestamp, level, message, ...context } = info;
  const details = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
  return `${String(timestamp)} ${level}: ${String(message)}${details}`;
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.LOG_LEVEL === 'silent',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
      format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(formatConsoleLine)
      ),
    }),
  ],
});

export default logger;
