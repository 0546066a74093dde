import winston from 'winston';

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    // stdout carries the decoder's JSON output, so every level goes to stderr
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']
    })
  ]
});

export function setLogLevel(level: string): void {
  if (!process.env.LOG_LEVEL) {
    logger.level = level;
  }
}

export default logger;
