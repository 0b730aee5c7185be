import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../config/config';

const loggingConfig = getLoggingConfig();

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let msg = `${timestamp} [${level}]: ${message}`;
    if (Object.keys(meta).length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    return msg;
  })
);

export const logger = winston.createLogger({
  level: loggingConfig.level,
  format: logFormat,
  defaultMeta: { service: 'meshdash' },
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      silent: loggingConfig.nodeEnv === 'test',
    }),
  ],
});

// File transports only when LOG_FILE is set
if (loggingConfig.file) {
  const logDir = path.dirname(loggingConfig.file);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'meshdash-error.log'),
      level: 'error',
    })
  );
  logger.add(
    new winston.transports.File({
      filename: loggingConfig.file,
    })
  );
}

export default logger;
