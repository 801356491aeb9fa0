import path from 'path';
import winston from 'winston';
import { config } from '../config/environment';

const transports: winston.transport[] = [];

// Rotating JSON files only when a log directory is configured
if (config.logDir) {
  transports.push(
    new winston.transports.File({
      filename: path.join(config.logDir, 'error.log'),
      level: 'error',
      maxsize: 5242880, // 5MB
      maxFiles: 5
    }),
    new winston.transports.File({
      filename: path.join(config.logDir, 'combined.log'),
      maxsize: 5242880,
      maxFiles: 5
    })
  );
}

if (config.nodeEnv !== 'production' || transports.length === 0) {
  transports.push(new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        let msg = `${timestamp} [${service}] ${level}: ${message}`;

        const metaKeys = Object.keys(meta);
        if (metaKeys.length > 0) {
          msg += ` ${JSON.stringify(meta)}`;
        }

        return msg;
      })
    )
  }));
}

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: 'vocabulary-service',
    version: process.env.npm_package_version || '1.0.0'
  },
  transports
});

export default logger;
