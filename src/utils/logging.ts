import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { ConfigManager } from '../config/ConfigManager.js';

// Create logger with default config first to avoid circular dependency
// Will be configured properly during initializeLogger()
export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        winston.format.simple()
      ),
    }),
  ],
});

let isInitialized = false;

/**
 * Initialize logger with configuration from ConfigManager
 * Must be called after ConfigManager is fully initialized
 */
export function initializeLogger(configManager: ConfigManager = ConfigManager.getInstance()): void {
  if (isInitialized) {
    return;
  }

  const config = configManager.getConfig();

  logger.level = config.logging.level;

  logger.clear();

  if (config.logging.file.enabled) {
    logger.add(
      new DailyRotateFile({
        filename: `${config.logging.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: `${config.logging.file.maxSize}m`,
        maxFiles: `${config.logging.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.logging.file.path}/.audit-error.json`,
      })
    );

    logger.add(
      new DailyRotateFile({
        filename: `${config.logging.file.path}/app-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: `${config.logging.file.maxSize}m`,
        maxFiles: `${config.logging.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.logging.file.path}/.audit-app.json`,
      })
    );
  }

  if (config.logging.console.enabled) {
    logger.add(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize({ all: config.logging.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  // winston complains when every transport is gone
  if (logger.transports.length === 0) {
    logger.add(new winston.transports.Console({ silent: true }));
  }

  isInitialized = true;
  logger.info('Logger initialized with configuration', { level: config.logging.level });
}
