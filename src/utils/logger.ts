import winston from 'winston';
import path from 'path';

const isDevelopment = process.env.NODE_ENV === 'development';

// Define log format
const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(
    (info) => `${String(info.timestamp)} ${info.level}: ${String(info.message)}${info.stack ? `\n${String(info.stack)}` : ''}`
  )
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: isDevelopment ? consoleFormat : format,
  }),
];

// File transports only when a log directory is configured
if (process.env.LOG_DIR) {
  transports.push(
    new winston.transports.File({
      filename: path.join(process.env.LOG_DIR, 'error.log'),
      level: 'error',
      maxsize: 10485760, // 10MB
      maxFiles: 5,
    }),
    new winston.transports.File({
      filename: path.join(process.env.LOG_DIR, 'combined.log'),
      maxsize: 10485760, // 10MB
      maxFiles: 5,
    })
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
  format,
  transports,
  silent: process.env.NODE_ENV === 'test',
  exitOnError: false,
});

export const logError = (error: Error, context?: Record<string, unknown>) => {
  logger.error({
    message: error.message,
    stack: error.stack,
    name: error.name,
    ...context,
  });
};

/**
 * Records a confirmed ledger mutation.
 */
export const logAudit = (action: string, details: Record<string, unknown>) => {
  logger.info({
    type: 'AUDIT',
    action,
    timestamp: new Date().toISOString(),
    ...details,
  });
};

/**
 * Flags a divergence between the local cache and the ledger for operators.
 * Nothing is corrected automatically.
 */
export const logAnomaly = (anomaly: string, details: Record<string, unknown>) => {
  logger.warn({
    type: 'ANOMALY',
    anomaly,
    timestamp: new Date().toISOString(),
    ...details,
  });
};

export { logger };

export default logger;
