import winston from 'winston';
import { config } from '../config';

const logFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

export const logger = winston.createLogger({
  level: config.app.isProduction ? 'info' : 'debug',
  format: logFormat,
  defaultMeta: { service: config.app.name },
  silent: config.app.env === 'test',
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    })
  ]
});

// Add file transport in production
if (config.app.isProduction) {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error'
    })
  );

  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log'
    })
  );
}
