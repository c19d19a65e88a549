import winston from 'winston';
import { settings } from '../config';

export function createLogger(component: string): winston.Logger {
  return winston.createLogger({
    level: settings.app.log_level.toLowerCase(),
    silent: process.env.NODE_ENV === 'test',
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.printf(info => `${info.timestamp} |${info.level} | [${component}] ${info.message}`)
    ),
    transports: [
      new winston.transports.Console()
    ],
  });
}
