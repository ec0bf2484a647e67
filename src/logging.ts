import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const createLogger = (level: LogLevel = 'info'): winston.Logger => {
    let format: winston.Logform.Format;

    if (level === 'info') {
        format = winston.format.combine(
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ message }) => `${message}`),
        );
    } else {
        format = winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
                const metaString = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
                return `${timestamp} ${level}: ${message}${metaString}`;
            }),
        );
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            new winston.transports.Console(),
        ],
    });
};

let logger = createLogger();

export const setLogLevel = (level: LogLevel): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
