import winston from 'winston';
import path from 'path';
import config from '../config';

// Custom format for console output
const consoleFormat = winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
        return `[${timestamp}] ${level}: ${message} ${metaStr}`;
    })
);

// Custom format for file output
const fileFormat = winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.json()
);

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: consoleFormat,
    }),
];

if (config.app.logToFile && config.app.env !== 'test') {
    transports.push(
        // All logs
        new winston.transports.File({
            filename: path.resolve(__dirname, '../../logs/combined.log'),
            format: fileFormat,
            maxsize: 5242880, // 5MB
            maxFiles: 5,
        }),
        // Errors only
        new winston.transports.File({
            filename: path.resolve(__dirname, '../../logs/error.log'),
            level: 'error',
            format: fileFormat,
            maxsize: 5242880,
            maxFiles: 5,
        })
    );
}

export const logger = winston.createLogger({
    level: config.app.logLevel,
    silent: config.app.env === 'test',
    transports,
});

// Helper functions for structured logging
export const log = {
    info: (message: string, meta?: object) => logger.info(message, meta),
    warn: (message: string, meta?: object) => logger.warn(message, meta),
    error: (message: string, meta?: object) => logger.error(message, meta),
    debug: (message: string, meta?: object) => logger.debug(message, meta),

    trending: (action: string, category: string, meta?: object) =>
        logger.info(`[TRENDING] ${action}`, { category, ...meta }),

    hashtags: (action: string, meta?: object) =>
        logger.info(`[HASHTAGS] ${action}`, meta),

    api: (service: string, endpoint: string, status: number) =>
        logger.debug(`[API] ${service}`, { endpoint, status }),
};

export default logger;
