import winston from 'winston';
import path from 'path';
import fs from 'fs';
import config from './config';

const isTest = config.nodeEnv === 'test';

const logger = winston.createLogger({
    level: config.logging.level,
    silent: isTest,
    format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
    ),
    defaultMeta: { service: 'attendance-push-bridge' },
});

if (!isTest) {
    // Ensure log directory exists
    const logDir = path.dirname(config.logging.file);
    if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
    }

    // Write all logs to file, errors to a separate file
    logger.add(new winston.transports.File({ filename: config.logging.file }));
    logger.add(
        new winston.transports.File({
            filename: path.join(logDir, 'error.log'),
            level: 'error',
        })
    );
}

// If not in production, also log to console with colorized output
if (config.nodeEnv !== 'production') {
    logger.add(
        new winston.transports.Console({
            format: winston.format.combine(
                winston.format.colorize(),
                winston.format.simple()
            ),
        })
    );
}

export default logger;
