import { createLogger, format, transports } from 'winston';

const isTest = process.env.NODE_ENV === 'test';

const logger = createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: format.combine(format.timestamp(), format.json()),
    defaultMeta: { service: 'cyberbrief-daily' },
    transports: [new transports.Console()],
});

if (process.env.LOG_FILE && !isTest) {
    logger.add(new transports.File({ filename: process.env.LOG_FILE }));
}

if (isTest) {
    logger.transports.forEach((t) => (t.silent = true));
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export { logger };
