import winston from 'winston';
import path from 'path';

// appended to console lines so error details show without a log file
export function detailsSuffix(metadata: unknown): string {
    if (typeof metadata !== 'object' || metadata === null || !('details' in metadata)) {
        return '';
    }
    const serialized = JSON.stringify(metadata.details);
    return serialized === undefined ? '' : ` ${redactSensitive(serialized)}`;
}

const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(info => `${info.timestamp} ${info.level}: ${info.message}${detailsSuffix(info.metadata)}`),
);

const fileFormat = winston.format.combine(
    winston.format.timestamp(),
    winston.format.json(),
);

const sensitivePatterns = [

    // x-api-key headers and api_key=... pairs
    { pattern: /((?:x-)?api[_-]?key["']?\s*[=:]\s*["']?)[\w-]{8,}/gi, replacement: '$1[API_KEY]' },
]

export function redactSensitive(message: string): string {
    return sensitivePatterns.reduce(
        (result, { pattern, replacement }) => result.replace(pattern, replacement),
        message,
    );
}

const filterSensitiveData = winston.format((info) => {
    if (typeof info.message === 'string') {
        info.message = redactSensitive(info.message);
    }
    return info;
});

export const logger = winston.createLogger({
    level: 'info',
    format: winston.format.combine(
        filterSensitiveData(),
        winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp'] }),
        winston.format.json(),
    ),
    defaultMeta: { service: 'party-up' },
    transports: [

        // console
        new winston.transports.Console({
            format: consoleFormat,
        }),
    ],
});

export interface LoggerSettings {
    logLevel: string;
    logDir?: string;
}

// apply validated env settings once they are loaded
export function configureLogger({ logLevel, logDir }: LoggerSettings): void {
    logger.level = logLevel;

    if (logDir) {

        // error file
        logger.add(new winston.transports.File({
            filename: path.join(logDir, 'error.log'),
            level: 'error',
            format: fileFormat,
            maxsize: 10485760, // 10mb
        }));

        // combined file
        logger.add(new winston.transports.File({
            filename: path.join(logDir, 'combined.log'),
            format: fileFormat,
            maxsize: 10485760, // 10mb
        }));
    }
}

// what services need from a logger; satisfied by logger and withCycleContext
export interface LogSink {
    debug(message: string, meta?: object): unknown;
    info(message: string, meta?: object): unknown;
    warn(message: string, meta?: object): unknown;
    error(message: string, meta?: object): unknown;
}

export const withCycleContext = (cycle: number): LogSink => {
    return {
        debug: (message: string, meta = {}) => logger.debug(message, { cycle, ...meta }),
        info: (message: string, meta = {}) => logger.info(message, { cycle, ...meta }),
        warn: (message: string, meta = {}) => logger.warn(message, { cycle, ...meta }),
        error: (message: string, meta = {}) => logger.error(message, { cycle, ...meta })
    };
};

export default logger;
