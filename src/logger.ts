import winston from 'winston';

// Define log levels and colors
const logLevels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    debug: 4,
};

const logColors = {
    error: 'red',
    warn: 'yellow',
    info: 'green',
    http: 'magenta',
    debug: 'white',
};

winston.addColors(logColors);

const defaultLevel = (): string => {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
    return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
};

// Base logger configuration
const createBaseLogger = (className: string) => {
    const logFormat = winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
        winston.format.colorize({ all: true }),
        winston.format.printf((info) => {
            const { timestamp, level, message, ...args } = info;
            const argsStr = Object.keys(args).length ? JSON.stringify(args, null, 2) : '';
            return `${timestamp} [${level}] [${className}]: ${message} ${argsStr}`;
        })
    );

    return winston.createLogger({
        level: defaultLevel(),
        levels: logLevels,
        format: logFormat,
        silent: process.env.NODE_ENV === 'test',
        transports: [
            new winston.transports.Console({
                format: logFormat,
            }),
        ],
    });
};

// Logger factory function
export const getLogger = (className: string) => {
    return createBaseLogger(className);
};

// Default logger for non-class usage (bootstrap, routes)
const defaultLogger = createBaseLogger('System');

export default defaultLogger;
