import winston, { LeveledLogMethod } from 'winston';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

declare module 'winston' {
    interface Logger {
        fatal: LeveledLogMethod;
        perf: LeveledLogMethod;
        trace: LeveledLogMethod;
        cons: LeveledLogMethod;
    }
}

const customLevels = {
    levels: {
        fatal: 0,
        error: 1,
        perf: 2,
        warn: 3,
        info: 4,
        http: 5,
        verbose: 6,
        debug: 7,
        silly: 8,
        trace: 9,
        cons: 10,
    },
    colors: {
        fatal: 'redBG white',
        error: 'red',
        perf: 'magenta',
        warn: 'yellow',
        info: 'green',
        http: 'cyan',
        verbose: 'blue',
        debug: 'white',
        silly: 'grey',
        trace: 'grey',
        cons: 'inverse',
    },
};

type LogLevel = keyof typeof customLevels.levels;

function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(customLevels.levels, value);
}

const validLogLevels = Object.keys(customLevels.levels);

/**
 * Maps a configured level name to a known level, falling back to `info`.
 */
function resolveLogLevel(value: string | undefined): LogLevel {
    const level = (value || 'info').toLowerCase();
    if (isLogLevel(level)) return level;
    console.warn(`Invalid LOG_LEVEL "${level}" specified. Using "info" instead.`);
    console.warn(`Valid levels are: ${validLogLevels.join(', ')}`);
    return 'info';
}

const bigintSafe = (_key: string, value: unknown) => (typeof value === 'bigint' ? value.toString() : value);

// [timestamp] level: message {meta}
const consoleFormat = winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaStr = Object.keys(meta).length ? JSON.stringify(meta, bigintSafe) : '';
        return `[${timestamp}] ${level}: ${message} ${metaStr}`;
    })
);

function fileTransports(level: LogLevel): winston.transports.FileTransportInstance[] {
    if (process.env.LOG_FILE === 'false') return [];
    const here = path.dirname(fileURLToPath(import.meta.url));
    const logsDir = process.env.LOG_DIR || path.join(here, '..', 'logs');
    if (!fs.existsSync(logsDir)) fs.mkdirSync(logsDir, { recursive: true });
    const nodeIdentifier = process.env.NODE_ID || Math.random().toString(36).substring(7);
    return [
        new winston.transports.File({
            filename: path.join(logsDir, `staking-${nodeIdentifier}.log`),
            level,
            format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
        }),
    ];
}

winston.addColors(customLevels.colors);

const initialLevel = resolveLogLevel(process.env.LOG_LEVEL);

const logger = winston.createLogger({
    levels: customLevels.levels,
    level: initialLevel,
    format: winston.format.errors({ stack: true }),
    transports: [new winston.transports.Console({ format: consoleFormat }), ...fileTransports(initialLevel)],
});

export default logger;
