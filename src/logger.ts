import winston from 'winston';

const LEVELS = ['error', 'warn', 'info', 'debug'] as const;
type LogLevel = typeof LEVELS[number];

function resolveLevel(value: string | undefined, fallback: LogLevel): LogLevel {
    const normalized = value?.trim().toLowerCase();
    return LEVELS.find((level) => level === normalized) ?? fallback;
}

function createLogger(): winston.Logger {
    const format = winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf(({ timestamp, level, message }) => `[${timestamp}] ${level}: ${message}`)
    );

    // Everything goes to stderr so `ask --json` output stays parseable.
    const transports: winston.transport[] = [
        new winston.transports.Console({ stderrLevels: [...LEVELS] }),
    ];

    const logFile = process.env.LOG_FILE?.trim();
    if (logFile) {
        transports.push(new winston.transports.File({ filename: logFile, level: 'debug' }));
    }

    return winston.createLogger({
        level: resolveLevel(process.env.LOG_LEVEL, 'warn'),
        format,
        transports,
    });
}

export const logger = createLogger();

export function setLogLevel(level: string): void {
    logger.level = resolveLevel(level, 'warn');
}
