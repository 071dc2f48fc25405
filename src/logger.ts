import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
    url?: string;
    attempt?: number;
    status?: number;
    durationMs?: number;
    [key: string]: unknown;
}

export interface LoggerConfig {
    level: LogLevel;
    prettyPrint: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function levelFromEnv(value: string | undefined): LogLevel {
    return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

const DEFAULT_CONFIG: LoggerConfig = {
    level: levelFromEnv(process.env.LOG_LEVEL),
    prettyPrint: process.env.LOG_PRETTY === 'true',
};

function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
    const options: LoggerOptions = {
        level: config.level,
        base: { pid: process.pid, service: 'page-tally' },
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: (label) => ({ level: label }),
        },
    };

    if (config.prettyPrint) {
        return pino({
            ...options,
            transport: {
                target: 'pino-pretty',
                options: { colorize: true, translateTime: 'SYS:standard', destination: 2 },
            },
        });
    }

    return pino(options, process.stderr);
}

let baseLogger = createBaseLogger();

export function configureLogger(config: Partial<LoggerConfig>): void {
    baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Component logger. Resolves the base logger on every call so that
 * configureLogger() also reaches loggers created before it ran.
 */
export class Logger {
    constructor(private readonly component: string) {}

    private get logger(): PinoLogger {
        return baseLogger.child({ component: this.component });
    }

    debug(message: string, context: LogContext = {}): void {
        this.logger.debug(context, message);
    }

    info(message: string, context: LogContext = {}): void {
        this.logger.info(context, message);
    }

    warn(message: string, context: LogContext = {}): void {
        this.logger.warn(context, message);
    }

    error(message: string, context: LogContext & { error?: unknown } = {}): void {
        const { error, ...rest } = context;
        if (error === undefined) {
            this.logger.error(rest, message);
            return;
        }
        const err = error instanceof Error
            ? { message: error.message, name: error.name, stack: error.stack }
            : { message: String(error) };
        this.logger.error({ ...rest, err }, message);
    }
}
