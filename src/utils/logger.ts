/**
 * 📝 STRUCTURED LOGGER
 * Static facade over winston. Every failure that is swallowed on purpose
 * (soft network failures, per-candidate errors) still goes through here.
 */

import winston from 'winston';
import 'winston-daily-rotate-file';

export enum ErrorCategory {
    NETWORK = 'NETWORK',      // Timeout, DNS, Connection refused
    BROWSER = 'BROWSER',      // Rendered-page fallback failures
    PARSING = 'PARSING',      // HTML/XML/JSON parsing failures
    VALIDATION = 'VALIDATION', // Data validation failures (zod)
    AUTH = 'AUTH',            // API key invalid, rate limited
    IO = 'IO',                // CSV/checkpoint writes
    LOGIC = 'LOGIC'           // Programmer error (bugs)
}

export interface LogContext {
    company_name?: string;
    comune?: string;
    url?: string;
    error?: Error;
    error_category?: ErrorCategory;
    duration_ms?: number;
    [key: string]: unknown;
}

type Level = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

const LEVELS: Record<Level, number> = { fatal: 0, error: 1, warn: 2, info: 3, debug: 4 };

const IO_CODES = new Set(['eacces', 'eisdir', 'enospc', 'erofs', 'eperm', 'enoent', 'emfile']);

const COLORS: Record<string, string> = {
    info: '\x1b[32m',   // Green
    warn: '\x1b[33m',   // Yellow
    error: '\x1b[31m',  // Red
    fatal: '\x1b[35m',  // Magenta
    debug: '\x1b[36m',  // Cyan
};

function devFormat(): winston.Logform.Format {
    return winston.format.printf((info) => {
        const color = COLORS[info.level] ?? '\x1b[37m';
        const reset = '\x1b[0m';
        let output = `${color}[${String(info.timestamp)}] [${info.level.toUpperCase()}]${reset} ${String(info.message)}`;

        // Only show key fields in dev mode
        const brief = {
            company: info.company_name,
            url: info.url,
            category: info.error_category,
            error: info.error_message,
        };
        const filtered = Object.fromEntries(Object.entries(brief).filter(([, v]) => v !== undefined));
        if (Object.keys(filtered).length > 0) {
            output += ` ${JSON.stringify(filtered)}`;
        }
        if ((info.level === 'error' || info.level === 'fatal') && typeof info.error_stack === 'string') {
            output += `\n${color}${info.error_stack}${reset}`;
        }
        return output;
    });
}

function createWinston(): winston.Logger {
    const env = process.env.NODE_ENV ?? 'development';
    const isDev = env !== 'production';
    const explicitLevel = process.env.LOG_LEVEL;

    const consoleTransport = new winston.transports.Console({
        format: isDev ? devFormat() : winston.format.json(),
    });
    const transports = process.env.LOG_TO_FILE === 'true'
        ? [
            consoleTransport,
            new winston.transports.DailyRotateFile({
                dirname: process.env.LOG_DIR ?? 'logs',
                filename: 'lead-enricher-%DATE%.log',
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '20m',
                maxFiles: '14d',
                format: winston.format.json(),
            }),
        ]
        : [consoleTransport];

    return winston.createLogger({
        levels: LEVELS,
        level: explicitLevel ?? 'info',
        silent: env === 'test' && explicitLevel === undefined,
        defaultMeta: { service: process.env.SERVICE_NAME ?? 'lead-enricher' },
        format: winston.format.timestamp(),
        transports,
    });
}

export class Logger {
    private static instance: winston.Logger | null = null;

    private static get winston(): winston.Logger {
        if (!this.instance) {
            this.instance = createWinston();
        }
        return this.instance;
    }

    static debug(msg: string, context?: LogContext) {
        this.log('debug', msg, context);
    }

    static info(msg: string, context?: LogContext) {
        this.log('info', msg, context);
    }

    static warn(msg: string, context?: LogContext) {
        this.log('warn', msg, context);
    }

    static error(msg: string, context?: LogContext) {
        this.log('error', msg, context);
    }

    /**
     * 💀 FATAL: unrecoverable errors (configuration, lost rows)
     */
    static fatal(msg: string, context?: LogContext) {
        this.log('fatal', msg, context);
    }

    /**
     * 🔥 Categorize an error automatically
     */
    static categorizeError(error: Error): ErrorCategory {
        const msg = error.message.toLowerCase();
        const code = 'code' in error && typeof error.code === 'string' ? error.code.toLowerCase() : '';

        if (
            msg.includes('timeout') || msg.includes('econnrefused') || msg.includes('enotfound') ||
            msg.includes('socket') || msg.includes('econnreset') || code.startsWith('econn') || code === 'etimedout'
        ) {
            return ErrorCategory.NETWORK;
        }
        if (msg.includes('browser') || msg.includes('render') || msg.includes('target closed')) {
            return ErrorCategory.BROWSER;
        }
        if (msg.includes('parse') || msg.includes('unexpected token') || msg.includes('json')) {
            return ErrorCategory.PARSING;
        }
        if (msg.includes('validation') || msg.includes('zod') || msg.includes('invalid')) {
            return ErrorCategory.VALIDATION;
        }
        if (msg.includes('401') || msg.includes('403') || msg.includes('429') || msg.includes('api key') || msg.includes('rate limit')) {
            return ErrorCategory.AUTH;
        }
        if (IO_CODES.has(code) || [...IO_CODES].some((c) => msg.includes(c))) {
            return ErrorCategory.IO;
        }
        return ErrorCategory.LOGIC;
    }

    /**
     * 📊 Log an error with automatic categorization
     */
    static logError(msg: string, error: unknown, extraContext?: Partial<LogContext>) {
        const err = error instanceof Error ? error : new Error(String(error));
        this.error(msg, {
            ...extraContext,
            error: err,
            error_category: this.categorizeError(err),
        });
    }

    private static log(level: Level, msg: string, context?: LogContext) {
        if (!context) {
            this.winston.log(level, msg);
            return;
        }

        // Replace error object with serializable version
        const { error, ...rest } = context;
        const meta: Record<string, unknown> = { ...rest };
        if (error instanceof Error) {
            meta.error_message = error.message;
            meta.error_stack = error.stack;
        }
        this.winston.log(level, msg, meta);
    }
}
