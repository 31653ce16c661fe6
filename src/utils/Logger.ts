/**
 * Internal logging utility for pairpen.
 * Structured logging with levels and tags; every component gets a child
 * logger so session, link and control traffic can be told apart.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'none';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    none: LogLevel.NONE,
};

export function parseLogLevel(name: LogLevelName): LogLevel {
    return LEVELS_BY_NAME[name];
}

export function isLogLevelName(value: string): value is LogLevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS_BY_NAME, value);
}

export class Logger {
    private level: LogLevel = LogLevel.INFO;
    private readonly tag: string;
    private useJson: boolean = false;

    constructor(tag: string = 'pairpen', debug: boolean = false) {
        this.tag = tag;
        if (debug) {
            this.level = LogLevel.DEBUG;
        }
    }

    public setLogLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLogLevel(): LogLevel {
        return this.level;
    }

    public setJson(enabled: boolean): void {
        this.useJson = enabled;
    }

    private log(method: 'debug' | 'info' | 'warn' | 'error', levelName: string, message: string, args: unknown[]): void {
        if (this.useJson) {
            const entry = {
                timestamp: new Date().toISOString(),
                tag: this.tag,
                level: levelName,
                message,
                data: args.length > 0 ? args.map(toLoggable) : undefined
            };
            console[method](JSON.stringify(entry));
        } else {
            const prefix = `[${this.tag}]${levelName === 'DEBUG' ? ' (DEBUG)' : ''}${levelName === 'WARN' ? ' ⚠️' : ''}${levelName === 'ERROR' ? ' ❌' : ''}`;
            console[method](`${prefix} ${message}`, ...args);
        }
    }

    public debug(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.DEBUG) {
            this.log('debug', 'DEBUG', message, args);
        }
    }

    public info(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.INFO) {
            this.log('info', 'INFO', message, args);
        }
    }

    public warn(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.WARN) {
            this.log('warn', 'WARN', message, args);
        }
    }

    public error(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.ERROR) {
            this.log('error', 'ERROR', message, args);
        }
    }

    /**
     * Creates a child logger with an extended tag.
     */
    public child(subTag: string): Logger {
        const child = new Logger(`${this.tag}:${subTag}`);
        child.setLogLevel(this.level);
        child.setJson(this.useJson);
        return child;
    }

    public toJSON() {
        return {
            tag: this.tag,
            level: this.level,
            useJson: this.useJson
        };
    }
}

/**
 * Errors do not survive JSON.stringify; flatten them to name/message/code.
 */
function toLoggable(value: unknown): unknown {
    if (value instanceof Error) {
        const code = 'code' in value ? value.code : undefined;
        return { name: value.name, message: value.message, code };
    }
    return value;
}

/**
 * Shortens document text for log lines.
 */
export function preview(text: string, max: number = 50): string {
    return text.length > max ? `${text.slice(0, max)}...` : text;
}

// Global default logger
export const logger = new Logger('pairpen');
