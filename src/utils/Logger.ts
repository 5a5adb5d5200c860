/**
 * Internal logging utility for the codec and CLI.
 * Levelled, tagged console output.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

export class Logger {
    private level: LogLevel = LogLevel.INFO;
    private tag: string;

    constructor(tag: string = 'bjdata', debug: boolean = false) {
        this.tag = tag;
        if (debug) {
            this.level = LogLevel.DEBUG;
        }
    }

    public setLogLevel(level: LogLevel): void {
        this.level = level;
    }

    private log(method: 'debug' | 'warn' | 'error', levelName: string, message: string, ...args: unknown[]): void {
        const prefix = `[${this.tag}]${levelName === 'DEBUG' ? ' (DEBUG)' : ''}${levelName === 'WARN' ? ' ⚠️' : ''}${levelName === 'ERROR' ? ' ❌' : ''}`;
        console[method](`${prefix} ${message}`, ...args);
    }

    public debug(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.DEBUG) {
            this.log('debug', 'DEBUG', message, ...args);
        }
    }

    public warn(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.WARN) {
            this.log('warn', 'WARN', message, ...args);
        }
    }

    public error(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.ERROR) {
            this.log('error', 'ERROR', message, ...args);
        }
    }

    /**
     * Creates a child logger with an extended tag.
     */
    public child(subTag: string): Logger {
        const child = new Logger(`${this.tag}:${subTag}`);
        child.setLogLevel(this.level);
        return child;
    }
}

// Global default logger
export const logger = new Logger('bjdata');

/**
 * Logger for one codec component. `debug` forces DEBUG level for that
 * component only.
 */
export function componentLogger(name: string, debug: boolean): Logger {
    const child = logger.child(name);
    if (debug) {
        child.setLogLevel(LogLevel.DEBUG);
    }
    return child;
}
