
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

/**
 * Levelled console logger. Everything goes to stderr: stdout belongs to the report.
 */
export class Logger {
    private readonly level: LogLevel;
    private readonly prefix: string;

    constructor(level?: string, prefix = '[cpumap-stats]') {
        // XDP_STATS_LOG wins over the generic LOG_LEVEL
        const envLevel = level?.toUpperCase()
            || process.env.XDP_STATS_LOG?.toUpperCase()
            || process.env.LOG_LEVEL?.toUpperCase()
            || 'INFO';
        this.level = Logger.parseLevel(envLevel);
        this.prefix = prefix;
    }

    static parseLevel(lvl: string): LogLevel {
        switch (lvl) {
            case 'TRACE':
            case 'DEBUG': return LogLevel.DEBUG;
            case 'INFO': return LogLevel.INFO;
            case 'WARN': return LogLevel.WARN;
            case 'ERROR': return LogLevel.ERROR;
            case 'OFF': return LogLevel.NONE;
            default: return LogLevel.INFO;
        }
    }

    debug(msg: string, ...args: unknown[]) {
        if (this.level <= LogLevel.DEBUG) {
            // Cyan
            console.error(`\x1b[36m${this.prefix} [DEBUG]\x1b[0m ${msg}`, ...args);
        }
    }

    info(msg: string, ...args: unknown[]) {
        if (this.level <= LogLevel.INFO) {
            // Green
            console.error(`\x1b[32m${this.prefix} [INFO]\x1b[0m ${msg}`, ...args);
        }
    }

    warn(msg: string, ...args: unknown[]) {
        if (this.level <= LogLevel.WARN) {
            // Yellow
            console.error(`\x1b[33m${this.prefix} [WARN]\x1b[0m ${msg}`, ...args);
        }
    }

    error(msg: string, ...args: unknown[]) {
        if (this.level <= LogLevel.ERROR) {
            // Red
            console.error(`\x1b[31m${this.prefix} [ERROR]\x1b[0m ${msg}`, ...args);
        }
    }
}

// Shared instance
export const logger = new Logger();
