export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'none';

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    none: LogLevel.NONE
};

function parseLogLevel(name: LogLevelName): LogLevel {
    return LEVEL_BY_NAME[name];
}

class Logger {
    private level: LogLevel = LogLevel.INFO;

    constructor() {
        // INFO while developing, WARN otherwise; createSyncEngine applies config.logLevel
        this.level = process.env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.WARN;
    }

    setLevel(level: LogLevel) {
        this.level = level;
    }

    /** Apply a `logLevel` value from the sync config. */
    setLevelByName(name: LogLevelName) {
        this.level = parseLogLevel(name);
    }

    getLevel(): LogLevel {
        return this.level;
    }

    debug(message: string, ...args: unknown[]) {
        if (this.level <= LogLevel.DEBUG) {
            console.debug(`[DEBUG] ${message}`, ...args);
        }
    }

    info(message: string, ...args: unknown[]) {
        if (this.level <= LogLevel.INFO) {
            console.log(`[INFO] ${message}`, ...args);
        }
    }

    warn(message: string, ...args: unknown[]) {
        if (this.level <= LogLevel.WARN) {
            console.warn(`[WARN] ${message}`, ...args);
        }
    }

    error(message: string, ...args: unknown[]) {
        if (this.level <= LogLevel.ERROR) {
            console.error(`[ERROR] ${message}`, ...args);
        }
    }
}

export const logger = new Logger();
