import * as fs from 'fs';

enum LogLevel {
    Debug = 'debug',
    Info = 'info',
    Warn = 'warn',
    Error = 'error',
    None = 'none'
}

enum LogOutput {
    Console = 'console',
    File = 'file',
    Both = 'both'
}

const LEVEL_ORDER = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

const parseLogLevel = (value: string | null | undefined, fallback: LogLevel = LogLevel.Info): LogLevel => {
    const match = Object.values(LogLevel).find((level) => level === value?.toLowerCase());
    return match ?? fallback;
};

const parseLogOutput = (value: string | null | undefined, fallback: LogOutput = LogOutput.Console): LogOutput => {
    const match = Object.values(LogOutput).find((output) => output === value?.toLowerCase());
    return match ?? fallback;
};

class Logger {
    level: LogLevel;
    output: LogOutput;
    logFilePath: string;
    private context: string | null;

    constructor(level: LogLevel, output: LogOutput, logFilePath: string, context: string | null = null) {
        this.level = level;
        this.output = output;
        this.logFilePath = logFilePath;
        this.context = context;
    }

    /** Logger sharing this one's settings whose messages are prefixed with `[label]`. */
    withContext(label: string): Logger {
        const context = this.context ? `${this.context} ${label}` : label;
        return new Logger(this.level, this.output, this.logFilePath, context);
    }

    private shouldLog(level: LogLevel): boolean {
        if (this.level === LogLevel.None) {
            return false;
        }
        return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.level);
    }

    private logToFile(message: string) {
        fs.appendFile(this.logFilePath, message + '\n', err => {
            if (err) {
                console.error('Error writing to log file:', err);
            }
        });
    }

    private logMessage(level: LogLevel, message: string, ...optionalParams: unknown[]) {
        const prefix = this.context ? `[${this.context}] ` : '';
        const formattedMessage = `[${level.toUpperCase()}] ${new Date().toISOString()} - ${prefix}${message}`;

        if (this.output === LogOutput.Console || this.output === LogOutput.Both) {
            console.log(formattedMessage, ...optionalParams);
        }

        if (this.output === LogOutput.File || this.output === LogOutput.Both) {
            const params = optionalParams.map((param) => param instanceof Error ? param.stack ?? param.message : String(param));
            this.logToFile([formattedMessage, ...params].join(' '));
        }
    }

    debug(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog(LogLevel.Debug)) {
            this.logMessage(LogLevel.Debug, message, ...optionalParams);
        }
    }

    info(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog(LogLevel.Info)) {
            this.logMessage(LogLevel.Info, message, ...optionalParams);
        }
    }

    warn(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog(LogLevel.Warn)) {
            this.logMessage(LogLevel.Warn, message, ...optionalParams);
        }
    }

    error(message: string, ...optionalParams: unknown[]) {
        if (this.shouldLog(LogLevel.Error)) {
            this.logMessage(LogLevel.Error, message, ...optionalParams);
        }
    }
}

export { LogLevel, LogOutput, Logger, parseLogLevel, parseLogOutput };
