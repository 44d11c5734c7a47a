export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

export interface LogEntry {
    timestamp: number;
    level: LogLevel;
    message: string;
    data?: unknown;
}

type LogListener = (entry: LogEntry) => void;

class LoggerService {
    private listeners: LogListener[] = [];
    private minLevel: LogLevel = 'info';
    private consoleEnabled = true;

    public subscribe(listener: LogListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    /** Entries below this level are neither printed nor forwarded. */
    public setLevel(level: LogLevel) {
        this.minLevel = level;
    }

    public getLevel(): LogLevel {
        return this.minLevel;
    }

    /** Subscribers still receive entries when the console is muted. */
    public setConsoleEnabled(enabled: boolean) {
        this.consoleEnabled = enabled;
    }

    private emit(level: LogLevel, message: string, data?: unknown) {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

        const entry: LogEntry = {
            timestamp: Date.now(),
            level,
            message,
            data
        };

        if (this.consoleEnabled) {
            console[level](`[${level.toUpperCase()}] ${message}`, data ?? '');
        }

        this.listeners.forEach(l => l(entry));
    }

    public info(msg: string, data?: unknown) { this.emit('info', msg, data); }
    public warn(msg: string, data?: unknown) { this.emit('warn', msg, data); }
    public error(msg: string, data?: unknown) { this.emit('error', msg, data); }
    public debug(msg: string, data?: unknown) { this.emit('debug', msg, data); }
}

export const Logger = new LoggerService();
