export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };
const PREFIX = '[FloodMonitor]';

let threshold: LogLevel = 'info';

export const isLogLevel = (value: unknown): value is LogLevel =>
    typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, value);

export function setLogLevel(level: LogLevel) {
    threshold = level;
}

const enabled = (level: LogLevel) => LEVELS[level] >= LEVELS[threshold];

export const logger = {
    debug: (message: string, ...details: unknown[]) => {
        if (enabled('debug')) console.debug(`${PREFIX} ${message}`, ...details);
    },
    info: (message: string, ...details: unknown[]) => {
        if (enabled('info')) console.info(`${PREFIX} ${message}`, ...details);
    },
    warn: (message: string, ...details: unknown[]) => {
        if (enabled('warn')) console.warn(`${PREFIX} ${message}`, ...details);
    },
    error: (message: string, ...details: unknown[]) => {
        if (enabled('error')) console.error(`${PREFIX} ${message}`, ...details);
    }
};
