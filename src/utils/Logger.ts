/**
 * Logger.ts
 * Console logging with a `[Component]` prefix, gated by a process-wide level.
 */

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const LEVEL_WEIGHT: Record<LogLevel, number> = {
    DEBUG: 10,
    INFO: 20,
    WARNING: 30,
    ERROR: 40
};

let threshold: LogLevel = 'INFO';

/**
 * Sets the minimum level written to the console for every logger.
 */
export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

export class Logger {
    constructor(private readonly component: string) {}

    public isEnabled(level: LogLevel): boolean {
        return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[threshold];
    }

    public debug(message: string, ...details: unknown[]): void {
        if (this.isEnabled('DEBUG')) console.debug(this.format(message), ...details);
    }

    public info(message: string, ...details: unknown[]): void {
        if (this.isEnabled('INFO')) console.info(this.format(message), ...details);
    }

    public warn(message: string, ...details: unknown[]): void {
        if (this.isEnabled('WARNING')) console.warn(this.format(message), ...details);
    }

    public error(message: string, ...details: unknown[]): void {
        if (this.isEnabled('ERROR')) console.error(this.format(message), ...details);
    }

    private format(message: string): string {
        return `${new Date().toISOString()} [${this.component}] ${message}`;
    }
}
