import chalk from "chalk";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
};

const RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function createLogger(level: LogLevel = "info"): Logger {
    const enabled = (at: LogLevel) => RANK[at] >= RANK[level];

    return {
        debug(message) {
            if (enabled("debug")) console.log(`${chalk.gray("[~]")} ${message}`);
        },
        info(message) {
            if (enabled("info")) console.log(`${chalk.cyan("[+]")} ${message}`);
        },
        warn(message) {
            if (enabled("warn")) console.warn(`${chalk.yellow("[!]")} ${message}`);
        },
        error(message) {
            if (enabled("error")) console.error(`${chalk.red("[x]")} ${message}`);
        },
    };
}
