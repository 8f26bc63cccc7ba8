/**
 * Console logging with a `[Component]` prefix.
 * `quiet` silences info and debug; warnings and errors always print.
 */

export interface Logger {
    info(message: string, ...details: unknown[]): void;
    debug(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

export function createLogger(component: string, options: { quiet?: boolean } = {}): Logger {
    const prefix = `[${component}]`;
    const quiet = options.quiet ?? false;

    return {
        info: (message, ...details) => {
            if (!quiet) console.log(`${prefix} ${message}`, ...details);
        },
        debug: (message, ...details) => {
            if (!quiet && process.env.DEBUG) console.debug(`${prefix} ${message}`, ...details);
        },
        warn: (message, ...details) => console.warn(`${prefix} ${message}`, ...details),
        error: (message, ...details) => console.error(`${prefix} ${message}`, ...details),
    };
}
