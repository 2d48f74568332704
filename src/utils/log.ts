import { getOptions } from '../config';

export interface Logger {
    debug(message: string, data?: unknown): void;
    warn(message: string, data?: unknown): void;
}

/**
 * Console logger prefixing every line with `[tag]`.
 * Debug output is only printed when the `debug` option is on.
 */
export function createLogger(tag: string): Logger {
    const prefix = `[${tag}]`;
    return {
        debug(message, data) {
            if (!getOptions().debug) return;
            if (data === undefined) console.log(prefix, message);
            else                    console.log(prefix, message, data);
        },
        warn(message, data) {
            if (data === undefined) console.warn(prefix, message);
            else                    console.warn(prefix, message, data);
        },
    };
}
