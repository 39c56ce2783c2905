/**
 * Server logging helpers.
 * DEBUG is on when NODE_ENV=development (npm run dev); tests and production stay quiet.
 */

export const DEBUG = process.env.NODE_ENV === 'development';

/**
 * Verbose request tracing, development only.
 * Warnings and failures go to console.warn/console.error with a [Tag] prefix.
 */
export function debugLog(...args: unknown[]): void {
    if (DEBUG) {
        console.log(...args);
    }
}

/** Decoded size of a base64 payload in KB, for log lines. */
export function formatBase64Size(base64: string): string {
    return `${(Math.floor((base64.length * 3) / 4) / 1024).toFixed(1)}KB`;
}
