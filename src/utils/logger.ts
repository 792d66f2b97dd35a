import pino from 'pino';

/**
 * One named pino logger per component. LOG_LEVEL applies to all of them;
 * the test setup sets it to "silent".
 */
export function createLogger(name: string): pino.Logger {
    return pino({ name, level: process.env.LOG_LEVEL || 'info' });
}
