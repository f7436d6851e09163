/**
 * Logging surface used across the engine
 * Any console-compatible object works; defaults to the global console
 */
export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export const defaultLogger: Logger = console;
