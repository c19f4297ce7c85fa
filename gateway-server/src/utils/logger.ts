/**
 * Services log through whatever console-shaped object they are given, which is
 * the global console outside of tests.
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error' | 'debug'>;
