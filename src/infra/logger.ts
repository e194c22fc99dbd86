/**
 * Console-shaped logger. `console` satisfies it; tests pass a spy.
 */
export type Logger = Pick<Console, 'info' | 'warn' | 'error'>;
