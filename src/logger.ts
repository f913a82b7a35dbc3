/**
 * Minimal logging sink. `console` satisfies it, so callers who want output
 * can pass `console` straight through.
 */
export interface Logger {
  debug(message: string): void;
  error(message: string): void;
}

export const noopLogger: Logger = {
  debug: () => {},
  error: () => {},
};
