/**
 * Logger interface for library code
 *
 * Library modules (pipeline, cache, retriever) take a Logger through their
 * options. The CLI passes its CommandContext, which satisfies this shape;
 * tests pass silentLogger or vi.fn() spies.
 */

export interface Logger {
  warn: (message: string) => void;
  /** Progress messages; omitted by quiet contexts */
  info?: (message: string) => void;
  debug?: (message: string) => void;
}

/**
 * Used when nothing is injected.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  info: (message: string) => console.log(message),
  debug: (message: string) => console.log(message),
};

export const silentLogger: Logger = {
  warn: () => {},
  info: () => {},
  debug: () => {},
};
