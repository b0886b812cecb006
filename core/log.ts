/**
 * Minimal logger contract. The engine never writes to stdout on its own;
 * hosts pass a logger (or accept the console-backed default).
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export const consoleLogger: Logger = {
  debug: (message, ...details) => console.debug(`[textarea] ${message}`, ...details),
  warn: (message, ...details) => console.warn(`[textarea] ${message}`, ...details),
};

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};
