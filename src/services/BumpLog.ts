/**
 * Logger shape shared by the bump engine, the reader and the CLI command.
 *
 * Matches the Info/Warn/Error command log of the CLI so the same log can be
 * handed from a command into the services it builds.
 */
export interface BumpLog {
  Info: (...args: unknown[]) => void;
  Warn: (...args: unknown[]) => void;
  Error: (...args: unknown[]) => void;
  Debug?: (...args: unknown[]) => void;
}

/**
 * Console-backed log. `Debug` is only wired when debug output is requested.
 */
export function consoleLog(debug = false): BumpLog {
  return {
    Info: (...args) => console.log(...args),
    Warn: (...args) => console.warn(...args),
    Error: (...args) => console.error(...args),
    Debug: debug ? (...args) => console.debug('[debug]', ...args) : undefined,
  };
}

/**
 * Log that drops everything. Default for library callers that pass none.
 */
export const silentLog: BumpLog = {
  Info: () => {},
  Warn: () => {},
  Error: () => {},
};
