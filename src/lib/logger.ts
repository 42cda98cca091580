export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

// Reads the flag on every call so tests and the CLI can toggle it at runtime.
function debugEnabled(): boolean {
  return process.env.MECALLER_DEBUG === "1";
}

export function createLogger(scope: string): Logger {
  const prefix = `[mecaller] ${scope}:`;
  return {
    debug(message) {
      if (debugEnabled()) console.error(`${prefix} ${message}`);
    },
    warn(message) {
      console.error(`${prefix} ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};
