export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(verbose = false): Logger {
  return {
    debug: (s) => { if (verbose) console.log(`[DEBUG] ${s}`); },
    info: (s) => console.log(`[INFO] ${s}`),
    warn: (s) => console.log(`[WARN] ${s}`),
    error: (s) => console.error(`[ERROR] ${s}`),
  };
}

