export interface Logger {
  readonly info: (msg: string) => void;
  readonly warn: (msg: string) => void;
  readonly error: (msg: string) => void;
}

export function createConsoleLogger(prefix = "Strandlight"): Logger {
  return {
    info: (msg: string) => process.stdout.write(`[${prefix}] ${msg}\n`),
    warn: (msg: string) => process.stderr.write(`[${prefix}] WARN: ${msg}\n`),
    error: (msg: string) => process.stderr.write(`[${prefix}] ERROR: ${msg}\n`),
  };
}

