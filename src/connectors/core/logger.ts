import type { Logger } from "./types.js";

export interface LoggerOptions {
  verbose?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly prefix: string;
  private readonly verbose: boolean;

  constructor(scope: string, opts: LoggerOptions = {}) {
    this.prefix = `[${scope}]`;
    this.verbose = opts.verbose ?? false;
  }

  info(msg: string, data?: Record<string, unknown>): void {
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.log(`${this.prefix} ${msg}${extra}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.warn(`${this.prefix} ⚠ ${msg}${extra}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.error(`${this.prefix} ✗ ${msg}${extra}`);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    if (!this.verbose) return;
    const extra = data ? ` ${JSON.stringify(data)}` : "";
    console.log(`${this.prefix} · ${msg}${extra}`);
  }
}

export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  return new ConsoleLogger(scope, opts);
}
