import { ConfigurationError } from "./errors.js";
import { DEFAULT_RETRY_POLICY } from "./retry.js";
import type { RetryPolicy } from "./types.js";

/** Options as commander hands them over (numbers still strings). */
export interface ImportCommandOptions {
  json?: string;
  dir?: string;
  from_message?: string;
  replaceqp?: boolean;
  fixMsgid?: boolean;
  num_retries?: string;
  max_in_flight?: string;
  outcome_log?: string;
  verbose?: boolean;
}

export interface ImportConfig {
  credentialsPath: string | null;
  root: string;
  resumeFrom: number;
  fixMessageId: boolean;
  repairQuotedPrintable: boolean;
  retry: RetryPolicy;
  maxInFlightPerAccount: number;
  maxPending: number;
  /** Gmail per-user quota units per second. */
  unitsPerSecond: number;
  outcomeLogPath: string | null;
  verbose: boolean;
}

export const DEFAULT_IMPORT_CONFIG = {
  resumeFrom: 0,
  maxInFlightPerAccount: 4,
  maxPending: 200,
  unitsPerSecond: 250,
} as const;

type Env = Record<string, string | undefined>;

function parseCount(
  name: string,
  raw: string | undefined,
  fallback: number,
  min: number,
): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(
      `${name} must be an integer >= ${min}, got "${raw}"`,
    );
  }
  return value;
}

/**
 * Merge CLI flags over `IMPORT_*` environment variables over defaults.
 */
export function resolveImportConfig(
  opts: ImportCommandOptions,
  env: Env = process.env,
): ImportConfig {
  const root = opts.dir ?? env.IMPORT_ROOT;
  if (!root) {
    throw new ConfigurationError(
      "Missing import directory: pass --dir or set IMPORT_ROOT",
    );
  }

  return {
    credentialsPath: opts.json ?? env.IMPORT_CREDENTIALS ?? null,
    root,
    resumeFrom: parseCount(
      "--from_message",
      opts.from_message,
      DEFAULT_IMPORT_CONFIG.resumeFrom,
      0,
    ),
    fixMessageId: opts.fixMsgid ?? true,
    repairQuotedPrintable: opts.replaceqp ?? false,
    retry: {
      ...DEFAULT_RETRY_POLICY,
      maxRetries: parseCount(
        "--num_retries",
        opts.num_retries ?? env.IMPORT_NUM_RETRIES,
        DEFAULT_RETRY_POLICY.maxRetries,
        0,
      ),
    },
    maxInFlightPerAccount: parseCount(
      "--max_in_flight",
      opts.max_in_flight ?? env.IMPORT_MAX_IN_FLIGHT,
      DEFAULT_IMPORT_CONFIG.maxInFlightPerAccount,
      1,
    ),
    maxPending: parseCount(
      "IMPORT_MAX_PENDING",
      env.IMPORT_MAX_PENDING,
      DEFAULT_IMPORT_CONFIG.maxPending,
      1,
    ),
    unitsPerSecond: parseCount(
      "IMPORT_UNITS_PER_SECOND",
      env.IMPORT_UNITS_PER_SECOND,
      DEFAULT_IMPORT_CONFIG.unitsPerSecond,
      1,
    ),
    outcomeLogPath: opts.outcome_log ?? null,
    verbose: opts.verbose ?? false,
  };
}
