/** Core type definitions for mbox-import. */

import type { RunState } from "./state.js";

// ─── Traversal ───

export interface ImportTarget {
  /** Mailbox the messages go to (the account directory name). */
  account: string;
  /** Label hierarchy, root to leaf. */
  labelPath: readonly string[];
  sourceFile: string;
}

export interface RawMessage {
  target: ImportTarget;
  /** Byte offset of the message's `From ` separator line. */
  offset: number;
  bytes: Buffer;
  sequence: number;
}

export interface NormalizedMessage {
  raw: RawMessage;
  bytes: Buffer;
  /** Label path joined with the hierarchy separator. */
  label: string;
}

// ─── Source stream (source → engine) ───

export type SourceItem =
  | { kind: "skip"; sequence: number; target: ImportTarget }
  | { kind: "submit"; message: NormalizedMessage }
  | { kind: "undecodable"; raw: RawMessage; reason: string }
  | { kind: "file-error"; target: ImportTarget; reason: string };

// ─── Insert results ───

export type InsertResult =
  | { kind: "inserted"; messageId: string }
  | {
      kind: "retriable";
      reason: string;
      rateLimited: boolean;
      retryAfterMs?: number;
    }
  | { kind: "permanent"; reason: string; scope: "message" | "account" };

export interface InsertAdapter {
  name: string;
  /** Quota units one `insert` consumes, charged to the account's limiter. */
  unitCost: number;
  insert(message: NormalizedMessage): Promise<InsertResult>;
}

export interface ImportOutcome {
  sequence: number;
  account: string;
  label: string;
  sourceFile: string;
  offset: number;
  status: "inserted" | "failed";
  messageId?: string;
  reason?: string;
  attempts: number;
  retries: number;
}

export interface OutcomeSink {
  append(outcome: ImportOutcome): void;
}

// ─── Run state ───

export interface RunCounters {
  resumeFrom: number;
  processed: number;
  skipped: number;
  inserted: number;
  failed: number;
  retries: number;
  abandoned: number;
  filesFailed: number;
}

export interface RunSummary extends RunCounters {
  nextResumeFrom: number;
  durationMs: number;
  interrupted: boolean;
  fatalError: string | null;
}

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  minDelayMs?: number;
  maxUnitsPerWindow?: number;
  unitsWindowMs?: number;
}

export interface RateLimiter {
  acquire(cost?: number, signal?: AbortSignal): Promise<void>;
  backoff(retryAfterMs: number): void;
}

// ─── Retry ───

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

// ─── Logger ───

export interface Logger {
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
}

// ─── Engine Config ───

export interface ImportEngineConfig {
  adapter: InsertAdapter;
  logger: Logger;
  state: RunState;
  maxInFlightPerAccount: number;
  /** Messages read ahead of completion across all accounts. */
  maxPending: number;
  retry: RetryPolicy;
  rateLimiterConfig?: RateLimiterConfig;
  outcomes?: OutcomeSink;
  signal?: AbortSignal;
  /** Install SIGINT/SIGTERM handlers for the duration of a run. */
  handleSignals?: boolean;
  progressEvery?: number;
}
