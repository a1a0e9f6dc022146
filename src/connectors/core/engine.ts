import { Semaphore } from "./concurrency.js";
import { errorMessage, FatalImportError } from "./errors.js";
import { joinLabelPath } from "./labels.js";
import { createRateLimiter } from "./rate-limiter.js";
import { backoffDelay, sleep } from "./retry.js";
import type {
  ImportEngineConfig,
  ImportOutcome,
  InsertResult,
  NormalizedMessage,
  RateLimiter,
  RawMessage,
  RunSummary,
  SourceItem,
} from "./types.js";

const DEFAULT_PROGRESS_EVERY = 100;

interface AccountLane {
  account: string;
  slots: Semaphore;
  limiter: RateLimiter;
  /** Consecutive rate-limit signals; widens the account-wide backoff. */
  rateLimitStreak: number;
  disabledReason: string | null;
}

type TerminalResult = Extract<InsertResult, { kind: "inserted" | "permanent" }>;

interface Settled {
  result: TerminalResult;
  attempts: number;
}

/**
 * Drives the ordered source stream into the insert adapter.
 *
 * Each message moves Pending → InFlight → Inserted | PermanentFailure, with
 * retriable results looping back to InFlight up to `retry.maxRetries` times.
 * Work is partitioned by account: every account gets its own worker slots
 * and its own quota limiter, so backoff on one account leaves the others
 * running.
 */
export class ImportEngine {
  private readonly config: ImportEngineConfig;
  private readonly lanes = new Map<string, AccountLane>();
  private readonly controller = new AbortController();
  private fatalError: string | null = null;
  private sinceProgress = 0;

  constructor(config: ImportEngineConfig) {
    this.config = config;
  }

  /** Stop reading the source; in-flight inserts finish and are logged. */
  stop(reason: string): void {
    if (this.controller.signal.aborted) return;
    this.config.logger.warn(`${reason}, letting in-flight inserts finish...`);
    this.controller.abort();
  }

  async run(source: AsyncIterable<SourceItem>): Promise<RunSummary> {
    const { logger, state } = this.config;
    const signal = this.controller.signal;
    const pending = new Semaphore(this.config.maxPending);
    const inFlight = new Set<Promise<void>>();
    const startTime = Date.now();

    const onCancel = () => this.stop("Import cancelled");
    const sigHandler = () => this.stop("Received interrupt");
    if (this.config.signal?.aborted) onCancel();
    this.config.signal?.addEventListener("abort", onCancel, { once: true });
    if (this.config.handleSignals) {
      process.on("SIGINT", sigHandler);
      process.on("SIGTERM", sigHandler);
    }

    logger.info("Starting import", {
      adapter: this.config.adapter.name,
      resumeFrom: state.tracker.resumeFrom,
      maxInFlightPerAccount: this.config.maxInFlightPerAccount,
      maxRetries: this.config.retry.maxRetries,
    });

    try {
      for await (const item of source) {
        if (signal.aborted) {
          if (item.kind === "submit") state.recordAbandoned();
          break;
        }
        if (item.kind !== "submit") {
          this.handleUnsubmitted(item);
          continue;
        }

        await pending.acquire();
        if (signal.aborted) {
          pending.release();
          state.recordAbandoned();
          break;
        }
        const task: Promise<void> = this.processMessage(item.message).finally(
          () => {
            pending.release();
            inFlight.delete(task);
          },
        );
        inFlight.add(task);
      }
    } finally {
      await Promise.all([...inFlight]);
      this.config.signal?.removeEventListener("abort", onCancel);
      if (this.config.handleSignals) {
        process.removeListener("SIGINT", sigHandler);
        process.removeListener("SIGTERM", sigHandler);
      }
    }

    const summary: RunSummary = {
      ...state.snapshot(),
      nextResumeFrom: state.tracker.nextResumeFrom,
      durationMs: Date.now() - startTime,
      interrupted: signal.aborted && this.fatalError === null,
      fatalError: this.fatalError,
    };
    logger.info("Import finished", { ...summary });
    return summary;
  }

  private handleUnsubmitted(
    item: Exclude<SourceItem, { kind: "submit" }>,
  ): void {
    const { logger, state } = this.config;
    switch (item.kind) {
      case "skip":
        state.recordSkipped(item.sequence);
        logger.debug("Skipped message before resume point", {
          sequence: item.sequence,
          account: item.target.account,
        });
        return;
      case "undecodable":
        this.record(item.raw, {
          status: "failed",
          reason: `undecodable: ${item.reason}`,
          attempts: 0,
        });
        return;
      case "file-error":
        state.recordFileFailure();
        logger.error("Cannot read mbox file", {
          account: item.target.account,
          file: item.target.sourceFile,
          reason: item.reason,
        });
        return;
    }
  }

  private async processMessage(message: NormalizedMessage): Promise<void> {
    const lane = this.laneFor(message.raw.target.account);
    await lane.slots.acquire();
    try {
      const settled = await this.drive(message, lane);
      if (settled === null) {
        this.config.state.recordAbandoned();
        this.config.logger.debug("Abandoned message", {
          sequence: message.raw.sequence,
          account: lane.account,
        });
        return;
      }
      const { result, attempts } = settled;
      if (result.kind === "inserted") {
        this.record(message.raw, {
          status: "inserted",
          messageId: result.messageId,
          attempts,
        });
      } else {
        this.record(message.raw, {
          status: "failed",
          reason: result.reason,
          attempts,
        });
      }
    } catch (err) {
      this.record(message.raw, {
        status: "failed",
        reason: `unexpected: ${errorMessage(err)}`,
        attempts: 0,
      });
    } finally {
      lane.slots.release();
    }
  }

  /** Per-message state machine. Returns null when the message is abandoned. */
  private async drive(
    message: NormalizedMessage,
    lane: AccountLane,
  ): Promise<Settled | null> {
    const { adapter, logger, retry, state } = this.config;
    const signal = this.controller.signal;
    const sequence = message.raw.sequence;
    let attempts = 0;

    for (;;) {
      if (signal.aborted) return null;
      if (lane.disabledReason !== null) {
        return {
          result: {
            kind: "permanent",
            reason: lane.disabledReason,
            scope: "account",
          },
          attempts,
        };
      }

      await lane.limiter.acquire(adapter.unitCost, signal);
      if (signal.aborted) return null;

      attempts++;
      const result = await this.invoke(message);
      if (result === null) return null;

      if (result.kind !== "retriable" || !result.rateLimited) {
        lane.rateLimitStreak = 0;
      }
      if (result.kind === "inserted") {
        return { result, attempts };
      }
      if (result.kind === "permanent") {
        if (result.scope === "account" && lane.disabledReason === null) {
          lane.disabledReason = result.reason;
          logger.error("Account unavailable, failing its remaining messages", {
            account: lane.account,
            reason: result.reason,
          });
        }
        return { result, attempts };
      }

      if (attempts > retry.maxRetries) {
        return {
          result: {
            kind: "permanent",
            reason: `retries exhausted after ${attempts} attempts: ${result.reason}`,
            scope: "message",
          },
          attempts,
        };
      }

      state.recordRetry();
      if (result.rateLimited) {
        lane.rateLimitStreak++;
        const delayMs =
          result.retryAfterMs ??
          backoffDelay(Math.max(attempts, lane.rateLimitStreak) - 1, retry);
        lane.limiter.backoff(delayMs);
        logger.warn("Rate limited, backing off account", {
          account: lane.account,
          sequence,
          attempt: attempts,
          delayMs,
        });
      } else {
        const delayMs = backoffDelay(attempts - 1, retry);
        logger.warn("Retrying message", {
          account: lane.account,
          sequence,
          attempt: attempts,
          delayMs,
          reason: result.reason,
        });
        await sleep(delayMs, signal);
      }
    }
  }

  private async invoke(message: NormalizedMessage): Promise<InsertResult | null> {
    try {
      return await this.config.adapter.insert(message);
    } catch (err) {
      if (err instanceof FatalImportError) {
        this.abortRun(err);
        return null;
      }
      return { kind: "retriable", reason: errorMessage(err), rateLimited: false };
    }
  }

  private abortRun(err: FatalImportError): void {
    if (this.fatalError !== null) return;
    this.fatalError = err.message;
    this.config.logger.error("Fatal error, stopping import", {
      error: err.message,
    });
    this.controller.abort();
  }

  private record(
    raw: RawMessage,
    fields: Pick<ImportOutcome, "status" | "messageId" | "reason" | "attempts">,
  ): void {
    const { logger, state } = this.config;
    const outcome: ImportOutcome = {
      sequence: raw.sequence,
      account: raw.target.account,
      label: joinLabelPath(raw.target.labelPath),
      sourceFile: raw.target.sourceFile,
      offset: raw.offset,
      ...fields,
      retries: Math.max(fields.attempts - 1, 0),
    };

    if (outcome.status === "inserted") {
      state.recordInserted(outcome.sequence);
      logger.info("Inserted message", {
        sequence: outcome.sequence,
        account: outcome.account,
        label: outcome.label,
        messageId: outcome.messageId,
        attempts: outcome.attempts,
      });
    } else {
      state.recordFailed(outcome.sequence);
      logger.error("Failed to import message", {
        sequence: outcome.sequence,
        account: outcome.account,
        label: outcome.label,
        file: outcome.sourceFile,
        offset: outcome.offset,
        reason: outcome.reason,
        nextResumeFrom: state.tracker.nextResumeFrom,
      });
    }
    this.config.outcomes?.append(outcome);

    this.sinceProgress++;
    if (this.sinceProgress >= (this.config.progressEvery ?? DEFAULT_PROGRESS_EVERY)) {
      this.sinceProgress = 0;
      logger.info("Progress", {
        ...state.snapshot(),
        nextResumeFrom: state.tracker.nextResumeFrom,
      });
    }
  }

  private laneFor(account: string): AccountLane {
    let lane = this.lanes.get(account);
    if (!lane) {
      lane = {
        account,
        slots: new Semaphore(this.config.maxInFlightPerAccount),
        limiter: createRateLimiter(this.config.rateLimiterConfig ?? {}),
        rateLimitStreak: 0,
        disabledReason: null,
      };
      this.lanes.set(account, lane);
    }
    return lane;
  }
}
