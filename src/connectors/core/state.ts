import { ResumeTracker } from "./resume.js";
import type { RunCounters } from "./types.js";

/**
 * Aggregate counters for one invocation. Only the engine's bookkeeping
 * calls these methods; each is synchronous, so updates from concurrent
 * workers interleave on the event loop without being lost.
 */
export class RunState {
  readonly tracker: ResumeTracker;
  private readonly counters: RunCounters;

  constructor(resumeFrom = 0) {
    this.tracker = new ResumeTracker(resumeFrom);
    this.counters = {
      resumeFrom,
      processed: 0,
      skipped: 0,
      inserted: 0,
      failed: 0,
      retries: 0,
      abandoned: 0,
      filesFailed: 0,
    };
  }

  recordSkipped(sequence: number): void {
    this.counters.skipped++;
    this.counters.processed++;
    this.tracker.complete(sequence);
  }

  recordInserted(sequence: number): void {
    this.counters.inserted++;
    this.counters.processed++;
    this.tracker.complete(sequence);
  }

  recordFailed(sequence: number): void {
    this.counters.failed++;
    this.counters.processed++;
    this.tracker.complete(sequence);
  }

  recordRetry(): void {
    this.counters.retries++;
  }

  /** Submitted but never finished (shutdown or fatal error). */
  recordAbandoned(): void {
    this.counters.abandoned++;
  }

  recordFileFailure(): void {
    this.counters.filesFailed++;
  }

  snapshot(): Readonly<RunCounters> {
    return { ...this.counters };
  }
}
