/**
 * Global message numbering over the ordered traversal.
 *
 * Sequence numbers start at 1 and follow traversal order, so they are the
 * same on every run over an unchanged tree. Messages numbered below
 * `resumeFrom` are counted but not submitted. The watermark is the highest
 * N for which every message 1..N has reached a terminal state; resuming at
 * `watermark + 1` never re-imports a message.
 */
export class ResumeTracker {
  private counter = 0;
  private completedThrough = 0;
  private readonly completedAhead = new Set<number>();

  constructor(readonly resumeFrom = 0) {
    if (!Number.isInteger(resumeFrom) || resumeFrom < 0) {
      throw new RangeError(`resumeFrom must be a non-negative integer, got ${resumeFrom}`);
    }
  }

  next(): number {
    this.counter++;
    return this.counter;
  }

  /** Highest sequence number handed out so far. */
  get assigned(): number {
    return this.counter;
  }

  shouldSubmit(sequence: number): boolean {
    return sequence >= this.resumeFrom;
  }

  complete(sequence: number): void {
    if (sequence <= this.completedThrough) return;
    this.completedAhead.add(sequence);
    while (this.completedAhead.delete(this.completedThrough + 1)) {
      this.completedThrough++;
    }
  }

  get watermark(): number {
    return this.completedThrough;
  }

  get nextResumeFrom(): number {
    return this.completedThrough + 1;
  }
}
