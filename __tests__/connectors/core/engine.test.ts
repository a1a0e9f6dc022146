import { describe, expect, it } from "vitest";
import { ImportEngine } from "../../../src/connectors/core/engine.js";
import { FatalImportError } from "../../../src/connectors/core/errors.js";
import { sleep } from "../../../src/connectors/core/retry.js";
import { RunState } from "../../../src/connectors/core/state.js";
import type {
  ImportEngineConfig,
  ImportOutcome,
  InsertAdapter,
  InsertResult,
  NormalizedMessage,
  SourceItem,
} from "../../../src/connectors/core/types.js";
import { MemoryLogger } from "../../helpers/memory-logger.js";
import { fromItems, makeMessage, makeTarget, skip, submit } from "../../helpers/messages.js";

type Script = (sequence: number, attempt: number) => InsertResult | Promise<InsertResult>;

interface Call {
  sequence: number;
  account: string;
  attempt: number;
  at: number;
}

class ScriptedAdapter implements InsertAdapter {
  name = "scripted";
  unitCost = 1;
  calls: Call[] = [];
  active = 0;
  maxActive = 0;
  private readonly started = Date.now();
  private readonly attempts = new Map<number, number>();

  constructor(
    private readonly script: Script = (sequence) => ({
      kind: "inserted",
      messageId: `msg-${sequence}`,
    }),
  ) {}

  async insert(message: NormalizedMessage): Promise<InsertResult> {
    const sequence = message.raw.sequence;
    const attempt = (this.attempts.get(sequence) ?? 0) + 1;
    this.attempts.set(sequence, attempt);
    this.calls.push({
      sequence,
      account: message.raw.target.account,
      attempt,
      at: Date.now() - this.started,
    });
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      return await this.script(sequence, attempt);
    } finally {
      this.active--;
    }
  }

  callsFor(sequence: number): Call[] {
    return this.calls.filter((c) => c.sequence === sequence);
  }
}

const FAST_RETRY = { maxRetries: 3, baseDelayMs: 1, maxDelayMs: 5 };

function makeEngine(
  adapter: InsertAdapter,
  overrides: Partial<ImportEngineConfig> = {},
): { engine: ImportEngine; state: RunState; logger: MemoryLogger; outcomes: ImportOutcome[] } {
  const state = overrides.state ?? new RunState();
  const logger = new MemoryLogger();
  const outcomes: ImportOutcome[] = [];
  const engine = new ImportEngine({
    adapter,
    logger,
    state,
    maxInFlightPerAccount: 2,
    maxPending: 200,
    retry: FAST_RETRY,
    outcomes: { append: (o) => outcomes.push(o) },
    ...overrides,
  });
  return { engine, state, logger, outcomes };
}

function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i <= to; i++) out.push(i);
  return out;
}

const alice = makeTarget("alice@example.com", ["Inbox"]);
const bob = makeTarget("bob@example.com", ["Archive", "2023"]);

describe("ImportEngine", () => {
  it("inserts every submitted message", async () => {
    const adapter = new ScriptedAdapter();
    const { engine, outcomes } = makeEngine(adapter);

    const summary = await engine.run(fromItems([submit(1), submit(2), submit(3)]));

    expect(summary.inserted).toBe(3);
    expect(summary.failed).toBe(0);
    expect(summary.processed).toBe(3);
    expect(summary.nextResumeFrom).toBe(4);
    expect(summary.interrupted).toBe(false);
    expect(summary.fatalError).toBeNull();
    expect(outcomes.map((o) => o.sequence).sort()).toEqual([1, 2, 3]);
  });

  it("records a complete outcome for an inserted message", async () => {
    const adapter = new ScriptedAdapter();
    const { engine, outcomes } = makeEngine(adapter);

    await engine.run(fromItems([submit(1, bob)]));

    expect(outcomes).toEqual([
      {
        sequence: 1,
        account: "bob@example.com",
        label: "Archive/2023",
        sourceFile: "/data/bob@example.com/Archive/2023.mbox",
        offset: 0,
        status: "inserted",
        messageId: "msg-1",
        attempts: 1,
        retries: 0,
      },
    ]);
  });

  it("retries retriable results and counts the retries", async () => {
    const adapter = new ScriptedAdapter((sequence, attempt) =>
      attempt <= 2
        ? { kind: "retriable", reason: "HTTP 503: backend error", rateLimited: false }
        : { kind: "inserted", messageId: `msg-${sequence}` },
    );
    const { engine, outcomes } = makeEngine(adapter);

    const summary = await engine.run(fromItems([submit(1)]));

    expect(summary.inserted).toBe(1);
    expect(summary.retries).toBe(2);
    expect(adapter.calls).toHaveLength(3);
    expect(outcomes[0].attempts).toBe(3);
    expect(outcomes[0].retries).toBe(2);
  });

  it("turns exhausted retries into a permanent failure", async () => {
    const adapter = new ScriptedAdapter(() => ({
      kind: "retriable",
      reason: "socket hang up",
      rateLimited: false,
    }));
    const { engine, outcomes, logger } = makeEngine(adapter);

    const summary = await engine.run(fromItems([submit(1)]));

    expect(adapter.calls).toHaveLength(FAST_RETRY.maxRetries + 1);
    expect(summary.failed).toBe(1);
    expect(summary.retries).toBe(3);
    expect(summary.nextResumeFrom).toBe(2);
    expect(outcomes[0].status).toBe("failed");
    expect(outcomes[0].reason).toBe("retries exhausted after 4 attempts: socket hang up");
    expect(logger.messages("error")).toContain("Failed to import message");
  });

  it("does not retry permanent failures", async () => {
    const adapter = new ScriptedAdapter(() => ({
      kind: "permanent",
      reason: "HTTP 400: Invalid message",
      scope: "message",
    }));
    const { engine, outcomes } = makeEngine(adapter);

    const summary = await engine.run(fromItems([submit(1), submit(2)]));

    expect(adapter.calls).toHaveLength(2);
    expect(summary.failed).toBe(2);
    expect(summary.retries).toBe(0);
    expect(outcomes.every((o) => o.reason === "HTTP 400: Invalid message")).toBe(true);
  });

  it("treats an unexpected throw from the adapter as retriable", async () => {
    const adapter = new ScriptedAdapter((sequence, attempt) => {
      if (attempt === 1) throw new Error("socket hang up");
      return { kind: "inserted", messageId: `msg-${sequence}` };
    });
    const { engine } = makeEngine(adapter);

    const summary = await engine.run(fromItems([submit(1)]));

    expect(summary.inserted).toBe(1);
    expect(summary.retries).toBe(1);
  });

  it("never exceeds the per-account in-flight limit", async () => {
    const adapter = new ScriptedAdapter(async (sequence) => {
      await sleep(2);
      return { kind: "inserted", messageId: `msg-${sequence}` };
    });
    const { engine } = makeEngine(adapter, { maxInFlightPerAccount: 2 });

    const summary = await engine.run(fromItems(range(1, 100).map((s) => submit(s))));

    expect(summary.inserted).toBe(100);
    expect(adapter.maxActive).toBe(2);
  });

  it("runs accounts side by side", async () => {
    const adapter = new ScriptedAdapter(async (sequence) => {
      await sleep(5);
      return { kind: "inserted", messageId: `msg-${sequence}` };
    });
    const { engine } = makeEngine(adapter, { maxInFlightPerAccount: 1 });

    const items = [...range(1, 5).map((s) => submit(s, alice)), ...range(6, 10).map((s) => submit(s, bob))];
    const summary = await engine.run(fromItems(items));

    expect(summary.inserted).toBe(10);
    expect(adapter.maxActive).toBe(2);
  });

  it("bounds how far the source is read ahead", async () => {
    let open = (): void => {};
    const gate = new Promise<void>((resolve) => {
      open = resolve;
    });
    const adapter = new ScriptedAdapter(async (sequence) => {
      await gate;
      return { kind: "inserted", messageId: `msg-${sequence}` };
    });
    const { engine } = makeEngine(adapter, { maxPending: 3, maxInFlightPerAccount: 10 });

    let pulled = 0;
    async function* counted(): AsyncGenerator<SourceItem> {
      for (const s of range(1, 10)) {
        pulled++;
        yield submit(s);
      }
    }

    const running = engine.run(counted());
    await sleep(20);
    expect(adapter.calls).toHaveLength(3);
    expect(pulled).toBe(4);

    open();
    const summary = await running;
    expect(summary.inserted).toBe(10);
  });

  it("skips messages below the resume point without calling the adapter", async () => {
    const adapter = new ScriptedAdapter();
    const state = new RunState(3);
    const { engine } = makeEngine(adapter, { state });

    const summary = await engine.run(fromItems([skip(1), skip(2), submit(3), submit(4)]));

    expect(adapter.calls.map((c) => c.sequence).sort()).toEqual([3, 4]);
    expect(summary.skipped).toBe(2);
    expect(summary.inserted).toBe(2);
    expect(summary.processed).toBe(4);
    expect(summary.resumeFrom).toBe(3);
    expect(summary.nextResumeFrom).toBe(5);
  });

  it("backs off the whole account on a rate limit", async () => {
    const adapter = new ScriptedAdapter(async (sequence, attempt) => {
      if (sequence === 1 && attempt === 1) {
        return { kind: "retriable", reason: "HTTP 429: Too Many Requests", rateLimited: true, retryAfterMs: 150 };
      }
      if (sequence === 2 && attempt === 1) {
        await sleep(20);
        return { kind: "retriable", reason: "HTTP 503: backend error", rateLimited: false };
      }
      return { kind: "inserted", messageId: `msg-${sequence}` };
    });
    const { engine, logger } = makeEngine(adapter, { maxInFlightPerAccount: 2 });

    const summary = await engine.run(fromItems([submit(1, alice), submit(2, alice), submit(3, bob)]));

    expect(summary.inserted).toBe(3);
    expect(adapter.callsFor(1)[1].at).toBeGreaterThanOrEqual(140);
    // Message 2 was not rate limited itself but waits out the account's backoff.
    expect(adapter.callsFor(2)[1].at).toBeGreaterThanOrEqual(140);
    // Other accounts keep going.
    expect(adapter.callsFor(3)[0].at).toBeLessThan(100);
    expect(logger.messages("warn")).toContain("Rate limited, backing off account");
  });

  it("starts the rate-limit backoff over after a response that was not rate limited", async () => {
    const adapter = new ScriptedAdapter((sequence, attempt) => {
      if (attempt === 1) {
        return { kind: "retriable", reason: "HTTP 429: Too Many Requests", rateLimited: true };
      }
      return sequence === 1
        ? { kind: "permanent", reason: "HTTP 400: Invalid message", scope: "message" }
        : { kind: "inserted", messageId: `msg-${sequence}` };
    });
    const { engine, logger } = makeEngine(adapter, {
      maxInFlightPerAccount: 1,
      retry: { maxRetries: 3, baseDelayMs: 20, maxDelayMs: 1_000 },
    });

    const summary = await engine.run(fromItems([submit(1), submit(2)]));

    expect(summary.failed).toBe(1);
    expect(summary.inserted).toBe(1);
    const delays = logger.entries
      .filter((e) => e.msg === "Rate limited, backing off account")
      .map((e) => e.data?.delayMs);
    expect(delays).toHaveLength(2);
    // Both are first-step delays: 20ms plus at most 10% jitter.
    expect(delays[0]).toBeLessThanOrEqual(22);
    expect(delays[1]).toBeLessThanOrEqual(22);
  });

  it("fails the rest of an account after an account-wide permanent failure", async () => {
    const adapter = new ScriptedAdapter((sequence) =>
      sequence === 1
        ? { kind: "permanent", reason: "HTTP 401: Delegation denied", scope: "account" }
        : { kind: "inserted", messageId: `msg-${sequence}` },
    );
    const { engine, outcomes } = makeEngine(adapter, { maxInFlightPerAccount: 1 });

    const summary = await engine.run(
      fromItems([submit(1, alice), submit(2, alice), submit(3, alice), submit(4, bob)]),
    );

    expect(adapter.calls.map((c) => c.sequence).sort()).toEqual([1, 4]);
    expect(summary.failed).toBe(3);
    expect(summary.inserted).toBe(1);
    expect(summary.nextResumeFrom).toBe(5);
    const failed = outcomes.filter((o) => o.status === "failed");
    expect(failed.map((o) => o.reason)).toEqual([
      "HTTP 401: Delegation denied",
      "HTTP 401: Delegation denied",
      "HTTP 401: Delegation denied",
    ]);
  });

  it("stops the run on a fatal error and keeps the counters", async () => {
    const adapter = new ScriptedAdapter(() => {
      throw new FatalImportError("HTTP 401: unauthorized_client");
    });
    const { engine, logger } = makeEngine(adapter, { maxInFlightPerAccount: 1, maxPending: 1 });

    const summary = await engine.run(fromItems(range(1, 5).map((s) => submit(s))));

    expect(adapter.calls).toHaveLength(1);
    expect(summary.fatalError).toBe("HTTP 401: unauthorized_client");
    expect(summary.interrupted).toBe(false);
    expect(summary.processed).toBe(0);
    expect(summary.abandoned).toBe(2);
    expect(summary.nextResumeFrom).toBe(1);
    expect(logger.messages("error")).toContain("Fatal error, stopping import");
  });

  it("abandons unstarted work when the caller aborts", async () => {
    const controller = new AbortController();
    controller.abort();
    const adapter = new ScriptedAdapter();
    const { engine } = makeEngine(adapter, { signal: controller.signal });

    const summary = await engine.run(fromItems([submit(1), submit(2)]));

    expect(adapter.calls).toHaveLength(0);
    expect(summary.interrupted).toBe(true);
    expect(summary.abandoned).toBe(1);
    expect(summary.processed).toBe(0);
  });

  it("lets in-flight inserts finish after stop()", async () => {
    const adapter = new ScriptedAdapter(async (sequence) => {
      await sleep(30);
      return { kind: "inserted", messageId: `msg-${sequence}` };
    });
    const { engine } = makeEngine(adapter, { maxInFlightPerAccount: 1, maxPending: 1 });

    const running = engine.run(fromItems(range(1, 5).map((s) => submit(s))));
    await sleep(10);
    engine.stop("Test stop");
    const summary = await running;

    expect(summary.inserted).toBe(1);
    expect(summary.interrupted).toBe(true);
    expect(summary.nextResumeFrom).toBe(2);
  });

  it("resumes after an interruption without importing a message twice", async () => {
    const inserted: number[] = [];
    const adapter = new ScriptedAdapter(async (sequence) => {
      await sleep(10);
      inserted.push(sequence);
      return { kind: "inserted", messageId: `msg-${sequence}` };
    });

    async function* source(state: RunState): AsyncGenerator<SourceItem> {
      for (const s of range(1, 12)) {
        yield state.tracker.shouldSubmit(s) ? submit(s) : skip(s);
      }
    }

    const firstState = new RunState();
    const first = makeEngine(adapter, { state: firstState, maxPending: 2 });
    const running = first.engine.run(source(firstState));
    await sleep(25);
    first.engine.stop("Test stop");
    const interrupted = await running;
    expect(interrupted.interrupted).toBe(true);
    expect(interrupted.inserted).toBeLessThan(12);

    const secondState = new RunState(interrupted.nextResumeFrom);
    const second = makeEngine(adapter, { state: secondState, maxPending: 2 });
    const resumed = await second.engine.run(source(secondState));

    expect(resumed.skipped).toBe(interrupted.nextResumeFrom - 1);
    expect([...inserted].sort((a, b) => a - b)).toEqual(range(1, 12));
  });

  it("counts an undecodable message as a failure", async () => {
    const adapter = new ScriptedAdapter();
    const { engine, outcomes } = makeEngine(adapter);
    const raw = makeMessage(1).raw;

    const summary = await engine.run(
      fromItems([{ kind: "undecodable", raw, reason: "message is empty" }, submit(2)]),
    );

    expect(summary.failed).toBe(1);
    expect(summary.inserted).toBe(1);
    expect(adapter.callsFor(1)).toHaveLength(0);
    const failed = outcomes.find((o) => o.sequence === 1);
    expect(failed?.reason).toBe("undecodable: message is empty");
    expect(failed?.attempts).toBe(0);
  });

  it("counts unreadable files and carries on", async () => {
    const adapter = new ScriptedAdapter();
    const { engine, logger } = makeEngine(adapter);

    const summary = await engine.run(
      fromItems([{ kind: "file-error", target: alice, reason: "EACCES" }, submit(1, bob)]),
    );

    expect(summary.filesFailed).toBe(1);
    expect(summary.inserted).toBe(1);
    expect(logger.messages("error")).toContain("Cannot read mbox file");
  });

  it("logs progress at the configured interval", async () => {
    const adapter = new ScriptedAdapter();
    const { engine, logger } = makeEngine(adapter, { progressEvery: 2 });

    await engine.run(fromItems(range(1, 5).map((s) => submit(s))));

    expect(logger.messages("info").filter((m) => m === "Progress")).toHaveLength(2);
  });
});
