import type {
  ImportTarget,
  Logger,
  ResumeTracker,
  SourceItem,
} from "../core/index.js";
import {
  errorMessage,
  joinLabelPath,
  MalformedMboxError,
  UndecodableMessageError,
} from "../core/index.js";
import { type NormalizeOptions, normalizeMessage } from "./normalize.js";
import { type MboxReaderOptions, readMbox } from "./parser.js";
import { enumerateTargets } from "./tree.js";

export interface MboxSourceOptions {
  root: string;
  tracker: ResumeTracker;
  normalize: NormalizeOptions;
  logger: Logger;
  reader?: MboxReaderOptions;
}

/**
 * The ordered stream the engine consumes. Every message found gets the next
 * sequence number, whether or not it is submitted, so numbering never
 * depends on `resumeFrom`.
 */
export async function* readImportSource(
  opts: MboxSourceOptions,
): AsyncGenerator<SourceItem> {
  const { tracker, logger } = opts;

  for await (const target of enumerateTargets(opts.root, logger)) {
    yield* readTarget(target, opts);
  }

  logger.info(`Done reading all users from directory '${opts.root}'`, {
    messages: tracker.assigned,
  });
}

async function* readTarget(
  target: ImportTarget,
  opts: MboxSourceOptions,
): AsyncGenerator<SourceItem> {
  const { tracker, logger } = opts;
  const label = joinLabelPath(target.labelPath);
  const firstSequence = tracker.assigned + 1;

  logger.info(`Starting processing of '${target.sourceFile}'`, {
    account: target.account,
    label,
  });

  try {
    for await (const entry of readMbox(target.sourceFile, opts.reader)) {
      const sequence = tracker.next();
      if (!tracker.shouldSubmit(sequence)) {
        yield { kind: "skip", sequence, target };
        continue;
      }

      const raw = { target, offset: entry.offset, bytes: entry.bytes, sequence };
      let item: SourceItem;
      try {
        item = { kind: "submit", message: normalizeMessage(raw, opts.normalize, logger) };
      } catch (err) {
        if (!(err instanceof UndecodableMessageError)) throw err;
        item = { kind: "undecodable", raw, reason: err.message };
      }
      yield item;
    }
  } catch (err) {
    if (!(err instanceof MalformedMboxError)) throw err;
    yield { kind: "file-error", target, reason: errorMessage(err) };
    return;
  }

  logger.info(`Finished processing '${target.sourceFile}'`, {
    account: target.account,
    label,
    firstSequence,
    lastSequence: tracker.assigned,
  });
}
