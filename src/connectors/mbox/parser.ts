/**
 * Streaming mbox reader.
 *
 * A line starting with `From ` opens a new message only at the start of
 * the file or right after a blank line. Bodies that carry an unquoted
 * `From ` line in the middle of a paragraph therefore stay in one piece.
 *
 * Message bytes are returned exactly as stored, minus the separator line
 * and the blank line that precedes the next separator.
 */

import * as fs from "node:fs";
import { MalformedMboxError } from "../core/index.js";

const LF = 0x0a;
const CR = 0x0d;
const FROM_ = Buffer.from("From ", "latin1");

export interface MboxEntry {
  /** Byte offset of the `From ` separator line. */
  offset: number;
  /** The separator line without its line ending. */
  fromLine: string;
  bytes: Buffer;
}

export interface MboxReaderOptions {
  /** Read chunk size in bytes. */
  highWaterMark?: number;
}

function isBlank(line: Buffer): boolean {
  return (
    (line.length === 1 && line[0] === LF) ||
    (line.length === 2 && line[0] === CR && line[1] === LF)
  );
}

function isSeparator(line: Buffer): boolean {
  return (
    line.length >= FROM_.length &&
    line.subarray(0, FROM_.length).equals(FROM_)
  );
}

function stripLineEnding(line: Buffer): Buffer {
  let end = line.length;
  if (end > 0 && line[end - 1] === LF) end--;
  if (end > 0 && line[end - 1] === CR) end--;
  return line.subarray(0, end);
}

interface PendingMessage {
  offset: number;
  fromLine: string;
  lines: Buffer[];
}

function finish(pending: PendingMessage): MboxEntry {
  const lines = pending.lines;
  const last = lines[lines.length - 1];
  if (last !== undefined && isBlank(last)) lines.pop();
  return {
    offset: pending.offset,
    fromLine: pending.fromLine,
    bytes: Buffer.concat(lines),
  };
}

/**
 * Yields complete lines (line ending included) with their byte offsets.
 */
async function* readLines(
  filePath: string,
  highWaterMark: number,
): AsyncGenerator<{ line: Buffer; offset: number }> {
  const stream = fs.createReadStream(filePath, { highWaterMark });
  let carry: Buffer = Buffer.alloc(0);
  let carryOffset = 0;

  try {
    for await (const chunk of stream) {
      const data = Buffer.isBuffer(chunk)
        ? chunk
        : Buffer.from(String(chunk), "latin1");
      const buf = carry.length > 0 ? Buffer.concat([carry, data]) : data;
      let start = 0;
      let nl = buf.indexOf(LF, start);
      while (nl !== -1) {
        yield { line: buf.subarray(start, nl + 1), offset: carryOffset + start };
        start = nl + 1;
        nl = buf.indexOf(LF, start);
      }
      carryOffset += start;
      carry = buf.subarray(start);
    }
  } catch (err) {
    throw new MalformedMboxError(filePath, err);
  } finally {
    stream.destroy();
  }

  if (carry.length > 0) {
    yield { line: carry, offset: carryOffset };
  }
}

export class MboxReader implements AsyncIterable<MboxEntry> {
  private readonly highWaterMark: number;

  constructor(
    readonly filePath: string,
    opts: MboxReaderOptions = {},
  ) {
    this.highWaterMark = opts.highWaterMark ?? 1024 * 1024;
  }

  /** Each iteration re-opens the file, so a reader can be walked repeatedly. */
  async *[Symbol.asyncIterator](): AsyncGenerator<MboxEntry> {
    let pending: PendingMessage | null = null;
    let previousBlank = true;

    for await (const { line, offset } of readLines(
      this.filePath,
      this.highWaterMark,
    )) {
      if (previousBlank && isSeparator(line)) {
        if (pending) yield finish(pending);
        pending = {
          offset,
          fromLine: stripLineEnding(line).toString("latin1"),
          lines: [],
        };
      } else if (pending) {
        pending.lines.push(line);
      }
      previousBlank = isBlank(line);
    }

    if (pending) yield finish(pending);
  }
}

export function readMbox(
  filePath: string,
  opts: MboxReaderOptions = {},
): MboxReader {
  return new MboxReader(filePath, opts);
}
