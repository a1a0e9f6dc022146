import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MalformedMboxError } from "../../../src/connectors/core/errors.js";
import { type MboxEntry, readMbox } from "../../../src/connectors/mbox/parser.js";

async function collect(file: string, highWaterMark?: number): Promise<MboxEntry[]> {
  const entries: MboxEntry[] = [];
  for await (const entry of readMbox(file, { highWaterMark })) {
    entries.push(entry);
  }
  return entries;
}

const TWO_MESSAGES = [
  "From alice@example.com Mon Jan  1 00:00:00 2024",
  "Subject: first",
  "",
  "Hello",
  "",
  "From bob@example.com Tue Jan  2 00:00:00 2024",
  "Subject: second",
  "",
  "World",
  "",
].join("\n");

describe("readMbox", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "mbox-import-parser-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function write(name: string, content: string | Buffer): string {
    const file = path.join(tmpDir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it("splits messages on From lines after a blank line", async () => {
    const entries = await collect(write("two.mbox", TWO_MESSAGES));

    expect(entries).toHaveLength(2);
    expect(entries[0].bytes.toString()).toBe("Subject: first\n\nHello\n");
    expect(entries[1].bytes.toString()).toBe("Subject: second\n\nWorld\n");
    expect(entries[0].fromLine).toBe("From alice@example.com Mon Jan  1 00:00:00 2024");
  });

  it("reports the byte offset of each separator", async () => {
    const entries = await collect(write("two.mbox", TWO_MESSAGES));
    expect(entries[0].offset).toBe(0);
    expect(entries[1].offset).toBe(TWO_MESSAGES.indexOf("From bob"));
  });

  it("keeps a From line that does not follow a blank line in the body", async () => {
    const content = [
      "From alice@example.com Mon Jan  1 00:00:00 2024",
      "Subject: quoting",
      "",
      "As I said:",
      "From the top, please.",
      "",
    ].join("\n");

    const entries = await collect(write("one.mbox", content));

    expect(entries).toHaveLength(1);
    expect(entries[0].bytes.toString()).toBe(
      "Subject: quoting\n\nAs I said:\nFrom the top, please.\n",
    );
  });

  it("keeps CRLF line endings", async () => {
    const content =
      "From a@example.com Mon Jan  1 00:00:00 2024\r\nSubject: crlf\r\n\r\nBody\r\n\r\n" +
      "From b@example.com Mon Jan  1 00:00:00 2024\r\nSubject: next\r\n\r\nMore\r\n";

    const entries = await collect(write("crlf.mbox", content));

    expect(entries).toHaveLength(2);
    expect(entries[0].bytes.toString()).toBe("Subject: crlf\r\n\r\nBody\r\n");
    expect(entries[1].bytes.toString()).toBe("Subject: next\r\n\r\nMore\r\n");
  });

  it("preserves 8-bit bytes", async () => {
    const body = Buffer.from([0x43, 0x61, 0x66, 0xe9, 0x0a]);
    const file = write(
      "latin1.mbox",
      Buffer.concat([Buffer.from("From a@example.com Mon Jan  1 00:00:00 2024\n\n"), body]),
    );

    const entries = await collect(file);

    expect(entries[0].bytes.equals(Buffer.concat([Buffer.from("\n"), body]))).toBe(true);
  });

  it("ignores content before the first separator", async () => {
    const entries = await collect(write("junk.mbox", `garbage line\n\n${TWO_MESSAGES}`));
    expect(entries).toHaveLength(2);
    expect(entries[0].offset).toBe("garbage line\n\n".length);
  });

  it("handles a last message without a trailing newline", async () => {
    const entries = await collect(
      write("tail.mbox", "From a@example.com Mon Jan  1 00:00:00 2024\nSubject: x\n\nno newline"),
    );
    expect(entries[0].bytes.toString()).toBe("Subject: x\n\nno newline");
  });

  it("yields nothing for an empty file", async () => {
    expect(await collect(write("empty.mbox", ""))).toEqual([]);
  });

  it("gives the same result with tiny read chunks", async () => {
    const file = write("two.mbox", TWO_MESSAGES);
    const small = await collect(file, 7);
    const large = await collect(file);
    expect(small.map((e) => e.offset)).toEqual(large.map((e) => e.offset));
    expect(small.map((e) => e.bytes.toString())).toEqual(large.map((e) => e.bytes.toString()));
  });

  it("can be iterated more than once", async () => {
    const reader = readMbox(write("two.mbox", TWO_MESSAGES));
    let first = 0;
    for await (const _entry of reader) first++;
    let second = 0;
    for await (const _entry of reader) second++;
    expect(first).toBe(2);
    expect(second).toBe(2);
  });

  it("throws MalformedMboxError for a missing file", async () => {
    await expect(collect(path.join(tmpDir, "missing.mbox"))).rejects.toBeInstanceOf(
      MalformedMboxError,
    );
  });
});
