import * as fs from "node:fs";
import * as path from "node:path";
import type { ImportOutcome, OutcomeSink } from "./types.js";

/**
 * Appends one JSON line per terminal outcome. Writes are synchronous so a
 * line is on disk before the engine moves on, even if the process is
 * interrupted right after.
 */
export class JsonlOutcomeLog implements OutcomeSink {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  append(outcome: ImportOutcome): void {
    const record = { at: new Date().toISOString(), ...outcome };
    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`);
  }
}

export function createOutcomeLog(filePath: string): OutcomeSink {
  return new JsonlOutcomeLog(filePath);
}
