import type { Logger, NormalizedMessage, RawMessage } from "../core/index.js";
import {
  errorMessage,
  joinLabelPath,
  UndecodableMessageError,
} from "../core/index.js";
import {
  detectEol,
  type Entity,
  formatEntity,
  getHeader,
  type RepairReport,
  removeHeaders,
  repairTransferEncoding,
  setHeader,
  splitEntity,
} from "./mime.js";

/**
 * Mail-client bookkeeping and mbox framing headers. Gmail ignores them, and
 * `Content-Length` is wrong as soon as the body is rewritten.
 */
export const DEFAULT_STRIPPED_HEADERS: readonly string[] = [
  "Content-Length",
  "Status",
  "X-Status",
  "X-Keywords",
  "X-UID",
  "X-Mozilla-Status",
  "X-Mozilla-Status2",
];

export interface NormalizeOptions {
  fixMessageId: boolean;
  repairQuotedPrintable: boolean;
  stripHeaders: readonly string[];
}

export const DEFAULT_NORMALIZE_OPTIONS: NormalizeOptions = {
  fixMessageId: true,
  repairQuotedPrintable: false,
  stripHeaders: DEFAULT_STRIPPED_HEADERS,
};

/** Add the angle brackets a Message-ID is missing. */
export function fixMessageId(value: string): string {
  let id = value.trim();
  if (!id.startsWith("<")) id = `<${id}`;
  if (!id.endsWith(">")) id = `${id}>`;
  return id;
}

export function normalizeMessage(
  raw: RawMessage,
  opts: NormalizeOptions,
  logger: Logger,
): NormalizedMessage {
  const text = raw.bytes.toString("latin1");
  if (text.trim().length === 0) {
    throw new UndecodableMessageError(
      `message at offset ${raw.offset} of ${raw.target.sourceFile} is empty`,
    );
  }

  const eol = detectEol(text);
  const context = { sequence: raw.sequence, account: raw.target.account };
  let entity = splitEntity(text);

  for (const field of entity.headers) {
    if (field.name === null) {
      logger.warn("Passing through malformed header line", {
        ...context,
        line: field.raw.trim().slice(0, 80),
      });
    }
  }

  // Each step is best-effort: a failure leaves the entity as it was.
  const step = (name: string, fn: (e: Entity) => Entity): void => {
    try {
      entity = fn(entity);
    } catch (err) {
      logger.warn(`Failed to ${name}`, { ...context, error: errorMessage(err) });
    }
  };

  step("strip headers", (e) => ({
    ...e,
    headers: removeHeaders(e.headers, opts.stripHeaders),
  }));

  if (opts.fixMessageId) {
    step("fix brackets in Message-ID header", (e) => {
      const current = getHeader(e.headers, "Message-ID");
      if (!current) return e;
      const fixed = fixMessageId(current);
      if (fixed === current) return e;
      logger.debug("Fixed Message-ID brackets", { ...context, messageId: fixed });
      return { ...e, headers: setHeader(e.headers, "Message-ID", fixed, eol) };
    });
  }

  if (opts.repairQuotedPrintable) {
    step("repair quoted-printable encoding", (e) => {
      const report: RepairReport = { contentTypesFixed: 0, partsReencoded: 0 };
      const repaired = repairTransferEncoding(e, report, eol);
      if (report.contentTypesFixed > 0 || report.partsReencoded > 0) {
        logger.debug("Repaired transfer encoding", { ...context, ...report });
      }
      return repaired;
    });
  }

  return {
    raw,
    bytes: Buffer.from(formatEntity(entity), "latin1"),
    label: joinLabelPath(raw.target.labelPath),
  };
}
