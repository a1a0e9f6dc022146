/**
 * Byte-exact MIME helpers for the normalizer.
 *
 * Everything here works on latin1 strings: decoding a Buffer as latin1 maps
 * each byte to one char and encoding back restores the same bytes, so a
 * message survives header edits and part rewrites without charset damage.
 */

// ─── Lines ───

export function splitLines(text: string): string[] {
  const lines: string[] = [];
  let start = 0;
  let nl = text.indexOf("\n", start);
  while (nl !== -1) {
    lines.push(text.slice(start, nl + 1));
    start = nl + 1;
    nl = text.indexOf("\n", start);
  }
  if (start < text.length) lines.push(text.slice(start));
  return lines;
}

export function detectEol(text: string): string {
  return text.includes("\r\n") ? "\r\n" : "\n";
}

function isBlankLine(line: string): boolean {
  return line === "\n" || line === "\r\n";
}

// ─── Entities ───

export interface HeaderField {
  /** Field name as written, or null for a line that is not a header. */
  name: string | null;
  /** Full field text, folded continuation lines and line endings included. */
  raw: string;
}

export interface Entity {
  headers: HeaderField[];
  /** The blank line ending the header section; empty when there is none. */
  separator: string;
  body: string;
}

const HEADER_NAME = /^([!-9;-~]+)[ \t]*:/;

export function splitEntity(text: string): Entity {
  const lines = splitLines(text);
  const headers: HeaderField[] = [];
  let i = 0;

  for (; i < lines.length; i++) {
    const line = lines[i];
    if (isBlankLine(line)) break;
    const last = headers[headers.length - 1];
    if ((line.startsWith(" ") || line.startsWith("\t")) && last) {
      last.raw += line;
      continue;
    }
    const match = HEADER_NAME.exec(line);
    headers.push({ name: match ? match[1] : null, raw: line });
  }

  if (i >= lines.length) {
    return { headers, separator: "", body: "" };
  }
  return {
    headers,
    separator: lines[i],
    body: lines.slice(i + 1).join(""),
  };
}

export function formatEntity(entity: Entity): string {
  return entity.headers.map((h) => h.raw).join("") + entity.separator + entity.body;
}

// ─── Headers ───

function sameName(field: HeaderField, name: string): boolean {
  return field.name !== null && field.name.toLowerCase() === name.toLowerCase();
}

function fieldEol(raw: string, fallback: string): string {
  if (raw.endsWith("\r\n")) return "\r\n";
  if (raw.endsWith("\n")) return "\n";
  return fallback;
}

/** Unfolded, trimmed value of the first field called `name`. */
export function getHeader(
  headers: readonly HeaderField[],
  name: string,
): string | undefined {
  const field = headers.find((h) => sameName(h, name));
  if (!field) return undefined;
  return field.raw
    .slice(field.raw.indexOf(":") + 1)
    .replace(/\r?\n(?=[ \t])/g, "")
    .trim();
}

/**
 * Replace the first field called `name` (keeping its spelling), or append
 * one when absent.
 */
export function setHeader(
  headers: readonly HeaderField[],
  name: string,
  value: string,
  eol: string,
): HeaderField[] {
  const index = headers.findIndex((h) => sameName(h, name));
  if (index === -1) {
    return [...headers, { name, raw: `${name}: ${value}${eol}` }];
  }
  const existing = headers[index];
  const fieldName = existing.name ?? name;
  const next = [...headers];
  next[index] = {
    name: fieldName,
    raw: `${fieldName}: ${value}${fieldEol(existing.raw, eol)}`,
  };
  return next;
}

export function removeHeaders(
  headers: readonly HeaderField[],
  names: readonly string[],
): HeaderField[] {
  const drop = new Set(names.map((n) => n.toLowerCase()));
  return headers.filter((h) => h.name === null || !drop.has(h.name.toLowerCase()));
}

/** `text/plain; charset=utf-8` → `text/plain`. */
export function mimeType(contentType: string): string {
  return contentType.split(";")[0].trim().toLowerCase();
}

export function headerParam(value: string, param: string): string | undefined {
  const re = new RegExp(`(?:^|;)\\s*${param}\\s*=\\s*(?:"([^"]*)"|([^;\\s]+))`, "i");
  const match = re.exec(value);
  if (!match) return undefined;
  return match[1] ?? match[2];
}

// ─── Multipart ───

export interface MultipartBody {
  /** Preamble, each part, and the epilogue, in order. */
  segments: string[];
  /** Delimiter lines; `delimiters[k]` sits between segments k and k+1. */
  delimiters: string[];
  /** Whether each segment is a body part. */
  isPart: boolean[];
}

export function splitMultipart(body: string, boundary: string): MultipartBody {
  const open = `--${boundary}`;
  const close = `${open}--`;
  const segments = [""];
  const delimiters: string[] = [];
  const isPart = [false];
  let closed = false;

  for (const line of splitLines(body)) {
    const bare = line.replace(/\r?\n$/, "").trimEnd();
    if (!closed && (bare === open || bare === close)) {
      closed = bare === close;
      delimiters.push(line);
      segments.push("");
      isPart.push(!closed);
      continue;
    }
    segments[segments.length - 1] += line;
  }

  return { segments, delimiters, isPart };
}

export function joinMultipart(mp: MultipartBody): string {
  let out = mp.segments[0];
  for (let k = 0; k < mp.delimiters.length; k++) {
    out += mp.delimiters[k] + mp.segments[k + 1];
  }
  return out;
}

// ─── Quoted-printable ───

const MAX_QP_LINE = 76;

function hex(code: number): string {
  return `=${code.toString(16).toUpperCase().padStart(2, "0")}`;
}

function encodeQpLine(content: string, softBreak: string): string {
  let out = "";
  let lineLength = 0;
  for (let i = 0; i < content.length; i++) {
    const code = content.charCodeAt(i);
    const isLast = i === content.length - 1;
    const needsEscape =
      code > 126 ||
      code === 61 ||
      (code < 32 && code !== 9) ||
      (isLast && (code === 32 || code === 9));
    const token = needsEscape ? hex(code) : content[i];
    // Leave room for the trailing "=" of a soft break.
    if (lineLength + token.length > MAX_QP_LINE - 1) {
      out += `=${softBreak}`;
      lineLength = 0;
    }
    out += token;
    lineLength += token.length;
  }
  return out;
}

/**
 * Quoted-printable encode a latin1 body, keeping its line endings as hard
 * breaks.
 */
export function encodeQuotedPrintable(text: string, eol = detectEol(text)): string {
  return splitLines(text)
    .map((line) => {
      const ending = /\r?\n$/.exec(line)?.[0] ?? "";
      const content = line.slice(0, line.length - ending.length);
      return encodeQpLine(content, eol) + ending;
    })
    .join("");
}

// ─── Transfer-encoding repair ───

const HIGH_BIT = /[\x80-\xff]/;
const MAX_DEPTH = 20;

export interface RepairReport {
  contentTypesFixed: number;
  partsReencoded: number;
}

/**
 * Walks an entity and its multipart children:
 *   - `text/quoted-printable` (not a real MIME type) becomes `text/plain`;
 *   - a `text/*` part declared 7bit (or undeclared) that carries 8-bit
 *     bytes is re-encoded as quoted-printable.
 */
export function repairTransferEncoding(
  entity: Entity,
  report: RepairReport,
  eol: string,
  depth = 0,
): Entity {
  let headers = entity.headers;
  let contentType = getHeader(headers, "content-type");

  if (contentType && /text\/quoted-printable/i.test(contentType)) {
    contentType = contentType.replace(/text\/quoted-printable/gi, "text/plain");
    headers = setHeader(headers, "Content-Type", contentType, eol);
    report.contentTypesFixed++;
  }

  const type = mimeType(contentType ?? "text/plain");

  if (type.startsWith("multipart/")) {
    const boundary = contentType ? headerParam(contentType, "boundary") : undefined;
    if (!boundary || depth >= MAX_DEPTH) return { ...entity, headers };
    const mp = splitMultipart(entity.body, boundary);
    const segments = mp.segments.map((segment, i) =>
      mp.isPart[i]
        ? formatEntity(
            repairTransferEncoding(splitEntity(segment), report, eol, depth + 1),
          )
        : segment,
    );
    return { ...entity, headers, body: joinMultipart({ ...mp, segments }) };
  }

  if (type.startsWith("text/")) {
    const encoding = (
      getHeader(headers, "content-transfer-encoding") ?? "7bit"
    ).toLowerCase();
    if (encoding === "7bit" && HIGH_BIT.test(entity.body)) {
      headers = setHeader(
        headers,
        "Content-Transfer-Encoding",
        "quoted-printable",
        eol,
      );
      report.partsReencoded++;
      return {
        headers,
        separator: entity.separator || eol,
        body: encodeQuotedPrintable(entity.body, eol),
      };
    }
  }

  return { ...entity, headers };
}
