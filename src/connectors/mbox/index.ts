// Mime helpers
export {
  encodeQuotedPrintable,
  getHeader,
  repairTransferEncoding,
  splitEntity,
} from "./mime.js";
// Normalizer
export type { NormalizeOptions } from "./normalize.js";
export {
  DEFAULT_NORMALIZE_OPTIONS,
  DEFAULT_STRIPPED_HEADERS,
  fixMessageId,
  normalizeMessage,
} from "./normalize.js";
// Parser
export type { MboxEntry, MboxReaderOptions } from "./parser.js";
export { MboxReader, readMbox } from "./parser.js";
// Source
export type { MboxSourceOptions } from "./source.js";
export { readImportSource } from "./source.js";
// Tree
export type { AccountDirectory } from "./tree.js";
export {
  assertImportRoot,
  enumerateTargets,
  isAccountName,
  listAccounts,
  walkAccount,
} from "./tree.js";
