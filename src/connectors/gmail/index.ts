// Adapter
export { GmailInsertAdapter } from "./adapter.js";
// Client
export { COST_IMPORT_MESSAGE, createGmailClientFactory, GmailClient, GMAIL_SCOPES } from "./client.js";
// Credentials
export { loadServiceAccountKey } from "./credentials.js";
// Error classification
export type { GmailErrorClass } from "./errors.js";
export { classifyGmailError, inspectGmailError } from "./errors.js";
// Labels
export { LabelResolver } from "./labels.js";
// Types
export type {
  GmailErrorDetails,
  GmailLabel,
  ImportedMessage,
  MailboxApi,
  MailboxApiFactory,
  ServiceAccountKey,
} from "./types.js";
