/**
 * Gmail insert-side type definitions.
 *
 * `MailboxApi` is the seam between the adapter and googleapis: the adapter
 * only ever talks to one account's mailbox through it, and tests substitute
 * an in-memory mailbox.
 */

// ─── Label ───

export interface GmailLabel {
  id: string;
  name: string;
  type: "system" | "user";
}

// ─── Imported message ───

export interface ImportedMessage {
  id: string;
  /** Labels Gmail reports on the stored message. */
  labelIds: string[];
}

// ─── Mailbox API (one account) ───

export interface MailboxApi {
  listLabels(): Promise<GmailLabel[]>;
  createLabel(name: string): Promise<GmailLabel>;
  importMessage(raw: Buffer, labelIds: string[]): Promise<ImportedMessage>;
  addLabels(messageId: string, labelIds: string[]): Promise<void>;
}

export type MailboxApiFactory = (account: string) => MailboxApi;

// ─── Credentials ───

/** The parts of a service-account JSON key the JWT flow needs. */
export interface ServiceAccountKey {
  clientEmail: string;
  privateKey: string;
}

// ─── Error inspection ───

export interface GmailErrorDetails {
  status?: number;
  /** Transport error code such as ECONNRESET. */
  code?: string;
  /** Machine-readable reasons from the error body (`rateLimitExceeded`, `invalid_grant`, …). */
  reasons: string[];
  retryAfterMs?: number;
  message: string;
}
