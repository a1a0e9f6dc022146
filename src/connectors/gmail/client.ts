/**
 * Gmail API client for one user's mailbox.
 *
 * Thin layer over `googleapis` exposing the calls the import adapter needs:
 * list labels, create a label, import a raw message, add labels to a
 * message. Authenticates as the service account impersonating the user
 * (domain-wide delegation). No retries here; the engine owns retry policy.
 */

import { Readable } from "node:stream";
import { type gmail_v1, google } from "googleapis";
import type {
  GmailLabel,
  ImportedMessage,
  MailboxApi,
  MailboxApiFactory,
  ServiceAccountKey,
} from "./types.js";

export const GMAIL_SCOPES = [
  "https://www.googleapis.com/auth/gmail.insert",
  "https://www.googleapis.com/auth/gmail.labels",
  "https://www.googleapis.com/auth/gmail.modify",
];

// ─── Quota costs (units per call) ───

export const COST_IMPORT_MESSAGE = 25;

// ─── Client ───

export class GmailClient implements MailboxApi {
  private readonly gmail: gmail_v1.Gmail;
  private readonly userId: string;

  constructor(key: ServiceAccountKey, account: string) {
    const auth = new google.auth.JWT({
      email: key.clientEmail,
      key: key.privateKey,
      scopes: GMAIL_SCOPES,
      subject: account,
    });
    this.gmail = google.gmail({ version: "v1", auth });
    this.userId = account;
  }

  // ── Labels ──

  async listLabels(): Promise<GmailLabel[]> {
    const res = await this.gmail.users.labels.list({
      userId: this.userId,
      fields: "labels(id,name,type)",
    });

    const labels: GmailLabel[] = [];
    for (const l of res.data.labels ?? []) {
      if (!l.id || !l.name) continue;
      labels.push({
        id: l.id,
        name: l.name,
        type: l.type === "system" ? "system" : "user",
      });
    }
    return labels;
  }

  async createLabel(name: string): Promise<GmailLabel> {
    const res = await this.gmail.users.labels.create({
      userId: this.userId,
      requestBody: {
        name,
        messageListVisibility: "show",
        labelListVisibility: "labelShow",
      },
    });
    if (!res.data.id) {
      throw new Error(`Label '${name}' was created without an id`);
    }
    return { id: res.data.id, name: res.data.name ?? name, type: "user" };
  }

  // ── Messages ──

  /**
   * Import one RFC 822 message as if it had been delivered, dated by its
   * Date header. Media upload, so messages above 5 MB go through.
   */
  async importMessage(raw: Buffer, labelIds: string[]): Promise<ImportedMessage> {
    const res = await this.gmail.users.messages.import({
      userId: this.userId,
      fields: "id,labelIds",
      neverMarkSpam: true,
      processForCalendar: false,
      internalDateSource: "dateHeader",
      requestBody: { labelIds },
      media: {
        mimeType: "message/rfc822",
        body: Readable.from(raw),
      },
    });
    if (!res.data.id) {
      throw new Error("Import response carried no message id");
    }
    return { id: res.data.id, labelIds: res.data.labelIds ?? [] };
  }

  async addLabels(messageId: string, labelIds: string[]): Promise<void> {
    await this.gmail.users.messages.modify({
      userId: this.userId,
      id: messageId,
      requestBody: { addLabelIds: labelIds },
    });
  }
}

export function createGmailClientFactory(key: ServiceAccountKey): MailboxApiFactory {
  return (account) => new GmailClient(key, account);
}
