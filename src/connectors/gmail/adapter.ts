/**
 * Gmail insert adapter: implements `InsertAdapter` from the connector core.
 *
 * One `insert` call is one attempt: resolve the label, import the message
 * with that label, and if Gmail stored the message without it, add the
 * label in a second call. Failures come back as result values; retrying
 * them is the engine's job.
 */

import type {
  InsertAdapter,
  InsertResult,
  Logger,
  NormalizedMessage,
} from "../core/index.js";
import { errorMessage, FatalImportError } from "../core/index.js";
import { COST_IMPORT_MESSAGE } from "./client.js";
import { classifyGmailError } from "./errors.js";
import { LabelResolver } from "./labels.js";
import type { ImportedMessage, MailboxApi, MailboxApiFactory } from "./types.js";

interface Mailbox {
  api: MailboxApi;
  labels: LabelResolver;
}

function toResult(err: unknown): InsertResult {
  const classified = classifyGmailError(err);
  if (classified.kind === "fatal") {
    throw new FatalImportError(classified.reason, err);
  }
  return classified;
}

export class GmailInsertAdapter implements InsertAdapter {
  readonly name = "gmail";
  readonly unitCost = COST_IMPORT_MESSAGE;

  private readonly mailboxes = new Map<string, Mailbox>();

  constructor(
    private readonly createApi: MailboxApiFactory,
    private readonly logger: Logger,
  ) {}

  async insert(message: NormalizedMessage): Promise<InsertResult> {
    const { account } = message.raw.target;
    const mailbox = this.mailboxFor(account);

    let labelIds: string[] = [];
    if (message.label !== "") {
      try {
        labelIds = [await mailbox.labels.resolve(message.label)];
      } catch (err) {
        return toResult(err);
      }
    }

    let imported: ImportedMessage;
    try {
      imported = await mailbox.api.importMessage(message.bytes, labelIds);
    } catch (err) {
      return toResult(err);
    }

    const missing = labelIds.filter((id) => !imported.labelIds.includes(id));
    if (missing.length > 0) {
      try {
        await mailbox.api.addLabels(imported.id, missing);
      } catch (err) {
        return {
          kind: "permanent",
          reason: `labeling_failed: imported as ${imported.id} but label '${message.label}' was not applied: ${errorMessage(err)}`,
          scope: "message",
        };
      }
    }

    this.logger.debug("Imported mbox message", {
      sequence: message.raw.sequence,
      account,
      gmailId: imported.id,
    });
    return { kind: "inserted", messageId: imported.id };
  }

  private mailboxFor(account: string): Mailbox {
    let mailbox = this.mailboxes.get(account);
    if (!mailbox) {
      const api = this.createApi(account);
      mailbox = { api, labels: new LabelResolver(api, account, this.logger) };
      this.mailboxes.set(account, mailbox);
    }
    return mailbox;
  }
}
