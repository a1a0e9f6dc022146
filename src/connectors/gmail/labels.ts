import type { Logger } from "../core/index.js";
import { labelAncestors } from "../core/index.js";
import { inspectGmailError } from "./errors.js";
import type { GmailLabel, MailboxApi } from "./types.js";

/** Gmail treats label names case-insensitively (`Inbox` is `INBOX`). */
function labelKey(name: string): string {
  return name.toLowerCase();
}

/**
 * Label name → id for one mailbox. Loads the label list once, reuses
 * existing labels (system ones included), and creates missing labels
 * together with their parents so nested labels show up nested. Concurrent
 * lookups of the same missing label share one create call.
 */
export class LabelResolver {
  private labels: Promise<Map<string, GmailLabel>> | null = null;
  private readonly creating = new Map<string, Promise<string>>();

  constructor(
    private readonly api: MailboxApi,
    private readonly account: string,
    private readonly logger: Logger,
  ) {}

  async resolve(name: string): Promise<string> {
    const known = await this.load();
    const existing = known.get(labelKey(name));
    if (existing) return existing.id;

    let id = "";
    for (const ancestor of labelAncestors(name)) {
      id = await this.ensure(ancestor);
    }
    return id;
  }

  private async load(): Promise<Map<string, GmailLabel>> {
    if (!this.labels) {
      this.labels = this.fetchLabels();
    }
    try {
      return await this.labels;
    } catch (err) {
      this.labels = null;
      throw err;
    }
  }

  private async fetchLabels(): Promise<Map<string, GmailLabel>> {
    const list = await this.api.listLabels();
    const map = new Map<string, GmailLabel>();
    for (const label of list) {
      map.set(labelKey(label.name), label);
    }
    this.logger.debug("Labels loaded", { account: this.account, count: list.length });
    return map;
  }

  private async ensure(name: string): Promise<string> {
    const key = labelKey(name);
    const existing = (await this.load()).get(key);
    if (existing) return existing.id;

    let pending = this.creating.get(key);
    if (!pending) {
      pending = this.create(name);
      this.creating.set(key, pending);
    }
    try {
      return await pending;
    } finally {
      this.creating.delete(key);
    }
  }

  private async create(name: string): Promise<string> {
    const key = labelKey(name);
    this.logger.info(`Label '${name}' doesn't exist, creating it`, {
      account: this.account,
    });
    try {
      const label = await this.api.createLabel(name);
      (await this.load()).set(key, label);
      this.logger.info(`Label '${name}' created`, {
        account: this.account,
        id: label.id,
      });
      return label.id;
    } catch (err) {
      // Created elsewhere since the list was loaded: reload and use it.
      if (inspectGmailError(err).status === 409) {
        this.labels = null;
        const reloaded = (await this.load()).get(key);
        if (reloaded) return reloaded.id;
      }
      throw err;
    }
  }
}
