/**
 * Directory layout → import targets.
 *
 *   <root>/<account>/<name>.mbox                 label <name>
 *   <root>/<account>/<dir>/<name>.mbox           label <dir>/<name>
 *   <root>/<account>/<name>.mbox/mbox            label <name>   (Apple Mail export)
 *   <root>/<account>/<dir>/mbox + <dir>/<sub>/…  label <dir>, sub-folders nest under it
 *
 * Traversal is pre-order with entries sorted by code unit, driven by an
 * explicit stack, so the order of targets (and therefore message sequence
 * numbers) depends only on the names in the tree.
 */

import type { Dirent, Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ImportTarget, Logger } from "../core/index.js";
import {
  ConfigurationError,
  errorMessage,
  sanitizeLabelComponent,
  stripMboxSuffix,
} from "../core/index.js";

/** The file holding a folder's own messages in a folder-per-label export. */
export const FOLDER_MBOX_FILE = "mbox";

const ACCOUNT_PATTERN = /^[^\s@/\\]+@[^\s@/\\]+\.[^\s@/\\]+$/;

export function isAccountName(name: string): boolean {
  return ACCOUNT_PATTERN.test(name);
}

function isMboxFileName(name: string): boolean {
  return (
    name.toLowerCase().endsWith(".mbox") && stripMboxSuffix(name).length > 0
  );
}

function byName(a: Dirent, b: Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

async function resolveKind(
  dir: string,
  entry: Dirent,
): Promise<"dir" | "file" | "other"> {
  if (entry.isDirectory()) return "dir";
  if (entry.isFile()) return "file";
  if (entry.isSymbolicLink()) {
    let stat: Stats;
    try {
      stat = await fs.stat(path.join(dir, entry.name));
    } catch {
      // Dangling link: report it as a file so reading it fails per file.
      return "file";
    }
    if (stat.isDirectory()) return "dir";
    if (stat.isFile()) return "file";
  }
  return "other";
}

async function listSorted(dir: string): Promise<Dirent[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.filter((e) => !e.name.startsWith(".")).sort(byName);
}

export async function assertImportRoot(root: string): Promise<void> {
  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch (err) {
    throw new ConfigurationError(
      `Import directory ${root} is not accessible: ${errorMessage(err)}`,
      err,
    );
  }
  if (!stat.isDirectory()) {
    throw new ConfigurationError(`Import path ${root} is not a directory`);
  }
}

export interface AccountDirectory {
  account: string;
  dir: string;
}

/**
 * Immediate sub-directories of `root` whose names look like email
 * addresses, in name order.
 */
export async function listAccounts(
  root: string,
  logger: Logger,
): Promise<AccountDirectory[]> {
  const accounts: AccountDirectory[] = [];
  for (const entry of await listSorted(root)) {
    const kind = await resolveKind(root, entry);
    if (kind !== "dir") continue;
    if (!isAccountName(entry.name)) {
      logger.warn("Skipping directory that is not an email address", {
        dir: path.join(root, entry.name),
      });
      continue;
    }
    accounts.push({ account: entry.name, dir: path.join(root, entry.name) });
  }
  return accounts;
}

type WorkItem =
  | { kind: "dir"; dir: string; labelPath: readonly string[] }
  | { kind: "file"; file: string; labelPath: readonly string[] };

function isWithin(parent: string, child: string): boolean {
  return child === parent || child.startsWith(parent + path.sep);
}

/**
 * Targets of one account directory, in traversal order.
 *
 * Symlinked directories are followed only while they resolve inside the
 * account directory, and each real directory is walked once. A directory
 * that cannot be listed is logged and skipped.
 */
export async function* walkAccount(
  { account, dir }: AccountDirectory,
  logger: Logger,
): AsyncGenerator<ImportTarget> {
  let accountReal: string;
  try {
    accountReal = await fs.realpath(dir);
  } catch (err) {
    logger.warn("Skipping unreadable account directory", {
      account,
      dir,
      error: errorMessage(err),
    });
    return;
  }

  const stack: WorkItem[] = [{ kind: "dir", dir, labelPath: [] }];
  const visited = new Set<string>();
  let found = 0;

  while (stack.length > 0) {
    const item = stack.pop();
    if (item === undefined) break;

    if (item.kind === "file") {
      found++;
      yield { account, labelPath: item.labelPath, sourceFile: item.file };
      continue;
    }

    let entries: Dirent[];
    try {
      const real = await fs.realpath(item.dir);
      if (!isWithin(accountReal, real)) {
        logger.warn("Skipping directory link that leaves the account directory", {
          dir: item.dir,
          target: real,
        });
        continue;
      }
      if (visited.has(real)) {
        logger.warn("Skipping directory already visited", {
          dir: item.dir,
          target: real,
        });
        continue;
      }
      visited.add(real);
      entries = await listSorted(item.dir);
    } catch (err) {
      logger.warn("Skipping unreadable directory", {
        dir: item.dir,
        error: errorMessage(err),
      });
      continue;
    }

    const children: WorkItem[] = [];
    for (const entry of entries) {
      const full = path.join(item.dir, entry.name);
      const kind = await resolveKind(item.dir, entry);

      if (kind === "file" && entry.name === FOLDER_MBOX_FILE) {
        if (item.labelPath.length === 0) {
          logger.warn("Skipping mbox file at account root (no label)", {
            file: full,
          });
          continue;
        }
        // The folder's own messages come before anything nested in it.
        found++;
        yield { account, labelPath: item.labelPath, sourceFile: full };
        continue;
      }

      if (kind === "other" || (kind === "file" && !isMboxFileName(entry.name))) {
        logger.info(`Skipping '${full}' because it doesn't have a .mbox extension`);
        continue;
      }

      const component = sanitizeLabelComponent(entry.name);
      if (component.length === 0) {
        logger.warn("Skipping entry with an empty label name", { path: full });
        continue;
      }
      const labelPath = [...item.labelPath, component];
      children.push(
        kind === "dir"
          ? { kind: "dir", dir: full, labelPath }
          : { kind: "file", file: full, labelPath },
      );
    }

    // Reverse so the smallest name is popped first.
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  if (found === 0) {
    logger.warn("No mbox files found for account", { account, dir });
  }
}

/**
 * All targets under `root`: accounts in name order, each account's
 * files in pre-order.
 */
export async function* enumerateTargets(
  root: string,
  logger: Logger,
): AsyncGenerator<ImportTarget> {
  await assertImportRoot(root);
  for (const account of await listAccounts(root, logger)) {
    try {
      yield* walkAccount(account, logger);
    } catch (err) {
      logger.error("Stopped walking account after an error", {
        account: account.account,
        dir: account.dir,
        error: errorMessage(err),
      });
    }
  }
}
