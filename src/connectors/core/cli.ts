#!/usr/bin/env node
import { Command } from "commander";
import { config as loadDotenv } from "dotenv";
import {
  createGmailClientFactory,
  GmailInsertAdapter,
  loadServiceAccountKey,
} from "../gmail/index.js";
import {
  assertImportRoot,
  DEFAULT_STRIPPED_HEADERS,
  enumerateTargets,
  readImportSource,
  readMbox,
} from "../mbox/index.js";
import { type ImportCommandOptions, resolveImportConfig } from "./config.js";
import { ImportEngine } from "./engine.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { joinLabelPath } from "./labels.js";
import { createLogger } from "./logger.js";
import { createOutcomeLog } from "./output.js";
import { ResumeTracker } from "./resume.js";
import { RunState } from "./state.js";
import type { RunSummary } from "./types.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

const EXIT_OK = 0;
const EXIT_FAILURES = 1;
const EXIT_CONFIG = 2;

function printSummary(summary: RunSummary): void {
  const status =
    summary.fatalError !== null ? "✗" : summary.failed > 0 || summary.interrupted ? "⚠" : "✓";
  console.log("\n═══ Import Summary ═══\n");
  console.log(
    `${status} ${summary.processed} processed: ${summary.inserted} inserted, ${summary.failed} failed, ${summary.skipped} skipped [${(summary.durationMs / 1000).toFixed(1)}s]`,
  );
  console.log(`  retries: ${summary.retries}`);
  if (summary.abandoned > 0) {
    console.log(`  not attempted: ${summary.abandoned}`);
  }
  if (summary.filesFailed > 0) {
    console.log(`  ✗ unreadable mbox files: ${summary.filesFailed}`);
  }
  if (summary.fatalError !== null) {
    console.log(`  ✗ stopped: ${summary.fatalError}`);
  }
  if (summary.interrupted || summary.fatalError !== null) {
    console.log(`\nResume with --from_message ${summary.nextResumeFrom}`);
  }
}

function exitCodeFor(summary: RunSummary): number {
  const clean =
    summary.failed === 0 &&
    summary.filesFailed === 0 &&
    !summary.interrupted &&
    summary.fatalError === null;
  return clean ? EXIT_OK : EXIT_FAILURES;
}

function fail(err: unknown): never {
  if (err instanceof ConfigurationError) {
    console.error(`✗ ${err.message}`);
    process.exit(EXIT_CONFIG);
  }
  console.error(`✗ Import failed: ${errorMessage(err)}`);
  process.exit(EXIT_FAILURES);
}

async function runImport(opts: ImportCommandOptions): Promise<number> {
  const config = resolveImportConfig(opts);
  if (config.credentialsPath === null) {
    throw new ConfigurationError(
      "Missing credentials: pass --json or set IMPORT_CREDENTIALS",
    );
  }
  const key = loadServiceAccountKey(config.credentialsPath);
  await assertImportRoot(config.root);
  const logger = createLogger("import", { verbose: config.verbose });

  const state = new RunState(config.resumeFrom);
  const engine = new ImportEngine({
    adapter: new GmailInsertAdapter(
      createGmailClientFactory(key),
      createLogger("gmail", { verbose: config.verbose }),
    ),
    logger,
    state,
    maxInFlightPerAccount: config.maxInFlightPerAccount,
    maxPending: config.maxPending,
    retry: config.retry,
    rateLimiterConfig: {
      maxUnitsPerWindow: config.unitsPerSecond,
      unitsWindowMs: 1_000,
    },
    outcomes: config.outcomeLogPath ? createOutcomeLog(config.outcomeLogPath) : undefined,
    handleSignals: true,
  });

  const source = readImportSource({
    root: config.root,
    tracker: state.tracker,
    normalize: {
      fixMessageId: config.fixMessageId,
      repairQuotedPrintable: config.repairQuotedPrintable,
      stripHeaders: DEFAULT_STRIPPED_HEADERS,
    },
    logger: createLogger("mbox", { verbose: config.verbose }),
  });

  const summary = await engine.run(source);
  printSummary(summary);
  return exitCodeFor(summary);
}

async function runScan(opts: { dir?: string; from_message?: string }): Promise<void> {
  const config = resolveImportConfig({ dir: opts.dir, from_message: opts.from_message });
  const logger = createLogger("scan");
  const tracker = new ResumeTracker(config.resumeFrom);
  let files = 0;

  for await (const target of enumerateTargets(config.root, logger)) {
    files++;
    const first = tracker.assigned + 1;
    try {
      for await (const _entry of readMbox(target.sourceFile)) {
        tracker.next();
      }
    } catch (err) {
      console.log(`✗ ${target.sourceFile}: ${errorMessage(err)}`);
      continue;
    }
    const last = tracker.assigned;
    const range = last >= first ? `${first}-${last}` : "empty";
    const label = joinLabelPath(target.labelPath);
    const skipped = last >= first && last < config.resumeFrom ? " (skipped on resume)" : "";
    console.log(`  ${target.account}  ${label}  ${range}${skipped}  ${target.sourceFile}`);
  }

  console.log(`\n${files} mbox files, ${tracker.assigned} messages`);
}

const program = new Command()
  .name("mbox-import")
  .description("Import mbox files into Gmail mailboxes, one account per directory")
  .version("1.0.0");

program
  .command("import")
  .description("Import every mbox file under the directory")
  .option("--json <path>", "Service account key file (or IMPORT_CREDENTIALS)")
  .option("--dir <path>", "Directory with one sub-directory per account (or IMPORT_ROOT)")
  .option("--from_message <n>", "Skip messages numbered below n (resume)")
  .option("--replaceqp", "Repair text/quoted-printable and raw 8-bit text parts")
  .option("--no-fix-msgid", "Leave Message-ID headers as they are")
  .option("--num_retries <n>", "Retries per message on retriable errors")
  .option("--max_in_flight <n>", "Concurrent inserts per account")
  .option("--outcome_log <path>", "Append one JSON line per finished message")
  .option("--verbose", "Log debug detail")
  .action(async (opts: ImportCommandOptions) => {
    let code: number;
    try {
      code = await runImport(opts);
    } catch (err) {
      fail(err);
    }
    process.exit(code);
  });

program
  .command("scan")
  .description("List the mbox files and message numbers an import would use")
  .option("--dir <path>", "Directory with one sub-directory per account (or IMPORT_ROOT)")
  .option("--from_message <n>", "Mark files that a resume from n would skip")
  .action(async (opts: { dir?: string; from_message?: string }) => {
    try {
      await runScan(opts);
    } catch (err) {
      fail(err);
    }
    process.exit(EXIT_OK);
  });

program.parseAsync().catch(fail);
