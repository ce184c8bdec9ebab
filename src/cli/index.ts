#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { loadConfig, type AppConfig } from '../lib/config.js';
import { ConfigInvalidError, SessionInvalidError, errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import { ProgressQueue, type RunEvent } from '../lib/progressQueue.js';
import { STATUS_MARKERS, type ProcessingStats } from '../types/index.js';
import {
  createBrowserSession,
  createSpreadsheetStore,
  runContactLookup,
} from '../jobs/contactLookupRun.js';
import { FileSessionStore } from '../services/sessionStore.js';

const POLL_INTERVAL_MS = 250;

interface GlobalOptions {
  config?: string;
}

interface RunCommandOptions {
  batchSize?: string;
  headless?: boolean;
  retry?: string;
}

const program = new Command();

program
  .name('contact-lookup')
  .description('Fill a spreadsheet of email addresses with directory contact details')
  .version('1.0.0')
  .option('-c, --config <file>', 'JSON configuration file (default: config/default.json)');

function readConfig(overrides: NodeJS.ProcessEnv = {}): AppConfig {
  const { config: file } = program.opts<GlobalOptions>();
  try {
    return loadConfig({ env: { ...process.env, ...overrides }, file });
  } catch (err) {
    if (err instanceof ConfigInvalidError) {
      console.error(`ERROR: ${err.message}`);
      for (const [field, messages] of Object.entries(err.fieldErrors)) {
        console.error(`  ${field}: ${messages.join('; ')}`);
      }
      process.exit(1);
    }
    throw err;
  }
}

function percent(count: number, total: number): string {
  return total > 0 ? `${((count / total) * 100).toFixed(1)}%` : '0.0%';
}

function printEvent(event: RunEvent): void {
  switch (event.type) {
    case 'progress': {
      const marker = STATUS_MARKERS[event.status] || 'PENDING';
      const reason = event.reason ? ` (${event.reason})` : '';
      console.log(`  [${event.processed}/${event.total}] ${event.email} → ${marker}${reason}`);
      break;
    }
    case 'batch':
      console.log(
        `  ── Batch ${event.result.batchNumber}/${event.totalBatches}: ` +
          `${event.result.successful} ok, ${event.result.notFound} not found, ${event.result.errors} errors`
      );
      break;
    case 'log':
      if (event.level !== 'info') console.log(`  ⚠ ${event.message}`);
      break;
    case 'error':
      console.error(`  ✗ ${event.code}: ${event.message}`);
      break;
    case 'complete':
      break;
  }
}

function printSummary(stats: ProcessingStats): void {
  console.log();
  console.log('─'.repeat(60));
  console.log('Summary');
  console.log('─'.repeat(60));
  console.log(`  Batches:         ${stats.totalBatches}`);
  console.log(`  Records:         ${stats.totalRecords}`);
  console.log(`  Successful:      ${stats.successful} (${percent(stats.successful, stats.totalRecords)})`);
  console.log(`  Not found:       ${stats.notFound} (${percent(stats.notFound, stats.totalRecords)})`);
  console.log(`  Errors:          ${stats.errors} (${percent(stats.errors, stats.totalRecords)})`);
  console.log(`  Duration:        ${(stats.durationMs / 1000).toFixed(1)}s`);
  if (stats.stopped) {
    console.log();
    console.log('  Stopped before the end; unprocessed rows stay pending for the next run.');
  }
}

program
  .command('run')
  .description('Look up every pending address in the spreadsheet')
  .option('-b, --batch-size <n>', 'addresses per compose surface')
  .option('--headless', 'run the browser without a window')
  .option('--retry <statuses>', 'comma-separated terminal statuses to process again (NOT_FOUND,ERROR)')
  .action(async (options: RunCommandOptions) => {
    const config = readConfig({
      ...(options.batchSize ? { BATCH_SIZE: options.batchSize } : {}),
      ...(options.headless ? { HEADLESS: 'true' } : {}),
      ...(options.retry ? { RETRY_STATUSES: options.retry } : {}),
    });
    const logger = createLogger(config);

    console.log('╔═══════════════════════════════════════════════════════╗');
    console.log('║  Contact Lookup                                       ║');
    console.log('╚═══════════════════════════════════════════════════════╝');
    console.log(`  Spreadsheet: ${config.spreadsheet.file}`);
    console.log(`  Page:        ${config.pageUrl}`);
    console.log(`  Batch size:  ${config.processing.batchSize}`);
    console.log(`  Retrying:    ${config.processing.retryStatuses.join(', ') || 'nothing'}`);
    console.log();

    const queue = new ProgressQueue();
    const controller = new AbortController();
    const onSigint = () => {
      if (controller.signal.aborted) {
        process.exit(130);
      }
      console.log('\n  Stopping after the current address (Ctrl+C again to force)...');
      controller.abort();
    };
    process.on('SIGINT', onSigint);

    const poller = setInterval(() => queue.drain().forEach(printEvent), POLL_INTERVAL_MS);

    try {
      const stats = await runContactLookup({
        config,
        logger,
        onEvent: queue.push,
        signal: controller.signal,
      });
      queue.drain().forEach(printEvent);
      printSummary(stats);
    } catch (err) {
      queue.drain().forEach(printEvent);
      if (err instanceof SessionInvalidError) {
        console.error(`ERROR: ${err.message}`);
        process.exitCode = 1;
        return;
      }
      throw err;
    } finally {
      clearInterval(poller);
      process.off('SIGINT', onSigint);
    }
  });

program
  .command('setup')
  .description('Open a browser window, sign in by hand and save the session')
  .action(async () => {
    const config = readConfig();
    const logger = createLogger(config);
    const browser = createBrowserSession(config, logger);

    try {
      const saved = await browser.promptLogin();
      process.exitCode = saved ? 0 : 1;
    } finally {
      await browser.close();
    }
  });

program
  .command('validate')
  .description('Check configuration, saved session and spreadsheet without running a lookup')
  .action(async () => {
    const config = readConfig();
    const logger = createLogger(config);
    let ok = true;

    console.log('  ✓ Configuration is valid');

    const sessions = new FileSessionStore(config.browser.sessionFile, config.browser.sessionEncryptionKey);
    try {
      const state = sessions.load();
      console.log(`  ✓ Session ${sessions.location} (${state.cookies.length} cookies)`);
    } catch (err) {
      ok = false;
      console.log(`  ✗ Session: ${errorMessage(err)}`);
    }

    const store = createSpreadsheetStore(config, logger);
    try {
      const structure = await store.ensureStructure();
      if (structure.created) {
        console.log(`  ✓ Spreadsheet created at ${config.spreadsheet.file}; add addresses to column ${config.spreadsheet.emailColumn}`);
      } else {
        const summary = await store.summary();
        const repaired = structure.fixedHeaders.length > 0 ? `, repaired headers: ${structure.fixedHeaders.join(', ')}` : '';
        console.log(`  ✓ Spreadsheet ${config.spreadsheet.file}: ${summary.total} addresses, ${summary.pending} pending${repaired}`);
      }
    } catch (err) {
      ok = false;
      console.log(`  ✗ Spreadsheet: ${errorMessage(err)}`);
    }

    process.exitCode = ok ? 0 : 1;
  });

program
  .command('status')
  .description('Show how far the spreadsheet has been processed')
  .action(async () => {
    const config = readConfig();
    const logger = createLogger(config);
    const summary = await createSpreadsheetStore(config, logger).summary();
    const done = summary.successful + summary.notFound + summary.errors;

    console.log(`  Spreadsheet: ${config.spreadsheet.file}`);
    console.log(`  Addresses:   ${summary.total}`);
    console.log(`  Processed:   ${done} (${percent(done, summary.total)})`);
    console.log(`    ${STATUS_MARKERS.SUCCESS.padEnd(10)} ${summary.successful}`);
    console.log(`    ${STATUS_MARKERS.NOT_FOUND.padEnd(10)} ${summary.notFound}`);
    console.log(`    ${STATUS_MARKERS.ERROR.padEnd(10)} ${summary.errors}`);
    console.log(`  Pending:     ${summary.pending}`);
  });

program.parseAsync().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
