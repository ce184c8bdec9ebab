import type { AppConfig } from '../lib/config.js';
import {
  CardTimeoutError,
  ExtractionError,
  LookupError,
  SurfaceSetupError,
  TokenNotFoundError,
  errorMessage,
} from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { RunEventListener } from '../lib/progressQueue.js';
import type {
  BatchResult,
  ContactInfo,
  EmailRecord,
  ProcessingStats,
  ResolvedStatus,
} from '../types/index.js';
import type { AutomationDriver } from './automationDriver.js';
import type { ContactExtractor } from './contactExtractor.js';
import type { DelayManager } from './delayManager.js';
import type { MouseEmulator } from './mouseEmulator.js';
import type { PendingSource, ResultSink } from './spreadsheetStore.js';
import type { TypingSimulator } from './typingSimulator.js';

export interface OrchestratorDeps<E> {
  driver: AutomationDriver<E>;
  extractor: ContactExtractor;
  delays: DelayManager;
  mouse: MouseEmulator;
  typing: TypingSimulator;
  logger: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
  onEvent?: RunEventListener;
}

interface LookupOutcome {
  status: ResolvedStatus;
  data?: ContactInfo;
  error?: LookupError;
}

interface RunState {
  processed: number;
  total: number;
  sink: ResultSink;
  options: RunOptions;
}

/**
 * Split records into consecutive slices of `size`, keeping source order.
 */
export function splitIntoBatches<T>(items: readonly T[], size: number): T[][] {
  if (size < 1) throw new RangeError('Batch size must be at least 1');
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}

function toLookupError(err: unknown, email: string): LookupError {
  return err instanceof LookupError ? err : new ExtractionError(email, err);
}

/**
 * Drives one compose surface per batch: every address of the batch goes into
 * the recipient field at once, then each rendered token is opened, its
 * contact card read, and the outcome written back before the next one.
 */
export class BatchOrchestrator<E> {
  private readonly logger: Logger;

  constructor(
    private readonly config: AppConfig,
    private readonly deps: OrchestratorDeps<E>
  ) {
    this.logger = deps.logger.child({ component: 'orchestrator' });
  }

  async run(source: PendingSource, sink: ResultSink, options: RunOptions = {}): Promise<ProcessingStats> {
    const startedAt = Date.now();
    const { spreadsheet, processing } = this.config;

    const records = await source.readPending(
      spreadsheet.startRow,
      spreadsheet.emailColumn,
      spreadsheet.statusColumn,
      { retryStatuses: processing.retryStatuses }
    );

    const stats: ProcessingStats = {
      totalBatches: 0,
      totalRecords: records.length,
      successful: 0,
      notFound: 0,
      errors: 0,
      durationMs: 0,
      stopped: false,
    };

    if (records.length === 0) {
      this.logger.info('No pending records');
      this.emitLog(options, 'info', 'No pending records');
      options.onEvent?.({ type: 'complete', stats });
      return stats;
    }

    const batches = splitIntoBatches(records, processing.batchSize);
    stats.totalBatches = batches.length;
    this.logger.info(
      { records: records.length, batches: batches.length, batchSize: processing.batchSize },
      'Starting contact lookup'
    );

    const state: RunState = { processed: 0, total: records.length, sink, options };

    for (const [index, batch] of batches.entries()) {
      if (index > 0 && !options.signal?.aborted) {
        await this.deps.delays.wait('betweenRecords');
      }
      if (options.signal?.aborted) {
        stats.stopped = true;
        break;
      }

      const result = await this.processBatch(batch, index + 1, state);
      stats.successful += result.successful;
      stats.notFound += result.notFound;
      stats.errors += result.errors;
      options.onEvent?.({ type: 'batch', result, totalBatches: batches.length });

      if (result.stopped) {
        stats.stopped = true;
        break;
      }
    }

    stats.durationMs = Date.now() - startedAt;
    this.logSummary(stats);
    options.onEvent?.({ type: 'complete', stats });
    return stats;
  }

  /**
   * Process one batch. Per-address failures only affect that address; a
   * failure to prepare the surface marks the whole batch ERROR.
   */
  private async processBatch(batch: EmailRecord[], batchNumber: number, state: RunState): Promise<BatchResult> {
    const { signal } = state.options;
    const result: BatchResult = {
      batchNumber,
      total: batch.length,
      successful: 0,
      notFound: 0,
      errors: 0,
      stopped: false,
    };
    const log = this.logger.child({ batch: batchNumber });
    log.info({ size: batch.length }, 'Processing batch');

    try {
      await this.openSurface();
      await this.fillRecipients(batch);
    } catch (err) {
      const failure = err instanceof LookupError ? err : new SurfaceSetupError('Could not prepare the compose surface', err);
      log.error({ err: failure }, 'Batch setup failed');
      this.emitLog(state.options, 'error', `Batch ${batchNumber} setup failed: ${failure.message}`);
      await this.captureScreenshot(`batch-${batchNumber}-setup`);

      for (const record of batch) {
        await this.resolve(record, { status: 'ERROR', error: failure }, result, state);
      }
      await this.discardQuietly(log);
      return result;
    }

    try {
      for (const [index, record] of batch.entries()) {
        if (signal?.aborted) {
          result.stopped = true;
          break;
        }
        if (index > 0) {
          await this.deps.delays.wait('betweenActions');
        }

        const outcome = await this.lookup(record);
        await this.resolve(record, outcome, result, state);
      }
    } catch (err) {
      // Anything escaping the per-record guard leaves the rest of the batch unresolved
      log.error({ err }, 'Batch aborted');
      const failure = new SurfaceSetupError(`Batch ${batchNumber} aborted: ${errorMessage(err)}`, err);
      for (const record of batch) {
        if (record.status === 'PENDING') {
          await this.resolve(record, { status: 'ERROR', error: failure }, result, state);
        }
      }
    }

    await this.discardQuietly(log);
    log.info(
      { successful: result.successful, notFound: result.notFound, errors: result.errors },
      'Batch finished'
    );
    return result;
  }

  private async lookup(record: EmailRecord): Promise<LookupOutcome> {
    const { driver, extractor } = this.deps;
    const { selectors, timeouts } = this.config;
    let cardOpened = false;

    try {
      const token = await driver.locateByText(selectors.token, record.email);
      if (!token) throw new TokenNotFoundError(record.email);

      await this.click(token);
      cardOpened = true;

      const card = await driver.waitVisible(selectors.card, timeouts.cardVisibleMs);
      if (!card) throw new CardTimeoutError(record.email, timeouts.cardVisibleMs);
      await this.deps.delays.wait('cardLoad');

      let info: ContactInfo | null;
      try {
        info = await extractor.extractFromCard(driver.cardFor(card));
      } catch (err) {
        throw new ExtractionError(record.email, err);
      }
      if (!info) throw new ExtractionError(record.email);

      const status = extractor.classify(info);
      await this.closeCard();
      return status === 'SUCCESS' ? { status, data: info } : { status };
    } catch (err) {
      const error = toLookupError(err, record.email);
      this.logger.warn({ email: record.email, code: error.code }, error.message);

      if (cardOpened) {
        try {
          await this.closeCard();
        } catch (closeErr) {
          this.logger.warn({ email: record.email, err: closeErr }, 'Could not dismiss contact card');
        }
      }
      return { status: 'ERROR', error };
    }
  }

  private async resolve(
    record: EmailRecord,
    outcome: LookupOutcome,
    result: BatchResult,
    state: RunState
  ): Promise<void> {
    record.status = outcome.status;
    record.data = outcome.data;

    if (outcome.status === 'SUCCESS') result.successful++;
    else if (outcome.status === 'NOT_FOUND') result.notFound++;
    else result.errors++;

    state.processed++;
    state.options.onEvent?.({
      type: 'progress',
      processed: state.processed,
      total: state.total,
      email: record.email,
      status: outcome.status,
      reason: outcome.error?.code,
    });

    try {
      await state.sink.writeResult(record.rowRef, outcome.status, outcome.data);
    } catch (err) {
      // The in-run outcome stands; the row stays unmarked and is picked up next run
      this.logger.error({ err, row: record.rowRef, email: record.email }, 'Failed to persist result');
      this.emitLog(state.options, 'warn', `Could not save result for ${record.email}: ${errorMessage(err)}`);
    }
  }

  private async click(element: E): Promise<void> {
    const { driver, mouse, delays } = this.deps;

    if (this.config.antidetection.mouseEmulation) {
      const box = await driver.boundingBox(element);
      if (box) {
        await mouse.moveAndClick(box);
        await delays.wait('afterClick');
        return;
      }
    }

    await driver.click(element);
    await delays.wait('afterClick');
  }

  private async openSurface(): Promise<void> {
    const { driver, delays } = this.deps;
    const { pageUrl, selectors, timeouts, waits } = this.config;

    const baseUrl = pageUrl.split('#')[0];
    if (!driver.currentUrl().startsWith(baseUrl)) {
      await driver.navigate(pageUrl);
    }

    const button = await driver.waitVisible(selectors.newMessageButton, timeouts.navigationMs);
    if (!button) {
      throw new SurfaceSetupError(`New message control not visible (${selectors.newMessageButton})`);
    }
    await this.click(button);
    await delays.hold(waits.afterOpenSurfaceMs);
  }

  private async fillRecipients(batch: EmailRecord[]): Promise<void> {
    const { driver, typing, delays } = this.deps;
    const { selectors, timeouts, waits, antidetection } = this.config;

    const field = await driver.waitVisible(selectors.toField, timeouts.navigationMs);
    if (!field) {
      throw new SurfaceSetupError(`Recipient field not visible (${selectors.toField})`);
    }

    const recipients = batch.map((record) => record.email).join(';');
    if (antidetection.humanTyping) {
      await this.click(field);
      this.logger.debug(
        { chars: recipients.length, estimatedMs: typing.estimateDurationMs(recipients) },
        'Typing recipients'
      );
      await typing.type(driver.keyboardFor(field), recipients);
    } else {
      await driver.fill(field, recipients);
    }

    await delays.wait('afterTyping');
    await delays.hold(waits.afterFillMs);
    // Leaving the field turns the addresses into resolved tokens
    await driver.blur(field);
    await delays.hold(waits.afterBlurMs);
  }

  private async closeCard(): Promise<void> {
    await this.deps.driver.pressKey('Escape');
    await this.deps.delays.wait('afterCardClose');
  }

  /** Two-step discard; the confirmation click may legitimately find nothing. */
  private async discardSurface(): Promise<void> {
    const { driver, delays } = this.deps;
    const { selectors, timeouts, waits } = this.config;

    await delays.hold(waits.beforeDiscardMs);
    const discarded = await driver.clickIfPresent(selectors.discardButton, timeouts.discardClickMs);
    if (!discarded) {
      this.logger.warn('Discard control not found; draft left open');
      return;
    }
    await delays.hold(waits.betweenDiscardClicksMs);
    await driver.clickIfPresent(selectors.discardButton, timeouts.discardClickMs);
  }

  private async discardQuietly(log: Logger): Promise<void> {
    try {
      await this.discardSurface();
    } catch (err) {
      log.warn({ err }, 'Could not discard the compose surface');
    }
  }

  private async captureScreenshot(label: string): Promise<void> {
    try {
      const file = await this.deps.driver.screenshot(label);
      if (file) this.logger.info({ file }, 'Saved screenshot');
    } catch (err) {
      this.logger.warn({ err }, 'Screenshot failed');
    }
  }

  private emitLog(options: RunOptions, level: 'info' | 'warn' | 'error', message: string): void {
    options.onEvent?.({ type: 'log', level, message });
  }

  private logSummary(stats: ProcessingStats): void {
    const pct = (count: number) =>
      stats.totalRecords > 0 ? Math.round((count / stats.totalRecords) * 1000) / 10 : 0;
    this.logger.info(
      {
        ...stats,
        successPct: pct(stats.successful),
        notFoundPct: pct(stats.notFound),
        errorPct: pct(stats.errors),
      },
      stats.stopped ? 'Contact lookup stopped' : 'Contact lookup finished'
    );
  }
}
