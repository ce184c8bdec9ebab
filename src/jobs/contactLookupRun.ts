import * as path from 'path';
import type { AppConfig } from '../lib/config.js';
import { errorMessage, isLookupError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { RunEventListener } from '../lib/progressQueue.js';
import { createSeededRandom, defaultRandom, sleep, type Random, type Sleep } from '../lib/random.js';
import type { ProcessingStats } from '../types/index.js';
import type { AutomationDriver } from '../services/automationDriver.js';
import { BatchOrchestrator } from '../services/batchOrchestrator.js';
import { BrowserSession } from '../services/browserService.js';
import { ContactExtractor } from '../services/contactExtractor.js';
import { DelayManager } from '../services/delayManager.js';
import { IdentityRotator } from '../services/identityRotator.js';
import { MouseEmulator } from '../services/mouseEmulator.js';
import { FileSessionStore } from '../services/sessionStore.js';
import { ExcelSpreadsheetStore, type SpreadsheetStore } from '../services/spreadsheetStore.js';
import { TypingSimulator } from '../services/typingSimulator.js';

/** Supplies a ready, signed-in driver for the run and releases it afterwards. */
export interface DriverProvider<E> {
  open(): Promise<AutomationDriver<E>>;
  close(): Promise<void>;
}

export interface ContactLookupRunOptions<E> {
  config: AppConfig;
  logger: Logger;
  store?: SpreadsheetStore;
  provider?: DriverProvider<E>;
  onEvent?: RunEventListener;
  signal?: AbortSignal;
  random?: Random;
  sleep?: Sleep;
}

export function createSpreadsheetStore(config: AppConfig, logger: Logger): SpreadsheetStore {
  return new ExcelSpreadsheetStore(
    path.resolve(process.cwd(), config.spreadsheet.file),
    {
      sheetName: config.spreadsheet.sheetName,
      emailColumn: config.spreadsheet.emailColumn,
      statusColumn: config.spreadsheet.statusColumn,
    },
    logger.child({ component: 'spreadsheet' })
  );
}

export function createBrowserSession(config: AppConfig, logger: Logger, random: Random = defaultRandom): BrowserSession {
  const identities = new IdentityRotator(config.identity, {
    rotate: config.antidetection.rotateIdentity,
    random,
  });
  const sessionStore = new FileSessionStore(config.browser.sessionFile, config.browser.sessionEncryptionKey);
  return new BrowserSession(config, sessionStore, identities, logger);
}

type RunSettings = Omit<ContactLookupRunOptions<unknown>, 'provider' | 'random'>;

/**
 * One complete lookup run. Preconditions (readable spreadsheet, signed-in
 * session) are checked before any batch starts; the driver is always released.
 */
export async function runContactLookup<E>(options: ContactLookupRunOptions<E>): Promise<ProcessingStats> {
  const { config, logger } = options;
  const random =
    options.random ??
    (config.antidetection.seed !== undefined ? createSeededRandom(config.antidetection.seed) : defaultRandom);

  if (options.provider) {
    return execute(options, options.provider, random);
  }
  return execute(options, createBrowserSession(config, logger, random), random);
}

async function execute<E>(options: RunSettings, provider: DriverProvider<E>, random: Random): Promise<ProcessingStats> {
  const { config, logger, onEvent, signal } = options;
  const sleepFn = options.sleep ?? sleep;
  const store = options.store ?? createSpreadsheetStore(config, logger);

  try {
    const structure = await store.ensureStructure();
    if (structure.fixedHeaders.length > 0 && !structure.created) {
      logger.info({ headers: structure.fixedHeaders }, 'Spreadsheet headers repaired');
    }

    const driver = await provider.open();

    const delays = new DelayManager(config.delays, {
      randomDelays: config.antidetection.randomDelays,
      random,
      sleep: sleepFn,
    });
    const orchestrator = new BatchOrchestrator(config, {
      driver,
      extractor: new ContactExtractor(config.extraction, logger.child({ component: 'extractor' })),
      delays,
      mouse: new MouseEmulator(driver.pointer, config.mouse, driver.viewport(), { random, sleep: sleepFn }),
      typing: new TypingSimulator(config.typing, { random, sleep: sleepFn }),
      logger,
    });

    return await orchestrator.run(store, store, { signal, onEvent });
  } catch (err) {
    const code = isLookupError(err) ? err.code : 'RUN_FAILED';
    logger.error({ err, code }, 'Contact lookup run failed');
    onEvent?.({ type: 'error', code, message: errorMessage(err) });
    throw err;
  } finally {
    try {
      await provider.close();
    } catch (err) {
      logger.warn({ err }, 'Browser did not close cleanly');
    }
  }
}
