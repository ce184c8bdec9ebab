import { chromium, errors, type Browser, type BrowserContext, type Locator, type Page } from 'playwright';
import * as fs from 'fs';
import * as path from 'path';
import type { AppConfig } from '../lib/config.js';
import { SessionInvalidError } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { Box, Viewport } from '../types/index.js';
import type { AutomationDriver } from './automationDriver.js';
import type { CardHandle } from './contactExtractor.js';
import { describeIdentity, type IdentityRotator } from './identityRotator.js';
import type { PointerDevice } from './mouseEmulator.js';
import type { SessionState, SessionStore } from './sessionStore.js';
import type { KeySink } from './typingSimulator.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function isTimeout(err: unknown): boolean {
  return err instanceof errors.TimeoutError;
}

/**
 * AutomationDriver over a single Playwright page.
 */
export class PlaywrightDriver implements AutomationDriver<Locator> {
  readonly pointer: PointerDevice;

  constructor(
    private readonly page: Page,
    private readonly config: AppConfig,
    private readonly logger: Logger
  ) {
    this.pointer = {
      move: (x, y) => page.mouse.move(x, y),
      click: (x, y) => page.mouse.click(x, y),
    };
  }

  async navigate(url: string): Promise<void> {
    await this.page.goto(url, {
      waitUntil: 'domcontentloaded',
      timeout: this.config.timeouts.navigationMs,
    });
  }

  currentUrl(): string {
    return this.page.url();
  }

  viewport(): Viewport {
    return this.page.viewportSize() ?? this.config.browser.viewport;
  }

  async locateByText(selector: string, text: string): Promise<Locator | null> {
    const locator = this.page
      .locator(selector)
      .filter({ hasText: new RegExp(`^\\s*${escapeRegExp(text)}\\s*$`, 'i') })
      .first();
    return (await locator.count()) > 0 ? locator : null;
  }

  async waitVisible(selector: string, timeoutMs: number): Promise<Locator | null> {
    const locator = this.page.locator(selector).first();
    try {
      await locator.waitFor({ state: 'visible', timeout: timeoutMs });
      return locator;
    } catch (err) {
      if (isTimeout(err)) return null;
      throw err;
    }
  }

  async click(element: Locator): Promise<void> {
    await element.click({ timeout: this.config.timeouts.navigationMs });
  }

  async clickIfPresent(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.locator(selector).first().click({ timeout: timeoutMs });
      return true;
    } catch (err) {
      if (isTimeout(err)) return false;
      throw err;
    }
  }

  async fill(element: Locator, text: string): Promise<void> {
    await element.fill(text);
  }

  async blur(element: Locator): Promise<void> {
    await element.blur();
  }

  async pressKey(key: string): Promise<void> {
    await this.page.keyboard.press(key);
  }

  async boundingBox(element: Locator): Promise<Box | null> {
    return element.boundingBox();
  }

  keyboardFor(element: Locator): KeySink {
    return {
      type: (text) => element.pressSequentially(text),
      press: (key) => element.press(key),
    };
  }

  cardFor(element: Locator): CardHandle {
    return {
      innerText: () => element.innerText(),
      linkTargets: async () => {
        const hrefs: string[] = [];
        for (const anchor of await element.locator('a[href]').all()) {
          const href = await anchor.getAttribute('href');
          if (href) hrefs.push(href);
        }
        return hrefs;
      },
    };
  }

  /**
   * Save a screenshot with a descriptive name.
   */
  async screenshot(label: string): Promise<string | null> {
    if (!this.config.browser.screenshotOnError) return null;

    const dir = path.resolve(process.cwd(), this.config.browser.screenshotsDir);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const filepath = path.join(dir, `${label}_${timestamp}.png`);
    await this.page.screenshot({ path: filepath, fullPage: false });
    this.logger.debug({ file: filepath }, 'Screenshot saved');
    return filepath;
  }
}

export interface LaunchOptions {
  /** Fail with SessionInvalidError when no usable saved session exists. */
  requireSession: boolean;
}

/**
 * Owns the browser for a run: launch with a rotated identity and the saved
 * session, hand out drivers, persist the session again on close.
 */
export class BrowserSession {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly config: AppConfig,
    private readonly sessionStore: SessionStore,
    private readonly identities: IdentityRotator,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'browser' });
  }

  /**
   * Launch browser and create a context.
   * Restores previous session state if available.
   */
  async launch(options: LaunchOptions, headless = this.config.browser.headless): Promise<BrowserContext> {
    if (this.context) return this.context;

    let storageState: SessionState | undefined;
    if (options.requireSession) {
      storageState = this.sessionStore.load();
    } else if (this.sessionStore.exists()) {
      try {
        storageState = this.sessionStore.load();
      } catch (err) {
        this.logger.warn({ err }, 'Ignoring unreadable saved session');
      }
    }

    const userAgent = this.identities.identity();
    const identity = describeIdentity(userAgent);
    this.logger.info(
      { browser: identity.browser, version: identity.majorVersion, platform: identity.platform },
      'Launching browser'
    );

    this.browser = await chromium.launch({ headless });

    const extraHTTPHeaders: Record<string, string> = {
      'Accept-Language': `${this.config.browser.locale},${this.config.browser.locale.split('-')[0]};q=0.9`,
    };
    if (identity.browser === 'Chrome' || identity.browser === 'Edge') {
      extraHTTPHeaders['sec-ch-ua-platform'] = `"${platformHint(identity.platform)}"`;
    }

    this.context = await this.browser.newContext({
      viewport: this.config.browser.viewport,
      userAgent,
      locale: this.config.browser.locale,
      extraHTTPHeaders,
      storageState,
    });
    return this.context;
  }

  async newDriver(): Promise<PlaywrightDriver> {
    if (!this.context) {
      throw new Error('Browser not launched');
    }
    const page = await this.context.newPage();
    return new PlaywrightDriver(page, this.config, this.logger);
  }

  /**
   * The session counts as signed in when the mail page shows its
   * new-message control instead of a sign-in form.
   */
  async isSignedIn(driver: PlaywrightDriver): Promise<boolean> {
    try {
      await driver.navigate(this.config.pageUrl);
    } catch (err) {
      this.logger.warn({ err }, 'Mail page did not load');
      return false;
    }
    const marker = await driver.waitVisible(
      this.config.selectors.newMessageButton,
      this.config.timeouts.navigationMs
    );
    return marker !== null;
  }

  /**
   * Launch, open a page and confirm the saved session still works.
   */
  async open(): Promise<PlaywrightDriver> {
    await this.launch({ requireSession: true });
    const driver = await this.newDriver();
    if (!(await this.isSignedIn(driver))) {
      throw new SessionInvalidError('Saved session is no longer signed in. Run "setup" again.', {
        file: this.sessionStore.location,
        url: driver.currentUrl(),
      });
    }
    return driver;
  }

  /**
   * Open a visible browser window for the user to sign in manually.
   * Waits for the mail page, then saves state.
   */
  async promptLogin(): Promise<boolean> {
    await this.launch({ requireSession: false }, false);
    const driver = await this.newDriver();

    try {
      await driver.navigate(this.config.pageUrl);
      console.log('[setup] Please sign in to the mail page in the browser window...');

      const marker = await driver.waitVisible(
        this.config.selectors.newMessageButton,
        this.config.timeouts.loginMs
      );
      if (!marker) {
        console.error('[setup] Sign-in timed out');
        return false;
      }

      await this.saveState();
      console.log(`[setup] Sign-in detected, session saved to ${this.sessionStore.location}`);
      return true;
    } catch (err) {
      this.logger.error({ err }, 'Sign-in failed');
      return false;
    }
  }

  /**
   * Save browser state (cookies, local storage) through the session store.
   */
  async saveState(): Promise<void> {
    if (!this.context) return;
    const state = await this.context.storageState();
    this.sessionStore.save(state);
  }

  /**
   * Save current state and close the browser.
   */
  async close(): Promise<void> {
    if (this.context) {
      try {
        await this.saveState();
      } catch (err) {
        this.logger.warn({ err }, 'Could not save session state');
      }
      await this.context.close();
      this.context = null;
    }
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }
}

function platformHint(platform: ReturnType<typeof describeIdentity>['platform']): string {
  switch (platform) {
    case 'windows':
      return 'Windows';
    case 'mac':
      return 'macOS';
    case 'linux':
      return 'Linux';
    default:
      return 'Unknown';
  }
}
