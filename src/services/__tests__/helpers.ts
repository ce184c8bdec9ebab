import { pino } from 'pino';
import { parseConfig, type AppConfig } from '../../lib/config.js';
import type { Logger } from '../../lib/logger.js';
import type { Random, Sleep } from '../../lib/random.js';
import {
  STATUS_MARKERS,
  statusFromMarker,
  type Box,
  type ContactInfo,
  type EmailRecord,
  type Point,
  type ResolvedStatus,
  type Viewport,
} from '../../types/index.js';
import type { AutomationDriver } from '../automationDriver.js';
import type { CardHandle } from '../contactExtractor.js';
import type { PointerDevice } from '../mouseEmulator.js';
import type { PendingOptions, SheetSummary, SpreadsheetStore, StructureReport } from '../spreadsheetStore.js';
import type { KeySink } from '../typingSimulator.js';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/** Replays the given values in order, wrapping around at the end. */
export function scriptedRandom(values: number[]): Random {
  let index = 0;
  return {
    next() {
      const value = values[index % values.length];
      index++;
      return value;
    },
  };
}

export function recordingSleep(): { sleep: Sleep; calls: number[] } {
  const calls: number[] = [];
  return {
    calls,
    sleep: async (ms) => {
      calls.push(ms);
    },
  };
}

export function testConfig(raw: Record<string, unknown> = {}): AppConfig {
  return parseConfig(raw);
}

// ─── Fake browser ────────────────────────────────────────────────────────────

export interface FakeElement {
  kind: 'new' | 'to' | 'token' | 'card';
  id?: string;
}

export interface FakeCard {
  text?: string;
  links?: string[];
  /** No token is rendered for the address. */
  noToken?: boolean;
  /** The card never becomes visible. */
  neverVisible?: boolean;
  /** Reading the card text throws. */
  failRead?: boolean;
}

export interface FakeDriverOptions {
  /** How many times opening the compose surface fails before it works. */
  failSurfaceTimes?: number;
  withBoxes?: boolean;
  confirmDiscard?: boolean;
}

function contains(box: Box, x: number, y: number): boolean {
  return x >= box.x && x <= box.x + box.width && y >= box.y && y <= box.y + box.height;
}

function boxFor(element: FakeElement, tokens: string[]): Box {
  switch (element.kind) {
    case 'new':
      return { x: 100, y: 100, width: 80, height: 30 };
    case 'to':
      return { x: 300, y: 100, width: 400, height: 30 };
    case 'token':
      return { x: 400, y: 200 + 40 * Math.max(0, tokens.indexOf(element.id ?? '')), width: 120, height: 20 };
    case 'card':
      return { x: 400, y: 400, width: 300, height: 200 };
  }
}

export class FakeDriver implements AutomationDriver<FakeElement> {
  readonly actions: string[] = [];
  readonly moves: Point[] = [];
  readonly clicks: Point[] = [];
  readonly pointer: PointerDevice;

  url = 'about:blank';
  fieldValue = '';
  private tokens: string[] = [];
  private openCard: string | null = null;
  private discardClicks = 0;
  private surfaceFailures: number;
  private hitTargets: Array<{ box: Box; element: FakeElement }> = [];

  constructor(
    private readonly config: AppConfig,
    private readonly cards: Record<string, FakeCard>,
    private readonly options: FakeDriverOptions = {}
  ) {
    this.surfaceFailures = options.failSurfaceTimes ?? 0;
    this.pointer = {
      move: async (x, y) => {
        this.moves.push({ x, y });
      },
      click: async (x, y) => {
        this.clicks.push({ x, y });
        const hit = this.hitTargets.find(({ box }) => contains(box, x, y));
        if (hit) this.recordClick(hit.element);
      },
    };
  }

  async navigate(url: string): Promise<void> {
    this.actions.push(`navigate:${url}`);
    this.url = url;
  }

  currentUrl(): string {
    return this.url;
  }

  viewport(): Viewport {
    return { width: 1280, height: 720 };
  }

  async locateByText(_selector: string, text: string): Promise<FakeElement | null> {
    const email = this.tokens.find((token) => token.toLowerCase() === text.toLowerCase());
    return email ? { kind: 'token', id: email } : null;
  }

  async waitVisible(selector: string, _timeoutMs: number): Promise<FakeElement | null> {
    const { selectors } = this.config;
    if (selector === selectors.newMessageButton) {
      if (this.surfaceFailures > 0) {
        this.surfaceFailures--;
        return null;
      }
      return { kind: 'new' };
    }
    if (selector === selectors.toField) {
      return { kind: 'to' };
    }
    if (selector === selectors.card && this.openCard !== null) {
      return this.cards[this.openCard]?.neverVisible ? null : { kind: 'card', id: this.openCard };
    }
    return null;
  }

  async click(element: FakeElement): Promise<void> {
    this.recordClick(element);
  }

  async clickIfPresent(selector: string, _timeoutMs: number): Promise<boolean> {
    if (selector !== this.config.selectors.discardButton) return false;
    this.discardClicks++;
    const present = this.discardClicks === 1 || (this.options.confirmDiscard ?? false);
    if (present) this.actions.push('discard');
    return present;
  }

  async fill(_element: FakeElement, text: string): Promise<void> {
    this.actions.push(`fill:${text}`);
    this.fieldValue = text;
  }

  async blur(_element: FakeElement): Promise<void> {
    this.actions.push('blur');
    this.tokens = this.fieldValue
      .split(';')
      .map((email) => email.trim())
      .filter((email) => email && !this.cards[email]?.noToken);
  }

  async pressKey(key: string): Promise<void> {
    this.actions.push(`press:${key}`);
    if (key === 'Escape') this.openCard = null;
  }

  async boundingBox(element: FakeElement): Promise<Box | null> {
    if (!this.options.withBoxes) return null;
    const box = boxFor(element, this.tokens);
    this.hitTargets = [...this.hitTargets.filter((target) => target.element.kind !== element.kind), { box, element }];
    return box;
  }

  keyboardFor(_element: FakeElement): KeySink {
    return {
      type: async (text) => {
        this.fieldValue += text;
      },
      press: async (key) => {
        if (key === 'Backspace') this.fieldValue = this.fieldValue.slice(0, -1);
      },
    };
  }

  cardFor(element: FakeElement): CardHandle {
    const card = element.id ? this.cards[element.id] : undefined;
    return {
      innerText: async () => {
        if (!card || card.failRead) throw new Error('card detached');
        return card.text ?? '';
      },
      linkTargets: async () => card?.links ?? [],
    };
  }

  async screenshot(_label: string): Promise<string | null> {
    return null;
  }

  /** Entry point for clicks coming from the pointer or the driver. */
  private recordClick(element: FakeElement): void {
    this.actions.push(element.id ? `click:${element.kind}:${element.id}` : `click:${element.kind}`);
    if (element.kind === 'new') {
      this.fieldValue = '';
      this.tokens = [];
      this.discardClicks = 0;
    }
    if (element.kind === 'token' && element.id) {
      this.openCard = element.id;
    }
  }
}

// ─── In-memory spreadsheet ───────────────────────────────────────────────────

export interface MemoryRow {
  email: string;
  marker: string;
  data?: ContactInfo;
}

export class MemorySpreadsheetStore implements SpreadsheetStore {
  readonly rows: MemoryRow[];
  readonly failWritesFor = new Set<number>();
  writes = 0;

  /** Rows start at spreadsheet row 2; a bare string is an unprocessed address. */
  constructor(rows: Array<string | [string, string]>) {
    this.rows = rows.map((row) =>
      typeof row === 'string' ? { email: row, marker: '' } : { email: row[0], marker: row[1] }
    );
  }

  markers(): string[] {
    return this.rows.map((row) => row.marker);
  }

  async readPending(
    startRow: number,
    _emailColumn: number,
    _statusColumn: number,
    options: PendingOptions = {}
  ): Promise<EmailRecord[]> {
    const retry = new Set(options.retryStatuses ?? []);
    const records: EmailRecord[] = [];
    this.rows.forEach((row, index) => {
      const rowRef = index + 2;
      if (rowRef < startRow || !row.email.includes('@')) return;
      const status = statusFromMarker(row.marker);
      if (status === 'PENDING' || (status !== null && retry.has(status))) {
        records.push({ email: row.email, rowRef, status: 'PENDING' });
      }
    });
    return records;
  }

  async writeResult(rowRef: number, status: ResolvedStatus, data?: ContactInfo): Promise<void> {
    if (this.failWritesFor.has(rowRef)) {
      throw new Error(`disk full writing row ${rowRef}`);
    }
    this.writes++;
    const row = this.rows[rowRef - 2];
    row.marker = STATUS_MARKERS[status];
    row.data = status === 'SUCCESS' ? data : undefined;
  }

  async ensureStructure(): Promise<StructureReport> {
    return { created: false, fixedHeaders: [] };
  }

  async summary(): Promise<SheetSummary> {
    const summary: SheetSummary = { total: 0, pending: 0, successful: 0, notFound: 0, errors: 0 };
    for (const row of this.rows) {
      summary.total++;
      const status = statusFromMarker(row.marker);
      if (status === 'PENDING') summary.pending++;
      else if (status === 'SUCCESS') summary.successful++;
      else if (status === 'NOT_FOUND') summary.notFound++;
      else if (status === 'ERROR') summary.errors++;
    }
    return summary;
  }
}
