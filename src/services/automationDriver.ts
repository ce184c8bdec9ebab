import type { Box, Viewport } from '../types/index.js';
import type { CardHandle } from './contactExtractor.js';
import type { PointerDevice } from './mouseEmulator.js';
import type { KeySink } from './typingSimulator.js';

/**
 * Narrow view of the browser page the orchestrator needs.
 * `E` is the driver's element handle type.
 */
export interface AutomationDriver<E> {
  readonly pointer: PointerDevice;

  navigate(url: string): Promise<void>;
  currentUrl(): string;
  viewport(): Viewport;

  /** Element whose text equals `text` (case-insensitive), or null. */
  locateByText(selector: string, text: string): Promise<E | null>;
  /** First matching element once visible, or null after the timeout. */
  waitVisible(selector: string, timeoutMs: number): Promise<E | null>;

  click(element: E): Promise<void>;
  /** Click the first match if it shows up in time; false when it never did. */
  clickIfPresent(selector: string, timeoutMs: number): Promise<boolean>;
  fill(element: E, text: string): Promise<void>;
  blur(element: E): Promise<void>;
  pressKey(key: string): Promise<void>;

  boundingBox(element: E): Promise<Box | null>;
  keyboardFor(element: E): KeySink;
  cardFor(element: E): CardHandle;

  /** Save a screenshot for diagnostics; returns its path, or null when disabled. */
  screenshot(label: string): Promise<string | null>;
}
