import type { TypingConfig } from '../lib/config.js';
import { defaultRandom, pick, sleep, uniform, type Random, type Sleep } from '../lib/random.js';

/** Whatever receives keystrokes: a focused field, usually. */
export interface KeySink {
  type(text: string): Promise<void>;
  press(key: string): Promise<void>;
}

// QWERTY neighbours used for plausible typos
const ADJACENT_KEYS: Record<string, string> = {
  a: 'sq', b: 'vn', c: 'xv', d: 'sf', e: 'wr',
  f: 'dg', g: 'fh', h: 'gj', i: 'uo', j: 'hk',
  k: 'jl', l: 'k', m: 'n', n: 'bm', o: 'ip',
  p: 'o', q: 'w', r: 'et', s: 'ad', t: 'ry',
  u: 'yi', v: 'cb', w: 'qe', x: 'zc', y: 'tu',
  z: 'x',
};

const ALPHABET = 'abcdefghijklmnopqrstuvwxyz';
const NO_MISTAKE_CHARS = ' .,;:!?\n\t';
const PUNCTUATION = '.,;:!?';

const BETWEEN_WORDS_FACTOR = 1.5;
const PUNCTUATION_FACTOR = 1.8;
const UPPERCASE_FACTOR = 1.1;
const BURST_SPEEDUP = 4;
const VARIATION = 0.2;
const BACKSPACE_PAUSE_MS = 50;

function isUppercase(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}

export interface TypingSimulatorOptions {
  random?: Random;
  sleep?: Sleep;
}

/**
 * Types text one character at a time with a human cadence: slower after
 * spaces and punctuation, occasional fast bursts, rare corrected typos.
 */
export class TypingSimulator {
  private burstRemaining = 0;
  private readonly random: Random;
  private readonly sleepFn: Sleep;

  constructor(private readonly config: TypingConfig, options: TypingSimulatorOptions = {}) {
    this.random = options.random ?? defaultRandom;
    this.sleepFn = options.sleep ?? sleep;
  }

  async type(target: KeySink, text: string): Promise<void> {
    const chars = [...text];

    for (let i = 0; i < chars.length; i++) {
      const char = chars[i];

      if (this.shouldMistype(char)) {
        await target.type(this.mistakeFor(char));
        const [min, max] = this.config.correctionDelayMs;
        await this.sleepFn(uniform(this.random, min, max));
        await target.press('Backspace');
        await this.sleepFn(BACKSPACE_PAUSE_MS);
      }

      await target.type(char);

      // No wait after the last character
      if (i < chars.length - 1) {
        await this.sleepFn(this.charDelayMs(char));
      }
    }
  }

  /** Rough duration of typing `text`, without mistakes or bursts. */
  estimateDurationMs(text: string): number {
    const [minCps, maxCps] = this.config.charsPerSecond;
    const base = 1000 / ((minCps + maxCps) / 2);
    const chars = [...text];
    let total = 0;
    for (const char of chars.slice(0, -1)) {
      total += base * this.charFactor(char);
    }
    return Math.round(total);
  }

  /** Delay after typing `char`, in milliseconds. */
  charDelayMs(char: string): number {
    const [minCps, maxCps] = this.config.charsPerSecond;
    let delay = (1000 / uniform(this.random, minCps, maxCps)) * this.charFactor(char);

    if (this.nextInBurst()) {
      delay /= BURST_SPEEDUP;
    }

    return delay * uniform(this.random, 1 - VARIATION, 1 + VARIATION);
  }

  private charFactor(char: string): number {
    if (char === ' ') return BETWEEN_WORDS_FACTOR;
    if (PUNCTUATION.includes(char)) return PUNCTUATION_FACTOR;
    if (isUppercase(char)) return UPPERCASE_FACTOR;
    return 1;
  }

  private nextInBurst(): boolean {
    if (this.burstRemaining > 0) {
      this.burstRemaining--;
      return true;
    }
    if (this.config.burstLength > 0 && this.random.next() < this.config.burstChance) {
      this.burstRemaining = this.config.burstLength - 1;
      return true;
    }
    return false;
  }

  private shouldMistype(char: string): boolean {
    if (NO_MISTAKE_CHARS.includes(char)) return false;
    return this.random.next() < this.config.mistakeProbability;
  }

  private mistakeFor(char: string): string {
    const nearby = ADJACENT_KEYS[char.toLowerCase()];
    if (!nearby) {
      return pick(this.random, [...ALPHABET]);
    }
    const mistake = pick(this.random, [...nearby]);
    return isUppercase(char) ? mistake.toUpperCase() : mistake;
  }
}
