import type { DelayCategory, DelayConfig } from '../lib/config.js';
import { defaultRandom, sleep, uniform, type Random, type Sleep } from '../lib/random.js';

const MIN_DELAY_MS = 100;
const HISTORY_SIZE = 10;
const MONOTONY_WINDOW = 3;
const MONOTONY_THRESHOLD_MS = 100;
const PERTURBATION_MS: readonly [number, number] = [-200, 300];
const JITTER = 0.05;

/**
 * Gaussian sample centred on the midpoint of [min, max] with sigma = range / 6,
 * clipped to the range (Box-Muller).
 */
export function sampleGaussianDelay(min: number, max: number, random: Random): number {
  if (max <= min) return min;

  const mean = (min + max) / 2;
  const stdDev = (max - min) / 6;
  // 1 - u keeps log() away from zero
  const u1 = 1 - random.next();
  const u2 = random.next();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);

  return Math.min(max, Math.max(min, mean + z * stdDev));
}

export interface DelayManagerOptions {
  randomDelays: boolean;
  random?: Random;
  sleep?: Sleep;
}

/**
 * Produces human-looking waits. Recent values are kept so that three
 * near-identical waits in a row get perturbed instead of repeating.
 */
export class DelayManager {
  private readonly history: number[] = [];
  private readonly random: Random;
  private readonly sleepFn: Sleep;
  private readonly randomDelays: boolean;

  constructor(private readonly delays: DelayConfig, options: DelayManagerOptions) {
    this.randomDelays = options.randomDelays;
    this.random = options.random ?? defaultRandom;
    this.sleepFn = options.sleep ?? sleep;
  }

  /** Delay in milliseconds for a named category. */
  delay(category: DelayCategory): number {
    const [min, max] = this.delays[category];
    return this.sample(min, max);
  }

  sample(min: number, max: number): number {
    if (!this.randomDelays) {
      return Math.round((min + max) / 2);
    }

    let value = sampleGaussianDelay(min, max, this.random);
    value *= uniform(this.random, 1 - JITTER, 1 + JITTER);

    if (this.isMonotonous(value)) {
      value += uniform(this.random, PERTURBATION_MS[0], PERTURBATION_MS[1]);
    }

    value = Math.round(Math.max(MIN_DELAY_MS, value));
    this.remember(value);
    return value;
  }

  async wait(category: DelayCategory): Promise<number> {
    const ms = this.delay(category);
    await this.sleepFn(ms);
    return ms;
  }

  /** Sleep for an exact duration (fixed settle times). */
  async hold(ms: number): Promise<void> {
    if (ms > 0) await this.sleepFn(ms);
  }

  recent(): readonly number[] {
    return [...this.history];
  }

  private isMonotonous(proposal: number): boolean {
    if (this.history.length < MONOTONY_WINDOW) return false;
    return this.history
      .slice(-MONOTONY_WINDOW)
      .every((previous) => Math.abs(previous - proposal) < MONOTONY_THRESHOLD_MS);
  }

  private remember(value: number): void {
    this.history.push(value);
    if (this.history.length > HISTORY_SIZE) {
      this.history.shift();
    }
  }
}
