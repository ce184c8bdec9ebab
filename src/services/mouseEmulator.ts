import type { MouseConfig } from '../lib/config.js';
import { defaultRandom, randomInt, sleep, uniform, type Random, type Sleep } from '../lib/random.js';
import type { Box, Point, Viewport } from '../types/index.js';

export interface PointerDevice {
  move(x: number, y: number): Promise<void>;
  click(x: number, y: number): Promise<void>;
}

const CURVE_SPREAD = 0.3;
const OVERSHOOT_RANGE: readonly [number, number] = [0.05, 0.15];
const OVERSHOOT_PAUSE_MS: readonly [number, number] = [50, 150];
const OVERSHOOT_SHARE = 0.6;
const CORRECTION_SHARE = 0.4;

/**
 * Calculate point on a cubic Bezier curve
 */
function bezierPoint(t: number, p0: Point, p1: Point, p2: Point, p3: Point): Point {
  const u = 1 - t;
  const tt = t * t;
  const uu = u * u;
  const uuu = uu * u;
  const ttt = tt * t;

  return {
    x: uuu * p0.x + 3 * uu * t * p1.x + 3 * u * tt * p2.x + ttt * p3.x,
    y: uuu * p0.y + 3 * uu * t * p1.y + 3 * u * tt * p2.y + ttt * p3.y,
  };
}

/**
 * Control points at 1/3 and 2/3 of the straight line, each pushed sideways
 * along the perpendicular by up to 30% of the travel distance.
 */
export function controlPoints(from: Point, to: Point, random: Random): [Point, Point] {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const distance = Math.hypot(dx, dy);
  if (distance === 0) return [{ ...from }, { ...to }];

  const normal = { x: -dy / distance, y: dx / distance };
  const bend = (fraction: number): Point => {
    const push = uniform(random, -CURVE_SPREAD, CURVE_SPREAD) * distance;
    return {
      x: from.x + dx * fraction + normal.x * push,
      y: from.y + dy * fraction + normal.y * push,
    };
  };

  return [bend(1 / 3), bend(2 / 3)];
}

/**
 * Sample `steps + 1` points along the curve. Endpoints are exactly `from` and `to`.
 */
export function bezierPath(from: Point, to: Point, steps: number, controls: [Point, Point]): Point[] {
  const count = Math.max(1, Math.floor(steps));
  const points: Point[] = [{ x: from.x, y: from.y }];
  for (let i = 1; i < count; i++) {
    points.push(bezierPoint(i / count, from, controls[0], controls[1], to));
  }
  points.push({ x: to.x, y: to.y });
  return points;
}

function isBox(target: Point | Box): target is Box {
  return 'width' in target && 'height' in target;
}

export interface MouseEmulatorOptions {
  random?: Random;
  sleep?: Sleep;
}

/**
 * Replays curved pointer trajectories before clicks, with an occasional
 * overshoot and correction. Tracks the last pointer position between calls.
 */
export class MouseEmulator {
  private position: Point;
  private readonly random: Random;
  private readonly sleepFn: Sleep;

  constructor(
    private readonly pointer: PointerDevice,
    private readonly config: MouseConfig,
    viewport: Viewport,
    options: MouseEmulatorOptions = {}
  ) {
    this.position = { x: viewport.width / 2, y: viewport.height / 2 };
    this.random = options.random ?? defaultRandom;
    this.sleepFn = options.sleep ?? sleep;
  }

  get lastPosition(): Point {
    return { ...this.position };
  }

  /**
   * Move to the target (a point, or the centre of a box) along a curve and click.
   * Returns the point that was clicked.
   */
  async moveAndClick(target: Point | Box, from?: Point): Promise<Point> {
    const start = from ?? this.position;
    const aim = this.aimPoint(target);

    if (this.random.next() < this.config.overshootProbability) {
      const factor = uniform(this.random, OVERSHOOT_RANGE[0], OVERSHOOT_RANGE[1]);
      const beyond: Point = {
        x: aim.x + (aim.x - start.x) * factor,
        y: aim.y + (aim.y - start.y) * factor,
      };
      const duration = this.moveDuration();
      await this.trace(start, beyond, this.config.overshootSteps, duration * OVERSHOOT_SHARE);
      await this.sleepFn(uniform(this.random, OVERSHOOT_PAUSE_MS[0], OVERSHOOT_PAUSE_MS[1]));
      await this.trace(beyond, aim, this.config.correctionSteps, this.moveDuration() * CORRECTION_SHARE);
    } else {
      await this.trace(start, aim, this.config.steps, this.moveDuration());
    }

    const [pauseMin, pauseMax] = this.config.pauseBeforeClickMs;
    await this.sleepFn(uniform(this.random, pauseMin, pauseMax));
    await this.pointer.click(aim.x, aim.y);
    this.position = aim;
    return { ...aim };
  }

  private aimPoint(target: Point | Box): Point {
    const offset = this.config.offsetPx;
    const jitter = (): number => (offset > 0 ? randomInt(this.random, -offset, offset) : 0);

    if (!isBox(target)) {
      return { x: target.x + jitter(), y: target.y + jitter() };
    }

    const centre = { x: target.x + target.width / 2, y: target.y + target.height / 2 };
    // Stay inside the element even when it is smaller than the offset
    return {
      x: Math.min(target.x + target.width - 1, Math.max(target.x + 1, centre.x + jitter())),
      y: Math.min(target.y + target.height - 1, Math.max(target.y + 1, centre.y + jitter())),
    };
  }

  private moveDuration(): number {
    const [min, max] = this.config.moveDurationMs;
    return uniform(this.random, min, max);
  }

  private async trace(from: Point, to: Point, steps: number, durationMs: number): Promise<void> {
    const path = bezierPath(from, to, steps, controlPoints(from, to, this.random));
    const perPoint = durationMs / path.length;
    for (const point of path) {
      await this.pointer.move(point.x, point.y);
      await this.sleepFn(perPoint);
    }
  }
}
