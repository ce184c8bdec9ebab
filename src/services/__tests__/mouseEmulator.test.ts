import { describe, it, expect } from 'vitest';
import type { Point } from '../../types/index.js';
import { MouseEmulator, bezierPath, controlPoints, type PointerDevice } from '../mouseEmulator.js';
import { recordingSleep, scriptedRandom, testConfig } from './helpers.js';

const viewport = { width: 1280, height: 720 };

function recordingPointer(): PointerDevice & { moves: Point[]; clicks: Point[] } {
  const moves: Point[] = [];
  const clicks: Point[] = [];
  return {
    moves,
    clicks,
    move: async (x, y) => {
      moves.push({ x, y });
    },
    click: async (x, y) => {
      clicks.push({ x, y });
    },
  };
}

describe('bezierPath', () => {
  it('has steps + 1 points and exact endpoints', () => {
    const from = { x: 0, y: 0 };
    const to = { x: 300, y: 150 };
    const path = bezierPath(from, to, 10, controlPoints(from, to, scriptedRandom([0.1, 0.9])));

    expect(path).toHaveLength(11);
    expect(path[0]).toEqual(from);
    expect(path[10]).toEqual(to);
  });

  it('follows the straight line when the controls sit on it', () => {
    const from = { x: 0, y: 0 };
    const to = { x: 100, y: 0 };
    // 0.5 pushes each control point by zero
    const controls = controlPoints(from, to, scriptedRandom([0.5]));

    expect(controls[0].y).toBe(0);
    expect(controls[1].y).toBe(0);
    expect(bezierPath(from, to, 4, controls).every((point) => point.y === 0)).toBe(true);
  });

  it('bends away from the line by at most 30% of the distance', () => {
    const from = { x: 0, y: 0 };
    const to = { x: 100, y: 0 };
    const [first, second] = controlPoints(from, to, scriptedRandom([0, 0.999]));

    expect(first.x).toBeCloseTo(100 / 3);
    expect(Math.abs(first.y)).toBeCloseTo(30);
    expect(Math.abs(second.y)).toBeLessThanOrEqual(30);
  });
});

describe('MouseEmulator', () => {
  it('moves along a single curve and clicks the centre of the box', async () => {
    const pointer = recordingPointer();
    const { sleep, calls } = recordingSleep();
    const config = testConfig({ mouse: { overshootProbability: 0 } });
    const mouse = new MouseEmulator(pointer, config.mouse, viewport, { random: scriptedRandom([0.5]), sleep });

    const clicked = await mouse.moveAndClick({ x: 100, y: 100, width: 80, height: 30 });

    expect(clicked).toEqual({ x: 140, y: 115 });
    expect(pointer.clicks).toEqual([{ x: 140, y: 115 }]);
    expect(pointer.moves).toHaveLength(51);
    expect(pointer.moves[0]).toEqual({ x: 640, y: 360 });
    expect(pointer.moves[50]).toEqual({ x: 140, y: 115 });
    // 51 per-point sleeps, then the pause before the click
    expect(calls).toHaveLength(52);
    expect(calls[0]).toBeCloseTo(1000 / 51);
    expect(calls[51]).toBe(100);
    expect(mouse.lastPosition).toEqual({ x: 140, y: 115 });
  });

  it('overshoots past the target and corrects back', async () => {
    const pointer = recordingPointer();
    const { sleep, calls } = recordingSleep();
    const config = testConfig({ mouse: { overshootProbability: 1 } });
    const mouse = new MouseEmulator(pointer, config.mouse, viewport, { random: scriptedRandom([0.5]), sleep });

    await mouse.moveAndClick({ x: 100, y: 100, width: 80, height: 30 });

    // 31 points past the target, then 21 back
    expect(pointer.moves).toHaveLength(52);
    expect(pointer.moves[30].x).toBeCloseTo(90);
    expect(pointer.moves[30].y).toBeCloseTo(90.5);
    expect(pointer.moves[51]).toEqual({ x: 140, y: 115 });
    expect(pointer.clicks).toEqual([{ x: 140, y: 115 }]);
    expect(calls).toHaveLength(31 + 1 + 21 + 1);
  });

  it('starts the next move where the previous click landed', async () => {
    const pointer = recordingPointer();
    const { sleep } = recordingSleep();
    const config = testConfig({ mouse: { overshootProbability: 0 } });
    const mouse = new MouseEmulator(pointer, config.mouse, viewport, { random: scriptedRandom([0.5]), sleep });

    await mouse.moveAndClick({ x: 50, y: 60 });
    pointer.moves.length = 0;
    await mouse.moveAndClick({ x: 500, y: 400 });

    expect(pointer.moves[0]).toEqual({ x: 50, y: 60 });
    expect(pointer.clicks).toEqual([
      { x: 50, y: 60 },
      { x: 500, y: 400 },
    ]);
  });

  it('keeps the click inside a box smaller than the offset', async () => {
    const pointer = recordingPointer();
    const { sleep } = recordingSleep();
    const config = testConfig({ mouse: { overshootProbability: 0, offsetPx: 10 } });
    const mouse = new MouseEmulator(pointer, config.mouse, viewport, { random: scriptedRandom([0.99]), sleep });

    const clicked = await mouse.moveAndClick({ x: 10, y: 10, width: 4, height: 4 });

    expect(clicked).toEqual({ x: 13, y: 13 });
  });
});
