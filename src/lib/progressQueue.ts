import type { BatchResult, ProcessingStats, RecordStatus } from '../types/index.js';

export type RunEvent =
  | {
      type: 'progress';
      processed: number;
      total: number;
      email: string;
      status: RecordStatus;
      /** Error code when the record ended in ERROR. */
      reason?: string;
    }
  | { type: 'batch'; result: BatchResult; totalBatches: number }
  | { type: 'log'; level: 'info' | 'warn' | 'error'; message: string }
  | { type: 'complete'; stats: ProcessingStats }
  | { type: 'error'; code: string; message: string };

export type RunEventListener = (event: RunEvent) => void;

/**
 * One-directional hand-off between the run and whoever renders it.
 * The producer pushes, the consumer polls with drain() on its own schedule.
 */
export class ProgressQueue {
  private events: RunEvent[] = [];

  readonly push: RunEventListener = (event) => {
    this.events.push(event);
  };

  /** Remove and return everything queued so far, oldest first. */
  drain(): RunEvent[] {
    const drained = this.events;
    this.events = [];
    return drained;
  }

  get size(): number {
    return this.events.length;
  }
}
