/**
 * PauseableTimer - Presentation stopwatch.
 *
 * stop() folds the running time into the accumulated total, so the next
 * start() resumes instead of resetting. While running, the callback gets
 * the formatted elapsed time every interval on the event loop.
 */

import { TIMER_INTERVAL_MS } from '../config.js';

export type TimerState = 'stopped' | 'running';

export type TimerCallback = (text: string, state: TimerState) => void;

export interface PauseableTimerOptions {
  intervalMs?: number;
  now?: () => number;
}

/** `mm:ss`, seconds truncated, minutes unbounded. */
export function formatElapsed(ms: number): string {
  const totalSeconds = Math.floor(Math.max(ms, 0) / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

export class PauseableTimer {
  private accumulatedMs = 0;
  private reference = 0;
  private interval: NodeJS.Timeout | null = null;
  private intervalMs: number;
  private now: () => number;

  constructor(private onUpdate: TimerCallback, options: PauseableTimerOptions = {}) {
    this.intervalMs = options.intervalMs ?? TIMER_INTERVAL_MS;
    this.now = options.now ?? (() => Date.now());
  }

  get state(): TimerState {
    return this.interval ? 'running' : 'stopped';
  }

  elapsedMs(): number {
    const running = this.interval ? this.now() - this.reference : 0;
    return this.accumulatedMs + running;
  }

  text(): string {
    return formatElapsed(this.elapsedMs());
  }

  start(): void {
    if (this.interval) return;
    this.reference = this.now();
    this.interval = setInterval(() => this.emit(), this.intervalMs);
    this.emit();
  }

  stop(): void {
    if (!this.interval) return;
    this.accumulatedMs += this.now() - this.reference;
    clearInterval(this.interval);
    this.interval = null;
    this.emit();
  }

  /** Stop and zero the accumulated time. */
  reset(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
    this.accumulatedMs = 0;
    this.emit();
  }

  private emit(): void {
    this.onUpdate(this.text(), this.state);
  }
}
