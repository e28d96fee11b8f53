import { PomodoroTimer } from '../engine/PomodoroTimer';

const TICK_MS = 1000;

/**
 * Calls `timer.tick()` once a second while a session is running. An error
 * thrown by a tick goes to `onError`; the interval keeps running.
 */
export class TickDriver {
  private _handle: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly timer: PomodoroTimer,
    private readonly onError: (err: unknown) => void,
    private readonly intervalMs = TICK_MS,
  ) {}

  get running(): boolean { return this._handle !== null; }

  start(): void {
    if (this._handle) return;
    this._handle = setInterval(() => this._tick(), this.intervalMs);
  }

  stop(): void {
    if (!this._handle) return;
    clearInterval(this._handle);
    this._handle = null;
  }

  private _tick(): void {
    if (!this.timer.isActive) return;
    try {
      this.timer.tick();
    } catch (err) {
      this.onError(err);
    }
  }
}
