import { CountdownSnapshot, CountdownStatus } from '../shared/types';

type CountdownEventType = 'tick' | 'stateChange' | 'finished';
type CountdownListener = (snapshot: CountdownSnapshot) => void;

/**
 * Whole-second countdown advanced by an external driver calling `tick()`.
 * Knows nothing about work or break phases.
 */
export class Countdown {
  private _status: CountdownStatus = 'idle';
  private _totalSeconds = 0;
  private _remainingSeconds = 0;
  private _listeners = new Map<CountdownEventType, Set<CountdownListener>>();

  on(event: CountdownEventType, fn: CountdownListener): void {
    let set = this._listeners.get(event);
    if (!set) {
      set = new Set();
      this._listeners.set(event, set);
    }
    set.add(fn);
  }

  off(event: CountdownEventType, fn: CountdownListener): void {
    this._listeners.get(event)?.delete(fn);
  }

  private _emit(event: CountdownEventType): void {
    const snap = this.snapshot();
    this._listeners.get(event)?.forEach(fn => fn(snap));
  }

  snapshot(): CountdownSnapshot {
    return {
      status: this._status,
      totalSeconds: this._totalSeconds,
      remainingSeconds: this._remainingSeconds,
      progress: this.progress,
    };
  }

  get status(): CountdownStatus { return this._status; }
  get totalSeconds(): number { return this._totalSeconds; }
  get remainingSeconds(): number { return this._remainingSeconds; }
  get elapsedSeconds(): number { return this._totalSeconds - this._remainingSeconds; }
  get progress(): number {
    return this._totalSeconds > 0 ? 1 - this._remainingSeconds / this._totalSeconds : 0;
  }

  configure(totalSeconds: number): void {
    this._status = 'idle';
    this._totalSeconds = totalSeconds;
    this._remainingSeconds = totalSeconds;
    this._emit('stateChange');
  }

  start(): void {
    if (this._status !== 'idle' && this._status !== 'paused') return;
    if (this._remainingSeconds <= 0) return;
    this._status = 'running';
    this._emit('stateChange');
  }

  pause(): void {
    if (this._status !== 'running') return;
    this._status = 'paused';
    this._emit('stateChange');
  }

  tick(): void {
    if (this._status !== 'running') return;

    this._remainingSeconds = Math.max(0, this._remainingSeconds - 1);
    this._emit('tick');

    if (this._remainingSeconds === 0) {
      this._status = 'finished';
      this._emit('stateChange');
      this._emit('finished');
    }
  }
}
