import { BellNotifier } from '../audio/BellNotifier';
import { isActiveStatus, PomodoroTimer } from '../engine/PomodoroTimer';
import { StoreUnavailableError } from '../shared/errors';
import { formatMinutes, sessionLabel } from '../shared/format';
import { TimerConfig } from '../shared/types';
import { StatisticsAggregator } from '../stats/StatisticsAggregator';
import { RecordStore } from '../store/RecordStore';
import { MemoryStorage } from '../store/storage';
import { setSoundEnabled } from '../store/preferences';
import { Store } from '../store/Store';
import { TickDriver } from './TickDriver';
import { renderDay, renderPeriod, renderStatus, renderTopTasks } from './TerminalView';

export interface TickworkAppOptions {
  store: Store;
  config: TimerConfig;
  /** Raw terminal output: status line and bells. */
  write: (chunk: string) => void;
  log: (line: string) => void;
  logError: (message: string, err: unknown) => void;
  soundEnabled?: boolean;
  now?: () => Date;
  fallbackStore?: () => Store;
}

export type KeyResult = 'quit' | 'handled' | 'ignored';

/**
 * Wires one timer to one store for an interactive terminal session and maps
 * keys to timer actions.
 */
export class TickworkApp {
  readonly timer: PomodoroTimer;
  readonly driver: TickDriver;
  readonly bell: BellNotifier;
  private readonly store: Store;
  private readonly now: () => Date;
  private _fallback: Store | null = null;
  private _taskName: string | undefined;

  constructor(private readonly options: TickworkAppOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
    this.timer = new PomodoroTimer(options.config, options.store, this.now);
    this.bell = new BellNotifier(options.write, options.soundEnabled ?? true);
    this.driver = new TickDriver(this.timer, err => this.handleError(err));

    this.timer.on('tick', () => this.render());
    this.timer.on('stateChange', ({ from, to }) => {
      if (isActiveStatus(to) && from !== 'paused') this.bell.ring('sessionStart');
      this.render();
    });
    this.timer.on('sessionComplete', ({ sessionType, session }) => {
      this.bell.sessionComplete(sessionType);
      this.options.log(`\n${sessionLabel(sessionType)} finished (${formatMinutes(session.duration / 60)})`);
    });
  }

  get degraded(): boolean { return this._fallback !== null; }

  start(): void {
    this.render();
    this.driver.start();
  }

  shutdown(): void {
    this.driver.stop();
  }

  selectTask(taskId: number | null): boolean {
    const task = taskId === null ? undefined : this.store.getTask(taskId);
    if (taskId !== null && !task) {
      this.options.log(`No task with id ${taskId}`);
      return false;
    }
    if (!this.timer.setTask(taskId)) {
      this.options.log('Finish or skip the current work session before switching tasks');
      return false;
    }
    this._taskName = task?.name;
    this.render();
    return true;
  }

  handleKey(key: string): KeyResult {
    try {
      switch (key) {
        case 'space':
        case ' ':
          this.timer.toggle();
          return 'handled';
        case 'r':
          this.timer.reset();
          this.render();
          return 'handled';
        case 'n':
          this.timer.next();
          return 'handled';
        case 's':
          this.printStats();
          return 'handled';
        case 'm':
          this.toggleSound();
          return 'handled';
        case 'q':
          return 'quit';
        default:
          return 'ignored';
      }
    } catch (err) {
      this.handleError(err);
      return 'handled';
    }
  }

  /**
   * A store failure switches the timer to in-memory recording for the rest of
   * the process, and says so; anything else is only reported.
   */
  handleError(err: unknown): void {
    if (err instanceof StoreUnavailableError && !this._fallback) {
      this.options.logError('Storage is unavailable; sessions from now on are kept in memory only', err);
      const fallback = this.options.fallbackStore?.() ?? new RecordStore(new MemoryStorage(), this.now);
      this.timer.useStore(fallback);
      this._fallback = fallback;
      this.options.log('Task pomodoro counts are not updated until storage is back');
      return;
    }
    this.options.logError('Timer action failed', err);
  }

  /** Mutes or unmutes the bell and remembers the choice. */
  toggleSound(): void {
    const enabled = !this.bell.enabled;
    this.bell.setEnabled(enabled);
    this.options.log(`\nSound ${enabled ? 'on' : 'off'}`);
    setSoundEnabled(this.store, enabled);
  }

  printStats(): void {
    // Sessions recorded in memory after a store failure still count.
    const sessions = this._fallback
      ? [...this.store.listSessions(), ...this._fallback.listSessions()]
      : this.store.listSessions();
    const stats = new StatisticsAggregator(sessions, this.store.listTasks({ includeCompleted: true }), this.now());
    const lines = [
      '',
      `Today: ${renderDay(stats.today())}`,
      ...renderPeriod('Last 7 days', stats.weekly()),
      'Top tasks:',
      ...renderTopTasks(stats.topTasks()),
    ];
    lines.forEach(line => this.options.log(line));
  }

  render(): void {
    this.options.write(`\r${renderStatus(this.timer.snapshot(), this._taskName)}\u001b[K`);
  }
}
