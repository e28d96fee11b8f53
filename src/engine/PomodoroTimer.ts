import {
  ActiveStatus,
  Session,
  SessionCompletion,
  SessionType,
  StateChange,
  TickUpdate,
  TimerConfig,
  TimerSnapshot,
  TimerStatus,
} from '../shared/types';
import { SessionRecorder } from '../store/Store';
import { Countdown } from './Countdown';

type PomodoroEventMap = {
  stateChange: StateChange;
  tick: TickUpdate;
  sessionComplete: SessionCompletion;
};
type PomodoroListener<T> = (payload: T) => void;

const STATUS_FOR: Record<SessionType, ActiveStatus> = {
  work: 'working',
  short_break: 'short_break',
  long_break: 'long_break',
};

const TYPE_FOR: Record<ActiveStatus, SessionType> = {
  working: 'work',
  short_break: 'short_break',
  long_break: 'long_break',
};

export function isActiveStatus(status: TimerStatus): status is ActiveStatus {
  return status === 'working' || status === 'short_break' || status === 'long_break';
}

/**
 * Work/break state machine. Calls that make no sense in the current state
 * are ignored: nothing changes and no listener fires.
 */
export class PomodoroTimer {
  private _state: TimerStatus = 'idle';
  private _pausedFrom: ActiveStatus | null = null;
  private _completedPomodoros = 0;
  private _sinceLongBreak = 0;
  private _taskId: number | null = null;
  private _session: Session | null = null;
  // Set once a natural completion has been written but the next session
  // could not be opened yet; the next tick picks it up from here.
  private _finalized: Session | null = null;
  // Opened by a next() whose abandon write then failed; a retried next()
  // begins this one instead of opening another.
  private _pendingNext: Session | null = null;
  private readonly _countdown = new Countdown();
  private readonly _listeners: { [K in keyof PomodoroEventMap]: Set<PomodoroListener<PomodoroEventMap[K]>> } = {
    stateChange: new Set(),
    tick: new Set(),
    sessionComplete: new Set(),
  };

  constructor(
    private readonly _config: TimerConfig,
    private _recorder: SessionRecorder,
    private readonly _now: () => Date = () => new Date(),
  ) {
    this._countdown.configure(this.durationFor('work'));
    this._countdown.on('tick', (snap) => {
      this._emit('tick', { remainingSeconds: snap.remainingSeconds, progress: snap.progress });
    });
    this._countdown.on('finished', () => this._completeSession());
  }

  on<K extends keyof PomodoroEventMap>(event: K, fn: PomodoroListener<PomodoroEventMap[K]>): void {
    this._listeners[event].add(fn);
  }

  off<K extends keyof PomodoroEventMap>(event: K, fn: PomodoroListener<PomodoroEventMap[K]>): void {
    this._listeners[event].delete(fn);
  }

  private _emit<K extends keyof PomodoroEventMap>(event: K, payload: PomodoroEventMap[K]): void {
    this._listeners[event].forEach(fn => fn(payload));
  }

  snapshot(): TimerSnapshot {
    return {
      state: this._state,
      pausedFrom: this._pausedFrom,
      sessionType: this.sessionType,
      totalSeconds: this._countdown.totalSeconds,
      remainingSeconds: this._countdown.remainingSeconds,
      progress: this._countdown.progress,
      completedPomodoros: this._completedPomodoros,
      taskId: this._taskId,
    };
  }

  get state(): TimerStatus { return this._state; }
  get pausedFrom(): ActiveStatus | null { return this._pausedFrom; }
  get config(): TimerConfig { return this._config; }
  get remainingSeconds(): number { return this._countdown.remainingSeconds; }
  get totalSeconds(): number { return this._countdown.totalSeconds; }
  get completedPomodoros(): number { return this._completedPomodoros; }
  get currentTaskId(): number | null { return this._taskId; }
  get currentSession(): Session | null { return this._session ? { ...this._session } : null; }
  get isActive(): boolean { return isActiveStatus(this._state); }

  /** Type of the running or paused session; null while idle. */
  get sessionType(): SessionType | null {
    if (isActiveStatus(this._state)) return TYPE_FOR[this._state];
    if (this._state === 'paused' && this._pausedFrom) return TYPE_FOR[this._pausedFrom];
    return null;
  }

  durationFor(type: SessionType): number {
    switch (type) {
      case 'work': return this._config.workMinutes * 60;
      case 'short_break': return this._config.shortBreakMinutes * 60;
      case 'long_break': return this._config.longBreakMinutes * 60;
    }
  }

  start(): void {
    if (this._state !== 'idle') return;
    const session = this._openSession('work');
    this._beginSession(session);
  }

  pause(): void {
    if (!isActiveStatus(this._state)) return;
    this._pausedFrom = this._state;
    this._countdown.pause();
    this._changeState('paused');
  }

  resume(): void {
    if (this._state !== 'paused' || !this._pausedFrom) return;
    const resumeTo = this._pausedFrom;
    this._pausedFrom = null;
    this._countdown.start();
    this._changeState(resumeTo);
  }

  toggle(): void {
    if (this._state === 'idle') this.start();
    else if (this._state === 'paused') this.resume();
    else this.pause();
  }

  tick(): void {
    if (!isActiveStatus(this._state)) return;
    if (this._countdown.status === 'finished') {
      this._completeSession();
      return;
    }
    this._countdown.tick();
  }

  /** Abandon the current session and move straight on to the next one. */
  next(): void {
    const type = this.sessionType;
    if (type === null) return;
    if (this._finalized || this._countdown.status === 'finished') {
      this._completeSession();
      return;
    }
    const nextSession = this._pendingNext ?? this._openSession(this._scheduleAfter(type));
    this._pendingNext = nextSession;
    this._abandonSession();
    this._pendingNext = null;
    this._beginSession(nextSession);
  }

  /** Abandon any session, zero the cycle counters and go back to idle. */
  reset(): void {
    this._discardPending();
    if (this._state !== 'idle' && !this._finalized) this._abandonSession();
    this._session = null;
    this._finalized = null;
    this._pausedFrom = null;
    this._completedPomodoros = 0;
    this._sinceLongBreak = 0;
    this._countdown.configure(this.durationFor('work'));
    if (this._state !== 'idle') this._changeState('idle');
  }

  /**
   * Select the task for the next work session. Refused while a work session
   * is running or paused, since that session already has its task.
   */
  setTask(taskId: number | null): boolean {
    if (this._state === 'working' || this._pausedFrom === 'working') return false;
    this._taskId = taskId;
    return true;
  }

  /** Continue recording through another store, e.g. in memory after a failure. */
  useStore(recorder: SessionRecorder): void {
    this._recorder = recorder;
    this._pendingNext = null;
    if (this._session && !this._finalized) {
      const { id: _previousId, ...draft } = this._session;
      this._session = recorder.createSession(draft);
    }
  }

  private _openSession(type: SessionType): Session {
    return this._recorder.createSession({
      taskId: type === 'work' ? this._taskId : null,
      startTime: this._now().toISOString(),
      endTime: null,
      duration: 0,
      completed: false,
      sessionType: type,
    });
  }

  private _beginSession(session: Session): void {
    this._session = session;
    this._pausedFrom = null;
    if (session.sessionType === 'long_break') this._sinceLongBreak = 0;
    this._countdown.configure(this.durationFor(session.sessionType));
    this._countdown.start();
    this._changeState(STATUS_FOR[session.sessionType]);
  }

  private _abandonSession(): void {
    if (!this._session) return;
    this._session = this._recorder.updateSession(this._session.id, {
      endTime: this._now().toISOString(),
      duration: this._countdown.elapsedSeconds,
      completed: false,
    });
  }

  private _discardPending(): void {
    if (!this._pendingNext) return;
    this._recorder.updateSession(this._pendingNext.id, {
      endTime: this._now().toISOString(),
      duration: 0,
      completed: false,
    });
    this._pendingNext = null;
  }

  private _scheduleAfter(type: SessionType): SessionType {
    if (type !== 'work') return 'work';
    return this._sinceLongBreak >= this._config.longBreakInterval ? 'long_break' : 'short_break';
  }

  private _completeSession(): void {
    const type = this.sessionType;
    if (type === null || !this._session) return;

    let finished = this._finalized;
    if (!finished) {
      finished = this._recorder.updateSession(this._session.id, {
        endTime: this._now().toISOString(),
        duration: this._countdown.totalSeconds,
        completed: true,
      });
      if (type === 'work') {
        if (finished.taskId !== null) this._recorder.incrementPomodoroCount(finished.taskId);
        this._completedPomodoros++;
        this._sinceLongBreak++;
      }
      this._finalized = finished;
    }

    this._discardPending();
    const nextSession = this._openSession(this._scheduleAfter(type));
    this._finalized = null;
    this._emit('sessionComplete', { sessionType: type, session: finished });
    this._beginSession(nextSession);
  }

  private _changeState(to: TimerStatus): void {
    const from = this._state;
    this._state = to;
    this._emit('stateChange', { from, to });
  }
}
