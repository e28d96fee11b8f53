import { addDays, eachDay, localDayKey } from '../shared/day';
import {
  DailyStats,
  PeriodStats,
  Session,
  Task,
  TaskCount,
  TaskStats,
} from '../shared/types';
import { Store } from '../store/Store';

const WEEK_DAYS = 7;
const MONTH_DAYS = 30;
const DEFAULT_TOP_TASKS = 5;

function emptyDay(date: string): DailyStats {
  return {
    date,
    workSessions: 0,
    focusedSeconds: 0,
    focusedMinutes: 0,
    breakSessions: 0,
    abandonedSessions: 0,
    tasksWorkedOn: 0,
  };
}

/**
 * Read-only summaries over a fixed set of sessions and tasks. Only completed
 * sessions count toward work, break and focus totals; sessions without a
 * known task count toward totals but never toward per-task figures.
 */
export class StatisticsAggregator {
  private readonly _sessions: readonly Session[];
  private readonly _tasks: ReadonlyMap<number, Task>;
  private readonly _byDay = new Map<string, Session[]>();

  constructor(sessions: readonly Session[], tasks: readonly Task[], readonly now: Date = new Date()) {
    this._sessions = sessions.map(s => ({ ...s }));
    this._tasks = new Map(tasks.map(t => [t.id, { ...t }]));
    for (const session of this._sessions) {
      const start = new Date(session.startTime);
      if (!Number.isFinite(start.getTime())) continue;
      const key = localDayKey(start);
      const list = this._byDay.get(key);
      if (list) list.push(session);
      else this._byDay.set(key, [session]);
    }
  }

  static fromStore(store: Pick<Store, 'listSessions' | 'listTasks'>, now: Date = new Date()): StatisticsAggregator {
    return new StatisticsAggregator(store.listSessions(), store.listTasks({ includeCompleted: true }), now);
  }

  daily(date: Date): DailyStats {
    const key = localDayKey(date);
    const stats = emptyDay(key);
    const taskIds = new Set<number>();

    for (const session of this._byDay.get(key) ?? []) {
      if (!session.completed) {
        stats.abandonedSessions++;
        continue;
      }
      if (session.sessionType === 'work') {
        stats.workSessions++;
        stats.focusedSeconds += session.duration;
        if (session.taskId !== null) taskIds.add(session.taskId);
      } else {
        stats.breakSessions++;
      }
    }

    stats.focusedMinutes = Math.floor(stats.focusedSeconds / 60);
    stats.tasksWorkedOn = taskIds.size;
    return stats;
  }

  today(): DailyStats {
    return this.daily(this.now);
  }

  /** The 7 days ending at `endDate`, oldest first. */
  weekly(endDate: Date = this.now): PeriodStats {
    return this.range(addDays(endDate, -(WEEK_DAYS - 1)), endDate);
  }

  /** The trailing 30 days ending at `endDate`, oldest first. */
  monthly(endDate: Date = this.now): PeriodStats {
    return this.range(addDays(endDate, -(MONTH_DAYS - 1)), endDate);
  }

  range(start: Date, end: Date): PeriodStats {
    const days = eachDay(start, end).map(day => this.daily(day));
    const dayKeys = new Set(days.map(d => d.date));

    let focusedSeconds = 0;
    let workSessions = 0;
    let breakSessions = 0;
    let mostProductiveDay: DailyStats | null = null;
    for (const day of days) {
      focusedSeconds += day.focusedSeconds;
      workSessions += day.workSessions;
      breakSessions += day.breakSessions;
      // strict > keeps the earliest day on ties
      if (day.workSessions > 0 && (!mostProductiveDay || day.workSessions > mostProductiveDay.workSessions)) {
        mostProductiveDay = day;
      }
    }

    const inPeriod = this._sessions.filter(s => dayKeys.has(localDayKey(new Date(s.startTime))));

    return {
      startDate: localDayKey(start),
      endDate: localDayKey(end),
      days,
      workSessions,
      focusedMinutes: Math.floor(focusedSeconds / 60),
      breakSessions,
      averageWorkSessionsPerDay: days.length > 0 ? workSessions / days.length : 0,
      mostProductiveDay,
      taskStats: this._taskStats(inPeriod),
    };
  }

  /** Tasks by completed work sessions, most first; ties go to the lower id. */
  topTasks(limit: number = DEFAULT_TOP_TASKS): TaskCount[] {
    if (limit <= 0) return [];
    const counts = new Map<number, number>();
    for (const session of this._completedWork(this._sessions)) {
      if (session.taskId === null || !this._tasks.has(session.taskId)) continue;
      counts.set(session.taskId, (counts.get(session.taskId) ?? 0) + 1);
    }

    const ranked: TaskCount[] = [];
    for (const [taskId, count] of counts) {
      const task = this._tasks.get(taskId);
      if (task) ranked.push({ task: { ...task }, count });
    }
    return ranked
      .sort((a, b) => b.count - a.count || a.task.id - b.task.id)
      .slice(0, limit);
  }

  private _completedWork(sessions: readonly Session[]): Session[] {
    return sessions.filter(s => s.completed && s.sessionType === 'work');
  }

  private _taskStats(sessions: readonly Session[]): TaskStats[] {
    const byTask = new Map<number, Session[]>();
    for (const session of this._completedWork(sessions)) {
      if (session.taskId === null || !this._tasks.has(session.taskId)) continue;
      const list = byTask.get(session.taskId);
      if (list) list.push(session);
      else byTask.set(session.taskId, [session]);
    }

    const stats: TaskStats[] = [];
    for (const [taskId, list] of byTask) {
      const task = this._tasks.get(taskId);
      if (!task) continue;
      const starts = list.map(s => s.startTime).sort((a, b) => Date.parse(a) - Date.parse(b));
      stats.push({
        task: { ...task },
        sessions: list.length,
        focusedSeconds: list.reduce((sum, s) => sum + s.duration, 0),
        firstSession: starts[0],
        lastSession: starts[starts.length - 1],
      });
    }
    return stats.sort((a, b) => b.sessions - a.sessions || a.task.id - b.task.id);
  }
}
