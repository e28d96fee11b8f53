import { formatClock, formatMinutes, sessionLabel } from '../shared/format';
import { DailyStats, PeriodStats, Task, TaskCount, TimerSnapshot } from '../shared/types';

const BAR_WIDTH = 20;

export function progressBar(progress: number, width = BAR_WIDTH): string {
  const clamped = Math.max(0, Math.min(1, progress));
  const filled = Math.round(clamped * width);
  return '#'.repeat(filled) + '-'.repeat(width - filled);
}

/** One status line, e.g. `[Work] 24:59 [#---...] 1 done | Write report`. */
export function renderStatus(snap: TimerSnapshot, taskName?: string): string {
  let label: string;
  if (snap.state === 'idle') label = 'Idle';
  else if (snap.sessionType === null) label = snap.state;
  else label = snap.state === 'paused' ? `${sessionLabel(snap.sessionType)}, paused` : sessionLabel(snap.sessionType);

  const parts = [
    `[${label}] ${formatClock(snap.remainingSeconds)} [${progressBar(snap.progress)}]`,
    `${snap.completedPomodoros} done`,
  ];
  if (taskName) parts.push(taskName);
  return parts.join(' | ');
}

export function renderTask(task: Task): string {
  const mark = task.completedAt ? 'x' : ' ';
  const description = task.description ? ` - ${task.description}` : '';
  return `[${mark}] #${task.id} ${task.name} (${task.pomodoroCount} pomodoros, ${task.color})${description}`;
}

export function renderDay(day: DailyStats): string {
  return `${day.date}  ${String(day.workSessions).padStart(3)} pomodoros  ${formatMinutes(day.focusedMinutes).padStart(7)} focused  ${day.breakSessions} breaks`;
}

export function renderPeriod(title: string, period: PeriodStats): string[] {
  const best = period.mostProductiveDay
    ? `${period.mostProductiveDay.date} (${period.mostProductiveDay.workSessions})`
    : 'none';
  return [
    `${title}: ${period.startDate} to ${period.endDate}`,
    `  ${period.workSessions} pomodoros, ${formatMinutes(period.focusedMinutes)} focused, ${period.breakSessions} breaks`,
    `  ${period.averageWorkSessionsPerDay.toFixed(1)} per day, best day ${best}`,
  ];
}

export function renderTopTasks(top: TaskCount[]): string[] {
  if (top.length === 0) return ['No completed pomodoros on any task yet.'];
  return top.map((entry, i) => `${i + 1}. ${entry.task.name} (${entry.count})`);
}
