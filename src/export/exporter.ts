import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { StatisticsAggregator } from '../stats/StatisticsAggregator';
import { Session, Task } from '../shared/types';
import { Store } from '../store/Store';

export type ExportFormat = 'csv' | 'json';

export const CSV_HEADER = ['Session ID', 'Task', 'Start Time', 'Duration (min)', 'Type', 'Completed'];

export function defaultExportDir(): string {
  return process.env.TICKWORK_EXPORT_DIR ?? path.join(os.homedir(), 'Documents');
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** `tickwork_stats_20250220_143005.csv`, in local time. */
export function exportFileName(format: ExportFormat, at: Date): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `tickwork_stats_${date}_${time}.${format}`;
}

function localTimestamp(iso: string): string {
  const d = new Date(iso);
  if (!Number.isFinite(d.getTime())) return iso;
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function sessionsToCsv(sessions: readonly Session[], tasks: readonly Task[]): string {
  const names = new Map(tasks.map(t => [t.id, t.name]));
  const lines = [CSV_HEADER.map(csvField).join(',')];
  for (const session of sessions) {
    const taskName = session.taskId !== null ? names.get(session.taskId) ?? '' : '';
    lines.push([
      session.id,
      taskName,
      localTimestamp(session.startTime),
      Math.floor(session.duration / 60),
      session.sessionType,
      session.completed ? 'Yes' : 'No',
    ].map(csvField).join(','));
  }
  return lines.join('\n') + '\n';
}

export interface StatsSnapshot {
  exportDate: string;
  summary: {
    totalTasks: number;
    totalSessions: number;
    weekPomodoros: number;
    monthPomodoros: number;
  };
  tasks: Array<{
    id: number;
    name: string;
    description: string;
    pomodoros: number;
    completed: boolean;
    createdAt: string;
  }>;
  sessions: Session[];
}

export function buildStatsSnapshot(sessions: readonly Session[], tasks: readonly Task[], now: Date): StatsSnapshot {
  const stats = new StatisticsAggregator(sessions, tasks, now);
  return {
    exportDate: now.toISOString(),
    summary: {
      totalTasks: tasks.length,
      totalSessions: sessions.length,
      weekPomodoros: stats.weekly().workSessions,
      monthPomodoros: stats.monthly().workSessions,
    },
    tasks: tasks.map(task => ({
      id: task.id,
      name: task.name,
      description: task.description,
      pomodoros: task.pomodoroCount,
      completed: task.completedAt !== null,
      createdAt: task.createdAt,
    })),
    sessions: sessions.map(s => ({ ...s })),
  };
}

/** Writes a snapshot of the store and returns the file path. */
export function exportStats(
  store: Pick<Store, 'listSessions' | 'listTasks'>,
  format: ExportFormat,
  options: { dir?: string; now?: Date } = {},
): string {
  const now = options.now ?? new Date();
  const dir = options.dir ?? defaultExportDir();
  const sessions = store.listSessions();
  const tasks = store.listTasks({ includeCompleted: true });

  const body = format === 'csv'
    ? sessionsToCsv(sessions, tasks)
    : JSON.stringify(buildStatsSnapshot(sessions, tasks, now), null, 2) + '\n';

  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, exportFileName(format, now));
  fs.writeFileSync(filePath, body);
  return filePath;
}
