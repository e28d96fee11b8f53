import { z } from 'zod';
import { parseInput, taskColorSchema, taskInputSchema } from '../shared/config';
import { RecordNotFoundError, StoreUnavailableError } from '../shared/errors';
import {
  NewSession,
  Session,
  SessionFilter,
  SessionUpdate,
  Task,
  TaskColor,
  TaskUpdate,
} from '../shared/types';
import { KeyValueStorage } from './storage';
import { SCHEMA_VERSION, STORAGE_KEYS } from './storage-keys';
import { Store } from './Store';

// Persisted rows use snake_case columns.
const taskRowSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  description: z.string(),
  created_at: z.string(),
  completed_at: z.string().nullable(),
  color: taskColorSchema,
  pomodoro_count: z.number().int().nonnegative(),
});

const sessionRowSchema = z.object({
  id: z.number().int().positive(),
  task_id: z.number().int().positive().nullable(),
  start_time: z.string(),
  end_time: z.string().nullable(),
  duration: z.number().int().nonnegative(),
  completed: z.boolean(),
  session_type: z.enum(['work', 'short_break', 'long_break']),
});

const metaSchema = z.object({
  schema_version: z.number().int(),
  next_task_id: z.number().int().positive(),
  next_session_id: z.number().int().positive(),
});

const settingsSchema = z.record(z.string());

type TaskRow = z.infer<typeof taskRowSchema>;
type SessionRow = z.infer<typeof sessionRowSchema>;
type Meta = z.infer<typeof metaSchema>;

const EMPTY_META: Meta = { schema_version: SCHEMA_VERSION, next_task_id: 1, next_session_id: 1 };

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at,
    completedAt: row.completed_at,
    color: row.color,
    pomodoroCount: row.pomodoro_count,
  };
}

function toSession(row: SessionRow): Session {
  return {
    id: row.id,
    taskId: row.task_id,
    startTime: row.start_time,
    endTime: row.end_time,
    duration: row.duration,
    completed: row.completed,
    sessionType: row.session_type,
  };
}

function toSessionRow(session: Session): SessionRow {
  return {
    id: session.id,
    task_id: session.taskId,
    start_time: session.startTime,
    end_time: session.endTime,
    duration: session.duration,
    completed: session.completed,
    session_type: session.sessionType,
  };
}

const sessionUpdateSchema = z.object({
  endTime: z.string().nullable().optional(),
  duration: z.number().int().nonnegative().optional(),
  completed: z.boolean().optional(),
  taskId: z.number().int().positive().nullable().optional(),
});

const newSessionSchema = z.object({
  taskId: z.number().int().positive().nullable(),
  startTime: z.string().min(1),
  endTime: z.string().nullable(),
  duration: z.number().int().nonnegative(),
  completed: z.boolean(),
  sessionType: z.enum(['work', 'short_break', 'long_break']),
});

/**
 * Tasks, sessions and settings kept as JSON tables in a key-value backend.
 * Tables are read once at construction and written through on every change.
 */
export class RecordStore implements Store {
  private _meta: Meta = EMPTY_META;
  private _tasks: TaskRow[] = [];
  private _sessions: SessionRow[] = [];
  private _settings: Record<string, string> = {};

  constructor(
    private readonly storage: KeyValueStorage,
    private readonly now: () => Date = () => new Date(),
  ) {
    this._load();
  }

  private _read<T extends z.ZodTypeAny>(key: string, schema: T, fallback: z.output<T>): z.output<T> {
    let raw: string | null;
    try {
      raw = this.storage.getItem(key);
    } catch (err) {
      throw new StoreUnavailableError(`Could not read ${key}`, err);
    }
    if (raw === null) return fallback;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new StoreUnavailableError(`${key} is not valid JSON`, err);
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new StoreUnavailableError(`${key} is corrupted`, result.error);
    }
    return result.data;
  }

  private _load(): void {
    this._meta = this._read(STORAGE_KEYS.meta, metaSchema, EMPTY_META);
    if (this._meta.schema_version > SCHEMA_VERSION) {
      throw new StoreUnavailableError(
        `Data was written by a newer version (schema ${this._meta.schema_version})`,
      );
    }
    this._tasks = this._read(STORAGE_KEYS.tasks, z.array(taskRowSchema), []);
    this._sessions = this._read(STORAGE_KEYS.sessions, z.array(sessionRowSchema), []);
    this._settings = this._read(STORAGE_KEYS.settings, settingsSchema, {});
  }

  private _save(key: string, value: unknown): void {
    try {
      this.storage.setItem(key, JSON.stringify(value));
    } catch (err) {
      throw new StoreUnavailableError(`Could not write ${key}`, err);
    }
  }

  private _nextId(field: 'next_task_id' | 'next_session_id'): number {
    const id = this._meta[field];
    const meta = { ...this._meta, [field]: id + 1 };
    this._save(STORAGE_KEYS.meta, meta);
    this._meta = meta;
    return id;
  }

  private _saveTasks(tasks: TaskRow[]): void {
    this._save(STORAGE_KEYS.tasks, tasks);
    this._tasks = tasks;
  }

  private _saveSessions(sessions: SessionRow[]): void {
    this._save(STORAGE_KEYS.sessions, sessions);
    this._sessions = sessions;
  }

  private _taskRow(id: number): TaskRow {
    const row = this._tasks.find(t => t.id === id);
    if (!row) throw new RecordNotFoundError('tasks', id);
    return row;
  }

  // ── Tasks ───────────────────────────────────────

  createTask(name: string, description = '', color: TaskColor = 'blue'): Task {
    const input = parseInput(taskInputSchema, { name, description, color }, 'task');
    const row: TaskRow = {
      id: this._nextId('next_task_id'),
      name: input.name,
      description: input.description,
      created_at: this.now().toISOString(),
      completed_at: null,
      color: input.color,
      pomodoro_count: 0,
    };
    this._saveTasks([...this._tasks, row]);
    return toTask(row);
  }

  getTask(id: number): Task | undefined {
    const row = this._tasks.find(t => t.id === id);
    return row ? toTask(row) : undefined;
  }

  /** Newest first. */
  listTasks(options: { includeCompleted?: boolean } = {}): Task[] {
    const includeCompleted = options.includeCompleted ?? true;
    return this._tasks
      .filter(t => includeCompleted || t.completed_at === null)
      .sort((a, b) => b.created_at.localeCompare(a.created_at) || b.id - a.id)
      .map(toTask);
  }

  updateTask(id: number, fields: TaskUpdate): Task {
    const current = this._taskRow(id);
    const input = parseInput(taskInputSchema, {
      name: fields.name ?? current.name,
      description: fields.description ?? current.description,
      color: fields.color ?? current.color,
    }, 'task');
    const updated: TaskRow = {
      ...current,
      name: input.name,
      description: input.description,
      color: input.color,
      completed_at: fields.completedAt === undefined ? current.completed_at : fields.completedAt,
    };
    this._saveTasks(this._tasks.map(t => (t.id === id ? updated : t)));
    return toTask(updated);
  }

  completeTask(id: number, completed = true): Task {
    const current = this._taskRow(id);
    if (completed && current.completed_at !== null) return toTask(current);
    return this.updateTask(id, { completedAt: completed ? this.now().toISOString() : null });
  }

  deleteTask(id: number): boolean {
    if (!this._tasks.some(t => t.id === id)) return false;
    if (this._sessions.some(s => s.task_id === id)) {
      this._saveSessions(this._sessions.map(s => (s.task_id === id ? { ...s, task_id: null } : s)));
    }
    this._saveTasks(this._tasks.filter(t => t.id !== id));
    return true;
  }

  incrementPomodoroCount(taskId: number): boolean {
    const current = this._tasks.find(t => t.id === taskId);
    if (!current) return false;
    const updated = { ...current, pomodoro_count: current.pomodoro_count + 1 };
    this._saveTasks(this._tasks.map(t => (t.id === taskId ? updated : t)));
    return true;
  }

  // ── Sessions ────────────────────────────────────

  createSession(draft: NewSession): Session {
    const input = parseInput(newSessionSchema, draft, 'session');
    const session: Session = { ...input, id: this._nextId('next_session_id') };
    this._saveSessions([...this._sessions, toSessionRow(session)]);
    return session;
  }

  getSession(id: number): Session | undefined {
    const row = this._sessions.find(s => s.id === id);
    return row ? toSession(row) : undefined;
  }

  updateSession(id: number, fields: SessionUpdate): Session {
    const row = this._sessions.find(s => s.id === id);
    if (!row) throw new RecordNotFoundError('sessions', id);
    const changes = parseInput(sessionUpdateSchema, fields, 'session update');
    const current = toSession(row);
    const updated: Session = {
      ...current,
      endTime: changes.endTime === undefined ? current.endTime : changes.endTime,
      duration: changes.duration ?? current.duration,
      completed: changes.completed ?? current.completed,
      taskId: changes.taskId === undefined ? current.taskId : changes.taskId,
    };
    this._saveSessions(this._sessions.map(s => (s.id === id ? toSessionRow(updated) : s)));
    return updated;
  }

  /** Oldest first. A range keeps sessions that started in `[from, to)`. */
  listSessions(filter?: SessionFilter): Session[] {
    let rows = this._sessions;
    if (filter?.kind === 'task') {
      rows = rows.filter(s => s.task_id === filter.taskId);
    } else if (filter?.kind === 'range') {
      const from = filter.from.getTime();
      const to = filter.to.getTime();
      rows = rows.filter(s => {
        const start = Date.parse(s.start_time);
        return start >= from && start < to;
      });
    }
    return rows
      .map(toSession)
      .sort((a, b) => Date.parse(a.startTime) - Date.parse(b.startTime) || a.id - b.id);
  }

  // ── Settings ────────────────────────────────────

  getSetting(key: string): string | undefined {
    return Object.hasOwn(this._settings, key) ? this._settings[key] : undefined;
  }

  setSetting(key: string, value: string): void {
    const settings = { ...this._settings, [key]: value };
    this._save(STORAGE_KEYS.settings, settings);
    this._settings = settings;
  }
}
