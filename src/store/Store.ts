import {
  NewSession,
  Session,
  SessionFilter,
  SessionUpdate,
  Task,
  TaskColor,
  TaskUpdate,
} from '../shared/types';

/**
 * Task, session and settings persistence. Every method is synchronous and
 * raises `StoreUnavailableError` when the backend cannot be read or written.
 */
export interface Store {
  createTask(name: string, description?: string, color?: TaskColor): Task;
  getTask(id: number): Task | undefined;
  listTasks(options?: { includeCompleted?: boolean }): Task[];
  updateTask(id: number, fields: TaskUpdate): Task;
  completeTask(id: number, completed?: boolean): Task;
  /** Sessions that referenced the task keep existing with a null task id. */
  deleteTask(id: number): boolean;
  /** Returns false when the task no longer exists. */
  incrementPomodoroCount(taskId: number): boolean;

  createSession(draft: NewSession): Session;
  getSession(id: number): Session | undefined;
  updateSession(id: number, fields: SessionUpdate): Session;
  listSessions(filter?: SessionFilter): Session[];

  getSetting(key: string): string | undefined;
  setSetting(key: string, value: string): void;
}

/** The part of the store the timer engine writes through. */
export type SessionRecorder = Pick<Store, 'createSession' | 'updateSession' | 'incrementPomodoroCount'>;
