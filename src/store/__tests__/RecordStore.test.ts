import { describe, it, expect, vi, beforeEach } from 'vitest';
import { RecordStore } from '../RecordStore';
import { MemoryStorage } from '../storage';
import { STORAGE_KEYS } from '../storage-keys';
import { RecordNotFoundError, StoreUnavailableError, ValidationError } from '../../shared/errors';
import { NewSession } from '../../shared/types';

const CREATED = new Date('2025-02-20T10:00:00.000Z');

function workDraft(startTime: string, taskId: number | null = null): NewSession {
  return {
    taskId,
    startTime,
    endTime: null,
    duration: 0,
    completed: false,
    sessionType: 'work',
  };
}

describe('RecordStore', () => {
  let storage: MemoryStorage;
  let store: RecordStore;

  beforeEach(() => {
    storage = new MemoryStorage();
    store = new RecordStore(storage, () => CREATED);
  });

  describe('constructor', () => {
    it('starts empty when the backend is empty', () => {
      expect(store.listTasks()).toEqual([]);
      expect(store.listSessions()).toEqual([]);
      expect(store.getSetting('theme')).toBeUndefined();
    });

    it('loads tables written by an earlier instance', () => {
      store.createTask('Persisted');
      store.setSetting('theme', 'dark');
      const reopened = new RecordStore(storage);
      expect(reopened.listTasks().map(t => t.name)).toEqual(['Persisted']);
      expect(reopened.getSetting('theme')).toBe('dark');
      expect(reopened.createTask('Second').id).toBe(2);
    });

    it('rejects a table that is not JSON', () => {
      storage.setItem(STORAGE_KEYS.tasks, 'not-valid-json{{{');
      expect(() => new RecordStore(storage)).toThrow(StoreUnavailableError);
    });

    it('rejects rows that do not match the schema', () => {
      storage.setItem(STORAGE_KEYS.sessions, JSON.stringify([{ id: 1, session_type: 'nap' }]));
      expect(() => new RecordStore(storage)).toThrow('tickwork-sessions is corrupted');
    });

    it('rejects data from a newer schema version', () => {
      storage.setItem(STORAGE_KEYS.meta, JSON.stringify({ schema_version: 99, next_task_id: 1, next_session_id: 1 }));
      expect(() => new RecordStore(storage)).toThrow(StoreUnavailableError);
    });

    it('wraps backend read errors', () => {
      const broken = new MemoryStorage();
      vi.spyOn(broken, 'getItem').mockImplementation(() => {
        throw new Error('EACCES');
      });
      const attempt = () => new RecordStore(broken);
      expect(attempt).toThrow(StoreUnavailableError);
      expect(attempt).toThrow('Could not read tickwork-meta');
    });
  });

  describe('tasks', () => {
    it('creates a task with defaults', () => {
      const task = store.createTask('  Write report  ');
      expect(task).toEqual({
        id: 1,
        name: 'Write report',
        description: '',
        createdAt: CREATED.toISOString(),
        completedAt: null,
        color: 'blue',
        pomodoroCount: 0,
      });
    });

    it('stores rows under snake_case column names', () => {
      store.createTask('Columns', 'check', 'green');
      expect(JSON.parse(storage.getItem(STORAGE_KEYS.tasks) ?? '[]')).toEqual([{
        id: 1,
        name: 'Columns',
        description: 'check',
        created_at: CREATED.toISOString(),
        completed_at: null,
        color: 'green',
        pomodoro_count: 0,
      }]);
    });

    it('rejects an empty name without persisting anything', () => {
      expect(() => store.createTask('   ')).toThrow(ValidationError);
      expect(storage.getItem(STORAGE_KEYS.tasks)).toBeNull();
      expect(store.createTask('Real').id).toBe(1);
    });

    it('gets a task by id', () => {
      const task = store.createTask('Find me');
      expect(store.getTask(task.id)?.name).toBe('Find me');
      expect(store.getTask(99)).toBeUndefined();
    });

    it('lists newest first and can hide completed tasks', () => {
      let clock = new Date('2025-02-20T08:00:00.000Z');
      const timed = new RecordStore(new MemoryStorage(), () => clock);
      timed.createTask('Old');
      clock = new Date('2025-02-20T09:00:00.000Z');
      const done = timed.createTask('Done');
      timed.completeTask(done.id);

      expect(timed.listTasks().map(t => t.name)).toEqual(['Done', 'Old']);
      expect(timed.listTasks({ includeCompleted: false }).map(t => t.name)).toEqual(['Old']);
    });

    it('updates fields and validates the result', () => {
      const task = store.createTask('Draft');
      const updated = store.updateTask(task.id, { name: 'Final', color: 'red' });
      expect(updated.name).toBe('Final');
      expect(updated.color).toBe('red');
      expect(() => store.updateTask(task.id, { name: '' })).toThrow(ValidationError);
      expect(store.getTask(task.id)?.name).toBe('Final');
    });

    it('throws for an unknown task', () => {
      expect(() => store.updateTask(42, { name: 'x' })).toThrow(RecordNotFoundError);
      expect(() => store.completeTask(42)).toThrow('No task with id 42');
    });

    it('completes and reopens a task', () => {
      const task = store.createTask('Toggle');
      expect(store.completeTask(task.id).completedAt).toBe(CREATED.toISOString());
      expect(store.completeTask(task.id, false).completedAt).toBeNull();
    });

    it('increments the pomodoro count', () => {
      const task = store.createTask('Count');
      expect(store.incrementPomodoroCount(task.id)).toBe(true);
      store.incrementPomodoroCount(task.id);
      expect(store.getTask(task.id)?.pomodoroCount).toBe(2);
      expect(store.incrementPomodoroCount(99)).toBe(false);
    });

    it('deleting a task keeps its sessions with a null task id', () => {
      const task = store.createTask('Doomed');
      const other = store.createTask('Survivor');
      store.createSession(workDraft('2025-02-20T10:00:00.000Z', task.id));
      store.createSession(workDraft('2025-02-20T11:00:00.000Z', other.id));

      expect(store.deleteTask(task.id)).toBe(true);
      expect(store.getTask(task.id)).toBeUndefined();
      expect(store.listSessions().map(s => s.taskId)).toEqual([null, other.id]);
      expect(store.deleteTask(task.id)).toBe(false);
    });
  });

  describe('sessions', () => {
    it('assigns ids in order', () => {
      const first = store.createSession(workDraft('2025-02-20T10:00:00.000Z'));
      const second = store.createSession(workDraft('2025-02-20T10:30:00.000Z'));
      expect([first.id, second.id]).toEqual([1, 2]);
      expect(store.getSession(2)).toEqual(second);
    });

    it('rejects a malformed draft', () => {
      expect(() => store.createSession({ ...workDraft('2025-02-20T10:00:00.000Z'), duration: -5 })).toThrow(ValidationError);
      expect(store.listSessions()).toEqual([]);
    });

    it('updates only the given fields', () => {
      const session = store.createSession(workDraft('2025-02-20T10:00:00.000Z'));
      const updated = store.updateSession(session.id, {
        endTime: '2025-02-20T10:25:00.000Z',
        duration: 1500,
        completed: true,
      });
      expect(updated).toEqual({
        ...session,
        endTime: '2025-02-20T10:25:00.000Z',
        duration: 1500,
        completed: true,
      });
      expect(store.getSession(session.id)).toEqual(updated);
    });

    it('throws when updating an unknown session', () => {
      expect(() => store.updateSession(7, { completed: true })).toThrow(RecordNotFoundError);
    });

    it('lists oldest first, filtered by task or by a half-open range', () => {
      const task = store.createTask('Filter');
      store.createSession(workDraft('2025-02-20T12:00:00.000Z', task.id));
      store.createSession(workDraft('2025-02-20T09:00:00.000Z'));
      store.createSession(workDraft('2025-02-21T00:00:00.000Z', task.id));

      expect(store.listSessions().map(s => s.id)).toEqual([2, 1, 3]);
      expect(store.listSessions({ kind: 'task', taskId: task.id }).map(s => s.id)).toEqual([1, 3]);
      expect(store.listSessions({
        kind: 'range',
        from: new Date('2025-02-20T00:00:00.000Z'),
        to: new Date('2025-02-21T00:00:00.000Z'),
      }).map(s => s.id)).toEqual([2, 1]);
    });
  });

  describe('settings', () => {
    it('does not report inherited object members as settings', () => {
      expect(store.getSetting('toString')).toBeUndefined();
      expect(store.getSetting('__proto__')).toBeUndefined();
    });

    it('overwrites an existing key', () => {
      store.setSetting('theme', 'light');
      store.setSetting('theme', 'dark');
      expect(store.getSetting('theme')).toBe('dark');
      expect(JSON.parse(storage.getItem(STORAGE_KEYS.settings) ?? '{}')).toEqual({ theme: 'dark' });
    });
  });

  describe('write failures', () => {
    it('surface as StoreUnavailableError and leave memory unchanged', () => {
      store.createTask('Before');
      vi.spyOn(storage, 'setItem').mockImplementation(() => {
        throw new Error('ENOSPC');
      });
      expect(() => store.setSetting('theme', 'dark')).toThrow(StoreUnavailableError);
      expect(() => store.incrementPomodoroCount(1)).toThrow('Could not write tickwork-tasks');
      expect(store.getSetting('theme')).toBeUndefined();
      expect(store.getTask(1)?.pomodoroCount).toBe(0);
    });
  });
});
