export class TickworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Rejected user input or configuration. Nothing has been persisted. */
export class ValidationError extends TickworkError {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
  }
}

/** The storage backend failed to read or write, or holds data it cannot parse. */
export class StoreUnavailableError extends TickworkError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export class RecordNotFoundError extends TickworkError {
  constructor(readonly table: 'tasks' | 'sessions', readonly id: number) {
    super(`No ${table === 'tasks' ? 'task' : 'session'} with id ${id}`);
  }
}
