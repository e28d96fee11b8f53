export const STORAGE_KEYS = {
  meta: 'tickwork-meta',
  tasks: 'tickwork-tasks',
  sessions: 'tickwork-sessions',
  settings: 'tickwork-settings',
} as const;

export const SCHEMA_VERSION = 1;
