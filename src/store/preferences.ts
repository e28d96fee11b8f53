import { createTimerConfig, DEFAULT_TIMER_CONFIG } from '../shared/config';
import { ValidationError } from '../shared/errors';
import { TimerConfig } from '../shared/types';
import { Store } from './Store';

type SettingsReader = Pick<Store, 'getSetting'>;
type SettingsWriter = Pick<Store, 'setSetting'>;

export const SETTING_KEYS = {
  workMinutes: 'work_minutes',
  shortBreakMinutes: 'short_break_minutes',
  longBreakMinutes: 'long_break_minutes',
  longBreakInterval: 'long_break_interval',
  soundEnabled: 'sound_enabled',
} as const;

type ConfigField = keyof TimerConfig;

const CONFIG_FIELDS: ConfigField[] = ['workMinutes', 'shortBreakMinutes', 'longBreakMinutes', 'longBreakInterval'];

function parseNumberSetting(key: string, raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new ValidationError(`Setting ${key} must be a number, got "${raw}"`);
  }
  return value;
}

/** Stored durations over the defaults. Invalid stored values are rejected, not ignored. */
export function loadTimerConfig(store: SettingsReader): TimerConfig {
  const input: Partial<Record<ConfigField, number>> = {};
  for (const field of CONFIG_FIELDS) {
    const key = SETTING_KEYS[field];
    const raw = store.getSetting(key);
    if (raw !== undefined) input[field] = parseNumberSetting(key, raw);
  }
  return createTimerConfig(input);
}

export function saveTimerConfig(store: SettingsWriter, changes: Partial<TimerConfig>, base: TimerConfig = DEFAULT_TIMER_CONFIG): TimerConfig {
  const config = createTimerConfig({ ...base, ...changes });
  for (const field of CONFIG_FIELDS) {
    store.setSetting(SETTING_KEYS[field], String(config[field]));
  }
  return config;
}

/** Maps a setting key such as `work_minutes` back to its config field. */
export function configFieldForKey(key: string): ConfigField | undefined {
  return CONFIG_FIELDS.find(field => SETTING_KEYS[field] === key);
}

export function isSoundEnabled(store: SettingsReader): boolean {
  return store.getSetting(SETTING_KEYS.soundEnabled) !== 'false';
}

export function setSoundEnabled(store: SettingsWriter, enabled: boolean): void {
  store.setSetting(SETTING_KEYS.soundEnabled, enabled ? 'true' : 'false');
}
