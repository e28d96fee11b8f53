import { exportStats } from '../export/exporter';
import { parseInput, taskColorSchema } from '../shared/config';
import { RecordNotFoundError, ValidationError } from '../shared/errors';
import { StatisticsAggregator } from '../stats/StatisticsAggregator';
import {
  configFieldForKey,
  isSoundEnabled,
  loadTimerConfig,
  saveTimerConfig,
  SETTING_KEYS,
  setSoundEnabled,
} from '../store/preferences';
import { TimerConfig } from '../shared/types';
import { Store } from '../store/Store';
import { renderDay, renderPeriod, renderTask, renderTopTasks } from './TerminalView';

export interface CommandContext {
  store: Store;
  log: (line: string) => void;
  now?: () => Date;
  exportDir?: string;
}

export const USAGE = [
  'Usage: tickwork [command]',
  '',
  '  start [--task <id>]         run the timer (default)',
  '  add <name> [description] [--color <color>]',
  '  tasks [--all]               list open tasks, or all with --all',
  '  done <id> | undone <id>     mark a task completed or open again',
  '  delete <id>                 delete a task; its sessions are kept',
  '  stats                       today, last 7 and 30 days, top tasks',
  '  export csv|json             write a snapshot to the export directory',
  '  config [<key> <value>]      show or change a setting',
];

export function parseId(raw: string | undefined): number {
  const id = Number(raw);
  if (raw === undefined || !Number.isInteger(id) || id <= 0) {
    throw new ValidationError(`Expected a task id, got "${raw ?? ''}"`);
  }
  return id;
}

/** Splits `--name value` options from positional arguments. */
export function splitArgs(args: string[]): { positional: string[]; flags: Map<string, string | true> } {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const next = args[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      flags.set(arg.slice(2), next);
      i++;
    } else {
      flags.set(arg.slice(2), true);
    }
  }
  return { positional, flags };
}

/** Runs a non-interactive command. Returns the process exit code. */
export function runCommand(argv: string[], ctx: CommandContext): number {
  const [command, ...rest] = argv;
  const { positional, flags } = splitArgs(rest);
  const { store, log } = ctx;
  const now = ctx.now ?? (() => new Date());

  switch (command) {
    case 'add': {
      const [name = '', description = ''] = positional;
      const rawColor = flags.get('color');
      const color = parseInput(taskColorSchema.default('blue'), rawColor === true ? undefined : rawColor, 'color');
      const task = store.createTask(name, description, color);
      log(`Created task #${task.id} ${task.name}`);
      return 0;
    }
    case 'tasks': {
      const tasks = store.listTasks({ includeCompleted: flags.has('all') });
      if (tasks.length === 0) log('No tasks.');
      tasks.forEach(task => log(renderTask(task)));
      return 0;
    }
    case 'done':
    case 'undone': {
      const task = store.completeTask(parseId(positional[0]), command === 'done');
      log(renderTask(task));
      return 0;
    }
    case 'delete': {
      const id = parseId(positional[0]);
      if (!store.deleteTask(id)) throw new RecordNotFoundError('tasks', id);
      log(`Deleted task #${id}`);
      return 0;
    }
    case 'stats': {
      const stats = StatisticsAggregator.fromStore(store, now());
      log(`Today: ${renderDay(stats.today())}`);
      renderPeriod('Last 7 days', stats.weekly()).forEach(log);
      stats.weekly().days.forEach(day => log(`  ${renderDay(day)}`));
      renderPeriod('Last 30 days', stats.monthly()).forEach(log);
      log('Top tasks:');
      renderTopTasks(stats.topTasks()).forEach(line => log(`  ${line}`));
      return 0;
    }
    case 'export': {
      const format = positional[0];
      if (format !== 'csv' && format !== 'json') {
        log('Export format must be csv or json');
        return 1;
      }
      const file = exportStats(store, format, { dir: ctx.exportDir, now: now() });
      log(`Exported to ${file}`);
      return 0;
    }
    case 'config':
      return configCommand(positional, ctx);
    default:
      USAGE.forEach(line => log(line));
      return command === undefined || command === 'help' ? 0 : 1;
  }
}

function configCommand([key, value]: string[], { store, log }: CommandContext): number {
  if (key === undefined) {
    const config = loadTimerConfig(store);
    log(`${SETTING_KEYS.workMinutes} = ${config.workMinutes}`);
    log(`${SETTING_KEYS.shortBreakMinutes} = ${config.shortBreakMinutes}`);
    log(`${SETTING_KEYS.longBreakMinutes} = ${config.longBreakMinutes}`);
    log(`${SETTING_KEYS.longBreakInterval} = ${config.longBreakInterval}`);
    log(`${SETTING_KEYS.soundEnabled} = ${isSoundEnabled(store)}`);
    return 0;
  }
  if (value === undefined) {
    log(`Missing value for ${key}`);
    return 1;
  }
  if (key === SETTING_KEYS.soundEnabled) {
    if (value !== 'true' && value !== 'false') throw new ValidationError(`${key} must be true or false`);
    setSoundEnabled(store, value === 'true');
    log(`${key} = ${value}`);
    return 0;
  }
  const field = configFieldForKey(key);
  if (!field) {
    log(`Unknown setting ${key}`);
    return 1;
  }
  const changes: Partial<Record<keyof TimerConfig, number>> = {};
  changes[field] = Number(value);
  const config = saveTimerConfig(store, changes, loadTimerConfig(store));
  log(`${key} = ${config[field]}`);
  return 0;
}
