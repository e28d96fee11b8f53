import { z } from 'zod';
import { ValidationError } from './errors';
import { TaskColor, TimerConfig } from './types';

export const DEFAULT_TIMER_CONFIG: TimerConfig = Object.freeze({
  workMinutes: 25,
  shortBreakMinutes: 5,
  longBreakMinutes: 15,
  longBreakInterval: 4,
});

const minutes = (label: string) =>
  z.number({ invalid_type_error: `${label} must be a number` })
    .int(`${label} must be a whole number of minutes`)
    .min(1, `${label} must be at least 1 minute`);

export const timerConfigSchema = z.object({
  workMinutes: minutes('Work duration').default(DEFAULT_TIMER_CONFIG.workMinutes),
  shortBreakMinutes: minutes('Short break duration').default(DEFAULT_TIMER_CONFIG.shortBreakMinutes),
  longBreakMinutes: minutes('Long break duration').default(DEFAULT_TIMER_CONFIG.longBreakMinutes),
  longBreakInterval: z.number()
    .int('Long break interval must be a whole number')
    .min(1, 'Long break interval must be at least 1')
    .default(DEFAULT_TIMER_CONFIG.longBreakInterval),
});

export const TASK_COLORS = ['blue', 'green', 'red', 'yellow', 'purple', 'cyan'] as const satisfies readonly TaskColor[];

export const taskColorSchema = z.enum(TASK_COLORS);

export const taskInputSchema = z.object({
  name: z.string().trim().min(1, 'Task name must not be empty').max(200, 'Task name is too long'),
  description: z.string().trim().default(''),
  color: taskColorSchema.default('blue'),
});

export type TaskInput = z.input<typeof taskInputSchema>;

/** Parse with a schema, turning zod issues into a ValidationError. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => issue.message);
    throw new ValidationError(`Invalid ${what}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

export function createTimerConfig(input: Partial<TimerConfig> = {}): TimerConfig {
  return Object.freeze(parseInput(timerConfigSchema, input, 'timer configuration'));
}
