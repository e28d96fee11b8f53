export type SessionType = 'work' | 'short_break' | 'long_break';

export type ActiveStatus = 'working' | 'short_break' | 'long_break';

export type TimerStatus = 'idle' | ActiveStatus | 'paused';

export type CountdownStatus = 'idle' | 'running' | 'paused' | 'finished';

export type TaskColor = 'blue' | 'green' | 'red' | 'yellow' | 'purple' | 'cyan';

export interface TimerConfig {
  readonly workMinutes: number;
  readonly shortBreakMinutes: number;
  readonly longBreakMinutes: number;
  readonly longBreakInterval: number; // work sessions before a long break
}

export interface Task {
  id: number;
  name: string;
  description: string;
  createdAt: string; // ISO string
  completedAt: string | null;
  color: TaskColor;
  pomodoroCount: number;
}

export interface Session {
  id: number;
  taskId: number | null;
  startTime: string; // ISO string
  endTime: string | null;
  duration: number; // seconds
  completed: boolean;
  sessionType: SessionType;
}

export type NewSession = Omit<Session, 'id'>;

export type SessionUpdate = Partial<Pick<Session, 'endTime' | 'duration' | 'completed' | 'taskId'>>;

export type TaskUpdate = Partial<Pick<Task, 'name' | 'description' | 'color' | 'completedAt'>>;

export type SessionFilter =
  | { kind: 'range'; from: Date; to: Date }
  | { kind: 'task'; taskId: number };

export interface CountdownSnapshot {
  status: CountdownStatus;
  totalSeconds: number;
  remainingSeconds: number;
  progress: number; // 0..1, fraction elapsed
}

export interface TimerSnapshot {
  state: TimerStatus;
  pausedFrom: ActiveStatus | null;
  sessionType: SessionType | null;
  totalSeconds: number;
  remainingSeconds: number;
  progress: number;
  completedPomodoros: number;
  taskId: number | null;
}

export interface StateChange {
  from: TimerStatus;
  to: TimerStatus;
}

export interface TickUpdate {
  remainingSeconds: number;
  progress: number;
}

export interface SessionCompletion {
  sessionType: SessionType;
  session: Session;
}

export interface DailyStats {
  date: string; // YYYY-MM-DD, local
  workSessions: number;
  focusedSeconds: number;
  focusedMinutes: number;
  breakSessions: number;
  abandonedSessions: number;
  tasksWorkedOn: number;
}

export interface TaskStats {
  task: Task;
  sessions: number;
  focusedSeconds: number;
  firstSession: string;
  lastSession: string;
}

export interface PeriodStats {
  startDate: string;
  endDate: string;
  days: DailyStats[];
  workSessions: number;
  focusedMinutes: number;
  breakSessions: number;
  averageWorkSessionsPerDay: number;
  mostProductiveDay: DailyStats | null;
  taskStats: TaskStats[];
}

export interface TaskCount {
  task: Task;
  count: number;
}
