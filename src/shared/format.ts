import { SessionType } from './types';

export function formatClock(seconds: number): string {
  const safe = Math.max(0, Math.floor(seconds));
  const mins = Math.floor(safe / 60);
  const sec = safe % 60;
  const hours = Math.floor(mins / 60);
  const minOnly = mins % 60;
  if (hours > 0) {
    return `${String(hours).padStart(2, '0')}:${String(minOnly).padStart(2, '0')}:${String(sec).padStart(2, '0')}`;
  }
  return `${String(minOnly).padStart(2, '0')}:${String(sec).padStart(2, '0')}`;
}

export function formatMinutes(totalMinutes: number): string {
  const mins = Math.max(0, Math.floor(totalMinutes));
  if (mins < 60) return `${mins}m`;
  const hours = Math.floor(mins / 60);
  const rem = mins % 60;
  return rem ? `${hours}h ${rem}m` : `${hours}h`;
}

export function sessionLabel(type: SessionType): string {
  switch (type) {
    case 'work': return 'Work';
    case 'short_break': return 'Short Break';
    case 'long_break': return 'Long Break';
  }
}
