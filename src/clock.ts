import type { Weekday } from './types.js';

export interface ZonedTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: Weekday;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat('en-US', {
      timeZone,
      hourCycle: 'h23',
      weekday: 'short',
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

function isWeekday(value: string): value is Weekday {
  return ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'].includes(value);
}

// Wall-clock reading of `date` in the given IANA timezone
export function zonedTime(date: Date, timeZone: string): ZonedTime {
  const parts: Record<string, string> = {};
  for (const p of formatterFor(timeZone).formatToParts(date)) {
    parts[p.type] = p.value;
  }
  const weekday = parts.weekday ?? '';
  if (!isWeekday(weekday)) {
    throw new Error(`Unexpected weekday "${weekday}" for ${timeZone}`);
  }
  const num = (key: string) => parseInt(parts[key] ?? '0', 10);
  return {
    year: num('year'),
    month: num('month'),
    day: num('day'),
    hour: num('hour'),
    minute: num('minute'),
    second: num('second'),
    weekday,
  };
}

// "HH:MM" -> minutes since midnight
export function parseClock(value: string): number {
  const [h, m] = value.split(':');
  return parseInt(h ?? '0', 10) * 60 + parseInt(m ?? '0', 10);
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export function secondsOfDay(t: ZonedTime): number {
  return t.hour * 3600 + t.minute * 60 + t.second;
}

export function dayKey(t: ZonedTime): string {
  return `${t.year}-${pad(t.month)}-${pad(t.day)}`;
}

export function formatHM(t: ZonedTime): string {
  return `${pad(t.hour)}:${pad(t.minute)}`;
}

export function formatHMS(t: ZonedTime): string {
  return `${pad(t.hour)}:${pad(t.minute)}:${pad(t.second)}`;
}

// "19.10.26 14:05", the dashboard tooltip format
export function formatShort(t: ZonedTime): string {
  return `${pad(t.day)}.${pad(t.month)}.${pad(t.year % 100)} ${formatHM(t)}`;
}

// "20261019_140503", used in archive file names
export function formatCompact(t: ZonedTime): string {
  return `${t.year}${pad(t.month)}${pad(t.day)}_${pad(t.hour)}${pad(t.minute)}${pad(t.second)}`;
}
