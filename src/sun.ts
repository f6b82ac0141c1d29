import SunCalc from 'suncalc';
import { dayKey, zonedTime } from './clock.js';
import type { SunTimes } from './types.js';

export type SunResolver = (now: Date) => SunTimes | null;

function isValidDate(d: Date): boolean {
  return !Number.isNaN(d.getTime());
}

// Sunrise/sunset for the calendar day `now` falls on in `timeZone`, memoised
// per day. Returns null when the sun does not rise or set that day.
export function createSunResolver(latitude: number, longitude: number, timeZone: string): SunResolver {
  let cachedDay: string | null = null;
  let cached: SunTimes | null = null;

  return (now: Date) => {
    const local = zonedTime(now, timeZone);
    const key = dayKey(local);
    if (key === cachedDay) return cached;

    // suncalc answers for the solar noon nearest the instant it is given, so
    // ask at solar noon of the local calendar day rather than at `now`
    const noon = Date.UTC(local.year, local.month - 1, local.day, 12) - (longitude / 15) * 3_600_000;
    const { sunrise, sunset } = SunCalc.getTimes(new Date(noon), latitude, longitude);
    cached = isValidDate(sunrise) && isValidDate(sunset) ? { sunrise, sunset } : null;
    cachedDay = key;
    return cached;
  };
}

// Resolver used when astral gating is switched off
export const noSun: SunResolver = () => null;
