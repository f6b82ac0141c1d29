import { parseClock, secondsOfDay, zonedTime } from './clock.js';
import type { AppConfig, SunTimes } from './types.js';

/**
 * Whether a capture is permitted at `now`.
 *
 * The weekday and time of day are read in `config.timezone`. The range
 * [active_start, active_end] is inclusive at both ends. With astral gating on,
 * `now` must also fall between sunrise and sunset; a missing pair (polar day
 * or night) counts as outside the window. Pause is the caller's concern.
 */
export function isActive(
  now: Date,
  config: Pick<AppConfig, 'timezone' | 'schedule' | 'astral'>,
  sun?: SunTimes | null,
): boolean {
  const local = zonedTime(now, config.timezone);
  const { schedule, astral } = config;

  if (!schedule.active_days.includes(local.weekday)) return false;

  const t = secondsOfDay(local);
  const start = parseClock(schedule.active_start) * 60;
  const end = parseClock(schedule.active_end) * 60;
  if (t < start || t > end) return false;

  if (astral.enabled) {
    if (!sun) return false;
    const ms = now.getTime();
    if (ms < sun.sunrise.getTime() || ms > sun.sunset.getTime()) return false;
  }

  return true;
}
