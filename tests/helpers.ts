import type { Server } from 'node:http';
import { parseConfig } from '../src/config.js';
import type { Subscription } from '../src/bus.js';
import type { AppConfig, BusEvent } from '../src/types.js';

export const JPEG = Buffer.from([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46, 0x49, 0x46, 0x00, 0xff, 0xd9]);
export const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);

interface Overrides {
  timezone?: string;
  camera?: Record<string, unknown>;
  schedule?: Record<string, unknown>;
  astral?: Record<string, unknown>;
  storage?: Record<string, unknown>;
  health?: Record<string, unknown>;
  events?: Record<string, unknown>;
}

// Monday 08:00-18:00 UTC, astral off, unless overridden
export function testConfig(overrides: Overrides = {}): AppConfig {
  return parseConfig({
    timezone: overrides.timezone ?? 'UTC',
    camera: { snapshot_url: 'http://127.0.0.1:9/snap.jpg', timeout_seconds: 2, ...overrides.camera },
    schedule: {
      interval_seconds: 5,
      active_start: '08:00',
      active_end: '18:00',
      active_days: ['Mon'],
      status_heartbeat_seconds: 0,
      ...overrides.schedule,
    },
    astral: { enabled: false, ...overrides.astral },
    storage: { save_path: './pictures', ...overrides.storage },
    health: overrides.health,
    events: overrides.events,
  });
}

export function portOf(server: Server): number {
  const addr = server.address();
  if (addr && typeof addr === 'object') return addr.port;
  throw new Error('server is not listening on a TCP port');
}

export async function drain(sub: Subscription): Promise<BusEvent[]> {
  const out: BusEvent[] = [];
  while (sub.pending > 0) {
    const ev = await sub.next();
    if (ev) out.push(ev);
  }
  return out;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
