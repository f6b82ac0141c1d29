import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { SnapshotFetcher } from '../src/camera.js';
import { CameraError, ConfigError } from '../src/errors.js';
import { recentLogs, setLogLevel } from '../src/logger.js';
import { Scheduler } from '../src/scheduler.js';
import type { AppConfig, CapturedImage } from '../src/types.js';
import { JPEG, deferred, drain, testConfig } from './helpers.js';

const IMAGE: CapturedImage = { data: JPEG, contentType: 'image/jpeg', extension: 'jpg' };

// Monday inside the 08:00-18:00 window, and a Sunday outside it
const MONDAY_9 = new Date('2026-10-19T09:00:00Z');
const SUNDAY_9 = new Date('2026-10-18T09:00:00Z');

describe('Scheduler', () => {
  let dir: string;
  let clock: Date;
  let config: AppConfig;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snapwatch-scheduler-'));
    clock = MONDAY_9;
    config = testConfig({ storage: { save_path: dir } });
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function make(fetcher: SnapshotFetcher, cfg: AppConfig = config) {
    const fetch = vi.fn(fetcher);
    const scheduler = new Scheduler(cfg, { fetcher: fetch, now: () => clock });
    const sub = scheduler.bus.subscribe();
    return { scheduler, fetch, sub };
  }

  const ok: SnapshotFetcher = async () => IMAGE;
  const timeout: SnapshotFetcher = async () => {
    throw new CameraError('timeout', 'Timeout fetching snapshot');
  };

  it('starts out waiting for the window', () => {
    const { scheduler } = make(ok);
    expect(scheduler.state).toBe('waiting_window');
    expect(scheduler.generation).toBe(1);
  });

  it('captures inside the window and publishes the result', async () => {
    const { scheduler, fetch, sub } = make(ok);
    await scheduler.tick();

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(scheduler.state).toBe('running');
    expect(await drain(sub)).toEqual([
      { type: 'status', status: 'running' },
      {
        type: 'snapshot',
        filename: 'snapshot_20261019_090000.jpg',
        timestamp: '09:00:00',
        timestamp_full: '19.10.26 09:00',
      },
    ]);
    expect(fs.existsSync(path.join(dir, 'latest.jpg'))).toBe(true);
  });

  it('does nothing outside the window', async () => {
    clock = SUNDAY_9;
    const { scheduler, fetch, sub } = make(ok);
    await scheduler.tick();

    expect(fetch).not.toHaveBeenCalled();
    expect(scheduler.state).toBe('waiting_window');
    expect(await drain(sub)).toEqual([]);
  });

  it('announces leaving the window only once', async () => {
    const { scheduler, sub } = make(ok);
    await scheduler.tick();
    await drain(sub);

    clock = new Date('2026-10-19T18:00:01Z');
    await scheduler.tick();
    await scheduler.tick();
    expect(await drain(sub)).toEqual([{ type: 'status', status: 'waiting_window' }]);
  });

  it('skips captures while paused', async () => {
    const { scheduler, fetch, sub } = make(ok);
    scheduler.pause();
    await scheduler.tick();

    expect(fetch).not.toHaveBeenCalled();
    expect(scheduler.state).toBe('paused');
    expect(await drain(sub)).toEqual([{ type: 'status', status: 'paused' }]);
  });

  it('starts paused when the configuration says so', async () => {
    const { scheduler, fetch } = make(ok, testConfig({ storage: { save_path: dir }, schedule: { paused: true } }));
    expect(scheduler.isPaused).toBe(true);
    await scheduler.tick();
    expect(fetch).not.toHaveBeenCalled();
    expect(scheduler.state).toBe('paused');
  });

  it('treats pause and resume as idempotent', async () => {
    const { scheduler, sub } = make(ok);

    expect(scheduler.pause()).toBe('paused');
    expect(scheduler.pause()).toBe('paused');
    expect(scheduler.isPaused).toBe(true);
    expect(await drain(sub)).toEqual([{ type: 'status', status: 'paused' }]);

    expect(scheduler.resume()).toBe('running');
    expect(scheduler.resume()).toBe('running');
    expect(scheduler.isPaused).toBe(false);
    expect(await drain(sub)).toEqual([{ type: 'status', status: 'running' }]);
  });

  it('resumes into waiting_window outside the window', async () => {
    clock = SUNDAY_9;
    const { scheduler, sub } = make(ok);
    scheduler.pause();
    expect(scheduler.resume()).toBe('waiting_window');
    expect(await drain(sub)).toEqual([
      { type: 'status', status: 'paused' },
      { type: 'status', status: 'waiting_window' },
    ]);
  });

  it('takes a forced snapshot while paused without resuming', async () => {
    const { scheduler, fetch, sub } = make(ok);
    scheduler.pause();
    await drain(sub);

    const stored = await scheduler.forceSnapshot();

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(stored.filename).toBe('snapshot_20261019_090000.jpg');
    expect(scheduler.isPaused).toBe(true);
    expect(scheduler.state).toBe('paused');
    expect(await drain(sub)).toEqual([{
      type: 'snapshot',
      filename: 'snapshot_20261019_090000.jpg',
      timestamp: '09:00:00',
      timestamp_full: '19.10.26 09:00',
    }]);
  });

  it('rejects a failed forced snapshot with the classified error', async () => {
    const { scheduler, sub } = make(timeout);
    await expect(scheduler.forceSnapshot()).rejects.toMatchObject({ code: 'timeout' });
    expect(await drain(sub)).toEqual([
      { type: 'camera_error', code: 'timeout', message: 'Timeout fetching snapshot' },
      { type: 'camera_health', status: 'degraded' },
    ]);
  });

  it('walks health to error after three timeouts and back to ok on one success', async () => {
    let fetcher = timeout;
    const { scheduler, sub } = make(async (camera) => fetcher(camera));
    const error = { type: 'camera_error', code: 'timeout', message: 'Timeout fetching snapshot' };

    await scheduler.tick();
    expect(await drain(sub)).toEqual([
      { type: 'status', status: 'running' },
      error,
      { type: 'camera_health', status: 'degraded' },
    ]);
    await scheduler.tick();
    expect(await drain(sub)).toEqual([error]);
    await scheduler.tick();
    expect(await drain(sub)).toEqual([error, { type: 'camera_health', status: 'error' }]);

    let report = await scheduler.status();
    expect(report.camera_health).toEqual({ status: 'error', consecutive_failures: 3, last_failure: 'timeout' });
    expect(report.camera_error).toEqual({ code: 'timeout', message: 'Timeout fetching snapshot' });
    // Failures never pause the schedule
    expect(report.paused).toBe(false);

    fetcher = ok;
    await scheduler.tick();
    const events = await drain(sub);
    expect(events.map((e) => e.type)).toEqual(['snapshot', 'camera_health']);
    expect(events[1]).toEqual({ type: 'camera_health', status: 'ok' });

    report = await scheduler.status();
    expect(report.camera_health).toEqual({ status: 'ok', consecutive_failures: 0, last_failure: 'timeout' });
    expect(report.camera_error).toBeNull();
  });

  it('reports storage failures as storage_failed captures', async () => {
    const broken = testConfig({ storage: { save_path: path.join(dir, 'missing', 'deeper') } });
    const { scheduler, sub } = make(ok, broken);
    await scheduler.tick();

    const events = await drain(sub);
    expect(events[1]).toMatchObject({ type: 'camera_error', code: 'storage_failed' });
    expect((await scheduler.status()).camera_health.last_failure).toBe('storage_failed');
  });

  it('publishes tick events only after the capture completes', async () => {
    const gate = deferred<CapturedImage>();
    const { scheduler, sub } = make(() => gate.promise);

    const tick = scheduler.tick();
    await new Promise((r) => setTimeout(r, 10));
    expect(sub.pending).toBe(0);

    gate.resolve(IMAGE);
    await tick;
    expect((await drain(sub)).map((e) => e.type)).toEqual(['status', 'snapshot']);
  });

  it('runs at most one capture at a time', async () => {
    let active = 0;
    let peak = 0;
    const gates = [deferred<CapturedImage>(), deferred<CapturedImage>()];
    let call = 0;
    const { scheduler, fetch } = make(async () => {
      const gate = gates[call++];
      active += 1;
      peak = Math.max(peak, active);
      try {
        return await (gate ? gate.promise : Promise.resolve(IMAGE));
      } finally {
        active -= 1;
      }
    });

    const first = scheduler.forceSnapshot();
    // A regular tick during a capture is skipped rather than stacked
    await scheduler.tick();
    const second = scheduler.forceSnapshot();
    await new Promise((r) => setTimeout(r, 10));
    expect(fetch).toHaveBeenCalledTimes(1);

    gates[0]?.resolve(IMAGE);
    await first;
    await new Promise((r) => setTimeout(r, 10));
    expect(fetch).toHaveBeenCalledTimes(2);
    gates[1]?.resolve(IMAGE);
    await second;

    expect(peak).toBe(1);
    expect(await scheduler.status()).toMatchObject({ count: 2 });
  });

  it('does not apply a pause that lands mid-capture as a running status', async () => {
    const gate = deferred<CapturedImage>();
    const { scheduler, sub } = make(() => gate.promise);

    const tick = scheduler.tick();
    scheduler.pause();
    gate.resolve(IMAGE);
    await tick;

    expect((await drain(sub)).map((e) => e.type === 'status' ? e.status : e.type)).toEqual(['paused', 'snapshot']);
    expect(scheduler.state).toBe('paused');
  });

  describe('reloadConfig', () => {
    it('rejects an invalid time range and keeps the running generation', async () => {
      const { scheduler, sub } = make(ok);
      const before = scheduler.config;

      await expect(scheduler.reloadConfig({
        schedule: { active_start: '18:00', active_end: '08:00' },
      })).rejects.toBeInstanceOf(ConfigError);

      expect(scheduler.generation).toBe(1);
      expect(scheduler.config).toBe(before);
      expect(await drain(sub)).toEqual([]);
    });

    it('swaps the configuration, bumps the generation and re-evaluates the window', async () => {
      const { scheduler, sub } = make(ok);
      await scheduler.tick();
      await drain(sub);

      const generation = await scheduler.reloadConfig({
        timezone: 'UTC',
        camera: { snapshot_url: 'http://127.0.0.1:9/other.jpg', timeout_seconds: 2 },
        schedule: { active_days: ['Sun'], status_heartbeat_seconds: 0 },
        storage: { save_path: dir },
      });

      expect(generation).toBe(2);
      expect(scheduler.generation).toBe(2);
      expect(scheduler.config.camera.snapshot_url).toBe('http://127.0.0.1:9/other.jpg');
      expect(scheduler.state).toBe('waiting_window');
      expect(await drain(sub)).toEqual([
        { type: 'status', status: 'config_reloaded' },
        { type: 'status', status: 'waiting_window' },
      ]);
    });

    it('keeps the pause flag across a reload', async () => {
      const { scheduler } = make(ok);
      scheduler.pause();
      await scheduler.reloadConfig({ timezone: 'UTC', storage: { save_path: dir } });
      expect(scheduler.isPaused).toBe(true);
      expect(scheduler.state).toBe('paused');
    });

    it('applies the configured log level', async () => {
      const { scheduler } = make(ok);
      vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      try {
        await scheduler.reloadConfig({ timezone: 'UTC', log_level: 'info', storage: { save_path: dir } });
        expect(recentLogs(10)).toContainEqual(expect.stringMatching(/\[INFO\] \[scheduler\] Configuration reloaded \(generation 2\)$/));
      } finally {
        setLogLevel('silent');
        vi.restoreAllMocks();
      }
    });

    it('moves storage to a new directory', async () => {
      const { scheduler } = make(ok);
      const next = path.join(dir, 'elsewhere');
      await scheduler.reloadConfig({
        timezone: 'UTC',
        schedule: { active_days: ['Mon'], active_start: '08:00', active_end: '18:00' },
        storage: { save_path: next },
      });
      expect(scheduler.latestPath).toBe(path.join(next, 'latest.jpg'));
      await scheduler.forceSnapshot();
      expect(fs.existsSync(path.join(next, 'latest.jpg'))).toBe(true);
    });
  });

  describe('status', () => {
    it('reports counts, last snapshot and window state', async () => {
      const { scheduler } = make(ok);
      await scheduler.tick();

      expect(await scheduler.status()).toEqual({
        time: '09:00:00',
        active: true,
        paused: false,
        state: 'running',
        generation: 1,
        sunrise: null,
        sunset: null,
        count: 1,
        last_snapshot: '09:00:00',
        last_snapshot_tooltip: '19.10.26 09:00',
        camera_error: null,
        camera_health: { status: 'ok', consecutive_failures: 0, last_failure: null },
      });
    });

    it('includes sunrise and sunset when astral gating is on', async () => {
      const astral = testConfig({ storage: { save_path: dir }, astral: { enabled: true } });
      const scheduler = new Scheduler(astral, {
        fetcher: ok,
        now: () => clock,
        createSun: () => () => ({
          sunrise: new Date('2026-10-19T06:12:00Z'),
          sunset: new Date('2026-10-19T16:48:00Z'),
        }),
      });
      const report = await scheduler.status();
      expect(report.sunrise).toBe('06:12');
      expect(report.sunset).toBe('16:48');
      expect(report.active).toBe(true);
    });
  });

  describe('timers', () => {
    it('ticks on the interval and a forced snapshot leaves the phase alone', async () => {
      vi.useFakeTimers();
      const { scheduler, fetch } = make(timeout);

      scheduler.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(fetch).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(5000);
      expect(fetch).toHaveBeenCalledTimes(2);

      await vi.advanceTimersByTimeAsync(2000);
      await expect(scheduler.forceSnapshot()).rejects.toBeInstanceOf(CameraError);
      expect(fetch).toHaveBeenCalledTimes(3);

      // Next regular tick is still due at t=10s
      await vi.advanceTimersByTimeAsync(2999);
      expect(fetch).toHaveBeenCalledTimes(3);
      await vi.advanceTimersByTimeAsync(1);
      expect(fetch).toHaveBeenCalledTimes(4);

      scheduler.stop();
      await vi.advanceTimersByTimeAsync(20000);
      expect(fetch).toHaveBeenCalledTimes(4);
    });

    it('sends a status heartbeat', async () => {
      vi.useFakeTimers();
      clock = SUNDAY_9;
      const cfg = testConfig({ storage: { save_path: dir }, schedule: { status_heartbeat_seconds: 10 } });
      const { scheduler, sub } = make(ok, cfg);

      scheduler.start();
      await vi.advanceTimersByTimeAsync(10000);
      scheduler.stop();

      expect(await drain(sub)).toEqual([{ type: 'status', status: 'waiting_window' }]);
    });
  });
});
