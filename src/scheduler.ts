import { fetchSnapshot, type SnapshotFetcher } from './camera.js';
import { formatHM, formatHMS, formatShort, zonedTime } from './clock.js';
import { configWarnings, parseConfig } from './config.js';
import { EventBus } from './bus.js';
import { CameraError, ConfigError, StorageError, errorMessage } from './errors.js';
import { HealthTracker, type HealthTransition } from './health.js';
import { createLogger, setLogLevel } from './logger.js';
import { SnapshotStore } from './store.js';
import { createSunResolver, noSun, type SunResolver } from './sun.js';
import { isActive } from './window.js';
import type {
  AppConfig,
  BusEvent,
  CameraErrorCode,
  SchedulerState,
  StatusReport,
  StoredSnapshot,
} from './types.js';

const log = createLogger('scheduler');

export interface SchedulerDeps {
  bus?: EventBus;
  fetcher?: SnapshotFetcher;
  now?: () => Date;
  createStore?: (cfg: AppConfig) => SnapshotStore;
  createSun?: (cfg: AppConfig) => SunResolver;
}

type CaptureOutcome =
  | { ok: true; stored: StoredSnapshot; events: BusEvent[] }
  | { ok: false; error: CameraError; events: BusEvent[] };

function defaultStore(cfg: AppConfig): SnapshotStore {
  return new SnapshotStore(cfg.storage.save_path, {
    archive: cfg.storage.archive,
    maxArchived: cfg.storage.max_archived,
    timeZone: cfg.timezone,
  });
}

function defaultSun(cfg: AppConfig): SunResolver {
  return cfg.astral.enabled
    ? createSunResolver(cfg.astral.latitude, cfg.astral.longitude, cfg.timezone)
    : noSun;
}

function toCameraError(err: unknown): CameraError {
  if (err instanceof CameraError) return err;
  if (err instanceof StorageError) return new CameraError('storage_failed', err.message);
  return new CameraError('unreachable', errorMessage(err));
}

/**
 * Owns the capture loop and everything it mutates: configuration generation,
 * pause flag, loop state, health and the last camera error.
 *
 * Control calls only touch that state synchronously, so they never wait
 * behind a capture. Captures themselves go through a single promise chain:
 * at most one is in flight at any time.
 */
export class Scheduler {
  readonly bus: EventBus;

  private cfg: AppConfig;
  private gen = 1;
  private paused: boolean;
  private current: SchedulerState = 'waiting_window';
  private store: SnapshotStore;
  private sun: SunResolver;
  private readonly health: HealthTracker;
  private cameraError: { code: CameraErrorCode; message: string } | null = null;

  private captureChain: Promise<unknown> = Promise.resolve();
  private inFlight = 0;
  private tickTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;

  private readonly fetcher: SnapshotFetcher;
  private readonly now: () => Date;
  private readonly createStore: (cfg: AppConfig) => SnapshotStore;
  private readonly createSun: (cfg: AppConfig) => SunResolver;

  constructor(config: AppConfig, deps: SchedulerDeps = {}) {
    this.cfg = config;
    this.fetcher = deps.fetcher ?? fetchSnapshot;
    this.now = deps.now ?? (() => new Date());
    this.createStore = deps.createStore ?? defaultStore;
    this.createSun = deps.createSun ?? defaultSun;
    this.bus = deps.bus ?? new EventBus(config.events.max_queue);

    this.paused = config.schedule.paused;
    this.store = this.createStore(config);
    this.sun = this.createSun(config);
    this.health = new HealthTracker(config.health.failure_threshold);

    for (const warning of configWarnings(config)) log.warn(warning);
  }

  get config(): AppConfig {
    return this.cfg;
  }

  get generation(): number {
    return this.gen;
  }

  get state(): SchedulerState {
    return this.current;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get latestPath(): string {
    return this.store.latestPath;
  }

  get latestContentType(): string {
    return this.store.latestContentType;
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────────

  start(): void {
    this.stop();
    this.scheduleTimers();
    // First evaluation right away, then on the interval
    this.runTick();
    log.info(`Scheduler started (interval: ${this.cfg.schedule.interval_seconds}s, generation ${this.gen})`);
  }

  stop(): void {
    const wasRunning = this.tickTimer !== null;
    if (this.tickTimer) clearInterval(this.tickTimer);
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.tickTimer = null;
    this.heartbeatTimer = null;
    if (wasRunning) log.info('Scheduler stopped');
  }

  private scheduleTimers(): void {
    this.tickTimer = setInterval(() => this.runTick(), this.cfg.schedule.interval_seconds * 1000);
    const heartbeat = this.cfg.schedule.status_heartbeat_seconds;
    if (heartbeat > 0) {
      this.heartbeatTimer = setInterval(() => this.publishStatus(this.current), heartbeat * 1000);
    }
  }

  private runTick(): void {
    this.tick().catch((err: unknown) => {
      log.error(`Tick failed: ${errorMessage(err)}`);
    });
  }

  // ── Loop ───────────────────────────────────────────────────────────────────

  /**
   * One iteration of the loop. Status changes and capture results are
   * published only once the capture, store and health updates are done.
   */
  async tick(): Promise<void> {
    const next = this.evaluate();
    const changed = this.setState(next);

    if (next !== 'running') {
      if (changed) this.publishStatus(next);
      if (next === 'paused') log.debug('Scheduler paused - no snapshot');
      else log.debug('Outside active window - skipped');
      return;
    }

    if (this.inFlight > 0) {
      if (changed) this.publishStatus(next);
      log.warn('Previous capture still in progress, skipping tick');
      return;
    }

    const outcome = await this.capture();
    // A pause or reload may have landed while the camera was answering
    if (changed && this.current === 'running') this.publishStatus('running');
    this.publishAll(outcome.events);
  }

  private evaluate(): SchedulerState {
    if (this.paused) return 'paused';
    return this.isWindowOpen(this.now()) ? 'running' : 'waiting_window';
  }

  private isWindowOpen(now: Date): boolean {
    const sun = this.cfg.astral.enabled ? this.sun(now) : null;
    return isActive(now, this.cfg, sun);
  }

  private setState(next: SchedulerState): boolean {
    if (next === this.current) return false;
    log.info(`State ${this.current} -> ${next}`);
    this.current = next;
    return true;
  }

  // ── Captures ───────────────────────────────────────────────────────────────

  private capture(): Promise<CaptureOutcome> {
    this.inFlight += 1;
    const run = this.captureChain.then(() => this.captureOnce());
    this.captureChain = run;
    return run.finally(() => {
      this.inFlight -= 1;
    });
  }

  // Never rejects: every failure becomes a CameraError outcome
  private async captureOnce(): Promise<CaptureOutcome> {
    const cfg = this.cfg;
    const store = this.store;
    const timestamp = this.now();

    try {
      const image = await this.fetcher(cfg.camera);
      const stored = await store.save(image, timestamp);
      const transition = this.health.recordSuccess();
      this.cameraError = null;

      const local = zonedTime(stored.timestamp, cfg.timezone);
      log.info(`Snapshot saved: ${stored.filename} (${image.data.length} bytes)`);
      const events: BusEvent[] = [{
        type: 'snapshot',
        filename: stored.filename,
        timestamp: formatHMS(local),
        timestamp_full: formatShort(local),
      }];
      return { ok: true, stored, events: events.concat(this.healthEvents(transition)) };
    } catch (err) {
      const error = toCameraError(err);
      const transition = this.health.recordFailure(error.code);
      this.cameraError = { code: error.code, message: error.message };

      log.error(`Snapshot failed [${error.code}]: ${error.message}`);
      const events: BusEvent[] = [{ type: 'camera_error', code: error.code, message: error.message }];
      return { ok: false, error, events: events.concat(this.healthEvents(transition)) };
    }
  }

  private healthEvents(t: HealthTransition): BusEvent[] {
    if (t.previous === t.current) return [];
    const level = t.current === 'error' ? 'error' : 'info';
    log[level](`Camera health ${t.previous} -> ${t.current}`);
    return [{ type: 'camera_health', status: t.current }];
  }

  // ── Control ────────────────────────────────────────────────────────────────

  pause(): SchedulerState {
    this.paused = true;
    if (this.setState('paused')) this.publishStatus('paused');
    return this.current;
  }

  resume(): SchedulerState {
    this.paused = false;
    const next = this.evaluate();
    if (this.setState(next)) this.publishStatus(next);
    return this.current;
  }

  /**
   * Capture now, whatever the window or pause flag says. Waits for any
   * capture already in flight and leaves the interval timer alone.
   */
  async forceSnapshot(): Promise<StoredSnapshot> {
    log.info('Manual snapshot requested');
    const outcome = await this.capture();
    this.publishAll(outcome.events);
    if (!outcome.ok) throw outcome.error;
    return outcome.stored;
  }

  /**
   * Validate and swap in a new configuration. All or nothing: on any error
   * the running generation is left untouched and the error is rethrown.
   */
  async reloadConfig(raw: unknown): Promise<number> {
    const next = parseConfig(raw);

    let store = this.store;
    const storeOptions = {
      archive: next.storage.archive,
      maxArchived: next.storage.max_archived,
      timeZone: next.timezone,
    };
    if (!store.sameSettings(next.storage.save_path, storeOptions)) {
      store = this.createStore(next);
      try {
        await store.ensureDirectory();
      } catch (err) {
        throw new ConfigError([`storage.save_path: ${errorMessage(err)}`]);
      }
    }

    const previous = this.cfg;
    this.cfg = next;
    if (next.log_level) setLogLevel(next.log_level);
    this.gen += 1;
    this.store = store;
    this.sun = this.createSun(next);
    this.bus.setMaxQueue(next.events.max_queue);
    const healthChange = this.health.setThreshold(next.health.failure_threshold);

    const timing = (c: AppConfig) =>
      `${c.schedule.interval_seconds}/${c.schedule.status_heartbeat_seconds}`;
    if (this.tickTimer && timing(previous) !== timing(next)) {
      this.stop();
      this.scheduleTimers();
    }

    for (const warning of configWarnings(next)) log.warn(warning);
    log.info(`Configuration reloaded (generation ${this.gen})`);

    this.publishStatus('config_reloaded');
    this.publishAll(this.healthEvents(healthChange));
    const state = this.evaluate();
    if (this.setState(state)) this.publishStatus(state);
    return this.gen;
  }

  // ── Read side ──────────────────────────────────────────────────────────────

  async status(): Promise<StatusReport> {
    const cfg = this.cfg;
    const now = this.now();
    const sun = cfg.astral.enabled ? this.sun(now) : null;
    const [count, last] = await Promise.all([this.store.currentCount(), this.store.latest()]);
    const health = this.health.status();
    const lastLocal = last ? zonedTime(last.timestamp, cfg.timezone) : null;

    return {
      time: formatHMS(zonedTime(now, cfg.timezone)),
      active: isActive(now, cfg, sun),
      paused: this.paused,
      state: this.current,
      generation: this.gen,
      sunrise: sun ? formatHM(zonedTime(sun.sunrise, cfg.timezone)) : null,
      sunset: sun ? formatHM(zonedTime(sun.sunset, cfg.timezone)) : null,
      count,
      last_snapshot: lastLocal ? formatHMS(lastLocal) : null,
      last_snapshot_tooltip: lastLocal ? formatShort(lastLocal) : null,
      camera_error: this.cameraError,
      camera_health: {
        status: health.status,
        consecutive_failures: health.consecutiveFailures,
        last_failure: health.lastFailure,
      },
    };
  }

  async ensureStorage(): Promise<void> {
    await this.store.ensureDirectory();
  }

  private publishStatus(status: SchedulerState | 'config_reloaded'): void {
    this.bus.publish({ type: 'status', status });
  }

  private publishAll(events: BusEvent[]): void {
    for (const event of events) this.bus.publish(event);
  }
}
