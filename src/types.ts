import type { LogThreshold } from './logger.js';

export type Weekday = 'Mon' | 'Tue' | 'Wed' | 'Thu' | 'Fri' | 'Sat' | 'Sun';

export const WEEKDAYS: readonly Weekday[] = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

export type CameraAuth =
  | { type: 'none' }
  | { type: 'basic'; username: string; password: string }
  | { type: 'digest'; username: string; password: string };

export interface CameraConfig {
  snapshot_url: string;
  auth: CameraAuth;
  timeout_seconds: number;
}

export interface ScheduleConfig {
  interval_seconds: number;
  active_start: string; // HH:MM
  active_end: string;   // HH:MM, never before active_start
  active_days: Weekday[];
  paused: boolean;
  status_heartbeat_seconds: number;
}

export interface AstralConfig {
  enabled: boolean;
  latitude: number;
  longitude: number;
}

export interface StorageConfig {
  save_path: string;
  archive: boolean;
  max_archived: number; // 0 keeps everything
}

export interface AppConfig {
  port: number;
  timezone: string;
  // Overrides LOG_LEVEL when set
  log_level?: LogThreshold;
  camera: CameraConfig;
  schedule: ScheduleConfig;
  astral: AstralConfig;
  storage: StorageConfig;
  health: { failure_threshold: number };
  events: { max_queue: number };
}

export interface SunTimes {
  sunrise: Date;
  sunset: Date;
}

export interface CapturedImage {
  data: Buffer;
  contentType: string;
  extension: string;
}

export interface StoredSnapshot {
  filename: string;
  path: string;
  timestamp: Date;
}

export type CameraErrorCode =
  | 'timeout'
  | 'connection_refused'
  | 'unreachable'
  | 'auth_failed'
  | 'http_error'
  | 'invalid_content'
  | 'storage_failed'
  | 'no_url';

export type HealthStatus = 'ok' | 'degraded' | 'error';

export interface HealthSnapshot {
  status: HealthStatus;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  lastFailure: CameraErrorCode | null;
}

export type SchedulerState = 'running' | 'paused' | 'waiting_window';

export type StatusKind = SchedulerState | 'config_reloaded';

// Events as they go over the wire to dashboard clients
export type BusEvent =
  | { type: 'snapshot'; filename: string; timestamp: string; timestamp_full: string }
  | { type: 'status'; status: StatusKind }
  | { type: 'camera_error'; code: CameraErrorCode; message: string }
  | { type: 'camera_health'; status: HealthStatus };

// Payload of GET /status
export interface StatusReport {
  time: string;
  active: boolean;
  paused: boolean;
  state: SchedulerState;
  generation: number;
  sunrise: string | null;
  sunset: string | null;
  count: number;
  last_snapshot: string | null;
  last_snapshot_tooltip: string | null;
  camera_error: { code: CameraErrorCode; message: string } | null;
  camera_health: {
    status: HealthStatus;
    consecutive_failures: number;
    last_failure: CameraErrorCode | null;
  };
}
