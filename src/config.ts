import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { isValidTimeZone, parseClock } from './clock.js';
import { ConfigError, errorMessage } from './errors.js';
import type { AppConfig } from './types.js';

const HHMM = /^([01]\d|2[0-3]):[0-5]\d$/;

const clockSchema = z.string().regex(HHMM, 'must be HH:MM (00:00-23:59)');

const credentials = {
  username: z.string().min(1, 'username is required'),
  password: z.string(),
};

const authSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none') }),
  z.object({ type: z.literal('basic'), ...credentials }),
  z.object({ type: z.literal('digest'), ...credentials }),
]);

const weekdaySchema = z.enum(['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']);

const scheduleSchema = z
  .object({
    interval_seconds: z.number().int().min(1, 'must be at least 1 second').default(10),
    active_start: clockSchema.default('06:00'),
    active_end: clockSchema.default('18:00'),
    active_days: z
      .array(weekdaySchema)
      .min(1, 'at least one weekday is required')
      .refine((days) => new Set(days).size === days.length, 'weekdays must be unique')
      .default(['Mon', 'Tue', 'Wed', 'Thu', 'Fri']),
    paused: z.boolean().default(false),
    status_heartbeat_seconds: z.number().int().min(0).default(10),
  })
  .superRefine((s, ctx) => {
    // Ranges never wrap past midnight
    if (HHMM.test(s.active_start) && HHMM.test(s.active_end)
      && parseClock(s.active_end) < parseClock(s.active_start)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['active_end'],
        message: `must not be earlier than active_start (${s.active_start})`,
      });
    }
  });

const appConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8080),
  timezone: z.string().refine(isValidTimeZone, 'unknown timezone').default('Europe/Berlin'),
  log_level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  camera: z
    .object({
      snapshot_url: z.string().default(''),
      auth: authSchema.default({ type: 'none' }),
      timeout_seconds: z.number().positive().max(15).default(10),
    })
    .default({}),
  schedule: scheduleSchema.default({}),
  astral: z
    .object({
      enabled: z.boolean().default(false),
      latitude: z.number().min(-90).max(90).default(52.52),
      longitude: z.number().min(-180).max(180).default(13.405),
    })
    .default({}),
  storage: z
    .object({
      save_path: z.string().min(1).default('./pictures'),
      archive: z.boolean().default(true),
      max_archived: z.number().int().min(0).default(0),
    })
    .default({}),
  health: z
    .object({ failure_threshold: z.number().int().min(1).default(3) })
    .default({}),
  events: z
    .object({ max_queue: z.number().int().min(1).default(100) })
    .default({}),
});

function formatIssue(issue: z.ZodIssue): string {
  const where = issue.path.join('.') || '(root)';
  return `${where}: ${issue.message}`;
}

export function parseConfig(raw: unknown): AppConfig {
  const result = appConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(formatIssue));
  }
  return result.data;
}

// Problems that do not stop the scheduler but are worth a log line
export function configWarnings(cfg: AppConfig): string[] {
  const warnings: string[] = [];
  if (cfg.schedule.interval_seconds <= cfg.camera.timeout_seconds) {
    warnings.push(
      `interval_seconds (${cfg.schedule.interval_seconds}) should be greater than ` +
      `camera.timeout_seconds (${cfg.camera.timeout_seconds}); a hung capture will delay the next tick`
    );
  }
  if (!cfg.camera.snapshot_url) {
    warnings.push('camera.snapshot_url is empty; captures will fail until it is set');
  }
  return warnings;
}

export function resolveConfigPath(configPath?: string): string {
  return configPath
    ? path.resolve(configPath)
    : path.resolve(process.cwd(), 'config.yaml');
}

export function readConfigFile(configPath?: string): unknown {
  const resolved = resolveConfigPath(configPath);

  if (!fs.existsSync(resolved)) {
    throw new ConfigError([
      `Config file not found: ${resolved}. ` +
      `Copy config.example.yaml to config.yaml and fill in your details.`,
    ]);
  }

  try {
    return yaml.load(fs.readFileSync(resolved, 'utf8'));
  } catch (err) {
    throw new ConfigError([`${resolved}: ${errorMessage(err)}`]);
  }
}

export function loadConfig(configPath?: string): AppConfig {
  return parseConfig(readConfigFile(configPath));
}
