import type { CameraErrorCode, HealthSnapshot, HealthStatus } from './types.js';

export interface HealthTransition {
  previous: HealthStatus;
  current: HealthStatus;
}

export const DEFAULT_FAILURE_THRESHOLD = 3;

// Consecutive-outcome counters for the camera. One success is enough to be
// `ok` again; it takes `threshold` failures in a row to reach `error`.
export class HealthTracker {
  private failures = 0;
  private successes = 0;
  private lastFailure: CameraErrorCode | null = null;
  private current: HealthStatus = 'ok';

  constructor(private threshold = DEFAULT_FAILURE_THRESHOLD) {}

  setThreshold(threshold: number): HealthTransition {
    const previous = this.current;
    this.threshold = threshold;
    this.current = this.derive();
    return { previous, current: this.current };
  }

  recordSuccess(): HealthTransition {
    const previous = this.current;
    this.successes += 1;
    this.failures = 0;
    this.current = this.derive();
    return { previous, current: this.current };
  }

  recordFailure(code: CameraErrorCode): HealthTransition {
    const previous = this.current;
    this.failures += 1;
    this.successes = 0;
    this.lastFailure = code;
    this.current = this.derive();
    return { previous, current: this.current };
  }

  status(): HealthSnapshot {
    return {
      status: this.current,
      consecutiveFailures: this.failures,
      consecutiveSuccesses: this.successes,
      lastFailure: this.lastFailure,
    };
  }

  private derive(): HealthStatus {
    if (this.failures === 0) return 'ok';
    return this.failures >= this.threshold ? 'error' : 'degraded';
  }
}
