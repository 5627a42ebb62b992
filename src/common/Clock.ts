import { performance } from 'perf_hooks';

/**
 * Source of the current instant, in milliseconds since the Unix epoch.
 * Injected wherever liveness is computed so tests can drive time directly.
 */
export interface Clock {
  now(): number;
}

/**
 * Wall-clock time anchored at process start and advanced by the monotonic
 * high-resolution timer, so readings never go backwards and carry sub-ms precision.
 */
export class SystemClock implements Clock {
  now(): number {
    return performance.timeOrigin + performance.now();
  }
}

export const systemClock: Clock = new SystemClock();
