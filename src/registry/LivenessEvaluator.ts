import { Clock, systemClock } from '../common/Clock';
import { InvalidArgumentError } from '../common/errors';
import { JsonObject } from '../common/json';
import { defaultLogger, FrameworkLogger } from '../common/logger';
import { ServiceRecordStore } from './ServiceRecordStore';
import { ServiceRecord, ServiceStatus } from './types';

/**
 * Active while `now - lastHeartbeatAt <= timeoutMs`, stale afterwards.
 */
export function classify(record: Pick<ServiceRecord, 'lastHeartbeatAt'>, now: number, timeoutMs: number): ServiceStatus {
  return now - record.lastHeartbeatAt <= timeoutMs ? 'active' : 'stale';
}

/**
 * Reject timeouts that would make every record stale at the instant it registers.
 * `Infinity` is accepted and means records never go stale.
 */
export function assertValidTimeout(timeoutMs: number): void {
  if (Number.isNaN(timeoutMs) || timeoutMs <= 0) {
    throw new InvalidArgumentError(`Heartbeat timeout must be a positive number of milliseconds, got ${timeoutMs}`);
  }
}

export class LivenessEvaluator {
  private readonly clock: Clock;
  private readonly logger: FrameworkLogger;

  constructor(
    private readonly store: ServiceRecordStore,
    options: { clock?: Clock; logger?: FrameworkLogger } = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Refresh a service's freshness timestamp, merging `metadata` when given.
   * Unknown names return false and are never auto-registered.
   */
  heartbeat(name: string, metadata?: JsonObject): boolean {
    const updated = this.store.touch(name, metadata);
    if (!updated) {
      this.logger.debug(`Heartbeat ignored for unknown service ${name}`);
      return false;
    }
    return true;
  }

  statusOf(record: ServiceRecord, timeoutMs: number, now: number = this.clock.now()): ServiceStatus {
    return classify(record, now, timeoutMs);
  }

  /**
   * Evict every record that is stale at the sweep's start instant.
   *
   * Candidates are re-checked against the record stored at deletion time, so a
   * heartbeat that lands mid-sweep (from an eviction listener, say) keeps its
   * record alive.
   */
  cleanupStale(timeoutMs: number): number {
    assertValidTimeout(timeoutMs);

    const now = this.clock.now();
    const candidates = this.store
      .all()
      .filter(record => classify(record, now, timeoutMs) === 'stale')
      .map(record => record.name);

    let removed = 0;
    for (const name of candidates) {
      const evicted = this.store.evictIf(name, current => classify(current, now, timeoutMs) === 'stale');
      if (evicted) {
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.registry(`Cleanup sweep removed ${removed} stale service(s)`);
    }
    return removed;
  }
}
