import { Clock, systemClock } from '../common/Clock';
import { classify } from './LivenessEvaluator';
import { ServiceRecordStore } from './ServiceRecordStore';
import {
  ServiceHealth,
  ServiceHealthReport,
  ServiceRecord,
  ServiceUrlOptions,
  ServiceView,
  SystemStatus,
  TypeCounts
} from './types';

export interface QueryEngineOptions {
  heartbeatTimeoutMs: number;
  warningThresholdMs: number;
  clock?: Clock;
}

/**
 * Discovery queries over the records currently held by the store.
 * Liveness is evaluated at call time; nothing here mutates the store.
 */
export class QueryEngine {
  private readonly clock: Clock;

  constructor(
    private readonly store: ServiceRecordStore,
    private readonly options: QueryEngineOptions
  ) {
    this.clock = options.clock ?? systemClock;
  }

  /**
   * All records of `serviceType`, active or stale, in registration order.
   */
  getServicesByType(serviceType: string): ServiceRecord[] {
    return this.store.all().filter(record => record.serviceType === serviceType);
  }

  getActiveServices(): ServiceRecord[] {
    const now = this.clock.now();
    return this.store.all().filter(record => this.isActive(record, now));
  }

  /**
   * The earliest-registered active record of `serviceType`.
   */
  findService(serviceType: string): ServiceRecord | undefined {
    const now = this.clock.now();
    return this.store.all().find(record => record.serviceType === serviceType && this.isActive(record, now));
  }

  /**
   * Build `scheme://host:port[/endpoint]` for a registered service.
   * Formatting does not imply the service is alive.
   */
  getServiceUrl(name: string, options: ServiceUrlOptions = {}): string | undefined {
    const record = this.store.get(name);
    if (!record) {
      return undefined;
    }
    return formatServiceUrl(record, options);
  }

  describe(name: string): ServiceView | undefined {
    const record = this.store.get(name);
    if (!record) {
      return undefined;
    }
    return { ...record, status: classify(record, this.clock.now(), this.options.heartbeatTimeoutMs) };
  }

  getServiceHealth(name: string): ServiceHealthReport | undefined {
    const record = this.store.get(name);
    if (!record) {
      return undefined;
    }

    const now = this.clock.now();
    const heartbeatAgeMs = Math.max(0, now - record.lastHeartbeatAt);
    const status = classify(record, now, this.options.heartbeatTimeoutMs);

    let health: ServiceHealth = 'healthy';
    if (status === 'stale') {
      health = 'unhealthy';
    } else if (heartbeatAgeMs > this.options.warningThresholdMs) {
      health = 'warning';
    }

    return {
      name,
      health,
      status,
      uptimeMs: Math.max(0, now - record.registeredAt),
      heartbeatAgeMs,
      record,
      checkedAt: now
    };
  }

  /**
   * Aggregate counts, computed fresh on every call.
   */
  systemStatus(): SystemStatus {
    const now = this.clock.now();
    // Service types are caller-supplied; keep them out of object key lookups
    const byType = new Map<string, TypeCounts>();
    let activeCount = 0;
    let staleCount = 0;

    const records = this.store.all();
    for (const record of records) {
      let counts = byType.get(record.serviceType);
      if (!counts) {
        counts = { total: 0, active: 0, stale: 0 };
        byType.set(record.serviceType, counts);
      }
      counts.total++;
      if (this.isActive(record, now)) {
        counts.active++;
        activeCount++;
      } else {
        counts.stale++;
        staleCount++;
      }
    }

    return {
      total: records.length,
      activeCount,
      staleCount,
      byType: Object.fromEntries(byType),
      revision: this.store.getRevision(),
      lastUpdatedAt: this.store.getLastUpdatedAt(),
      timestamp: now
    };
  }

  private isActive(record: ServiceRecord, now: number): boolean {
    return classify(record, now, this.options.heartbeatTimeoutMs) === 'active';
  }
}

export function formatServiceUrl(record: Pick<ServiceRecord, 'host' | 'port'>, options: ServiceUrlOptions = {}): string {
  const scheme = options.scheme ?? 'http';
  // IPv6 literals need brackets to be distinguishable from the port separator
  const host = record.host.includes(':') && !record.host.startsWith('[') ? `[${record.host}]` : record.host;
  const baseUrl = `${scheme}://${host}:${record.port}`;

  if (!options.endpoint) {
    return baseUrl;
  }
  const endpoint = options.endpoint.startsWith('/') ? options.endpoint : `/${options.endpoint}`;
  return `${baseUrl}${endpoint}`;
}
