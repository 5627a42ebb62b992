import { z } from 'zod';
import { Clock, systemClock } from '../common/Clock';
import { InvalidArgumentError } from '../common/errors';
import { JsonObject, jsonObjectSchema } from '../common/json';
import { defaultLogger, FrameworkLogger } from '../common/logger';
import { assertValidTimeout, LivenessEvaluator } from './LivenessEvaluator';
import { QueryEngine } from './QueryEngine';
import { ServiceRecordStore } from './ServiceRecordStore';
import {
  RegistrySnapshot,
  ServiceHealthReport,
  ServiceRecord,
  ServiceRegistration,
  ServiceStatus,
  ServiceUrlOptions,
  ServiceView,
  SystemStatus
} from './types';

export interface ServiceRegistryConfig {
  heartbeatTimeoutMs: number;   // Silence after which a service counts as stale (ms)
  warningThresholdMs: number;   // Heartbeat age reported as a health warning (ms)
  cleanupIntervalMs: number;    // Period of the background stale sweep (ms)
}

export interface ServiceRegistryOptions extends Partial<ServiceRegistryConfig> {
  clock?: Clock;
  logger?: FrameworkLogger;
}

export const DEFAULT_REGISTRY_CONFIG: ServiceRegistryConfig = {
  heartbeatTimeoutMs: 300000,   // 5 minutes
  warningThresholdMs: 120000,   // 2 minutes
  cleanupIntervalMs: 60000      // 1 minute
};

const serviceRecordSchema = z.object({
  name: z.string().min(1),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  serviceType: z.string().min(1),
  version: z.string(),
  healthEndpoint: z.string().optional(),
  metadata: jsonObjectSchema,
  registeredAt: z.number(),
  lastHeartbeatAt: z.number()
}).refine(record => record.lastHeartbeatAt >= record.registeredAt, {
  message: 'lastHeartbeatAt must not precede registeredAt'
});

const registrySnapshotSchema = z.object({
  timestamp: z.number(),
  revision: z.number().int().min(0),
  services: z.array(serviceRecordSchema)
});

/**
 * Liveness-tracked registry of running service instances.
 *
 * Owns its record store, liveness evaluator and query engine. Every operation
 * is synchronous and in-memory, so calls never interleave with one another;
 * the background sweep only runs between them.
 */
export class ServiceRegistry {
  /** Exposed for subscribing to `service:*` events. */
  readonly store: ServiceRecordStore;
  private readonly liveness: LivenessEvaluator;
  private readonly queries: QueryEngine;
  private readonly config: ServiceRegistryConfig;
  private readonly clock: Clock;
  private readonly logger: FrameworkLogger;
  private cleanupTimer?: NodeJS.Timeout;

  constructor(options: ServiceRegistryOptions = {}) {
    this.config = {
      heartbeatTimeoutMs: options.heartbeatTimeoutMs ?? DEFAULT_REGISTRY_CONFIG.heartbeatTimeoutMs,
      warningThresholdMs: options.warningThresholdMs ?? DEFAULT_REGISTRY_CONFIG.warningThresholdMs,
      cleanupIntervalMs: options.cleanupIntervalMs ?? DEFAULT_REGISTRY_CONFIG.cleanupIntervalMs
    };
    assertValidTimeout(this.config.heartbeatTimeoutMs);
    if (!(this.config.warningThresholdMs > 0)) {
      throw new InvalidArgumentError(`Warning threshold must be positive, got ${this.config.warningThresholdMs}`);
    }
    if (!(this.config.cleanupIntervalMs > 0)) {
      throw new InvalidArgumentError(`Cleanup interval must be positive, got ${this.config.cleanupIntervalMs}`);
    }

    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
    this.store = new ServiceRecordStore({ clock: this.clock, logger: this.logger });
    this.liveness = new LivenessEvaluator(this.store, { clock: this.clock, logger: this.logger });
    this.queries = new QueryEngine(this.store, {
      clock: this.clock,
      heartbeatTimeoutMs: this.config.heartbeatTimeoutMs,
      warningThresholdMs: this.config.warningThresholdMs
    });
  }

  register(registration: ServiceRegistration): ServiceRecord {
    return this.store.register(registration);
  }

  deregister(name: string): boolean {
    return this.store.deregister(name);
  }

  get(name: string): ServiceRecord | undefined {
    return this.store.get(name);
  }

  all(): ServiceRecord[] {
    return this.store.all();
  }

  heartbeat(name: string, metadata?: JsonObject): boolean {
    return this.liveness.heartbeat(name, metadata);
  }

  statusOf(name: string): ServiceStatus | undefined {
    const record = this.store.get(name);
    return record ? this.liveness.statusOf(record, this.config.heartbeatTimeoutMs) : undefined;
  }

  /**
   * Evict stale services. Uses the configured timeout unless one is given.
   */
  cleanupStale(timeoutMs: number = this.config.heartbeatTimeoutMs): number {
    return this.liveness.cleanupStale(timeoutMs);
  }

  getServicesByType(serviceType: string): ServiceRecord[] {
    return this.queries.getServicesByType(serviceType);
  }

  getActiveServices(): ServiceRecord[] {
    return this.queries.getActiveServices();
  }

  findService(serviceType: string): ServiceRecord | undefined {
    return this.queries.findService(serviceType);
  }

  getServiceUrl(name: string, options?: ServiceUrlOptions): string | undefined {
    return this.queries.getServiceUrl(name, options);
  }

  describe(name: string): ServiceView | undefined {
    return this.queries.describe(name);
  }

  getServiceHealth(name: string): ServiceHealthReport | undefined {
    return this.queries.getServiceHealth(name);
  }

  systemStatus(): SystemStatus {
    return this.queries.systemStatus();
  }

  /**
   * Start the periodic stale sweep. Calling it twice keeps a single timer.
   */
  startCleanup(): void {
    if (this.cleanupTimer) return;

    this.cleanupTimer = setInterval(() => {
      this.cleanupStale();
    }, this.config.cleanupIntervalMs);
    this.cleanupTimer.unref();

    this.logger.registry(`Cleanup sweep started (every ${this.config.cleanupIntervalMs}ms)`);
  }

  stop(): void {
    if (!this.cleanupTimer) return;

    clearInterval(this.cleanupTimer);
    this.cleanupTimer = undefined;
    this.logger.registry('Cleanup sweep stopped');
  }

  isCleanupRunning(): boolean {
    return this.cleanupTimer !== undefined;
  }

  getConfig(): ServiceRegistryConfig {
    return { ...this.config };
  }

  exportSnapshot(): RegistrySnapshot {
    return {
      timestamp: this.clock.now(),
      revision: this.store.getRevision(),
      services: this.store.all()
    };
  }

  /**
   * Replace the registry contents with a previously exported snapshot.
   * The input is validated first; on failure the registry is left untouched.
   */
  importSnapshot(snapshot: unknown): number {
    const parsed = registrySnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidArgumentError(
        `Invalid registry snapshot: ${issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'unknown error'}`
      );
    }

    const names = new Set<string>();
    for (const service of parsed.data.services) {
      if (names.has(service.name)) {
        throw new InvalidArgumentError(`Invalid registry snapshot: duplicate service name ${service.name}`);
      }
      names.add(service.name);
    }

    this.store.replaceAll(parsed.data.services, parsed.data.revision);
    this.logger.registry(`Imported snapshot with ${parsed.data.services.length} service(s)`);
    return parsed.data.services.length;
  }
}

let defaultRegistry: ServiceRegistry | undefined;

/**
 * Process-wide registry for callers that do not manage their own instance.
 */
export function getDefaultRegistry(): ServiceRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new ServiceRegistry();
  }
  return defaultRegistry;
}

export function resetDefaultRegistry(): void {
  defaultRegistry?.stop();
  defaultRegistry = undefined;
}
