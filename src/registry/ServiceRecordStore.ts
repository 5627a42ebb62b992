import { EventEmitter } from 'eventemitter3';
import { Clock, systemClock } from '../common/Clock';
import { InvalidArgumentError } from '../common/errors';
import { cloneJson, deepFreeze, JsonObject } from '../common/json';
import { defaultLogger, FrameworkLogger } from '../common/logger';
import { ServiceRecord, ServiceRecordEvents, ServiceRegistration } from './types';

export interface ServiceRecordStoreOptions {
  clock?: Clock;
  logger?: FrameworkLogger;
}

const MAX_PORT = 65535;

/**
 * In-memory table of registered service instances, keyed by name.
 *
 * Stored records are frozen and replaced wholesale on every mutation, so a
 * record obtained from `get` or `all` is a consistent snapshot that later
 * heartbeats never change underneath the caller. Map insertion order is the
 * registration order; re-registering a name moves it to the end.
 */
export class ServiceRecordStore extends EventEmitter<ServiceRecordEvents> {
  private records = new Map<string, ServiceRecord>();
  private revision = 0;
  private lastUpdatedAt: number;
  private readonly clock: Clock;
  private readonly logger: FrameworkLogger;

  constructor(options: ServiceRecordStoreOptions = {}) {
    super();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
    this.lastUpdatedAt = this.clock.now();
  }

  /**
   * Create or replace the record for `registration.name`.
   * Registration counts as the initial heartbeat.
   */
  register(registration: ServiceRegistration): ServiceRecord {
    validateRegistration(registration);

    const now = this.clock.now();
    const record = deepFreeze<ServiceRecord>({
      name: registration.name,
      host: registration.host,
      port: registration.port,
      serviceType: registration.serviceType,
      version: registration.version ?? '1.0',
      ...(registration.healthEndpoint !== undefined ? { healthEndpoint: registration.healthEndpoint } : {}),
      metadata: cloneJson<JsonObject>(registration.metadata ?? {}),
      registeredAt: now,
      lastHeartbeatAt: now
    });

    const previous = this.records.get(record.name);
    // Delete first so the name moves to the end of registration order
    this.records.delete(record.name);
    this.records.set(record.name, record);
    this.markMutated(now);

    this.logger.registry(
      `${previous ? 'Re-registered' : 'Registered'} service ${record.name} (${record.serviceType}) at ${record.host}:${record.port}`
    );
    this.emit('service:registered', record, previous);
    return record;
  }

  /**
   * Remove a record. Unknown names are a no-op returning false.
   */
  deregister(name: string): boolean {
    const record = this.records.get(name);
    if (!record) {
      return false;
    }

    this.records.delete(name);
    this.markMutated(this.clock.now());

    this.logger.registry(`Deregistered service ${name}`);
    this.emit('service:deregistered', record);
    return true;
  }

  get(name: string): ServiceRecord | undefined {
    return this.records.get(name);
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  all(): ServiceRecord[] {
    return Array.from(this.records.values());
  }

  /**
   * Record a heartbeat: refresh `lastHeartbeatAt` and shallow-merge metadata.
   * The timestamp never moves backwards, even if the clock does.
   */
  touch(name: string, metadata?: JsonObject): ServiceRecord | undefined {
    const existing = this.records.get(name);
    if (!existing) {
      return undefined;
    }

    const now = this.clock.now();
    const updated = deepFreeze<ServiceRecord>({
      ...existing,
      lastHeartbeatAt: Math.max(now, existing.lastHeartbeatAt),
      metadata: metadata ? { ...cloneJson(existing.metadata), ...cloneJson(metadata) } : existing.metadata
    });

    this.records.set(name, updated);
    this.markMutated(now);

    this.emit('service:heartbeat', updated);
    return updated;
  }

  /**
   * Delete `name` only if `predicate` still holds for the record currently stored.
   * Returns the evicted record, or undefined when nothing was removed.
   */
  evictIf(name: string, predicate: (record: ServiceRecord) => boolean): ServiceRecord | undefined {
    const current = this.records.get(name);
    if (!current || !predicate(current)) {
      return undefined;
    }

    this.records.delete(name);
    this.markMutated(this.clock.now());

    this.logger.registry(`Evicted stale service ${name}`);
    this.emit('service:evicted', current);
    return current;
  }

  /**
   * Swap the whole table, e.g. when importing a snapshot.
   */
  replaceAll(records: ServiceRecord[], revision?: number): void {
    const next = new Map<string, ServiceRecord>();
    for (const record of records) {
      next.set(record.name, deepFreeze({ ...record, metadata: cloneJson(record.metadata) }));
    }

    this.records = next;
    this.markMutated(this.clock.now());
    if (revision !== undefined && revision > this.revision) {
      this.revision = revision;
    }
  }

  getRevision(): number {
    return this.revision;
  }

  getLastUpdatedAt(): number {
    return this.lastUpdatedAt;
  }

  size(): number {
    return this.records.size;
  }

  clear(): void {
    this.records.clear();
    this.markMutated(this.clock.now());
  }

  private markMutated(at: number): void {
    this.revision++;
    this.lastUpdatedAt = at;
  }
}

function validateRegistration(registration: ServiceRegistration): void {
  if (!isNonBlank(registration.name)) {
    throw new InvalidArgumentError('Service name is required');
  }
  if (!isNonBlank(registration.host)) {
    throw new InvalidArgumentError(`Service ${registration.name}: host is required`);
  }
  if (!Number.isInteger(registration.port) || registration.port < 1 || registration.port > MAX_PORT) {
    throw new InvalidArgumentError(
      `Service ${registration.name}: port must be an integer between 1 and ${MAX_PORT}, got ${registration.port}`
    );
  }
  if (!isNonBlank(registration.serviceType)) {
    throw new InvalidArgumentError(`Service ${registration.name}: service type is required`);
  }
}

function isNonBlank(value: string | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}
