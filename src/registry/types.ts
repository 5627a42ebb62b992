import { JsonObject } from '../common/json';

// Core record types for the service registry
export interface ServiceRecord {
  name: string;
  host: string;
  port: number;
  serviceType: string;
  version: string;
  healthEndpoint?: string;
  metadata: JsonObject;
  registeredAt: number;
  lastHeartbeatAt: number;
}

export interface ServiceRegistration {
  name: string;
  host: string;
  port: number;
  serviceType: string;
  version?: string;
  healthEndpoint?: string;
  metadata?: JsonObject;
}

/**
 * Derived from `lastHeartbeatAt`; never stored on the record.
 */
export type ServiceStatus = 'active' | 'stale';

export type ServiceHealth = 'healthy' | 'warning' | 'unhealthy';

export interface ServiceView extends ServiceRecord {
  status: ServiceStatus;
}

export interface ServiceHealthReport {
  name: string;
  health: ServiceHealth;
  status: ServiceStatus;
  uptimeMs: number;
  heartbeatAgeMs: number;
  record: ServiceRecord;
  checkedAt: number;
}

export interface TypeCounts {
  total: number;
  active: number;
  stale: number;
}

export interface SystemStatus {
  total: number;
  activeCount: number;
  staleCount: number;
  byType: Record<string, TypeCounts>;
  revision: number;
  lastUpdatedAt: number;
  timestamp: number;
}

export interface RegistrySnapshot {
  timestamp: number;
  revision: number;
  services: ServiceRecord[];
}

export interface ServiceUrlOptions {
  endpoint?: string;
  scheme?: string;
}

export interface ServiceRecordEvents {
  'service:registered': (record: ServiceRecord, previous: ServiceRecord | undefined) => void;
  'service:deregistered': (record: ServiceRecord) => void;
  'service:heartbeat': (record: ServiceRecord) => void;
  'service:evicted': (record: ServiceRecord) => void;
}
