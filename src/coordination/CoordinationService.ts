import { Clock, systemClock } from '../common/Clock';
import { ConfigIOError, errorMessage, InvalidArgumentError, NotFoundError } from '../common/errors';
import { isJsonObject, JsonObject, JsonValue } from '../common/json';
import { createLogger, FrameworkLogger, LoggingConfig } from '../common/logger';
import { matchesAnyPattern } from '../common/utils';
import { ConfigHistory, ConfigHistoryEntry } from '../config/ConfigHistory';
import { ConfigSchemaDefinition, parseSchemaDefinition, validateConfigData } from '../config/ConfigSchema';
import { CoordinationSettings } from '../config/CoordinationSettings';
import {
  BatchOperation,
  BatchResult,
  CONFIG_METADATA_KEY,
  ConfigData,
  ConfigFormat,
  FileConfigStore,
  isValidConfigName,
  writeFileAtomic
} from '../config/FileConfigStore';
import {
  ConfigDiff,
  MERGE_STRATEGIES,
  MergeStrategy,
  mergeConfigData,
  stripMetadata,
  TemplateField,
  templateFromFields
} from '../config/transforms';
import { ServiceRegistry } from '../registry/ServiceRegistry';
import {
  RegistrySnapshot,
  ServiceHealthReport,
  ServiceRecord,
  ServiceRegistration,
  ServiceUrlOptions,
  SystemStatus
} from '../registry/types';
import {
  ChangelogQuery,
  ConfigChangeCallback,
  ConfigChangeEvent,
  ConfigSubscription,
  ConfigSubscriptions
} from './ConfigSubscriptions';

export interface CoordinationServiceOptions {
  settings?: CoordinationSettings;
  configStore?: FileConfigStore;
  registry?: ServiceRegistry;
  clock?: Clock;
  logging?: LoggingConfig;
  /** Versions kept per configuration name */
  maxHistoryEntries?: number;
}

export interface CoordinationStatus {
  coordinationService: {
    name: string;
    status: 'active' | 'stopped';
    uptimeMs: number;
    startTime: number;
  };
  configurations: {
    totalConfigs: number;
    configNames: string[];
  };
  serviceRegistry: SystemStatus;
  cleanup: {
    staleServicesRemoved: number;
  };
  timestamp: number;
}

export interface HealthCheckResult {
  status: 'healthy' | 'degraded';
  service: string;
  timestamp: number;
  uptimeMs: number;
  components: {
    configStore: 'healthy' | 'unhealthy';
    serviceRegistry: 'healthy';
  };
  error?: string;
}

export interface SystemStateExport {
  configurations: Record<string, ConfigData | { error: string }>;
  serviceRegistry: RegistrySnapshot;
  systemStatus: CoordinationStatus;
  exportTimestamp: string;
}

export type ServiceWithConfigResult =
  | { success: true; serviceName: string; configPath: string; templateUsed: string }
  | { success: false; serviceName: string; error: string };

export interface ServiceHealthStatus extends ServiceHealthReport {
  configuration: ConfigData;
}

export interface ConfigValidationReport {
  valid: boolean;
  configName: string;
  schemaName: string;
  errors: string[];
  validatedAt: string;
}

export type BackupRestoreResult =
  | { success: true; backupName: string; restoredConfigs: string[]; errors: string[]; restoredAt: string }
  | { success: false; backupName: string; error: string };

const SERVICE_CONFIG_PREFIX = 'service_';
const TEMPLATE_CONFIG_PREFIX = 'template_';
const SCHEMA_CONFIG_PREFIX = 'schema_';
const BACKUP_CONFIG_PREFIX = 'backup_';
const GLOBAL_CONFIG_NAME = 'global';

export const DEFAULT_GLOBAL_CONFIG: ConfigData = {
  system: {
    name: 'Coordinated System',
    version: '1.0',
    environment: 'development'
  },
  logging: {
    level: 'info'
  },
  coordination: {
    heartbeat_interval: 60000,
    cleanup_interval: 300000
  }
};

/**
 * Single entry point over the configuration store and the service registry.
 *
 * On `start()` the service registers itself (type `config`) and begins the
 * registry's periodic stale sweep; `stop()` reverses both.
 */
export class CoordinationService {
  readonly settings: CoordinationSettings;
  readonly configStore: FileConfigStore;
  readonly registry: ServiceRegistry;
  readonly history: ConfigHistory;
  readonly subscriptions: ConfigSubscriptions;
  private readonly clock: Clock;
  private readonly logger: FrameworkLogger;
  private readonly serviceName: string;
  private startTime: number;
  private started = false;

  constructor(options: CoordinationServiceOptions = {}) {
    this.settings = options.settings ?? new CoordinationSettings();
    this.clock = options.clock ?? systemClock;
    this.logger = createLogger({
      enableRegistryLogs: true,
      enableConfigLogs: true,
      enableCoordinatorLogs: true,
      ...options.logging
    });
    this.configStore = options.configStore ?? new FileConfigStore({
      ...this.settings.toConfigStoreOptions(),
      clock: this.clock,
      logger: this.logger
    });
    this.registry = options.registry ?? new ServiceRegistry({
      ...this.settings.toRegistryOptions(),
      clock: this.clock,
      logger: this.logger
    });
    this.history = new ConfigHistory(this.configStore, {
      maxEntries: options.maxHistoryEntries,
      clock: this.clock,
      logger: this.logger
    });
    this.subscriptions = new ConfigSubscriptions(this.configStore, { clock: this.clock, logger: this.logger });
    this.serviceName = this.settings.getServiceName();
    this.startTime = this.clock.now();
  }

  start(): void {
    if (this.started) return;

    this.startTime = this.clock.now();
    this.registerSelf();
    this.registry.startCleanup();
    this.started = true;

    this.logger.coordinator(`Coordination service ${this.serviceName} started`);
  }

  stop(): void {
    if (!this.started) return;

    this.registry.stop();
    this.registry.deregister(this.serviceName);
    this.started = false;

    this.logger.coordinator(`Coordination service ${this.serviceName} stopped`);
  }

  isRunning(): boolean {
    return this.started;
  }

  // Configuration management

  async saveConfig(name: string, data: ConfigData, format?: ConfigFormat): Promise<string> {
    const filePath = await this.configStore.save(name, data, format);

    this.registry.heartbeat(this.serviceName, {
      last_action: 'save_config',
      config_name: name,
      timestamp: this.isoNow()
    });

    return filePath;
  }

  loadConfig(name: string, useCache: boolean = true): Promise<ConfigData> {
    return this.configStore.load(name, { useCache });
  }

  async updateConfig(name: string, updates: ConfigData, createBackup: boolean = true): Promise<string> {
    const filePath = await this.configStore.update(name, updates, { createBackup });
    this.notifyConfigUpdate(name, updates);
    return filePath;
  }

  deleteConfig(name: string, createBackup: boolean = true): Promise<boolean> {
    return this.configStore.delete(name, { createBackup });
  }

  listConfigs(): Promise<string[]> {
    return this.configStore.list();
  }

  bulkLoadConfigs(names: string[]): Promise<Record<string, ConfigData>> {
    return this.configStore.bulkLoad(names);
  }

  executeBatch(operations: BatchOperation[]): Promise<BatchResult> {
    return this.configStore.runBatch(operations);
  }

  /**
   * Merge configurations in order into `outputName`. Missing sources are
   * skipped with a warning.
   */
  async mergeConfigs(names: string[], outputName: string, strategy: MergeStrategy = 'override'): Promise<string> {
    if (!MERGE_STRATEGIES.includes(strategy)) {
      throw new InvalidArgumentError(`Unknown merge strategy '${strategy}'`);
    }

    const sources: ConfigData[] = [];
    for (const name of names) {
      try {
        sources.push(await this.loadConfig(name));
      } catch (error) {
        if (!(error instanceof NotFoundError)) {
          throw error;
        }
        this.logger.warn(`Configuration '${name}' not found, skipping merge source`);
      }
    }

    const merged = mergeConfigData(sources, strategy);
    merged[CONFIG_METADATA_KEY] = {
      merged_from: [...names],
      merge_strategy: strategy,
      merged_at: this.isoNow()
    };
    return this.saveConfig(outputName, merged);
  }

  // History

  getConfigHistory(name: string, limit?: number): ConfigHistoryEntry[] {
    return this.history.getHistory(name, limit);
  }

  /**
   * Save a recorded version as the current content; this adds a new version.
   */
  async restoreConfigVersion(name: string, version: number): Promise<string> {
    const entry = this.history.requireVersion(name, version);
    return this.saveConfig(name, entry.config);
  }

  getConfigDiff(name: string, fromVersion: number, toVersion: number): ConfigDiff {
    return this.history.diff(name, fromVersion, toVersion);
  }

  // Schemas and templates

  /**
   * Store a schema definition as `schema_<name>`
   */
  async createConfigSchema(schemaName: string, definition: JsonObject): Promise<string> {
    parseSchemaDefinition(definition);
    return this.saveConfig(`${SCHEMA_CONFIG_PREFIX}${schemaName}`, {
      schema_name: schemaName,
      version: '1.0',
      created_at: this.isoNow(),
      schema: definition
    });
  }

  async validateConfiguration(configName: string, schemaName: string): Promise<ConfigValidationReport> {
    let errors: string[];
    try {
      const [data, definition] = await Promise.all([this.loadConfig(configName), this.loadSchema(schemaName)]);
      const result = validateConfigData(stripMetadata(data), definition);
      errors = result.valid ? [] : result.errors;
    } catch (error) {
      errors = [errorMessage(error)];
    }

    return { valid: errors.length === 0, configName, schemaName, errors, validatedAt: this.isoNow() };
  }

  /**
   * Save only if `data` satisfies the stored schema `schemaName`
   */
  async saveConfigWithValidation(
    name: string,
    data: ConfigData,
    schemaName: string,
    format?: ConfigFormat
  ): Promise<string> {
    const result = validateConfigData(stripMetadata(data), await this.loadSchema(schemaName));
    if (!result.valid) {
      throw new InvalidArgumentError(
        `Configuration ${name} does not match schema ${schemaName}: ${result.errors.join('; ')}`
      );
    }
    return this.saveConfig(name, data, format);
  }

  /**
   * Store `template_<name>` with a placeholder or default per field, for use
   * by `registerServiceWithConfig`.
   */
  async createConfigTemplate(templateName: string, fields: TemplateField[]): Promise<string> {
    const template = templateFromFields(templateName, fields, this.isoNow());
    return this.saveConfig(`${TEMPLATE_CONFIG_PREFIX}${templateName}`, template);
  }

  // Change subscriptions

  subscribeToConfigChanges(
    subscriberId: string,
    patterns: string[],
    callback: ConfigChangeCallback
  ): ConfigSubscription {
    return this.subscriptions.subscribe(subscriberId, patterns, callback);
  }

  unsubscribeFromConfigChanges(subscriberId: string): boolean {
    return this.subscriptions.unsubscribe(subscriberId);
  }

  getConfigChangelog(query?: ChangelogQuery): ConfigChangeEvent[] {
    return this.subscriptions.getChangelog(query);
  }

  // Backup sets

  /**
   * Snapshot matching configurations and the registered services into
   * `backup_<name>`. Existing backup sets are never included.
   */
  async createConfigurationBackup(backupName: string, patterns?: string[]): Promise<string> {
    const configurations = new Map<string, JsonValue>();
    for (const name of await this.listConfigs()) {
      if (name.startsWith(BACKUP_CONFIG_PREFIX)) continue;
      if (patterns && !matchesAnyPattern(name, patterns)) continue;
      try {
        configurations.set(name, await this.loadConfig(name));
      } catch (error) {
        configurations.set(name, { error: errorMessage(error) });
      }
    }

    return this.saveConfig(`${BACKUP_CONFIG_PREFIX}${backupName}`, {
      backup_name: backupName,
      created_at: this.isoNow(),
      configurations: Object.fromEntries(configurations),
      service_registry: this.registry.exportSnapshot().services.map(record => ({
        name: record.name,
        host: record.host,
        port: record.port,
        service_type: record.serviceType
      }))
    });
  }

  /**
   * Write configurations back from `backup_<name>`, optionally only `only`.
   * Entries that failed to load at backup time are reported, not restored.
   */
  async restoreConfigurationBackup(backupName: string, only?: string[]): Promise<BackupRestoreResult> {
    let configurations: JsonValue | undefined;
    try {
      configurations = (await this.loadConfig(`${BACKUP_CONFIG_PREFIX}${backupName}`)).configurations;
    } catch (error) {
      return { success: false, backupName, error: errorMessage(error) };
    }
    if (!isJsonObject(configurations)) {
      return { success: false, backupName, error: `Backup ${backupName} has no configurations` };
    }

    const restoredConfigs: string[] = [];
    const errors: string[] = [];
    for (const [name, data] of Object.entries(configurations)) {
      if (only && !only.includes(name)) continue;

      if (!isJsonObject(data)) {
        errors.push(`${name}: not a configuration object`);
        continue;
      }
      const failure = data.error;
      if (typeof failure === 'string' && Object.keys(data).length === 1) {
        errors.push(`${name}: ${failure}`);
        continue;
      }

      try {
        await this.saveConfig(name, data);
        restoredConfigs.push(name);
      } catch (error) {
        errors.push(`${name}: ${errorMessage(error)}`);
      }
    }

    this.logger.coordinator(`Restored ${restoredConfigs.length} configurations from backup ${backupName}`);
    return { success: true, backupName, restoredConfigs, errors, restoredAt: this.isoNow() };
  }

  // Service registry

  registerService(registration: ServiceRegistration): ServiceRecord {
    return this.registry.register(registration);
  }

  deregisterService(name: string): boolean {
    return this.registry.deregister(name);
  }

  getService(name: string): ServiceRecord | undefined {
    return this.registry.get(name);
  }

  getServicesByType(serviceType: string): ServiceRecord[] {
    return this.registry.getServicesByType(serviceType);
  }

  getActiveServices(): ServiceRecord[] {
    return this.registry.getActiveServices();
  }

  findService(serviceType: string): ServiceRecord | undefined {
    return this.registry.findService(serviceType);
  }

  heartbeat(name: string, metadata?: JsonObject): boolean {
    return this.registry.heartbeat(name, metadata);
  }

  getServiceUrl(name: string, options?: ServiceUrlOptions): string | undefined {
    return this.registry.getServiceUrl(name, options);
  }

  cleanupStaleServices(): number {
    return this.registry.cleanupStale();
  }

  // Coordination

  /**
   * Per-service configuration, or undefined when none has been stored.
   * Service names that cannot form a config name never have one.
   */
  async getServiceConfig(serviceName: string): Promise<ConfigData | undefined> {
    const configName = `${SERVICE_CONFIG_PREFIX}${serviceName}`;
    if (!isValidConfigName(configName)) {
      return undefined;
    }
    try {
      return await this.loadConfig(configName);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return undefined;
      }
      throw error;
    }
  }

  setServiceConfig(serviceName: string, data: ConfigData): Promise<string> {
    return this.saveConfig(`${SERVICE_CONFIG_PREFIX}${serviceName}`, data);
  }

  async getGlobalConfig(): Promise<ConfigData> {
    try {
      return await this.loadConfig(GLOBAL_CONFIG_NAME);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return structuredClone(DEFAULT_GLOBAL_CONFIG);
      }
      throw error;
    }
  }

  setGlobalConfig(data: ConfigData): Promise<string> {
    return this.saveConfig(GLOBAL_CONFIG_NAME, data);
  }

  /**
   * Register a service and seed its `service_<name>` config from `template_<template>`.
   * Registration stands even if the template cannot be applied.
   */
  async registerServiceWithConfig(
    registration: ServiceRegistration,
    template: string
  ): Promise<ServiceWithConfigResult> {
    this.registerService(registration);

    try {
      const templateConfig = await this.loadConfig(`${TEMPLATE_CONFIG_PREFIX}${template}`);
      delete templateConfig._template;
      delete templateConfig._template_info;

      const serviceConfig: ConfigData = {
        ...templateConfig,
        service_name: registration.name,
        service_type: registration.serviceType,
        host: registration.host,
        port: registration.port,
        configured_at: this.isoNow()
      };

      const configPath = await this.saveConfig(`${SERVICE_CONFIG_PREFIX}${registration.name}`, serviceConfig);
      return { success: true, serviceName: registration.name, configPath, templateUsed: template };
    } catch (error) {
      this.logger.warn(`Could not configure ${registration.name} from template ${template}: ${errorMessage(error)}`);
      return {
        success: false,
        serviceName: registration.name,
        error: `Failed to create configuration: ${errorMessage(error)}`
      };
    }
  }

  async getServiceHealthStatus(serviceName: string): Promise<ServiceHealthStatus | undefined> {
    const report = this.registry.getServiceHealth(serviceName);
    if (!report) {
      return undefined;
    }
    const configuration = (await this.getServiceConfig(serviceName)) ?? {};
    return { ...report, configuration };
  }

  /**
   * Sweep stale services, then report on configs and registry
   */
  async getSystemStatus(): Promise<CoordinationStatus> {
    const staleServicesRemoved = this.cleanupStaleServices();
    const configNames = await this.listConfigs();
    const now = this.clock.now();

    return {
      coordinationService: {
        name: this.serviceName,
        status: this.started ? 'active' : 'stopped',
        uptimeMs: now - this.startTime,
        startTime: this.startTime
      },
      configurations: {
        totalConfigs: configNames.length,
        configNames
      },
      serviceRegistry: this.registry.systemStatus(),
      cleanup: {
        staleServicesRemoved
      },
      timestamp: now
    };
  }

  async healthCheck(): Promise<HealthCheckResult> {
    const now = this.clock.now();
    const base = {
      service: this.serviceName,
      timestamp: now,
      uptimeMs: now - this.startTime
    };

    try {
      await this.configStore.list();
      return {
        ...base,
        status: 'healthy',
        components: { configStore: 'healthy', serviceRegistry: 'healthy' }
      };
    } catch (error) {
      this.logger.error(`Health check failed for config store: ${errorMessage(error)}`);
      return {
        ...base,
        status: 'degraded',
        components: { configStore: 'unhealthy', serviceRegistry: 'healthy' },
        error: errorMessage(error)
      };
    }
  }

  /**
   * Write configs, a registry snapshot and current status to one JSON file
   */
  async exportSystemState(outputFile: string): Promise<string> {
    const configurations = new Map<string, ConfigData | { error: string }>();
    for (const name of await this.listConfigs()) {
      try {
        configurations.set(name, await this.loadConfig(name));
      } catch (error) {
        configurations.set(name, { error: errorMessage(error) });
      }
    }

    const state: SystemStateExport = {
      configurations: Object.fromEntries(configurations),
      serviceRegistry: this.registry.exportSnapshot(),
      systemStatus: await this.getSystemStatus(),
      exportTimestamp: this.isoNow()
    };

    try {
      await writeFileAtomic(outputFile, JSON.stringify(state, null, 2));
    } catch (error) {
      throw new ConfigIOError(`Failed to export system state to ${outputFile}: ${errorMessage(error)}`, error);
    }
    this.logger.coordinator(`Exported system state to ${outputFile}`);
    return outputFile;
  }

  private async loadSchema(schemaName: string): Promise<ConfigSchemaDefinition> {
    const document = await this.loadConfig(`${SCHEMA_CONFIG_PREFIX}${schemaName}`);
    return parseSchemaDefinition(document.schema);
  }

  private isoNow(): string {
    return new Date(this.clock.now()).toISOString();
  }

  private registerSelf(): void {
    const self = this.settings.getSelfRegistration();
    if (!self.enabled) return;

    this.registry.register({
      name: this.serviceName,
      host: self.host,
      port: self.port,
      serviceType: 'config',
      version: '1.0',
      healthEndpoint: self.healthEndpoint,
      metadata: {
        config_dir: this.configStore.directory,
        capabilities: ['config_management', 'service_registry', 'coordination']
      }
    });
  }

  private notifyConfigUpdate(configName: string, updates: ConfigData): void {
    if (!configName.startsWith(SERVICE_CONFIG_PREFIX)) return;

    const serviceName = configName.slice(SERVICE_CONFIG_PREFIX.length);
    if (this.registry.get(serviceName)) {
      this.logger.coordinator(
        `Config update notification for service '${serviceName}': ${Object.keys(updates).join(', ')}`
      );
    }
  }
}
