import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { z } from 'zod';
import { errorMessage } from '../common/errors';
import { ServiceRegistryOptions } from '../registry/ServiceRegistry';
import { FileConfigStoreOptions } from './FileConfigStore';

const positiveMs = z.number().positive();

const registrySectionSchema = z.object({
  /** Silence after which a service is stale (ms) */
  heartbeat_timeout: positiveMs.optional(),
  /** Heartbeat age reported as a health warning (ms) */
  warning_threshold: positiveMs.optional(),
  /** Background cleanup sweep period (ms) */
  cleanup_interval: positiveMs.optional()
}).strict();

const configStoreSectionSchema = z.object({
  directory: z.string().min(1).optional(),
  default_format: z.enum(['json', 'yaml']).optional(),
  max_cache_entries: z.number().int().positive().optional()
}).strict();

const selfRegistrationSectionSchema = z.object({
  enabled: z.boolean().optional(),
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  health_endpoint: z.string().optional()
}).strict();

const coordinationSectionSchema = z.object({
  name: z.string().min(1),
  environment: z.string().optional()
}).strict();

const overrideSchema = z.object({
  coordination: coordinationSectionSchema.partial().optional(),
  registry: registrySectionSchema.optional(),
  config_store: configStoreSectionSchema.optional(),
  self_registration: selfRegistrationSectionSchema.optional()
}).strict();

const settingsSchema = z.object({
  coordination: coordinationSectionSchema,
  registry: registrySectionSchema.optional(),
  config_store: configStoreSectionSchema.optional(),
  self_registration: selfRegistrationSectionSchema.optional(),
  /** Environment-specific overrides */
  environments: z.record(overrideSchema).optional()
}).strict();

/**
 * YAML settings schema for a coordination service
 */
export type CoordinationSettingsDocument = z.infer<typeof settingsSchema>;

export type CoordinationSettingsOverride = z.infer<typeof overrideSchema>;

export interface SelfRegistrationSettings {
  enabled: boolean;
  name: string;
  host: string;
  port: number;
  healthEndpoint: string;
}

export const DEFAULT_SETTINGS: CoordinationSettingsDocument = {
  coordination: {
    name: 'config-coordination',
    environment: 'development'
  },
  registry: {
    heartbeat_timeout: 300000,
    warning_threshold: 120000,
    cleanup_interval: 60000
  },
  config_store: {
    directory: 'config',
    default_format: 'json',
    max_cache_entries: 100
  },
  self_registration: {
    enabled: true,
    host: 'localhost',
    port: 8080,
    health_endpoint: '/health'
  }
};

/**
 * Loader for the coordination service's own settings file.
 * Emits `settings-loaded`, `settings-saved` and `settings-error`.
 */
export class CoordinationSettings extends EventEmitter {
  // Document as loaded; `settings` is it with the current environment's overrides applied
  private baseSettings: CoordinationSettingsDocument | null = null;
  private settings: CoordinationSettingsDocument | null = null;
  private settingsPath: string | null = null;
  private currentEnvironment: string;

  constructor(environment: string = 'development') {
    super();
    this.currentEnvironment = environment;
  }

  /**
   * Load settings from a YAML file
   */
  async loadFromFile(filePath: string): Promise<void> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      this.baseSettings = this.parseFromYaml(yamlContent);
      this.settingsPath = filePath;

      this.applyEnvironmentOverrides();

      this.emit('settings-loaded', { filePath, settings: this.settings });
    } catch (error) {
      this.emit('settings-error', { filePath, error });
      throw new Error(`Failed to load coordination settings from ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Parse and validate YAML content
   */
  parseFromYaml(yamlContent: string): CoordinationSettingsDocument {
    let raw: unknown;
    try {
      raw = yaml.load(yamlContent);
    } catch (error) {
      throw new Error(`Failed to parse coordination settings: ${errorMessage(error)}`, { cause: error });
    }

    const result = settingsSchema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'settings';
      throw new Error(`Failed to parse coordination settings: ${where}: ${issue?.message ?? 'invalid document'}`);
    }
    return result.data;
  }

  /**
   * Use an in-memory document instead of a file
   */
  useSettings(settings: CoordinationSettingsDocument): void {
    this.baseSettings = settings;
    this.settingsPath = null;
    this.applyEnvironmentOverrides();
  }

  /**
   * Write the document as loaded, environments included, without the active overrides baked in
   */
  async saveToFile(filePath: string): Promise<void> {
    if (!this.baseSettings) {
      throw new Error('No settings to save');
    }

    try {
      const yamlContent = yaml.dump(this.baseSettings, {
        indent: 2,
        lineWidth: 100,
        quotingType: '"',
        forceQuotes: false
      });

      await fs.writeFile(filePath, yamlContent, 'utf8');
      this.emit('settings-saved', { filePath });
    } catch (error) {
      this.emit('settings-error', { filePath, error });
      throw new Error(`Failed to save coordination settings to ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Registry options, falling back to defaults for unset keys
   */
  toRegistryOptions(): ServiceRegistryOptions {
    const registry = { ...DEFAULT_SETTINGS.registry, ...this.settings?.registry };
    return {
      heartbeatTimeoutMs: registry.heartbeat_timeout,
      warningThresholdMs: registry.warning_threshold,
      cleanupIntervalMs: registry.cleanup_interval
    };
  }

  toConfigStoreOptions(): FileConfigStoreOptions {
    const store = { ...DEFAULT_SETTINGS.config_store, ...this.settings?.config_store };
    return {
      directory: store.directory,
      defaultFormat: store.default_format,
      maxCacheEntries: store.max_cache_entries
    };
  }

  getSelfRegistration(): SelfRegistrationSettings {
    const self = { ...DEFAULT_SETTINGS.self_registration, ...this.settings?.self_registration };
    return {
      enabled: self.enabled ?? true,
      name: this.getServiceName(),
      host: self.host ?? 'localhost',
      port: self.port ?? 8080,
      healthEndpoint: self.health_endpoint ?? '/health'
    };
  }

  getServiceName(): string {
    return this.settings?.coordination.name ?? DEFAULT_SETTINGS.coordination.name;
  }

  getEnvironment(): string {
    return this.currentEnvironment;
  }

  getSettings(): CoordinationSettingsDocument | null {
    return this.settings;
  }

  getSettingsPath(): string | null {
    return this.settingsPath;
  }

  /**
   * Set environment for settings overrides
   */
  setEnvironment(environment: string): void {
    this.currentEnvironment = environment;
    this.applyEnvironmentOverrides();
  }

  static defaults(): CoordinationSettingsDocument {
    return structuredClone(DEFAULT_SETTINGS);
  }

  /**
   * Merge settings with precedence (override wins per key)
   */
  static mergeSettings(
    base: CoordinationSettingsDocument,
    override: CoordinationSettingsOverride
  ): CoordinationSettingsDocument {
    return {
      coordination: { ...base.coordination, ...override.coordination },
      registry: { ...base.registry, ...override.registry },
      config_store: { ...base.config_store, ...override.config_store },
      self_registration: { ...base.self_registration, ...override.self_registration },
      environments: base.environments
    };
  }

  /**
   * Derive the effective settings from the loaded document and the current environment
   */
  private applyEnvironmentOverrides(): void {
    if (!this.baseSettings) {
      this.settings = null;
      return;
    }

    const envOverrides = this.baseSettings.environments?.[this.currentEnvironment];
    this.settings = envOverrides
      ? CoordinationSettings.mergeSettings(this.baseSettings, envOverrides)
      : this.baseSettings;
  }
}
