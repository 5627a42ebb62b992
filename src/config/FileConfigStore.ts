import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import * as path from 'path';
import { EventEmitter } from 'eventemitter3';
import { Clock, systemClock } from '../common/Clock';
import { ConfigIOError, errorCode, errorMessage, InvalidArgumentError, NotFoundError } from '../common/errors';
import { cloneJson, isJsonObject, JsonObject, jsonObjectSchema } from '../common/json';
import { defaultLogger, FrameworkLogger } from '../common/logger';

export type ConfigFormat = 'json' | 'yaml';

export type ConfigData = JsonObject;

export interface FileConfigStoreOptions {
  directory?: string;
  defaultFormat?: ConfigFormat;
  maxCacheEntries?: number;
  clock?: Clock;
  logger?: FrameworkLogger;
}

export interface ConfigInfo {
  name: string;
  filePath: string;
  format: ConfigFormat;
  fileSize: number;
  modifiedTime: number;
  metadata: JsonObject;
  keys: string[];
}

export interface CacheStats {
  size: number;
  maxEntries: number;
  hits: number;
  misses: number;
}

export interface ConfigStoreEvents {
  'config:saved': (name: string, filePath: string, data: ConfigData) => void;
  'config:deleted': (name: string) => void;
}

export type BatchOperation =
  | { op: 'save'; name: string; data: ConfigData; format?: ConfigFormat }
  | { op: 'load'; name: string }
  | { op: 'delete'; name: string; createBackup?: boolean };

export interface BatchResult {
  operationsExecuted: number;
  errors: string[];
  loadedConfigs: Record<string, ConfigData>;
}

export const CONFIG_METADATA_KEY = '_metadata';
const CONFIG_VERSION = '1.0';
const CONFIG_NAME_PATTERN = /^[A-Za-z0-9_.-]+$/;
const EXTENSIONS: ReadonlyArray<{ ext: string; format: ConfigFormat }> = [
  { ext: '.json', format: 'json' },
  { ext: '.yaml', format: 'yaml' },
  { ext: '.yml', format: 'yaml' }
];

/**
 * File-backed configuration store with JSON and YAML support.
 *
 * Each configuration lives in `<directory>/<name>.<ext>`. Reads go through an
 * LRU cache; writes are serialized and land atomically via temp file + rename.
 */
export class FileConfigStore extends EventEmitter<ConfigStoreEvents> {
  readonly directory: string;
  readonly defaultFormat: ConfigFormat;
  private readonly maxCacheEntries: number;
  private readonly clock: Clock;
  private readonly logger: FrameworkLogger;
  private cache = new Map<string, ConfigData>();
  private cacheHits = 0;
  private cacheMisses = 0;
  // Bumped whenever a write or delete lands; reads only cache if it did not move
  private writeGenerations = new Map<string, number>();
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(options: FileConfigStoreOptions = {}) {
    super();
    this.directory = path.resolve(options.directory ?? 'config');
    this.defaultFormat = options.defaultFormat ?? 'json';
    this.maxCacheEntries = options.maxCacheEntries ?? 100;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;

    if (!Number.isInteger(this.maxCacheEntries) || this.maxCacheEntries < 1) {
      throw new InvalidArgumentError(`maxCacheEntries must be a positive integer, got ${this.maxCacheEntries}`);
    }
  }

  /**
   * Save a configuration, stamping `_metadata`. Returns the written file path.
   */
  async save(name: string, data: ConfigData, format?: ConfigFormat): Promise<string> {
    validateConfigName(name);
    return this.enqueue(() => this.writeConfig(name, data, format ?? this.defaultFormat));
  }

  async load(name: string, options: { useCache?: boolean } = {}): Promise<ConfigData> {
    validateConfigName(name);
    const useCache = options.useCache ?? true;

    if (useCache) {
      const cached = this.cacheGet(name);
      if (cached) {
        return cloneJson(cached);
      }
    }

    const generation = this.writeGeneration(name);
    const located = await this.locate(name);
    if (!located) {
      throw new NotFoundError('Configuration', name);
    }

    const data = await this.readConfigFile(name, located.filePath, located.format);
    if (this.writeGeneration(name) === generation) {
      this.cacheSet(name, data);
    }
    return cloneJson(data);
  }

  /**
   * Shallow-merge `updates` into a configuration, creating it when missing.
   * Keeps the format of the existing file.
   */
  async update(name: string, updates: ConfigData, options: { createBackup?: boolean } = {}): Promise<string> {
    validateConfigName(name);
    const createBackup = options.createBackup ?? true;

    return this.enqueue(async () => {
      const located = await this.locate(name);
      const existing = located ? await this.readConfigFile(name, located.filePath, located.format) : {};

      if (createBackup && Object.keys(existing).length > 0) {
        await this.writeConfig(`${name}_backup_${this.timestampSuffix()}`, existing, located?.format ?? this.defaultFormat);
      }

      const existingMetadata = existing[CONFIG_METADATA_KEY];
      const merged: ConfigData = {
        ...existing,
        ...updates,
        [CONFIG_METADATA_KEY]: {
          ...(isJsonObject(existingMetadata) ? existingMetadata : {}),
          updated: this.isoNow()
        }
      };

      return this.writeConfig(name, merged, located?.format ?? this.defaultFormat);
    });
  }

  /**
   * Delete a configuration. Returns false when it did not exist.
   */
  async delete(name: string, options: { createBackup?: boolean } = {}): Promise<boolean> {
    validateConfigName(name);
    const createBackup = options.createBackup ?? true;

    return this.enqueue(async () => {
      const located = await this.locate(name);
      if (!located) {
        this.cache.delete(name);
        return false;
      }

      if (createBackup) {
        const existing = await this.readConfigFile(name, located.filePath, located.format);
        await this.writeConfig(`${name}_deleted_${this.timestampSuffix()}`, existing, located.format);
      }

      await this.removeFiles(name);
      this.bumpWriteGeneration(name);
      this.cache.delete(name);
      this.logger.store(`Deleted configuration ${name}`);
      this.emit('config:deleted', name);
      return true;
    });
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new ConfigIOError(`Failed to list configurations in ${this.directory}: ${errorMessage(error)}`, error);
    }

    const names = new Set<string>();
    for (const entry of entries) {
      const match = EXTENSIONS.find(({ ext }) => entry.endsWith(ext));
      if (match) {
        names.add(entry.slice(0, -match.ext.length));
      }
    }
    return Array.from(names).sort();
  }

  async info(name: string): Promise<ConfigInfo> {
    const data = await this.load(name);
    const located = await this.locate(name);
    if (!located) {
      throw new NotFoundError('Configuration', name);
    }

    const stats = await fs.stat(located.filePath);
    const metadata = data[CONFIG_METADATA_KEY];
    return {
      name,
      filePath: located.filePath,
      format: located.format,
      fileSize: stats.size,
      modifiedTime: stats.mtimeMs,
      metadata: isJsonObject(metadata) ? metadata : {},
      keys: Object.keys(data)
    };
  }

  /**
   * Write every configuration into one JSON document keyed by name.
   * Configurations that fail to load are logged and skipped.
   */
  async exportAll(outputFile: string): Promise<string> {
    const all = new Map<string, ConfigData>();
    for (const name of await this.list()) {
      try {
        all.set(name, await this.load(name));
      } catch (error) {
        this.logger.warn(`Skipping configuration ${name} during export: ${errorMessage(error)}`);
      }
    }

    try {
      await writeFileAtomic(outputFile, JSON.stringify(Object.fromEntries(all), null, 2));
    } catch (error) {
      throw new ConfigIOError(`Failed to export configurations to ${outputFile}: ${errorMessage(error)}`, error);
    }
    return outputFile;
  }

  /**
   * Load several configurations at once. Missing or unreadable ones are
   * logged and left out of the result.
   */
  async bulkLoad(names: string[]): Promise<Record<string, ConfigData>> {
    const result = await this.runBatch(names.map((name): BatchOperation => ({ op: 'load', name })));
    for (const error of result.errors) {
      this.logger.warn(`Bulk load skipped ${error}`);
    }
    return result.loadedConfigs;
  }

  /**
   * Run operations in order. A failing operation is reported in `errors`
   * and does not stop the ones after it.
   */
  async runBatch(operations: BatchOperation[]): Promise<BatchResult> {
    const loaded = new Map<string, ConfigData>();
    const errors: string[] = [];
    let operationsExecuted = 0;

    for (const operation of operations) {
      try {
        switch (operation.op) {
          case 'save':
            await this.save(operation.name, operation.data, operation.format);
            break;
          case 'load':
            loaded.set(operation.name, await this.load(operation.name));
            break;
          case 'delete':
            if (!(await this.delete(operation.name, { createBackup: operation.createBackup }))) {
              throw new NotFoundError('Configuration', operation.name);
            }
            break;
        }
        operationsExecuted++;
      } catch (error) {
        errors.push(`${operation.op} ${operation.name}: ${errorMessage(error)}`);
      }
    }

    return { operationsExecuted, errors, loadedConfigs: Object.fromEntries(loaded) };
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): CacheStats {
    return {
      size: this.cache.size,
      maxEntries: this.maxCacheEntries,
      hits: this.cacheHits,
      misses: this.cacheMisses
    };
  }

  private async writeConfig(name: string, data: ConfigData, format: ConfigFormat): Promise<string> {
    const existingMetadata = data[CONFIG_METADATA_KEY];
    const payload: ConfigData = {
      ...cloneJson(data),
      [CONFIG_METADATA_KEY]: {
        ...(isJsonObject(existingMetadata) ? cloneJson(existingMetadata) : {}),
        created: this.isoNow(),
        version: CONFIG_VERSION,
        format
      }
    };

    const filePath = path.join(this.directory, `${name}.${format === 'yaml' ? 'yaml' : 'json'}`);
    const content = format === 'yaml'
      ? yaml.dump(payload, { schema: yaml.CORE_SCHEMA, indent: 2, lineWidth: 100, noRefs: true })
      : JSON.stringify(payload, null, 2);

    try {
      await fs.mkdir(this.directory, { recursive: true });
      // A name lives in exactly one file; drop copies under other extensions
      await this.removeFiles(name, filePath);
      await writeFileAtomic(filePath, content);
    } catch (error) {
      throw new ConfigIOError(`Failed to save configuration ${name} to ${filePath}: ${errorMessage(error)}`, error);
    }

    this.bumpWriteGeneration(name);
    this.cacheSet(name, payload);
    this.logger.store(`Saved configuration ${name} (${format}) to ${filePath}`);
    this.emit('config:saved', name, filePath, cloneJson(payload));
    return filePath;
  }

  private async readConfigFile(name: string, filePath: string, format: ConfigFormat): Promise<ConfigData> {
    let parsed: unknown;
    try {
      const content = await fs.readFile(filePath, 'utf8');
      parsed = format === 'yaml' ? yaml.load(content, { schema: yaml.CORE_SCHEMA }) : JSON.parse(content);
    } catch (error) {
      throw new ConfigIOError(`Failed to load configuration ${name} from ${filePath}: ${errorMessage(error)}`, error);
    }

    const result = jsonObjectSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw new ConfigIOError(`Failed to load configuration ${name} from ${filePath}: top level must be a mapping`);
    }
    return result.data;
  }

  private async locate(name: string): Promise<{ filePath: string; format: ConfigFormat } | undefined> {
    for (const { ext, format } of EXTENSIONS) {
      const filePath = path.join(this.directory, `${name}${ext}`);
      try {
        await fs.access(filePath);
        return { filePath, format };
      } catch (error) {
        if (!isMissingFile(error)) {
          throw new ConfigIOError(`Failed to access ${filePath}: ${errorMessage(error)}`, error);
        }
      }
    }
    return undefined;
  }

  private async removeFiles(name: string, keep?: string): Promise<void> {
    for (const { ext } of EXTENSIONS) {
      const filePath = path.join(this.directory, `${name}${ext}`);
      if (filePath === keep) continue;
      try {
        await fs.unlink(filePath);
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
      }
    }
  }

  private cacheGet(name: string): ConfigData | undefined {
    const cached = this.cache.get(name);
    if (!cached) {
      this.cacheMisses++;
      return undefined;
    }
    // Refresh recency
    this.cache.delete(name);
    this.cache.set(name, cached);
    this.cacheHits++;
    return cached;
  }

  private cacheSet(name: string, data: ConfigData): void {
    this.cache.delete(name);
    this.cache.set(name, data);
    while (this.cache.size > this.maxCacheEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }

  private writeGeneration(name: string): number {
    return this.writeGenerations.get(name) ?? 0;
  }

  private bumpWriteGeneration(name: string): void {
    this.writeGenerations.set(name, this.writeGeneration(name) + 1);
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task, task);
    this.writeQueue = run.then(() => undefined, () => undefined);
    return run;
  }

  private isoNow(): string {
    return new Date(this.clock.now()).toISOString();
  }

  private timestampSuffix(): string {
    // YYYYMMDD_HHMMSS in UTC
    const iso = new Date(this.clock.now()).toISOString();
    return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
  }
}

export function isValidConfigName(name: string): boolean {
  return typeof name === 'string' && CONFIG_NAME_PATTERN.test(name) && name !== '.' && name !== '..';
}

export function validateConfigName(name: string): void {
  if (!isValidConfigName(name)) {
    throw new InvalidArgumentError(`Invalid configuration name '${name}': use letters, digits, '_', '-' or '.'`);
  }
}

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  try {
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

function isMissingFile(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}
