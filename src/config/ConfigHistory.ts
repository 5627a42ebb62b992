import { Clock, systemClock } from '../common/Clock';
import { InvalidArgumentError, NotFoundError } from '../common/errors';
import { cloneJson } from '../common/json';
import { defaultLogger, FrameworkLogger } from '../common/logger';
import { ConfigData, FileConfigStore } from './FileConfigStore';
import { ConfigDiff, configChecksum, diffConfigs, stripMetadata } from './transforms';

export interface ConfigHistoryEntry {
  /** Per-name sequence number, starting at 1 */
  version: number;
  timestamp: string;
  /** sha256 of the content with sorted keys */
  checksum: string;
  config: ConfigData;
}

export interface ConfigHistoryOptions {
  maxEntries?: number;
  clock?: Clock;
  logger?: FrameworkLogger;
}

/**
 * In-memory version history of every configuration the store saves.
 *
 * Entries hold the content without `_metadata`. Each name keeps at most
 * `maxEntries` versions; the oldest fall off first. History survives a
 * delete, so a deleted configuration can be restored from it.
 */
export class ConfigHistory {
  private readonly maxEntries: number;
  private readonly clock: Clock;
  private readonly logger: FrameworkLogger;
  private entries = new Map<string, ConfigHistoryEntry[]>();
  private lastVersions = new Map<string, number>();
  private readonly onSaved = (name: string, _filePath: string, data: ConfigData): void => {
    this.record(name, data);
  };

  constructor(private readonly store: FileConfigStore, options: ConfigHistoryOptions = {}) {
    this.maxEntries = options.maxEntries ?? 50;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;

    if (!Number.isInteger(this.maxEntries) || this.maxEntries < 1) {
      throw new InvalidArgumentError(`maxEntries must be a positive integer, got ${this.maxEntries}`);
    }

    this.store.on('config:saved', this.onSaved);
  }

  /**
   * Stop recording saves
   */
  detach(): void {
    this.store.off('config:saved', this.onSaved);
  }

  record(name: string, data: ConfigData): ConfigHistoryEntry {
    const config = stripMetadata(data);
    const version = (this.lastVersions.get(name) ?? 0) + 1;
    const entry: ConfigHistoryEntry = {
      version,
      timestamp: new Date(this.clock.now()).toISOString(),
      checksum: configChecksum(config),
      config
    };

    const list = this.entries.get(name) ?? [];
    list.push(entry);
    if (list.length > this.maxEntries) {
      list.splice(0, list.length - this.maxEntries);
    }
    this.entries.set(name, list);
    this.lastVersions.set(name, version);

    this.logger.debug(`Recorded version ${version} of ${name}`);
    return copyEntry(entry);
  }

  /**
   * The most recent `limit` versions, oldest first
   */
  getHistory(name: string, limit: number = 10): ConfigHistoryEntry[] {
    if (limit <= 0) return [];
    const list = this.entries.get(name) ?? [];
    return list.slice(-limit).map(copyEntry);
  }

  getVersion(name: string, version: number): ConfigHistoryEntry | undefined {
    const entry = this.entries.get(name)?.find(candidate => candidate.version === version);
    return entry ? copyEntry(entry) : undefined;
  }

  requireVersion(name: string, version: number): ConfigHistoryEntry {
    const entry = this.getVersion(name, version);
    if (!entry) {
      throw new NotFoundError('Configuration version', `${name}@${version}`);
    }
    return entry;
  }

  /**
   * What changed going from version `from` to version `to`
   */
  diff(name: string, from: number, to: number): ConfigDiff {
    return diffConfigs(this.requireVersion(name, from).config, this.requireVersion(name, to).config);
  }

  clear(name?: string): void {
    if (name === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(name);
    }
  }
}

function copyEntry(entry: ConfigHistoryEntry): ConfigHistoryEntry {
  return { ...entry, config: cloneJson(entry.config) };
}
