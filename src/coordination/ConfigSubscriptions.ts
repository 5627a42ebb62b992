import { Clock, systemClock } from '../common/Clock';
import { errorMessage, InvalidArgumentError } from '../common/errors';
import { cloneJson } from '../common/json';
import { defaultLogger, FrameworkLogger } from '../common/logger';
import { matchesAnyPattern } from '../common/utils';
import { ConfigData, FileConfigStore } from '../config/FileConfigStore';

export type ConfigChangeType = 'saved' | 'deleted';

export interface ConfigChangeEvent {
  configName: string;
  changeType: ConfigChangeType;
  /** Epoch ms */
  changedAt: number;
}

/**
 * `data` is the stored content for saves, undefined for deletes
 */
export type ConfigChangeCallback = (event: ConfigChangeEvent, data: ConfigData | undefined) => void;

export interface ConfigSubscription {
  subscriberId: string;
  patterns: string[];
  createdAt: number;
  lastNotifiedAt?: number;
}

export interface ChangelogQuery {
  configName?: string;
  /** Only changes strictly after this epoch ms */
  since?: number;
  limit?: number;
}

export interface ConfigSubscriptionsOptions {
  maxChangelogEntries?: number;
  clock?: Clock;
  logger?: FrameworkLogger;
}

interface SubscriptionEntry extends ConfigSubscription {
  callback: ConfigChangeCallback;
}

/**
 * Pattern subscriptions over config store changes, plus a bounded changelog.
 */
export class ConfigSubscriptions {
  private readonly maxChangelogEntries: number;
  private readonly clock: Clock;
  private readonly logger: FrameworkLogger;
  private subscriptions = new Map<string, SubscriptionEntry>();
  private changelog: ConfigChangeEvent[] = [];
  private readonly onSaved = (name: string, _filePath: string, data: ConfigData): void => {
    this.publish({ configName: name, changeType: 'saved', changedAt: this.clock.now() }, data);
  };
  private readonly onDeleted = (name: string): void => {
    this.publish({ configName: name, changeType: 'deleted', changedAt: this.clock.now() }, undefined);
  };

  constructor(private readonly store: FileConfigStore, options: ConfigSubscriptionsOptions = {}) {
    this.maxChangelogEntries = options.maxChangelogEntries ?? 1000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;

    this.store.on('config:saved', this.onSaved);
    this.store.on('config:deleted', this.onDeleted);
  }

  detach(): void {
    this.store.off('config:saved', this.onSaved);
    this.store.off('config:deleted', this.onDeleted);
  }

  /**
   * Subscribe to changes of configs whose names match any of `patterns`
   * (`*` and `?` wildcards). Re-subscribing an id replaces it.
   */
  subscribe(subscriberId: string, patterns: string[], callback: ConfigChangeCallback): ConfigSubscription {
    if (subscriberId.trim() === '') {
      throw new InvalidArgumentError('Subscriber id is required');
    }
    if (patterns.length === 0) {
      throw new InvalidArgumentError(`Subscriber ${subscriberId}: at least one pattern is required`);
    }

    const entry: SubscriptionEntry = {
      subscriberId,
      patterns: [...patterns],
      createdAt: this.clock.now(),
      callback
    };
    this.subscriptions.set(subscriberId, entry);
    this.logger.coordinator(`Subscriber ${subscriberId} watching ${patterns.join(', ')}`);
    return toSubscription(entry);
  }

  unsubscribe(subscriberId: string): boolean {
    return this.subscriptions.delete(subscriberId);
  }

  getSubscriptions(): ConfigSubscription[] {
    return Array.from(this.subscriptions.values(), toSubscription);
  }

  /**
   * Recorded changes, newest first
   */
  getChangelog(query: ChangelogQuery = {}): ConfigChangeEvent[] {
    const limit = query.limit ?? 100;
    const matching = this.changelog.filter(event =>
      (query.configName === undefined || event.configName === query.configName) &&
      (query.since === undefined || event.changedAt > query.since)
    );
    return matching.reverse().slice(0, Math.max(0, limit)).map(event => ({ ...event }));
  }

  private publish(event: ConfigChangeEvent, data: ConfigData | undefined): void {
    this.changelog.push(event);
    if (this.changelog.length > this.maxChangelogEntries) {
      this.changelog.splice(0, this.changelog.length - this.maxChangelogEntries);
    }

    for (const subscription of this.subscriptions.values()) {
      if (!matchesAnyPattern(event.configName, subscription.patterns)) continue;

      subscription.lastNotifiedAt = event.changedAt;
      try {
        subscription.callback({ ...event }, data === undefined ? undefined : cloneJson(data));
      } catch (error) {
        this.logger.warn(
          `Subscriber ${subscription.subscriberId} failed on ${event.changeType} of ${event.configName}: ${errorMessage(error)}`
        );
      }
    }
  }
}

function toSubscription(entry: SubscriptionEntry): ConfigSubscription {
  const { callback: _callback, ...subscription } = entry;
  return { ...subscription, patterns: [...subscription.patterns] };
}
