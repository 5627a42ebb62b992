/**
 * Logging utility for the coordination service
 * Provides per-component logging that stays quiet under test runners
 */

export interface LoggingConfig {
  enableRegistryLogs?: boolean;
  enableConfigLogs?: boolean;
  enableCoordinatorLogs?: boolean;
  enableTestMode?: boolean;
}

export class FrameworkLogger {
  private config: LoggingConfig;

  constructor(config: LoggingConfig = {}) {
    this.config = { ...config };
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Log service registry messages
   */
  registry(message: string, ...args: unknown[]): void {
    if (this.config.enableRegistryLogs && !this.config.enableTestMode) {
      console.log(`[REGISTRY] ${message}`, ...args);
    }
  }

  /**
   * Log configuration store messages
   */
  store(message: string, ...args: unknown[]): void {
    if (this.config.enableConfigLogs && !this.config.enableTestMode) {
      console.log(`[CONFIG] ${message}`, ...args);
    }
  }

  /**
   * Log coordinator-specific messages
   */
  coordinator(message: string, ...args: unknown[]): void {
    if (this.config.enableCoordinatorLogs && !this.config.enableTestMode) {
      console.log(`[COORDINATOR] ${message}`, ...args);
    }
  }

  /**
   * Log error messages (always shown unless in test mode)
   */
  error(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  }

  /**
   * Log warning messages (always shown unless in test mode)
   */
  warn(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  }

  /**
   * Log debug messages (only in development)
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development' && !this.config.enableTestMode) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): FrameworkLogger {
  return new FrameworkLogger(config);
}

/**
 * Shared fallback for components constructed without a logger
 */
export const defaultLogger = new FrameworkLogger({
  enableRegistryLogs: true,
  enableConfigLogs: true,
  enableCoordinatorLogs: true
});
