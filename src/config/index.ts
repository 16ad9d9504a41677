/**
 * Configuration management for procbridge.
 *
 * Settings come from procbridge.config.yaml (if present), then the
 * PROCBRIDGE_* environment variables, then per-spawn overrides.
 */
import type { Logger } from 'pino';
import { createLogger, initLogger, parseLogLevel } from '../utils/logger.js';
import { loadConfigFile, getConfigFromFile, getConfigFromEnv, resolveConfig } from './loader.js';
import type { LoggingConfig, ProcBridgeConfig, ResolvedConfig, SpawnConfig } from './types.js';

// Export constants and types
export * from './constants.js';
export * from './types.js';
export * from './loader.js';

const logger = createLogger('Config');

// Load configuration file
const fileConfig = loadConfigFile();
const fileConfigOnly = getConfigFromFile(fileConfig);

/**
 * Application configuration class with static properties.
 */
export class Config {
  // Configuration file metadata
  static readonly CONFIG_LOADED = fileConfig._fromFile;
  static readonly CONFIG_SOURCE = fileConfig._source;

  // Logging configuration
  static readonly LOG_LEVEL = process.env.LOG_LEVEL || fileConfigOnly.logging?.level;
  static readonly LOG_PRETTY = fileConfigOnly.logging?.pretty;
  static readonly LOG_DIR = fileConfigOnly.logging?.dir;

  /**
   * Get the raw configuration object.
   *
   * @returns Configuration from file, without environment overrides
   */
  static getRawConfig(): ProcBridgeConfig {
    return fileConfigOnly;
  }

  /**
   * Resolve the settings for one Manager.
   *
   * @param overrides - Per-spawn settings; these win over file and environment
   */
  static resolve(overrides: SpawnConfig = {}): ResolvedConfig {
    const resolved = resolveConfig(fileConfigOnly, getConfigFromEnv(), overrides);
    logger.trace({ resolved, source: this.CONFIG_LOADED ? this.CONFIG_SOURCE : 'defaults' }, 'Resolved configuration');
    return resolved;
  }

  /**
   * Get logging configuration.
   */
  static getLoggingConfig(): LoggingConfig {
    return {
      level: this.LOG_LEVEL,
      pretty: this.LOG_PRETTY,
      dir: this.LOG_DIR,
    };
  }

  /**
   * Build the process's root logger from the logging section.
   *
   * Forked workers call this on start; a controller application calls it
   * once before spawning, the way it would call initLogger().
   */
  static initLogging(metadata?: Record<string, unknown>): Promise<Logger> {
    const logging = this.getLoggingConfig();
    return initLogger({
      level: parseLogLevel(logging.level),
      prettyPrint: logging.pretty,
      logDir: logging.dir,
      metadata,
    });
  }
}
