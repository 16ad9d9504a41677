/**
 * Configuration file loader for procbridge.
 *
 * This module handles loading, validating and merging configuration.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { CONFIG_FILE_NAMES, RECONCILER, SHUTDOWN, WORKER_LOOP } from './constants.js';
import type { ConfigFileInfo, LoadedConfig, ProcBridgeConfig, ResolvedConfig } from './types.js';

const logger = createLogger('ConfigLoader');

const positiveInt = z.number().int().positive();

/**
 * Schema for procbridge.config.yaml. Unknown sections are rejected so typos
 * surface instead of silently falling back to defaults.
 */
export const configSchema = z
  .object({
    worker: z
      .object({
        pollTimeoutMs: positiveInt.optional(),
        drainOnClose: z.boolean().optional(),
        execArgv: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    reconciler: z.object({ pollTimeoutMs: positiveInt.optional() }).strict().optional(),
    shutdown: z.object({ closeTimeoutMs: positiveInt.optional() }).strict().optional(),
    logging: z
      .object({
        level: z.string().optional(),
        pretty: z.boolean().optional(),
        dir: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/**
 * Search paths for configuration files.
 */
function defaultSearchPaths(): string[] {
  return [process.cwd(), process.env.HOME || ''].filter(Boolean);
}

/**
 * Find the configuration file in the search paths.
 *
 * @returns ConfigFileInfo with path and existence status
 */
export function findConfigFile(searchPaths: string[] = defaultSearchPaths()): ConfigFileInfo {
  for (const searchPath of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(searchPath, fileName);
      if (existsSync(filePath)) {
        logger.debug({ filePath }, 'Found configuration file');
        return { path: filePath, exists: true };
      }
    }
  }

  logger.debug('No configuration file found, using defaults');
  return { path: '', exists: false };
}

/**
 * Load, parse and validate the configuration file.
 *
 * @param filePath - Path to the configuration file (optional, will search if not provided)
 */
export function loadConfigFile(filePath?: string): LoadedConfig {
  const fileInfo = filePath
    ? { path: resolve(filePath), exists: existsSync(resolve(filePath)) }
    : findConfigFile();

  if (!fileInfo.exists) {
    return { _fromFile: false };
  }

  try {
    const content = readFileSync(fileInfo.path, 'utf-8');
    const parsed: unknown = yaml.load(content);

    if (!parsed || typeof parsed !== 'object') {
      logger.warn({ path: fileInfo.path }, 'Configuration file is empty or invalid');
      return { _fromFile: false };
    }

    const result = configSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn(
        { path: fileInfo.path, issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
        'Configuration file failed validation, ignoring it'
      );
      return { _fromFile: false };
    }

    logger.info({ path: fileInfo.path, keys: Object.keys(result.data) }, 'Configuration file loaded');

    return {
      ...result.data,
      _source: fileInfo.path,
      _fromFile: true,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.warn({ path: fileInfo.path, error: errorMessage }, 'Failed to parse configuration file');
    return { _fromFile: false };
  }
}

/**
 * Strip loader metadata, leaving only configuration values.
 */
export function getConfigFromFile(fileConfig: LoadedConfig): ProcBridgeConfig {
  const { _source, _fromFile, ...config } = fileConfig;
  return config;
}

function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = positiveInt.safeParse(Number(raw));
  if (!parsed.success) {
    logger.warn({ name, value: raw }, 'Ignoring invalid numeric environment override');
    return undefined;
  }
  return parsed.data;
}

/**
 * Read the PROCBRIDGE_* environment overrides.
 */
export function getConfigFromEnv(): ProcBridgeConfig {
  const config: ProcBridgeConfig = {};
  const workerPoll = envInt('PROCBRIDGE_WORKER_POLL_MS');
  const reconcilerPoll = envInt('PROCBRIDGE_RECONCILER_POLL_MS');
  const closeTimeout = envInt('PROCBRIDGE_CLOSE_TIMEOUT_MS');

  if (workerPoll !== undefined) config.worker = { pollTimeoutMs: workerPoll };
  if (reconcilerPoll !== undefined) config.reconciler = { pollTimeoutMs: reconcilerPoll };
  if (closeTimeout !== undefined) config.shutdown = { closeTimeoutMs: closeTimeout };
  return config;
}

/**
 * Merge defaults, then each layer in order; later layers win field by field.
 *
 * @example
 * ```typescript
 * const config = resolveConfig(getConfigFromFile(loadConfigFile()), { worker: { drainOnClose: false } });
 * ```
 */
export function resolveConfig(...layers: ProcBridgeConfig[]): ResolvedConfig {
  const resolved: ResolvedConfig = {
    workerPollTimeoutMs: WORKER_LOOP.POLL_TIMEOUT_MS,
    drainOnClose: WORKER_LOOP.DRAIN_ON_CLOSE,
    workerExecArgv: [],
    reconcilerPollTimeoutMs: RECONCILER.POLL_TIMEOUT_MS,
    closeTimeoutMs: SHUTDOWN.CLOSE_TIMEOUT_MS,
  };

  for (const layer of layers) {
    resolved.workerPollTimeoutMs = layer.worker?.pollTimeoutMs ?? resolved.workerPollTimeoutMs;
    resolved.drainOnClose = layer.worker?.drainOnClose ?? resolved.drainOnClose;
    resolved.workerExecArgv = layer.worker?.execArgv ?? resolved.workerExecArgv;
    resolved.reconcilerPollTimeoutMs = layer.reconciler?.pollTimeoutMs ?? resolved.reconcilerPollTimeoutMs;
    resolved.closeTimeoutMs = layer.shutdown?.closeTimeoutMs ?? resolved.closeTimeoutMs;
  }

  return resolved;
}
