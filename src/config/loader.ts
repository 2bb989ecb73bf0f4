/**
 * Configuration Loader
 *
 * Loads provisioner.yaml, applies environment-specific overrides, validates
 * the result and converts it into the camelCase options components consume.
 */

import { readFileSync, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import { ProvisionerError } from '../api/errors.js';
import { CapabilityType } from '../types/capability.js';
import {
  ProvisionerConfigSchema,
  type ProvisionerConfig,
  type ProvisionerConfigInput,
  type RegistryFailurePolicy,
} from '../types/schemas/config.js';
import { CONFIG_PATH_ENV, DEFAULT_CONFIG, DEFAULT_CONFIG_RELATIVE_PATH } from './defaults.js';

export type ConfigEnvironment = 'production' | 'development' | 'test';

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[]
    ? T[K]
    : T[K] extends object
      ? DeepPartial<T[K]>
      : T[K];
};

/**
 * Runtime options derived from ProvisionerConfig
 */
export interface ProvisionerOptions {
  service: {
    label: string;
    labelKey: string;
    image: string;
    hostPort: number;
    containerPort: number;
    /** Absolute host path (`~` expanded) */
    modelCacheDir: string;
    containerCacheDir: string;
    startupTimeoutMs: number;
    env: Record<string, string>;
  };
  health: {
    path: string;
    intervalMs: number;
    requestTimeoutMs: number;
  };
  http: {
    registryTimeoutMs: number;
    listingTimeoutMs: number;
    loadTimeoutMs: number;
  };
  registry: {
    failurePolicy: RegistryFailurePolicy;
  };
  readiness: ReadinessOptions;
  provisioning: {
    parallel: boolean;
    officialModelPrefixes: string[];
  };
  properties: {
    baseUrlKey: string;
    apiKeyKey: string;
  };
}

export interface ReadinessOptions {
  maxWaitMs: number;
  pollIntervalMs: number;
  pollRequestTimeoutMs: number;
  settleMs: Record<CapabilityType, number>;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects; arrays and scalars from source replace target values
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

/**
 * Expand a leading `~` to the user's home directory
 */
export function expandHome(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Validate a merged raw configuration object
 */
export function validateConfig(raw: unknown): ProvisionerConfig {
  const parseResult = ProvisionerConfigSchema.safeParse(raw);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${field} ${issue.message}`;
    });

    throw new ProvisionerError('ConfigError', `Configuration validation failed:\n${errors.join('\n')}`, {
      issues: errors,
    });
  }
  return parseResult.data;
}

/**
 * Build a validated configuration from the defaults plus overrides, no file I/O.
 */
export function buildConfig(overrides: DeepPartial<ProvisionerConfigInput> = {}): ProvisionerConfig {
  return validateConfig(deepMerge(DEFAULT_CONFIG, overrides));
}

function selectEnvironment(raw: PlainObject, env: string): PlainObject | undefined {
  const environments = raw.environments;
  if (!isPlainObject(environments)) {
    return undefined;
  }
  const selected = environments[env];
  return isPlainObject(selected) ? selected : undefined;
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(configPath?: string, environment?: ConfigEnvironment): ProvisionerConfig {
  const finalPath =
    configPath ?? process.env[CONFIG_PATH_ENV] ?? join(findPackageRoot(), DEFAULT_CONFIG_RELATIVE_PATH);

  let fileContents: string;
  try {
    fileContents = readFileSync(finalPath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ProvisionerError(
        'ConfigError',
        `Configuration file not found: ${finalPath}. ` +
          `Set ${CONFIG_PATH_ENV} or create ${DEFAULT_CONFIG_RELATIVE_PATH} in the project root.`,
        { path: finalPath }
      );
    }
    throw new ProvisionerError('ConfigError', `Failed to read configuration: ${String(error)}`, {
      path: finalPath,
    });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(fileContents);
  } catch (error) {
    throw new ProvisionerError('ConfigError', `Failed to parse configuration ${finalPath}: ${String(error)}`, {
      path: finalPath,
    });
  }

  const fileConfig = isPlainObject(parsed) ? parsed : {};
  const env = environment ?? process.env.NODE_ENV ?? 'development';

  let merged = deepMerge(DEFAULT_CONFIG, fileConfig);
  const envOverrides = selectEnvironment(fileConfig, env);
  if (envOverrides) {
    merged = deepMerge(merged, envOverrides);
  }
  delete merged.environments;

  return validateConfig(merged);
}

/**
 * Convert YAML config (snake_case) to ProvisionerOptions (camelCase)
 */
export function toProvisionerOptions(config: ProvisionerConfig): ProvisionerOptions {
  return {
    service: {
      label: config.service.label,
      labelKey: config.service.label_key,
      image: config.service.image,
      hostPort: config.service.host_port,
      containerPort: config.service.container_port,
      modelCacheDir: expandHome(config.service.model_cache_dir),
      containerCacheDir: config.service.container_cache_dir,
      startupTimeoutMs: config.service.startup_timeout_ms,
      env: { ...config.service.env },
    },
    health: {
      path: config.health.path,
      intervalMs: config.health.interval_ms,
      requestTimeoutMs: config.health.request_timeout_ms,
    },
    http: {
      registryTimeoutMs: config.http.registry_timeout_ms,
      listingTimeoutMs: config.http.listing_timeout_ms,
      loadTimeoutMs: config.http.load_timeout_ms,
    },
    registry: {
      failurePolicy: config.registry.failure_policy,
    },
    readiness: {
      maxWaitMs: config.readiness.max_wait_ms,
      pollIntervalMs: config.readiness.poll_interval_ms,
      pollRequestTimeoutMs: config.readiness.poll_request_timeout_ms,
      settleMs: {
        [CapabilityType.SPEECH_TO_TEXT]: config.readiness.settle_ms.speech_to_text,
        [CapabilityType.TEXT_TO_SPEECH]: config.readiness.settle_ms.text_to_speech,
        [CapabilityType.EMBEDDING]: config.readiness.settle_ms.embedding,
      },
    },
    provisioning: {
      parallel: config.provisioning.parallel,
      officialModelPrefixes: [...config.provisioning.official_model_prefixes],
    },
    properties: {
      baseUrlKey: config.properties.base_url_key,
      apiKeyKey: config.properties.api_key_key,
    },
  };
}

/**
 * Global configuration instance
 */
let globalConfig: ProvisionerConfig | null = null;

/**
 * Initialize global configuration
 */
export function initializeConfig(configPath?: string, environment?: ConfigEnvironment): ProvisionerConfig {
  globalConfig = loadConfig(configPath, environment);
  return globalConfig;
}

/**
 * Get global configuration
 */
export function getConfig(): ProvisionerConfig {
  if (!globalConfig) {
    globalConfig = initializeConfig();
  }
  return globalConfig;
}

/**
 * Get global configuration as runtime options
 */
export function getProvisionerOptions(): ProvisionerOptions {
  return toProvisionerOptions(getConfig());
}

/**
 * Reset global configuration (for testing)
 */
export function resetConfig(): void {
  globalConfig = null;
}
