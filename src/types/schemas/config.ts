/**
 * Provisioner Configuration Schemas
 *
 * Zod schemas for validating provisioner.yaml after environment overrides
 * have been merged.
 *
 * @module schemas/config
 */

import { z } from 'zod';
import { NonEmptyString, NonNegativeInteger, PortNumber, PositiveInteger } from './common.js';

/**
 * Managed service container configuration
 */
export const ServiceConfigSchema = z.object({
  label: NonEmptyString,
  label_key: NonEmptyString,
  image: NonEmptyString,
  host_port: PortNumber,
  container_port: PortNumber,
  model_cache_dir: z.string().min(1, 'Model cache directory cannot be empty'),
  container_cache_dir: z.string().min(1, 'Container cache directory cannot be empty'),
  startup_timeout_ms: z.number().int().min(1000, 'must be >= 1000ms'),
  env: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()]).transform(String)),
});

/**
 * Liveness gate configuration
 */
export const HealthConfigSchema = z.object({
  path: z.string().startsWith('/', 'Health path must start with /'),
  interval_ms: PositiveInteger,
  request_timeout_ms: PositiveInteger,
});

/**
 * Per-endpoint request timeouts
 */
export const HttpConfigSchema = z.object({
  registry_timeout_ms: PositiveInteger,
  listing_timeout_ms: PositiveInteger,
  load_timeout_ms: PositiveInteger,
});

export const RegistryFailurePolicySchema = z.enum(['advisory', 'fatal'], {
  errorMap: () => ({ message: 'Failure policy must be either advisory or fatal' }),
});

export const RegistryConfigSchema = z.object({
  failure_policy: RegistryFailurePolicySchema,
});

/**
 * Readiness polling configuration
 */
export const ReadinessConfigSchema = z
  .object({
    max_wait_ms: NonNegativeInteger,
    poll_interval_ms: PositiveInteger,
    poll_request_timeout_ms: PositiveInteger,
    settle_ms: z.object({
      speech_to_text: NonNegativeInteger,
      text_to_speech: NonNegativeInteger,
      embedding: NonNegativeInteger,
    }),
  })
  .refine((data) => data.poll_interval_ms <= Math.max(data.max_wait_ms, 1), {
    message: 'must be <= max_wait_ms',
    path: ['poll_interval_ms'],
  });

export const ProvisioningConfigSchema = z.object({
  parallel: z.boolean(),
  official_model_prefixes: z.array(z.string()),
});

export const PropertiesConfigSchema = z.object({
  base_url_key: NonEmptyString,
  api_key_key: NonEmptyString,
});

/**
 * Complete provisioner configuration (after environment merge)
 */
export const ProvisionerConfigSchema = z.object({
  service: ServiceConfigSchema,
  health: HealthConfigSchema,
  http: HttpConfigSchema,
  registry: RegistryConfigSchema,
  readiness: ReadinessConfigSchema,
  provisioning: ProvisioningConfigSchema,
  properties: PropertiesConfigSchema,
});

export type ProvisionerConfig = z.output<typeof ProvisionerConfigSchema>;
export type ProvisionerConfigInput = z.input<typeof ProvisionerConfigSchema>;
export type RegistryFailurePolicy = z.infer<typeof RegistryFailurePolicySchema>;
