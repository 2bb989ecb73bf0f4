/**
 * Default Configuration
 *
 * Base values every loaded configuration is merged over, so a partial
 * provisioner.yaml (or none at all) still yields a complete configuration.
 */

import type { ProvisionerConfigInput } from '../types/schemas/config.js';

/** Environment variable naming an alternative provisioner.yaml */
export const CONFIG_PATH_ENV = 'PROVISIONER_CONFIG';

/** Config file location relative to the package root */
export const DEFAULT_CONFIG_RELATIVE_PATH = 'config/provisioner.yaml';

export const DEFAULT_CONFIG: ProvisionerConfigInput = {
  service: {
    label: 'inference-service',
    label_key: 'inference-provisioner.label',
    image: 'ghcr.io/speaches-ai/speaches:0.9.0-rc.3-cpu',
    host_port: 28001,
    container_port: 8000,
    model_cache_dir: '~/.cache/inference-provisioner/huggingface/hub',
    container_cache_dir: '/home/ubuntu/.cache/huggingface/hub',
    startup_timeout_ms: 300_000, // 5 minutes
    env: {
      host: '0.0.0.0',
      port: '8000',
      stt_model_ttl: '-1',
      tts_model_ttl: '-1',
      vad_model_ttl: '-1',
      log_level: 'info',
      enable_ui: 'False',
    },
  },
  health: {
    path: '/health',
    interval_ms: 1_000,
    request_timeout_ms: 5_000,
  },
  http: {
    registry_timeout_ms: 30_000,
    listing_timeout_ms: 30_000,
    load_timeout_ms: 600_000, // 10 minutes
  },
  registry: {
    failure_policy: 'advisory',
  },
  readiness: {
    max_wait_ms: 120_000, // 2 minutes
    poll_interval_ms: 2_000,
    poll_request_timeout_ms: 5_000,
    settle_ms: {
      speech_to_text: 2_000,
      text_to_speech: 5_000,
      embedding: 2_000,
    },
  },
  provisioning: {
    parallel: false,
    official_model_prefixes: ['speaches-ai/', 'Systran/'],
  },
  properties: {
    base_url_key: 'inference.base-url',
    api_key_key: 'inference.api-key',
  },
};
