/**
 * Model provisioning types
 */

import type { CapabilityType } from './capability.js';

/**
 * A model to provision: an opaque provider id plus the capability it serves.
 *
 * Ids usually carry an organisation prefix (`Systran/faster-whisper-base`),
 * so they are percent-encoded whenever they travel inside a URL path segment.
 */
export interface ModelDescriptor {
  readonly modelId: string;
  readonly capability: CapabilityType;
}

/**
 * Capability-keyed model selection, e.g. `{ STT: 'Systran/faster-whisper-base' }`.
 * Keys accept the short (`STT`) and long (`SPEECH_TO_TEXT`) capability names.
 */
export type CapabilityModelMap = Readonly<Record<string, string>>;

/**
 * Model ids the registry recognises for one capability at query time.
 */
export interface RegistrySupportResult {
  readonly capability: CapabilityType;
  readonly modelIds: readonly string[];
  /** True when the query itself failed (transport error or non-2xx) */
  readonly queryFailed: boolean;
}

/**
 * Terminal result of one provisioning attempt.
 * UNSUPPORTED and LOAD_FAILED surface as thrown errors rather than results.
 */
export enum ProvisioningOutcome {
  ALREADY_LOADED = 'already-loaded',
  LOADED_NOW = 'loaded-now',
  UNSUPPORTED = 'unsupported',
  LOAD_FAILED = 'load-failed',
  READY_TIMEOUT = 'ready-timeout',
}

/**
 * States walked by the provisioning state machine.
 */
export type ProvisioningState =
  | 'start'
  | 'check-registry'
  | 'check-loaded'
  | 'trigger-load'
  | 'wait-ready'
  | 'unsupported'
  | 'already-loaded'
  | 'load-failed'
  | 'ready'
  | 'ready-timeout';

export interface ProvisioningResult {
  descriptor: ModelDescriptor;
  outcome: ProvisioningOutcome;
  /** Whether the host model cache already held files when loading was triggered */
  cacheHit?: boolean;
  /** Set whenever the readiness wait ran (loaded-now and ready-timeout) */
  readiness?: ReadinessResult;
  durationMs: number;
}

/**
 * Result of the two-phase readiness wait.
 */
export type ReadinessResult =
  | { status: 'ready'; waitedMs: number; settleMs: number }
  | { status: 'timeout'; waitedMs: number };
