/**
 * Lifecycle Event System
 *
 * Defines event types and payloads for ServiceLifecycleManager.
 */

import type { ProvisioningResult, ModelDescriptor } from '../types/models.js';
import type { ServiceInstance } from '../types/service.js';

/**
 * Event payload when this process launched a new instance
 */
export interface InstanceStartedEvent {
  instance: ServiceInstance;
  durationMs: number;
  timestamp: number;
}

/**
 * Event payload when an existing instance was adopted
 */
export interface InstanceReusedEvent {
  instance: ServiceInstance;
  /** `context` when the process already knew it, `launcher` when found running by label */
  source: 'context' | 'launcher';
  timestamp: number;
}

/**
 * Event payload when a model finished provisioning (any non-fatal outcome)
 */
export interface ModelProvisionedEvent {
  label: string;
  result: ProvisioningResult;
  timestamp: number;
}

/**
 * Event payload when readiness polling gave up without observing the model
 */
export interface ModelReadyTimeoutEvent {
  label: string;
  descriptor: ModelDescriptor;
  waitedMs: number;
  timestamp: number;
}

/**
 * Map of all lifecycle events
 */
export interface LifecycleEvents {
  'instance:started': (event: InstanceStartedEvent) => void;
  'instance:reused': (event: InstanceReusedEvent) => void;
  'model:provisioned': (event: ModelProvisionedEvent) => void;
  'model:ready-timeout': (event: ModelReadyTimeoutEvent) => void;
}

export type LifecycleEventName = keyof LifecycleEvents;
export type LifecycleEventHandler<T extends LifecycleEventName> = LifecycleEvents[T];
