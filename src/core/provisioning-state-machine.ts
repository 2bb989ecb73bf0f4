/**
 * Provisioning State Machine
 *
 * Drives one model through
 *
 *   start -> check-registry -> { unsupported | check-loaded }
 *         -> { already-loaded | trigger-load }
 *         -> { load-failed | wait-ready } -> { ready | ready-timeout }
 *
 * `unsupported` and `load-failed` surface as thrown errors; every other
 * terminal state is returned as a ProvisioningResult.
 */

import type { Logger } from 'pino';
import { describeError, LoadTriggerError, RegistryQueryError, UnsupportedModelError } from '../api/errors.js';
import type { ProvisionerOptions } from '../config/loader.js';
import { encodePathSegment, type ServiceHttpClient, type ServiceResponse } from '../http/service-client.js';
import type { RegistryClient } from '../registry/registry-client.js';
import { taskLabelFor } from '../types/capability.js';
import {
  ProvisioningOutcome,
  type ModelDescriptor,
  type ProvisioningResult,
  type ProvisioningState,
  type ReadinessResult,
} from '../types/models.js';
import { MODELS_PATH, type LoadedModelsProbe } from './loaded-models.js';
import type { ModelCache } from './model-cache.js';
import type { ReadinessPoller } from './readiness-poller.js';

export type TransitionListener = (descriptor: ModelDescriptor, from: ProvisioningState, to: ProvisioningState) => void;

export interface ModelProvisionerOptions {
  http: ServiceHttpClient;
  registry: RegistryClient;
  probe: LoadedModelsProbe;
  poller: ReadinessPoller;
  cache: ModelCache;
  logger: Logger;
  options: Pick<ProvisionerOptions, 'http' | 'registry' | 'provisioning'>;
  onTransition?: TransitionListener;
}

export class ModelProvisioner {
  private readonly deps: ModelProvisionerOptions;
  private readonly logger: Logger;

  constructor(deps: ModelProvisionerOptions) {
    this.deps = deps;
    this.logger = deps.logger;
  }

  /**
   * Provision a single model. Safe to call repeatedly: a model that is
   * already listed stops at check-loaded without a load request.
   */
  public async provision(descriptor: ModelDescriptor): Promise<ProvisioningResult> {
    const startedAt = Date.now();
    let state: ProvisioningState = 'start';
    const moveTo = (next: ProvisioningState): void => {
      this.logger.debug({ modelId: descriptor.modelId, from: state, to: next }, 'Provisioning transition');
      this.deps.onTransition?.(descriptor, state, next);
      state = next;
    };
    const finish = (
      outcome: ProvisioningOutcome,
      cacheHit?: boolean,
      readiness?: ReadinessResult
    ): ProvisioningResult => ({
      descriptor,
      outcome,
      cacheHit,
      readiness,
      durationMs: Date.now() - startedAt,
    });

    moveTo('check-registry');
    const unsupported = await this.checkRegistry(descriptor);
    if (unsupported) {
      moveTo('unsupported');
      throw unsupported;
    }

    moveTo('check-loaded');
    const loaded = await this.deps.probe.check(descriptor.modelId, this.deps.options.http.listingTimeoutMs);
    if (loaded.listed) {
      moveTo('already-loaded');
      this.logger.info(
        { modelId: descriptor.modelId, capability: descriptor.capability },
        'Model already loaded'
      );
      return finish(ProvisioningOutcome.ALREADY_LOADED);
    }
    if ('error' in loaded) {
      this.logger.warn({ modelId: descriptor.modelId, error: loaded.error }, 'Could not list loaded models');
    }

    this.warnIfUnofficial(descriptor);

    moveTo('trigger-load');
    const cacheHit = await this.deps.cache.hasCachedFiles(descriptor.modelId);
    try {
      await this.triggerLoad(descriptor, cacheHit);
    } catch (error) {
      moveTo('load-failed');
      throw error;
    }

    moveTo('wait-ready');
    const readiness = await this.deps.poller.waitUntilReady(descriptor);
    if (readiness.status === 'timeout') {
      moveTo('ready-timeout');
      return finish(ProvisioningOutcome.READY_TIMEOUT, cacheHit, readiness);
    }

    moveTo('ready');
    return finish(ProvisioningOutcome.LOADED_NOW, cacheHit, readiness);
  }

  /**
   * Resolves to the error to throw when the registry excludes the model.
   */
  private async checkRegistry(descriptor: ModelDescriptor): Promise<UnsupportedModelError | null> {
    const { modelId, capability } = descriptor;
    const support = await this.deps.registry.querySupported(capability);

    if (support.modelIds.length === 0) {
      if (this.deps.options.registry.failurePolicy === 'fatal') {
        throw new RegistryQueryError(
          capability,
          `Registry returned no models for task ${taskLabelFor(capability)}; cannot verify '${modelId}'`,
          { modelId, queryFailed: support.queryFailed, registryUrl: this.deps.registry.registryUrl(capability) }
        );
      }
      this.logger.warn({ modelId, capability, queryFailed: support.queryFailed }, 'Registry check inconclusive');
      return null;
    }

    if (!support.modelIds.includes(modelId)) {
      this.logger.error({ modelId, capability, supported: support.modelIds }, 'Model not supported by registry');
      return new UnsupportedModelError(modelId, capability, {
        task: taskLabelFor(capability),
        registryUrl: this.deps.registry.registryUrl(capability),
        supported: support.modelIds,
      });
    }

    return null;
  }

  private warnIfUnofficial(descriptor: ModelDescriptor): void {
    const prefixes = this.deps.options.provisioning.officialModelPrefixes;
    if (prefixes.length > 0 && !prefixes.some((prefix) => descriptor.modelId.startsWith(prefix))) {
      this.logger.warn(
        { modelId: descriptor.modelId, officialPrefixes: prefixes },
        'Model id has no official prefix and may not be compatible with the service'
      );
    }
  }

  private async triggerLoad(descriptor: ModelDescriptor, cacheHit: boolean): Promise<void> {
    const { modelId, capability } = descriptor;
    this.logger.info(
      { modelId, capability, cacheDir: this.deps.cache.pathFor(modelId) },
      cacheHit ? 'Loading model from local cache' : 'Downloading model'
    );

    let response: ServiceResponse;
    try {
      response = await this.deps.http.post(`${MODELS_PATH}/${encodePathSegment(modelId)}`, {
        timeoutMs: this.deps.options.http.loadTimeoutMs,
      });
    } catch (error) {
      throw new LoadTriggerError(modelId, capability, { reason: describeError(error) }, { cause: error });
    }

    if (!response.ok) {
      throw new LoadTriggerError(modelId, capability, { status: response.status, body: response.body });
    }

    this.logger.info({ modelId, capability, status: response.status }, 'Model load triggered');
  }
}
