/**
 * Service Lifecycle Manager
 *
 * Owns the single shared service instance per label. Start requests for a
 * label are serialized by the context's keyed lock; the first caller starts
 * (or adopts) the instance, later callers observe the same one. By default
 * the lock is also held across the provisioning pass so a second caller
 * never sees a half-provisioned service.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { describeError, ProvisionerError, ServiceStartError, zodErrorToProvisionerError } from '../api/errors.js';
import type { LifecycleEvents } from '../api/events.js';
import { getProvisionerOptions, type ProvisionerOptions } from '../config/loader.js';
import { LoadedModelsProbe } from '../core/loaded-models.js';
import { ModelCache } from '../core/model-cache.js';
import { ModelProvisioner } from '../core/provisioning-state-machine.js';
import { ReadinessPoller } from '../core/readiness-poller.js';
import { ServiceHttpClient } from '../http/service-client.js';
import { DockerServiceLauncher } from '../launcher/docker-launcher.js';
import { RegistryClient } from '../registry/registry-client.js';
import { parseCapability } from '../types/capability.js';
import { ProvisioningOutcome, type CapabilityModelMap, type ModelDescriptor, type ProvisioningResult } from '../types/models.js';
import { CapabilityModelMapSchema, ModelDescriptorListSchema } from '../types/schemas/model.js';
import type { PropertyRegistry, ServiceEndpoint, ServiceInstance, ServiceLauncher } from '../types/service.js';
import { createLogger, lazyLog } from '../utils/logger.js';
import { RetryAbortedError, retryWithBackoff } from '../utils/retry.js';
import { getDefaultServiceContext, type ServiceContext } from './service-context.js';

/**
 * Models to provision: a capability-keyed map or an explicit descriptor list.
 */
export type ModelSelection = CapabilityModelMap | readonly ModelDescriptor[];

export interface ServiceLifecycleManagerConfig {
  options?: ProvisionerOptions;
  launcher?: ServiceLauncher;
  context?: ServiceContext;
  logger?: Logger;
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
}

export interface StartIfNeededRequest {
  models: ModelSelection;
  /** Forwarded as a bearer token and published as a property */
  apiKey?: string;
  /** Receives the resolved base URL (and api key) once the service is ready */
  registry?: PropertyRegistry;
  /** Defaults to the configured service label */
  label?: string;
}

export interface StartIfNeededResult {
  instance: ServiceInstance;
  results: ProvisioningResult[];
}

const HEALTH_RETRYABLE_ERRORS = ['HealthCheckFailed', 'TransportError', 'TIMEOUT'];

function isDescriptorList(models: ModelSelection): models is readonly ModelDescriptor[] {
  return Array.isArray(models);
}

/**
 * Validate a model selection and turn it into descriptors, keeping the
 * caller's order.
 */
export function normalizeModels(models: ModelSelection): ModelDescriptor[] {
  if (isDescriptorList(models)) {
    const parsed = ModelDescriptorListSchema.safeParse(models);
    if (!parsed.success) {
      throw zodErrorToProvisionerError(parsed.error);
    }
    return parsed.data;
  }

  const parsed = CapabilityModelMapSchema.safeParse(models);
  if (!parsed.success) {
    throw zodErrorToProvisionerError(parsed.error);
  }
  return Object.entries(parsed.data).flatMap(([key, modelId]) => {
    const capability = parseCapability(key);
    return capability ? [{ modelId, capability }] : [];
  });
}

export function baseUrlFor(endpoint: ServiceEndpoint): string {
  return `http://${endpoint.host}:${endpoint.port}`;
}

export class ServiceLifecycleManager extends EventEmitter<LifecycleEvents> {
  private readonly options: ProvisionerOptions;
  private readonly launcher: ServiceLauncher;
  private readonly context: ServiceContext;
  private readonly logger: Logger;
  private readonly fetchImpl?: typeof fetch;

  constructor(config: ServiceLifecycleManagerConfig = {}) {
    super();
    this.options = config.options ?? getProvisionerOptions();
    this.logger = config.logger ?? createLogger('service-lifecycle');
    this.launcher = config.launcher ?? new DockerServiceLauncher({ logger: this.logger });
    this.context = config.context ?? getDefaultServiceContext();
    this.fetchImpl = config.fetchImpl;
  }

  /**
   * Instance already known to this process for `label`, if any.
   */
  public getRunningInstance(label: string = this.options.service.label): ServiceInstance | undefined {
    const instance = this.context.getInstance(label);
    return instance?.running ? instance : undefined;
  }

  /**
   * Start or adopt the instance for `label`. Concurrent callers share one
   * start attempt and resolve to the same instance.
   */
  public async ensureStarted(label: string = this.options.service.label): Promise<ServiceInstance> {
    return this.context.locks.runExclusive(label, () => this.startUnlocked(label));
  }

  /**
   * Provision every model against a started instance, in order (or all at
   * once in parallel mode). Resolves to the same instance.
   */
  public async ensureReady(
    instance: ServiceInstance,
    models: ModelSelection,
    apiKey?: string
  ): Promise<ServiceInstance> {
    const descriptors = normalizeModels(models);
    if (this.options.provisioning.parallel) {
      await this.provisionAll(instance, descriptors, apiKey);
    } else {
      await this.context.locks.runExclusive(instance.label, () => this.provisionAll(instance, descriptors, apiKey));
    }
    return instance;
  }

  /**
   * Start the service if needed, provision the requested models, then
   * publish the endpoint (and api key) to the caller's property registry.
   */
  public async startIfNeeded(request: StartIfNeededRequest): Promise<StartIfNeededResult> {
    const label = request.label ?? this.options.service.label;
    const descriptors = normalizeModels(request.models);

    let outcome: StartIfNeededResult;
    if (this.options.provisioning.parallel) {
      const instance = await this.ensureStarted(label);
      outcome = { instance, results: await this.provisionAll(instance, descriptors, request.apiKey) };
    } else {
      outcome = await this.context.locks.runExclusive(label, async () => {
        const instance = await this.startUnlocked(label);
        return { instance, results: await this.provisionAll(instance, descriptors, request.apiKey) };
      });
    }

    if (request.registry) {
      this.publishProperties(request.registry, outcome.instance, request.apiKey);
    }
    return outcome;
  }

  private publishProperties(registry: PropertyRegistry, instance: ServiceInstance, apiKey?: string): void {
    const { baseUrlKey, apiKeyKey } = this.options.properties;
    registry.add(baseUrlKey, () => instance.baseUrl);
    if (apiKey) {
      registry.add(apiKeyKey, () => apiKey);
    }
    this.logger.info({ label: instance.label, baseUrl: instance.baseUrl }, 'Published service properties');
  }

  /**
   * Caller must hold the label lock.
   */
  private async startUnlocked(label: string): Promise<ServiceInstance> {
    const known = this.context.getInstance(label);
    if (known?.running) {
      lazyLog(this.logger, 'debug', () => ({ label, baseUrl: known.baseUrl }), 'Reusing known instance');
      this.emit('instance:reused', { instance: known, source: 'context', timestamp: Date.now() });
      return known;
    }

    const { service } = this.options;
    const startedAt = Date.now();
    const cache = new ModelCache(service.modelCacheDir);
    try {
      await cache.ensureRoot();
    } catch (error) {
      throw new ServiceStartError(label, `Cannot create model cache directory ${cache.rootDir}: ${describeError(error)}`, {
        cacheDir: cache.rootDir,
      }, { cause: error });
    }

    const found = await this.launcher.findRunning(label, service.labelKey, service.containerPort);
    if (found) {
      const instance = this.toInstance(label, found, true, startedAt);
      await this.waitForHealth(instance);
      this.context.setInstance(instance);
      this.logger.info({ label, baseUrl: instance.baseUrl }, 'Reusing running service instance');
      this.emit('instance:reused', { instance, source: 'launcher', timestamp: Date.now() });
      return instance;
    }

    const endpoint = await this.launcher.launch({
      label,
      labelKey: service.labelKey,
      image: service.image,
      hostPort: service.hostPort,
      containerPort: service.containerPort,
      hostCacheDir: service.modelCacheDir,
      containerCacheDir: service.containerCacheDir,
      env: service.env,
    });
    const instance = this.toInstance(label, endpoint, false, startedAt);
    await this.waitForHealth(instance);
    this.context.setInstance(instance);

    const durationMs = Date.now() - startedAt;
    this.logger.info({ label, baseUrl: instance.baseUrl, durationMs }, 'Service instance started');
    this.emit('instance:started', { instance, durationMs, timestamp: Date.now() });
    return instance;
  }

  private toInstance(label: string, endpoint: ServiceEndpoint, reused: boolean, startedAt: number): ServiceInstance {
    return {
      ...endpoint,
      label,
      baseUrl: baseUrlFor(endpoint),
      running: true,
      startedAt,
      reused,
    };
  }

  /**
   * GET the health path at a fixed interval until it answers 200 or the
   * startup timeout is spent. The timeout is a wall-clock deadline: each
   * request is clipped to the time left and the retry loop is aborted once
   * it passes.
   */
  private async waitForHealth(instance: ServiceInstance): Promise<void> {
    const { health, service } = this.options;
    const http = new ServiceHttpClient({ baseUrl: instance.baseUrl, fetchImpl: this.fetchImpl });
    const maxAttempts = Math.max(1, Math.ceil(service.startupTimeoutMs / health.intervalMs));
    const deadline = Date.now() + service.startupTimeoutMs;
    let lastFailure: unknown;

    try {
      await retryWithBackoff(
        async () => {
          const timeoutMs = Math.max(1, Math.min(health.requestTimeoutMs, deadline - Date.now()));
          const response = await http.get(health.path, { timeoutMs });
          if (response.status !== 200) {
            throw new ProvisionerError('HealthCheckFailed', `Health check returned ${response.status}`, {
              status: response.status,
            });
          }
        },
        {
          maxAttempts,
          initialDelayMs: health.intervalMs,
          maxDelayMs: health.intervalMs,
          backoffMultiplier: 1,
          retryableErrors: HEALTH_RETRYABLE_ERRORS,
          signal: AbortSignal.timeout(service.startupTimeoutMs),
          onRetry: ({ attempt, error }) => {
            lastFailure = error;
            lazyLog(
              this.logger,
              'debug',
              () => ({ label: instance.label, attempt, error: describeError(error) }),
              'Service not healthy yet'
            );
          },
        }
      );
    } catch (error) {
      const reason = error instanceof RetryAbortedError && lastFailure !== undefined ? lastFailure : error;
      throw new ServiceStartError(
        instance.label,
        `Service at ${instance.baseUrl} did not become healthy within ${service.startupTimeoutMs}ms: ${describeError(reason)}`,
        { baseUrl: instance.baseUrl, startupTimeoutMs: service.startupTimeoutMs },
        { cause: reason }
      );
    }

    this.logger.info({ label: instance.label, baseUrl: instance.baseUrl }, 'Service is healthy');
  }

  private createProvisioner(instance: ServiceInstance, apiKey?: string): ModelProvisioner {
    const http = new ServiceHttpClient({ baseUrl: instance.baseUrl, apiKey, fetchImpl: this.fetchImpl });
    const probe = new LoadedModelsProbe(http);
    return new ModelProvisioner({
      http,
      probe,
      registry: new RegistryClient({
        http,
        logger: this.logger.child({ component: 'registry-client' }),
        timeoutMs: this.options.http.registryTimeoutMs,
      }),
      poller: new ReadinessPoller({
        probe,
        logger: this.logger.child({ component: 'readiness-poller' }),
        options: this.options.readiness,
      }),
      cache: new ModelCache(this.options.service.modelCacheDir),
      logger: this.logger.child({ component: 'provisioner' }),
      options: this.options,
    });
  }

  private async provisionAll(
    instance: ServiceInstance,
    descriptors: readonly ModelDescriptor[],
    apiKey?: string
  ): Promise<ProvisioningResult[]> {
    const provisioner = this.createProvisioner(instance, apiKey);
    const provisionOne = async (descriptor: ModelDescriptor): Promise<ProvisioningResult> => {
      const result = await provisioner.provision(descriptor);
      this.emit('model:provisioned', { label: instance.label, result, timestamp: Date.now() });
      if (result.outcome === ProvisioningOutcome.READY_TIMEOUT) {
        this.emit('model:ready-timeout', {
          label: instance.label,
          descriptor,
          waitedMs: result.readiness?.waitedMs ?? result.durationMs,
          timestamp: Date.now(),
        });
      }
      return result;
    };

    if (this.options.provisioning.parallel) {
      return Promise.all(descriptors.map(provisionOne));
    }

    const results: ProvisioningResult[] = [];
    for (const descriptor of descriptors) {
      results.push(await provisionOne(descriptor));
    }
    return results;
  }
}
