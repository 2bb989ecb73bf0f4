export {
  ServiceLifecycleManager,
  normalizeModels,
  baseUrlFor,
  type ModelSelection,
  type ServiceLifecycleManagerConfig,
  type StartIfNeededRequest,
  type StartIfNeededResult,
} from './services/lifecycle-manager.js';
export {
  ServiceContext,
  getDefaultServiceContext,
  resetDefaultServiceContext,
} from './services/service-context.js';
export { InMemoryPropertyRegistry } from './services/property-registry.js';

export {
  ProvisionerError,
  UnsupportedModelError,
  LoadTriggerError,
  RegistryQueryError,
  ServiceStartError,
  toProvisionerError,
  describeError,
  zodErrorToProvisionerError,
  type ProvisionerErrorCode,
  type ProvisionerErrorShape,
} from './api/errors.js';
export type * from './api/events.js';

// Provisioning core
export { ModelProvisioner, type ModelProvisionerOptions, type TransitionListener } from './core/provisioning-state-machine.js';
export { ReadinessPoller, type ReadinessPollerOptions } from './core/readiness-poller.js';
export { LoadedModelsProbe, MODELS_PATH, type LoadedCheck } from './core/loaded-models.js';
export { ModelCache, modelCacheDirName } from './core/model-cache.js';
export { KeyedMutex } from './core/keyed-mutex.js';
export { RegistryClient, REGISTRY_PATH, type RegistryClientOptions } from './registry/registry-client.js';
export {
  decodeModelIds,
  extractModelIds,
  SHAPE_DECODERS,
  type ExtractedShape,
  type ShapeKind,
} from './registry/response-extractor.js';
export { ServiceHttpClient, encodePathSegment, type ServiceResponse } from './http/service-client.js';

// Launcher
export {
  DockerServiceLauncher,
  parsePortBinding,
  buildRunArgs,
  type CommandRunner,
  type DockerServiceLauncherOptions,
} from './launcher/docker-launcher.js';

// Configuration
export {
  loadConfig,
  buildConfig,
  validateConfig,
  initializeConfig,
  getConfig,
  getProvisionerOptions,
  resetConfig,
  toProvisionerOptions,
  type ProvisionerOptions,
  type ReadinessOptions,
} from './config/loader.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
