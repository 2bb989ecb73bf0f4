import { existsSync } from 'node:fs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ServiceStartError, UnsupportedModelError } from '../../src/api/errors.js';
import type { InstanceReusedEvent, ModelProvisionedEvent, ModelReadyTimeoutEvent } from '../../src/api/events.js';
import type { ProvisionerOptions } from '../../src/config/loader.js';
import { InMemoryPropertyRegistry } from '../../src/services/property-registry.js';
import {
  normalizeModels,
  ServiceLifecycleManager,
} from '../../src/services/lifecycle-manager.js';
import {
  getDefaultServiceContext,
  resetDefaultServiceContext,
  ServiceContext,
} from '../../src/services/service-context.js';
import { CapabilityType } from '../../src/types/capability.js';
import { ProvisioningOutcome } from '../../src/types/models.js';
import { FakeInferenceService, type FakeServiceOptions } from '../helpers/fake-inference-service.js';
import { FakeLauncher } from '../helpers/fake-launcher.js';
import { createMockLogger, createTestOptions } from '../helpers/test-setup.js';

const WHISPER = 'Systran/faster-whisper-base';
const KOKORO = 'speaches-ai/Kokoro-82M-v1.0-ONNX';

const REGISTRY: FakeServiceOptions['registry'] = {
  'automatic-speech-recognition': { body: JSON.stringify([{ id: WHISPER }, { id: 'Systran/faster-whisper-small' }]) },
  'text-to-speech': { body: JSON.stringify({ models: [KOKORO] }) },
};

describe('ServiceLifecycleManager', () => {
  let service: FakeInferenceService | undefined;
  let context: ServiceContext;

  beforeEach(() => {
    context = new ServiceContext();
  });

  afterEach(async () => {
    await service?.stop();
    service = undefined;
    resetDefaultServiceContext();
  });

  async function setup(
    fakeOptions: FakeServiceOptions = { registry: REGISTRY },
    options: ProvisionerOptions = createTestOptions(),
    launcherOptions: { alreadyRunning?: boolean; launchDelayMs?: number } = {}
  ) {
    const fake = new FakeInferenceService(fakeOptions);
    service = fake;
    await fake.start();
    const launcher = new FakeLauncher({ host: '127.0.0.1', port: fake.port }, launcherOptions);
    const manager = new ServiceLifecycleManager({ options, launcher, context, logger: createMockLogger() });
    return { fake, launcher, manager, options };
  }

  describe('ensureStarted', () => {
    it('launches once for concurrent callers and returns the same instance', async () => {
      const { fake, launcher, manager } = await setup(undefined, undefined, { launchDelayMs: 50 });
      const started: number[] = [];
      manager.on('instance:started', (event) => started.push(event.durationMs));

      const [first, second] = await Promise.all([manager.ensureStarted(), manager.ensureStarted()]);

      expect(first).toBe(second);
      expect(launcher.launches).toHaveLength(1);
      expect(started).toHaveLength(1);
      expect(first).toMatchObject({
        label: 'inference-service',
        baseUrl: fake.baseUrl,
        running: true,
        reused: false,
        containerId: 'fake-1',
      });
      expect(manager.getRunningInstance()).toBe(first);
    });

    it('passes the configured launch spec and creates the cache directory', async () => {
      const options = createTestOptions();
      const { launcher, manager } = await setup(undefined, options);

      await manager.ensureStarted('ci-speech');

      expect(launcher.launches).toHaveLength(1);
      expect(launcher.launches[0]).toMatchObject({
        label: 'ci-speech',
        labelKey: 'inference-provisioner.label',
        hostPort: 28001,
        containerPort: 8000,
        hostCacheDir: options.service.modelCacheDir,
        containerCacheDir: '/home/ubuntu/.cache/huggingface/hub',
      });
      expect(existsSync(options.service.modelCacheDir)).toBe(true);
      expect(manager.getRunningInstance('ci-speech')?.label).toBe('ci-speech');
    });

    it('adopts an instance the launcher finds running', async () => {
      const { launcher, manager } = await setup(undefined, undefined, { alreadyRunning: true });
      const reused: InstanceReusedEvent[] = [];
      manager.on('instance:reused', (event) => reused.push(event));

      const first = await manager.ensureStarted();
      const second = await manager.ensureStarted();

      expect(second).toBe(first);
      expect(first.reused).toBe(true);
      expect(launcher.launches).toHaveLength(0);
      expect(launcher.findCalls).toBe(1);
      expect(reused.map((event) => event.source)).toEqual(['launcher', 'context']);
    });

    it('polls health until the service answers 200', async () => {
      const { fake, manager } = await setup({ registry: REGISTRY, unhealthyChecks: 3 });

      await manager.ensureStarted();

      expect(fake.requestsTo('GET', '/health')).toHaveLength(4);
    });

    it('fails with ServiceStartError when the service never becomes healthy', async () => {
      const options = createTestOptions({ service: { startup_timeout_ms: 100 } });
      const { fake, manager } = await setup({ registry: REGISTRY, unhealthyChecks: 10_000 }, options);

      const error = await manager.ensureStarted().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ServiceStartError);
      expect(error).toMatchObject({ code: 'ServiceStartFailed', label: 'inference-service' });
      expect(fake.requestsTo('GET', '/health').length).toBeGreaterThan(1);
      expect(fake.requestsTo('GET', '/health').length).toBeLessThanOrEqual(10);
      expect(manager.getRunningInstance()).toBeUndefined();
    });

    it('enforces the startup timeout on the clock when health requests hang', async () => {
      const options = createTestOptions({
        service: { startup_timeout_ms: 300 },
        health: { interval_ms: 20, request_timeout_ms: 1_000 },
      });
      const { manager } = await setup({ registry: REGISTRY, hangingPaths: ['/health'] }, options);
      const startedAt = Date.now();

      const error = await manager.ensureStarted().catch((caught: unknown) => caught);
      const elapsed = Date.now() - startedAt;

      expect(error).toBeInstanceOf(ServiceStartError);
      expect(error).toMatchObject({ code: 'ServiceStartFailed' });
      expect(error instanceof Error ? error.message : '').toContain('did not become healthy within 300ms');
      expect(elapsed).toBeLessThan(300 + 20 + 200);
      expect(manager.getRunningInstance()).toBeUndefined();
    });
  });

  describe('startIfNeeded', () => {
    it('provisions the requested models and publishes the endpoint', async () => {
      const { fake, launcher, manager } = await setup();
      const provisioned: ModelProvisionedEvent[] = [];
      manager.on('model:provisioned', (event) => provisioned.push(event));
      const registry = new InMemoryPropertyRegistry();

      const first = await manager.startIfNeeded({
        models: { STT: WHISPER, TTS: KOKORO },
        apiKey: 'test-secret',
        registry,
      });

      expect(first.results.map((result) => [result.descriptor.modelId, result.outcome])).toEqual([
        [WHISPER, ProvisioningOutcome.LOADED_NOW],
        [KOKORO, ProvisioningOutcome.LOADED_NOW],
      ]);
      expect(registry.get('inference.base-url')).toBe(fake.baseUrl);
      expect(registry.get('inference.api-key')).toBe('test-secret');
      expect(fake.loadRequests.map((request) => request.rawPath)).toEqual([
        '/v1/models/Systran%2Ffaster-whisper-base',
        '/v1/models/speaches-ai%2FKokoro-82M-v1.0-ONNX',
      ]);
      expect(fake.loadRequests.map((request) => request.authorization)).toEqual([
        'Bearer test-secret',
        'Bearer test-secret',
      ]);

      const second = await manager.startIfNeeded({ models: { STT: WHISPER, TTS: KOKORO }, apiKey: 'test-secret' });

      expect(second.instance).toBe(first.instance);
      expect(second.results.map((result) => result.outcome)).toEqual([
        ProvisioningOutcome.ALREADY_LOADED,
        ProvisioningOutcome.ALREADY_LOADED,
      ]);
      expect(fake.loadRequests).toHaveLength(2);
      expect(launcher.launches).toHaveLength(1);
      expect(provisioned).toHaveLength(4);
    });

    it('publishes only the base url when no api key is given', async () => {
      const { manager } = await setup();
      const registry = new InMemoryPropertyRegistry();

      await manager.startIfNeeded({ models: { STT: WHISPER }, registry });

      expect(registry.names()).toEqual(['inference.base-url']);
    });

    it('loads each model once for concurrent callers', async () => {
      const { fake, launcher, manager } = await setup();

      const [first, second] = await Promise.all([
        manager.startIfNeeded({ models: { STT: WHISPER } }),
        manager.startIfNeeded({ models: { STT: WHISPER } }),
      ]);

      expect(first.instance).toBe(second.instance);
      expect(launcher.launches).toHaveLength(1);
      expect(fake.loadRequests).toHaveLength(1);
      expect([first.results[0]?.outcome, second.results[0]?.outcome]).toEqual([
        ProvisioningOutcome.LOADED_NOW,
        ProvisioningOutcome.ALREADY_LOADED,
      ]);
    });

    it('provisions models concurrently in parallel mode', async () => {
      const options = createTestOptions({ provisioning: { parallel: true } });
      const { fake, launcher, manager } = await setup(undefined, options);

      const { results } = await manager.startIfNeeded({ models: { STT: WHISPER, TTS: KOKORO } });

      expect(launcher.launches).toHaveLength(1);
      expect(results.map((result) => result.outcome)).toEqual([
        ProvisioningOutcome.LOADED_NOW,
        ProvisioningOutcome.LOADED_NOW,
      ]);
      expect([...fake.loaded].sort()).toEqual([WHISPER, KOKORO].sort());
    });

    it('rejects a model the registry does not list', async () => {
      const { fake, manager } = await setup();

      const error = await manager
        .startIfNeeded({ models: { STT: 'Systran/faster-whisper-large-v3' } })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(UnsupportedModelError);
      expect(error).toMatchObject({
        code: 'UnsupportedModel',
        modelId: 'Systran/faster-whisper-large-v3',
        capability: CapabilityType.SPEECH_TO_TEXT,
      });
      expect(fake.loadRequests).toHaveLength(0);
    });

    it('rejects unknown capability keys before contacting the service', async () => {
      const { fake, launcher, manager } = await setup();

      await expect(manager.startIfNeeded({ models: { ASR: WHISPER } })).rejects.toMatchObject({
        code: 'InvalidParams',
      });
      expect(fake.requests).toHaveLength(0);
      expect(launcher.launches).toHaveLength(0);
    });
  });

  describe('ensureReady', () => {
    it('emits model:ready-timeout when the model never appears', async () => {
      const { manager } = await setup({ registry: REGISTRY, listAfterLoad: false });
      const timeouts: ModelReadyTimeoutEvent[] = [];
      manager.on('model:ready-timeout', (event) => timeouts.push(event));

      const instance = await manager.ensureStarted();
      const ready = await manager.ensureReady(instance, [
        { modelId: WHISPER, capability: CapabilityType.SPEECH_TO_TEXT },
      ]);

      expect(ready).toBe(instance);
      expect(timeouts).toHaveLength(1);
      expect(timeouts[0]?.label).toBe('inference-service');
      expect(timeouts[0]?.descriptor).toEqual({ modelId: WHISPER, capability: CapabilityType.SPEECH_TO_TEXT });
    });
  });

  describe('default context', () => {
    it('is shared by managers until reset', async () => {
      const fake = new FakeInferenceService({ registry: REGISTRY });
      service = fake;
      await fake.start();
      const launcher = new FakeLauncher({ host: '127.0.0.1', port: fake.port });
      const options = createTestOptions();
      const create = () => new ServiceLifecycleManager({ options, launcher, logger: createMockLogger() });

      const first = await create().ensureStarted();
      const second = await create().ensureStarted();
      expect(second).toBe(first);
      expect(getDefaultServiceContext().listInstances()).toEqual([first]);

      resetDefaultServiceContext();
      await create().ensureStarted();
      expect(launcher.launches).toHaveLength(2);
    });
  });
});

describe('normalizeModels', () => {
  it('accepts short and long capability keys in caller order', () => {
    expect(normalizeModels({ tts: KOKORO, SPEECH_TO_TEXT: WHISPER })).toEqual([
      { modelId: KOKORO, capability: CapabilityType.TEXT_TO_SPEECH },
      { modelId: WHISPER, capability: CapabilityType.SPEECH_TO_TEXT },
    ]);
  });

  it('passes descriptor lists through validation', () => {
    expect(() => normalizeModels([{ modelId: 'has space', capability: CapabilityType.EMBEDDING }])).toThrow(
      'Model id cannot contain whitespace'
    );
  });
});
