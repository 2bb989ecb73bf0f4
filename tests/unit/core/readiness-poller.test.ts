import { afterEach, describe, expect, it } from 'vitest';
import { LoadedModelsProbe } from '../../../src/core/loaded-models.js';
import { ReadinessPoller } from '../../../src/core/readiness-poller.js';
import type { ReadinessOptions } from '../../../src/config/loader.js';
import { ServiceHttpClient } from '../../../src/http/service-client.js';
import { CapabilityType } from '../../../src/types/capability.js';
import type { ModelDescriptor } from '../../../src/types/models.js';
import { FakeInferenceService } from '../../helpers/fake-inference-service.js';
import { createMockLogger } from '../../helpers/test-setup.js';

const WHISPER: ModelDescriptor = { modelId: 'Systran/faster-whisper-base', capability: CapabilityType.SPEECH_TO_TEXT };

function readinessOptions(overrides: Partial<ReadinessOptions> = {}): ReadinessOptions {
  return {
    maxWaitMs: 200,
    pollIntervalMs: 20,
    pollRequestTimeoutMs: 500,
    settleMs: {
      [CapabilityType.SPEECH_TO_TEXT]: 0,
      [CapabilityType.TEXT_TO_SPEECH]: 0,
      [CapabilityType.EMBEDDING]: 0,
    },
    ...overrides,
  };
}

describe('ReadinessPoller', () => {
  let service: FakeInferenceService | undefined;

  afterEach(async () => {
    await service?.stop();
    service = undefined;
  });

  async function createPoller(fake: FakeInferenceService, options: ReadinessOptions) {
    service = fake;
    const baseUrl = await fake.start();
    const logger = createMockLogger();
    const probe = new LoadedModelsProbe(new ServiceHttpClient({ baseUrl }));
    return { poller: new ReadinessPoller({ probe, logger, options }), logger };
  }

  it('returns ready as soon as the model is listed', async () => {
    const { poller } = await createPoller(
      new FakeInferenceService({ loaded: ['Systran/faster-whisper-base'] }),
      readinessOptions()
    );

    const result = await poller.waitUntilReady(WHISPER);

    expect(result.status).toBe('ready');
    expect(service?.requestsTo('GET', '/v1/models')).toHaveLength(1);
  });

  it('keeps polling until the model appears', async () => {
    const fake = new FakeInferenceService();
    const { poller } = await createPoller(fake, readinessOptions({ maxWaitMs: 2_000 }));
    setTimeout(() => fake.loaded.add('Systran/faster-whisper-base'), 60);

    const result = await poller.waitUntilReady(WHISPER);

    expect(result.status).toBe('ready');
    expect(fake.requestsTo('GET', '/v1/models').length).toBeGreaterThan(1);
  });

  it('sleeps the capability settle time after the model is listed', async () => {
    const { poller } = await createPoller(
      new FakeInferenceService({ loaded: ['speaches-ai/Kokoro-82M-v1.0-ONNX'] }),
      readinessOptions({
        settleMs: {
          [CapabilityType.SPEECH_TO_TEXT]: 0,
          [CapabilityType.TEXT_TO_SPEECH]: 80,
          [CapabilityType.EMBEDDING]: 0,
        },
      })
    );
    const startedAt = Date.now();

    const result = await poller.waitUntilReady({
      modelId: 'speaches-ai/Kokoro-82M-v1.0-ONNX',
      capability: CapabilityType.TEXT_TO_SPEECH,
    });

    expect(result).toMatchObject({ status: 'ready', settleMs: 80 });
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(75);
  });

  it('times out within maxWait plus one poll interval when the model never appears', async () => {
    const options = readinessOptions({ maxWaitMs: 150, pollIntervalMs: 40 });
    const { poller, logger } = await createPoller(new FakeInferenceService(), options);
    const startedAt = Date.now();

    const result = await poller.waitUntilReady(WHISPER);
    const elapsed = Date.now() - startedAt;

    expect(result.status).toBe('timeout');
    expect(result.waitedMs).toBeGreaterThanOrEqual(options.maxWaitMs);
    expect(elapsed).toBeLessThan(options.maxWaitMs + options.pollIntervalMs + 100);
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ modelId: 'Systran/faster-whisper-base' }),
      'Timed out waiting for model to be ready; continuing'
    );
  });

  it('clips listing requests to the remaining wait when the listing never answers', async () => {
    const options = readinessOptions({ maxWaitMs: 200, pollIntervalMs: 20, pollRequestTimeoutMs: 1_000 });
    const fake = new FakeInferenceService({ hangingPaths: ['/v1/models'] });
    const { poller } = await createPoller(fake, options);
    const startedAt = Date.now();

    const result = await poller.waitUntilReady(WHISPER);
    const elapsed = Date.now() - startedAt;

    expect(result.status).toBe('timeout');
    expect(elapsed).toBeLessThan(options.maxWaitMs + options.pollIntervalMs + 100);
    expect(fake.requestsTo('GET', '/v1/models')).toHaveLength(1);
  });

  it('treats poll request failures as not ready yet', async () => {
    const failingFetch: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const logger = createMockLogger();
    const probe = new LoadedModelsProbe(new ServiceHttpClient({ baseUrl: 'http://127.0.0.1:9', fetchImpl: failingFetch }));
    const poller = new ReadinessPoller({ probe, logger, options: readinessOptions({ maxWaitMs: 60 }) });

    const result = await poller.waitUntilReady(WHISPER);

    expect(result.status).toBe('timeout');
    expect(logger.debug).toHaveBeenCalledWith(
      expect.objectContaining({ modelId: 'Systran/faster-whisper-base', error: 'fetch failed' }),
      'Model not listed yet'
    );
  });
});
