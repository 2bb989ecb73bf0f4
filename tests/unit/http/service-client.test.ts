import { afterEach, describe, expect, it } from 'vitest';
import { ProvisionerError } from '../../../src/api/errors.js';
import { encodePathSegment, ServiceHttpClient } from '../../../src/http/service-client.js';
import { FakeInferenceService } from '../../helpers/fake-inference-service.js';

describe('encodePathSegment', () => {
  it('encodes the namespace separator so the id stays one segment', () => {
    const encoded = encodePathSegment('Systran/faster-whisper-base');

    expect(encoded).toBe('Systran%2Ffaster-whisper-base');
    expect(decodeURIComponent(encoded)).toBe('Systran/faster-whisper-base');
  });
});

describe('ServiceHttpClient', () => {
  let service: FakeInferenceService | undefined;

  afterEach(async () => {
    await service?.stop();
    service = undefined;
  });

  it('strips trailing slashes from the base URL', () => {
    const client = new ServiceHttpClient({ baseUrl: 'http://127.0.0.1:28001//' });

    expect(client.url('/v1/registry', { task: 'text-to-speech' })).toBe(
      'http://127.0.0.1:28001/v1/registry?task=text-to-speech'
    );
  });

  it('delivers an encoded segment to the server unchanged', async () => {
    service = new FakeInferenceService();
    const client = new ServiceHttpClient({ baseUrl: await service.start() });

    const response = await client.post(`/v1/models/${encodePathSegment('Systran/faster-whisper-base')}`, {
      timeoutMs: 1_000,
    });

    expect(response.ok).toBe(true);
    expect(service.loadRequests[0]?.rawPath).toBe('/v1/models/Systran%2Ffaster-whisper-base');
    expect(service.loaded.has('Systran/faster-whisper-base')).toBe(true);
  });

  it('returns non-2xx responses instead of throwing', async () => {
    service = new FakeInferenceService();
    const client = new ServiceHttpClient({ baseUrl: await service.start() });

    const response = await client.get('/missing', { timeoutMs: 1_000 });

    expect(response).toEqual({ status: 404, ok: false, body: 'Not Found' });
  });

  it('wraps transport failures as TransportError', async () => {
    const failingFetch: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    const client = new ServiceHttpClient({ baseUrl: 'http://127.0.0.1:9', fetchImpl: failingFetch });

    const error = await client.get('/health', { timeoutMs: 1_000 }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ProvisionerError);
    expect(error).toMatchObject({ code: 'TransportError', message: 'fetch failed' });
  });
});
