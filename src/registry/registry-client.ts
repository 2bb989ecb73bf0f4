/**
 * Registry Client
 *
 * Asks the running service which model ids it can install for a capability.
 * The query is advisory: transport errors and non-2xx responses are logged
 * and reported as an empty result with `queryFailed` set, never thrown.
 */

import type { Logger } from 'pino';
import { describeError } from '../api/errors.js';
import type { ServiceHttpClient, ServiceResponse } from '../http/service-client.js';
import { type CapabilityType, taskLabelFor } from '../types/capability.js';
import type { RegistrySupportResult } from '../types/models.js';
import { decodeModelIds } from './response-extractor.js';

export const REGISTRY_PATH = '/v1/registry';

export interface RegistryClientOptions {
  http: ServiceHttpClient;
  logger: Logger;
  timeoutMs: number;
}

export class RegistryClient {
  private readonly http: ServiceHttpClient;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: RegistryClientOptions) {
    this.http = options.http;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Registry URL for a capability (used in error messages).
   */
  public registryUrl(capability: CapabilityType): string {
    return this.http.url(REGISTRY_PATH, { task: taskLabelFor(capability) });
  }

  public async querySupported(capability: CapabilityType): Promise<RegistrySupportResult> {
    const task = taskLabelFor(capability);

    let response: ServiceResponse;
    try {
      response = await this.http.get(REGISTRY_PATH, { timeoutMs: this.timeoutMs, query: { task } });
    } catch (error) {
      this.logger.warn({ task, error: describeError(error) }, 'Error querying model registry');
      return { capability, modelIds: [], queryFailed: true };
    }

    if (!response.ok) {
      this.logger.warn({ task, status: response.status }, 'Failed to query model registry');
      return { capability, modelIds: [], queryFailed: true };
    }

    const shape = decodeModelIds(response.body);
    if (shape.kind === 'none') {
      this.logger.warn(
        { task, bodyPreview: response.body.slice(0, 200) },
        'Registry response did not match any known shape'
      );
    } else {
      this.logger.info({ task, shape: shape.kind, modelIds: shape.ids }, 'Registry models for task');
    }

    return { capability, modelIds: shape.ids, queryFailed: false };
  }
}
