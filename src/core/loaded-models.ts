/**
 * Loaded-models listing probe
 *
 * `/v1/models` is the authoritative signal that a model is resident. The
 * check is a substring match on the raw body: the listing's shape varies
 * between service versions but always embeds the id verbatim.
 */

import { describeError } from '../api/errors.js';
import type { ServiceHttpClient } from '../http/service-client.js';

export const MODELS_PATH = '/v1/models';

export type LoadedCheck =
  | { listed: true; status: number }
  | { listed: false; status: number }
  | { listed: false; error: string };

export class LoadedModelsProbe {
  constructor(private readonly http: ServiceHttpClient) {}

  /**
   * Non-2xx responses and transport failures both count as "not listed".
   */
  public async check(modelId: string, timeoutMs: number): Promise<LoadedCheck> {
    try {
      const response = await this.http.get(MODELS_PATH, { timeoutMs });
      if (!response.ok) {
        return { listed: false, status: response.status };
      }
      return { listed: response.body.includes(modelId), status: response.status };
    } catch (error) {
      return { listed: false, error: describeError(error) };
    }
  }
}
