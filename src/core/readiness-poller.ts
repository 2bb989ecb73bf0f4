/**
 * Readiness Poller
 *
 * Two-phase wait after a load has been triggered: poll the loaded-models
 * listing until the id appears, then sleep a capability-specific settle time
 * so the service can finish warming the model. Running out of time is not an
 * error; the caller gets a `timeout` result and decides what to do with it.
 */

import type { Logger } from 'pino';
import type { ReadinessOptions } from '../config/loader.js';
import type { ModelDescriptor, ReadinessResult } from '../types/models.js';
import { lazyLog } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import type { LoadedModelsProbe } from './loaded-models.js';

export interface ReadinessPollerOptions {
  probe: LoadedModelsProbe;
  logger: Logger;
  options: ReadinessOptions;
}

export class ReadinessPoller {
  private readonly probe: LoadedModelsProbe;
  private readonly logger: Logger;
  private readonly options: ReadinessOptions;

  constructor(deps: ReadinessPollerOptions) {
    this.probe = deps.probe;
    this.logger = deps.logger;
    this.options = deps.options;
  }

  /**
   * Poll at a fixed interval until the model is listed or `maxWaitMs` elapses.
   * The final sleep and every listing request are clipped to the remaining
   * budget, so a hung listing cannot stretch the wait past one poll interval.
   */
  public async waitUntilReady(descriptor: ModelDescriptor): Promise<ReadinessResult> {
    const { maxWaitMs, pollIntervalMs, pollRequestTimeoutMs } = this.options;
    const { modelId, capability } = descriptor;
    const startedAt = Date.now();
    let attempt = 0;

    this.logger.info({ modelId, capability, maxWaitMs }, 'Waiting for model to be ready');

    for (;;) {
      attempt += 1;
      const budgetMs = maxWaitMs - (Date.now() - startedAt) + pollIntervalMs;
      const check = await this.probe.check(modelId, Math.max(1, Math.min(pollRequestTimeoutMs, budgetMs)));
      const waitedMs = Date.now() - startedAt;

      if (check.listed) {
        this.logger.info({ modelId, capability, waitedMs, attempt }, 'Model is listed as loaded');
        const settleMs = this.options.settleMs[capability];
        if (settleMs > 0) {
          lazyLog(this.logger, 'debug', () => ({ modelId, settleMs }), 'Waiting for model to settle');
          await sleep(settleMs);
        }
        return { status: 'ready', waitedMs, settleMs };
      }

      lazyLog(
        this.logger,
        'debug',
        () => ({ modelId, attempt, waitedMs, ...('error' in check ? { error: check.error } : { status: check.status }) }),
        'Model not listed yet'
      );

      const remainingMs = maxWaitMs - waitedMs;
      if (remainingMs <= 0) {
        this.logger.warn(
          { modelId, capability, waitedMs, attempts: attempt },
          'Timed out waiting for model to be ready; continuing'
        );
        return { status: 'timeout', waitedMs };
      }

      await sleep(Math.min(pollIntervalMs, remainingMs));
    }
  }
}
