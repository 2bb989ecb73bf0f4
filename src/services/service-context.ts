/**
 * Service Context
 *
 * Process-wide state shared by every lifecycle manager: the known instance
 * per label and the per-label start locks. A default context backs normal
 * use; tests create their own or reset the default between cases.
 */

import { KeyedMutex } from '../core/keyed-mutex.js';
import type { ServiceInstance } from '../types/service.js';

export class ServiceContext {
  public readonly locks = new KeyedMutex();
  private readonly instances = new Map<string, ServiceInstance>();

  public getInstance(label: string): ServiceInstance | undefined {
    return this.instances.get(label);
  }

  public setInstance(instance: ServiceInstance): void {
    this.instances.set(instance.label, instance);
  }

  public listInstances(): ServiceInstance[] {
    return [...this.instances.values()];
  }

  public clear(): void {
    this.instances.clear();
  }
}

let defaultContext: ServiceContext | null = null;

export function getDefaultServiceContext(): ServiceContext {
  if (!defaultContext) {
    defaultContext = new ServiceContext();
  }
  return defaultContext;
}

/**
 * Forget every known instance (for testing)
 */
export function resetDefaultServiceContext(): void {
  defaultContext = null;
}
