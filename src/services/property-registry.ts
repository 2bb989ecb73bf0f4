import type { PropertyRegistry } from '../types/service.js';

/**
 * Map-backed PropertyRegistry, used by the CLI and tests.
 */
export class InMemoryPropertyRegistry implements PropertyRegistry {
  private readonly suppliers = new Map<string, () => string>();

  public add(name: string, supplier: () => string): void {
    this.suppliers.set(name, supplier);
  }

  public get(name: string): string | undefined {
    return this.suppliers.get(name)?.();
  }

  public has(name: string): boolean {
    return this.suppliers.has(name);
  }

  public names(): string[] {
    return [...this.suppliers.keys()];
  }
}
