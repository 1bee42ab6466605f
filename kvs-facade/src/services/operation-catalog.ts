import { LOG_PREFIX, ServiceSurface } from '../config/kinesis-video-config';
import { OperationCollisionError } from '../types/errors';
import type { TransportClient } from '../transport/types';

/**
 * What to do when a second surface advertises an operation name already owned by another.
 * - `error`: throw `OperationCollisionError` (default)
 * - `overwrite`: last registration wins, with a console warning
 */
export type CollisionPolicy = 'error' | 'overwrite';

export interface OperationCatalogOptions {
  onCollision?: CollisionPolicy;
  verbose?: boolean;
}

/**
 * Static map from operation name to the surface that owns it.
 *
 * Built once from the operations each surface's client advertises; read-only afterwards.
 */
export class OperationCatalog {
  private readonly owners = new Map<string, ServiceSurface>();
  private readonly onCollision: CollisionPolicy;

  constructor(options: OperationCatalogOptions = {}) {
    this.onCollision = options.onCollision ?? 'error';
  }

  /**
   * Interrogate a representative client of every surface and register its operations.
   *
   * @param surfaces - Surfaces in registration order
   * @param clientFor - Returns the default-endpoint client for a surface
   */
  static build(
    surfaces: readonly ServiceSurface[],
    clientFor: (surface: ServiceSurface) => TransportClient,
    options: OperationCatalogOptions = {}
  ): OperationCatalog {
    const catalog = new OperationCatalog(options);

    for (const surface of surfaces) {
      const names = clientFor(surface).operationNames();
      for (const name of names) {
        catalog.register(name, surface);
      }
      if (options.verbose) {
        console.log(`${LOG_PREFIX} Registered ${names.length} operation(s) for ${surface}`);
      }
    }
    return catalog;
  }

  register(operationName: string, surface: ServiceSurface): void {
    const existing = this.owners.get(operationName);
    if (existing !== undefined && existing !== surface) {
      if (this.onCollision === 'error') {
        throw new OperationCollisionError(operationName, existing, surface);
      }
      console.warn(
        `${LOG_PREFIX} Warning: operation "${operationName}" moved from ${existing} to ${surface}`
      );
    }
    this.owners.set(operationName, surface);
  }

  /**
   * Owning surface, or undefined when the name is not an operation.
   */
  lookup(operationName: string): ServiceSurface | undefined {
    return this.owners.get(operationName);
  }

  has(operationName: string): boolean {
    return this.owners.has(operationName);
  }

  operationNames(): string[] {
    return [...this.owners.keys()].sort();
  }

  operationsFor(surface: ServiceSurface): string[] {
    return [...this.owners.entries()]
      .filter(([, owner]) => owner === surface)
      .map(([name]) => name)
      .sort();
  }

  get size(): number {
    return this.owners.size;
  }
}
