/**
 * Cache key composition for the facade's memoizing caches.
 *
 * Keys are JSON tuples so that no two distinct inputs can produce the same
 * string, and `null` stands for "no endpoint override".
 */

import type { ServiceSurface } from '../config/kinesis-video-config';

export function resourceIdentifierKey(resourceName: string): string {
  return resourceName;
}

export interface EndpointBindingKey {
  readonly resourceIdentifier: string;
  readonly operationName: string;
}

export function endpointBindingKey(key: EndpointBindingKey): string {
  return JSON.stringify([key.resourceIdentifier, key.operationName]);
}

export function transportClientKey(surface: ServiceSurface, endpoint?: string): string {
  return JSON.stringify([surface, endpoint ?? null]);
}
