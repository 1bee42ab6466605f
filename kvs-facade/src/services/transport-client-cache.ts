import { LOG_PREFIX, ServiceSurface } from '../config/kinesis-video-config';
import { PUT_MEDIA_MODEL } from '../transport/put-media';
import type { TransportClient, TransportClientFactory } from '../transport/types';
import { transportClientKey } from './cache-keys';

/**
 * One transport client per (surface, endpoint) pair, the default endpoint included.
 *
 * Clients are created on first use and kept for the lifetime of the cache.
 * Media surface clients get the PutMedia operation registered before they are cached.
 */
export class TransportClientCache {
  private readonly clients = new Map<string, TransportClient>();

  constructor(
    private readonly factory: TransportClientFactory,
    private readonly options: { verbose?: boolean } = {}
  ) {}

  get(surface: ServiceSurface, endpoint?: string): TransportClient {
    const key = transportClientKey(surface, endpoint);
    const cached = this.clients.get(key);
    if (cached) {
      return cached;
    }

    const client = this.factory(surface, endpoint);
    if (surface === ServiceSurface.MEDIA) {
      client.registerOperation(PUT_MEDIA_MODEL);
    }
    this.clients.set(key, client);

    if (this.options.verbose) {
      console.log(`${LOG_PREFIX} Created ${surface} client for ${endpoint ?? 'default endpoint'}`);
    }
    return client;
  }

  has(surface: ServiceSurface, endpoint?: string): boolean {
    return this.clients.has(transportClientKey(surface, endpoint));
  }

  get size(): number {
    return this.clients.size;
  }

  /**
   * Destroy every cached client and empty the cache.
   */
  destroyAll(): void {
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();
  }
}
