import { describe, it, expect } from 'vitest';
import { TransportClientCache } from '../../src/services/transport-client-cache';
import { ServiceSurface } from '../../src/config/kinesis-video-config';
import { PUT_MEDIA_MODEL } from '../../src/transport/put-media';
import { createFakeTransport } from '../fixtures/fake-transport';

describe('TransportClientCache', () => {
  it('should return the same instance for the same surface and endpoint', () => {
    const transport = createFakeTransport();
    const cache = new TransportClientCache(transport.factory);

    const first = cache.get(ServiceSurface.MEDIA, 'https://ep-1');
    const second = cache.get(ServiceSurface.MEDIA, 'https://ep-1');

    expect(second).toBe(first);
    expect(transport.clients).toHaveLength(1);
  });

  it('should return distinct instances for distinct endpoints', () => {
    const transport = createFakeTransport();
    const cache = new TransportClientCache(transport.factory);

    const first = cache.get(ServiceSurface.MEDIA, 'https://ep-1');
    const second = cache.get(ServiceSurface.MEDIA, 'https://ep-2');

    expect(second).not.toBe(first);
    expect(first.endpoint).toBe('https://ep-1');
    expect(second.endpoint).toBe('https://ep-2');
  });

  it('should cache the default endpoint client once', () => {
    const transport = createFakeTransport();
    const cache = new TransportClientCache(transport.factory);

    const first = cache.get(ServiceSurface.CONTROL);
    const second = cache.get(ServiceSurface.CONTROL, undefined);

    expect(second).toBe(first);
    expect(first.endpoint).toBeUndefined();
    expect(cache.size).toBe(1);
    expect(cache.has(ServiceSurface.CONTROL)).toBe(true);
    expect(cache.has(ServiceSurface.CONTROL, 'https://ep-1')).toBe(false);
  });

  it('should keep surfaces apart for the same endpoint', () => {
    const transport = createFakeTransport();
    const cache = new TransportClientCache(transport.factory);

    const media = cache.get(ServiceSurface.MEDIA, 'https://ep');
    const archived = cache.get(ServiceSurface.ARCHIVED_MEDIA, 'https://ep');

    expect(archived).not.toBe(media);
  });

  it('should register PutMedia on media clients only, once per client', () => {
    const transport = createFakeTransport();
    const cache = new TransportClientCache(transport.factory);

    cache.get(ServiceSurface.MEDIA, 'https://ep');
    cache.get(ServiceSurface.MEDIA, 'https://ep');
    cache.get(ServiceSurface.ARCHIVED_MEDIA, 'https://ep');

    const [media, archived] = transport.clients;
    expect(media.registered).toEqual([PUT_MEDIA_MODEL]);
    expect(media.operationNames()).toContain('PutMedia');
    expect(archived.registered).toEqual([]);
  });

  it('should destroy and forget every client', () => {
    const transport = createFakeTransport();
    const cache = new TransportClientCache(transport.factory);
    cache.get(ServiceSurface.CONTROL);
    cache.get(ServiceSurface.MEDIA, 'https://ep');

    cache.destroyAll();

    expect(transport.clients.map((client) => client.destroyed)).toEqual([true, true]);
    expect(cache.size).toBe(0);
  });
});
