import { ALL_SURFACES, ServiceSurface } from '../config/kinesis-video-config';
import { Dispatcher } from '../services/dispatcher';
import { EndpointResolver } from '../services/endpoint-resolver';
import { CollisionPolicy, OperationCatalog } from '../services/operation-catalog';
import { ResourceIdentifierResolver } from '../services/resource-identifier-resolver';
import { TransportClientCache } from '../services/transport-client-cache';
import { createSdkTransportClientFactory } from '../transport/sdk-surfaces';
import type {
  OperationInput,
  OperationOutput,
  TransportClient,
  TransportClientFactory,
} from '../transport/types';
import type { KinesisVideoSession } from '../types/session';

export interface KinesisVideoFacadeOptions {
  /** Replace the AWS SDK transport (tests, custom transports) */
  clientFactory?: TransportClientFactory;

  /** Behavior when two surfaces advertise the same operation. Default: 'error' */
  onCollision?: CollisionPolicy;

  /**
   * If true, log resolutions and client creation to console.
   * Default: false
   */
  verbose?: boolean;
}

export type OperationMethod = (input?: OperationInput) => Promise<OperationOutput>;

/**
 * Dynamic call surface. Properties named after an operation (`listStreams` or
 * `ListStreams`) are callables; anything else is undefined.
 */
export type KinesisVideoApi = { readonly [method: string]: OperationMethod | undefined };

export interface FacadeCacheStats {
  transportClients: number;
  resourceIdentifiers: number;
  endpointBindings: number;
}

/**
 * One client for the Kinesis Video control plane and both data planes.
 *
 * Any operation of `kinesisvideo`, `kinesis-video-media` or
 * `kinesis-video-archived-media` can be invoked by name. Data-plane calls need
 * `StreamName` or `StreamARN`; the data endpoint is discovered through
 * GetDataEndpoint and cached.
 *
 * Stream ARNs and endpoints are cached for the lifetime of the instance. If a
 * stream is deleted and recreated, create a new facade.
 *
 * @example
 * ```typescript
 * const kvs = new KinesisVideoFacade({ region: 'us-west-2' });
 * const streams = await kvs.invoke('ListStreams', {});
 * const media = await kvs.invoke('GetMedia', {
 *   StreamName: 'front-door',
 *   StartSelector: { StartSelectorType: 'NOW' },
 * });
 * ```
 */
export class KinesisVideoFacade {
  public readonly catalog: OperationCatalog;
  public readonly api: KinesisVideoApi;

  private readonly clients: TransportClientCache;
  private readonly identifiers: ResourceIdentifierResolver;
  private readonly endpoints: EndpointResolver;
  private readonly dispatcher: Dispatcher;

  constructor(session: KinesisVideoSession = {}, options: KinesisVideoFacadeOptions = {}) {
    const verbose = options.verbose ?? false;
    const factory = options.clientFactory ?? createSdkTransportClientFactory(session);

    this.clients = new TransportClientCache(factory, { verbose });
    this.catalog = OperationCatalog.build(ALL_SURFACES, (surface) => this.clients.get(surface), {
      onCollision: options.onCollision,
      verbose,
    });

    const callControlPlane = (operationName: string, input: OperationInput) =>
      this.clients.get(ServiceSurface.CONTROL).call(operationName, input);

    this.identifiers = new ResourceIdentifierResolver(callControlPlane, { verbose });
    this.endpoints = new EndpointResolver(callControlPlane, { verbose });
    this.dispatcher = new Dispatcher({
      catalog: this.catalog,
      clients: this.clients,
      identifiers: this.identifiers,
      endpoints: this.endpoints,
    });
    this.api = this.createApi();
  }

  /**
   * Invoke an operation by its AWS name. The input is forwarded unchanged.
   *
   * @throws NoSuchOperationError for names no surface provides
   * @throws ConfigurationError when a data-plane call has both or neither of StreamName/StreamARN
   */
  invoke(operationName: string, input: OperationInput = {}): Promise<OperationOutput> {
    return this.dispatcher.invoke(operationName, input);
  }

  /**
   * The client a call with this input would be sent through.
   */
  clientFor(operationName: string, input: OperationInput = {}): Promise<TransportClient> {
    return this.dispatcher.clientFor(operationName, input);
  }

  hasOperation(operationName: string): boolean {
    return this.catalog.has(operationName);
  }

  surfaceOf(operationName: string): ServiceSurface | undefined {
    return this.catalog.lookup(operationName);
  }

  operationNames(): string[] {
    return this.catalog.operationNames();
  }

  cacheStats(): FacadeCacheStats {
    return {
      transportClients: this.clients.size,
      resourceIdentifiers: this.identifiers.size,
      endpointBindings: this.endpoints.size,
    };
  }

  /**
   * Destroy every cached client. Resolved ARNs and endpoints are kept.
   */
  destroy(): void {
    this.clients.destroyAll();
  }

  private createApi(): KinesisVideoApi {
    const api: KinesisVideoApi = {};
    return new Proxy(api, {
      get: (_target, property) => {
        if (typeof property !== 'string') return undefined;
        const operationName = toOperationName(property);
        if (!this.catalog.has(operationName)) return undefined;
        const method: OperationMethod = (input = {}) => this.invoke(operationName, input);
        return method;
      },
      has: (_target, property) =>
        typeof property === 'string' && this.catalog.has(toOperationName(property)),
    });
  }
}

/**
 * `listStreams` → `ListStreams`; already-capitalized names pass through.
 */
export function toOperationName(methodName: string): string {
  if (methodName === '') return methodName;
  return methodName.charAt(0).toUpperCase() + methodName.slice(1);
}
