import { DATA_SURFACES, RESERVED_ARGUMENTS } from '../config/kinesis-video-config';
import { ConfigurationError, NoSuchOperationError } from '../types/errors';
import type { OperationInput, OperationOutput, TransportClient } from '../transport/types';
import type { EndpointResolver } from './endpoint-resolver';
import type { OperationCatalog } from './operation-catalog';
import type { ResourceIdentifierResolver } from './resource-identifier-resolver';
import type { TransportClientCache } from './transport-client-cache';

export interface DispatcherDependencies {
  catalog: OperationCatalog;
  clients: TransportClientCache;
  identifiers: ResourceIdentifierResolver;
  endpoints: EndpointResolver;
}

function isSupplied(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

/**
 * Routes an operation to the client that must perform it.
 *
 * Control-plane operations go to the default control client. Data-plane
 * operations need exactly one of StreamName / StreamARN to resolve the stream's
 * data endpoint first. No retries and no error translation happen here.
 */
export class Dispatcher {
  constructor(private readonly deps: DispatcherDependencies) {}

  async invoke(operationName: string, input: OperationInput = {}): Promise<OperationOutput> {
    const client = await this.clientFor(operationName, input);
    return client.call(operationName, input);
  }

  /**
   * Resolve (and cache) the transport client for an operation call without invoking it.
   */
  async clientFor(operationName: string, input: OperationInput = {}): Promise<TransportClient> {
    const surface = this.deps.catalog.lookup(operationName);
    if (surface === undefined) {
      throw new NoSuchOperationError(operationName);
    }

    if (!DATA_SURFACES.includes(surface)) {
      return this.deps.clients.get(surface);
    }

    const resourceIdentifier = await this.resourceIdentifierFor(input);
    const endpoint = await this.deps.endpoints.resolve(resourceIdentifier, operationName);
    return this.deps.clients.get(surface, endpoint);
  }

  private async resourceIdentifierFor(input: OperationInput): Promise<string> {
    const name = input[RESERVED_ARGUMENTS.RESOURCE_NAME];
    const arn = input[RESERVED_ARGUMENTS.RESOURCE_IDENTIFIER];

    if (isSupplied(name) === isSupplied(arn)) {
      throw new ConfigurationError(
        `Exactly one of ${RESERVED_ARGUMENTS.RESOURCE_NAME} or ${RESERVED_ARGUMENTS.RESOURCE_IDENTIFIER} ` +
          'must be supplied to determine the service endpoint'
      );
    }

    if (isSupplied(name)) {
      if (typeof name !== 'string') {
        throw new ConfigurationError(`${RESERVED_ARGUMENTS.RESOURCE_NAME} must be a string`);
      }
      return this.deps.identifiers.resolve(name);
    }

    if (typeof arn !== 'string') {
      throw new ConfigurationError(`${RESERVED_ARGUMENTS.RESOURCE_IDENTIFIER} must be a string`);
    }
    return arn;
  }
}
