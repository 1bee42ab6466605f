import { CONTROL_OPERATIONS, LOG_PREFIX } from '../config/kinesis-video-config';
import { UnexpectedResponseError } from '../types/errors';
import { toApiName } from './api-name';
import { EndpointBindingKey, endpointBindingKey } from './cache-keys';
import type { ControlPlaneCaller } from './control-plane';
import { MemoCache } from './memo-cache';

/**
 * Resolves the data endpoint for a (stream ARN, operation) pair with GetDataEndpoint.
 *
 * The cache key is the exact pair passed in; only the value sent upstream is
 * normalized to the uppercase API name. Entries never expire.
 */
export class EndpointResolver {
  private readonly cache = new MemoCache<EndpointBindingKey, string>(endpointBindingKey);

  constructor(
    private readonly callControlPlane: ControlPlaneCaller,
    private readonly options: { verbose?: boolean } = {}
  ) {}

  resolve(resourceIdentifier: string, operationName: string): Promise<string> {
    return this.cache.getOrCompute({ resourceIdentifier, operationName }, (key) =>
      this.fetchEndpoint(key)
    );
  }

  get size(): number {
    return this.cache.size;
  }

  private async fetchEndpoint(key: EndpointBindingKey): Promise<string> {
    const response = await this.callControlPlane(CONTROL_OPERATIONS.GET_ENDPOINT, {
      StreamARN: key.resourceIdentifier,
      APIName: toApiName(key.operationName),
    });

    const endpoint = response.DataEndpoint;
    if (typeof endpoint !== 'string' || endpoint === '') {
      throw new UnexpectedResponseError(CONTROL_OPERATIONS.GET_ENDPOINT, 'DataEndpoint');
    }

    if (this.options.verbose) {
      console.log(`${LOG_PREFIX} ${key.operationName} for ${key.resourceIdentifier} -> ${endpoint}`);
    }
    return endpoint;
  }
}
