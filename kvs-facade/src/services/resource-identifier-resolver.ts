import { CONTROL_OPERATIONS, LOG_PREFIX } from '../config/kinesis-video-config';
import { UnexpectedResponseError } from '../types/errors';
import { isRecord } from '../transport/types';
import { resourceIdentifierKey } from './cache-keys';
import type { ControlPlaneCaller } from './control-plane';
import { MemoCache } from './memo-cache';

/**
 * Resolves stream names to stream ARNs with DescribeStream.
 *
 * Resolved ARNs are cached for the lifetime of the resolver. A stream that is
 * deleted and recreated under the same name keeps its old ARN here; create a
 * new facade in that case.
 */
export class ResourceIdentifierResolver {
  private readonly cache = new MemoCache<string, string>(resourceIdentifierKey);

  constructor(
    private readonly callControlPlane: ControlPlaneCaller,
    private readonly options: { verbose?: boolean } = {}
  ) {}

  resolve(resourceName: string): Promise<string> {
    return this.cache.getOrCompute(resourceName, (name) => this.describe(name));
  }

  get size(): number {
    return this.cache.size;
  }

  private async describe(resourceName: string): Promise<string> {
    const response = await this.callControlPlane(CONTROL_OPERATIONS.DESCRIBE_RESOURCE, {
      StreamName: resourceName,
    });

    const info = response.StreamInfo;
    const arn = isRecord(info) ? info.StreamARN : undefined;
    if (typeof arn !== 'string' || arn === '') {
      throw new UnexpectedResponseError(CONTROL_OPERATIONS.DESCRIBE_RESOURCE, 'StreamInfo.StreamARN');
    }

    if (this.options.verbose) {
      console.log(`${LOG_PREFIX} Resolved stream "${resourceName}" to ${arn}`);
    }
    return arn;
  }
}
