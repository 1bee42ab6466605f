import type { AwsCredentialIdentity, AwsCredentialIdentityProvider } from '@aws-sdk/types';

/**
 * Shared client configuration applied to every transport client the facade creates.
 *
 * Anything left undefined is resolved by the AWS SDK default provider chain
 * (environment, shared config files, instance metadata).
 */
export interface KinesisVideoSession {
  /** AWS region, e.g. `us-west-2` */
  readonly region?: string;

  /** Static credentials or a credential provider */
  readonly credentials?: AwsCredentialIdentity | AwsCredentialIdentityProvider;

  /** Maximum attempts made by the SDK retry strategy */
  readonly maxAttempts?: number;

  /**
   * Control-plane endpoint override (local stacks, VPC endpoints).
   * Data-plane endpoints are always resolved through GetDataEndpoint.
   */
  readonly endpoint?: string;
}
