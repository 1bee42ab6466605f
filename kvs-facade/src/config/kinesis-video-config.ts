/**
 * Kinesis Video service surface configuration.
 *
 * This is the single source of truth for surface names, reserved arguments
 * and the control-plane operations the facade relies on.
 */

/**
 * The three service surfaces behind the facade.
 * Values are the AWS service identifiers.
 */
export enum ServiceSurface {
  /** Control plane: stream metadata and endpoint discovery */
  CONTROL = 'kinesisvideo',

  /** Data plane: live media ingestion and retrieval (PutMedia, GetMedia) */
  MEDIA = 'kinesis-video-media',

  /** Data plane: archived media retrieval (clips, HLS/DASH sessions, images) */
  ARCHIVED_MEDIA = 'kinesis-video-archived-media',
}

/**
 * Surfaces in catalog registration order.
 */
export const ALL_SURFACES: readonly ServiceSurface[] = [
  ServiceSurface.CONTROL,
  ServiceSurface.MEDIA,
  ServiceSurface.ARCHIVED_MEDIA,
];

/**
 * Surfaces whose endpoint must be resolved per stream and operation.
 */
export const DATA_SURFACES: readonly ServiceSurface[] = [
  ServiceSurface.MEDIA,
  ServiceSurface.ARCHIVED_MEDIA,
];

/**
 * Input keys inspected by the dispatcher to pick a data-plane endpoint.
 * Both are always forwarded unchanged.
 */
export const RESERVED_ARGUMENTS = {
  RESOURCE_NAME: 'StreamName',
  RESOURCE_IDENTIFIER: 'StreamARN',
} as const;

/**
 * Control-plane operations used for resolution.
 */
export const CONTROL_OPERATIONS = {
  DESCRIBE_RESOURCE: 'DescribeStream',
  GET_ENDPOINT: 'GetDataEndpoint',
} as const;

/**
 * Name of the streaming-upload operation added to the media surface.
 */
export const PUT_MEDIA_OPERATION_NAME = 'PutMedia';

/**
 * SigV4 signing name shared by all three surfaces.
 */
export const SIGNING_SERVICE_NAME = 'kinesisvideo';

/**
 * Default number of attempts the SDK retry strategy makes per call.
 */
export const DEFAULT_MAX_ATTEMPTS = 3;

/**
 * Prefix for verbose console output.
 */
export const LOG_PREFIX = '[KVS]';
