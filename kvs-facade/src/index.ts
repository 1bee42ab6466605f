// Facade
export { KinesisVideoFacade, toOperationName } from './facade/kinesis-video-facade';
export type {
  KinesisVideoFacadeOptions,
  KinesisVideoApi,
  OperationMethod,
  FacadeCacheStats,
} from './facade/kinesis-video-facade';

// Session and configuration
export type { KinesisVideoSession } from './types/session';
export { loadFacadeConfig } from './config/load-facade-config';
export type { FacadeConfig } from './config/load-facade-config';
export {
  ServiceSurface,
  ALL_SURFACES,
  DATA_SURFACES,
  RESERVED_ARGUMENTS,
  CONTROL_OPERATIONS,
  PUT_MEDIA_OPERATION_NAME,
  DEFAULT_MAX_ATTEMPTS,
} from './config/kinesis-video-config';

// Errors
export {
  KinesisVideoFacadeError,
  NoSuchOperationError,
  ConfigurationError,
  OperationCollisionError,
  UnexpectedResponseError,
} from './types/errors';

// Core components
export { OperationCatalog } from './services/operation-catalog';
export type { CollisionPolicy, OperationCatalogOptions } from './services/operation-catalog';
export { TransportClientCache } from './services/transport-client-cache';
export { ResourceIdentifierResolver } from './services/resource-identifier-resolver';
export { EndpointResolver } from './services/endpoint-resolver';
export { Dispatcher } from './services/dispatcher';
export type { DispatcherDependencies } from './services/dispatcher';
export { MemoCache } from './services/memo-cache';
export {
  resourceIdentifierKey,
  endpointBindingKey,
  transportClientKey,
} from './services/cache-keys';
export type { EndpointBindingKey } from './services/cache-keys';
export { toApiName } from './services/api-name';
export type { ControlPlaneCaller } from './services/control-plane';

// Transport
export type {
  TransportClient,
  TransportClientFactory,
  OperationInput,
  OperationOutput,
} from './transport/types';
export { isRecord } from './transport/types';
export { SdkTransportClient, collectCommands } from './transport/sdk-transport-client';
export { createSdkTransportClientFactory } from './transport/sdk-surfaces';
export type {
  OperationModel,
  OperationDescriptor,
  ShapeDescriptor,
  AuthType,
} from './transport/operation-descriptor';

// PutMedia
export {
  PUT_MEDIA_MODEL,
  FRAGMENT_TIMECODE_TYPES,
  createMediaServiceError,
  toPutMediaOutput,
} from './transport/put-media';
export type { PutMediaInput, PutMediaOutput, FragmentTimecodeType } from './transport/put-media';
export { readPutMediaAcknowledgements } from './services/put-media-acks';
export type { PutMediaAcknowledgement, AckEventType } from './services/put-media-acks';
