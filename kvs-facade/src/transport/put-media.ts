/**
 * PutMedia streaming-upload operation.
 *
 * The media surface SDK client only models GetMedia. PutMedia is added to each
 * media transport client's descriptor table when the client is created, and is
 * issued as a raw SigV4 call with an unsigned (streamed) body.
 *
 * Limitations:
 * - no per-fragment event stream decoding; the acknowledgement stream is returned
 *   as-is (see `readPutMediaAcknowledgements`)
 * - the request body is never content-signed
 */

import type { Readable } from 'stream';
import {
  ClientLimitExceededException,
  ConnectionLimitExceededException,
  InvalidArgumentException,
  InvalidEndpointException,
  KinesisVideoMediaServiceException,
  NotAuthorizedException,
  ResourceNotFoundException,
} from '@aws-sdk/client-kinesis-video-media';
import { PUT_MEDIA_OPERATION_NAME } from '../config/kinesis-video-config';
import type { OperationModel } from './operation-descriptor';
import type { ServiceErrorFactory } from './raw-operation';
import { isRecord, OperationOutput } from './types';

export type FragmentTimecodeType = 'ABSOLUTE' | 'RELATIVE';

export const FRAGMENT_TIMECODE_TYPES: readonly FragmentTimecodeType[] = ['ABSOLUTE', 'RELATIVE'];

export interface PutMediaInput {
  /** Whether fragment timecodes are absolute or relative to the producer start */
  FragmentTimecodeType: FragmentTimecodeType;

  /** Producer start time, as a Date or epoch seconds */
  ProducerStartTimestamp: Date | number;

  /** Target stream name (exclusive with StreamARN) */
  StreamName?: string;

  /** Target stream ARN (exclusive with StreamName) */
  StreamARN?: string;

  /** MKV media payload */
  Payload?: string | Uint8Array | Readable;
}

export interface PutMediaOutput {
  /** Newline-delimited JSON acknowledgement events */
  Payload: unknown;
  $metadata: { httpStatusCode?: number; requestId?: string };
}

/**
 * Narrow the result of a PutMedia call to its declared output.
 */
export function toPutMediaOutput(output: OperationOutput): PutMediaOutput {
  const metadata = isRecord(output.$metadata) ? output.$metadata : {};
  return {
    Payload: output.Payload,
    $metadata: {
      httpStatusCode:
        typeof metadata.httpStatusCode === 'number' ? metadata.httpStatusCode : undefined,
      requestId: typeof metadata.requestId === 'string' ? metadata.requestId : undefined,
    },
  };
}

/**
 * Descriptor for PutMedia, in AWS service model layout.
 */
export const PUT_MEDIA_MODEL: OperationModel = {
  operation: {
    name: PUT_MEDIA_OPERATION_NAME,
    http: {
      method: 'POST',
      requestUri: '/putMedia',
    },
    input: { shape: 'PutMediaInput' },
    output: { shape: 'PutMediaOutput' },
    errors: [
      { shape: 'ResourceNotFoundException' },
      { shape: 'NotAuthorizedException' },
      { shape: 'InvalidEndpointException' },
      { shape: 'ClientLimitExceededException' },
      { shape: 'ConnectionLimitExceededException' },
      { shape: 'InvalidArgumentException' },
    ],
    authType: 'v4-unsigned-body',
  },
  shapes: {
    PutMediaInput: {
      type: 'structure',
      required: ['FragmentTimecodeType', 'ProducerStartTimestamp'],
      members: {
        FragmentTimecodeType: {
          shape: 'FragmentTimecodeType',
          location: 'header',
          locationName: 'x-amzn-fragment-timecode-type',
        },
        ProducerStartTimestamp: {
          shape: 'Timestamp',
          location: 'header',
          locationName: 'x-amzn-producer-start-timestamp',
        },
        StreamARN: {
          shape: 'ResourceARN',
          location: 'header',
          locationName: 'x-amzn-stream-arn',
        },
        StreamName: {
          shape: 'StreamName',
          location: 'header',
          locationName: 'x-amzn-stream-name',
        },
        Payload: { shape: 'Payload' },
      },
      payload: 'Payload',
    },
    PutMediaOutput: {
      type: 'structure',
      members: {
        Payload: { shape: 'Payload' },
      },
      payload: 'Payload',
    },
    FragmentTimecodeType: {
      type: 'string',
      enum: [...FRAGMENT_TIMECODE_TYPES],
    },
    Timestamp: { type: 'timestamp' },
    ResourceARN: { type: 'string' },
    StreamName: { type: 'string' },
    Payload: { type: 'blob', streaming: true },
  },
};

/**
 * Map a PutMedia error response onto the media SDK's exception classes.
 */
export const createMediaServiceError: ServiceErrorFactory = (code, message, metadata) => {
  const options = { $metadata: metadata, message, Message: message };

  switch (code) {
    case 'ResourceNotFoundException':
      return new ResourceNotFoundException(options);
    case 'NotAuthorizedException':
      return new NotAuthorizedException(options);
    case 'InvalidEndpointException':
      return new InvalidEndpointException(options);
    case 'ClientLimitExceededException':
      return new ClientLimitExceededException(options);
    case 'ConnectionLimitExceededException':
      return new ConnectionLimitExceededException(options);
    case 'InvalidArgumentException':
      return new InvalidArgumentException(options);
    default:
      return new KinesisVideoMediaServiceException({
        name: code ?? 'KinesisVideoMediaServiceException',
        $fault: metadata.httpStatusCode >= 500 ? 'server' : 'client',
        $metadata: metadata,
        message,
      });
  }
};
