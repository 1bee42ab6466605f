import { describe, it, expect } from 'vitest';
import {
  ClientLimitExceededException,
  ConnectionLimitExceededException,
  InvalidEndpointException,
  KinesisVideoMediaServiceException,
  NotAuthorizedException,
} from '@aws-sdk/client-kinesis-video-media';
import {
  createMediaServiceError,
  FRAGMENT_TIMECODE_TYPES,
  PUT_MEDIA_MODEL,
  toPutMediaOutput,
} from '../../src/transport/put-media';
import { structureShape } from '../../src/transport/operation-descriptor';

describe('PUT_MEDIA_MODEL', () => {
  it('should describe POST /putMedia with an unsigned body', () => {
    expect(PUT_MEDIA_MODEL.operation.name).toBe('PutMedia');
    expect(PUT_MEDIA_MODEL.operation.http).toEqual({ method: 'POST', requestUri: '/putMedia' });
    expect(PUT_MEDIA_MODEL.operation.authType).toBe('v4-unsigned-body');
  });

  it('should declare the six media error kinds', () => {
    expect(PUT_MEDIA_MODEL.operation.errors.map((error) => error.shape)).toEqual([
      'ResourceNotFoundException',
      'NotAuthorizedException',
      'InvalidEndpointException',
      'ClientLimitExceededException',
      'ConnectionLimitExceededException',
      'InvalidArgumentException',
    ]);
  });

  it('should bind timecode type, start timestamp and stream to headers', () => {
    const input = structureShape(PUT_MEDIA_MODEL, 'PutMediaInput');

    expect(input.required).toEqual(['FragmentTimecodeType', 'ProducerStartTimestamp']);
    expect(input.payload).toBe('Payload');
    expect(input.members.FragmentTimecodeType.locationName).toBe('x-amzn-fragment-timecode-type');
    expect(input.members.ProducerStartTimestamp.locationName).toBe('x-amzn-producer-start-timestamp');
    expect(input.members.StreamARN.locationName).toBe('x-amzn-stream-arn');
    expect(input.members.StreamName.locationName).toBe('x-amzn-stream-name');
    expect(PUT_MEDIA_MODEL.shapes.FragmentTimecodeType).toEqual({
      type: 'string',
      enum: ['ABSOLUTE', 'RELATIVE'],
    });
  });

  it('should return the acknowledgement stream as the output payload', () => {
    expect(structureShape(PUT_MEDIA_MODEL, 'PutMediaOutput').payload).toBe('Payload');
  });

  it('should fail for shapes the model does not define', () => {
    expect(() => structureShape(PUT_MEDIA_MODEL, 'Missing')).toThrow(
      'Operation model PutMedia does not define structure shape "Missing"'
    );
    expect(() => structureShape(PUT_MEDIA_MODEL, 'Timestamp')).toThrow(
      'Operation model PutMedia does not define structure shape "Timestamp"'
    );
  });
});

describe('createMediaServiceError', () => {
  const metadata = { httpStatusCode: 400, requestId: 'req-1' };

  it.each([
    ['NotAuthorizedException', NotAuthorizedException],
    ['InvalidEndpointException', InvalidEndpointException],
    ['ClientLimitExceededException', ClientLimitExceededException],
    ['ConnectionLimitExceededException', ConnectionLimitExceededException],
  ])('should build %s', (code, ErrorClass) => {
    const error = createMediaServiceError(code, 'denied', metadata);

    expect(error).toBeInstanceOf(ErrorClass);
    expect(error.name).toBe(code);
    expect(error.message).toBe('denied');
  });

  it('should fall back to the service exception for unknown codes', () => {
    const error = createMediaServiceError('ThrottlingException', 'slow down', metadata);

    expect(error).toBeInstanceOf(KinesisVideoMediaServiceException);
    expect(error.name).toBe('ThrottlingException');
    expect(error).toMatchObject({ $fault: 'client', $metadata: metadata });
  });
});

describe('toPutMediaOutput', () => {
  it('should keep the acknowledgement payload and typed metadata', () => {
    const output = toPutMediaOutput({
      Payload: 'acks',
      $metadata: { httpStatusCode: 200, requestId: 'req-1', attempts: 1 },
    });

    expect(output).toStrictEqual({
      Payload: 'acks',
      $metadata: { httpStatusCode: 200, requestId: 'req-1' },
    });
  });

  it('should drop metadata fields of the wrong type', () => {
    const output = toPutMediaOutput({ Payload: 'acks', $metadata: { httpStatusCode: '200' } });

    expect(output.$metadata.httpStatusCode).toBeUndefined();
    expect(output.$metadata.requestId).toBeUndefined();
  });
});

describe('FRAGMENT_TIMECODE_TYPES', () => {
  it('should match the values the descriptor accepts', () => {
    expect(PUT_MEDIA_MODEL.shapes.FragmentTimecodeType).toEqual({
      type: 'string',
      enum: [...FRAGMENT_TIMECODE_TYPES],
    });
  });
});
