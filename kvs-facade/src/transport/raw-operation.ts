/**
 * Raw HTTP execution of descriptor-defined operations.
 *
 * Builds the request from the operation model, signs it with SigV4 and sends it
 * through the same kind of HTTP handler the SDK clients use.
 */

import { Readable } from 'stream';
import { Sha256 } from '@aws-crypto/sha256-js';
import { HttpRequest } from '@smithy/protocol-http';
import { SignatureV4 } from '@smithy/signature-v4';
import type {
  AwsCredentialIdentity,
  HeaderBag,
  HttpRequest as IHttpRequest,
  HttpResponse as IHttpResponse,
} from '@smithy/types';
import { ConfigurationError } from '../types/errors';
import {
  OperationModel,
  ShapeDescriptor,
  structureShape,
} from './operation-descriptor';
import { isRecord, OperationInput, OperationOutput } from './types';

export const UNSIGNED_PAYLOAD = 'UNSIGNED-PAYLOAD';
export const CONTENT_SHA256_HEADER = 'x-amz-content-sha256';

/**
 * Minimal HTTP handler contract (satisfied by `NodeHttpHandler`).
 */
export interface HttpHandlerLike {
  handle(request: IHttpRequest): Promise<{ response: IHttpResponse }>;
  destroy?(): void;
}

/**
 * Builds the error thrown for a non-2xx response.
 */
export type ServiceErrorFactory = (
  code: string | undefined,
  message: string,
  metadata: { httpStatusCode: number; requestId?: string }
) => Error;

/**
 * Everything a transport client lends to raw operations.
 */
export interface RawCallContext {
  readonly signingName: string;
  readonly region: () => Promise<string>;
  readonly credentials: () => Promise<AwsCredentialIdentity>;
  readonly requestHandler: HttpHandlerLike;
  readonly createError: ServiceErrorFactory;
}

export type RequestBody = string | Uint8Array | Readable;

/**
 * Serialize input into an unsigned `HttpRequest` for the given endpoint.
 * Rejects unknown members, missing required members and invalid enum values.
 */
export function buildRawRequest(
  model: OperationModel,
  input: OperationInput,
  endpoint: string
): HttpRequest {
  const { operation } = model;
  const inputShape = structureShape(model, operation.input.shape);

  for (const key of Object.keys(input)) {
    if (!(key in inputShape.members)) {
      throw new ConfigurationError(`Unknown parameter "${key}" for ${operation.name}`);
    }
  }
  for (const required of inputShape.required ?? []) {
    if (input[required] === undefined || input[required] === null) {
      throw new ConfigurationError(`Missing required parameter "${required}" for ${operation.name}`);
    }
  }

  const url = new URL(endpoint);
  const headers: HeaderBag = { host: url.host };
  let body: RequestBody | undefined;

  for (const [memberName, member] of Object.entries(inputShape.members)) {
    const value = input[memberName];
    if (value === undefined || value === null) continue;

    if (memberName === inputShape.payload) {
      body = toRequestBody(value, memberName, operation.name);
      continue;
    }
    if (member.location === 'header') {
      const shape = model.shapes[member.shape];
      headers[(member.locationName ?? memberName).toLowerCase()] = serializeHeader(
        value,
        shape,
        memberName,
        operation.name
      );
    }
  }

  if (operation.authType === 'v4-unsigned-body') {
    headers[CONTENT_SHA256_HEADER] = UNSIGNED_PAYLOAD;
  }

  return new HttpRequest({
    protocol: url.protocol,
    hostname: url.hostname,
    port: url.port ? Number(url.port) : undefined,
    method: operation.http.method,
    path: joinPath(url.pathname, operation.http.requestUri),
    headers,
    body,
  });
}

/**
 * Build, sign and send a descriptor-defined operation.
 */
export async function invokeRawOperation(
  model: OperationModel,
  input: OperationInput,
  endpoint: string,
  context: RawCallContext
): Promise<OperationOutput> {
  const request = buildRawRequest(model, input, endpoint);

  const signer = new SignatureV4({
    service: context.signingName,
    region: context.region,
    credentials: context.credentials,
    sha256: Sha256,
  });
  const signed = await signer.sign(request);
  const { response } = await context.requestHandler.handle(signed);

  const metadata = {
    httpStatusCode: response.statusCode,
    requestId: headerValue(response.headers, 'x-amzn-requestid'),
  };

  if (response.statusCode < 200 || response.statusCode >= 300) {
    const text = await readBodyText(response.body);
    const parsed = parseJsonObject(text);
    const code =
      errorCodeFromHeader(headerValue(response.headers, 'x-amzn-errortype')) ??
      errorCodeFromBody(parsed);
    const message =
      stringField(parsed, 'message') ??
      stringField(parsed, 'Message') ??
      `${model.operation.name} failed with HTTP ${response.statusCode}`;
    throw context.createError(code, message, metadata);
  }

  const outputShape = structureShape(model, model.operation.output.shape);
  const output: OperationOutput = { $metadata: metadata };
  if (outputShape.payload) {
    output[outputShape.payload] = response.body;
  }
  return output;
}

function serializeHeader(
  value: unknown,
  shape: ShapeDescriptor | undefined,
  memberName: string,
  operationName: string
): string {
  if (shape?.type === 'timestamp') {
    if (value instanceof Date) {
      return (value.getTime() / 1000).toFixed(3);
    }
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value.toFixed(3);
    }
    throw new ConfigurationError(
      `Parameter "${memberName}" for ${operationName} must be a Date or epoch seconds`
    );
  }

  if (typeof value !== 'string') {
    throw new ConfigurationError(`Parameter "${memberName}" for ${operationName} must be a string`);
  }
  if (shape?.type === 'string' && shape.enum && !shape.enum.includes(value)) {
    throw new ConfigurationError(
      `Parameter "${memberName}" for ${operationName} must be one of ${shape.enum.join(', ')}, got "${value}"`
    );
  }
  return value;
}

function toRequestBody(value: unknown, memberName: string, operationName: string): RequestBody {
  if (typeof value === 'string' || value instanceof Uint8Array || value instanceof Readable) {
    return value;
  }
  throw new ConfigurationError(
    `Parameter "${memberName}" for ${operationName} must be a string, Uint8Array or Readable stream`
  );
}

function joinPath(basePath: string, requestUri: string): string {
  const trimmed = basePath.endsWith('/') ? basePath.slice(0, -1) : basePath;
  return `${trimmed}${requestUri}`;
}

function headerValue(headers: HeaderBag, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

function errorCodeFromHeader(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  return raw.split(':')[0] || undefined;
}

function errorCodeFromBody(body: Record<string, unknown> | undefined): string | undefined {
  const type = stringField(body, '__type') ?? stringField(body, 'code');
  if (!type) return undefined;
  // `aws.namespace#Code` or `Code:http://...`
  const withoutNamespace = type.includes('#') ? type.slice(type.lastIndexOf('#') + 1) : type;
  return withoutNamespace.split(':')[0] || undefined;
}

function stringField(body: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = body?.[key];
  return typeof value === 'string' ? value : undefined;
}

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  if (text.trim() === '') return undefined;
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    // Not JSON: fall back to header code and a generic message
    return undefined;
  }
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.asyncIterator in value
  );
}

/**
 * Drain a response body of any shape the HTTP handler may hand back.
 */
export async function readBodyText(body: unknown): Promise<string> {
  if (body === undefined || body === null) return '';
  if (typeof body === 'string') return body;
  if (body instanceof Uint8Array) return Buffer.from(body).toString('utf-8');
  if (isAsyncIterable(body)) {
    const chunks: Buffer[] = [];
    for await (const chunk of body) {
      if (typeof chunk === 'string') {
        chunks.push(Buffer.from(chunk, 'utf-8'));
      } else if (chunk instanceof Uint8Array) {
        chunks.push(Buffer.from(chunk));
      }
    }
    return Buffer.concat(chunks).toString('utf-8');
  }
  return '';
}
