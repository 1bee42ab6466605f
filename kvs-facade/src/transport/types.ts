import type { ServiceSurface } from '../config/kinesis-video-config';
import type { OperationModel } from './operation-descriptor';

/** Operation input, keyed by AWS member name (`StreamName`, `MaxResults`, ...). */
export type OperationInput = Record<string, unknown>;

/** Operation output as returned by the transport, including `$metadata`. */
export type OperationOutput = Record<string, unknown>;

/**
 * A live client for one service surface, bound to one endpoint.
 */
export interface TransportClient {
  readonly surface: ServiceSurface;

  /** Resolved endpoint, or undefined for the surface's default endpoint */
  readonly endpoint: string | undefined;

  /** Every operation this client can perform, by AWS operation name */
  operationNames(): string[];

  /** Generic call mechanism keyed by operation name */
  call(operationName: string, input: OperationInput): Promise<OperationOutput>;

  /**
   * Add an operation that the SDK does not model. Later `call`s with its name
   * are issued as raw HTTP requests built from the descriptor.
   */
  registerOperation(model: OperationModel): void;

  /** Release sockets held by the underlying client */
  destroy(): void;
}

/**
 * Creates a transport client for a surface, optionally bound to an explicit endpoint.
 */
export type TransportClientFactory = (
  surface: ServiceSurface,
  endpoint: string | undefined
) => TransportClient;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
