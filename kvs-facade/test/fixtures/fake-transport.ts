import { ServiceSurface } from '../../src/config/kinesis-video-config';
import type { OperationModel } from '../../src/transport/operation-descriptor';
import type {
  OperationInput,
  OperationOutput,
  TransportClient,
  TransportClientFactory,
} from '../../src/transport/types';

/**
 * Everything the fake transport did, in order.
 */
export type TransportEvent =
  | { kind: 'create'; surface: ServiceSurface; endpoint: string | undefined }
  | {
      kind: 'call';
      surface: ServiceSurface;
      endpoint: string | undefined;
      operationName: string;
      input: OperationInput;
    };

export type OperationHandler = (
  input: OperationInput,
  client: FakeTransportClient
) => OperationOutput | Promise<OperationOutput>;

export const DEFAULT_OPERATIONS: Record<ServiceSurface, string[]> = {
  [ServiceSurface.CONTROL]: [
    'CreateStream',
    'DeleteStream',
    'DescribeStream',
    'GetDataEndpoint',
    'ListStreams',
  ],
  [ServiceSurface.MEDIA]: ['GetMedia'],
  [ServiceSurface.ARCHIVED_MEDIA]: ['GetClip', 'GetHLSStreamingSessionURL', 'ListFragments'],
};

export const TEST_STREAM_ARN = 'arn:aws:kinesisvideo:us-west-2:123456789012:stream/teststream/1234567890123';
export const TEST_DATA_ENDPOINT = 'https://b-1234abcd.kinesisvideo.us-west-2.amazonaws.com';

export class FakeTransportClient implements TransportClient {
  public readonly registered: OperationModel[] = [];
  public destroyed = false;

  constructor(
    public readonly surface: ServiceSurface,
    public readonly endpoint: string | undefined,
    private readonly transport: FakeTransport
  ) {}

  operationNames(): string[] {
    return [
      ...this.transport.operations[this.surface],
      ...this.registered.map((model) => model.operation.name),
    ];
  }

  async call(operationName: string, input: OperationInput): Promise<OperationOutput> {
    this.transport.events.push({
      kind: 'call',
      surface: this.surface,
      endpoint: this.endpoint,
      operationName,
      input,
    });
    const handler = this.transport.handlers[operationName];
    return handler ? handler(input, this) : { $metadata: {} };
  }

  registerOperation(model: OperationModel): void {
    this.registered.push(model);
  }

  destroy(): void {
    this.destroyed = true;
  }
}

export interface FakeTransport {
  factory: TransportClientFactory;
  events: TransportEvent[];
  clients: FakeTransportClient[];
  operations: Record<ServiceSurface, string[]>;
  handlers: Record<string, OperationHandler | undefined>;
  /** Call events only, without client creation */
  calls(): Extract<TransportEvent, { kind: 'call' }>[];
}

/**
 * In-process transport: answers DescribeStream and GetDataEndpoint with the
 * test ARN and endpoint unless handlers are overridden.
 */
export function createFakeTransport(
  overrides: {
    operations?: Partial<Record<ServiceSurface, string[]>>;
    handlers?: Record<string, OperationHandler | undefined>;
  } = {}
): FakeTransport {
  const transport: FakeTransport = {
    events: [],
    clients: [],
    operations: { ...DEFAULT_OPERATIONS, ...overrides.operations },
    handlers: {
      DescribeStream: () => ({ StreamInfo: { StreamARN: TEST_STREAM_ARN }, $metadata: {} }),
      GetDataEndpoint: () => ({ DataEndpoint: TEST_DATA_ENDPOINT, $metadata: {} }),
      ...overrides.handlers,
    },
    factory: (surface, endpoint) => {
      transport.events.push({ kind: 'create', surface, endpoint });
      const client = new FakeTransportClient(surface, endpoint, transport);
      transport.clients.push(client);
      return client;
    },
    calls: () =>
      transport.events.filter(
        (event): event is Extract<TransportEvent, { kind: 'call' }> => event.kind === 'call'
      ),
  };
  return transport;
}
