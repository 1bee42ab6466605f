import type { ServiceSurface } from '../config/kinesis-video-config';
import { ConfigurationError, NoSuchOperationError } from '../types/errors';
import type { OperationModel } from './operation-descriptor';
import { invokeRawOperation, RawCallContext } from './raw-operation';
import { isRecord, OperationInput, OperationOutput, TransportClient } from './types';

/**
 * Structural view of an AWS SDK v3 command instance.
 */
export interface SdkCommand {
  readonly input: unknown;
}

export type CommandConstructor = new (input: OperationInput) => SdkCommand;

/**
 * Structural view of an AWS SDK v3 client (`KinesisVideoClient`, ...).
 */
export interface SdkClient {
  send(command: SdkCommand): Promise<unknown>;
  destroy(): void;
}

const COMMAND_EXPORT = /^([A-Z][A-Za-z0-9]*)Command$/;

function isCommandConstructor(value: unknown): value is CommandConstructor {
  return typeof value === 'function';
}

/**
 * Collect the operation table of an SDK client package from its exports.
 * `DescribeStreamCommand` becomes operation `DescribeStream`.
 */
export function collectCommands(sdkModule: object): Map<string, CommandConstructor> {
  const commands = new Map<string, CommandConstructor>();
  const entries: [string, unknown][] = Object.entries(sdkModule);

  for (const [exportName, value] of entries) {
    const match = COMMAND_EXPORT.exec(exportName);
    if (match && isCommandConstructor(value)) {
      commands.set(match[1], value);
    }
  }
  return commands;
}

/**
 * Transport client backed by an AWS SDK v3 client plus a per-instance table
 * of descriptor-defined operations.
 */
export class SdkTransportClient implements TransportClient {
  private readonly rawOperations = new Map<string, OperationModel>();

  constructor(
    public readonly surface: ServiceSurface,
    public readonly endpoint: string | undefined,
    private readonly client: SdkClient,
    private readonly commands: ReadonlyMap<string, CommandConstructor>,
    private readonly rawCallContext?: RawCallContext
  ) {}

  operationNames(): string[] {
    const names = new Set<string>(this.commands.keys());
    for (const name of this.rawOperations.keys()) {
      names.add(name);
    }
    return [...names];
  }

  registerOperation(model: OperationModel): void {
    this.rawOperations.set(model.operation.name, model);
  }

  describeOperation(operationName: string): OperationModel | undefined {
    return this.rawOperations.get(operationName);
  }

  async call(operationName: string, input: OperationInput): Promise<OperationOutput> {
    const model = this.rawOperations.get(operationName);
    if (model) {
      return this.callRaw(model, input);
    }

    const Command = this.commands.get(operationName);
    if (!Command) {
      throw new NoSuchOperationError(operationName, `not provided by ${this.surface}`);
    }

    const output = await this.client.send(new Command(input));
    return isRecord(output) ? output : { $metadata: {} };
  }

  destroy(): void {
    this.client.destroy();
    this.rawCallContext?.requestHandler.destroy?.();
  }

  private async callRaw(model: OperationModel, input: OperationInput): Promise<OperationOutput> {
    if (!this.rawCallContext) {
      throw new ConfigurationError(
        `${model.operation.name} cannot be issued by a ${this.surface} client`
      );
    }
    if (!this.endpoint) {
      throw new ConfigurationError(
        `${model.operation.name} requires a resolved data endpoint; call it through the facade`
      );
    }
    return invokeRawOperation(model, input, this.endpoint, this.rawCallContext);
  }
}
