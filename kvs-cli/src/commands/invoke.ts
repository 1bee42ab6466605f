import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  ConfigurationError,
  isRecord,
  KinesisVideoFacade,
  OperationInput,
  OperationOutput,
} from 'kvs-facade';
import { createFacade, errorMessage, GlobalOptions } from '../services/facade-factory';

export interface InvokeOptions extends GlobalOptions {
  input?: string;
  inputFile?: string;
  output?: string;
}

/**
 * Invoke any operation by name and print its result as JSON.
 * A streamed payload (GetMedia, GetClip, ...) is written to --output.
 */
export async function invokeCommand(operation: string, options: InvokeOptions): Promise<void> {
  let facade: KinesisVideoFacade | undefined;
  try {
    const input = readInput(options);
    facade = createFacade(options);

    const result = await facade.invoke(operation, input);
    const printable = await writeStreams(operation, result, options.output);

    console.log(JSON.stringify(printable, null, 2));
  } catch (error) {
    console.error(chalk.red(`✗ ${operation} failed:`), errorMessage(error));
    process.exitCode = 1;
  } finally {
    facade?.destroy();
  }
}

function readInput(options: InvokeOptions): OperationInput {
  if (options.input !== undefined && options.inputFile !== undefined) {
    throw new ConfigurationError('Use either --input or --input-file, not both');
  }

  let raw: string | undefined = options.input;
  let source = '--input';
  if (options.inputFile !== undefined) {
    raw = fs.readFileSync(path.resolve(options.inputFile), 'utf-8');
    source = options.inputFile;
  }
  if (raw === undefined || raw.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${source}: ${errorMessage(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Input in ${source} must be a JSON object`);
  }
  return parsed;
}

async function writeStreams(
  operation: string,
  result: OperationOutput,
  outputFile: string | undefined
): Promise<Record<string, unknown>> {
  const printable: Record<string, unknown> = {};

  for (const [field, value] of Object.entries(result)) {
    if (field === '$metadata') continue;

    if (value instanceof Readable) {
      if (outputFile === undefined) {
        value.destroy();
        throw new ConfigurationError(`${operation} returned a stream in ${field}; use --output <file>`);
      }
      await pipeline(value, fs.createWriteStream(outputFile));
      console.error(chalk.green(`✓ ${field} written to ${outputFile}`));
      printable[field] = outputFile;
      continue;
    }

    printable[field] = value;
  }

  return printable;
}
