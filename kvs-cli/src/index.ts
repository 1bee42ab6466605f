#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { version } from '../package.json';
import { invokeCommand, InvokeOptions } from './commands/invoke';
import { operationsCommand, OperationsOptions } from './commands/operations';
import { putMediaCommand, PutMediaOptions } from './commands/put-media';
import { errorMessage, GlobalOptions } from './services/facade-factory';

export function createProgram(): Command {
  const program = new Command();
  const globals = () => program.opts<GlobalOptions>();

  program
    .name('kvs')
    .description('Invoke any Kinesis Video control-plane or data-plane operation by name')
    .version(version)
    .option('--region <region>', 'AWS region (default: KVS_REGION, then AWS_REGION)')
    .option('--verbose', 'Log stream and endpoint resolution');

  program
    .command('operations')
    .description('List the operations every service surface provides')
    .option('--surface <surface>', 'Only list kinesisvideo, kinesis-video-media or kinesis-video-archived-media')
    .option('--json', 'Print the listing as JSON')
    .action((options: OperationsOptions) => operationsCommand({ ...globals(), ...options }));

  program
    .command('invoke')
    .description('Invoke an operation and print its result')
    .argument('<operation>', 'Operation name, e.g. ListStreams or GetMedia')
    .option('--input <json>', 'Operation input as a JSON object')
    .option('--input-file <path>', 'Read the operation input from a JSON file')
    .option('--output <file>', 'Write a streamed payload to this file')
    .action((operation: string, options: InvokeOptions) =>
      invokeCommand(operation, { ...globals(), ...options })
    );

  program
    .command('put-media')
    .description('Upload an MKV file to a stream and print the acknowledgements')
    .argument('<file>', 'MKV media file')
    .option('--stream-name <name>', 'Target stream name')
    .option('--stream-arn <arn>', 'Target stream ARN')
    .option('--timecode-type <type>', 'ABSOLUTE or RELATIVE fragment timecodes', 'ABSOLUTE')
    .option('--start-timestamp <seconds>', 'Producer start time in epoch seconds (default: now)')
    .action((file: string, options: PutMediaOptions) =>
      putMediaCommand(file, { ...globals(), ...options })
    );

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(chalk.red('✗'), errorMessage(error));
      process.exitCode = 1;
    });
}
