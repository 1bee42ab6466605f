import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'fs';
import * as path from 'path';
import {
  ConfigurationError,
  FRAGMENT_TIMECODE_TYPES,
  FragmentTimecodeType,
  KinesisVideoFacade,
  PUT_MEDIA_OPERATION_NAME,
  PutMediaAcknowledgement,
  PutMediaInput,
  readPutMediaAcknowledgements,
  toPutMediaOutput,
} from 'kvs-facade';
import { createFacade, errorMessage, GlobalOptions } from '../services/facade-factory';

export interface PutMediaOptions extends GlobalOptions {
  streamName?: string;
  streamArn?: string;
  timecodeType?: string;
  startTimestamp?: string;
}

/**
 * Upload an MKV file with PutMedia and print each acknowledgement as it arrives.
 */
export async function putMediaCommand(file: string, options: PutMediaOptions): Promise<void> {
  let facade: KinesisVideoFacade | undefined;
  let media: fs.ReadStream | undefined;
  const spinner = ora(`Uploading ${file}...`);

  try {
    const filePath = path.resolve(file);
    if (!fs.existsSync(filePath)) {
      throw new ConfigurationError(`Media file not found: ${file}`);
    }
    const fragmentTimecodeType = parseTimecodeType(options.timecodeType);
    const producerStartTimestamp = parseStartTimestamp(options.startTimestamp);

    facade = createFacade(options);
    media = fs.createReadStream(filePath);
    spinner.start();

    const input = {
      StreamName: options.streamName,
      StreamARN: options.streamArn,
      FragmentTimecodeType: fragmentTimecodeType,
      ProducerStartTimestamp: producerStartTimestamp,
      Payload: media,
    } satisfies PutMediaInput;
    const output = toPutMediaOutput(await facade.invoke(PUT_MEDIA_OPERATION_NAME, input));

    let acknowledged = 0;
    let failed = 0;
    for await (const ack of readPutMediaAcknowledgements(output.Payload)) {
      if (spinner.isSpinning) spinner.stop();
      printAcknowledgement(ack);
      acknowledged++;
      if (ack.EventType === 'ERROR') failed++;
    }

    if (failed > 0) {
      console.error(chalk.red(`✗ ${failed} of ${acknowledged} acknowledgement(s) reported errors`));
      process.exitCode = 1;
    } else {
      console.log(chalk.green(`✓ Upload complete (${acknowledged} acknowledgement(s))`));
    }
  } catch (error) {
    if (spinner.isSpinning) spinner.fail('PutMedia failed');
    console.error(chalk.red('✗ PutMedia failed:'), errorMessage(error));
    process.exitCode = 1;
  } finally {
    media?.destroy();
    facade?.destroy();
  }
}

function parseTimecodeType(raw: string | undefined): FragmentTimecodeType {
  const normalized = (raw ?? 'ABSOLUTE').trim().toUpperCase();
  const timecodeType = FRAGMENT_TIMECODE_TYPES.find((candidate) => candidate === normalized);
  if (!timecodeType) {
    throw new ConfigurationError(
      `--timecode-type must be ${FRAGMENT_TIMECODE_TYPES.join(' or ')}, got "${raw}"`
    );
  }
  return timecodeType;
}

function parseStartTimestamp(raw: string | undefined): number {
  if (raw === undefined) {
    return Date.now() / 1000;
  }
  const seconds = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigurationError(`--start-timestamp must be epoch seconds, got "${raw}"`);
  }
  return seconds;
}

function printAcknowledgement(ack: PutMediaAcknowledgement): void {
  const fragment = ack.FragmentNumber ? ` fragment ${ack.FragmentNumber}` : '';
  const timecode = ack.FragmentTimecode !== undefined ? ` @${ack.FragmentTimecode}` : '';

  switch (ack.EventType) {
    case 'ERROR':
      console.error(
        chalk.red(`  ✗ ERROR${fragment}${timecode}: ${ack.ErrorCode ?? 'unknown'} (${ack.ErrorId ?? '-'})`)
      );
      break;
    case 'PERSISTED':
      console.log(chalk.green(`  ✓ PERSISTED${fragment}${timecode}`));
      break;
    default:
      console.log(chalk.gray(`  ${ack.EventType}${fragment}${timecode}`));
  }
}
