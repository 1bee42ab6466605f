import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import type { OperationInput } from 'kvs-facade';
import { putMediaCommand } from './put-media';
import { createFacade } from '../services/facade-factory';
import { createStubFacade, STUB_STREAM_ARN, StubFacade } from '../../test/fixtures/stub-facade';

vi.mock('../services/facade-factory', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../services/facade-factory')>();
  return { ...actual, createFacade: vi.fn() };
});

function acknowledgements(...events: object[]): Readable {
  return Readable.from(events.map((event) => `${JSON.stringify(event)}\n`));
}

describe('putMediaCommand', () => {
  let stub: StubFacade;
  let workDir: string;
  let mediaFile: string;
  let received: OperationInput | undefined;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kvs-put-media-'));
    mediaFile = path.join(workDir, 'clip.mkv');
    fs.writeFileSync(mediaFile, 'mkv-bytes');

    received = undefined;
    stub = createStubFacade({
      PutMedia: (input) => {
        received = input;
        return {
          Payload: acknowledgements(
            { EventType: 'RECEIVED', FragmentNumber: '1', FragmentTimecode: 0 },
            { EventType: 'PERSISTED', FragmentNumber: '1', FragmentTimecode: 0 }
          ),
          $metadata: {},
        };
      },
    });
    vi.mocked(createFacade).mockReturnValue(stub.facade);
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('should upload the file and print each acknowledgement', async () => {
    await putMediaCommand(mediaFile, {
      streamName: 'teststream',
      timecodeType: 'relative',
      startTimestamp: '1700000000.5',
    });

    expect(received).toMatchObject({
      StreamName: 'teststream',
      StreamARN: undefined,
      FragmentTimecodeType: 'RELATIVE',
      ProducerStartTimestamp: 1700000000.5,
    });
    expect(received?.Payload).toBeInstanceOf(fs.ReadStream);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('RECEIVED fragment 1 @0'));
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('PERSISTED fragment 1 @0'));
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining('Upload complete (2 acknowledgement(s))')
    );
    expect(process.exitCode).toBeUndefined();
  });

  it('should default to ABSOLUTE timecodes starting now', async () => {
    vi.spyOn(Date, 'now').mockReturnValue(1700000000000);

    await putMediaCommand(mediaFile, { streamArn: STUB_STREAM_ARN });

    expect(received).toMatchObject({
      StreamARN: STUB_STREAM_ARN,
      FragmentTimecodeType: 'ABSOLUTE',
      ProducerStartTimestamp: 1700000000,
    });
    expect(stub.calls.map((call) => call.operationName)).toEqual(['GetDataEndpoint', 'PutMedia']);
    expect(stub.calls[0].input).toEqual({ StreamARN: STUB_STREAM_ARN, APIName: 'PUT_MEDIA' });
  });

  it('should set a failing exit code when an acknowledgement reports an error', async () => {
    stub.handlers.PutMedia = () => ({
      Payload: acknowledgements({
        EventType: 'ERROR',
        FragmentNumber: '2',
        FragmentTimecode: 1000,
        ErrorId: 4002,
        ErrorCode: 'INVALID_MKV_DATA',
      }),
      $metadata: {},
    });

    await putMediaCommand(mediaFile, { streamName: 'teststream' });

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('ERROR fragment 2 @1000: INVALID_MKV_DATA (4002)')
    );
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('1 of 1 acknowledgement(s) reported errors')
    );
    expect(process.exitCode).toBe(1);
  });

  it('should fail before creating a facade when the file is missing', async () => {
    await putMediaCommand(path.join(workDir, 'missing.mkv'), { streamName: 'teststream' });

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('PutMedia failed'),
      `Media file not found: ${path.join(workDir, 'missing.mkv')}`
    );
    expect(createFacade).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it('should reject a start timestamp that is not epoch seconds', async () => {
    await putMediaCommand(mediaFile, { streamName: 'teststream', startTimestamp: 'soon' });

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('PutMedia failed'),
      '--start-timestamp must be epoch seconds, got "soon"'
    );
    expect(received).toBeUndefined();
  });

  it('should require exactly one of --stream-name and --stream-arn', async () => {
    await putMediaCommand(mediaFile, { streamName: 'teststream', streamArn: STUB_STREAM_ARN });

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('PutMedia failed'),
      'Exactly one of StreamName or StreamARN must be supplied to determine the service endpoint'
    );
    expect(stub.calls).toEqual([]);
    expect(process.exitCode).toBe(1);
  });

  it('should reject a timecode type PutMedia does not accept', async () => {
    await putMediaCommand(mediaFile, { streamName: 'teststream', timecodeType: 'sideways' });

    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('PutMedia failed'),
      '--timecode-type must be ABSOLUTE or RELATIVE, got "sideways"'
    );
    expect(createFacade).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });
});
