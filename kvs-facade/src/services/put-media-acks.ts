import { isRecord } from '../transport/types';

export type AckEventType = 'BUFFERING' | 'RECEIVED' | 'PERSISTED' | 'ERROR' | 'IDLE';

/**
 * One acknowledgement emitted by PutMedia for an uploaded fragment.
 */
export interface PutMediaAcknowledgement {
  EventType: AckEventType | string;
  FragmentTimecode?: number;
  FragmentNumber?: string;
  ErrorId?: number;
  ErrorCode?: string;
}

function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value;
}

function toAcknowledgement(line: string): PutMediaAcknowledgement {
  const parsed: unknown = JSON.parse(line);
  if (!isRecord(parsed) || typeof parsed.EventType !== 'string') {
    throw new Error(`Malformed PutMedia acknowledgement: ${line}`);
  }

  const ack: PutMediaAcknowledgement = { EventType: parsed.EventType };
  if (typeof parsed.FragmentTimecode === 'number') ack.FragmentTimecode = parsed.FragmentTimecode;
  if (typeof parsed.FragmentNumber === 'string') ack.FragmentNumber = parsed.FragmentNumber;
  if (typeof parsed.ErrorId === 'number') ack.ErrorId = parsed.ErrorId;
  if (typeof parsed.ErrorCode === 'string') ack.ErrorCode = parsed.ErrorCode;
  return ack;
}

/**
 * Parse the newline-delimited JSON acknowledgements of a PutMedia response payload.
 * Events are yielded as soon as their line is complete; blank lines are skipped.
 */
export async function* readPutMediaAcknowledgements(
  payload: unknown
): AsyncGenerator<PutMediaAcknowledgement> {
  if (!isAsyncIterable(payload)) {
    throw new TypeError('PutMedia payload is not a readable stream');
  }

  const decoder = new TextDecoder('utf-8');
  let buffered = '';

  for await (const chunk of payload) {
    if (typeof chunk === 'string') {
      buffered += chunk;
    } else if (chunk instanceof Uint8Array) {
      buffered += decoder.decode(chunk, { stream: true });
    } else {
      continue;
    }

    let newline = buffered.indexOf('\n');
    while (newline !== -1) {
      const line = buffered.slice(0, newline).trim();
      buffered = buffered.slice(newline + 1);
      if (line !== '') {
        yield toAcknowledgement(line);
      }
      newline = buffered.indexOf('\n');
    }
  }

  const rest = (buffered + decoder.decode()).trim();
  if (rest !== '') {
    yield toAcknowledgement(rest);
  }
}
