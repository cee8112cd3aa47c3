/**
 * Server-sent event decoding for the Anthropic streaming API.
 *
 * Bytes → SSE messages (eventsource-parser) → typed StreamEvent → text chunks.
 * A malformed event is logged and dropped whole; the stream carries on.
 */

import { createParser, type EventSourceMessage } from 'eventsource-parser';
import { z } from 'zod';
import type { StreamEvent } from '../types/index.js';
import { StreamDecodeError } from '../core/errors.js';
import { ok, err, type Result } from '../core/result.js';

const EventTypeSchema = z.object({ type: z.string() });

const BlockStartSchema = z.object({
  content_block: z.object({ text: z.string() }),
});

const BlockDeltaSchema = z.object({
  delta: z.object({ text: z.string() }),
});

/** Decode the `data:` field of one event */
export function parseStreamEvent(data: string): Result<StreamEvent, StreamDecodeError> {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return err(new StreamDecodeError(`Failed to parse JSON: ${data}`, data));
  }

  const base = EventTypeSchema.safeParse(json);
  if (!base.success) {
    return err(new StreamDecodeError('Unexpected data structure: missing "type"', data));
  }

  const { type } = base.data;
  switch (type) {
    case 'content_block_start': {
      const parsed = BlockStartSchema.safeParse(json);
      return parsed.success
        ? ok<StreamEvent>({ kind: type, text: parsed.data.content_block.text })
        : err(new StreamDecodeError('Unexpected data structure: content_block.text', data));
    }
    case 'content_block_delta': {
      const parsed = BlockDeltaSchema.safeParse(json);
      return parsed.success
        ? ok<StreamEvent>({ kind: type, text: parsed.data.delta.text })
        : err(new StreamDecodeError('Unexpected data structure: delta.text', data));
    }
    case 'message_stop':
      return ok<StreamEvent>({ kind: type });
    default:
      return ok<StreamEvent>({ kind: 'other', type });
  }
}

/**
 * Read SSE messages off a response body, in arrival order.
 * Stopping early cancels the body so the connection is released.
 */
export async function* readEvents(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<EventSourceMessage, void, undefined> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  const queue: EventSourceMessage[] = [];
  const parser = createParser({
    onEvent: (event) => {
      queue.push(event);
    },
  });

  let drained = false;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        drained = true;
        parser.feed(decoder.decode());
        yield* queue.splice(0);
        return;
      }
      parser.feed(decoder.decode(value, { stream: true }));
      yield* queue.splice(0);
    }
  } catch (error) {
    drained = true;
    throw error;
  } finally {
    if (!drained) {
      await reader.cancel().catch((error: unknown) => {
        console.warn('[relay] Failed to cancel response body:', error);
      });
    }
  }
}

/**
 * Turn an Anthropic event stream into text chunks.
 * Ends at message_stop, or when the body ends.
 */
export async function* decodeStream(
  body: ReadableStream<Uint8Array>
): AsyncGenerator<string, void, undefined> {
  for await (const message of readEvents(body)) {
    const event = parseStreamEvent(message.data);
    if (!event.ok) {
      console.error(`[relay] ${event.error.message}`);
      console.debug(`[relay] Full data: ${event.error.data}`);
      continue;
    }

    switch (event.value.kind) {
      case 'content_block_start':
      case 'content_block_delta':
        yield event.value.text;
        break;
      case 'message_stop':
        return;
      case 'other':
        console.debug(`[relay] Skipping event: ${event.value.type}`);
        break;
      default: {
        const unhandled: never = event.value;
        console.warn('[relay] Unhandled stream event:', unhandled);
      }
    }
  }
}
