/**
 * Anthropic adapter — forwards host chat turns to the Messages API.
 *
 * Plain fetch() against /v1/messages, no SDK. Streaming responses are
 * decoded in sse.ts; everything else happens here:
 *   1. Pop the system turn, normalize content, enforce image limits
 *   2. Assemble the request (options bag → params, defaults from valves)
 *   3. POST, then return the text or a lazy chunk stream
 */

import { z } from 'zod';
import type { Valves } from '../types/index.js';
import type { Pipeline, PipeInput, PipeOutput } from './provider.js';
import { normalizeTurns, popSystemMessage } from '../core/normalizer.js';
import { assembleRequest, toRequestBody, type MessagesRequestBody } from '../core/request.js';
import { TransportError, UpstreamError, ValidationError } from '../core/errors.js';
import { ok, err, type Result } from '../core/result.js';
import { ValvesUpdateSchema, formatIssues } from '../core/config.js';
import { decodeStream } from './sse.js';
import { ANTHROPIC_MODELS } from './models.js';

export const ANTHROPIC_VERSION = '2023-06-01';

export interface AnthropicPipelineOptions {
  /** Swap the transport, e.g. for tests. Default: global fetch */
  fetch?: typeof fetch;
}

/** Valves + the headers built from them, taken once per call */
interface Snapshot {
  valves: Valves;
  headers: Record<string, string>;
  /** Caller's cancel signal, if any */
  signal?: AbortSignal;
}

const CompletionSchema = z.object({
  content: z.array(z.unknown()).nullish(),
});

const TextBlockSchema = z.object({ text: z.string() });

export function buildHeaders(valves: Valves): Record<string, string> {
  return {
    'anthropic-version': ANTHROPIC_VERSION,
    'content-type': 'application/json',
    'x-api-key': valves.apiKey,
  };
}

export function createAnthropicPipeline(
  initial: Valves,
  options: AnthropicPipelineOptions = {}
): Pipeline {
  const fetchImpl = options.fetch ?? fetch;
  let valves = initial;
  let headers = buildHeaders(valves);

  async function post(
    payload: MessagesRequestBody,
    snapshot: Snapshot
  ): Promise<Result<Response, UpstreamError | TransportError>> {
    const { timeout, baseUrl } = snapshot.valves;
    const { signal } = snapshot;

    // The timeout only covers waiting for response headers; a stream that
    // keeps producing is never cut off. The caller's signal covers the body too.
    const controller = new AbortController();
    const onCancel = () => controller.abort(signal?.reason);
    if (signal?.aborted) onCancel();
    signal?.addEventListener('abort', onCancel, { once: true });

    const timer = timeout > 0
      ? setTimeout(() => {
          controller.abort(new Error(`Request timed out after ${timeout}s`));
        }, timeout * 1000)
      : undefined;

    let response: Response;
    try {
      response = await fetchImpl(baseUrl, {
        method: 'POST',
        headers: snapshot.headers,
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      return err(new TransportError(error));
    } finally {
      clearTimeout(timer);
    }

    if (!response.ok) {
      try {
        return err(new UpstreamError(response.status, await response.text()));
      } catch (error) {
        return err(new TransportError(error));
      }
    }

    return ok(response);
  }

  async function complete(
    payload: MessagesRequestBody,
    snapshot: Snapshot
  ): Promise<Result<string, UpstreamError | TransportError>> {
    const response = await post(payload, snapshot);
    if (!response.ok) return response;

    let json: unknown;
    try {
      json = await response.value.json();
    } catch (error) {
      return err(new TransportError(error));
    }

    const parsed = CompletionSchema.safeParse(json);
    if (!parsed.success) {
      return err(new TransportError(new Error(`Unexpected response: ${formatIssues(parsed.error)}`)));
    }

    const [first] = parsed.data.content ?? [];
    if (first === undefined) return ok('');

    const block = TextBlockSchema.safeParse(first);
    return block.success
      ? ok(block.data.text)
      : err(new TransportError(new Error('Unexpected response: content[0].text is missing')));
  }

  async function* stream(
    payload: MessagesRequestBody,
    snapshot: Snapshot
  ): AsyncGenerator<string, void, undefined> {
    try {
      const response = await post(payload, snapshot);
      if (!response.ok) throw response.error;

      const body = response.value.body;
      if (!body) return;

      yield* decodeStream(body);
    } catch (error) {
      if (snapshot.signal?.aborted) {
        console.log('[relay] Stream cancelled by caller');
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[relay] Streaming error: ${message}`);
      yield `Error during streaming: ${message}`;
    }
  }

  async function onValvesUpdated(): Promise<void> {
    headers = buildHeaders(valves);
  }

  return {
    id: 'anthropic',
    name: 'anthropic/',

    get valves() {
      return valves;
    },

    models() {
      return [...ANTHROPIC_MODELS];
    },

    async pipe({ model, messages, body, signal }: PipeInput): Promise<PipeOutput> {
      const snapshot: Snapshot = { valves, headers, signal };

      try {
        const { system, turns } = popSystemMessage(messages);

        const normalized = normalizeTurns(turns, snapshot.valves);
        if (!normalized.ok) throw normalized.error;

        const request = assembleRequest({
          model,
          turns: normalized.value,
          system,
          options: body,
          valves: snapshot.valves,
        });
        const payload = toRequestBody(request);
        console.debug(`[relay] → ${model} (${payload.messages.length} turns, stream: ${payload.stream})`);

        if (payload.stream) {
          return stream(payload, snapshot);
        }

        const result = await complete(payload, snapshot);
        if (!result.ok) {
          console.error(`[relay] Completion error: ${result.error.message}`);
          return `Error getting completion: ${result.error.message}`;
        }
        return result.value;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[relay] Pipeline error: ${message}`);
        return `Error: ${message}`;
      }
    },

    async updateValves(update: unknown): Promise<Result<Valves, ValidationError>> {
      const parsed = ValvesUpdateSchema.safeParse(update);
      if (!parsed.success) {
        return err(new ValidationError(`Invalid valves: ${formatIssues(parsed.error)}`));
      }
      valves = { ...valves, ...parsed.data };
      await onValvesUpdated();
      console.log(`[relay] Valves updated: ${Object.keys(parsed.data).join(', ') || '(none)'}`);
      return ok(valves);
    },

    async onStartup(): Promise<void> {
      console.log('[relay] Starting Anthropic pipeline');
      if (!valves.apiKey) {
        console.warn('[relay] ⚠  ANTHROPIC_API_KEY not set');
      }
    },

    async onShutdown(): Promise<void> {
      console.log('[relay] Shutting down Anthropic pipeline');
    },

    onValvesUpdated,
  };
}
