/**
 * Host-facing API for the relay.
 *
 *   /api/health   — liveness + whether an API key is configured
 *   /api/models   — model catalog for the host's picker
 *   /api/chat     — run the pipeline (JSON reply or SSE chunks)
 *   /api/valves   — read / change adapter settings
 */

import { Hono, type MiddlewareHandler } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import type { Pipeline } from '../llm/provider.js';
import { formatIssues } from '../core/config.js';

export interface APIOptions {
  /** Bearer token required for POST /api/valves. Unset = open */
  token?: string;
  version?: string;
}

const ContentItemSchema = z.object({ type: z.string() }).passthrough();

const ChatTurnSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.union([z.string(), z.array(ContentItemSchema)]),
});

/** Everything besides model + messages is the options bag */
const ChatBodySchema = z
  .object({
    model: z.string().min(1),
    messages: z.array(ChatTurnSchema),
  })
  .passthrough();

export function createAPI(pipeline: Pipeline, options: APIOptions = {}) {
  const api = new Hono();

  const adminAuth: MiddlewareHandler = async (c, next) => {
    if (options.token) {
      const token = c.req.header('Authorization')?.replace('Bearer ', '');
      if (token !== options.token) {
        return c.json({ error: 'Unauthorized' }, 401);
      }
    }
    await next();
  };

  /** Health check */
  api.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      pipeline: pipeline.name,
      apiKey: pipeline.valves.apiKey !== '',
      version: options.version ?? '0.1.0',
    });
  });

  /** Model catalog */
  api.get('/api/models', (c) => {
    return c.json({ models: pipeline.models() });
  });

  /** Run a chat completion. Streams when the body says `stream: true` */
  api.post('/api/chat', async (c) => {
    const raw: unknown = await c.req.json().catch(() => null);
    const parsed = ChatBodySchema.safeParse(raw);
    if (!parsed.success) {
      return c.json({ error: formatIssues(parsed.error) }, 400);
    }

    const { model, messages, ...body } = parsed.data;
    const upstream = new AbortController();
    const output = await pipeline.pipe({ model, messages, body, signal: upstream.signal });

    if (typeof output === 'string') {
      return c.json({ content: output });
    }

    return streamSSE(c, async (stream) => {
      // Client gone: cancel the Anthropic request now, not at the next chunk
      stream.onAbort(() => upstream.abort());

      for await (const chunk of output) {
        if (stream.aborted) break;
        await stream.writeSSE({ event: 'chunk', data: JSON.stringify({ text: chunk }) });
      }
      if (!stream.aborted) {
        await stream.writeSSE({ event: 'done', data: '' });
      }
    });
  });

  /** Current valves, API key masked */
  api.get('/api/valves', (c) => {
    const valves = pipeline.valves;
    return c.json({
      valves: { ...valves, apiKey: valves.apiKey ? '********' : '' },
    });
  });

  /** Partial valve update */
  api.post('/api/valves', adminAuth, async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const result = await pipeline.updateValves(body);
    if (!result.ok) {
      return c.json({ error: result.error.message }, 400);
    }
    return c.json({ ok: true });
  });

  return api;
}
