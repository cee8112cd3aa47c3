/**
 * Request assembler — builds the outbound Anthropic request.
 *
 * The host sends a loose options bag (OpenAI-style keys, plus its own
 * bookkeeping). Each generation parameter is picked out and checked
 * on its own: well-typed values win, anything else falls back to the
 * configured default.
 */

import { z } from 'zod';
import type {
  ChatTurn,
  ContentBlock,
  GenerationParams,
  OutboundRequest,
  RawChatTurn,
  Valves,
} from '../types/index.js';

/** Host bookkeeping that must never reach Anthropic */
export const BOOKKEEPING_KEYS = ['user', 'chat_id', 'title'] as const;

export type OptionsBag = Record<string, unknown>;

/** Wire format of POST /v1/messages */
export interface MessagesRequestBody {
  model: string;
  messages: { role: ChatTurn['role']; content: ContentBlock[] }[];
  max_tokens: number;
  temperature: number;
  top_k: number;
  top_p: number;
  stop_sequences: string[];
  stream: boolean;
  system?: string;
}

const optionSchemas = {
  max_tokens: z.number().int().positive(),
  temperature: z.number().min(0).max(1),
  top_k: z.number().int().nonnegative(),
  top_p: z.number().min(0).max(1),
  stop: z.array(z.string()),
  stream: z.boolean(),
};

export function stripBookkeeping(body: OptionsBag): OptionsBag {
  const clean: OptionsBag = { ...body };
  for (const key of BOOKKEEPING_KEYS) {
    delete clean[key];
  }
  return clean;
}

/**
 * Resolve generation parameters from the options bag.
 * null counts as "not given".
 */
export function resolveParams(options: OptionsBag, valves: Valves): GenerationParams {
  return {
    maxTokens: pick(options, 'max_tokens', optionSchemas.max_tokens, valves.defaultMaxTokens),
    temperature: pick(options, 'temperature', optionSchemas.temperature, valves.defaultTemperature),
    topK: pick(options, 'top_k', optionSchemas.top_k, valves.defaultTopK),
    topP: pick(options, 'top_p', optionSchemas.top_p, valves.defaultTopP),
    stopSequences: pick(options, 'stop', optionSchemas.stop, []),
    stream: pick(options, 'stream', optionSchemas.stream, false),
  };
}

/** System content as a plain string; list content keeps only its text */
export function systemToString(content: RawChatTurn['content'] | undefined): string | undefined {
  if (content === undefined) return undefined;
  if (typeof content === 'string') return content || undefined;

  const text = content
    .map(item => ('text' in item && typeof item.text === 'string' ? item.text : ''))
    .filter(Boolean)
    .join('\n');
  return text || undefined;
}

export function assembleRequest(input: {
  model: string;
  turns: readonly ChatTurn[];
  system?: RawChatTurn['content'];
  options: OptionsBag;
  valves: Valves;
}): OutboundRequest {
  const options = stripBookkeeping(input.options);
  const system = systemToString(input.system);

  return {
    model: input.model,
    turns: input.turns,
    ...(system !== undefined ? { system } : {}),
    params: resolveParams(options, input.valves),
  };
}

export function toRequestBody(request: OutboundRequest): MessagesRequestBody {
  const { params } = request;
  return {
    model: request.model,
    messages: request.turns.map(turn => ({
      role: turn.role,
      content: [...turn.content],
    })),
    max_tokens: params.maxTokens,
    temperature: params.temperature,
    top_k: params.topK,
    top_p: params.topP,
    stop_sequences: params.stopSequences,
    stream: params.stream,
    ...(request.system !== undefined ? { system: request.system } : {}),
  };
}

function pick<T>(
  options: OptionsBag,
  key: string,
  schema: z.ZodType<T>,
  fallback: T
): T {
  const value = options[key];
  if (value === undefined || value === null) return fallback;

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    console.warn(`[relay] Ignoring option "${key}" (${JSON.stringify(value)}), using default`);
    return fallback;
  }
  return parsed.data;
}
