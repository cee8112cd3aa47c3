import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  assembleRequest,
  resolveParams,
  stripBookkeeping,
  systemToString,
  toRequestBody,
} from './request.js';
import { defaultValves } from './config.js';
import type { ChatTurn } from '../types/index.js';

const valves = defaultValves();

const turns: ChatTurn[] = [{ role: 'user', content: [{ type: 'text', text: 'Hi' }] }];

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

describe('stripBookkeeping', () => {
  it('drops user, chat_id and title without touching the input', () => {
    const body = { user: { id: 'u1' }, chat_id: 'c1', title: 'New chat', temperature: 0.2 };

    expect(stripBookkeeping(body)).toEqual({ temperature: 0.2 });
    expect(body).toHaveProperty('chat_id', 'c1');
  });
});

describe('resolveParams', () => {
  it('falls back to configured defaults for every omitted option', () => {
    expect(resolveParams({}, valves)).toEqual({
      maxTokens: 4096,
      temperature: 0.8,
      topK: 40,
      topP: 0.9,
      stopSequences: [],
      stream: false,
    });
  });

  it('uses supplied options exactly', () => {
    const params = resolveParams({
      max_tokens: 256,
      temperature: 0,
      top_k: 5,
      top_p: 0.5,
      stop: ['\n\nHuman:'],
      stream: true,
    }, valves);

    expect(params).toEqual({
      maxTokens: 256,
      temperature: 0,
      topK: 5,
      topP: 0.5,
      stopSequences: ['\n\nHuman:'],
      stream: true,
    });
  });

  it('ignores ill-typed and null options', () => {
    const params = resolveParams({
      max_tokens: '256',
      temperature: null,
      stop: 'END',
      stream: 'yes',
    }, valves);

    expect(params.maxTokens).toBe(4096);
    expect(params.temperature).toBe(0.8);
    expect(params.stopSequences).toEqual([]);
    expect(params.stream).toBe(false);
  });

  it('keeps temperature within the range the config accepts', () => {
    expect(resolveParams({ temperature: 1.5 }, valves).temperature).toBe(0.8);
    expect(resolveParams({ temperature: 1 }, valves).temperature).toBe(1);
  });

  it('follows changed defaults', () => {
    const params = resolveParams({}, defaultValves({ defaultMaxTokens: 1000, defaultTopK: 1 }));

    expect(params.maxTokens).toBe(1000);
    expect(params.topK).toBe(1);
  });
});

describe('systemToString', () => {
  it('keeps string content and omits empty content', () => {
    expect(systemToString('Be terse')).toBe('Be terse');
    expect(systemToString('')).toBeUndefined();
    expect(systemToString(undefined)).toBeUndefined();
  });

  it('joins the text of list content', () => {
    expect(systemToString([
      { type: 'text', text: 'Be terse.' },
      { type: 'image_url', image_url: { url: 'https://example.com/x.png' } },
      { type: 'text', text: 'Answer in English.' },
    ])).toBe('Be terse.\nAnswer in English.');
  });
});

describe('assembleRequest + toRequestBody', () => {
  it('never lets bookkeeping keys into the payload', () => {
    const request = assembleRequest({
      model: 'claude-3-haiku-20240307',
      turns,
      options: { user: { id: 'u1', email: 'a@example.com' }, chat_id: 'c1', title: 'T', top_k: 3 },
      valves,
    });
    const payload = toRequestBody(request);

    expect(Object.keys(payload).sort()).toEqual([
      'max_tokens',
      'messages',
      'model',
      'stop_sequences',
      'stream',
      'temperature',
      'top_k',
      'top_p',
    ]);
    expect(payload.top_k).toBe(3);
  });

  it('attaches system only when present', () => {
    const withSystem = toRequestBody(assembleRequest({
      model: 'm',
      turns,
      system: 'Be terse',
      options: {},
      valves,
    }));
    const without = toRequestBody(assembleRequest({ model: 'm', turns, options: {}, valves }));

    expect(withSystem.system).toBe('Be terse');
    expect('system' in without).toBe(false);
  });

  it('serializes turns in wire format', () => {
    const payload = toRequestBody(assembleRequest({
      model: 'claude-3-haiku-20240307',
      turns,
      options: { stream: true },
      valves,
    }));

    expect(payload).toEqual({
      model: 'claude-3-haiku-20240307',
      messages: [{ role: 'user', content: [{ type: 'text', text: 'Hi' }] }],
      max_tokens: 4096,
      temperature: 0.8,
      top_k: 40,
      top_p: 0.9,
      stop_sequences: [],
      stream: true,
    });
  });
});
