/**
 * Decoded Anthropic stream events.
 *
 * Only the kinds the adapter acts on are modelled; everything
 * else (message_start, ping, message_delta, error, ...) lands in
 * `other` and is skipped by the decoder.
 */

export type StreamEvent =
  | { kind: 'content_block_start'; text: string }
  | { kind: 'content_block_delta'; text: string }
  | { kind: 'message_stop' }
  | { kind: 'other'; type: string };
