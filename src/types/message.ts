/**
 * Chat message types.
 *
 * Two shapes of the same conversation:
 *   - raw:        what the host chat app sends (OpenAI-style content parts)
 *   - normalized: what goes to Anthropic (typed content blocks)
 *
 * Normalized turns are built once per call and never mutated afterwards.
 */

/** Who sent this turn */
export type ChatRole = 'system' | 'user' | 'assistant';

// ── Host side ─────────────────────────────────────────────

export interface RawTextItem {
  type: 'text';
  text: string;
}

export interface RawImageItem {
  type: 'image_url';
  image_url: { url: string };
}

/** Anything else the host may send (files, audio, ...). Skipped. */
export interface RawUnknownItem {
  type: string;
  [key: string]: unknown;
}

export type RawContentItem = RawTextItem | RawImageItem | RawUnknownItem;

export interface RawChatTurn {
  role: ChatRole;
  content: string | RawContentItem[];
}

// ── Anthropic side ────────────────────────────────────────

export interface Base64ImageSource {
  type: 'base64';
  media_type: string;
  /** Base64 payload, without the data: prefix */
  data: string;
}

export interface UrlImageSource {
  type: 'url';
  url: string;
}

export type ImageSource = Base64ImageSource | UrlImageSource;

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ImageBlock {
  type: 'image';
  source: ImageSource;
}

export type ContentBlock = TextBlock | ImageBlock;

export interface ChatTurn {
  readonly role: ChatRole;
  readonly content: readonly ContentBlock[];
}
