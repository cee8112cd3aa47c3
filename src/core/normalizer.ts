/**
 * Normalizer — turns host chat turns into Anthropic content blocks.
 *
 * Flow:
 *   1. Pop the leading system turn (only the first turn counts)
 *   2. Convert each turn's content into typed blocks
 *   3. Enforce image limits across the whole call, as images are seen
 */

import type {
  RawChatTurn,
  RawContentItem,
  ChatTurn,
  ContentBlock,
  ImageBlock,
} from '../types/index.js';
import { ValidationError } from './errors.js';
import { ok, err, type Result } from './result.js';

export interface ImageLimits {
  maxImages: number;
  maxImageSizeMb: number;
}

export interface SplitTurns {
  /** Content of the leading system turn, if there was one */
  system?: RawChatTurn['content'];
  turns: readonly RawChatTurn[];
}

/** Running totals for one call */
interface ImageBudget {
  count: number;
  bytes: number;
}

const DATA_IMAGE_PREFIX = 'data:image';

/**
 * Split off the system turn. A system turn anywhere but first
 * is left in place as an ordinary turn.
 */
export function popSystemMessage(turns: readonly RawChatTurn[]): SplitTurns {
  const [first, ...rest] = turns;
  if (first?.role === 'system') {
    return { system: first.content, turns: rest };
  }
  return { turns };
}

/** Decoded size of a base64 payload, rounded up */
export function decodedSize(base64: string): number {
  return Math.ceil((base64.length * 3) / 4);
}

/**
 * Convert one image URL into an image block.
 * `data:image/...;base64,...` becomes a base64 source, anything else a url source.
 */
export function processImage(url: string): Result<ImageBlock, ValidationError> {
  if (!url.startsWith(DATA_IMAGE_PREFIX)) {
    return ok<ImageBlock>({ type: 'image', source: { type: 'url', url } });
  }

  const comma = url.indexOf(',');
  if (comma === -1) {
    return err(invalidImage(new Error('missing "," between header and payload')));
  }

  // data:image/png;base64 → image/png
  const header = url.slice(0, comma);
  const mediaType = header.slice('data:'.length).split(';')[0] ?? '';

  return ok<ImageBlock>({
    type: 'image',
    source: { type: 'base64', media_type: mediaType, data: url.slice(comma + 1) },
  });
}

/**
 * Normalize all turns of one call.
 * Image count and total size are shared across every turn.
 */
export function normalizeTurns(
  turns: readonly RawChatTurn[],
  limits: ImageLimits
): Result<ChatTurn[], ValidationError> {
  const budget: ImageBudget = { count: 0, bytes: 0 };
  const normalized: ChatTurn[] = [];

  for (const turn of turns) {
    const content = normalizeContent(turn.content, limits, budget);
    if (!content.ok) return content;
    normalized.push({ role: turn.role, content: content.value });
  }

  return ok(normalized);
}

function normalizeContent(
  content: RawChatTurn['content'],
  limits: ImageLimits,
  budget: ImageBudget
): Result<ContentBlock[], ValidationError> {
  if (!Array.isArray(content)) {
    return ok<ContentBlock[]>([{ type: 'text', text: typeof content === 'string' ? content : '' }]);
  }

  const blocks: ContentBlock[] = [];

  for (const item of content) {
    if (item.type === 'text') {
      blocks.push({ type: 'text', text: readText(item) });
      continue;
    }

    if (item.type !== 'image_url') {
      console.debug(`[relay] Skipping unsupported content item: ${item.type}`);
      continue;
    }

    if (budget.count >= limits.maxImages) {
      return err(new ValidationError(
        `Maximum of ${limits.maxImages} images per API call exceeded`
      ));
    }

    const url = readImageUrl(item);
    const image = url === undefined
      ? err(invalidImage(new Error('image_url.url is missing')))
      : processImage(url);
    if (!image.ok) {
      console.error(`[relay] Error processing image: ${image.error.message}`);
      return image;
    }
    blocks.push(image.value);

    if (image.value.source.type === 'base64') {
      budget.bytes += decodedSize(image.value.source.data);
      if (budget.bytes > limits.maxImageSizeMb * 1024 * 1024) {
        return err(new ValidationError(
          `Total size of images exceeds ${limits.maxImageSizeMb}MB limit`
        ));
      }
    }

    budget.count += 1;
  }

  return ok(blocks);
}

function readText(item: RawContentItem): string {
  return 'text' in item && typeof item.text === 'string' ? item.text : '';
}

function readImageUrl(item: RawContentItem): string | undefined {
  if (!('image_url' in item)) return undefined;
  const imageUrl: unknown = item.image_url;
  if (typeof imageUrl !== 'object' || imageUrl === null || !('url' in imageUrl)) {
    return undefined;
  }
  return typeof imageUrl.url === 'string' ? imageUrl.url : undefined;
}

function invalidImage(cause: Error): ValidationError {
  return new ValidationError(`Invalid image data: ${cause.message}`, { cause });
}
