export type {
  ChatRole,
  RawChatTurn,
  RawContentItem,
  RawTextItem,
  RawImageItem,
  RawUnknownItem,
  ChatTurn,
  ContentBlock,
  TextBlock,
  ImageBlock,
  ImageSource,
  Base64ImageSource,
  UrlImageSource,
} from './message.js';

export type {
  Valves,
  GenerationParams,
  OutboundRequest,
  ModelInfo,
} from './provider.js';

export type { StreamEvent } from './stream.js';

export type { RelayConfig } from './data.js';
