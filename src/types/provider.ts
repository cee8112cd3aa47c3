/**
 * Adapter configuration ("valves") and request shapes.
 *
 * Valves live in data/config.yaml under `valves:` and can be
 * changed at runtime through the host API. Every generation
 * parameter has a default here that is used whenever the
 * caller leaves it out.
 */

import type { ChatTurn } from './message.js';

export interface Valves {
  /** Anthropic API key. Required for any live call */
  apiKey: string;
  /** Max image blocks across all turns of one call */
  maxImages: number;
  /** Ceiling for the summed decoded size of base64 images */
  maxImageSizeMb: number;
  defaultMaxTokens: number;
  defaultTemperature: number;
  defaultTopK: number;
  defaultTopP: number;
  /** Messages endpoint. Default: https://api.anthropic.com/v1/messages */
  baseUrl: string;
  /** Request timeout in seconds, 0 disables */
  timeout: number;
}

export interface GenerationParams {
  maxTokens: number;
  temperature: number;
  topK: number;
  topP: number;
  stopSequences: string[];
  stream: boolean;
}

export interface OutboundRequest {
  model: string;
  /** Conversation turns, system turn excluded */
  turns: readonly ChatTurn[];
  system?: string;
  params: GenerationParams;
}

/** A selectable model, as shown in the host's model picker */
export interface ModelInfo {
  id: string;
  name: string;
}
