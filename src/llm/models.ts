import type { ModelInfo } from '../types/index.js';

/** Static catalog, no discovery */
export const ANTHROPIC_MODELS: readonly ModelInfo[] = [
  { id: 'claude-3-haiku-20240307', name: 'claude-3-haiku' },
  { id: 'claude-3-opus-20240229', name: 'claude-3-opus' },
  { id: 'claude-3-sonnet-20240229', name: 'claude-3-sonnet' },
  { id: 'claude-3-5-haiku-20241022', name: 'claude-3.5-haiku' },
  { id: 'claude-3-5-sonnet-20241022', name: 'claude-3.5-sonnet' },
];
