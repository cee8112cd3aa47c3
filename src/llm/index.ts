/**
 * LLM pipeline entry points.
 */

export type { Pipeline, PipeInput, PipeOutput } from './provider.js';
export { createAnthropicPipeline, buildHeaders, ANTHROPIC_VERSION } from './anthropic.js';
export type { AnthropicPipelineOptions } from './anthropic.js';
export { ANTHROPIC_MODELS } from './models.js';
