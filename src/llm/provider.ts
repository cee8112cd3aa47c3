/**
 * Pipeline abstraction — what the host talks to.
 *
 * A pipeline takes host chat turns plus a loose options bag and
 * returns either the full reply text or a lazy stream of chunks.
 * It never throws: failures come back as text the host can show.
 */

import type { ModelInfo, RawChatTurn, Valves } from '../types/index.js';
import type { OptionsBag } from '../core/request.js';
import type { ValidationError } from '../core/errors.js';
import type { Result } from '../core/result.js';

export interface PipeInput {
  model: string;
  messages: readonly RawChatTurn[];
  /** Generation options and host bookkeeping, as sent by the host */
  body: OptionsBag;
  /** Abort to drop the upstream request, e.g. when the host's client goes away */
  signal?: AbortSignal;
}

/** Reply text, or chunks in arrival order (single consumer, not restartable) */
export type PipeOutput = string | AsyncGenerator<string, void, undefined>;

export interface Pipeline {
  id: string;
  /** Human-readable name for logs */
  name: string;

  /** Current configuration snapshot */
  readonly valves: Readonly<Valves>;

  /** Models the host can offer for selection */
  models(): ModelInfo[];

  pipe(input: PipeInput): Promise<PipeOutput>;

  /** Validate a partial update, apply it, then onValvesUpdated() */
  updateValves(update: unknown): Promise<Result<Valves, ValidationError>>;

  onStartup(): Promise<void>;
  onShutdown(): Promise<void>;
  /** Rebuild anything derived from valves (request headers) */
  onValvesUpdated(): Promise<void>;
}
