/**
 * Error taxonomy.
 *
 *   ValidationError    — caller input breaks a limit or is malformed
 *   UpstreamError      — Anthropic answered with a non-2xx status
 *   TransportError     — network failure or unreadable response
 *   StreamDecodeError  — one bad SSE event; logged and skipped
 *
 * None of these ever reach the host as a thrown error. The pipeline
 * turns them into a text result or a final stream chunk.
 */

export class ValidationError extends Error {
  override readonly name = 'ValidationError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class UpstreamError extends Error {
  override readonly name = 'UpstreamError';

  constructor(
    readonly status: number,
    readonly body: string
  ) {
    super(`API Error: ${status} - ${body}`);
  }
}

export class TransportError extends Error {
  override readonly name = 'TransportError';

  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
  }
}

export class StreamDecodeError extends Error {
  override readonly name = 'StreamDecodeError';

  constructor(
    message: string,
    /** Raw `data:` field of the offending event */
    readonly data: string
  ) {
    super(message);
  }
}
