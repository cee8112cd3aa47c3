/**
 * Top-level relay configuration (data/config.yaml).
 *
 *   data/
 *     config.yaml     ← server + valves
 *
 * The file is optional. Anything missing falls back to defaults,
 * and ANTHROPIC_API_KEY from the environment wins over the file.
 */

import type { Valves } from './provider.js';

export interface RelayConfig {
  /** Server settings */
  server: {
    port: number;
    host: string;
    /** Bearer token for changing valves over HTTP. Unset = open */
    token?: string;
  };

  /** Adapter settings */
  valves: Valves;
}
