/**
 * relay — chat-to-Anthropic message adapter.
 *
 * Entry point. Loads config, creates the pipeline,
 * starts the server. One process, one port.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { resolve } from 'node:path';

import { loadConfig } from './core/config.js';
import { createAnthropicPipeline } from './llm/index.js';
import { createAPI } from './server/api.js';

const DATA_DIR = process.env.RELAY_DATA_DIR ?? resolve(process.cwd(), 'data');

async function main() {
  console.log('');
  console.log('  ┌─────────────────────────┐');
  console.log('  │       r e l a y         │');
  console.log('  │  chat → anthropic api   │');
  console.log('  └─────────────────────────┘');
  console.log('');

  // 1. Load config
  console.log(`  data:  ${DATA_DIR}`);
  const config = loadConfig(DATA_DIR);

  // 2. Create pipeline
  const pipeline = createAnthropicPipeline(config.valves);
  console.log(`  llm:   ${pipeline.name} (${pipeline.models().length} models)`);
  await pipeline.onStartup();

  // 3. Create server
  const app = createAPI(pipeline, { token: config.server.token });

  // 4. Start
  const { port, host } = config.server;

  const server = serve({
    fetch: app.fetch,
    port,
    hostname: host,
  }, () => {
    console.log('');
    console.log(`  ✓ listening on http://${host}:${port}`);
    console.log(`  ✓ valves: ${config.valves.maxImages} images / ${config.valves.maxImageSizeMb}MB per call`);
    console.log('');
  });

  // 5. Shutdown
  const shutdown = (signal: string) => {
    console.log(`  ${signal} received`);
    void pipeline.onShutdown()
      .catch((error) => console.error('Shutdown hook failed:', error))
      .finally(() => {
        server.close();
        process.exit(0);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  console.error('Failed to start relay:', error);
  process.exit(1);
});
