/**
 * Local development server entry point.
 *
 * Starts the OFC table server on a configurable port.
 *
 * Usage:
 *   npx tsx src/server/dev.ts
 *   PORT=9000 npx tsx src/server/dev.ts
 *   SEED=42 npx tsx src/server/dev.ts
 */

import { createTableServer } from './ws-server.js';

const port = parseInt(process.env['PORT'] ?? '3000', 10);
const seedText = process.env['SEED'];

const server = createTableServer({
  port,
  tableCleanupMs: 10 * 60_000, // close stale tables after 10 minutes
  seed: seedText === undefined ? undefined : parseInt(seedText, 10),
});

console.log(`OFC table server listening on ws://localhost:${port}`);
console.log('Press Ctrl+C to stop.');

function shutdown() {
  console.log('\nShutting down...');
  server.close();
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
