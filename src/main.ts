/**
 * main.ts — Entry point for the epiboard MCP Server (stdio transport)
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createServer, log } from './server.js';
import { seededRandom } from './engine/random.js';

async function main(): Promise<void> {
  const seedArg = process.argv.find(a => a.startsWith('--seed='));
  const seed = seedArg ? Number(seedArg.slice('--seed='.length)) : NaN;
  const server = createServer(Number.isFinite(seed) ? { random: seededRandom(seed) } : {});
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log(`MCP server running on stdio${Number.isFinite(seed) ? ` (seed ${seed})` : ''}`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
