/**
 * server.ts — MCP Server for epiboard
 *
 * Tools: start_game, advance_turn, get_state, get_card_catalog, play_card
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import type { Block } from './engine/block.js';
import { playCard } from './engine/cards.js';
import {
  BoardConfigError, CARD_TYPES, DATA_DIR, advanceTurn, createGame, isGameOver, loadBoardDefinition, loadRules, visibleCounts,
  type BoardDef, type GameState, type Rules,
} from './engine/game-state.js';
import { defaultRandom, type RandomSource } from './engine/random.js';

export interface ServerOptions {
  dataDir?: string;
  random?: RandomSource;
}

const MAX_ROUNDS_PER_CALL = 20;

function text(body: string): CallToolResult {
  return { content: [{ type: 'text' as const, text: body }] };
}

export function log(message: string): void {
  console.error(`[epiboard] ${message}`);
}

// === Formatting Helpers ===

function signed(n: number): string {
  return `${n >= 0 ? '+' : ''}${n.toLocaleString()}`;
}

function blockStatus(block: Block): string {
  const parts: string[] = [];
  if (block.type === 'factory') parts.push(block.isWorking ? 'working' : 'closed');
  if (block.isQuarantined) parts.push(`quarantined, ${block.quarantineRemaining} rounds left`);
  return parts.length > 0 ? parts.join(', ') : '-';
}

export function formatState(game: GameState): string {
  const totals = game.board.totals();
  const infected = game.meta.godView ? totals.currentInfected + totals.nextInfected : totals.currentInfected;
  const healthy = game.meta.godView ? totals.healthy : totals.healthy + totals.nextInfected;

  let body = `## Turn ${Math.min(game.meta.turn, game.meta.maxTurns)}/${game.meta.maxTurns}

### Overview
- Healthy: ${healthy.toLocaleString()}
- Infected: ${infected.toLocaleString()}
- Material: ${totals.material.toLocaleString()}
- Treasury: ${game.treasury}`;

  if (game.history.length > 0) {
    const prev = game.history[game.history.length - 1];
    const population = totals.healthy + totals.currentInfected + totals.nextInfected;
    const prevPopulation = prev.totals.healthy + prev.totals.currentInfected + prev.totals.nextInfected;
    body += `

### Since last turn
- Population: ${signed(population - prevPopulation)}
- Material: ${signed(totals.material - prev.totals.material)}`;
  }
  return body;
}

export function formatBlocks(game: GameState): string {
  const lines = [
    '### Blocks',
    '| Block | Type | Healthy | Infected | Material | Status |',
    '|---|---|---|---|---|---|',
  ];
  for (const block of game.board.all()) {
    const v = visibleCounts(block, game.meta.godView);
    lines.push(`| ${block.name} (\`${block.id}\`) | ${block.type} | ${v.healthy} | ${v.infected} | ${v.material} | ${blockStatus(block)} |`);
  }
  return lines.join('\n');
}

export function formatBlockDetail(game: GameState, block: Block): string {
  const v = visibleCounts(block, game.meta.godView);
  const neighbours = block.outEdges.map(i => game.board.get(i).id).join(', ') || 'none';
  let body = `## ${block.name} (${block.type})

- Healthy: ${v.healthy}
- Infected: ${v.infected}
- Material: ${v.material}
- Status: ${blockStatus(block)}
- Sends to: ${neighbours}`;
  if (game.meta.godView) {
    body += `\n- Cohorts: symptomatic ${block.currentInfected}, incubating ${block.nextInfected}`;
  }
  return body;
}

// === Server Creation ===

export function createServer(options: ServerOptions = {}): McpServer {
  const dataDir = options.dataDir ?? DATA_DIR;
  const random = options.random ?? defaultRandom;
  let game: GameState | null = null;

  const server = new McpServer({
    name: 'epiboard',
    version: '0.1.0',
  });

  // === Tool: start_game ===
  server.registerTool(
    'start_game',
    {
      title: 'Start a game',
      description: `Starts a new epidemic board game. Blocks exchange people, infections and material every round.
Play cards between rounds to quarantine blocks, stop or resume factories, evacuate blocks or levy taxes.`,
      inputSchema: {
        godView: z.boolean().describe('Show incubating cases as infected').optional(),
      },
    },
    async ({ godView }) => {
      let board: BoardDef;
      let rules: Rules;
      try {
        [board, rules] = await Promise.all([loadBoardDefinition(dataDir), loadRules(dataDir)]);
      } catch (e) {
        if (!(e instanceof BoardConfigError)) throw e;
        log(e.message);
        return { ...text(`Could not load the board.\n\n${e.message}`), isError: true };
      }
      game = createGame({ board, rules, random, godView });
      log(`game started: ${game.board.size} blocks, ${rules.maxTurns} turns`);

      return text(`# Game started

${formatState(game)}

${formatBlocks(game)}

Use advance_turn to play rounds and play_card to act on a block.`);
    },
  );

  // === Tool: advance_turn ===
  server.registerTool(
    'advance_turn',
    {
      title: 'Advance the turn',
      description: 'Runs one or more simulation rounds and returns the new board state.',
      inputSchema: {
        rounds: z.number().int().min(1).max(MAX_ROUNDS_PER_CALL).describe('Rounds to play (default 1)').optional(),
      },
    },
    async ({ rounds }) => {
      if (!game) return text('No game in progress. Call start_game first.');
      if (isGameOver(game)) return text(`The game is over (${game.meta.maxTurns} turns played).`);

      const reports = advanceTurn(game, rounds ?? 1);
      log(`turn ${game.meta.turn - 1} settled (${reports.length} rounds)`);

      const isolated = new Set(reports.flatMap(r => r.isolated));
      let body = formatState(game) + '\n\n' + formatBlocks(game);
      if (isolated.size > 0) {
        const names = [...isolated].map(i => game?.board.get(i).name ?? String(i));
        body += `\n\nIsolated this turn: ${names.join(', ')}`;
      }
      if (isGameOver(game)) body = `# Game over\n\n${body}`;
      return text(body);
    },
  );

  // === Tool: get_state ===
  server.registerTool(
    'get_state',
    {
      title: 'Get game state',
      description: 'Returns the board summary, or one block in detail.',
      inputSchema: {
        blockId: z.string().describe('Block id (optional). Omit for the whole board.').optional(),
      },
    },
    async ({ blockId }) => {
      if (!game) return text('No game in progress.');

      if (blockId) {
        const block = game.board.find(blockId);
        if (!block) {
          const available = game.board.all().map(b => b.id).join(', ');
          return text(`Block not found: ${blockId}\nAvailable: ${available}`);
        }
        return text(formatBlockDetail(game, block));
      }
      return text(formatState(game) + '\n\n' + formatBlocks(game));
    },
  );

  // === Tool: get_card_catalog ===
  server.registerTool(
    'get_card_catalog',
    {
      title: 'Card catalog',
      description: 'Lists the playable cards with their cost.',
      inputSchema: {},
    },
    async () => {
      let rules: Rules;
      try {
        rules = game?.rules ?? await loadRules(dataDir);
      } catch (e) {
        if (!(e instanceof BoardConfigError)) throw e;
        log(e.message);
        return { ...text(`Could not load the card catalog.\n\n${e.message}`), isError: true };
      }
      let body = '## Cards\n\n';
      if (game) body += `Treasury: ${game.treasury}\n\n`;
      for (const card of rules.cards) {
        body += `- **${card.name}** (\`${card.type}\`, cost ${card.cost}): ${card.description}\n`;
      }
      return text(body);
    },
  );

  // === Tool: play_card ===
  server.registerTool(
    'play_card',
    {
      title: 'Play a card',
      description: 'Plays a card on a block. The cost is paid from the treasury only if the card takes effect.',
      inputSchema: {
        card: z.enum(CARD_TYPES).describe('Card type'),
        blockId: z.string().describe('Target block id'),
      },
    },
    async ({ card, blockId }) => {
      if (!game) return text('No game in progress. Call start_game first.');

      const result = playCard(game, card, blockId);
      if (!result.ok) return text(result.message);

      log(`${result.card.type} played on ${result.block.id}`);
      let body = `## ${result.card.name}: ${result.block.name}\n\n`;
      if (result.card.type === 'taxing') body += `- Collected: ${result.taxed}\n`;
      body += `- Cost: ${result.card.cost}\n`;
      body += `- Treasury: ${result.treasury}\n\n`;
      body += formatBlockDetail(game, result.block);
      return text(body);
    },
  );

  return server;
}
