/**
 * game-state.ts — Board definition loading, validation, game session state
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { BLOCK_TYPES } from './block-profile.js';
import { DEFAULT_QUARANTINE_PERIOD, type Block, type BlockCounts } from './block.js';
import { Board, type RoundReport } from './board.js';
import { defaultRandom, randomInt, type RandomSource } from './random.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const DATA_DIR = process.env.EPIBOARD_DATA_DIR || path.join(__dirname, '..', '..', 'data');

// Healthy population drawn for blocks that do not set one
export const RANDOM_POPULATION_MIN = 400;
export const RANDOM_POPULATION_MAX = 600;

// === Schemas ===

const count = z.number().int().nonnegative();

export const BlockDefSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  type: z.enum(BLOCK_TYPES),
  population: count.optional(),
  infected: count.default(0),
  material: count.default(0),
  outBlocks: z.array(z.string()).default([]),
});

export const BoardDefSchema = z.object({
  blocks: z.array(BlockDefSchema).min(1),
});

export const CARD_TYPES = ['quarantine', 'stop_working', 'start_working', 'special_aid', 'taxing'] as const;

export const CardDefSchema = z.object({
  type: z.enum(CARD_TYPES),
  name: z.string(),
  cost: count,
  description: z.string().default(''),
});

export const RulesSchema = z.object({
  startingFunds: count,
  maxTurns: z.number().int().positive(),
  quarantinePeriod: z.number().int().positive().default(DEFAULT_QUARANTINE_PERIOD),
  cards: z.array(CardDefSchema),
});

// === Types ===

export type BlockDef = z.infer<typeof BlockDefSchema>;
export type BoardDef = z.infer<typeof BoardDefSchema>;
export type CardType = typeof CARD_TYPES[number];
export type CardDef = z.infer<typeof CardDefSchema>;
export type Rules = z.infer<typeof RulesSchema>;

export interface HistoryEntry {
  turn: number;
  totals: BlockCounts;
  treasury: number;
  blocks: Array<{ id: string } & BlockCounts>;
}

export interface GameMeta {
  turn: number;
  maxTurns: number;
  godView: boolean;
}

export interface GameState {
  meta: GameMeta;
  board: Board;
  rules: Rules;
  treasury: number;
  history: HistoryEntry[];
}

export class BoardConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n- ${issues.join('\n- ')}` : message);
    this.name = 'BoardConfigError';
  }
}

// === Data Loading ===

const cachedBoards = new Map<string, BoardDef>();
const cachedRules = new Map<string, Rules>();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

async function readJson(file: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(file, 'utf-8');
  } catch (e) {
    throw new BoardConfigError(`Cannot read ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new BoardConfigError(`Invalid JSON in ${file}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function parseBoardDefinition(data: unknown): BoardDef {
  const parsed = BoardDefSchema.safeParse(data);
  if (!parsed.success) throw new BoardConfigError('Invalid board definition', formatIssues(parsed.error));

  const issues: string[] = [];
  const ids = new Set<string>();
  for (const def of parsed.data.blocks) {
    if (ids.has(def.id)) issues.push(`duplicate block id "${def.id}"`);
    ids.add(def.id);
  }
  for (const def of parsed.data.blocks) {
    for (const target of def.outBlocks) {
      if (target === def.id) issues.push(`block "${def.id}" links to itself`);
      else if (!ids.has(target)) issues.push(`block "${def.id}" links to unknown block "${target}"`);
    }
  }
  if (issues.length > 0) throw new BoardConfigError('Invalid board definition', issues);
  return parsed.data;
}

export function parseRules(data: unknown): Rules {
  const parsed = RulesSchema.safeParse(data);
  if (!parsed.success) throw new BoardConfigError('Invalid rules', formatIssues(parsed.error));
  return parsed.data;
}

export async function loadBoardDefinition(dataDir: string = DATA_DIR): Promise<BoardDef> {
  const file = path.join(dataDir, 'board.json');
  const cached = cachedBoards.get(file);
  if (cached) return cached;
  const def = parseBoardDefinition(await readJson(file));
  cachedBoards.set(file, def);
  return def;
}

export async function loadRules(dataDir: string = DATA_DIR): Promise<Rules> {
  const file = path.join(dataDir, 'cards.json');
  const cached = cachedRules.get(file);
  if (cached) return cached;
  const rules = parseRules(await readJson(file));
  cachedRules.set(file, rules);
  return rules;
}

// === Board Construction ===

/** Adds every block in file order, then connects edges in `outBlocks` order. */
export function buildBoard(def: BoardDef, random: RandomSource = defaultRandom): Board {
  const board = new Board(random);
  for (const blockDef of def.blocks) {
    board.addBlock({
      id: blockDef.id,
      name: blockDef.name,
      type: blockDef.type,
      healthy: blockDef.population ?? randomInt(RANDOM_POPULATION_MIN, RANDOM_POPULATION_MAX, random),
      infected: blockDef.infected,
      material: blockDef.material,
    });
  }
  for (const blockDef of def.blocks) {
    for (const target of blockDef.outBlocks) board.connect(blockDef.id, target);
  }
  return board;
}

// === Game Session ===

export interface CreateGameOptions {
  board: BoardDef;
  rules: Rules;
  random?: RandomSource;
  godView?: boolean;
}

export function createGame(options: CreateGameOptions): GameState {
  return {
    meta: { turn: 1, maxTurns: options.rules.maxTurns, godView: options.godView ?? false },
    board: buildBoard(options.board, options.random ?? defaultRandom),
    rules: options.rules,
    treasury: options.rules.startingFunds,
    history: [],
  };
}

export function isGameOver(game: GameState): boolean {
  return game.meta.turn > game.meta.maxTurns;
}

export function snapshot(game: GameState): HistoryEntry {
  return {
    turn: game.meta.turn,
    totals: game.board.totals(),
    treasury: game.treasury,
    blocks: game.board.all().map(b => ({ id: b.id, ...b.counts() })),
  };
}

/**
 * Records the pre-turn snapshot and runs up to `rounds` rounds, one per
 * turn, stopping when the game ends. Returns one report per round played.
 */
export function advanceTurn(game: GameState, rounds = 1): RoundReport[] {
  const reports: RoundReport[] = [];
  for (let i = 0; i < rounds && !isGameOver(game); i++) {
    game.history.push(snapshot(game));
    reports.push(game.board.runRound());
    game.meta.turn++;
  }
  return reports;
}

export interface VisibleCounts {
  healthy: number;
  infected: number;
  material: number;
}

/**
 * Counts as shown to the player. Incubating cases look healthy until they
 * turn symptomatic; god view shows the true split.
 */
export function visibleCounts(block: Block, godView: boolean): VisibleCounts {
  if (godView) {
    return {
      healthy: block.healthy,
      infected: block.currentInfected + block.nextInfected,
      material: block.material,
    };
  }
  return {
    healthy: block.healthy + block.nextInfected,
    infected: block.currentInfected,
    material: block.material,
  };
}
