/**
 * cards.ts — Card play: treasury check, dispatch to block actions
 */

import type { Block } from './block.js';
import type { BlockRef } from './board.js';
import { isGameOver, type CardDef, type CardType, type GameState } from './game-state.js';

export type CardResult =
  | { ok: true; card: CardDef; block: Block; taxed: number; treasury: number }
  | { ok: false; reason: 'game_over' | 'unknown_card' | 'unknown_block' | 'insufficient_funds' | 'not_applicable'; message: string };

export function findCard(game: GameState, type: CardType): CardDef | undefined {
  return game.rules.cards.find(c => c.type === type);
}

/** Runs the card's action on `block`. false means the action does not apply. */
function applyCard(game: GameState, type: CardType, block: Block): { applied: boolean; taxed: number } {
  switch (type) {
    case 'quarantine':
      return { applied: block.quarantined(game.rules.quarantinePeriod), taxed: 0 };
    case 'stop_working':
      return { applied: block.stopWorking(), taxed: 0 };
    case 'start_working':
      return { applied: block.startWorking(), taxed: 0 };
    case 'special_aid':
      return { applied: block.aided(), taxed: 0 };
    case 'taxing':
      return { applied: true, taxed: block.taxed() };
  }
}

/**
 * Plays a card on a block between rounds. The cost is only charged when the
 * action applies; tax collected goes to the treasury.
 */
export function playCard(game: GameState, type: CardType, blockRef: BlockRef): CardResult {
  if (isGameOver(game)) {
    return { ok: false, reason: 'game_over', message: `The game ended after turn ${game.meta.maxTurns}.` };
  }

  const card = findCard(game, type);
  if (!card) {
    return { ok: false, reason: 'unknown_card', message: `Card not in catalog: ${type}` };
  }

  const block = game.board.find(blockRef);
  if (!block) {
    return { ok: false, reason: 'unknown_block', message: `Unknown block: ${blockRef}` };
  }

  if (card.cost > game.treasury) {
    return {
      ok: false,
      reason: 'insufficient_funds',
      message: `${card.name} costs ${card.cost}, treasury holds ${game.treasury}.`,
    };
  }

  const { applied, taxed } = applyCard(game, type, block);
  if (!applied) {
    return { ok: false, reason: 'not_applicable', message: `${card.name} cannot be played on a ${block.type} block.` };
  }

  game.treasury += taxed - card.cost;
  return { ok: true, card, block, taxed, treasury: game.treasury };
}
