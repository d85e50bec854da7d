/**
 * board.ts — Block arena and the round driver
 *
 * Blocks live in an array addressed by index; edges and counter links store
 * indices and are resolved through the board. runRound() owns the phase
 * barrier: every block settles locally, then every block propagates into
 * its neighbours' buffers, then every block commits.
 */

import { Block, type BlockCounts, type BlockOptions } from './block.js';
import { defaultRandom, type RandomSource } from './random.js';
import { COUNTER_KINDS, type BroadcastValue, type LinkRef } from './variable.js';

export type BlockRef = number | string;

export interface RoundReport {
  /** Indices of blocks that skipped propagation because of quarantine. */
  isolated: number[];
}

export class Board {
  private readonly blocks: Block[] = [];
  private readonly byId = new Map<string, number>();

  constructor(private readonly random: RandomSource = defaultRandom) {}

  get size(): number {
    return this.blocks.length;
  }

  all(): readonly Block[] {
    return this.blocks;
  }

  addBlock(options: BlockOptions): Block {
    const block = new Block(this.blocks.length, options, this.random);
    if (this.byId.has(block.id)) throw new RangeError(`Duplicate block id: ${block.id}`);
    this.blocks.push(block);
    this.byId.set(block.id, block.index);
    return block;
  }

  find(ref: BlockRef): Block | undefined {
    const index = typeof ref === 'number' ? ref : this.byId.get(ref);
    return index === undefined ? undefined : this.blocks[index];
  }

  get(ref: BlockRef): Block {
    const block = this.find(ref);
    if (!block) throw new RangeError(`Unknown block: ${ref}`);
    return block;
  }

  /** Registers `target` as an out edge of `source`, linking all four counters. */
  connect(source: BlockRef, target: BlockRef): void {
    const from = this.get(source);
    const to = this.get(target);
    from.addOutEdge(to.index);
  }

  resolve = (ref: LinkRef): BroadcastValue => this.get(ref.block).counter(ref.kind);

  runRound(): RoundReport {
    for (const block of this.blocks) block.endInBlock();
    const isolated: number[] = [];
    for (const block of this.blocks) {
      if (!block.endRound(this.resolve)) isolated.push(block.index);
    }
    for (const block of this.blocks) block.commit();
    return { isolated };
  }

  totals(): BlockCounts {
    const totals: BlockCounts = { healthy: 0, currentInfected: 0, nextInfected: 0, material: 0 };
    for (const block of this.blocks) {
      for (const kind of COUNTER_KINDS) totals[kind] += block.counter(kind).get();
    }
    return totals;
  }
}
