/**
 * variable.ts — Buffered counters and proportional broadcast
 *
 * A BufferedValue keeps a committed value plus a staged buffer. Reads see
 * the committed value only; buffered writes become visible on commit().
 * BroadcastValue adds priority-weighted distribution to linked counters
 * of the same kind on neighbouring blocks.
 */

export const EPSILON = 1e-6;

export type CounterKind = 'healthy' | 'currentInfected' | 'nextInfected' | 'material';

export const COUNTER_KINDS: readonly CounterKind[] = ['healthy', 'currentInfected', 'nextInfected', 'material'];

/** Reference to a counter inside the board arena. */
export interface LinkRef {
  readonly block: number;
  readonly kind: CounterKind;
}

export type LinkResolver = (ref: LinkRef) => BroadcastValue;

// ==================== BufferedValue ====================

export class BufferedValue<T> {
  private committed: T;
  private buffered: T;
  private dirty = false;

  constructor(initial: T) {
    this.committed = initial;
    this.buffered = initial;
  }

  get(): T {
    return this.committed;
  }

  /** Direct write: visible immediately, discards anything staged. */
  set(value: T): void {
    this.committed = value;
    this.buffered = value;
    this.dirty = false;
  }

  getBuffered(): T {
    return this.buffered;
  }

  setBuffered(value: T): void {
    this.buffered = value;
    this.dirty = true;
  }

  needsCommit(): boolean {
    return this.dirty;
  }

  /** Stages `delta` on top of whatever is already buffered. */
  addBuffered(this: BufferedValue<number>, delta: number): void {
    this.setBuffered(this.getBuffered() + delta);
  }

  commit(): void {
    if (!this.dirty) return;
    this.committed = this.buffered;
    this.dirty = false;
  }
}

// ==================== BroadcastValue ====================

export class BroadcastValue extends BufferedValue<number> {
  priority = 0;
  private links: readonly LinkRef[] = Object.freeze([]);

  constructor(initial: number, readonly kind: CounterKind) {
    super(initial);
  }

  get outLinks(): readonly LinkRef[] {
    return this.links;
  }

  addOutLink(ref: LinkRef): void {
    this.links = Object.freeze([...this.links, Object.freeze({ ...ref })]);
  }

  /**
   * Give away `ratio` of the committed value to links whose priority is at
   * least `offset`, weighted by priority + 1. Allocation floors at every
   * step against a running remainder, so rounding residue stays with the
   * source. Returns the amount actually sent.
   */
  broadcast(resolve: LinkResolver, ratio: number, offset = 0): number {
    const targets: BroadcastValue[] = [];
    let weightSum = 0;
    for (const ref of this.links) {
      const target = resolve(ref);
      if (target.priority < offset) continue;
      weightSum += target.priority + 1;
      targets.push(target);
    }
    if (weightSum < EPSILON) return 0;

    const effectiveRatio = ratio <= EPSILON ? 0 : ratio;
    const value = this.get();
    let delta = Math.floor(value * effectiveRatio);
    if (value < delta) delta = value;

    let outSum = delta;
    for (const target of targets) {
      let alloc = Math.floor(delta * ((target.priority + 1) / weightSum));
      if (outSum < alloc) alloc = outSum;
      target.addBuffered(alloc);
      outSum -= alloc;
    }
    const sent = delta - outSum;
    this.addBuffered(-sent);
    return sent;
  }
}
