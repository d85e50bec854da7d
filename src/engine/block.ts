/**
 * block.ts — One board tile and its per-round settlement
 *
 * Settlement order within a round (driven by Board.runRound):
 * 1. endInBlock — local disease progression, infections, deaths, production
 * 2. endRound   — propagation of the four counters to neighbours (buffered)
 * 3. commit     — buffered writes become visible
 */

import { BLOCK_PROFILES, type BlockType, type BlockTypeProfile } from './block-profile.js';
import { createCurrentGenTimer, createNextGenTimer, type StageTimer } from './infection.js';
import { adaptedRandomNumber, defaultRandom, type RandomSource } from './random.js';
import { BroadcastValue, COUNTER_KINDS, type CounterKind, type LinkResolver } from './variable.js';

export const DEFAULT_QUARANTINE_PERIOD = 10;

// Hospitals are preferred receivers of symptomatic patients
export const HOSPITAL_INFECTED_PRIORITY = 20.0;

export const BROADCAST_RATIOS: Readonly<Record<CounterKind, number>> = Object.freeze({
  healthy: 0.5,
  currentInfected: 0.9,
  nextInfected: 0.5,
  material: 0.5,
});

// Hospitals only discharge symptomatic patients to links of at least this priority
export const HOSPITAL_DISCHARGE_OFFSET = 2.0;

export interface BlockOptions {
  type: BlockType;
  healthy: number;
  infected: number;
  material: number;
  id?: string;
  name?: string;
}

export type BlockCounts = Record<CounterKind, number>;

export class Block {
  readonly profile: BlockTypeProfile;
  readonly id: string;
  readonly name: string;
  private edges: readonly number[] = Object.freeze([]);
  private working: boolean;
  private inQuarantine = false;
  private quarantineCounter = 0;
  private quarantinePeriod = DEFAULT_QUARANTINE_PERIOD;

  private readonly counters: Record<CounterKind, BroadcastValue>;
  private readonly currentTimer: StageTimer = createCurrentGenTimer();
  private readonly nextTimer: StageTimer = createNextGenTimer();

  constructor(readonly index: number, options: BlockOptions, private readonly random: RandomSource = defaultRandom) {
    this.profile = BLOCK_PROFILES[options.type];
    this.id = options.id ?? `block-${index}`;
    this.name = options.name ?? this.id;
    this.working = options.type === 'factory';

    // Freshly seeded infections start in the incubating cohort
    this.counters = {
      healthy: new BroadcastValue(Math.max(0, options.healthy), 'healthy'),
      currentInfected: new BroadcastValue(0, 'currentInfected'),
      nextInfected: new BroadcastValue(Math.max(0, options.infected), 'nextInfected'),
      material: new BroadcastValue(Math.max(this.profile.resourceMin, options.material), 'material'),
    };
    if (options.type === 'hospital') this.counters.currentInfected.priority = HOSPITAL_INFECTED_PRIORITY;
  }

  // ==================== Queries ====================

  get type(): BlockType {
    return this.profile.type;
  }

  get healthy(): number {
    return this.counters.healthy.get();
  }

  get currentInfected(): number {
    return this.counters.currentInfected.get();
  }

  get nextInfected(): number {
    return this.counters.nextInfected.get();
  }

  get material(): number {
    return this.counters.material.get();
  }

  get population(): number {
    return this.healthy + this.currentInfected + this.nextInfected;
  }

  get isWorking(): boolean {
    return this.working;
  }

  get isQuarantined(): boolean {
    return this.inQuarantine;
  }

  /** Rounds left before quarantine lifts, 0 when not quarantined. */
  get quarantineRemaining(): number {
    return this.inQuarantine ? Math.max(0, this.quarantinePeriod - this.quarantineCounter) : 0;
  }

  /** Indices of the blocks this one sends to, in link order. */
  get outEdges(): readonly number[] {
    return this.edges;
  }

  get materialRate(): number {
    return this.working ? this.profile.workingMaterialRate : this.profile.idleMaterialRate;
  }

  get currentR0(): number {
    return this.profile.r0 * this.currentTimer.reproduction;
  }

  get nextR0(): number {
    return this.profile.r0 * this.nextTimer.reproduction;
  }

  get currentDeathRate(): number {
    return this.profile.deathRate * this.currentTimer.deathRate;
  }

  get nextDeathRate(): number {
    return this.profile.deathRate * this.nextTimer.deathRate;
  }

  counts(): BlockCounts {
    return {
      healthy: this.healthy,
      currentInfected: this.currentInfected,
      nextInfected: this.nextInfected,
      material: this.material,
    };
  }

  counter(kind: CounterKind): BroadcastValue {
    return this.counters[kind];
  }

  /** Link this block's counters to the same counters on `target`. */
  addOutEdge(target: number): void {
    this.edges = Object.freeze([...this.edges, target]);
    for (const kind of COUNTER_KINDS) this.counters[kind].addOutLink({ block: target, kind });
  }

  // ==================== Actions ====================

  stopWorking(): boolean {
    this.working = false;
    return true;
  }

  /** Only factories can work; other types report false and stay idle. */
  startWorking(): boolean {
    if (this.type !== 'factory') return false;
    this.working = true;
    return true;
  }

  /** Levies tax on material immediately and returns the amount taken. */
  taxed(): number {
    const material = this.counters.material;
    const tax = Math.floor(material.get() * this.profile.taxRate);
    material.set(material.get() - tax);
    return tax;
  }

  quarantined(period: number = DEFAULT_QUARANTINE_PERIOD): boolean {
    this.inQuarantine = true;
    this.quarantinePeriod = period;
    this.quarantineCounter = 0;
    return true;
  }

  /** Evacuates the whole population at once. */
  aided(): boolean {
    this.counters.healthy.set(0);
    this.counters.currentInfected.set(0);
    this.counters.nextInfected.set(0);
    return true;
  }

  // ==================== Settlement ====================

  endInBlock(): void {
    const { healthy, currentInfected, nextInfected, material } = this.counters;

    // 1. Disease progression: a completed cycle shifts the cohorts
    const developed = this.currentTimer.tick() + this.nextTimer.tick();
    if (developed > 0) {
      healthy.set(healthy.get() + currentInfected.get());
      currentInfected.set(nextInfected.get());
      nextInfected.set(0);
    }

    // 2. New infections join the incubating cohort
    let infections = Math.floor(currentInfected.get() * this.currentR0 + nextInfected.get() * this.nextR0);
    if (infections > healthy.get()) infections = healthy.get();
    if (infections > 0) {
      nextInfected.set(nextInfected.get() + infections);
      healthy.set(healthy.get() - infections);
    }

    // 3. Deaths, drawn per cohort
    const currentDeaths = adaptedRandomNumber(this.currentDeathRate, currentInfected.get(), this.random);
    currentInfected.set(Math.max(0, currentInfected.get() - currentDeaths));
    const nextDeaths = adaptedRandomNumber(this.nextDeathRate, nextInfected.get(), this.random);
    nextInfected.set(Math.max(0, nextInfected.get() - nextDeaths));

    // 4. Production / consumption
    const produced = Math.floor(this.materialRate * (healthy.get() + currentInfected.get()));
    material.set(Math.max(this.profile.resourceMin, material.get() + produced));
  }

  /** Returns false when quarantine kept this block from broadcasting. */
  endRound(resolve: LinkResolver): boolean {
    if (this.inQuarantine) {
      this.quarantineCounter++;
      if (this.quarantineCounter >= this.quarantinePeriod) this.inQuarantine = false;
      return false;
    }

    const { healthy, currentInfected, nextInfected, material } = this.counters;
    healthy.broadcast(resolve, BROADCAST_RATIOS.healthy);
    const offset = this.type === 'hospital' ? HOSPITAL_DISCHARGE_OFFSET : 0;
    currentInfected.broadcast(resolve, BROADCAST_RATIOS.currentInfected, offset);
    nextInfected.broadcast(resolve, BROADCAST_RATIOS.nextInfected);
    material.broadcast(resolve, BROADCAST_RATIOS.material);
    return true;
  }

  commit(): void {
    for (const kind of COUNTER_KINDS) this.counters[kind].commit();
  }
}
