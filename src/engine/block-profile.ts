/**
 * block-profile.ts — Per-block-type constants
 *
 * One frozen profile per block type, shared by every block of that type.
 */

export const BLOCK_TYPES = ['factory', 'housing', 'hospital', 'quarantine'] as const;

export type BlockType = typeof BLOCK_TYPES[number];

export interface BlockTypeProfile {
  readonly type: BlockType;
  /** Base reproduction number, scaled by the current infection stage. */
  readonly r0: number;
  /** Base death rate, scaled by the current infection stage. */
  readonly deathRate: number;
  /** Material change per head while idle. */
  readonly idleMaterialRate: number;
  /** Material change per head while working (factories). */
  readonly workingMaterialRate: number;
  readonly resourceMin: number;
  readonly taxRate: number;
}

const BASE_PROFILE = {
  r0: 2.0,
  deathRate: 1.0,
  idleMaterialRate: -0.01,
  workingMaterialRate: 1.0,
  resourceMin: 0,
  taxRate: 0.05,
};

function defineProfile(type: BlockType, overrides: Partial<Omit<BlockTypeProfile, 'type'>> = {}): BlockTypeProfile {
  return Object.freeze({ type, ...BASE_PROFILE, ...overrides });
}

export const BLOCK_PROFILES: Readonly<Record<BlockType, BlockTypeProfile>> = Object.freeze({
  factory: defineProfile('factory'),
  housing: defineProfile('housing'),
  // Hospitals slow the spread, nobody dies there, and running one burns material
  hospital: defineProfile('hospital', { r0: 0.5, deathRate: 0.0, idleMaterialRate: -0.1 }),
  quarantine: defineProfile('quarantine'),
});
