/**
 * infection.ts — Disease stages and the cyclic stage timer
 */

export interface InfectionStage {
  readonly reproduction: number;
  readonly deathRate: number;
}

export const INFECTION_STAGES = Object.freeze({
  incubating: { reproduction: 0.0, deathRate: 0.0 },
  contagious: { reproduction: 1.0, deathRate: 0.0 },
  symptomatic: { reproduction: 1.0, deathRate: 0.1 },
  critical: { reproduction: 1.0, deathRate: 0.5 },
} satisfies Record<string, InfectionStage>);

/** Ticks spent in each stage (three days per stage). */
export const STAGE_PERIOD = 3;

export class StageTimer {
  private readonly stages: InfectionStage[] = [];
  private elapsed = 0;
  private stageIndex = 0;

  constructor(readonly period: number, stages: readonly InfectionStage[] = []) {
    for (const stage of stages) this.addStage(stage);
  }

  addStage(stage: InfectionStage): void {
    this.stages.push(stage);
  }

  get currentStage(): number {
    return this.stageIndex;
  }

  get ticksInStage(): number {
    return this.elapsed;
  }

  /** Returns 1 when the stage pointer wraps back to the first stage. */
  tick(): number {
    if (this.stages.length === 0) return 0;
    this.elapsed++;
    if (this.elapsed === this.period) {
      this.elapsed = 0;
      this.stageIndex = (this.stageIndex + 1) % this.stages.length;
      if (this.stageIndex === 0) return 1;
    }
    return 0;
  }

  get reproduction(): number {
    return this.stages[this.stageIndex]?.reproduction ?? 0;
  }

  get deathRate(): number {
    return this.stages[this.stageIndex]?.deathRate ?? 0;
  }
}

/** Timer for the cohort infected this generation: not yet contagious. */
export function createNextGenTimer(): StageTimer {
  return new StageTimer(STAGE_PERIOD, [INFECTION_STAGES.incubating, INFECTION_STAGES.contagious]);
}

/** Timer for the cohort that has turned symptomatic. */
export function createCurrentGenTimer(): StageTimer {
  return new StageTimer(STAGE_PERIOD, [INFECTION_STAGES.symptomatic, INFECTION_STAGES.critical]);
}
