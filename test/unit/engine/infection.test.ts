import { expect } from "chai";
import {
  INFECTION_STAGES,
  StageTimer,
  createCurrentGenTimer,
  createNextGenTimer,
} from "../../../src/engine/infection.js";

function ticksReturningOne(timer: StageTimer, ticks: number): number[] {
  const hits: number[] = [];
  for (let t = 1; t <= ticks; t++) {
    if (timer.tick() === 1) hits.push(t);
  }
  return hits;
}

describe("StageTimer", () => {
  it("should never report a cycle without stages", () => {
    const timer = new StageTimer(3);
    expect(ticksReturningOne(timer, 30)).to.deep.equal([]);
    expect(timer.ticksInStage).to.equal(0);
    expect(timer.reproduction).to.equal(0);
    expect(timer.deathRate).to.equal(0);
  });

  it("should report a cycle every period * stages ticks", () => {
    const timer = new StageTimer(3, [INFECTION_STAGES.symptomatic, INFECTION_STAGES.critical]);
    expect(ticksReturningOne(timer, 30)).to.deep.equal([6, 12, 18, 24, 30]);
  });

  it("should report every period for a single stage", () => {
    const timer = new StageTimer(2, [INFECTION_STAGES.contagious]);
    expect(ticksReturningOne(timer, 7)).to.deep.equal([2, 4, 6]);
  });

  it("should keep elapsed below the period", () => {
    const timer = new StageTimer(4, [INFECTION_STAGES.incubating, INFECTION_STAGES.contagious, INFECTION_STAGES.critical]);
    for (let t = 0; t < 50; t++) {
      timer.tick();
      expect(timer.ticksInStage).to.be.below(4);
      expect(timer.currentStage).to.be.below(3);
    }
  });

  describe("stage tables", () => {
    it("should move the current generation from symptomatic to critical", () => {
      const timer = createCurrentGenTimer();
      expect(timer.deathRate).to.equal(0.1);
      timer.tick();
      timer.tick();
      expect(timer.deathRate).to.equal(0.1);
      timer.tick();
      expect(timer.currentStage).to.equal(1);
      expect(timer.deathRate).to.equal(0.5);
      expect(timer.reproduction).to.equal(1.0);
    });

    it("should keep the next generation non-contagious for one period", () => {
      const timer = createNextGenTimer();
      expect(timer.reproduction).to.equal(0);
      timer.tick();
      timer.tick();
      timer.tick();
      expect(timer.reproduction).to.equal(1.0);
      expect(timer.deathRate).to.equal(0);
    });
  });
});
