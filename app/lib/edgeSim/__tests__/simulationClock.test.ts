import { SimulationClock } from '../simulationClock';
import { InvalidTimestepError } from '../errors';

describe('SimulationClock', () => {
  it('should start at the configured hour', () => {
    const clock = new SimulationClock({ tickDurationS: 60, ticksPerGeneration: 3, startHour: 6 });
    expect(clock.state()).toEqual({ elapsedS: 0, tickCount: 0, generation: 0, ticksIntoGeneration: 0, timeOfDay: 6 });
  });

  it('should reach the generation boundary after the configured ticks', () => {
    const clock = new SimulationClock({ tickDurationS: 60, ticksPerGeneration: 3, startHour: 6 });
    clock.tick();
    clock.tick();
    expect(clock.generationBoundaryReached()).toBe(false);
    clock.tick();
    expect(clock.generationBoundaryReached()).toBe(true);
    expect(clock.currentTimeOfDay()).toBeCloseTo(6.05, 10);

    clock.advanceGeneration();
    expect(clock.generationBoundaryReached()).toBe(false);
    expect(clock.state()).toMatchObject({ elapsedS: 180, tickCount: 3, generation: 1, ticksIntoGeneration: 0 });
  });

  it('should wrap the time of day past midnight', () => {
    const clock = new SimulationClock({ tickDurationS: 3600, ticksPerGeneration: 24, startHour: 23 });
    clock.tick();
    expect(clock.currentTimeOfDay()).toBe(0);
    clock.tick();
    expect(clock.currentTimeOfDay()).toBe(1);
  });

  it('should only move forward', () => {
    const clock = new SimulationClock({ tickDurationS: 1, ticksPerGeneration: 10, startHour: 0 });
    let last = clock.state().elapsedS;
    for (let i = 0; i < 25; i++) {
      clock.tick();
      if (clock.generationBoundaryReached()) clock.advanceGeneration();
      expect(clock.state().elapsedS).toBeGreaterThan(last);
      last = clock.state().elapsedS;
    }
    expect(clock.state().generation).toBe(2);
  });

  it('should reject bad timesteps and generation lengths', () => {
    expect(() => new SimulationClock({ tickDurationS: 0, ticksPerGeneration: 3, startHour: 0 })).toThrow(InvalidTimestepError);
    expect(() => new SimulationClock({ tickDurationS: 60, ticksPerGeneration: 0, startHour: 0 })).toThrow(RangeError);
  });
});
