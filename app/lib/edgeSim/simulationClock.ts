/**
 * Simulation Clock
 * Simulated time only moves forward: tick() adds one timestep, advanceGeneration()
 * closes the current generation. Time of day wraps every 24 h from startHour.
 */

import { assertTimestep } from "./physicsEngine";

export interface ClockOptions {
  tickDurationS: number;
  ticksPerGeneration: number;
  startHour: number;
}

export interface ClockState {
  elapsedS: number;
  tickCount: number;
  generation: number;
  ticksIntoGeneration: number;
  timeOfDay: number;
}

export class SimulationClock {
  private elapsedS = 0;
  private tickCount = 0;
  private generation = 0;
  private ticksIntoGeneration = 0;

  constructor(private readonly options: ClockOptions) {
    assertTimestep(options.tickDurationS);
    if (!Number.isInteger(options.ticksPerGeneration) || options.ticksPerGeneration <= 0) {
      throw new RangeError(`ticksPerGeneration must be a positive integer, got ${options.ticksPerGeneration}`);
    }
  }

  get dtS(): number {
    return this.options.tickDurationS;
  }

  currentTimeOfDay(): number {
    const hours = this.options.startHour + this.elapsedS / 3600;
    return ((hours % 24) + 24) % 24;
  }

  generationBoundaryReached(): boolean {
    return this.ticksIntoGeneration >= this.options.ticksPerGeneration;
  }

  tick(): void {
    this.elapsedS += this.options.tickDurationS;
    this.tickCount += 1;
    this.ticksIntoGeneration += 1;
  }

  advanceGeneration(): void {
    this.generation += 1;
    this.ticksIntoGeneration = 0;
  }

  state(): ClockState {
    return {
      elapsedS: this.elapsedS,
      tickCount: this.tickCount,
      generation: this.generation,
      ticksIntoGeneration: this.ticksIntoGeneration,
      timeOfDay: this.currentTimeOfDay(),
    };
  }
}
