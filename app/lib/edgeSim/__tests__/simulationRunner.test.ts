/**
 * Runner tests
 *
 * Ensures:
 * 1. The tick loop, culling and extinction policies behave as configured
 * 2. Runs are reproducible for a fixed seed
 * 3. stop() and AbortSignal end a run cleanly between ticks
 */

import { applyBaseLoad, createSimulation, prepareCatalog, SimulationRunner } from '../simulationRunner';
import { resolve, requireModel } from '../hybridResolver';
import { createDefaultCatalog } from '../parameterCatalog';
import { buildConfig, type SimulationConfig } from '../simulationConfig';
import { parseModelOverrides } from '../overrideLoader';
import { InvalidConfigError } from '../errors';

const SMALL: Partial<SimulationConfig> = {
  populationSize: 9,
  gridWidth: 3,
  gridHeight: 3,
  tickDurationS: 60,
  ticksPerGeneration: 60,
  maxGenerations: 3,
};

const DOOMED: Partial<SimulationConfig> = {
  populationSize: 4,
  gridWidth: 2,
  gridHeight: 2,
  initialBatteryCapacityWh: 0.01,
  solarAvailability: 0,
  tickDurationS: 60,
  ticksPerGeneration: 10,
  maxGenerations: 5,
};

describe('SimulationRunner', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('catalog preparation', () => {
    it('should fold a base load into every model', () => {
      const { catalog } = resolve(createDefaultCatalog());
      const light = applyBaseLoad(catalog, 3);
      expect(requireModel(light, 'YOLOv8-nano').idle_power_w).toBe(3);
      expect(requireModel(light, 'YOLOv8-nano').inference_power_w).toBe(4.2);

      const heavy = applyBaseLoad(catalog, 10);
      expect(heavy.models.every((m) => m.idle_power_w === 10 && m.inference_power_w === 10)).toBe(true);
    });

    it('should log malformed overrides and keep going', () => {
      const config = buildConfig();
      const overrides = [parseModelOverrides('identifier,accuracy_percent\nYOLOv8-nano,-5')];
      const { catalog, issues } = prepareCatalog(config, overrides);

      expect(issues).toHaveLength(1);
      expect(requireModel(catalog, 'YOLOv8-nano').accuracy_percent).toBe(80.4);
      expect(console.warn).toHaveBeenCalledWith(
        '[RESOLVER] malformed override model:YOLOv8-nano.accuracy_percent = -5 (expected a number in [0, 100])'
      );
    });

    it('should refuse an invalid config before building anything', () => {
      expect(() => createSimulation({ config: { populationSize: 0 } })).toThrow(InvalidConfigError);
    });
  });

  describe('tick loop', () => {
    it('should seed generation 0 across the grid', () => {
      const { runner } = createSimulation({ config: SMALL });
      const nodes = runner.registry.list();
      expect(nodes).toHaveLength(9);
      expect(nodes.map((n) => n.position.slot)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
      expect(nodes.every((n) => n.generation === 0 && n.parentId === null)).toBe(true);
    });

    it('should kill a 0.5 Wh node under a 20 W base load on tick 90', () => {
      const { runner } = createSimulation({
        config: {
          populationSize: 1,
          gridWidth: 1,
          gridHeight: 1,
          initialBatteryCapacityWh: 0.5,
          initialChargeFraction: 1,
          solarAvailability: 0,
          baseLoadOverrideW: 20,
          tickDurationS: 1,
          ticksPerGeneration: 200,
        },
      });

      let diedOn: number | null = null;
      while (diedOn === null && runner.clock.state().tickCount < 200) {
        const report = runner.tick();
        if (report.died.length > 0) diedOn = report.tick;
      }
      expect(diedOn).toBe(90);
      expect(runner.registry.list()[0].battery).toEqual({ capacityWh: 0.5, currentWh: 0, status: 'Dead' });
    });

    it('should keep dead nodes in the registry under deferred culling', () => {
      const { runner } = createSimulation({ config: DOOMED });
      const report = runner.tick();
      expect(report.died).toEqual([1, 2, 3, 4]);
      expect(report.alive).toBe(0);
      expect(runner.registry.size).toBe(4);
    });

    it('should remove dead nodes at once under immediate culling, still counting them', () => {
      const { runner } = createSimulation({ config: { ...DOOMED, cullingPolicy: 'immediate' } });
      runner.tick();
      expect(runner.registry.size).toBe(0);

      const stats = runner.runGeneration();
      expect(stats.dead).toBe(4);
      expect(stats.extinct).toBe(true);
    });

    it('should account energy and work in the run totals', () => {
      const { runner } = createSimulation({ config: SMALL });
      runner.tick();
      const { totals } = runner.snapshot();
      expect(totals.ticks).toBe(1);
      expect(totals.energyConsumedWh).toBeGreaterThan(0);
      expect(totals.energyHarvestedWh).toBeGreaterThan(0);
    });
  });

  describe('generations', () => {
    it('should complete the configured number of generations', async () => {
      const { runner } = createSimulation({ config: SMALL });
      const summary = await runner.run();

      expect(summary.status).toBe('completed');
      expect(summary.generations.map((g) => g.generation)).toEqual([0, 1, 2]);
      expect(summary.clock.tickCount).toBe(180);
      expect(summary.clock.generation).toBe(3);
      for (const stats of summary.generations) {
        expect(stats.alive).toBe(9);
        expect(stats.dead).toBe(0);
        expect(stats.maxFitness).toBeGreaterThan(0);
        expect(Object.values(stats.modelHistogram).reduce((a, b) => a + b, 0)).toBe(9);
      }
      const nodes = runner.registry.list();
      expect(nodes.every((n) => n.generation === 3 && n.parentId !== null)).toBe(true);
    });

    it('should halt on extinction by default', async () => {
      const { runner } = createSimulation({ config: DOOMED });
      const summary = await runner.run();

      expect(summary.status).toBe('extinct');
      expect(summary.generations).toHaveLength(1);
      expect(summary.generations[0]).toMatchObject({ alive: 0, dead: 4, extinct: true, bestGene: null, modelHistogram: {} });
      expect(runner.isHalted).toBe(true);
      expect(runner.registry.dead()).toHaveLength(4);
    });

    it('should reseed after extinction when configured', async () => {
      const { runner } = createSimulation({ config: { ...DOOMED, extinctionPolicy: 'reseed', maxGenerations: 3 } });
      const summary = await runner.run();

      expect(summary.status).toBe('completed');
      expect(summary.generations.every((g) => g.extinct)).toBe(true);
      const nodes = runner.registry.list();
      expect(nodes.map((n) => n.id)).toEqual([13, 14, 15, 16]);
      expect(nodes.every((n) => n.generation === 3 && n.parentId === null)).toBe(true);
    });

    it('should be reproducible for a fixed seed', async () => {
      const first = createSimulation({ config: { ...SMALL, seed: 5 } }).runner;
      const second = createSimulation({ config: { ...SMALL, seed: 5 } }).runner;

      const a = await first.run();
      const b = await second.run();
      expect(b.generations).toEqual(a.generations);
      expect(second.snapshot().nodes).toEqual(first.snapshot().nodes);
    });
  });

  describe('stopping', () => {
    it('should stop before the next tick when asked', async () => {
      const { runner } = createSimulation({ config: SMALL });
      runner.addListener({
        onTick: (report) => {
          if (report.tick === 5) runner.stop();
        },
      });

      const summary = await runner.run();
      expect(summary.status).toBe('stopped');
      expect(summary.clock.tickCount).toBe(5);
    });

    it('should honour an aborted signal', async () => {
      const { runner } = createSimulation({ config: SMALL });
      const controller = new AbortController();
      controller.abort();

      const summary = await runner.run(controller.signal);
      expect(summary.status).toBe('stopped');
      expect(summary.clock.tickCount).toBe(0);
    });

    it('should stop notifying a removed listener', () => {
      const { runner } = createSimulation({ config: SMALL });
      const seen: number[] = [];
      const unsubscribe = runner.addListener({ onTick: (r) => seen.push(r.tick) });
      runner.tick();
      unsubscribe();
      runner.tick();
      expect(seen).toEqual([1]);
    });
  });

  it('should accept a prepared catalog directly', () => {
    const config = buildConfig(SMALL);
    const runner = new SimulationRunner(config, resolve(createDefaultCatalog()).catalog, { checkInvariants: false });
    expect(runner.registry.size).toBe(9);
  });
});
