/**
 * Battery transition tests
 *
 * Ensures:
 * 1. Charge never leaves [0, capacity]
 * 2. Death is monotonic and dead nodes stay frozen
 * 3. The 0.5 Wh / 20 W / 1 s scenario dies on exactly tick 90
 * 4. advanceAll reads pre-tick state only
 */

import {
  advance,
  advanceAll,
  commitStep,
  harvestPowerW,
  loadPowerW,
  step,
} from '../physicsEngine';
import { InvalidTimestepError } from '../errors';
import { createRng } from '../../utils/rng';
import { TEST_MODEL, makeGene, makeNode, makeSample } from './fixtures';

describe('ResourcePhysicsEngine', () => {
  describe('single step', () => {
    it('should drain load power over the timestep and count inferences', () => {
      const node = makeNode();
      const result = step(node, makeSample(0), 3600);

      // 2 W idle + 0.5 × (6 − 2) = 4 W for one hour
      expect(result.loadW).toBe(4);
      expect(result.drainWh).toBe(4);
      expect(result.harvestWh).toBe(0);
      expect(result.battery).toEqual({ capacityWh: 10, currentWh: 6, status: 'Alive' });
      expect(result.inferences).toBe(36000);
      expect(result.usefulWork).toBe(28800);
      expect(result.died).toBe(false);
    });

    it('should harvest irradiance × efficiency × cloud × modifier', () => {
      expect(harvestPowerW(makeSample(500, 0.2, 0.5), 1.2)).toBeCloseTo(60, 10);
      expect(harvestPowerW(makeSample(-50, 0.2, 1), 1)).toBe(0);
    });

    it('should cap harvest at the panel rating', () => {
      expect(harvestPowerW(makeSample(500), 1, 5)).toBe(5);
    });

    it('should not charge beyond capacity', () => {
      const node = makeNode({ battery: { capacityWh: 10, currentWh: 9, status: 'Alive' } });
      const battery = advance(node, makeSample(1000), 3600);
      expect(battery.currentWh).toBe(10);
      expect(battery.status).toBe('Alive');
    });

    it('should clamp at zero and mark the node dead', () => {
      const node = makeNode({ battery: { capacityWh: 10, currentWh: 1, status: 'Alive' } });
      const result = step(node, makeSample(0), 3600);
      expect(result.battery).toEqual({ capacityWh: 10, currentWh: 0, status: 'Dead' });
      expect(result.died).toBe(true);
      expect(result.inferences).toBe(0);
      expect(result.usefulWork).toBe(0);
    });

    it('should leave dead nodes frozen', () => {
      const battery = { capacityWh: 10, currentWh: 0, status: 'Dead' as const };
      const result = step(makeNode({ battery }), makeSample(1000), 3600);
      expect(result.battery).toBe(battery);
      expect(result.harvestWh).toBe(0);
      expect(result.drainWh).toBe(0);
      expect(result.died).toBe(false);
    });

    it('should reject non-positive or non-finite timesteps', () => {
      const node = makeNode();
      for (const dt of [0, -1, NaN, Infinity]) {
        expect(() => step(node, makeSample(0), dt)).toThrow(InvalidTimestepError);
      }
      expect(() => advanceAll([], makeSample(0), 0)).toThrow(InvalidTimestepError);
    });

    it('should idle when the power policy declines', () => {
      const node = makeNode({
        battery: { capacityWh: 10, currentWh: 4, status: 'Alive' },
        gene: makeGene({ dutyCycle: 1, powerPolicy: 'Conservative' }),
      });
      const result = step(node, makeSample(0), 60);
      expect(result.effectiveDuty).toBe(0);
      expect(result.loadW).toBe(TEST_MODEL.idle_power_w);
      expect(result.inferences).toBe(0);
    });

    it('should compute load as idle + duty × (inference − idle)', () => {
      expect(loadPowerW(TEST_MODEL, 0)).toBe(2);
      expect(loadPowerW(TEST_MODEL, 1)).toBe(6);
      expect(loadPowerW(TEST_MODEL, 0.25)).toBe(3);
    });
  });

  describe('invariants over many ticks', () => {
    it('should keep charge within [0, capacity] for every tick', () => {
      const rng = createRng(11);
      let node = makeNode({ battery: { capacityWh: 5, currentWh: 2.5, status: 'Alive' } });

      for (let t = 0; t < 2000; t++) {
        const sample = makeSample(rng() * 600, 0.2, rng());
        node = commitStep(node, step(node, sample, 60), 60);
        expect(node.battery.currentWh).toBeGreaterThanOrEqual(0);
        expect(node.battery.currentWh).toBeLessThanOrEqual(node.battery.capacityWh);
      }
    });

    it('should never die at zero duty while harvest covers drain', () => {
      // 100 W/m² × 0.2 × 1 × 1 = 20 W harvest against 2 W idle
      let node = makeNode({
        battery: { capacityWh: 10, currentWh: 0.001, status: 'Alive' },
        gene: makeGene({ dutyCycle: 0 }),
      });
      for (let t = 0; t < 1000; t++) {
        node = commitStep(node, step(node, makeSample(100), 60), 60);
        expect(node.battery.status).toBe('Alive');
      }
    });

    it('should lose charge every tick without sun, then stay dead', () => {
      for (const powerPolicy of ['Aggressive', 'Conservative', 'SmartAdaptive'] as const) {
        let node = makeNode({
          battery: { capacityWh: 1, currentWh: 1, status: 'Alive' },
          gene: makeGene({ dutyCycle: 0.7, powerPolicy }),
        });
        let diedAt: number | null = null;

        for (let t = 1; t <= 2000; t++) {
          const before = node.battery.currentWh;
          node = commitStep(node, step(node, makeSample(0), 60), 60);
          if (diedAt === null) {
            expect(node.battery.currentWh).toBeLessThan(before);
            if (node.battery.status === 'Dead') {
              expect(node.battery.currentWh).toBe(0);
              diedAt = t;
            }
          } else {
            expect(node.battery.status).toBe('Dead');
            expect(node.battery.currentWh).toBe(0);
          }
        }
        expect(diedAt).not.toBeNull();
      }
    });

    it('should kill a 0.5 Wh node under a flat 20 W load on tick 90', () => {
      const flat = { ...TEST_MODEL, idle_power_w: 20, inference_power_w: 20 };
      let node = makeNode({ model: flat, battery: { capacityWh: 0.5, currentWh: 0.5, status: 'Alive' } });

      let ticks = 0;
      while (node.battery.status === 'Alive' && ticks < 1000) {
        const result = step(node, makeSample(0), 1);
        expect(result.drainWh).toBeCloseTo(20 / 3600, 12);
        node = commitStep(node, result, 1);
        ticks++;
      }

      expect(ticks).toBe(90);
      expect(node.battery.currentWh).toBe(0);
    });
  });

  describe('fork-join', () => {
    it('should step every node against pre-tick state without mutating it', () => {
      const a = makeNode({ id: 1 });
      const b = makeNode({ id: 2, battery: { capacityWh: 10, currentWh: 0.5, status: 'Alive' } });
      const results = advanceAll([a, b], makeSample(0), 3600);

      expect(results.map((r) => r.id)).toEqual([1, 2]);
      expect(results[0].battery.currentWh).toBe(6);
      expect(results[1].battery.status).toBe('Dead');
      expect(a.battery.currentWh).toBe(10);
      expect(b.battery.currentWh).toBe(0.5);
    });

    it('should fold results into node counters on commit', () => {
      const node = makeNode();
      const committed = commitStep(node, step(node, makeSample(0), 3600), 3600);
      expect(committed.ageTicks).toBe(1);
      expect(committed.survivalS).toBe(3600);
      expect(committed.inferences).toBe(36000);
      expect(committed.usefulWork).toBe(28800);
      expect(committed.energyConsumedWh).toBe(4);
      expect(committed.energyHarvestedWh).toBe(0);
    });

    it('should refuse to commit a result onto another node', () => {
      const result = step(makeNode({ id: 1 }), makeSample(0), 60);
      expect(() => commitStep(makeNode({ id: 2 }), result, 60)).toThrow(RangeError);
    });
  });
});
