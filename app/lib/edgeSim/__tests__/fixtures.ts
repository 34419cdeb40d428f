import type { Gene } from '../gene';
import type { ResolvedModelProfile } from '../hybridResolver';
import type { EdgeNode } from '../nodeRegistry';
import type { SolarSample } from '../solarProfile';
import type { Rng } from '../../utils/rng';

export const TEST_MODEL: ResolvedModelProfile = {
  identifier: 'test-model',
  idle_power_w: 2,
  inference_power_w: 6,
  accuracy_percent: 80,
  avg_inference_time_ms: 50,
  model_size_mb: 1,
  parameters_millions: 1,
};

export const RATE_BOUNDS = { mutationRateMin: 0, mutationRateMax: 1 };

export function makeGene(overrides: Partial<Gene> = {}): Gene {
  return {
    modelId: TEST_MODEL.identifier,
    dutyCycle: 0.5,
    solarEfficiencyModifier: 1,
    mutationRate: 0.1,
    powerPolicy: 'Aggressive',
    ...overrides,
  };
}

export function makeNode(overrides: Partial<EdgeNode> = {}): EdgeNode {
  return {
    id: 1,
    position: { slot: 0, cellX: 0, cellY: 0, x: 0, y: 0 },
    battery: { capacityWh: 10, currentWh: 10, status: 'Alive' },
    gene: makeGene(),
    model: TEST_MODEL,
    hardwareTier: null,
    maxHarvestW: null,
    ageTicks: 0,
    survivalS: 0,
    usefulWork: 0,
    inferences: 0,
    energyConsumedWh: 0,
    energyHarvestedWh: 0,
    generation: 0,
    parentId: null,
    ...overrides,
  };
}

export function makeSample(avgIrradiance: number, panelEfficiency = 0.2, cloudFactor = 1): SolarSample {
  return { timeOfDay: 12, avg_irradiance: avgIrradiance, panel_efficiency: panelEfficiency, cloud_factor: cloudFactor };
}

/**
 * Replays the given values in order, then fails loudly.
 */
export function scriptedRng(values: number[]): Rng {
  let i = 0;
  return () => {
    if (i >= values.length) {
      throw new Error(`scripted rng exhausted after ${values.length} draws`);
    }
    return values[i++];
  };
}
