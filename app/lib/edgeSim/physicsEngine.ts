/**
 * Resource Physics Engine
 * Per-tick battery transition for one node:
 *
 *   load_w    = idle + effectiveDuty × (inference − idle)
 *   harvest_w = irradiance × panel_efficiency × cloud_factor × solarEfficiencyModifier
 *   current'  = clamp(current − load_w·dt/3600 + harvest_w·dt/3600, 0, capacity)
 *
 * A node whose charge reaches 0 is Dead and frozen from then on. step() only
 * reads its own node and the shared solar sample, so every node in a tick can be
 * computed independently and committed together (advanceAll + commitStep).
 */

import { InvalidTimestepError } from "./errors";
import { effectiveDutyCycle } from "./powerPolicy";
import type { ResolvedModelProfile } from "./hybridResolver";
import type { BatteryState, EdgeNode } from "./nodeRegistry";
import type { SolarSample } from "./solarProfile";
import { clamp } from "../utils/sanitize";

const SECONDS_PER_HOUR = 3600;

// Charge at or below this counts as empty (absorbs float residue from repeated subtraction)
export const EMPTY_EPSILON_WH = 1e-9;

export type PhysicsNode = Pick<EdgeNode, "id" | "battery" | "gene" | "model" | "maxHarvestW">;

export interface NodeStepResult {
  id: number;
  battery: BatteryState;
  effectiveDuty: number;
  loadW: number;
  harvestW: number;
  drainWh: number;
  harvestWh: number;
  inferences: number;
  usefulWork: number;
  died: boolean; // Alive → Dead on this tick
}

export function assertTimestep(dtS: number): void {
  if (!Number.isFinite(dtS) || dtS <= 0) {
    throw new InvalidTimestepError(dtS);
  }
}

export function loadPowerW(model: ResolvedModelProfile, effectiveDuty: number): number {
  return model.idle_power_w + effectiveDuty * (model.inference_power_w - model.idle_power_w);
}

export function harvestPowerW(sample: SolarSample, solarEfficiencyModifier: number, maxHarvestW: number | null = null): number {
  const raw = Math.max(0, sample.avg_irradiance) * sample.panel_efficiency * sample.cloud_factor * solarEfficiencyModifier;
  return maxHarvestW === null ? raw : Math.min(raw, maxHarvestW);
}

function frozen(node: PhysicsNode): NodeStepResult {
  return {
    id: node.id,
    battery: node.battery,
    effectiveDuty: 0,
    loadW: 0,
    harvestW: 0,
    drainWh: 0,
    harvestWh: 0,
    inferences: 0,
    usefulWork: 0,
    died: false,
  };
}

/**
 * One tick for one node. Throws InvalidTimestepError for dt ≤ 0 or non-finite.
 */
export function step(node: PhysicsNode, sample: SolarSample, dtS: number): NodeStepResult {
  assertTimestep(dtS);
  if (node.battery.status === "Dead") {
    return frozen(node);
  }

  const { capacityWh, currentWh } = node.battery;
  const harvestW = harvestPowerW(sample, node.gene.solarEfficiencyModifier, node.maxHarvestW);
  const effectiveDuty = effectiveDutyCycle(node.gene.powerPolicy, node.gene.dutyCycle, {
    currentWh,
    capacityWh,
    harvestW,
  });
  const loadW = loadPowerW(node.model, effectiveDuty);

  const drainWh = (loadW * dtS) / SECONDS_PER_HOUR;
  const harvestWh = (harvestW * dtS) / SECONDS_PER_HOUR;

  let next = clamp(currentWh - drainWh + harvestWh, 0, capacityWh);
  if (next <= EMPTY_EPSILON_WH) next = 0;
  const alive = next > 0;

  const inferences = alive ? (effectiveDuty * dtS * 1000) / node.model.avg_inference_time_ms : 0;

  return {
    id: node.id,
    battery: { capacityWh, currentWh: next, status: alive ? "Alive" : "Dead" },
    effectiveDuty,
    loadW,
    harvestW,
    drainWh,
    harvestWh,
    inferences,
    usefulWork: (inferences * node.model.accuracy_percent) / 100,
    died: !alive,
  };
}

/**
 * New battery state after one tick.
 */
export function advance(node: PhysicsNode, sample: SolarSample, dtS: number): BatteryState {
  return step(node, sample, dtS).battery;
}

/**
 * Fork: every node stepped against the same pre-tick state. Nothing is written;
 * the caller commits all results after the whole batch is computed.
 */
export function advanceAll(nodes: readonly PhysicsNode[], sample: SolarSample, dtS: number): NodeStepResult[] {
  assertTimestep(dtS);
  return nodes.map((node) => step(node, sample, dtS));
}

/**
 * Join: fold a step result into the node's counters. Nodes that were already
 * dead before the tick are returned unchanged.
 */
export function commitStep(node: EdgeNode, result: NodeStepResult, dtS: number): EdgeNode {
  if (result.id !== node.id) {
    throw new RangeError(`Step result for node ${result.id} applied to node ${node.id}`);
  }
  if (node.battery.status === "Dead") {
    return node;
  }
  return {
    ...node,
    battery: result.battery,
    ageTicks: node.ageTicks + 1,
    survivalS: node.survivalS + dtS,
    usefulWork: node.usefulWork + result.usefulWork,
    inferences: node.inferences + result.inferences,
    energyConsumedWh: node.energyConsumedWh + result.drainWh,
    energyHarvestedWh: node.energyHarvestedWh + result.harvestWh,
  };
}
