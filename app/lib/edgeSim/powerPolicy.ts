/**
 * Power policies
 * Decide, per tick, whether a node runs inference at its gene's duty cycle or
 * sits idle. Aggressive always runs; the other two gate on battery level and
 * available harvest.
 */

export type PowerPolicy = "Aggressive" | "Conservative" | "SmartAdaptive";

export const POWER_POLICIES: readonly PowerPolicy[] = ["Aggressive", "Conservative", "SmartAdaptive"];

export const CONSERVATIVE_MIN_CHARGE = 0.5;
export const ADAPTIVE_MIN_CHARGE = 0.3;
export const ADAPTIVE_HARVEST_THRESHOLD_W = 5.0;

export interface PolicyInputs {
  currentWh: number;
  capacityWh: number;
  harvestW: number;
}

export function isPowerPolicy(value: string): value is PowerPolicy {
  return POWER_POLICIES.some((p) => p === value);
}

export function shouldInfer(policy: PowerPolicy, inputs: PolicyInputs): boolean {
  const charge = inputs.capacityWh > 0 ? inputs.currentWh / inputs.capacityWh : 0;

  switch (policy) {
    case "Aggressive":
      return true;
    case "Conservative":
      return charge > CONSERVATIVE_MIN_CHARGE;
    case "SmartAdaptive":
      // Plenty of sun: run freely. Otherwise protect the battery.
      return inputs.harvestW > ADAPTIVE_HARVEST_THRESHOLD_W || charge > ADAPTIVE_MIN_CHARGE;
  }
}

/**
 * Duty cycle actually applied this tick: the gene's value, or 0 when the policy declines.
 */
export function effectiveDutyCycle(policy: PowerPolicy, dutyCycle: number, inputs: PolicyInputs): number {
  return shouldInfer(policy, inputs) ? dutyCycle : 0;
}
