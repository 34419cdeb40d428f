/**
 * Hardware tiers
 * Battery size and panel rating per device class. When a scenario names a tier,
 * node capacity comes from here and harvest is capped at the panel rating.
 */

export type HardwareTierId = "ESP32" | "RaspberryPi4" | "JetsonNano";

export interface HardwareTier {
  id: HardwareTierId;
  label: string;
  battery_capacity_wh: number;
  max_solar_input_w: number;
}

export const HARDWARE_TIERS: Record<HardwareTierId, HardwareTier> = {
  ESP32: {
    id: "ESP32",
    label: "ESP32",
    battery_capacity_wh: 1.5, // small LiPo / supercap
    max_solar_input_w: 2.0,
  },
  RaspberryPi4: {
    id: "RaspberryPi4",
    label: "RPi4",
    battery_capacity_wh: 11.1, // UPS HAT
    max_solar_input_w: 20.0,
  },
  JetsonNano: {
    id: "JetsonNano",
    label: "Jetson",
    battery_capacity_wh: 20.0,
    max_solar_input_w: 40.0,
  },
};

export function isHardwareTierId(value: string): value is HardwareTierId {
  return Object.prototype.hasOwnProperty.call(HARDWARE_TIERS, value);
}
