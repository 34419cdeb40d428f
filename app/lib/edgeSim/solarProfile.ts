/**
 * Solar profile lookup
 * Irradiance is linearly interpolated between hourly samples and wraps across
 * midnight, so every time value has a defined sample.
 */

import { bisector } from "d3-array";
import type { SolarSamplePoint } from "./parameterCatalog";
import type { ResolvedSolarProfile } from "./hybridResolver";

export interface SolarSample {
  timeOfDay: number; // hours, [0, 24)
  avg_irradiance: number; // W/m², already scaled by scenario availability
  panel_efficiency: number;
  cloud_factor: number;
}

const byHour = bisector<SolarSamplePoint, number>((s) => s.hour);

export function wrapHour(hour: number): number {
  return ((hour % 24) + 24) % 24;
}

/**
 * Interpolated irradiance (W/m²) at a time of day. Never negative.
 */
export function irradianceAt(profile: ResolvedSolarProfile, timeOfDay: number): number {
  const samples = profile.samples;
  if (samples.length === 0) return 0;
  if (samples.length === 1) return Math.max(0, samples[0].avg_irradiance);

  const t = wrapHour(timeOfDay);
  const upperIdx = byHour.right(samples, t);

  // Neighbours, unwrapped onto a continuous hour axis
  const lower = upperIdx === 0
    ? { hour: samples[samples.length - 1].hour - 24, value: samples[samples.length - 1].avg_irradiance }
    : { hour: samples[upperIdx - 1].hour, value: samples[upperIdx - 1].avg_irradiance };
  const upper = upperIdx === samples.length
    ? { hour: samples[0].hour + 24, value: samples[0].avg_irradiance }
    : { hour: samples[upperIdx].hour, value: samples[upperIdx].avg_irradiance };

  const span = upper.hour - lower.hour;
  const frac = span > 0 ? (t - lower.hour) / span : 0;
  const value = lower.value + (upper.value - lower.value) * frac;
  return Math.max(0, value);
}

/**
 * Solar input for one tick. `availability` is the scenario-wide scalar; 0 disables harvesting.
 */
export function sampleSolar(profile: ResolvedSolarProfile, timeOfDay: number, availability: number = 1): SolarSample {
  return {
    timeOfDay: wrapHour(timeOfDay),
    avg_irradiance: irradianceAt(profile, timeOfDay) * Math.max(0, availability),
    panel_efficiency: profile.panel_efficiency,
    cloud_factor: profile.cloud_factor,
  };
}

export function sortSamples(samples: SolarSamplePoint[]): SolarSamplePoint[] {
  return [...samples].sort((a, b) => a.hour - b.hour);
}
