/**
 * Parameter Catalog
 * Compiled defaults for inference-model power profiles and the solar profile.
 * Model numbers are Raspberry Pi 4 measurements (224×224 or 640×640 input).
 * This is the fallback layer; hybridResolver.ts merges optional overrides on top.
 */

export const CATALOG_VERSION = "edge-catalog/2";

export interface ModelProfile {
  identifier: string;
  idle_power_w: number;
  inference_power_w: number;
  accuracy_percent: number; // mAP@0.5 for detectors, ImageNet top-1 or GLUE for the rest
  avg_inference_time_ms: number;
  model_size_mb: number;
  parameters_millions: number;
}

export type ModelField = Exclude<keyof ModelProfile, "identifier">;

export interface SolarSamplePoint {
  hour: number; // 0–24, fractional allowed
  avg_irradiance: number; // W/m²
}

export interface SolarProfile {
  identifier: string;
  samples: SolarSamplePoint[]; // sorted by hour
  panel_efficiency: number; // 0–1
  cloud_factor: number; // 0–1, 1 = clear sky
}

export type SolarField = "avg_irradiance" | "panel_efficiency" | "cloud_factor";

export interface ParameterCatalog {
  version: string;
  models: ModelProfile[];
  solar: SolarProfile;
}

export interface FieldBounds {
  min: number;
  max?: number;
  minExclusive?: boolean;
}

export const MODEL_FIELDS: readonly ModelField[] = [
  "idle_power_w",
  "inference_power_w",
  "accuracy_percent",
  "avg_inference_time_ms",
  "model_size_mb",
  "parameters_millions",
];

export const MODEL_FIELD_BOUNDS: Record<ModelField, FieldBounds> = {
  idle_power_w: { min: 0 },
  inference_power_w: { min: 0 },
  accuracy_percent: { min: 0, max: 100 },
  avg_inference_time_ms: { min: 0, minExclusive: true },
  model_size_mb: { min: 0 },
  parameters_millions: { min: 0 },
};

export const SOLAR_FIELD_BOUNDS: Record<SolarField, FieldBounds> = {
  avg_irradiance: { min: 0 },
  panel_efficiency: { min: 0, max: 1 },
  cloud_factor: { min: 0, max: 1 },
};

const RPI4_IDLE_W = 2.5;

const DEFAULT_MODELS: ModelProfile[] = [
  { identifier: "YOLOv8-nano", idle_power_w: RPI4_IDLE_W, inference_power_w: 4.2, accuracy_percent: 80.4, avg_inference_time_ms: 45, model_size_mb: 6.0, parameters_millions: 3.2 },
  { identifier: "YOLOv8-small", idle_power_w: RPI4_IDLE_W, inference_power_w: 5.8, accuracy_percent: 86.2, avg_inference_time_ms: 78, model_size_mb: 22.0, parameters_millions: 11.2 },
  { identifier: "MobileNetV2", idle_power_w: RPI4_IDLE_W, inference_power_w: 3.8, accuracy_percent: 71.3, avg_inference_time_ms: 28, model_size_mb: 14.0, parameters_millions: 3.5 },
  { identifier: "EfficientNetB0", idle_power_w: RPI4_IDLE_W, inference_power_w: 4.5, accuracy_percent: 77.1, avg_inference_time_ms: 35, model_size_mb: 20.1, parameters_millions: 5.3 },
  { identifier: "TinyBERT", idle_power_w: RPI4_IDLE_W, inference_power_w: 6.2, accuracy_percent: 84.5, avg_inference_time_ms: 120, model_size_mb: 60.0, parameters_millions: 67.0 },
  { identifier: "EfficientNetB1", idle_power_w: RPI4_IDLE_W, inference_power_w: 5.2, accuracy_percent: 79.8, avg_inference_time_ms: 42, model_size_mb: 31.0, parameters_millions: 7.9 },
  { identifier: "MobileNetV3-Small", idle_power_w: RPI4_IDLE_W, inference_power_w: 3.5, accuracy_percent: 67.4, avg_inference_time_ms: 26, model_size_mb: 13.0, parameters_millions: 2.5 },
  { identifier: "DistilBERT", idle_power_w: RPI4_IDLE_W, inference_power_w: 5.5, accuracy_percent: 88.9, avg_inference_time_ms: 110, model_size_mb: 268.0, parameters_millions: 66.0 },
];

// Hourly clear-sky irradiance for a mid-latitude coastal site
const DEFAULT_IRRADIANCE_BY_HOUR = [
  0, 0, 0, 0, 0, 20, 120, 280, 450, 600, 720, 800,
  830, 800, 720, 600, 450, 280, 120, 20, 0, 0, 0, 0,
];

const DEFAULT_SOLAR: SolarProfile = {
  identifier: "default",
  samples: DEFAULT_IRRADIANCE_BY_HOUR.map((avg_irradiance, hour) => ({ hour, avg_irradiance })),
  panel_efficiency: 0.18,
  cloud_factor: 0.15, // heavily overcast site, keeps harvest in the same range as node load
};

/**
 * Fresh, mutable copy of the compiled catalog.
 */
export function createDefaultCatalog(): ParameterCatalog {
  return {
    version: CATALOG_VERSION,
    models: DEFAULT_MODELS.map((m) => ({ ...m })),
    solar: {
      ...DEFAULT_SOLAR,
      samples: DEFAULT_SOLAR.samples.map((s) => ({ ...s })),
    },
  };
}
