/**
 * Override Loader
 * Parses optional tabular (CSV) measurement data into sparse field-level
 * overrides. Nothing is validated here beyond cell parsing: the resolver decides
 * which values are acceptable and reports the rest.
 */

import { promises as fs } from "fs";
import { csvParseRows } from "d3-dsv";
import { MODEL_FIELDS, type ModelField } from "./parameterCatalog";
import { parseNumericCell } from "../utils/sanitize";
import { createLogger } from "../utils/logger";

const log = createLogger("OVERRIDES");

export type OverrideValue = number | string;

export interface ModelOverrideRow {
  identifier: string;
  fields: Partial<Record<ModelField, OverrideValue>>;
}

export interface SolarOverrideRow {
  hour?: OverrideValue;
  avg_irradiance?: OverrideValue;
  panel_efficiency?: OverrideValue;
  cloud_factor?: OverrideValue;
}

export interface OverrideSet {
  source: string;
  models: ModelOverrideRow[];
  solar: SolarOverrideRow[];
}

export interface CsvTable {
  header: string[];
  rows: string[][];
}

/**
 * Header row plus data rows. Quoted cells may hold commas, doubled quotes and
 * newlines. Blank rows and `#` comment rows are skipped; header names are lower-cased.
 */
export function parseCsv(text: string): CsvTable {
  const lines = csvParseRows(text).filter(
    (row) => !(row.length === 1 && row[0].trim() === "") && !row[0].trimStart().startsWith("#")
  );

  if (lines.length === 0) {
    return { header: [], rows: [] };
  }

  const header = lines[0].map((h) => h.trim().toLowerCase());
  return { header, rows: lines.slice(1) };
}

function cellGetter(header: string[], row: string[]) {
  return (...names: string[]): string | undefined => {
    for (const name of names) {
      const idx = header.indexOf(name);
      if (idx >= 0 && idx < row.length) {
        return row[idx];
      }
    }
    return undefined;
  };
}

/**
 * Model rows keyed by `identifier` (or `model_name`). Columns not present are
 * simply absent from the row's fields.
 */
export function parseModelOverrides(text: string, source: string = "inline"): OverrideSet {
  const { header, rows } = parseCsv(text);
  const models: ModelOverrideRow[] = rows.map((row) => {
    const cell = cellGetter(header, row);
    const fields: Partial<Record<ModelField, OverrideValue>> = {};
    for (const field of MODEL_FIELDS) {
      const value = parseNumericCell(cell(field));
      if (value !== undefined) {
        fields[field] = value;
      }
    }
    return { identifier: (cell("identifier", "model_name") ?? "").trim(), fields };
  });
  return { source, models, solar: [] };
}

/**
 * Solar rows keyed by `hour`; irradiance may be named `avg_irradiance` or `avg_irradiance_w_m2`.
 */
export function parseSolarOverrides(text: string, source: string = "inline"): OverrideSet {
  const { header, rows } = parseCsv(text);
  const solar: SolarOverrideRow[] = rows.map((row) => {
    const cell = cellGetter(header, row);
    const entry: SolarOverrideRow = {};
    const hour = parseNumericCell(cell("hour"));
    const irradiance = parseNumericCell(cell("avg_irradiance", "avg_irradiance_w_m2"));
    const efficiency = parseNumericCell(cell("panel_efficiency"));
    const cloud = parseNumericCell(cell("cloud_factor"));
    if (hour !== undefined) entry.hour = hour;
    if (irradiance !== undefined) entry.avg_irradiance = irradiance;
    if (efficiency !== undefined) entry.panel_efficiency = efficiency;
    if (cloud !== undefined) entry.cloud_factor = cloud;
    return entry;
  });
  return { source, models: [], solar };
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) {
      log.warn(`${path} not found, using compiled defaults`);
      return null;
    }
    throw err;
  }
}

export interface OverrideFiles {
  models?: string;
  solar?: string;
}

/**
 * Startup-only file read. A missing file is not an error; unreadable files are.
 */
export async function loadOverrideFiles(files: OverrideFiles): Promise<OverrideSet[]> {
  const sets: OverrideSet[] = [];

  if (files.models) {
    const text = await readOptional(files.models);
    if (text !== null) {
      const set = parseModelOverrides(text, files.models);
      log.info(`loaded ${set.models.length} model rows from ${files.models}`);
      sets.push(set);
    }
  }

  if (files.solar) {
    const text = await readOptional(files.solar);
    if (text !== null) {
      const set = parseSolarOverrides(text, files.solar);
      log.info(`loaded ${set.solar.length} solar rows from ${files.solar}`);
      sets.push(set);
    }
  }

  return sets;
}
