/**
 * Config loading and validation.
 *
 * Loads config.yml from the data directory, substitutes ${ENV_VAR} references,
 * and validates the tenant list at startup so misconfigurations fail early
 * instead of on the first request.
 */

import fs from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { LogLevel } from "./logger.js";
import { tenantIdProblem } from "./store/tenants.js";
import { DEFAULT_MAX_NOTE_BYTES } from "./store/notes.js";
import { DEFAULT_MAX_ASSET_BYTES } from "./store/assets.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface Config {
  notes: {
    /** Base directory; each tenant's notes live in <dir>/<tenantId>. */
    dir: string;
    max_note_bytes: number;
    max_asset_bytes: number;
  };
  /** Allow-list of tenant ids. Fixed for the lifetime of the process. */
  tenants: string[];
  log: {
    level: LogLevel;
  };
  data_dir: string;
}

export function resolveDataDir(): string {
  return path.resolve(process.env.NOTEKEEP_DATA_DIR || "./data");
}

/**
 * Replace ${VAR} references with values from process.env.
 */
function substituteEnvVars(text: string): string {
  // Only upper-case env-style names, so `${name}` in note templates survives.
  return text.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_match, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new Error(`Environment variable ${varName} is not set`);
    }
    return value;
  });
}

/**
 * Recursively substitute env vars in all string values of an object.
 */
function substituteDeep(obj: unknown): unknown {
  if (typeof obj === "string") {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteDeep);
  }
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteDeep(value);
    }
    return result;
  }
  return obj;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  return undefined;
}

/**
 * Tenants may be a YAML list or a comma-separated string (handy with
 * `tenants: ${NOTEKEEP_TENANTS}`). Values are stringified and trimmed.
 */
function tenantsFromConfig(raw: unknown, warnings: string[]): string[] {
  let values: unknown[];
  if (Array.isArray(raw)) {
    values = raw;
  } else if (typeof raw === "string") {
    values = raw.split(",").filter((part) => part.trim() !== "");
  } else {
    values = [];
  }

  return values.map((value) => {
    const id = String(value);
    const trimmed = id.trim();
    if (trimmed !== id) {
      warnings.push(`tenant id "${id}" has surrounding whitespace; using "${trimmed}"`);
    }
    return trimmed;
  });
}

function logLevelFromConfig(raw: unknown): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === raw);
}

export function loadConfig(configPath?: string): Config {
  const dataDir = resolveDataDir();
  const cfgPath = configPath || path.join(dataDir, "config.yml");

  if (!fs.existsSync(cfgPath)) {
    throw new Error(`Config file not found: ${cfgPath}`);
  }

  const raw = fs.readFileSync(cfgPath, "utf-8");
  const substituted = asRecord(substituteDeep(parseYaml(raw)));
  const notesRaw = asRecord(substituted.notes);
  const logRaw = asRecord(substituted.log);

  const errors: string[] = [];
  const warnings: string[] = [];

  const level = logRaw.level === undefined ? "info" : logLevelFromConfig(logRaw.level);
  if (level === undefined) {
    errors.push(`log.level must be one of ${LOG_LEVELS.join(", ")} (got ${JSON.stringify(logRaw.level)})`);
  }

  const notesDir = typeof notesRaw.dir === "string" && notesRaw.dir.trim()
    ? path.resolve(path.dirname(cfgPath), notesRaw.dir)
    : path.join(dataDir, "notes");

  // Defaults
  const config: Config = {
    notes: {
      dir: notesDir,
      max_note_bytes: toFiniteNumber(notesRaw.max_note_bytes) ?? DEFAULT_MAX_NOTE_BYTES,
      max_asset_bytes: toFiniteNumber(notesRaw.max_asset_bytes) ?? DEFAULT_MAX_ASSET_BYTES,
    },
    tenants: tenantsFromConfig(substituted.tenants, warnings),
    log: {
      level: level ?? "info",
    },
    data_dir: dataDir,
  };

  validateConfig(config, errors, warnings);

  return config;
}

/**
 * Validate config at startup. Collects every problem so one run shows them all.
 */
function validateConfig(config: Config, errors: string[], warnings: string[]): void {
  // --- Tenants ---

  if (config.tenants.length === 0) {
    errors.push("at least one tenant is required under tenants");
  }

  const seen = new Set<string>();
  for (const tenantId of config.tenants) {
    const problem = tenantIdProblem(tenantId);
    if (problem) {
      errors.push(problem);
    } else if (seen.has(tenantId)) {
      errors.push(`tenant id "${tenantId}" is listed twice`);
    }
    seen.add(tenantId);
  }

  // --- Limits ---

  if (!(config.notes.max_note_bytes > 0)) {
    errors.push("notes.max_note_bytes must be a positive number");
  }
  if (!(config.notes.max_asset_bytes > 0)) {
    errors.push("notes.max_asset_bytes must be a positive number");
  }

  // --- Emit ---

  for (const w of warnings) {
    console.warn(`Config warning: ${w}`);
  }
  if (errors.length > 0) {
    throw new Error(`Config errors:\n  - ${errors.join("\n  - ")}`);
  }
}

/**
 * Ensure data directories and every tenant root exist.
 */
export function ensureDataDirs(config: Config): void {
  const dirs = [
    config.data_dir,
    path.join(config.data_dir, "logs"),
    config.notes.dir,
    ...config.tenants.map((tenantId) => path.join(config.notes.dir, tenantId)),
  ];

  for (const dir of dirs) {
    fs.mkdirSync(dir, { recursive: true });
  }
}
