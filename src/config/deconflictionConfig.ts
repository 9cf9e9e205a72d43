// ============================================================
// DECONFLICTION CONFIG
// Thresholds and defaults live here. Overridable per deployment
// through DECONFLICT_* environment variables and per request.
// ============================================================

import type { DeconflictionConfig, Severity } from "@/lib/types";

export const DEFAULT_CONFIG: Readonly<DeconflictionConfig> = {
  step: 1.0, // seconds between interpolated samples
  timeTolerance: 1.0, // seconds: samples this close count as simultaneous
  safetyDistance: 2.0, // metres of 3-D separation
};

// Severity by minSeparation / safetyDistance, checked in order.
// Anything not matched is "medium" (conflicts are always below 1.0).
export const SEVERITY_BANDS: { below: number; severity: Severity }[] = [
  { below: 0.5, severity: "critical" },
  { below: 0.75, severity: "high" },
];

// Ceiling on interpolated samples across all missions of one API request
export const MAX_SAMPLES_PER_REQUEST = 1_000_000;

const CONFIG_KEYS = ["step", "timeTolerance", "safetyDistance"] as const;

export const ENV_KEYS: Record<keyof DeconflictionConfig, string> = {
  step: "DECONFLICT_STEP",
  timeTolerance: "DECONFLICT_TIME_TOLERANCE",
  safetyDistance: "DECONFLICT_SAFETY_DISTANCE",
};

/** Merge a partial config over the defaults. Undefined fields keep the default. */
export function resolveConfig(overrides: Partial<DeconflictionConfig> = {}): DeconflictionConfig {
  return {
    step: overrides.step ?? DEFAULT_CONFIG.step,
    timeTolerance: overrides.timeTolerance ?? DEFAULT_CONFIG.timeTolerance,
    safetyDistance: overrides.safetyDistance ?? DEFAULT_CONFIG.safetyDistance,
  };
}

/**
 * Reads DECONFLICT_* overrides. Unset or unparsable values are left out so the
 * defaults apply; range checks happen in the engine.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env
): Partial<DeconflictionConfig> {
  const config: Partial<DeconflictionConfig> = {};
  for (const key of CONFIG_KEYS) {
    const raw = env[ENV_KEYS[key]];
    if (raw === undefined || raw.trim() === "") continue;
    const n = Number(raw);
    if (!isNaN(n)) config[key] = n;
  }
  return config;
}

export function severityFor(minSeparation: number, safetyDistance: number): Severity {
  const ratio = minSeparation / safetyDistance;
  for (const band of SEVERITY_BANDS) {
    if (ratio < band.below) return band.severity;
  }
  return "medium";
}
