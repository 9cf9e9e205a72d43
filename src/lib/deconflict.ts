import type { ConflictEvent, DeconflictionConfig, Mission, Report, Sample } from "@/lib/types";
import { resolveConfig } from "@/config/deconflictionConfig";
import { assertPositive, invalidMission } from "@/lib/errors";
import { interpolate } from "@/lib/interpolate";
import { align } from "@/lib/align";
import { evaluate } from "@/lib/evaluate";
import { ConflictAggregator } from "@/lib/aggregate";

// ============================================================
// HELPERS
// ============================================================

function checkParameters(config: DeconflictionConfig): void {
  assertPositive("step", config.step);
  assertPositive("timeTolerance", config.timeTolerance);
  assertPositive("safetyDistance", config.safetyDistance);
}

/** Conflicts are reported by drone id, so every mission needs its own */
function checkUniqueIds(missions: readonly Mission[]): void {
  const seen = new Set<string>();
  for (const { droneId } of missions) {
    if (seen.has(droneId)) {
      throw invalidMission(droneId, "drone id is used by more than one mission");
    }
    seen.add(droneId);
  }
}

/** Chronological by start, then by the other drone's id so ties are stable */
function byStart(a: ConflictEvent, b: ConflictEvent): number {
  if (a.tStart !== b.tStart) return a.tStart - b.tStart;
  if (a.droneB === b.droneB) return 0;
  return a.droneB < b.droneB ? -1 : 1;
}

/** interpolate → align → evaluate → aggregate for one (primary, other) pair */
function checkPair(
  primarySamples: Iterable<Sample>,
  otherSamples: Iterable<Sample>,
  config: DeconflictionConfig
): ConflictEvent[] {
  // One aggregator per pair; nothing is shared between pairs
  const aggregator = new ConflictAggregator(config.safetyDistance);
  for (const pair of align(primarySamples, otherSamples, config.timeTolerance)) {
    aggregator.push({ pair, verdict: evaluate(pair, config.safetyDistance) });
  }
  return aggregator.finish();
}

// ============================================================
// MAIN ENGINE
// ============================================================

/**
 * Checks a primary mission against every other mission.
 *
 * Parameters and all missions are validated before any pair is evaluated;
 * a single bad input, including a drone id used twice, fails the whole check
 * with a DeconflictionError and no partial report. Pairs are independent, and the returned conflicts are
 * ordered by start time.
 */
export function checkMission(
  primary: Mission,
  others: readonly Mission[],
  overrides: Partial<DeconflictionConfig> = {}
): Report {
  const config = resolveConfig(overrides);
  checkParameters(config);

  const primarySamples = interpolate(primary, config.step);
  const otherSamples = others.map((other) => interpolate(other, config.step));
  checkUniqueIds([primary, ...others]);

  const conflicts = otherSamples
    .flatMap((samples) => checkPair(primarySamples, samples, config))
    .sort(byStart);

  return { safe: conflicts.length === 0, conflicts };
}
