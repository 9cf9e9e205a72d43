import type { AlignedPair, Vec3, Verdict } from "@/lib/types";
import { DEFAULT_CONFIG } from "@/config/deconflictionConfig";
import { assertPositive } from "@/lib/errors";

/** Euclidean distance between two 3-D points */
export function separation(p: Vec3, q: Vec3): number {
  return Math.hypot(p.x - q.x, p.y - q.y, p.z - q.z);
}

/**
 * Conflict when the pair is strictly closer than `safetyDistance`.
 * A pair exactly at the threshold is clear.
 */
export function evaluate(pair: AlignedPair, safetyDistance: number = DEFAULT_CONFIG.safetyDistance): Verdict {
  assertPositive("safetyDistance", safetyDistance);
  const distance = separation(pair.a, pair.b);
  return { conflict: distance < safetyDistance, separation: distance };
}
