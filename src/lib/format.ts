import type { ConflictEvent, Vec3 } from "@/lib/types";

/** Seconds with one decimal, e.g. 12 → "12.0s" */
export function formatSeconds(t: number): string {
  return `${t.toFixed(1)}s`;
}

/** "(x, y, z)" rounded to two decimals */
export function formatPoint(p: Vec3): string {
  return `(${p.x.toFixed(2)}, ${p.y.toFixed(2)}, ${p.z.toFixed(2)})`;
}

/**
 * One-line description of a conflict for panels and logs.
 * e.g. "primary and shadow within 0.00 m at t=0.0s (window 0.0s–10.0s) near (0.00, 0.00, 0.00)"
 */
export function describeConflict(event: ConflictEvent): string {
  return (
    `${event.droneA} and ${event.droneB} within ${event.minSeparation.toFixed(2)} m ` +
    `at t=${formatSeconds(event.worstTime)} ` +
    `(window ${formatSeconds(event.tStart)}–${formatSeconds(event.tEnd)}) ` +
    `near ${formatPoint(event.location)}`
  );
}
