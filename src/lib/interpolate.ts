import type { Mission, Sample, Vec3, Waypoint } from "@/lib/types";
import { DEFAULT_CONFIG } from "@/config/deconflictionConfig";
import { DeconflictionError, assertPositive, invalidMission } from "@/lib/errors";

// ============================================================
// VALIDATION
// ============================================================

/**
 * Checks the mission invariants: a drone id, at least two finite waypoints,
 * strictly increasing timestamps. Equal consecutive timestamps are reported
 * as a degenerate segment rather than a generic ordering error.
 */
export function validateMission(mission: Mission): void {
  const { droneId, waypoints } = mission;

  if (typeof droneId !== "string" || droneId.trim() === "") {
    throw new DeconflictionError("invalid_mission", "Invalid mission: drone id is empty", { droneId });
  }
  if (waypoints.length < 2) {
    throw invalidMission(droneId, `needs at least 2 waypoints, got ${waypoints.length}`);
  }

  waypoints.forEach((w, i) => {
    if (![w.x, w.y, w.z, w.t].every(Number.isFinite)) {
      throw invalidMission(droneId, `waypoint ${i} has a non-finite coordinate or time`);
    }
  });

  for (let i = 0; i < waypoints.length - 1; i++) {
    const cur = waypoints[i];
    const next = waypoints[i + 1];
    if (next.t === cur.t) {
      throw new DeconflictionError(
        "degenerate_segment",
        `Degenerate segment ${i} in mission ${droneId}: waypoints ${i} and ${i + 1} share t=${cur.t}`,
        { droneId, segment: i }
      );
    }
    if (next.t < cur.t) {
      throw invalidMission(
        droneId,
        `waypoints must be strictly increasing in time (waypoint ${i + 1} at t=${next.t} follows t=${cur.t})`
      );
    }
  }
}

// ============================================================
// INTERPOLATION
// ============================================================

function lerp(from: Waypoint, to: Waypoint, t: number): Vec3 {
  const ratio = (t - from.t) / (to.t - from.t);
  return {
    x: from.x + ratio * (to.x - from.x),
    y: from.y + ratio * (to.y - from.y),
    z: from.z + ratio * (to.z - from.z),
  };
}

function* walkSegments(mission: Mission, step: number): Generator<Sample> {
  const { droneId, waypoints } = mission;
  const start = waypoints[0].t;

  // Grid times are computed as start + k * step, not accumulated, to keep drift out
  let k = 1;
  for (let i = 0; i < waypoints.length - 1; i++) {
    const from = waypoints[i];
    const to = waypoints[i + 1];

    // Waypoints are emitted verbatim so segment boundaries never drift
    yield { x: from.x, y: from.y, z: from.z, t: from.t, droneId };

    let t = start + k * step;
    while (t < to.t) {
      if (t > from.t) yield { ...lerp(from, to, t), t, droneId };
      k++;
      t = start + k * step;
    }
  }

  const last = waypoints[waypoints.length - 1];
  yield { x: last.x, y: last.y, z: last.z, t: last.t, droneId };
}

/**
 * Samples a mission's path every `step` seconds from its first to its last
 * waypoint. Every waypoint timestamp is included, so start, end and corners
 * always appear exactly.
 *
 * The mission and step are validated immediately; the samples themselves
 * are produced lazily, and each iteration starts over from the first one.
 */
export function interpolate(mission: Mission, step: number = DEFAULT_CONFIG.step): Iterable<Sample> {
  assertPositive("step", step);
  validateMission(mission);
  return {
    [Symbol.iterator]: () => walkSegments(mission, step),
  };
}

/**
 * Upper bound on how many samples interpolate yields for a mission: one per
 * grid point across the window, plus every waypoint.
 */
export function sampleCount(mission: Mission, step: number): number {
  const { waypoints } = mission;
  if (waypoints.length < 2) return waypoints.length;
  const span = waypoints[waypoints.length - 1].t - waypoints[0].t;
  return Math.max(0, Math.floor(span / step)) + waypoints.length;
}

/** Position on the mission's path at time t (must lie within the mission window) */
export function positionAt(mission: Mission, t: number): Vec3 {
  validateMission(mission);
  const { waypoints } = mission;
  const first = waypoints[0];
  const last = waypoints[waypoints.length - 1];

  if (!Number.isFinite(t) || t < first.t || t > last.t) {
    throw new DeconflictionError(
      "invalid_parameter",
      `t=${t} is outside mission ${mission.droneId} window [${first.t}, ${last.t}]`,
      { parameter: "t", droneId: mission.droneId }
    );
  }

  // Binary search for the last waypoint with w.t <= t
  let lo = 0;
  let hi = waypoints.length - 1;
  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (waypoints[mid].t <= t) lo = mid;
    else hi = mid - 1;
  }

  const from = waypoints[lo];
  if (from.t === t || lo === waypoints.length - 1) {
    return { x: from.x, y: from.y, z: from.z };
  }
  return lerp(from, waypoints[lo + 1], t);
}
