import type { Mission, Vec3, Waypoint } from "@/lib/types";
import { DeconflictionError, invalidMission } from "@/lib/errors";
import { separation } from "@/lib/evaluate";

/**
 * Builds a timed mission from an untimed route and a [start, end] window.
 * Each waypoint's time is proportional to the path length flown to reach it,
 * i.e. the drone is assumed to fly at constant speed. A route with no length
 * at all gets its times spread evenly.
 *
 * Zero-length legs inside a longer route produce repeated timestamps; the
 * engine reports those as degenerate segments. A leg with length that is
 * still too short against the whole route to get a later time than the one
 * before it is rejected here as a degenerate segment.
 */
export function scheduleMission(
  droneId: string,
  points: readonly Vec3[],
  timeWindow: readonly [number, number]
): Mission {
  const [start, end] = timeWindow;
  if (!Number.isFinite(start) || !Number.isFinite(end) || end <= start) {
    throw new DeconflictionError(
      "invalid_parameter",
      `Time window for ${droneId} must be finite with end > start, got [${start}, ${end}]`,
      { parameter: "timeWindow", droneId }
    );
  }
  if (points.length < 2) {
    throw invalidMission(droneId, `needs at least 2 waypoints, got ${points.length}`);
  }

  const duration = end - start;
  const legs = points.slice(1).map((p, i) => separation(points[i], p));
  const total = legs.reduce((sum, d) => sum + d, 0);

  let flown = 0;
  const waypoints: Waypoint[] = points.map((p, i) => {
    if (i > 0) flown += legs[i - 1];
    let t: number;
    if (i === points.length - 1) t = end;
    else if (total === 0) t = start + (duration * i) / (points.length - 1);
    else t = start + (duration * flown) / total;
    return { x: p.x, y: p.y, z: p.z, t };
  });

  for (let i = 1; i < waypoints.length; i++) {
    if (legs[i - 1] > 0 && waypoints[i].t <= waypoints[i - 1].t) {
      throw new DeconflictionError(
        "degenerate_segment",
        `Degenerate segment ${i - 1} in mission ${droneId}: a ${legs[i - 1]} m leg of a ` +
          `${total} m route is too short to get its own time in [${start}, ${end}]`,
        { droneId, segment: i - 1 }
      );
    }
  }

  return { droneId, waypoints };
}
