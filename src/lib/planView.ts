import type { ConflictEvent, Mission, Vec3 } from "@/lib/types";

export interface PlanBounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export interface ScreenPoint {
  x: number;
  y: number;
}

/**
 * x/y extent of every waypoint and conflict point. An axis with no extent
 * is widened by 1 m each way so a hover or a straight lane still has a scale.
 */
export function planBounds(missions: readonly Mission[], conflicts: readonly ConflictEvent[]): PlanBounds {
  const points: Vec3[] = [
    ...missions.flatMap((m) => m.waypoints),
    ...conflicts.flatMap((c) => [c.location, c.otherLocation]),
  ];
  if (points.length === 0) return { minX: -1, maxX: 1, minY: -1, maxY: 1 };

  let minX = Math.min(...points.map((p) => p.x));
  let maxX = Math.max(...points.map((p) => p.x));
  let minY = Math.min(...points.map((p) => p.y));
  let maxY = Math.max(...points.map((p) => p.y));
  if (minX === maxX) {
    minX -= 1;
    maxX += 1;
  }
  if (minY === maxY) {
    minY -= 1;
    maxY += 1;
  }
  return { minX, maxX, minY, maxY };
}

/**
 * Maps plan coordinates into a width × height box with one scale for both
 * axes, centred, north up (screen y grows downward).
 */
export function planProjector(
  bounds: PlanBounds,
  width: number,
  height: number,
  padding: number
): (p: Vec3) => ScreenPoint {
  const spanX = bounds.maxX - bounds.minX;
  const spanY = bounds.maxY - bounds.minY;
  const scale = Math.min((width - 2 * padding) / spanX, (height - 2 * padding) / spanY);
  const offsetX = (width - spanX * scale) / 2;
  const offsetY = (height - spanY * scale) / 2;

  return (p) => ({
    x: offsetX + (p.x - bounds.minX) * scale,
    y: height - offsetY - (p.y - bounds.minY) * scale,
  });
}
