import { z } from "zod";
import type { DeconflictionConfig, Mission, Vec3, Waypoint } from "@/lib/types";
import { scheduleMission } from "@/lib/schedule";

// ============================================================
// STEP 1: Schema for raw mission input
// ============================================================

const finite = z.number().finite();

/**
 * A waypoint is either a bare tuple or an object. What a tuple means depends
 * on the mission: with a timeWindow it is a position ([x, y] or [x, y, z]),
 * without one the last element is the timestamp ([x, y, t] or [x, y, z, t]).
 * Missing z means ground level (2D input).
 */
const RawPointSchema = z.union([
  z.array(finite).min(2).max(4),
  z.object({ x: finite, y: finite, z: finite.optional(), t: finite.optional() }),
]);

type RawPoint = z.infer<typeof RawPointSchema>;

type MissionDraft =
  | { droneId?: string; waypoints: Waypoint[] }
  | { droneId?: string; points: Vec3[]; timeWindow: [number, number] };

function toPosition(raw: RawPoint): Vec3 | string {
  if (Array.isArray(raw)) {
    if (raw.length === 2) return { x: raw[0], y: raw[1], z: 0 };
    if (raw.length === 3) return { x: raw[0], y: raw[1], z: raw[2] };
    return "expected [x, y] or [x, y, z] when timeWindow is given";
  }
  if (raw.t !== undefined) return "t is not allowed when timeWindow is given";
  return { x: raw.x, y: raw.y, z: raw.z ?? 0 };
}

function toWaypoint(raw: RawPoint): Waypoint | string {
  if (Array.isArray(raw)) {
    if (raw.length === 3) return { x: raw[0], y: raw[1], z: 0, t: raw[2] };
    if (raw.length === 4) return { x: raw[0], y: raw[1], z: raw[2], t: raw[3] };
    return "expected [x, y, t] or [x, y, z, t] without a timeWindow";
  }
  if (raw.t === undefined) return "t is required without a timeWindow";
  return { x: raw.x, y: raw.y, z: raw.z ?? 0, t: raw.t };
}

const MissionInputSchema = z
  .object({
    droneId: z.string().trim().min(1).optional(),
    waypoints: z.array(RawPointSchema),
    timeWindow: z.tuple([finite, finite]).optional(),
  })
  .transform((input, ctx): MissionDraft => {
    const { droneId, waypoints, timeWindow } = input;
    const convert = timeWindow ? toPosition : toWaypoint;

    const converted = waypoints.map((raw, i) => {
      const result = convert(raw);
      if (typeof result === "string") {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: result, path: ["waypoints", i] });
      }
      return result;
    });
    const valid = converted.filter((c): c is Waypoint | Vec3 => typeof c !== "string");
    if (valid.length !== converted.length) return z.NEVER;

    if (timeWindow) return { droneId, points: valid, timeWindow };
    return { droneId, waypoints: valid.filter((c): c is Waypoint => "t" in c) };
  });

const ConfigInputSchema = z
  .object({
    step: finite.optional(),
    timeTolerance: finite.optional(),
    safetyDistance: finite.optional(),
  })
  .strict();

export const MissionRequestSchema = z.object({
  primary: MissionInputSchema,
  others: z.array(MissionInputSchema),
  config: ConfigInputSchema.optional(),
});

/** Request body as a client sends it */
export type MissionRequest = z.input<typeof MissionRequestSchema>;

export interface ParsedMissionRequest {
  primary: Mission;
  others: Mission[];
  config: Partial<DeconflictionConfig>;
}

// ============================================================
// STEP 2: Build Missions
// ============================================================

function buildMission(draft: MissionDraft, fallbackId: string): Mission {
  const droneId = draft.droneId ?? fallbackId;
  if ("timeWindow" in draft) {
    return scheduleMission(droneId, draft.points, draft.timeWindow);
  }
  return { droneId, waypoints: draft.waypoints };
}

/**
 * Validates a raw request body and turns it into missions.
 * Throws a ZodError for malformed input. Range checks on config values and
 * mission invariants are left to the engine.
 */
export function parseMissionRequest(body: unknown): ParsedMissionRequest {
  const request = MissionRequestSchema.parse(body);
  return {
    primary: buildMission(request.primary, "primary"),
    others: request.others.map((draft, i) => buildMission(draft, `drone_${i + 1}`)),
    config: request.config ?? {},
  };
}
