import { describe, it, expect } from "vitest";
import { checkMission } from "@/lib/deconflict";
import { DeconflictionError } from "@/lib/errors";
import type { Mission, Waypoint } from "@/lib/types";

function mission(droneId: string, ...waypoints: [number, number, number, number][]): Mission {
  return {
    droneId,
    waypoints: waypoints.map(([x, y, z, t]): Waypoint => ({ x, y, z, t })),
  };
}

function hover(droneId: string, x: number, from: number, to: number): Mission {
  return mission(droneId, [x, 0, 0, from], [x, 0, 0, to]);
}

const primary = mission("primary", [0, 0, 0, 0], [10, 0, 0, 10]);

function catchError(fn: () => unknown): DeconflictionError {
  try {
    fn();
  } catch (e) {
    if (e instanceof DeconflictionError) return e;
    throw e;
  }
  throw new Error("expected a DeconflictionError");
}

describe("checkMission", () => {
  it("reports a mission 100 m away as safe", () => {
    const other = mission("lane_b", [0, 100, 0, 0], [10, 100, 0, 10]);

    expect(checkMission(primary, [other])).toEqual({ safe: true, conflicts: [] });
  });

  it("reports an identical path and schedule as one conflict over the whole flight", () => {
    const other = mission("shadow", [0, 0, 0, 0], [10, 0, 0, 10]);

    const report = checkMission(primary, [other]);

    expect(report.safe).toBe(false);
    expect(report.conflicts).toEqual([
      {
        droneA: "primary",
        droneB: "shadow",
        tStart: 0,
        tEnd: 10,
        location: { x: 0, y: 0, z: 0 },
        otherLocation: { x: 0, y: 0, z: 0 },
        worstTime: 0,
        minSeparation: 0,
        severity: "critical",
      },
    ]);
  });

  it("flags 1.5 m of vertical separation but not 3 m", () => {
    const close = mission("upper", [0, 0, 1.5, 0], [10, 0, 1.5, 10]);
    const clear = mission("upper", [0, 0, 3, 0], [10, 0, 3, 10]);

    const closeReport = checkMission(primary, [close]);
    expect(closeReport.safe).toBe(false);
    expect(closeReport.conflicts).toHaveLength(1);
    expect(closeReport.conflicts[0]).toMatchObject({ tStart: 0, tEnd: 10, minSeparation: 1.5, severity: "medium" });

    expect(checkMission(primary, [clear]).safe).toBe(true);
  });

  it("ignores spatial overlap when the time windows never meet", () => {
    const later = mission("later", [0, 0, 0, 20], [10, 0, 0, 30]);

    expect(checkMission(primary, [later])).toEqual({ safe: true, conflicts: [] });
  });

  it("aligns samples up to the time tolerance apart", () => {
    const waiting = hover("waiting", 10, 11, 21);

    const report = checkMission(primary, [waiting]);
    expect(report.conflicts).toHaveLength(1);
    expect(report.conflicts[0]).toMatchObject({ tStart: 10, tEnd: 10, minSeparation: 0 });

    expect(checkMission(primary, [waiting], { timeTolerance: 0.5 }).safe).toBe(true);
  });

  it("bounds each encounter by the instants strictly inside the safety distance", () => {
    const long = mission("primary", [0, 0, 0, 0], [20, 0, 0, 20]);

    const [event] = checkMission(long, [hover("zulu", 5, 4, 6)]).conflicts;

    expect(event).toMatchObject({
      droneB: "zulu",
      tStart: 4,
      tEnd: 6,
      minSeparation: 0,
      worstTime: 5,
      location: { x: 5, y: 0, z: 0 },
    });
  });

  it("orders conflicts from all drones by start time", () => {
    const long = mission("primary", [0, 0, 0, 0], [20, 0, 0, 20]);

    const report = checkMission(long, [hover("alpha", 15, 14, 16), hover("zulu", 5, 4, 6)]);

    expect(report.conflicts.map((c) => [c.droneB, c.tStart])).toEqual([
      ["zulu", 4],
      ["alpha", 14],
    ]);
  });

  it("breaks start-time ties by drone id", () => {
    const long = mission("primary", [0, 0, 0, 0], [20, 0, 0, 20]);

    const report = checkMission(long, [hover("b2", 5, 4, 6), hover("b1", 5, 4, 6)]);

    expect(report.conflicts.map((c) => c.droneB)).toEqual(["b1", "b2"]);
  });

  it("applies a custom safety distance", () => {
    const close = mission("upper", [0, 0, 1.5, 0], [10, 0, 1.5, 10]);

    expect(checkMission(primary, [close], { safetyDistance: 1 }).safe).toBe(true);
    expect(checkMission(primary, [close], { safetyDistance: 1.6 }).safe).toBe(false);
  });

  it("is safe with no other traffic", () => {
    expect(checkMission(primary, [])).toEqual({ safe: true, conflicts: [] });
  });

  it("checks parameters before missions", () => {
    const broken = mission("broken", [0, 0, 0, 0]);

    const err = catchError(() => checkMission(primary, [broken], { step: 0 }));
    expect(err.kind).toBe("invalid_parameter");
    expect(err.parameter).toBe("step");
  });

  it.each([
    ["step", { step: -1 }],
    ["timeTolerance", { timeTolerance: 0 }],
    ["safetyDistance", { safetyDistance: -2 }],
  ])("rejects a non-positive %s", (parameter, config) => {
    const err = catchError(() => checkMission(primary, [], config));
    expect(err.kind).toBe("invalid_parameter");
    expect(err.parameter).toBe(parameter);
  });

  it("fails the whole check on one invalid mission", () => {
    const fine = mission("fine", [0, 0, 0, 0], [10, 0, 0, 10]);
    const broken = mission("broken", [0, 0, 0, 0]);

    const err = catchError(() => checkMission(primary, [fine, broken]));
    expect(err.kind).toBe("invalid_mission");
    expect(err.droneId).toBe("broken");
  });

  it("fails on a degenerate segment in any mission", () => {
    const stalled = mission("stalled", [0, 0, 0, 0], [5, 0, 0, 5], [6, 0, 0, 5]);

    const err = catchError(() => checkMission(primary, [stalled]));
    expect(err.kind).toBe("degenerate_segment");
    expect(err.droneId).toBe("stalled");
    expect(err.segment).toBe(1);
  });

  it("validates the primary mission too", () => {
    const backwards = mission("primary", [0, 0, 0, 10], [10, 0, 0, 0]);

    expect(catchError(() => checkMission(backwards, [])).kind).toBe("invalid_mission");
  });

  it("rejects a drone id shared by the primary and another mission", () => {
    const twin = mission("primary", [0, 5, 0, 0], [10, 5, 0, 10]);

    const err = catchError(() => checkMission(primary, [twin]));
    expect(err.kind).toBe("invalid_mission");
    expect(err.droneId).toBe("primary");
    expect(err.message).toBe("Invalid mission primary: drone id is used by more than one mission");
  });

  it("rejects a drone id shared by two other missions", () => {
    const first = hover("relay", 50, 0, 10);
    const second = hover("relay", 80, 0, 10);

    const err = catchError(() => checkMission(primary, [first, second]));
    expect(err.kind).toBe("invalid_mission");
    expect(err.droneId).toBe("relay");
  });

  it("leaves its inputs untouched", () => {
    const other = mission("shadow", [0, 0, 0, 0], [10, 0, 0, 10]);
    const before = JSON.stringify([primary, other]);

    checkMission(primary, [other]);

    expect(JSON.stringify([primary, other])).toBe(before);
  });
});
