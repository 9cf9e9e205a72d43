import { describe, it, expect } from "vitest";
import { interpolate, positionAt, sampleCount, validateMission } from "@/lib/interpolate";
import { DeconflictionError } from "@/lib/errors";
import type { Mission } from "@/lib/types";

const dogleg: Mission = {
  droneId: "d1",
  waypoints: [
    { x: 0, y: 0, z: 0, t: 0 },
    { x: 10, y: 0, z: 0, t: 4 },
    { x: 10, y: 6, z: 3, t: 7 },
  ],
};

function catchError(fn: () => unknown): DeconflictionError {
  try {
    fn();
  } catch (e) {
    if (e instanceof DeconflictionError) return e;
    throw e;
  }
  throw new Error("expected a DeconflictionError");
}

describe("interpolate", () => {
  it("samples on the step grid and includes every waypoint time", () => {
    const samples = [...interpolate(dogleg, 2)];

    expect(samples.map((s) => s.t)).toEqual([0, 2, 4, 6, 7]);
    expect(samples[1]).toEqual({ x: 5, y: 0, z: 0, t: 2, droneId: "d1" });
    expect(samples[3].x).toBe(10);
    expect(samples[3].y).toBeCloseTo(4);
    expect(samples[3].z).toBeCloseTo(2);
  });

  it("reproduces waypoint positions exactly at their timestamps", () => {
    const samples = [...interpolate(dogleg, 0.7)];

    for (const w of dogleg.waypoints) {
      const at = samples.find((s) => s.t === w.t);
      expect(at).toEqual({ x: w.x, y: w.y, z: w.z, t: w.t, droneId: "d1" });
    }
  });

  it("spans exactly the mission window even when the step does not divide it", () => {
    const mission: Mission = {
      droneId: "d2",
      waypoints: [
        { x: 0, y: 0, z: 0, t: 0 },
        { x: 10, y: 0, z: 0, t: 10 },
      ],
    };
    const times = [...interpolate(mission, 3)].map((s) => s.t);

    expect(times).toEqual([0, 3, 6, 9, 10]);
  });

  it("produces strictly increasing times", () => {
    const times = [...interpolate(dogleg, 0.1)].map((s) => s.t);

    expect(times[0]).toBe(0);
    expect(times[times.length - 1]).toBe(7);
    for (let i = 1; i < times.length; i++) {
      expect(times[i]).toBeGreaterThan(times[i - 1]);
    }
  });

  it("starts over on every iteration", () => {
    const samples = interpolate(dogleg, 1);

    expect([...samples]).toEqual([...samples]);
    expect([...samples]).toHaveLength(8);
  });

  it("does not touch the mission", () => {
    const frozen: Mission = Object.freeze({
      droneId: "frozen",
      waypoints: Object.freeze(dogleg.waypoints.map((w) => Object.freeze({ ...w }))),
    });

    expect(() => [...interpolate(frozen, 1)]).not.toThrow();
  });

  it("rejects a non-positive step", () => {
    const err = catchError(() => interpolate(dogleg, 0));
    expect(err.kind).toBe("invalid_parameter");
    expect(err.parameter).toBe("step");

    expect(catchError(() => interpolate(dogleg, -1)).kind).toBe("invalid_parameter");
  });

  it("validates the mission when called, before iterating", () => {
    const single: Mission = { droneId: "solo", waypoints: [{ x: 0, y: 0, z: 0, t: 0 }] };

    const err = catchError(() => interpolate(single, 1));
    expect(err.kind).toBe("invalid_mission");
    expect(err.droneId).toBe("solo");
  });
});

describe("sampleCount", () => {
  it("counts grid points over the window plus the waypoints", () => {
    expect(sampleCount(dogleg, 1)).toBe(10);
    expect(sampleCount(dogleg, 2)).toBe(6);
  });

  it("never undercounts what interpolate yields", () => {
    for (const step of [0.5, 1, 2, 10]) {
      expect([...interpolate(dogleg, step)].length).toBeLessThanOrEqual(sampleCount(dogleg, step));
    }
  });
});

describe("validateMission", () => {
  it("reports shared timestamps as a degenerate segment", () => {
    const mission: Mission = {
      droneId: "dup",
      waypoints: [
        { x: 0, y: 0, z: 0, t: 0 },
        { x: 1, y: 0, z: 0, t: 5 },
        { x: 2, y: 0, z: 0, t: 5 },
      ],
    };

    const err = catchError(() => validateMission(mission));
    expect(err.kind).toBe("degenerate_segment");
    expect(err.segment).toBe(1);
    expect(err.droneId).toBe("dup");
  });

  it("rejects decreasing timestamps", () => {
    const mission: Mission = {
      droneId: "back",
      waypoints: [
        { x: 0, y: 0, z: 0, t: 5 },
        { x: 1, y: 0, z: 0, t: 2 },
      ],
    };

    expect(catchError(() => validateMission(mission)).kind).toBe("invalid_mission");
  });

  it("rejects non-finite values", () => {
    const mission: Mission = {
      droneId: "nan",
      waypoints: [
        { x: 0, y: NaN, z: 0, t: 0 },
        { x: 1, y: 0, z: 0, t: 1 },
      ],
    };

    expect(catchError(() => validateMission(mission)).kind).toBe("invalid_mission");
  });

  it("rejects an empty drone id", () => {
    const mission: Mission = {
      droneId: "  ",
      waypoints: [
        { x: 0, y: 0, z: 0, t: 0 },
        { x: 1, y: 0, z: 0, t: 1 },
      ],
    };

    expect(catchError(() => validateMission(mission)).kind).toBe("invalid_mission");
  });
});

describe("positionAt", () => {
  it("returns waypoint positions exactly at waypoint times", () => {
    for (const w of dogleg.waypoints) {
      expect(positionAt(dogleg, w.t)).toEqual({ x: w.x, y: w.y, z: w.z });
    }
  });

  it("interpolates linearly inside a segment", () => {
    expect(positionAt(dogleg, 2)).toEqual({ x: 5, y: 0, z: 0 });
    expect(positionAt(dogleg, 5.5)).toEqual({ x: 10, y: 3, z: 1.5 });
  });

  it("rejects times outside the mission window", () => {
    const err = catchError(() => positionAt(dogleg, 7.5));
    expect(err.kind).toBe("invalid_parameter");
    expect(err.parameter).toBe("t");
  });
});
