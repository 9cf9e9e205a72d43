import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { parseMissionRequest } from "@/lib/parser";

function parseIssues(body: unknown): ZodError["issues"] {
  try {
    parseMissionRequest(body);
  } catch (e) {
    if (e instanceof ZodError) return e.issues;
    throw e;
  }
  throw new Error("expected a ZodError");
}

describe("parseMissionRequest", () => {
  it("reads timed tuples in 3D and 2D", () => {
    const parsed = parseMissionRequest({
      primary: { droneId: "p", waypoints: [[0, 0, 5, 0], [10, 0, 5, 10]] },
      others: [{ droneId: "b", waypoints: [[0, 5, 0], [10, 5, 10]] }],
    });

    expect(parsed.primary).toEqual({
      droneId: "p",
      waypoints: [
        { x: 0, y: 0, z: 5, t: 0 },
        { x: 10, y: 0, z: 5, t: 10 },
      ],
    });
    expect(parsed.others[0].waypoints).toEqual([
      { x: 0, y: 5, z: 0, t: 0 },
      { x: 10, y: 5, z: 0, t: 10 },
    ]);
    expect(parsed.config).toEqual({});
  });

  it("reads object waypoints with an optional z", () => {
    const parsed = parseMissionRequest({
      primary: { waypoints: [{ x: 1, y: 2, t: 0 }, { x: 3, y: 4, z: 5, t: 2 }] },
      others: [],
    });

    expect(parsed.primary.waypoints).toEqual([
      { x: 1, y: 2, z: 0, t: 0 },
      { x: 3, y: 4, z: 5, t: 2 },
    ]);
  });

  it("schedules a primary route given as positions and a time window", () => {
    const parsed = parseMissionRequest({
      primary: { waypoints: [[0, 0], [20, 0]], timeWindow: [0, 20] },
      others: [],
    });

    expect(parsed.primary).toEqual({
      droneId: "primary",
      waypoints: [
        { x: 0, y: 0, z: 0, t: 0 },
        { x: 20, y: 0, z: 0, t: 20 },
      ],
    });
  });

  it("names drones that come without an id", () => {
    const parsed = parseMissionRequest({
      primary: { waypoints: [[0, 0, 0], [1, 0, 1]] },
      others: [
        { waypoints: [[0, 0, 0], [1, 0, 1]] },
        { droneId: "named", waypoints: [[0, 0, 0], [1, 0, 1]] },
        { waypoints: [[0, 0, 0], [1, 0, 1]] },
      ],
    });

    expect(parsed.primary.droneId).toBe("primary");
    expect(parsed.others.map((m) => m.droneId)).toEqual(["drone_1", "named", "drone_3"]);
  });

  it("passes config values through unchecked", () => {
    const parsed = parseMissionRequest({
      primary: { waypoints: [[0, 0, 0], [1, 0, 1]] },
      others: [],
      config: { safetyDistance: 5, step: -1 },
    });

    expect(parsed.config).toEqual({ safetyDistance: 5, step: -1 });
  });

  it("rejects a position tuple without a time window", () => {
    const issues = parseIssues({
      primary: { waypoints: [[0, 0], [1, 1]] },
      others: [],
    });

    expect(issues[0].path).toEqual(["primary", "waypoints", 0]);
    expect(issues[0].message).toBe("expected [x, y, t] or [x, y, z, t] without a timeWindow");
  });

  it("rejects a timed tuple alongside a time window", () => {
    const issues = parseIssues({
      primary: { waypoints: [[0, 0, 0, 0], [1, 1, 1, 1]], timeWindow: [0, 10] },
      others: [],
    });

    expect(issues.map((i) => i.path)).toEqual([
      ["primary", "waypoints", 0],
      ["primary", "waypoints", 1],
    ]);
  });

  it("requires t on object waypoints without a time window", () => {
    const issues = parseIssues({
      primary: { waypoints: [[0, 0, 0], [1, 0, 1]] },
      others: [{ droneId: "b", waypoints: [{ x: 0, y: 0 }, { x: 1, y: 0, t: 1 }] }],
    });

    expect(issues).toHaveLength(1);
    expect(issues[0].path).toEqual(["others", 0, "waypoints", 0]);
  });

  it("rejects missing traffic, unknown config keys and non-numeric values", () => {
    expect(parseIssues({ primary: { waypoints: [[0, 0, 0], [1, 0, 1]] } })[0].path).toEqual(["others"]);
    expect(() =>
      parseMissionRequest({ primary: { waypoints: [[0, 0, 0], [1, 0, 1]] }, others: [], config: { speed: 3 } })
    ).toThrow(ZodError);
    expect(() =>
      parseMissionRequest({ primary: { waypoints: [[0, "0", 0], [1, 0, 1]] }, others: [] })
    ).toThrow(ZodError);
  });
});
