"use client";

import type { ConflictEvent, Mission } from "@/lib/types";
import { planBounds, planProjector } from "@/lib/planView";
import { describeConflict, formatPoint, formatSeconds } from "@/lib/format";

interface TrajectoryMapProps {
  missions: Mission[];
  conflicts: ConflictEvent[];
}

const WIDTH = 800;
const HEIGHT = 420;
const PADDING = 28;

const PRIMARY_COLOR = "#2563eb";
const TRAFFIC_COLORS = ["#9ca3af", "#a78bfa", "#34d399", "#f472b6", "#fbbf24", "#22d3ee"];

function pathColor(index: number): string {
  return index === 0 ? PRIMARY_COLOR : TRAFFIC_COLORS[(index - 1) % TRAFFIC_COLORS.length];
}

export function TrajectoryMap({ missions, conflicts }: TrajectoryMapProps) {
  const project = planProjector(planBounds(missions, conflicts), WIDTH, HEIGHT, PADDING);

  return (
    <div style={{ marginBottom: 32 }}>
      <h2
        style={{
          fontFamily: "var(--font-display)",
          fontSize: 14,
          color: "var(--text-muted)",
          marginBottom: 12,
          letterSpacing: "0.05em",
        }}
      >
        PLAN VIEW
      </h2>
      <div
        style={{
          background: "var(--surface)",
          border: "1px solid var(--border)",
          borderRadius: 6,
          padding: 16,
        }}
      >
        <svg
          viewBox={`0 0 ${WIDTH} ${HEIGHT}`}
          style={{ width: "100%", height: "auto", display: "block" }}
          role="img"
          aria-label="Mission paths in plan view"
        >
          {missions.map((mission, i) => {
            const color = pathColor(i);
            const points = mission.waypoints.map(project);
            return (
              <g key={`${i}-${mission.droneId}`}>
                <polyline
                  points={points.map((p) => `${p.x},${p.y}`).join(" ")}
                  fill="none"
                  stroke={color}
                  strokeWidth={i === 0 ? 3 : 2}
                  strokeDasharray={i === 0 ? undefined : "6 4"}
                  strokeLinejoin="round"
                />
                {points.map((p, j) => {
                  const w = mission.waypoints[j];
                  return (
                    <g key={j}>
                      <circle cx={p.x} cy={p.y} r={4} fill={color}>
                        <title>
                          {`${mission.droneId} WP${j} ${formatPoint(w)} at ${formatSeconds(w.t)}`}
                        </title>
                      </circle>
                      <text
                        x={p.x + 6}
                        y={p.y - 6}
                        fontSize={10}
                        fontFamily="var(--font-mono)"
                        fill="var(--text-muted)"
                      >
                        {j === 0 ? mission.droneId : `WP${j}`}
                      </text>
                    </g>
                  );
                })}
              </g>
            );
          })}

          {conflicts.map((c) => {
            const at = project(c.location);
            const other = project(c.otherLocation);
            return (
              <g key={`${c.droneB}-${c.tStart}`}>
                <line
                  x1={at.x}
                  y1={at.y}
                  x2={other.x}
                  y2={other.y}
                  stroke="var(--red)"
                  strokeWidth={1.5}
                />
                <circle cx={other.x} cy={other.y} r={5} fill="none" stroke="var(--red)" strokeWidth={2} />
                <circle cx={at.x} cy={at.y} r={7} fill="var(--red)" opacity={0.85}>
                  <title>{describeConflict(c)}</title>
                </circle>
              </g>
            );
          })}
        </svg>
      </div>
      <div
        style={{
          display: "flex",
          flexWrap: "wrap",
          gap: 16,
          marginTop: 12,
          fontSize: 10,
          fontFamily: "var(--font-mono)",
          color: "var(--text-muted)",
        }}
      >
        {missions.map((mission, i) => (
          <div key={`${i}-${mission.droneId}`} style={{ display: "flex", alignItems: "center", gap: 6 }}>
            <div style={{ width: 12, height: 3, background: pathColor(i) }} />
            <span>{mission.droneId}</span>
          </div>
        ))}
        <div style={{ display: "flex", alignItems: "center", gap: 6 }}>
          <div style={{ width: 10, height: 10, borderRadius: "50%", background: "var(--red)" }} />
          <span>Closest approach</span>
        </div>
      </div>
    </div>
  );
}
