"use client";

import { useState } from "react";
import type { ConflictEvent, Mission } from "@/lib/types";
import { formatPoint, formatSeconds } from "@/lib/format";

interface TimelineProps {
  missions: Mission[];
  conflicts: ConflictEvent[];
}

interface TooltipState {
  visible: boolean;
  x: number;
  y: number;
  conflict: ConflictEvent | null;
}

const TIMELINE_COLORS = {
  primary: { bg: "#2563eb", text: "#ffffff" },
  other: { bg: "#4b5563", text: "#e5e7eb" },
  conflict: { bg: "var(--red)", text: "#ffffff" },
};

const ROW_HEIGHT = 24;

/** Grid spacing that gives roughly 5–10 markers over the range */
function gridStep(range: number): number {
  const candidates = [1, 2, 5, 10, 15, 30, 60, 120, 300, 600, 1800, 3600];
  return candidates.find((c) => range / c <= 10) ?? 3600;
}

function missionWindow(mission: Mission): [number, number] {
  const { waypoints } = mission;
  return [waypoints[0].t, waypoints[waypoints.length - 1].t];
}

export function Timeline({ missions, conflicts }: TimelineProps) {
  const [tooltip, setTooltip] = useState<TooltipState>({
    visible: false,
    x: 0,
    y: 0,
    conflict: null,
  });

  const windows = missions.map(missionWindow);
  const minTime = Math.min(...windows.map(([start]) => start));
  const maxTime = Math.max(...windows.map(([, end]) => end));
  const range = maxTime - minTime || 1;
  const toPercent = (t: number) => ((t - minTime) / range) * 100;

  const containerHeight = Math.max(80, 16 + missions.length * ROW_HEIGHT + 18);

  const step = gridStep(range);
  const markers: number[] = [];
  for (let t = Math.ceil(minTime / step) * step; t <= maxTime; t += step) {
    markers.push(t);
  }

  const handleMouseEnter = (
    e: React.MouseEvent<HTMLDivElement>,
    conflict: ConflictEvent
  ) => {
    const rect = e.currentTarget.getBoundingClientRect();
    setTooltip({
      visible: true,
      x: rect.left + rect.width / 2,
      y: rect.top - 8,
      conflict,
    });
  };

  const handleMouseLeave = () => {
    setTooltip({ visible: false, x: 0, y: 0, conflict: null });
  };

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
        TIMELINE
      </h2>
      <div
        style={{
          background: "var(--surface)",
          border: "1px solid var(--border)",
          borderRadius: 6,
          padding: 16,
          position: "relative",
          height: containerHeight,
        }}
      >
        {markers.map((t) => (
          <div
            key={`grid-${t}`}
            style={{
              position: "absolute",
              left: `${toPercent(t)}%`,
              top: 0,
              bottom: 0,
              width: 1,
              background: "var(--border)",
              opacity: 0.5,
              pointerEvents: "none",
            }}
          />
        ))}

        {missions.map((mission, i) => {
          const [start, end] = windows[i];
          const colors = i === 0 ? TIMELINE_COLORS.primary : TIMELINE_COLORS.other;
          // The primary row shows every conflict, other rows only their own
          const rowConflicts = i === 0
            ? conflicts
            : conflicts.filter((c) => c.droneB === mission.droneId);

          return (
            <div key={`${i}-${mission.droneId}`}>
              <div
                style={{
                  position: "absolute",
                  left: `${toPercent(start)}%`,
                  width: `${Math.max(toPercent(end) - toPercent(start), 2)}%`,
                  top: 16 + i * ROW_HEIGHT,
                  height: 18,
                  background: colors.bg,
                  borderRadius: 3,
                  display: "flex",
                  alignItems: "center",
                  justifyContent: "center",
                  fontSize: 10,
                  fontFamily: "var(--font-mono)",
                  color: colors.text,
                  fontWeight: 600,
                  overflow: "hidden",
                  whiteSpace: "nowrap",
                }}
              >
                {mission.droneId}
              </div>
              {rowConflicts.map((c) => (
                <div
                  key={`${mission.droneId}-${c.droneB}-${c.tStart}`}
                  onMouseEnter={(e) => handleMouseEnter(e, c)}
                  onMouseLeave={handleMouseLeave}
                  style={{
                    position: "absolute",
                    left: `${toPercent(c.tStart)}%`,
                    width: `${Math.max(toPercent(c.tEnd) - toPercent(c.tStart), 0.5)}%`,
                    top: 16 + i * ROW_HEIGHT,
                    height: 18,
                    background: TIMELINE_COLORS.conflict.bg,
                    opacity: 0.85,
                    borderRadius: 3,
                    cursor: "pointer",
                  }}
                />
              ))}
            </div>
          );
        })}

        {tooltip.visible && tooltip.conflict && (
          <div
            style={{
              position: "fixed",
              left: tooltip.x,
              top: tooltip.y,
              transform: "translate(-50%, -100%)",
              background: "var(--surface)",
              border: "1px solid var(--border)",
              borderRadius: 6,
              padding: "8px 12px",
              zIndex: 1000,
              boxShadow: "0 4px 12px rgba(0,0,0,0.4)",
              pointerEvents: "none",
              minWidth: 180,
            }}
          >
            <div
              style={{
                fontFamily: "var(--font-mono)",
                fontSize: 12,
                color: "var(--text-primary)",
                fontWeight: 600,
                marginBottom: 6,
              }}
            >
              {tooltip.conflict.droneA} × {tooltip.conflict.droneB}
            </div>
            <div
              style={{
                fontFamily: "var(--font-mono)",
                fontSize: 10,
                color: "var(--text-muted)",
                lineHeight: 1.6,
              }}
            >
              <div>From: {formatSeconds(tooltip.conflict.tStart)}</div>
              <div>To: {formatSeconds(tooltip.conflict.tEnd)}</div>
              <div>Min sep: {tooltip.conflict.minSeparation.toFixed(2)} m</div>
              <div>At: {formatPoint(tooltip.conflict.location)}</div>
            </div>
          </div>
        )}
      </div>
      <div
        style={{
          position: "relative",
          marginTop: 8,
          height: 16,
          fontSize: 10,
          fontFamily: "var(--font-mono)",
          color: "var(--text-muted)",
        }}
      >
        {markers.map((t) => (
          <span
            key={`label-${t}`}
            style={{
              position: "absolute",
              left: `${toPercent(t)}%`,
              transform: "translateX(-50%)",
            }}
          >
            {formatSeconds(t)}
          </span>
        ))}
      </div>
      <div
        style={{
          display: "flex",
          gap: 16,
          marginTop: 12,
          fontSize: 10,
          fontFamily: "var(--font-mono)",
          color: "var(--text-muted)",
        }}
      >
        <div style={{ display: "flex", alignItems: "center", gap: 6 }}>
          <div style={{ width: 12, height: 12, background: TIMELINE_COLORS.primary.bg, borderRadius: 2 }} />
          <span>Primary</span>
        </div>
        <div style={{ display: "flex", alignItems: "center", gap: 6 }}>
          <div style={{ width: 12, height: 12, background: TIMELINE_COLORS.other.bg, borderRadius: 2 }} />
          <span>Other traffic</span>
        </div>
        <div style={{ display: "flex", alignItems: "center", gap: 6 }}>
          <div style={{ width: 12, height: 12, background: TIMELINE_COLORS.conflict.bg, borderRadius: 2 }} />
          <span>Conflict</span>
        </div>
      </div>
    </div>
  );
}
