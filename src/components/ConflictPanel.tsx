"use client";

import type { ConflictEvent, Severity } from "@/lib/types";
import { describeConflict } from "@/lib/format";

interface ConflictPanelProps {
  conflicts: ConflictEvent[];
}

const SEVERITY_COLORS: Record<Severity, string> = {
  critical: "var(--red)",
  high: "var(--orange)",
  medium: "var(--yellow)",
};

export function ConflictPanel({ conflicts }: ConflictPanelProps) {
  return (
    <div
      style={{
        background: "var(--red-bg)",
        border: "1px solid var(--red-dim)",
        borderRadius: 6,
        padding: 16,
        marginBottom: 32,
      }}
    >
      <h2
        style={{
          fontFamily: "var(--font-display)",
          fontSize: 14,
          color: "var(--red)",
          marginBottom: 12,
          letterSpacing: "0.05em",
        }}
      >
        CONFLICTS ({conflicts.length})
      </h2>
      <ul style={{ margin: 0, padding: 0, listStyle: "none" }}>
        {conflicts.map((conflict, i) => (
          <li
            key={`${conflict.droneB}-${conflict.tStart}`}
            style={{
              padding: "8px 0",
              borderBottom:
                i < conflicts.length - 1 ? "1px solid var(--red-dim)" : "none",
              fontSize: 12,
              fontFamily: "var(--font-mono)",
              color: "var(--text-secondary)",
            }}
          >
            <span
              style={{
                display: "inline-block",
                background: "var(--red-dim)",
                color: SEVERITY_COLORS[conflict.severity],
                padding: "2px 6px",
                borderRadius: 3,
                fontSize: 10,
                fontWeight: 600,
                marginRight: 8,
                textTransform: "uppercase",
              }}
            >
              {conflict.severity}
            </span>
            {describeConflict(conflict)}
          </li>
        ))}
      </ul>
    </div>
  );
}
