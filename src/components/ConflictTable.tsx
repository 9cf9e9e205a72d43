"use client";

import type { ConflictEvent } from "@/lib/types";
import { formatPoint, formatSeconds } from "@/lib/format";

interface ConflictTableProps {
  conflicts: ConflictEvent[];
}

export function ConflictTable({ conflicts }: ConflictTableProps) {
  return (
    <div style={{ marginBottom: 32, overflowX: "auto" }}>
      <h2
        style={{
          fontFamily: "var(--font-display)",
          fontSize: 14,
          color: "var(--text-muted)",
          marginBottom: 12,
          letterSpacing: "0.05em",
        }}
      >
        CONFLICT EVENTS
      </h2>
      <table
        style={{
          width: "100%",
          borderCollapse: "collapse",
          fontFamily: "var(--font-mono)",
          fontSize: 12,
        }}
      >
        <thead>
          <tr
            style={{
              background: "var(--surface)",
              borderBottom: "1px solid var(--border)",
            }}
          >
            <th style={thStyle}>PRIMARY</th>
            <th style={thStyle}>OTHER</th>
            <th style={thStyle}>START</th>
            <th style={thStyle}>END</th>
            <th style={thStyle}>WORST AT</th>
            <th style={thStyle}>MIN SEP (m)</th>
            <th style={thStyle}>PRIMARY POS</th>
            <th style={thStyle}>OTHER POS</th>
            <th style={thStyle}>SEVERITY</th>
          </tr>
        </thead>
        <tbody>
          {conflicts.map((c) => (
            <tr
              key={`${c.droneB}-${c.tStart}`}
              style={{
                borderBottom: "1px solid var(--border)",
                background: c.severity === "critical" ? "var(--red-bg)" : "transparent",
              }}
            >
              <td style={tdStyle}>{c.droneA}</td>
              <td style={tdStyle}>{c.droneB}</td>
              <td style={tdStyle}>{formatSeconds(c.tStart)}</td>
              <td style={tdStyle}>{formatSeconds(c.tEnd)}</td>
              <td style={tdStyle}>{formatSeconds(c.worstTime)}</td>
              <td style={tdStyle}>{c.minSeparation.toFixed(2)}</td>
              <td style={tdStyle}>{formatPoint(c.location)}</td>
              <td style={tdStyle}>{formatPoint(c.otherLocation)}</td>
              <td style={tdStyle}>{c.severity.toUpperCase()}</td>
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  );
}

const thStyle: React.CSSProperties = {
  padding: "10px 8px",
  textAlign: "left",
  color: "var(--text-muted)",
  fontWeight: 600,
  letterSpacing: "0.05em",
};

const tdStyle: React.CSSProperties = {
  padding: "10px 8px",
  color: "var(--text-primary)",
};
