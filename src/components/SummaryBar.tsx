"use client";

import type { Mission, Report } from "@/lib/types";

interface SummaryBarProps {
  missions: Mission[];
  report: Report;
}

export function SummaryBar({ missions, report }: SummaryBarProps) {
  const closest = report.conflicts.length > 0
    ? Math.min(...report.conflicts.map((c) => c.minSeparation)).toFixed(2)
    : "-";
  const criticalCount = report.conflicts.filter((c) => c.severity === "critical").length;

  return (
    <div
      style={{
        display: "flex",
        gap: 24,
        marginBottom: 24,
        padding: "16px 20px",
        background: "var(--surface)",
        border: "1px solid var(--border)",
        borderRadius: 6,
        flexWrap: "wrap",
      }}
    >
      <Stat
        label="Status"
        value={report.safe ? "SAFE" : "UNSAFE"}
        color={report.safe ? "var(--green)" : "var(--red)"}
      />
      <Stat label="Drones" value={missions.length} />
      <Stat label="Conflicts" value={report.conflicts.length} color={report.conflicts.length > 0 ? "var(--red)" : undefined} />
      <Stat label="Critical" value={criticalCount} color={criticalCount > 0 ? "var(--red)" : undefined} />
      <Stat label="Closest (m)" value={closest} />
    </div>
  );
}

function Stat({
  label,
  value,
  color,
}: {
  label: string;
  value: number | string;
  color?: string;
}) {
  return (
    <div>
      <div
        style={{
          fontSize: 10,
          fontFamily: "var(--font-mono)",
          color: "var(--text-muted)",
          letterSpacing: "0.05em",
          marginBottom: 4,
        }}
      >
        {label.toUpperCase()}
      </div>
      <div
        style={{
          fontSize: 24,
          fontFamily: "var(--font-display)",
          fontWeight: 700,
          color: color || "var(--text-primary)",
        }}
      >
        {value}
      </div>
    </div>
  );
}
