"use client";

import type { ScenarioSummary } from "@/lib/types";

interface ScenarioPickerProps {
  scenarios: ScenarioSummary[];
  selectedId: string;
  onChange: (id: string) => void;
}

export function ScenarioPicker({ scenarios, selectedId, onChange }: ScenarioPickerProps) {
  return (
    <select
      value={selectedId}
      onChange={(e) => onChange(e.target.value)}
      disabled={scenarios.length === 0}
      style={{
        background: "var(--surface)",
        border: "1px solid var(--border)",
        borderRadius: 4,
        padding: "8px 12px",
        fontFamily: "var(--font-mono)",
        fontSize: 13,
        color: "var(--text-primary)",
        cursor: "pointer",
        maxWidth: 320,
      }}
    >
      {scenarios.length === 0 && <option value="">Loading scenarios...</option>}
      {scenarios.map((s) => (
        <option key={s.id} value={s.id} title={s.description}>
          {s.id} ({s.expectedSafe ? "expect clear" : "expect conflict"})
        </option>
      ))}
    </select>
  );
}
