"use client";

import { useState, useCallback, useEffect } from "react";
import {
  fetchScenarioList,
  fetchScenario,
  requestMissionCheck,
  readMissionFile,
} from "@/lib/apiClient";
import type { CheckMissionResponse, ScenarioSummary } from "@/lib/types";
import { ScenarioPicker } from "@/components/ScenarioPicker";
import { UploadZone } from "@/components/UploadZone";
import { SummaryBar } from "@/components/SummaryBar";
import { Timeline } from "@/components/Timeline";
import { TrajectoryMap } from "@/components/TrajectoryMap";
import { ConflictTable } from "@/components/ConflictTable";
import { ConflictPanel } from "@/components/ConflictPanel";

type Status = "idle" | "loading" | "checking" | "ready" | "error";

export default function App() {
  const [scenarios, setScenarios] = useState<ScenarioSummary[]>([]);
  const [selectedId, setSelectedId] = useState<string>("");
  const [status, setStatus] = useState<Status>("idle");
  const [error, setError] = useState<string | null>(null);
  const [result, setResult] = useState<CheckMissionResponse | null>(null);

  useEffect(() => {
    fetchScenarioList()
      .then((list) => {
        setScenarios(list);
        if (list.length > 0) setSelectedId(list[0].id);
      })
      .catch((e: unknown) => {
        setError(`${e instanceof Error ? e.message : "Unknown error"}. You can still upload a mission file.`);
      });
  }, []);

  const runCheck = useCallback(async (body: unknown) => {
    setStatus("checking");
    setError(null);
    try {
      setResult(await requestMissionCheck(body));
      setStatus("ready");
    } catch (e) {
      setError(e instanceof Error ? e.message : "Unknown error");
      setStatus("error");
    }
  }, []);

  const handleRunScenario = useCallback(async () => {
    if (!selectedId) return;
    setStatus("loading");
    setError(null);
    try {
      const scenario = await fetchScenario(selectedId);
      await runCheck(scenario.request);
    } catch (e) {
      setError(`${e instanceof Error ? e.message : "Unknown error"}`);
      setStatus("error");
    }
  }, [selectedId, runCheck]);

  const handleUpload = useCallback(async (file: File) => {
    setStatus("loading");
    setError(null);
    try {
      const body = await readMissionFile(file);
      await runCheck(body);
    } catch (e) {
      setError(`Upload error: ${e instanceof Error ? e.message : "Unknown error"}`);
      setStatus("error");
    }
  }, [runCheck]);

  const reset = useCallback(() => {
    setStatus("idle");
    setError(null);
    setResult(null);
  }, []);

  const busy = status === "loading" || status === "checking";

  return (
    <div style={{ maxWidth: 1400, margin: "0 auto", padding: "24px 20px", minHeight: "100vh" }}>
      {/* HEADER */}
      <header style={{ marginBottom: 32, display: "flex", alignItems: "flex-end", justifyContent: "space-between", flexWrap: "wrap", gap: 16 }}>
        <div>
          <div style={{ display: "flex", alignItems: "center", gap: 12 }}>
            <div style={{
              width: 36, height: 36,
              border: "2px solid var(--accent)",
              borderRadius: 4,
              display: "flex", alignItems: "center", justifyContent: "center",
              fontFamily: "var(--font-display)", fontWeight: 700, fontSize: 14,
              color: "var(--accent)"
            }}>
              UAV
            </div>
            <h1 style={{
              fontFamily: "var(--font-display)",
              fontSize: 28,
              fontWeight: 700,
              color: "var(--text-primary)",
              letterSpacing: "0.02em",
              lineHeight: 1.2
            }}>
              MISSION DECONFLICTOR
            </h1>
          </div>
          <p style={{ color: "var(--text-muted)", fontSize: 12, marginTop: 4, letterSpacing: "0.05em", textTransform: "uppercase" }}>
            Interpolate · Align · Separate
          </p>
        </div>
        <div style={{ display: "flex", gap: 10, alignItems: "center" }}>
          <ScenarioPicker
            scenarios={scenarios}
            selectedId={selectedId}
            onChange={(id) => { setSelectedId(id); reset(); }}
          />
          <button
            onClick={handleRunScenario}
            disabled={busy || !selectedId}
            style={{
              background: "var(--accent)",
              color: "#0a0e14",
              border: "none",
              borderRadius: 4,
              padding: "8px 18px",
              fontFamily: "var(--font-mono)",
              fontSize: 13,
              fontWeight: 600,
              cursor: busy || !selectedId ? "not-allowed" : "pointer",
              opacity: busy || !selectedId ? 0.5 : 1,
              letterSpacing: "0.03em",
              transition: "opacity 0.2s"
            }}
          >
            {status === "loading" ? "LOADING..." : status === "checking" ? "CHECKING..." : "RUN CHECK"}
          </button>
          {status === "ready" && (
            <button onClick={reset} style={{
              background: "transparent",
              color: "var(--text-muted)",
              border: "1px solid var(--border)",
              borderRadius: 4,
              padding: "8px 12px",
              fontFamily: "var(--font-mono)",
              fontSize: 12,
              cursor: "pointer"
            }}>
              RESET
            </button>
          )}
        </div>
      </header>

      {/* ERROR */}
      {error && (
        <div style={{
          background: "var(--red-bg)",
          border: "1px solid var(--red-dim)",
          borderRadius: 6,
          padding: "14px 18px",
          marginBottom: 20,
          display: "flex",
          alignItems: "flex-start",
          gap: 12
        }}>
          <span style={{ color: "var(--red)", fontSize: 18, lineHeight: 1.2 }}>⚠</span>
          <div>
            <p style={{ color: "var(--red)", fontSize: 13, fontWeight: 600 }}>Error</p>
            <p style={{ color: "var(--text-secondary)", fontSize: 12, marginTop: 2 }}>{error}</p>
          </div>
        </div>
      )}

      {status !== "ready" && <UploadZone onUpload={handleUpload} />}

      {/* RESULTS */}
      {status === "ready" && result && (
        <>
          <SummaryBar missions={result.missions} report={result.report} />
          <TrajectoryMap missions={result.missions} conflicts={result.report.conflicts} />
          <Timeline missions={result.missions} conflicts={result.report.conflicts} />
          {result.report.conflicts.length > 0 && (
            <>
              <ConflictTable conflicts={result.report.conflicts} />
              <ConflictPanel conflicts={result.report.conflicts} />
            </>
          )}
        </>
      )}

      {/* FOOTER */}
      <footer style={{ marginTop: 48, paddingTop: 16, borderTop: "1px solid var(--border)", textAlign: "center" }}>
        <p style={{ color: "var(--text-muted)", fontSize: 11, letterSpacing: "0.05em" }}>
          STRATEGIC DECONFLICTION · PRE-FLIGHT CHECK v1.0
        </p>
      </footer>
    </div>
  );
}
