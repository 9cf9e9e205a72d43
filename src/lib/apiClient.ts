"use client";

import type { CheckMissionResponse, ScenarioSummary } from "@/lib/types";
import type { Scenario } from "@/lib/scenarios";

async function readError(response: Response, what: string): Promise<Error> {
  const errorData: unknown = await response.json().catch(() => ({}));
  let detail = `${response.status} ${response.statusText}`;
  if (typeof errorData === "object" && errorData !== null && "error" in errorData) {
    const { error } = errorData;
    if (typeof error === "string") detail = error;
    else if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
      detail = error.message;
    }
  }
  return new Error(`${what}: ${detail}`);
}

export async function fetchScenarioList(): Promise<ScenarioSummary[]> {
  const response = await fetch("/api/scenarios");
  if (!response.ok) throw await readError(response, "Failed to load scenarios");
  const data: { scenarios: ScenarioSummary[] } = await response.json();
  return data.scenarios;
}

export async function fetchScenario(id: string): Promise<Scenario> {
  const response = await fetch(`/api/scenarios/${encodeURIComponent(id)}`);
  if (!response.ok) throw await readError(response, `Failed to load scenario ${id}`);
  return response.json();
}

/** POSTs a mission request body (as in a scenario or an uploaded file) to the checker */
export async function requestMissionCheck(body: unknown): Promise<CheckMissionResponse> {
  const response = await fetch("/api/check-mission", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  if (!response.ok) throw await readError(response, "Mission check failed");
  return response.json();
}

export async function readMissionFile(file: File): Promise<unknown> {
  const text = await file.text();
  return JSON.parse(text);
}
