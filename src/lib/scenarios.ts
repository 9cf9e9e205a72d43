import { z } from "zod";
import scenarioData from "@/config/scenarios.json";
import type { ScenarioSummary } from "@/lib/types";
import { MissionRequestSchema, type MissionRequest } from "@/lib/parser";

const ScenarioSchema = z.object({
  id: z.string().min(1),
  description: z.string(),
  expectedSafe: z.boolean(),
  request: z.custom<MissionRequest>(
    (value) => MissionRequestSchema.safeParse(value).success,
    "request is not a valid mission request"
  ),
});

export type Scenario = z.infer<typeof ScenarioSchema>;

let catalog: Scenario[] | null = null;

/** Canned scenarios, validated once on first access */
function loadCatalog(): Scenario[] {
  if (!catalog) {
    catalog = z.array(ScenarioSchema).parse(scenarioData);
  }
  return catalog;
}

export function listScenarios(): ScenarioSummary[] {
  return loadCatalog().map(({ id, description, expectedSafe }) => ({ id, description, expectedSafe }));
}

export function getScenario(id: string): Scenario | null {
  return loadCatalog().find((s) => s.id === id) ?? null;
}
