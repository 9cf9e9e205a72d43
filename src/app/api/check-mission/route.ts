import { NextRequest, NextResponse } from "next/server";
import { ZodError } from "zod";
import { parseMissionRequest } from "@/lib/parser";
import { checkMission } from "@/lib/deconflict";
import { DeconflictionError } from "@/lib/errors";
import { sampleCount } from "@/lib/interpolate";
import {
  MAX_SAMPLES_PER_REQUEST,
  configFromEnv,
  resolveConfig,
} from "@/config/deconflictionConfig";
import type { CheckMissionResponse, Mission } from "@/lib/types";

/** Error message when the step is too fine for the missions, else null */
function checkWorkload(missions: Mission[], step: number): string | null {
  // Out-of-range steps are left to the engine
  if (!Number.isFinite(step) || step <= 0) return null;
  const total = missions.reduce((sum, m) => sum + sampleCount(m, step), 0);
  if (total <= MAX_SAMPLES_PER_REQUEST) return null;
  return `step ${step} would produce ${total} samples, over the limit of ${MAX_SAMPLES_PER_REQUEST}; use a larger step`;
}

export async function POST(request: NextRequest) {
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return NextResponse.json({ error: "Request body must be valid JSON" }, { status: 400 });
  }

  try {
    const { primary, others, config } = parseMissionRequest(body);
    // Request values win over deployment overrides, which win over defaults
    const overrides = { ...configFromEnv(), ...config };

    const tooMuch = checkWorkload([primary, ...others], resolveConfig(overrides).step);
    if (tooMuch) {
      return NextResponse.json({ error: tooMuch }, { status: 400 });
    }

    const report = checkMission(primary, others, overrides);

    const response: CheckMissionResponse = { report, missions: [primary, ...others] };
    return NextResponse.json(response);
  } catch (error) {
    if (error instanceof ZodError) {
      return NextResponse.json(
        { error: "Invalid mission request", issues: error.issues },
        { status: 400 }
      );
    }
    if (error instanceof DeconflictionError) {
      return NextResponse.json({ error: error.toJSON() }, { status: 422 });
    }
    console.error("[check-mission] unexpected failure", error);
    return NextResponse.json(
      { error: `Check failed: ${error instanceof Error ? error.message : "Unknown error"}` },
      { status: 500 }
    );
  }
}
