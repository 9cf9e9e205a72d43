import type { AlignedPair, ConflictEvent, Verdict } from "@/lib/types";
import { DEFAULT_CONFIG, severityFor } from "@/config/deconflictionConfig";
import { assertPositive } from "@/lib/errors";

export interface JudgedPair {
  pair: AlignedPair;
  verdict: Verdict;
}

type OpenEvent = Omit<ConflictEvent, "severity">;

type AggregatorState =
  | { kind: "clear" }
  | { kind: "in_conflict"; event: OpenEvent };

/** All verdicts for one primary timestamp, reduced to the worst conflicting one */
interface Instant {
  t: number;
  worst: JudgedPair | null;
}

function openEvent({ pair, verdict }: JudgedPair): OpenEvent {
  return {
    droneA: pair.a.droneId,
    droneB: pair.b.droneId,
    tStart: pair.a.t,
    tEnd: pair.a.t,
    location: { x: pair.a.x, y: pair.a.y, z: pair.a.z },
    otherLocation: { x: pair.b.x, y: pair.b.y, z: pair.b.z },
    worstTime: pair.a.t,
    minSeparation: verdict.separation,
  };
}

/**
 * Folds the verdict stream of ONE drone pair into conflict intervals.
 *
 * Verdicts must arrive ordered by the primary sample's timestamp. The aligner
 * pairs several samples of the other drone with each primary sample, so
 * verdicts sharing a timestamp are reduced to one instant first: the instant
 * is in conflict if any of them is. Each run of conflicting instants becomes
 * one event, located at its closest approach.
 */
export class ConflictAggregator {
  private state: AggregatorState = { kind: "clear" };
  private instant: Instant | null = null;
  private readonly events: ConflictEvent[] = [];
  private readonly safetyDistance: number;

  constructor(safetyDistance: number = DEFAULT_CONFIG.safetyDistance) {
    assertPositive("safetyDistance", safetyDistance);
    this.safetyDistance = safetyDistance;
  }

  push(judged: JudgedPair): void {
    const t = judged.pair.a.t;
    if (this.instant && this.instant.t !== t) {
      this.advance(this.instant);
      this.instant = null;
    }
    if (!this.instant) {
      this.instant = { t, worst: null };
    }

    const { worst } = this.instant;
    if (judged.verdict.conflict && (!worst || judged.verdict.separation < worst.verdict.separation)) {
      this.instant.worst = judged;
    }
  }

  /** Flushes the last instant, closes any open event and returns every event in order */
  finish(): ConflictEvent[] {
    if (this.instant) {
      this.advance(this.instant);
      this.instant = null;
    }
    if (this.state.kind === "in_conflict") {
      this.close(this.state.event);
    }
    return [...this.events];
  }

  private advance({ t, worst }: Instant): void {
    switch (this.state.kind) {
      case "clear":
        if (worst) {
          this.state = { kind: "in_conflict", event: openEvent(worst) };
        }
        break;
      case "in_conflict": {
        const { event } = this.state;
        if (!worst) {
          this.close(event);
          break;
        }
        event.tEnd = t;
        if (worst.verdict.separation < event.minSeparation) {
          const { a, b } = worst.pair;
          event.minSeparation = worst.verdict.separation;
          event.location = { x: a.x, y: a.y, z: a.z };
          event.otherLocation = { x: b.x, y: b.y, z: b.z };
          event.worstTime = a.t;
        }
        break;
      }
    }
  }

  private close(event: OpenEvent): void {
    this.events.push({ ...event, severity: severityFor(event.minSeparation, this.safetyDistance) });
    this.state = { kind: "clear" };
  }
}

/** Runs a fresh aggregator over a complete verdict stream */
export function aggregate(
  judged: Iterable<JudgedPair>,
  safetyDistance: number = DEFAULT_CONFIG.safetyDistance
): ConflictEvent[] {
  const aggregator = new ConflictAggregator(safetyDistance);
  for (const item of judged) {
    aggregator.push(item);
  }
  return aggregator.finish();
}
