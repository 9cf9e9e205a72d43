export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export interface Waypoint extends Vec3 {
  /** Seconds since mission epoch */
  t: number;
}

export interface Mission {
  droneId: string;
  waypoints: readonly Waypoint[];
}

export interface Sample extends Vec3 {
  t: number;
  droneId: string;
}

export interface AlignedPair {
  a: Sample;
  b: Sample;
}

export interface Verdict {
  conflict: boolean;
  separation: number;
}

export type Severity = "critical" | "high" | "medium";

export interface ConflictEvent {
  droneA: string;
  droneB: string;
  tStart: number;
  tEnd: number;
  /** Primary drone position at the closest approach */
  location: Vec3;
  otherLocation: Vec3;
  worstTime: number;
  minSeparation: number;
  severity: Severity;
}

export interface Report {
  safe: boolean;
  conflicts: ConflictEvent[];
}

export interface DeconflictionConfig {
  step: number;
  timeTolerance: number;
  safetyDistance: number;
}

export interface ScenarioSummary {
  id: string;
  description: string;
  expectedSafe: boolean;
}

export interface CheckMissionResponse {
  report: Report;
  missions: Mission[];
}
