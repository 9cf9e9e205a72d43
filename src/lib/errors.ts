export type DeconflictionErrorKind =
  | "invalid_mission"
  | "degenerate_segment"
  | "invalid_parameter";

interface ErrorDetails {
  droneId?: string;
  parameter?: string;
  segment?: number;
}

export interface DeconflictionErrorBody extends ErrorDetails {
  kind: DeconflictionErrorKind;
  message: string;
}

/**
 * Raised for bad missions or parameters. A check that hits one of these
 * fails as a whole; no partial report is produced.
 */
export class DeconflictionError extends Error {
  readonly kind: DeconflictionErrorKind;
  readonly droneId?: string;
  readonly parameter?: string;
  readonly segment?: number;

  constructor(kind: DeconflictionErrorKind, message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = "DeconflictionError";
    this.kind = kind;
    this.droneId = details.droneId;
    this.parameter = details.parameter;
    this.segment = details.segment;
  }

  toJSON(): DeconflictionErrorBody {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.droneId !== undefined && { droneId: this.droneId }),
      ...(this.parameter !== undefined && { parameter: this.parameter }),
      ...(this.segment !== undefined && { segment: this.segment }),
    };
  }
}

export function invalidMission(droneId: string, message: string): DeconflictionError {
  return new DeconflictionError("invalid_mission", `Invalid mission ${droneId}: ${message}`, { droneId });
}

export function invalidParameter(parameter: string, value: number): DeconflictionError {
  return new DeconflictionError(
    "invalid_parameter",
    `${parameter} must be a positive finite number, got ${value}`,
    { parameter }
  );
}

/** Throws unless value is finite and > 0 */
export function assertPositive(parameter: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw invalidParameter(parameter, value);
  }
}
