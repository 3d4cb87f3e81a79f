import type { ZodError } from "zod";

export type ValidationIssue = {
  field: string;
  message: string;
};

export type EngineErrorCode =
  | "invalid_observation"
  | "invalid_profile"
  | "invalid_activity"
  | "invalid_weights"
  | "invalid_ballot"
  | "empty_candidate_set"
  | "empty_ballot_set"
  | "candidate_set_mismatch";

/**
 * Base class for every failure the engine raises. All of them are caller errors scoped to
 * one request: retrying with the same input yields the same error.
 */
export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly issues: ValidationIssue[];

  constructor(code: EngineErrorCode, message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.issues = issues;
  }
}

export class InvalidObservation extends EngineError {
  constructor(issues: ValidationIssue[]) {
    super("invalid_observation", describe("Invalid weather observation", issues), issues);
  }
}

export class InvalidProfile extends EngineError {
  constructor(issues: ValidationIssue[]) {
    super("invalid_profile", describe("Invalid user profile", issues), issues);
  }
}

export class InvalidActivity extends EngineError {
  constructor(issues: ValidationIssue[]) {
    super("invalid_activity", describe("Invalid activity", issues), issues);
  }
}

export class InvalidWeights extends EngineError {
  constructor(issues: ValidationIssue[]) {
    super("invalid_weights", describe("Invalid scoring weights", issues), issues);
  }
}

export class InvalidBallot extends EngineError {
  constructor(issues: ValidationIssue[]) {
    super("invalid_ballot", describe("Invalid ballot", issues), issues);
  }
}

export class EmptyCandidateSet extends EngineError {
  constructor(message = "At least one candidate activity is required.") {
    super("empty_candidate_set", message);
  }
}

export class EmptyBallotSet extends EngineError {
  constructor(message = "At least one ballot is required to resolve a vote.") {
    super("empty_ballot_set", message);
  }
}

export class CandidateSetMismatch extends EngineError {
  constructor(issues: ValidationIssue[]) {
    super("candidate_set_mismatch", describe("Ballots do not share one candidate set", issues), issues);
  }
}

export function isEngineError(value: unknown): value is EngineError {
  return value instanceof EngineError;
}

export function issuesFromZod(error: ZodError, prefix?: string): ValidationIssue[] {
  return error.issues.map((issue) => {
    const path = issue.path.map((segment) => String(segment)).join(".");
    const field = [prefix, path].filter(Boolean).join(".");
    return { field: field || "(root)", message: issue.message };
  });
}

function describe(title: string, issues: ValidationIssue[]): string {
  if (issues.length === 0) return `${title}.`;
  return `${title}: ${issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ")}`;
}
