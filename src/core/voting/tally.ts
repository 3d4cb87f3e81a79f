import { compareIds } from "../activity";
import { CandidateSetMismatch, EmptyBallotSet, InvalidBallot, type ValidationIssue } from "../errors";
import type { Ballot, PairwiseComparison, PairwiseTally } from "./types";

export function tallyBallots(ballots: readonly Ballot[]): PairwiseTally {
  const candidateIds = assertSharedUniverse(ballots);
  // fromEntries defines own keys, so ids such as "__proto__" stay plain entries.
  const preferences: Record<string, Record<string, number>> = Object.fromEntries(
    candidateIds.map((a): [string, Record<string, number>] => [
      a,
      Object.fromEntries(candidateIds.filter((b) => b !== a).map((b): [string, number] => [b, 0]))
    ])
  );

  for (const ballot of ballots) {
    ballot.tiers.forEach((tier, index) => {
      for (const lower of ballot.tiers.slice(index + 1)) {
        for (const a of tier) {
          for (const b of lower) {
            preferences[a][b] += 1;
          }
        }
      }
    });
  }

  return { candidateIds, ballotCount: ballots.length, preferences };
}

function votesFor(tally: PairwiseTally, a: string, b: string): number {
  if (a === b) return 0;
  const row = tally.preferences[a];
  if (!row || !Object.hasOwn(row, b)) {
    throw new InvalidBallot([{ field: "candidate", message: `Unknown candidate pair "${a}" / "${b}".` }]);
  }
  return row[b];
}

export function marginOf(tally: PairwiseTally, a: string, b: string): number {
  return votesFor(tally, a, b) - votesFor(tally, b, a);
}

export function pairwiseComparison(tally: PairwiseTally, candidateA: string, candidateB: string): PairwiseComparison {
  const votesForA = votesFor(tally, candidateA, candidateB);
  const votesForB = votesFor(tally, candidateB, candidateA);
  const margin = votesForA - votesForB;
  return {
    candidateA,
    candidateB,
    votesForA,
    votesForB,
    tied: tally.ballotCount - votesForA - votesForB,
    margin,
    winner: margin > 0 ? candidateA : margin < 0 ? candidateB : null
  };
}

function assertSharedUniverse(ballots: readonly Ballot[]): string[] {
  const first = ballots[0];
  if (!first) {
    throw new EmptyBallotSet();
  }

  ballots.forEach((ballot, index) => assertBallotShape(ballot, index));

  const universe = [...first.candidateIds].sort(compareIds);
  const key = universe.join("\u0000");
  const mismatches: ValidationIssue[] = [];
  ballots.forEach((ballot, index) => {
    const ballotKey = [...ballot.candidateIds].sort(compareIds).join("\u0000");
    if (ballotKey !== key) {
      mismatches.push({
        field: `ballots.${index}.candidateIds`,
        message: `Ballot from "${ballot.voterId}" covers [${ballot.candidateIds.join(", ")}], expected [${universe.join(", ")}].`
      });
    }
  });
  if (mismatches.length > 0) {
    throw new CandidateSetMismatch(mismatches);
  }
  return universe;
}

function assertBallotShape(ballot: Ballot, index: number): void {
  const issues: ValidationIssue[] = [];
  const field = `ballots.${index}`;
  const candidates = new Set(ballot.candidateIds);
  if (candidates.size === 0) {
    issues.push({ field: `${field}.candidateIds`, message: "Ballot has no candidates." });
  }
  if (candidates.size !== ballot.candidateIds.length) {
    issues.push({ field: `${field}.candidateIds`, message: "Candidate ids must be unique." });
  }

  const placed = new Set<string>();
  ballot.tiers.forEach((tier, tierIndex) => {
    if (tier.length === 0) {
      issues.push({ field: `${field}.tiers.${tierIndex}`, message: "Tiers must not be empty." });
    }
    for (const id of tier) {
      if (!candidates.has(id)) {
        issues.push({ field: `${field}.tiers.${tierIndex}`, message: `Unknown candidate "${id}".` });
      } else if (placed.has(id)) {
        issues.push({ field: `${field}.tiers.${tierIndex}`, message: `Candidate "${id}" appears twice.` });
      }
      placed.add(id);
    }
  });

  const missing = [...candidates].filter((id) => !placed.has(id));
  if (missing.length > 0) {
    issues.push({ field: `${field}.tiers`, message: `Candidates missing from tiers: ${missing.join(", ")}.` });
  }

  if (issues.length > 0) {
    throw new InvalidBallot(issues);
  }
}
