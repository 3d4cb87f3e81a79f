import { type Activity, compareIds } from "./activity";
import { EmptyCandidateSet, InvalidBallot, type ValidationIssue } from "./errors";
import type { ScoredCandidate } from "./recommender";
import type { Ballot } from "./voting/types";

export type RankingEntry = string | readonly string[];

/**
 * Turns a voter's ranked recommendations into a ballot over the group's candidate set.
 * Equal composite scores share a tier; candidates the voter never scored share the last tier.
 */
export function buildBallot(
  ranked: readonly ScoredCandidate[],
  universe: readonly Activity[],
  voterId: string
): Ballot {
  assertVoterId(voterId);
  const candidateIds = sortedUnique(universe.map((activity) => activity.id));
  if (candidateIds.length === 0) {
    throw new EmptyCandidateSet("A ballot needs at least one candidate activity.");
  }

  const inUniverse = new Set(candidateIds);
  const seen = new Set<string>();
  const tiers: string[][] = [];
  let tierScore: number | null = null;

  for (const candidate of ranked) {
    const id = candidate.activity.id;
    if (seen.has(id)) {
      throw new InvalidBallot([{ field: "ranked", message: `Activity "${id}" is ranked more than once.` }]);
    }
    seen.add(id);
    if (!inUniverse.has(id)) continue;

    const current = tiers[tiers.length - 1];
    if (current && candidate.compositeScore === tierScore) {
      current.push(id);
    } else {
      tiers.push([id]);
      tierScore = candidate.compositeScore;
    }
  }

  return { voterId, candidateIds, tiers: withUnrankedTier(tiers, candidateIds, seen) };
}

/**
 * Builds a ballot from an explicit ranking, where each entry is one id or a group of tied ids.
 */
export function ballotFromRanking(
  voterId: string,
  ranking: readonly RankingEntry[],
  universeIds: readonly string[]
): Ballot {
  assertVoterId(voterId);
  const candidateIds = sortedUnique(universeIds);
  if (candidateIds.length === 0) {
    throw new EmptyCandidateSet("A ballot needs at least one candidate activity.");
  }

  const inUniverse = new Set(candidateIds);
  const seen = new Set<string>();
  const issues: ValidationIssue[] = [];
  const tiers: string[][] = [];

  ranking.forEach((entry, index) => {
    const group = typeof entry === "string" ? [entry] : [...entry];
    const tier: string[] = [];
    for (const id of group) {
      if (!inUniverse.has(id)) {
        issues.push({ field: `ranking.${index}`, message: `Unknown candidate "${id}".` });
      } else if (seen.has(id)) {
        issues.push({ field: `ranking.${index}`, message: `Candidate "${id}" is ranked more than once.` });
      } else {
        seen.add(id);
        tier.push(id);
      }
    }
    if (tier.length > 0) tiers.push(tier);
  });

  if (issues.length > 0) {
    throw new InvalidBallot(issues);
  }

  return { voterId, candidateIds, tiers: withUnrankedTier(tiers, candidateIds, seen) };
}

function withUnrankedTier(tiers: string[][], candidateIds: string[], ranked: Set<string>): string[][] {
  const sortedTiers = tiers.map((tier) => [...tier].sort(compareIds));
  const unranked = candidateIds.filter((id) => !ranked.has(id));
  return unranked.length > 0 ? [...sortedTiers, unranked] : sortedTiers;
}

function sortedUnique(ids: readonly string[]): string[] {
  return [...new Set(ids)].sort(compareIds);
}

function assertVoterId(voterId: string): void {
  if (voterId.trim().length === 0) {
    throw new InvalidBallot([{ field: "voterId", message: "Voter id is required." }]);
  }
}
