import { nanoid } from "nanoid";
import type { ScoringWeights } from "../config/appConfig";
import { createLogger } from "../shared/logger";
import type { Activity, WeatherObservation } from "./activity";
import { buildBallot } from "./ballot";
import { EmptyBallotSet, EmptyCandidateSet, InvalidActivity, InvalidProfile, type ValidationIssue } from "./errors";
import type { UserProfile } from "./profile";
import { recommend, type ScoredCandidate } from "./recommender";
import { parseActivitySet } from "./validators";
import { resolveVote, type Ballot, type VotingResult } from "./voting";

export type GroupRoundInput = {
  observation: WeatherObservation;
  activities: readonly Activity[];
  members: readonly UserProfile[];
  /** Activities the group agreed to vote on. Defaults to every activity passed in. */
  candidateIds?: readonly string[];
  weights?: ScoringWeights;
  roundId?: string;
};

export type GroupRoundResult = {
  roundId: string;
  candidateIds: string[];
  rankings: Record<string, ScoredCandidate[]>;
  ballots: Ballot[];
  result: VotingResult;
};

const log = createLogger("group-round");

export function resolveGroupActivity(input: GroupRoundInput): GroupRoundResult {
  const catalog = parseActivitySet(input.activities);
  const universe = selectUniverse(catalog, input.candidateIds);
  assertMembers(input.members);

  const roundId = input.roundId ?? nanoid();
  const ranked = input.members.map(
    (member) => [member.userId, recommend(input.observation, catalog, member, { weights: input.weights })] as const
  );
  const rankings: Record<string, ScoredCandidate[]> = Object.fromEntries(ranked);
  const ballots = ranked.map(([userId, candidates]) => buildBallot(candidates, universe, userId));

  const result = resolveVote(ballots);
  log.debug("Group round resolved", {
    roundId,
    members: ballots.length,
    candidates: universe.length,
    winner: result.winner,
    cycleBroken: result.cycleBroken
  });

  return {
    roundId,
    candidateIds: result.tally.candidateIds,
    rankings,
    ballots,
    result
  };
}

function selectUniverse(catalog: Activity[], candidateIds: readonly string[] | undefined): Activity[] {
  if (candidateIds === undefined) return catalog;
  if (candidateIds.length === 0) {
    throw new EmptyCandidateSet("The group has not agreed on any candidate activities.");
  }

  const known = new Set(catalog.map((activity) => activity.id));
  const unknown = candidateIds.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new InvalidActivity(
      unknown.map((id) => ({ field: "candidateIds", message: `Unknown candidate activity "${id}".` }))
    );
  }

  const wanted = new Set(candidateIds);
  return catalog.filter((activity) => wanted.has(activity.id));
}

function assertMembers(members: readonly UserProfile[]): void {
  if (members.length === 0) {
    throw new EmptyBallotSet("A group round needs at least one member.");
  }
  const seen = new Set<string>();
  const issues: ValidationIssue[] = [];
  members.forEach((member, index) => {
    if (seen.has(member.userId)) {
      issues.push({ field: `members.${index}.userId`, message: `Duplicate member "${member.userId}".` });
    }
    seen.add(member.userId);
  });
  if (issues.length > 0) {
    throw new InvalidProfile(issues);
  }
}
