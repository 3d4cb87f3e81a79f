import { createLogger } from "../../shared/logger";
import { compareIds } from "../activity";
import { marginOf, tallyBallots } from "./tally";
import type { Ballot, CandidateStanding, PairwiseTally, RankingCriterion, VotingResult } from "./types";

const log = createLogger("voting");

/**
 * Resolves a group choice from ballots: the Condorcet winner when one exists, otherwise the
 * best Copeland score, then the smallest total losing margin, then the smallest id.
 */
export function resolveVote(ballots: readonly Ballot[]): VotingResult {
  const tally = tallyBallots(ballots);
  const standings = computeStandings(tally);
  const opponents = tally.candidateIds.length - 1;

  const condorcet = standings.find((standing) => standing.wins === opponents) ?? null;
  const criterion: RankingCriterion = condorcet ? "wins" : "copeland";
  const ordered = [...standings].sort(standingComparator(criterion));
  const ranking = ordered.map((standing) => standing.candidateId);
  const winner = ranking[0];
  const smithSet = computeSmithSet(tally, ranking);

  if (condorcet) {
    log.info("Condorcet winner found", { winner, ballots: tally.ballotCount });
  } else {
    log.info("No Condorcet winner; resolved by Copeland score", {
      winner,
      ballots: tally.ballotCount,
      smithSet
    });
  }

  return {
    winner,
    condorcetWinner: condorcet ? condorcet.candidateId : null,
    cycleBroken: condorcet === null,
    criterion,
    ranking,
    standings: ordered,
    smithSet,
    tally,
    ballotCount: tally.ballotCount
  };
}

export function computeStandings(tally: PairwiseTally): CandidateStanding[] {
  return tally.candidateIds.map((candidateId) => {
    let wins = 0;
    let losses = 0;
    let ties = 0;
    let marginLost = 0;
    for (const opponent of tally.candidateIds) {
      if (opponent === candidateId) continue;
      const margin = marginOf(tally, candidateId, opponent);
      if (margin > 0) {
        wins += 1;
      } else if (margin < 0) {
        losses += 1;
        marginLost += -margin;
      } else {
        ties += 1;
      }
    }
    return { candidateId, wins, losses, ties, copelandScore: wins - losses, marginLost };
  });
}

function standingComparator(criterion: RankingCriterion) {
  return (left: CandidateStanding, right: CandidateStanding): number => {
    const primary =
      criterion === "wins"
        ? right.wins - left.wins
        : right.copelandScore - left.copelandScore;
    if (primary !== 0) return primary;
    if (left.marginLost !== right.marginLost) return left.marginLost - right.marginLost;
    return compareIds(left.candidateId, right.candidateId);
  };
}

/**
 * Smallest set of candidates that each beat or tie every candidate outside it: the top cycle
 * of the "beats or ties" relation. Returned in ranking order.
 */
export function computeSmithSet(tally: PairwiseTally, ranking: readonly string[]): string[] {
  const ids = tally.candidateIds;
  const reach = new Map<string, Set<string>>();
  for (const a of ids) {
    reach.set(a, new Set(ids.filter((b) => b !== a && marginOf(tally, a, b) >= 0)));
  }
  const reachable = (id: string): Set<string> => reach.get(id) ?? new Set<string>();

  // Transitive closure; candidate sets are small.
  for (const via of ids) {
    for (const from of ids) {
      const fromReach = reachable(from);
      if (!fromReach.has(via)) continue;
      for (const to of reachable(via)) {
        if (to !== from) fromReach.add(to);
      }
    }
  }

  const members = new Set(ids.filter((a) => reachable(a).size === ids.length - 1));
  return ranking.filter((id) => members.has(id));
}
