export { computeSmithSet, computeStandings, resolveVote } from "./resolver";
export { marginOf, pairwiseComparison, tallyBallots } from "./tally";

export type {
  Ballot,
  CandidateStanding,
  PairwiseComparison,
  PairwiseTally,
  RankingCriterion,
  VotingResult
} from "./types";
