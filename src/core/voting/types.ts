export type Ballot = {
  voterId: string;
  /** The candidate universe, sorted by id. */
  candidateIds: string[];
  /** Tie groups from most to least preferred; together they partition candidateIds. */
  tiers: string[][];
};

export type PairwiseTally = {
  candidateIds: string[];
  ballotCount: number;
  /** preferences[a][b] = ballots ranking a strictly above b. */
  preferences: Record<string, Record<string, number>>;
};

export type PairwiseComparison = {
  candidateA: string;
  candidateB: string;
  votesForA: number;
  votesForB: number;
  tied: number;
  margin: number;
  winner: string | null;
};

export type CandidateStanding = {
  candidateId: string;
  wins: number;
  losses: number;
  ties: number;
  copelandScore: number;
  /** Sum of losing margins over every head-to-head loss. */
  marginLost: number;
};

export type RankingCriterion = "wins" | "copeland";

export type VotingResult = {
  winner: string;
  condorcetWinner: string | null;
  /** True when no candidate beat all others and the Copeland fallback decided. */
  cycleBroken: boolean;
  criterion: RankingCriterion;
  ranking: string[];
  standings: CandidateStanding[];
  smithSet: string[];
  tally: PairwiseTally;
  ballotCount: number;
};
