export { appConfig, DEFAULT_SCORING_WEIGHTS, loadAppConfig } from "./config/appConfig";
export type { AppConfig, Environment, LogLevel, ScoringWeights } from "./config/appConfig";

export { ActivitySchema, compareIds, OBSERVATION_LIMITS, WeatherObservationSchema } from "./core/activity";
export type { Activity, EnvironmentTolerance, WeatherObservation } from "./core/activity";
export { HistoryEntrySchema, UserProfileSchema } from "./core/profile";
export type { HistoryEntry, UserProfile } from "./core/profile";

export {
  CandidateSetMismatch,
  EmptyBallotSet,
  EmptyCandidateSet,
  EngineError,
  InvalidActivity,
  InvalidBallot,
  InvalidObservation,
  InvalidProfile,
  InvalidWeights,
  isEngineError
} from "./core/errors";
export type { EngineErrorCode, ValidationIssue } from "./core/errors";

export { scoreWeather, weatherBreakdown } from "./core/weather";
export type { WeatherBreakdown } from "./core/weather";
export { preferenceBreakdown, scorePreference } from "./core/preference";
export type { PreferenceBreakdown, PreferenceOptions } from "./core/preference";
export { compositeScore, recommend } from "./core/recommender";
export type { RecommendOptions, ScoredCandidate } from "./core/recommender";
export { explainCandidate } from "./core/explain";
export { ballotFromRanking, buildBallot } from "./core/ballot";
export type { RankingEntry } from "./core/ballot";
export {
  computeSmithSet,
  marginOf,
  pairwiseComparison,
  resolveVote,
  tallyBallots
} from "./core/voting";
export type {
  Ballot,
  CandidateStanding,
  PairwiseComparison,
  PairwiseTally,
  RankingCriterion,
  VotingResult
} from "./core/voting";
export { resolveGroupActivity } from "./core/group";
export type { GroupRoundInput, GroupRoundResult } from "./core/group";
export { findActivity, loadActivityCatalog } from "./core/catalog";
