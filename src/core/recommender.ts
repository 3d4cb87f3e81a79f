import { appConfig, type ScoringWeights } from "../config/appConfig";
import { createLogger } from "../shared/logger";
import { type Activity, compareIds, type WeatherObservation } from "./activity";
import { computePreferenceBreakdown, resolveDecaySettings } from "./preference";
import type { UserProfile } from "./profile";
import { parseActivitySet, parseObservation, parseProfile, parseScoringWeights } from "./validators";
import { computeWeatherBreakdown } from "./weather";

export type ScoredCandidate = {
  activity: Activity;
  weatherScore: number;
  preferenceScore: number;
  compositeScore: number;
};

export type RecommendOptions = {
  weights?: ScoringWeights;
  /** Reference time for history recency. Defaults to the observation timestamp. */
  asOf?: string;
  halfLifeDays?: number;
};

const log = createLogger("recommender");

export function recommend(
  observation: WeatherObservation,
  activities: readonly Activity[],
  profile: UserProfile,
  options: RecommendOptions = {}
): ScoredCandidate[] {
  const checkedObservation = parseObservation(observation);
  const candidates = parseActivitySet(activities);
  const checkedProfile = parseProfile(profile);
  const weights = parseScoringWeights(options.weights ?? appConfig.scoringWeights);
  const decay = resolveDecaySettings({
    asOf: options.asOf ?? checkedObservation.timestamp,
    halfLifeDays: options.halfLifeDays
  });

  const scored = candidates.map((activity) => {
    const weatherScore = computeWeatherBreakdown(checkedObservation, activity).score;
    const preferenceScore = computePreferenceBreakdown(checkedProfile, activity, decay).score;
    return {
      activity,
      weatherScore,
      preferenceScore,
      compositeScore: compositeScore(weatherScore, preferenceScore, weights)
    };
  });

  const ranked = scored.sort(compareCandidates);
  log.debug("Ranked candidates", {
    userId: checkedProfile.userId,
    candidates: ranked.length,
    top: ranked[0]?.activity.id ?? null
  });
  return ranked;
}

// Composites are snapped to this grid so mathematically equal blends compare equal.
const COMPOSITE_PRECISION = 1e12;

export function compositeScore(weatherScore: number, preferenceScore: number, weights: ScoringWeights): number {
  const blended = weights.weather * weatherScore + weights.preference * preferenceScore;
  return Math.round(blended * COMPOSITE_PRECISION) / COMPOSITE_PRECISION;
}

export function compareCandidates(left: ScoredCandidate, right: ScoredCandidate): number {
  if (right.compositeScore !== left.compositeScore) {
    return right.compositeScore - left.compositeScore;
  }
  return compareIds(left.activity.id, right.activity.id);
}
