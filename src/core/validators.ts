import { z } from "zod";
import type { ScoringWeights } from "../config/appConfig";
import { type Activity, ActivitySchema, type WeatherObservation, WeatherObservationSchema } from "./activity";
import {
  EmptyCandidateSet,
  InvalidActivity,
  InvalidObservation,
  InvalidProfile,
  InvalidWeights,
  issuesFromZod,
  type ValidationIssue
} from "./errors";
import { type UserProfile, UserProfileSchema } from "./profile";

const WEIGHT_SUM_TOLERANCE = 1e-9;

const ScoringWeightsSchema = z
  .object({
    weather: z.number().finite().min(0),
    preference: z.number().finite().min(0)
  })
  .strict()
  .refine((weights) => Math.abs(weights.weather + weights.preference - 1) <= WEIGHT_SUM_TOLERANCE, {
    message: "Weights must sum to 1."
  });

export function parseObservation(input: unknown): WeatherObservation {
  const result = WeatherObservationSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidObservation(issuesFromZod(result.error, "observation"));
  }
  return result.data;
}

export function parseActivity(input: unknown): Activity {
  const result = ActivitySchema.safeParse(input);
  if (!result.success) {
    throw new InvalidActivity(issuesFromZod(result.error, "activity"));
  }
  return result.data;
}

/**
 * Validates a candidate list as a set: it must be non-empty and carry each id once.
 */
export function parseActivitySet(inputs: readonly unknown[]): Activity[] {
  if (inputs.length === 0) {
    throw new EmptyCandidateSet();
  }

  const activities: Activity[] = [];
  const issues: ValidationIssue[] = [];
  const seen = new Set<string>();

  inputs.forEach((input, index) => {
    const result = ActivitySchema.safeParse(input);
    if (!result.success) {
      issues.push(...issuesFromZod(result.error, `activities.${index}`));
      return;
    }
    if (seen.has(result.data.id)) {
      issues.push({ field: `activities.${index}.id`, message: `Duplicate activity id "${result.data.id}".` });
      return;
    }
    seen.add(result.data.id);
    activities.push(result.data);
  });

  if (issues.length > 0) {
    throw new InvalidActivity(issues);
  }
  return activities;
}

export function parseProfile(input: unknown): UserProfile {
  const result = UserProfileSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidProfile(issuesFromZod(result.error, "profile"));
  }
  return result.data;
}

export function parseScoringWeights(input: unknown): ScoringWeights {
  const result = ScoringWeightsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidWeights(issuesFromZod(result.error, "weights"));
  }
  return result.data;
}
