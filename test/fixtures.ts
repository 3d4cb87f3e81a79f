import type { Activity, WeatherObservation } from "../src/core/activity";
import type { UserProfile } from "../src/core/profile";
import type { ScoredCandidate } from "../src/core/recommender";

export function makeObservation(overrides: Partial<WeatherObservation> = {}): WeatherObservation {
  return {
    location: "Lyon",
    timestamp: "2026-06-01T12:00:00Z",
    temperatureC: 22,
    windSpeedKmh: 5,
    precipitationProbability: 0.05,
    ...overrides
  };
}

export function makeHiking(overrides: Partial<Activity> = {}): Activity {
  return {
    id: "hiking",
    name: "Hiking",
    category: "outdoor-sport",
    tolerance: {
      temperatureMinC: 10,
      temperatureMaxC: 30,
      maxWindSpeedKmh: 20,
      maxPrecipitationProbability: 0.3,
      indoor: false
    },
    ...overrides
  };
}

export function makeIndoor(id: string, name: string, minC = 15, maxC = 30): Activity {
  return {
    id,
    name,
    category: "culture",
    tolerance: {
      temperatureMinC: minC,
      temperatureMaxC: maxC,
      maxWindSpeedKmh: 20,
      maxPrecipitationProbability: 0.1,
      indoor: true
    }
  };
}

export function makeProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    userId: "user-1",
    favorites: {},
    history: [],
    exclusions: [],
    ...overrides
  };
}

export function makeScored(id: string, compositeScore: number): ScoredCandidate {
  return {
    activity: makeIndoor(id, id),
    weatherScore: compositeScore,
    preferenceScore: compositeScore,
    compositeScore
  };
}

export function assertClose(actual: number, expected: number, tolerance = 1e-9): void {
  if (Math.abs(actual - expected) > tolerance) {
    throw new Error(`Expected ${actual} to be within ${tolerance} of ${expected}.`);
  }
}
