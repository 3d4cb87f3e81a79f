import type { Activity, EnvironmentTolerance, WeatherObservation } from "./activity";
import { parseActivity, parseObservation } from "./validators";

export type WeatherBreakdown = {
  score: number;
  temperatureFit: number;
  windFit: number;
  precipitationFit: number;
  indoor: boolean;
};

// Degrees outside the comfortable range at which temperature fit reaches 0.
export const TEMPERATURE_TOLERANCE_MARGIN_C = 10;
// Share of an activity's wind / rain tolerance that still counts as fully comfortable.
export const COMFORT_THRESHOLD_RATIO = 0.5;

export function scoreWeather(observation: WeatherObservation, activity: Activity): number {
  return weatherBreakdown(observation, activity).score;
}

export function weatherBreakdown(observation: WeatherObservation, activity: Activity): WeatherBreakdown {
  return computeWeatherBreakdown(parseObservation(observation), parseActivity(activity));
}

/**
 * Unchecked variant for callers that already validated both inputs.
 */
export function computeWeatherBreakdown(observation: WeatherObservation, activity: Activity): WeatherBreakdown {
  const tolerance = activity.tolerance;
  const temperatureFit = scoreTemperatureFit(observation.temperatureC, tolerance);
  const windFit = scoreWindFit(observation.windSpeedKmh, tolerance);
  const precipitationFit = scorePrecipitationFit(observation.precipitationProbability, tolerance);

  // Indoor activities only care about getting there comfortably.
  const score = tolerance.indoor
    ? temperatureFit
    : (temperatureFit + windFit + precipitationFit) / 3;

  return {
    score: clamp(score, 0, 1),
    temperatureFit,
    windFit,
    precipitationFit,
    indoor: tolerance.indoor
  };
}

function scoreTemperatureFit(temperatureC: number, tolerance: EnvironmentTolerance): number {
  const below = tolerance.temperatureMinC - temperatureC;
  const above = temperatureC - tolerance.temperatureMaxC;
  const distance = Math.max(below, above, 0);
  return clamp(1 - distance / TEMPERATURE_TOLERANCE_MARGIN_C, 0, 1);
}

function scoreWindFit(windSpeedKmh: number, tolerance: EnvironmentTolerance): number {
  return linearFalloff(windSpeedKmh, tolerance.maxWindSpeedKmh);
}

function scorePrecipitationFit(probability: number, tolerance: EnvironmentTolerance): number {
  return linearFalloff(probability, Math.min(1, tolerance.maxPrecipitationProbability));
}

function linearFalloff(value: number, cutoff: number): number {
  if (cutoff <= 0) {
    return value <= 0 ? 1 : 0;
  }
  const comfort = cutoff * COMFORT_THRESHOLD_RATIO;
  if (value <= comfort) return 1;
  if (value >= cutoff) return 0;
  return clamp(1 - (value - comfort) / (cutoff - comfort), 0, 1);
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
