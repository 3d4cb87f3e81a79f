import type { WeatherObservation } from "./activity";
import { computePreferenceBreakdown, type PreferenceOptions, resolveDecaySettings } from "./preference";
import type { UserProfile } from "./profile";
import type { ScoredCandidate } from "./recommender";
import { parseObservation, parseProfile } from "./validators";
import { computeWeatherBreakdown } from "./weather";

/**
 * Plain-language reasons behind one recommendation, weather first.
 */
export function explainCandidate(
  candidate: ScoredCandidate,
  observation: WeatherObservation,
  profile?: UserProfile,
  options: PreferenceOptions = {}
): string[] {
  const checkedObservation = parseObservation(observation);
  const { activity } = candidate;
  const tolerance = activity.tolerance;
  const weather = computeWeatherBreakdown(checkedObservation, activity);
  const reasons: string[] = [];

  const range = `${formatNumber(tolerance.temperatureMinC)}-${formatNumber(tolerance.temperatureMaxC)}°C`;
  const temperature = `${formatNumber(checkedObservation.temperatureC)}°C`;
  if (weather.temperatureFit === 1) {
    reasons.push(`Temperature ${temperature} is inside the comfortable range ${range}.`);
  } else if (weather.temperatureFit > 0) {
    reasons.push(`Temperature ${temperature} is a little outside the comfortable range ${range}.`);
  } else {
    reasons.push(`Temperature ${temperature} is far outside the comfortable range ${range}.`);
  }

  if (weather.indoor) {
    reasons.push("Indoor activity: wind and rain do not matter.");
  } else {
    if (weather.windFit < 1) {
      reasons.push(
        weather.windFit === 0
          ? `Wind ${formatNumber(checkedObservation.windSpeedKmh)} km/h is above the ${formatNumber(tolerance.maxWindSpeedKmh)} km/h limit.`
          : `Wind ${formatNumber(checkedObservation.windSpeedKmh)} km/h is getting close to the limit.`
      );
    }
    if (weather.precipitationFit < 1) {
      const chance = `${Math.round(checkedObservation.precipitationProbability * 100)}%`;
      reasons.push(
        weather.precipitationFit === 0
          ? `Rain chance ${chance} is too high for this activity.`
          : `Rain chance ${chance} may spoil part of it.`
      );
    }
  }

  if (profile) {
    const preference = computePreferenceBreakdown(
      parseProfile(profile),
      activity,
      resolveDecaySettings({ ...options, asOf: options.asOf ?? checkedObservation.timestamp })
    );
    if (preference.excluded) {
      reasons.push("You excluded this activity.");
    } else if (preference.coldStart) {
      reasons.push("No preferences recorded yet.");
    } else {
      if (preference.favorite !== null && preference.favorite > 0) {
        reasons.push("One of your favorites.");
      }
      if (preference.history !== null && preference.history >= 0.5) {
        reasons.push("Matches what you have picked recently.");
      }
    }
  }

  return reasons;
}

function formatNumber(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(1);
}
