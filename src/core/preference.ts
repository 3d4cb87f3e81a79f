import dayjs, { type Dayjs } from "dayjs";
import { appConfig } from "../config/appConfig";
import { type Activity, isoTimestamp } from "./activity";
import { InvalidProfile } from "./errors";
import { type HistoryEntry, isColdStart, type UserProfile } from "./profile";
import { parseActivity, parseProfile } from "./validators";

export type PreferenceOptions = {
  /** Reference time for recency decay. Defaults to the profile's latest history entry. */
  asOf?: string;
  halfLifeDays?: number;
};

export type PreferenceBreakdown = {
  score: number;
  excluded: boolean;
  coldStart: boolean;
  favorite: number | null;
  history: number | null;
};

export const COLD_START_AFFINITY = 0.5;
export const FAVORITES_SHARE = 0.6;
export const RELATED_ACTIVITY_FACTOR = 0.5;

type DecaySettings = {
  asOf: Dayjs | null;
  halfLifeDays: number;
};

export function scorePreference(profile: UserProfile, activity: Activity, options: PreferenceOptions = {}): number {
  return preferenceBreakdown(profile, activity, options).score;
}

export function preferenceBreakdown(
  profile: UserProfile,
  activity: Activity,
  options: PreferenceOptions = {}
): PreferenceBreakdown {
  return computePreferenceBreakdown(parseProfile(profile), parseActivity(activity), resolveDecaySettings(options));
}

export function resolveDecaySettings(options: PreferenceOptions): DecaySettings {
  const halfLifeDays = options.halfLifeDays ?? appConfig.historyHalfLifeDays;
  if (!Number.isFinite(halfLifeDays) || halfLifeDays <= 0) {
    throw new InvalidProfile([{ field: "options.halfLifeDays", message: "Half-life must be a positive number of days." }]);
  }
  if (options.asOf === undefined) {
    return { asOf: null, halfLifeDays };
  }
  if (!isoTimestamp.safeParse(options.asOf).success) {
    throw new InvalidProfile([{ field: "options.asOf", message: "Expected an ISO-8601 timestamp." }]);
  }
  return { asOf: dayjs(options.asOf), halfLifeDays };
}

/**
 * Unchecked variant for callers that already validated the profile and activity.
 */
export function computePreferenceBreakdown(
  profile: UserProfile,
  activity: Activity,
  settings: DecaySettings
): PreferenceBreakdown {
  if (profile.exclusions.includes(activity.id)) {
    return { score: 0, excluded: true, coldStart: false, favorite: null, history: null };
  }
  if (isColdStart(profile)) {
    return { score: COLD_START_AFFINITY, excluded: false, coldStart: true, favorite: null, history: null };
  }

  const favorite = Object.keys(profile.favorites).length > 0 ? favoriteComponent(profile, activity) : null;
  const history = profile.history.length > 0 ? historyComponent(profile, activity, settings) : null;

  let score: number;
  if (favorite !== null && history !== null) {
    score = FAVORITES_SHARE * favorite + (1 - FAVORITES_SHARE) * history;
  } else {
    score = favorite ?? history ?? COLD_START_AFFINITY;
  }

  return { score: clamp(score), excluded: false, coldStart: false, favorite, history };
}

function favoriteComponent(profile: UserProfile, activity: Activity): number {
  const maxWeight = Math.max(...Object.values(profile.favorites));
  if (!Object.hasOwn(profile.favorites, activity.id) || maxWeight <= 0) return 0;
  return clamp(profile.favorites[activity.id] / maxWeight);
}

function historyComponent(profile: UserProfile, activity: Activity, settings: DecaySettings): number {
  const asOf = settings.asOf ?? latestSelection(profile.history);
  const contributions = profile.history.map((entry) => ({
    entry,
    weight: entry.count * recencyDecay(entry, asOf, settings.halfLifeDays)
  }));

  const reference = Math.max(...contributions.map((item) => item.weight));
  if (reference <= 0) return 0;

  const raw = contributions.reduce((sum, item) => sum + item.weight * relationFactor(item.entry, activity), 0);
  return clamp(raw / reference);
}

function relationFactor(entry: HistoryEntry, activity: Activity): number {
  if (entry.activityId === activity.id) return 1;
  if (activity.category && entry.category === activity.category) return RELATED_ACTIVITY_FACTOR;
  return 0;
}

function recencyDecay(entry: HistoryEntry, asOf: Dayjs, halfLifeDays: number): number {
  const ageDays = Math.max(0, asOf.diff(dayjs(entry.lastSelectedAt), "day", true));
  return Math.pow(0.5, ageDays / halfLifeDays);
}

function latestSelection(history: HistoryEntry[]): Dayjs {
  return history
    .map((entry) => dayjs(entry.lastSelectedAt))
    .reduce((latest, current) => (current.isAfter(latest) ? current : latest));
}

function clamp(value: number): number {
  return Math.max(0, Math.min(1, value));
}
