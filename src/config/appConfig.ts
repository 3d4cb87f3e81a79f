import dotenv from "dotenv";

dotenv.config();

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type ScoringWeights = {
  weather: number;
  preference: number;
};

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = { weather: 0.4, preference: 0.6 };
export const DEFAULT_HISTORY_HALF_LIFE_DAYS = 30;

export type Environment = Record<string, string | undefined>;

export type AppConfig = {
  logLevel: LogLevel;
  catalogPath: string;
  scoringWeights: ScoringWeights;
  historyHalfLifeDays: number;
};

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error", "silent"];

function envNumber(env: Environment, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`Invalid ${name} in environment: expected a number, got "${raw}".`);
  }
  return value;
}

function envLogLevel(env: Environment, name: string, defaultValue: LogLevel): LogLevel {
  const raw = env[name];
  if (raw === undefined) return defaultValue;
  const normalized = raw.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? defaultValue;
}

function envScoringWeights(env: Environment): ScoringWeights {
  const weather = envNumber(env, "SCORING_WEATHER_WEIGHT");
  const preference = envNumber(env, "SCORING_PREFERENCE_WEIGHT");
  if (weather === undefined && preference === undefined) return DEFAULT_SCORING_WEIGHTS;
  if (weather === undefined || preference === undefined) {
    throw new Error("Set both SCORING_WEATHER_WEIGHT and SCORING_PREFERENCE_WEIGHT, or neither.");
  }
  if (weather < 0 || preference < 0 || Math.abs(weather + preference - 1) > 1e-9) {
    throw new Error("SCORING_WEATHER_WEIGHT and SCORING_PREFERENCE_WEIGHT must be non-negative and sum to 1.");
  }
  return { weather, preference };
}

function envHalfLifeDays(env: Environment): number {
  const value = envNumber(env, "HISTORY_HALF_LIFE_DAYS");
  if (value === undefined) return DEFAULT_HISTORY_HALF_LIFE_DAYS;
  if (value <= 0) {
    throw new Error("HISTORY_HALF_LIFE_DAYS must be greater than 0.");
  }
  return value;
}

export function loadAppConfig(env: Environment = process.env): AppConfig {
  return {
    logLevel: envLogLevel(env, "LOG_LEVEL", "warn"),
    catalogPath: env.ACTIVITY_CATALOG_PATH?.trim() ?? "",
    scoringWeights: envScoringWeights(env),
    historyHalfLifeDays: envHalfLifeDays(env)
  };
}

export const appConfig = loadAppConfig();
