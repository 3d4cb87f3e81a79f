import dayjs from "dayjs";
import { z } from "zod";

const ISO_TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export const isoTimestamp = z
  .string()
  .regex(ISO_TIMESTAMP_PATTERN, { message: "Expected an ISO-8601 timestamp." })
  .refine((value) => dayjs(value).isValid(), { message: "Expected an ISO-8601 timestamp." });

export const EnvironmentToleranceSchema = z
  .object({
    temperatureMinC: z.number().finite(),
    temperatureMaxC: z.number().finite(),
    maxWindSpeedKmh: z.number().finite().min(0),
    maxPrecipitationProbability: z.number().finite().min(0).max(1),
    indoor: z.boolean()
  })
  .strict()
  .refine((tolerance) => tolerance.temperatureMinC <= tolerance.temperatureMaxC, {
    message: "temperatureMinC must not exceed temperatureMaxC.",
    path: ["temperatureMinC"]
  });
export type EnvironmentTolerance = z.infer<typeof EnvironmentToleranceSchema>;

export const ActivitySchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    category: z.string().min(1).optional(),
    tolerance: EnvironmentToleranceSchema
  })
  .strict();
export type Activity = z.infer<typeof ActivitySchema>;

// Bounds are physical plausibility limits; values outside them are rejected, never clamped.
export const OBSERVATION_LIMITS = {
  temperatureC: { min: -60, max: 60 },
  windSpeedKmh: { min: 0, max: 400 },
  precipitationProbability: { min: 0, max: 1 },
  airQualityIndex: { min: 0, max: 500 }
} as const;

export const WeatherObservationSchema = z
  .object({
    location: z.string().min(1),
    timestamp: isoTimestamp,
    temperatureC: z
      .number()
      .finite()
      .min(OBSERVATION_LIMITS.temperatureC.min)
      .max(OBSERVATION_LIMITS.temperatureC.max),
    windSpeedKmh: z
      .number()
      .finite()
      .min(OBSERVATION_LIMITS.windSpeedKmh.min)
      .max(OBSERVATION_LIMITS.windSpeedKmh.max),
    precipitationProbability: z
      .number()
      .finite()
      .min(OBSERVATION_LIMITS.precipitationProbability.min)
      .max(OBSERVATION_LIMITS.precipitationProbability.max),
    airQualityIndex: z
      .number()
      .finite()
      .min(OBSERVATION_LIMITS.airQualityIndex.min)
      .max(OBSERVATION_LIMITS.airQualityIndex.max)
      .optional()
  })
  .strict();
export type WeatherObservation = z.infer<typeof WeatherObservationSchema>;

export function compareIds(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}
