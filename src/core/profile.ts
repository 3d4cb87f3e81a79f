import { z } from "zod";
import { isoTimestamp } from "./activity";

export const HistoryEntrySchema = z
  .object({
    activityId: z.string().min(1),
    category: z.string().min(1).optional(),
    count: z.number().int().min(1),
    lastSelectedAt: isoTimestamp
  })
  .strict();
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>;

export const UserProfileSchema = z
  .object({
    userId: z.string().min(1),
    favorites: z.record(z.string().min(1), z.number().finite().positive()),
    history: z.array(HistoryEntrySchema),
    exclusions: z.array(z.string().min(1))
  })
  .strict();
export type UserProfile = z.infer<typeof UserProfileSchema>;

export function isColdStart(profile: UserProfile): boolean {
  return Object.keys(profile.favorites).length === 0 && profile.history.length === 0;
}
