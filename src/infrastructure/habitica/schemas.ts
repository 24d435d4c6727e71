import { z } from "zod";
import { Candidate } from "../../shared/types/candidate";

const timestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), "Invalid timestamp")
  .nullish();

export const listingUserSchema = z.object({
  _id: z.string().nullish(),
  auth: z
    .object({
      timestamps: z
        .object({
          created: timestampSchema,
          loggedin: timestampSchema,
          updated: timestampSchema,
        })
        .nullish(),
    })
    .nullish(),
  preferences: z
    .object({
      language: z.string().nullish(),
    })
    .nullish(),
  stats: z
    .object({
      lvl: z.number().int().nullish(),
    })
    .nullish(),
});

export const listingResponseSchema = z.object({
  success: z.boolean(),
  data: z.array(listingUserSchema).nullish(),
  message: z.string().optional(),
});

export type ListingUser = z.infer<typeof listingUserSchema>;

const toDate = (value: string | null | undefined): Date | null => (value ? new Date(value) : null);

// absent or null fields fall back to zero values
export function toCandidate(user: ListingUser): Candidate {
  const timestamps = user.auth?.timestamps;
  return {
    id: user._id ?? "",
    level: user.stats?.lvl ?? 0,
    language: user.preferences?.language ?? "",
    createdAt: toDate(timestamps?.created),
    lastLoginAt: toDate(timestamps?.loggedin),
    updatedAt: toDate(timestamps?.updated),
  };
}
