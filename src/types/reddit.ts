import { z } from "zod";

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number(),
});

export const userAboutSchema = z.object({
  kind: z.string(),
  data: z
    .object({
      name: z.string().optional(),
      is_suspended: z.boolean().optional(),
    })
    .passthrough(),
});

export const submissionSchema = z
  .object({
    id: z.string(),
    title: z.string(),
    selftext: z.string().default(""),
    permalink: z.string(),
    subreddit: z.string(),
    created_utc: z.number(),
  })
  .passthrough();

export const commentSchema = z
  .object({
    id: z.string(),
    body: z.string().default(""),
    permalink: z.string(),
    subreddit: z.string(),
    created_utc: z.number(),
  })
  .passthrough();

export type RedditSubmission = z.infer<typeof submissionSchema>;
export type RedditComment = z.infer<typeof commentSchema>;

export function listingSchema<T extends z.ZodTypeAny>(child: T) {
  return z.object({
    kind: z.literal("Listing"),
    data: z.object({
      after: z.string().nullable(),
      children: z.array(z.object({ kind: z.string(), data: child })),
    }),
  });
}

export const submissionListingSchema = listingSchema(submissionSchema);
export const commentListingSchema = listingSchema(commentSchema);

export interface ListingPage<T> {
  items: T[];
  after: string | null;
}
