import { z } from "zod";

/** ISO 8601 string or epoch milliseconds */
const InstantSchema = z.union([z.string(), z.number()]).transform((value) => new Date(value));

/**
 * The batch envelope. Only refIds are checked here so that one bad query
 * cannot reject its siblings.
 */
export const QueryBatchSchema = z.object({
  queries: z.array(z.object({ refId: z.string().min(1) }).passthrough()),
});

/** One query of the batch, validated on its own */
export const BatchQuerySchema = z.object({
  refId: z.string().min(1),
  timeRange: z.object({
    from: InstantSchema,
    to: InstantSchema,
  }),
  maxDataPoints: z.number().int().default(0),
  model: z.unknown(),
});

export type QueryBatch = z.infer<typeof QueryBatchSchema>;
export type BatchQuery = z.infer<typeof BatchQuerySchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
