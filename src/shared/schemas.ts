import { z } from "zod";

export const SUCCESS_RESULT = "0000";
export const INVALID_TOKEN_RESULT = "1019";

// Every COROS response is wrapped in this envelope; `data` is checked separately
export const EnvelopeSchema = z.object({
  result: z.string(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});

export type Envelope = z.infer<typeof EnvelopeSchema>;

// Ids past 2^53 have already lost digits by the time JSON.parse hands them over
const IdSchema = z
  .union([
    z.string().min(1),
    z.number().int().refine(Number.isSafeInteger, "id exceeds 2^53 and cannot be kept exact"),
  ])
  .transform(String);

export const LoginDataSchema = z.object({
  accessToken: z.string().min(1),
  userId: IdSchema,
});

export type LoginData = z.infer<typeof LoginDataSchema>;

export const ActivitySummarySchema = z.object({
  labelId: IdSchema,
  name: z.string().nullish(),
  sportType: z.number().int().nullish(),
  startTime: z.number(), // epoch seconds
  endTime: z.number(),
  workoutTime: z.number().nullish(),
  totalTime: z.number().nullish(),
  distance: z.union([z.number(), z.string()]).nullish(),
});

export type ActivitySummary = z.infer<typeof ActivitySummarySchema>;

export const ActivityPageSchema = z.object({
  pageNumber: z.number().int().optional(),
  totalPage: z.number().int().optional(),
  count: z.number().int().optional(),
  dataList: z.array(ActivitySummarySchema),
});

export type ActivityPage = z.infer<typeof ActivityPageSchema>;

export const DownloadDataSchema = z.object({
  fileUrl: z.string().url(),
});

export type DownloadData = z.infer<typeof DownloadDataSchema>;

export const BackupStateSchema = z.object({
  lastBackupTimestamp: z.string().nullable(),
  totalActivitiesBackedUp: z.number().int().nonnegative(),
  lastSyncedActivityId: z.string().nullable().default(null),
  backedUpActivityIds: z.array(z.string()),
});

/**
 * Compact one-line description of a zod failure for error messages.
 */
export const describeIssues = (error: z.ZodError): string =>
  error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
    .join("; ");
