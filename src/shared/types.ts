import type { CookieJar } from "tough-cookie";

// Normalized sport names used in metadata files
export type ActivityType =
  | "running"
  | "trail_running"
  | "cycling"
  | "mountain_biking"
  | "swimming"
  | "pool_swim"
  | "hiking"
  | "strength"
  | "yoga"
  | "triathlon"
  | "other";

// Values double as file extensions
export enum ExportFormat {
  FIT = "fit",
  TCX = "tcx",
  GPX = "gpx",
  KML = "kml",
  CSV = "csv",
}

export const ALL_EXPORT_FORMATS: readonly ExportFormat[] = [
  ExportFormat.FIT,
  ExportFormat.TCX,
  ExportFormat.GPX,
  ExportFormat.KML,
  ExportFormat.CSV,
];

// COROS `fileType` query values
export const EXPORT_FILE_TYPES: Record<ExportFormat, number> = {
  [ExportFormat.CSV]: 0,
  [ExportFormat.GPX]: 1,
  [ExportFormat.KML]: 2,
  [ExportFormat.TCX]: 3,
  [ExportFormat.FIT]: 4,
};

const SPORT_TYPES: Record<number, ActivityType> = {
  100: "running",
  101: "trail_running",
  104: "hiking",
  200: "cycling",
  201: "mountain_biking",
  300: "swimming",
  301: "pool_swim",
  402: "strength",
  500: "triathlon",
  904: "yoga",
};

export const activityTypeFromSportType = (sportType: number): ActivityType =>
  SPORT_TYPES[sportType] ?? "other";

export const parseExportFormat = (raw: string): ExportFormat | undefined => {
  const value = raw.trim().toLowerCase();
  return ALL_EXPORT_FORMATS.find((format) => format === value);
};

/**
 * One recorded workout as listed by the remote service.
 * Timestamps are ISO-8601 in UTC.
 */
export interface Activity {
  readonly id: string;              // COROS labelId
  readonly name: string;
  readonly activityType: ActivityType;
  readonly sportType: number;       // raw COROS sport code, required by the download call
  readonly distanceMeters: number;
  readonly startTime: string;
  readonly endTime: string;
  readonly workoutSeconds: number;  // moving time
  readonly totalSeconds: number;    // elapsed time
}

// Contents of `<date>_<id>-metadata.json`
export interface ActivityMetadata {
  activityId: string;
  name: string;
  activityType: ActivityType;
  sportType: number;
  distanceMeters: number;
  startTime: string;
  endTime: string;
  workoutSeconds: number;
  totalSeconds: number;
}

/**
 * Authenticated credential for one run. Threaded explicitly through every
 * request; never persisted.
 */
export interface Session {
  readonly accessToken: string;
  readonly userId: string;
  readonly baseUrl: string;
  readonly cookieJar: CookieJar;
}

export interface Credentials {
  email: string;
  password: string;
}

// Persisted in `.coros-backup-state.json`
export interface BackupState {
  lastBackupTimestamp: string | null;
  totalActivitiesBackedUp: number;
  lastSyncedActivityId: string | null;
  backedUpActivityIds: string[];
}

export interface BackupStats {
  lastBackup: string | null;
  totalActivities: number;
  downloadedIdsCount: number;
}

export interface ActivityFailure {
  activityId: string;
  error: string;
}

export interface BackupReport {
  startedAt: string;
  finishedAt: string;
  activitiesFound: number;
  activitiesDownloaded: number;
  activitiesSkipped: number;
  activitiesFailed: number;
  failedActivityIds: string[];
  failures: ActivityFailure[];
  formatsDownloaded: Partial<Record<ExportFormat, number>>;
  cancelled: boolean;
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY: RetryOptions = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};
