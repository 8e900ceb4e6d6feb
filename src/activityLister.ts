import { AxiosInstance, AxiosResponse } from "axios";
import { ApiError } from "./shared/errors";
import {
  createHttpClient,
  ensureSuccessStatus,
  sessionHeaders,
  toRequestError,
  unwrapEnvelope,
  withRetry,
} from "./shared/http";
import { ActivityPage, ActivityPageSchema, ActivitySummary } from "./shared/schemas";
import {
  Activity,
  DEFAULT_RETRY,
  RetryOptions,
  Session,
  activityTypeFromSportType,
} from "./shared/types";

export const FIRST_PAGE = 1;
export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 200;
export const MAX_PAGES = 10_000;

/**
 * Pagination stops on whichever signal the page provides: an empty page,
 * or a `totalPage` count that has been reached. Page size never matters.
 */
export const isLastPage = (pageNumber: number, page: ActivityPage): boolean => {
  if (page.dataList.length === 0) return true;
  return page.totalPage !== undefined && pageNumber >= page.totalPage;
};

const toIsoFromEpochSeconds = (seconds: number): string => {
  const date = new Date(seconds * 1000);
  if (Number.isNaN(date.getTime())) {
    throw new ApiError(`Invalid activity timestamp: ${seconds}`);
  }
  return date.toISOString();
};

const toDistance = (raw: ActivitySummary["distance"]): number => {
  if (raw === null || raw === undefined || raw === "") return 0;
  const value = typeof raw === "number" ? raw : Number(raw);
  if (!Number.isFinite(value)) {
    throw new ApiError(`Invalid activity distance: ${String(raw)}`);
  }
  return value;
};

export const toActivity = (summary: ActivitySummary): Activity => {
  const sportType = summary.sportType ?? 0;
  return {
    id: summary.labelId,
    name: summary.name || "Unnamed",
    activityType: activityTypeFromSportType(sportType),
    sportType,
    distanceMeters: toDistance(summary.distance),
    startTime: toIsoFromEpochSeconds(summary.startTime),
    endTime: toIsoFromEpochSeconds(summary.endTime),
    workoutSeconds: summary.workoutTime ?? 0,
    totalSeconds: summary.totalTime ?? 0,
  };
};

export interface ActivityListerOptions {
  http?: AxiosInstance;
  pageSize?: number;
  retry?: RetryOptions;
}

/**
 * Walks `/activity/query` page by page until exhaustion
 */
export class ActivityLister {
  private readonly http: AxiosInstance;
  private readonly pageSize: number;
  private readonly retry: RetryOptions;

  constructor(options: ActivityListerOptions = {}) {
    const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new RangeError(`Page size must be an integer between 1 and ${MAX_PAGE_SIZE}`);
    }
    this.http = options.http ?? createHttpClient();
    this.pageSize = pageSize;
    this.retry = options.retry ?? DEFAULT_RETRY;
  }

  /**
   * Fetch a single page of activity summaries
   */
  async fetchPage(session: Session, pageNumber: number, signal?: AbortSignal): Promise<ActivityPage> {
    const url = `${session.baseUrl}/activity/query`;
    const label = `Activity page ${pageNumber}`;

    return withRetry(
      async () => {
        const headers = await sessionHeaders(session, url);
        let response: AxiosResponse;
        try {
          response = await this.http.get(url, {
            params: { size: this.pageSize, pageNumber, modeList: "" },
            headers,
            signal,
          });
        } catch (error) {
          throw toRequestError(error, label);
        }
        ensureSuccessStatus(response, label);
        return unwrapEnvelope(response.data, ActivityPageSchema, label);
      },
      { retry: this.retry, label, signal }
    );
  }

  /**
   * Every remote activity, deduplicated by id in first-seen order
   */
  async listAllActivities(session: Session, signal?: AbortSignal): Promise<Activity[]> {
    console.log(`📥 Fetching activity list from COROS (${this.pageSize} per page)...`);

    const activities = new Map<string, Activity>();
    let duplicates = 0;

    for (let pageNumber = FIRST_PAGE; ; pageNumber++) {
      if (pageNumber - FIRST_PAGE >= MAX_PAGES) {
        throw new ApiError(`Pagination did not terminate after ${MAX_PAGES} pages`);
      }

      const page = await this.fetchPage(session, pageNumber, signal);
      for (const summary of page.dataList) {
        const activity = toActivity(summary);
        if (activities.has(activity.id)) {
          duplicates++;
          continue;
        }
        activities.set(activity.id, activity);
      }

      const pages = page.totalPage !== undefined ? `/${page.totalPage}` : "";
      console.log(`  ✓ Page ${pageNumber}${pages}: ${page.dataList.length} activities`);

      if (isLastPage(pageNumber, page)) break;
    }

    if (duplicates > 0) {
      console.log(`  ℹ️  Dropped ${duplicates} duplicate entries across pages`);
    }
    console.log(`✅ Retrieved ${activities.size} activities`);
    return [...activities.values()];
  }
}

export default ActivityLister;
