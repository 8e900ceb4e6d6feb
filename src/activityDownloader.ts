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
import { DownloadDataSchema } from "./shared/schemas";
import {
  Activity,
  ActivityMetadata,
  DEFAULT_RETRY,
  EXPORT_FILE_TYPES,
  ExportFormat,
  RetryOptions,
  Session,
} from "./shared/types";

export interface ActivityDownloaderOptions {
  http?: AxiosInstance;
  retry?: RetryOptions;
}

const toBuffer = (data: unknown): Buffer | undefined => {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  return undefined;
};

/**
 * Retrieves activity payloads. Holds no state besides its HTTP client;
 * writing bytes to disk is up to the caller.
 */
export class ActivityDownloader {
  private readonly http: AxiosInstance;
  private readonly retry: RetryOptions;

  constructor(options: ActivityDownloaderOptions = {}) {
    this.http = options.http ?? createHttpClient();
    this.retry = options.retry ?? DEFAULT_RETRY;
  }

  /**
   * Built from the listed activity on purpose: the API has no metadata
   * endpoint and the listing already carries every metadata field.
   */
  fetchMetadata(activity: Activity): ActivityMetadata {
    return {
      activityId: activity.id,
      name: activity.name,
      activityType: activity.activityType,
      sportType: activity.sportType,
      distanceMeters: activity.distanceMeters,
      startTime: activity.startTime,
      endTime: activity.endTime,
      workoutSeconds: activity.workoutSeconds,
      totalSeconds: activity.totalSeconds,
    };
  }

  /**
   * Resolve the export's file URL, then download its bytes
   */
  async fetchExport(
    session: Session,
    activity: Activity,
    format: ExportFormat,
    signal?: AbortSignal
  ): Promise<Buffer> {
    const fileUrl = await this.resolveFileUrl(session, activity, format, signal);
    const label = `${format.toUpperCase()} payload for ${activity.id}`;

    return withRetry(
      async () => {
        const headers = await sessionHeaders(session, fileUrl);
        let response: AxiosResponse;
        try {
          response = await this.http.get(fileUrl, { headers, responseType: "arraybuffer", signal });
        } catch (error) {
          throw toRequestError(error, label);
        }
        ensureSuccessStatus(response, label);

        const bytes = toBuffer(response.data);
        if (!bytes) {
          throw new ApiError(`${label}: expected binary content`);
        }
        if (bytes.length === 0) {
          throw new ApiError(`${label}: empty payload`);
        }
        return bytes;
      },
      { retry: this.retry, label, signal }
    );
  }

  private async resolveFileUrl(
    session: Session,
    activity: Activity,
    format: ExportFormat,
    signal?: AbortSignal
  ): Promise<string> {
    const url = `${session.baseUrl}/activity/detail/download`;
    const label = `${format.toUpperCase()} export for ${activity.id}`;

    const data = await withRetry(
      async () => {
        const headers = await sessionHeaders(session, url);
        let response: AxiosResponse;
        try {
          response = await this.http.get(url, {
            params: {
              labelId: activity.id,
              sportType: activity.sportType,
              fileType: EXPORT_FILE_TYPES[format],
            },
            headers,
            signal,
          });
        } catch (error) {
          throw toRequestError(error, label);
        }
        ensureSuccessStatus(response, label);
        return unwrapEnvelope(response.data, DownloadDataSchema, label);
      },
      { retry: this.retry, label, signal }
    );

    return data.fileUrl;
  }
}

export default ActivityDownloader;
