import * as bcrypt from "bcryptjs";
import * as crypto from "crypto";
import {
  AxiosAdapter,
  AxiosError,
  AxiosResponse,
  CanceledError,
  InternalAxiosRequestConfig,
  RawAxiosResponseHeaders,
} from "axios";
import { EXPORT_FILE_TYPES, ExportFormat } from "./shared/types";

/**
 * In-process stand-in for the COROS Training Hub API. Plugged into axios as
 * an adapter, it serves `--mock` runs and the test suite without touching
 * the network.
 */

export const MOCK_BASE_URL = "https://coros.mock";
export const MOCK_FILES_URL = "https://files.coros.mock";
export const MOCK_EMAIL = "mock@example.com";
export const MOCK_PASSWORD = "mock-password";
export const MOCK_ACCESS_TOKEN = "mock-access-token";
export const MOCK_USER_ID = "4200";

// Raw activity record as `/activity/query` returns it
export interface MockActivity {
  labelId: string;
  name: string;
  sportType: number;
  startTime: number; // epoch seconds
  endTime: number;
  workoutTime: number;
  totalTime: number;
  distance: number;
}

export interface RecordedRequest {
  method: string;
  host: string;
  path: string;
  params: Record<string, string>;
  headers: Record<string, string>;
  body: unknown;
}

export type FailureKind =
  | "network"        // connection reset, no response
  | "server"         // HTTP 503
  | "forbidden"      // HTTP 403
  | "not-found"      // HTTP 404
  | "malformed"      // 200 with an unexpected body
  | "invalid-token"; // COROS result code 1019

export interface FailureRule {
  path?: string;
  labelId?: string;
  format?: ExportFormat;
  pageNumber?: number;
  kind: FailureKind;
  times?: number; // defaults to every matching request
}

export interface FakeCorosOptions {
  email?: string;
  password?: string;
  activities?: MockActivity[];
  // Explicit page contents, served regardless of the requested page size
  pages?: MockActivity[][];
  // When false, responses carry no `totalPage` and the client must stop on an empty page
  reportTotalPage?: boolean;
}

const SPORT_CYCLE = [100, 200, 300, 402, 101];
const FIRST_START = Date.UTC(2025, 0, 1, 6, 30) / 1000;
const DAY = 86_400;

/**
 * Deterministic activities, one per day from 2025-01-01, numbered from `firstNumber`
 */
export const generateMockActivities = (count: number, firstNumber: number = 1): MockActivity[] => {
  const activities: MockActivity[] = [];
  for (let n = firstNumber; n < firstNumber + count; n++) {
    const sportType = SPORT_CYCLE[(n - 1) % SPORT_CYCLE.length];
    const duration = 1800 + (n % 5) * 300;
    const startTime = FIRST_START + (n - 1) * DAY;
    activities.push({
      labelId: `47${String(n).padStart(6, "0")}`,
      name: `Mock Activity ${n}`,
      sportType,
      startTime,
      endTime: startTime + duration,
      workoutTime: duration - 60,
      totalTime: duration,
      distance: sportType === 402 ? 0 : 5000 + n * 100,
    });
  }
  return activities;
};

export const mockExportBytes = (labelId: string, format: ExportFormat): Buffer =>
  Buffer.from(`${format.toUpperCase()} payload for ${labelId}\n`, "utf8");

const FORMATS_BY_FILE_TYPE = new Map<number, ExportFormat>(
  Object.values(ExportFormat).map((format) => [EXPORT_FILE_TYPES[format], format])
);

const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  403: "Forbidden",
  404: "Not Found",
  503: "Service Unavailable",
};

const md5Hex = (value: string): string =>
  crypto.createHash("md5").update(value, "utf8").digest("hex");

export class FakeCorosService {
  readonly requests: RecordedRequest[] = [];
  activities: MockActivity[];
  pages?: MockActivity[][];
  reportTotalPage: boolean;
  onRequest?: (request: RecordedRequest) => void;

  private readonly email: string;
  private readonly password: string;
  private failures: FailureRule[] = [];

  constructor(options: FakeCorosOptions = {}) {
    this.email = options.email ?? MOCK_EMAIL;
    this.password = options.password ?? MOCK_PASSWORD;
    this.activities = options.activities ?? generateMockActivities(12);
    this.pages = options.pages;
    this.reportTotalPage = options.reportTotalPage ?? true;
  }

  readonly adapter: AxiosAdapter = async (config) => this.handle(config);

  addActivities(activities: MockActivity[]): void {
    this.activities = [...this.activities, ...activities];
  }

  fail(rule: FailureRule): void {
    this.failures.push({ ...rule });
  }

  clearFailures(): void {
    this.failures = [];
  }

  requestsTo(path: string): RecordedRequest[] {
    return this.requests.filter((request) => request.path === path);
  }

  // Export files served, as "<labelId>.<ext>"
  downloadedFiles(): string[] {
    return this.requests
      .filter((request) => request.host === new URL(MOCK_FILES_URL).host)
      .map((request) => request.path.slice(1));
  }

  private async handle(config: InternalAxiosRequestConfig): Promise<AxiosResponse> {
    const request = this.record(config);
    this.onRequest?.(request);

    if (config.signal?.aborted) {
      throw new CanceledError(undefined, undefined, config);
    }

    const failure = this.takeFailure(request);
    if (failure) {
      return this.failWith(failure, config);
    }

    if (request.host === new URL(MOCK_FILES_URL).host) {
      return this.serveFile(request, config);
    }

    switch (request.path) {
      case "/account/login":
        return this.login(request, config);
      case "/activity/query":
        return this.requireToken(request, config) ?? this.query(request, config);
      case "/activity/detail/download":
        return this.requireToken(request, config) ?? this.download(request, config);
      default:
        return this.reply(config, 404, "Not Found");
    }
  }

  private record(config: InternalAxiosRequestConfig): RecordedRequest {
    const url = new URL(config.url ?? "/", MOCK_BASE_URL);
    const params: Record<string, string> = {};
    for (const [key, value] of Object.entries(config.params ?? {})) {
      params[key] = String(value);
    }
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(config.headers.toJSON())) {
      if (value !== undefined && value !== null) headers[key.toLowerCase()] = String(value);
    }
    const body = typeof config.data === "string" ? JSON.parse(config.data) : config.data;

    const request: RecordedRequest = {
      method: (config.method ?? "get").toUpperCase(),
      host: url.host,
      path: url.pathname,
      params,
      headers,
      body,
    };
    this.requests.push(request);
    return request;
  }

  private takeFailure(request: RecordedRequest): FailureRule | undefined {
    const rule = this.failures.find((candidate) => {
      if (candidate.times !== undefined && candidate.times <= 0) return false;
      if (candidate.path !== undefined && candidate.path !== request.path) return false;
      if (candidate.labelId !== undefined && candidate.labelId !== request.params.labelId) return false;
      if (
        candidate.format !== undefined &&
        String(EXPORT_FILE_TYPES[candidate.format]) !== request.params.fileType
      ) {
        return false;
      }
      if (
        candidate.pageNumber !== undefined &&
        String(candidate.pageNumber) !== request.params.pageNumber
      ) {
        return false;
      }
      return true;
    });
    if (rule && rule.times !== undefined) rule.times -= 1;
    return rule;
  }

  private failWith(rule: FailureRule, config: InternalAxiosRequestConfig): AxiosResponse {
    switch (rule.kind) {
      case "network":
        throw new AxiosError("socket hang up", "ECONNRESET", config);
      case "server":
        return this.reply(config, 503, "Service Unavailable");
      case "forbidden":
        return this.reply(config, 403, "Forbidden");
      case "not-found":
        return this.reply(config, 404, "Not Found");
      case "malformed":
        return this.reply(config, 200, { unexpected: true });
      case "invalid-token":
        return this.reply(config, 200, { result: "1019", message: "Access token is invalid" });
    }
  }

  private login(request: RecordedRequest, config: InternalAxiosRequestConfig): AxiosResponse {
    const body = request.body;
    const fields = typeof body === "object" && body !== null ? Object.entries(body) : [];
    const field = (name: string): string => {
      const entry = fields.find(([key]) => key === name);
      return entry && typeof entry[1] === "string" ? entry[1] : "";
    };

    const p1 = field("p1");
    const p2 = field("p2");
    const valid =
      field("account") === this.email &&
      p1.startsWith(p2) &&
      bcrypt.compareSync(md5Hex(this.password), p1);

    if (!valid) {
      return this.reply(config, 200, {
        result: "1030",
        message: "The login credentials you entered are incorrect.",
      });
    }

    return this.reply(
      config,
      200,
      { result: "0000", message: "OK", data: { accessToken: MOCK_ACCESS_TOKEN, userId: Number(MOCK_USER_ID) } },
      { "set-cookie": ["CPL-coros-region=2; Path=/"] }
    );
  }

  private requireToken(
    request: RecordedRequest,
    config: InternalAxiosRequestConfig
  ): AxiosResponse | undefined {
    if (request.headers.accesstoken === MOCK_ACCESS_TOKEN) return undefined;
    return this.reply(config, 200, { result: "1019", message: "Access token is invalid" });
  }

  private query(request: RecordedRequest, config: InternalAxiosRequestConfig): AxiosResponse {
    const pageNumber = Number(request.params.pageNumber);
    const size = Number(request.params.size);

    let dataList: MockActivity[];
    let totalPage: number;
    if (this.pages) {
      dataList = this.pages[pageNumber - 1] ?? [];
      totalPage = this.pages.length;
    } else {
      dataList = this.activities.slice((pageNumber - 1) * size, pageNumber * size);
      totalPage = Math.ceil(this.activities.length / size);
    }

    return this.reply(config, 200, {
      result: "0000",
      message: "OK",
      data: {
        pageNumber,
        ...(this.reportTotalPage ? { totalPage } : {}),
        dataList,
      },
    });
  }

  private download(request: RecordedRequest, config: InternalAxiosRequestConfig): AxiosResponse {
    const activity = this.allActivities().find((candidate) => candidate.labelId === request.params.labelId);
    const format = FORMATS_BY_FILE_TYPE.get(Number(request.params.fileType));
    if (!activity || !format) {
      return this.reply(config, 200, { result: "2001", message: "Activity not found" });
    }
    return this.reply(config, 200, {
      result: "0000",
      message: "OK",
      data: { fileUrl: `${MOCK_FILES_URL}/${activity.labelId}.${format}` },
    });
  }

  private serveFile(request: RecordedRequest, config: InternalAxiosRequestConfig): AxiosResponse {
    const match = /^\/([^/]+)\.([a-z]+)$/.exec(request.path);
    const format = Object.values(ExportFormat).find((value) => value === match?.[2]);
    if (!match || !format) {
      return this.reply(config, 404, "Not Found");
    }
    return this.reply(config, 200, mockExportBytes(match[1], format));
  }

  private allActivities(): MockActivity[] {
    return this.pages ? [...this.activities, ...this.pages.flat()] : this.activities;
  }

  private reply(
    config: InternalAxiosRequestConfig,
    status: number,
    data: unknown,
    headers: RawAxiosResponseHeaders = {}
  ): AxiosResponse {
    return {
      data,
      status,
      statusText: STATUS_TEXT[status] ?? "",
      headers,
      config,
      request: {},
    };
  }
}

export default FakeCorosService;
