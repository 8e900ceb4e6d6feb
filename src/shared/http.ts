import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from "axios";
import { z } from "zod";
import { ApiError, AuthenticationError, NetworkError } from "./errors";
import {
  EnvelopeSchema,
  INVALID_TOKEN_RESULT,
  SUCCESS_RESULT,
  describeIssues,
} from "./schemas";
import { RetryOptions, Session } from "./types";

export const DEFAULT_BASE_URL = "https://teameuapi.coros.com";
export const DEFAULT_TIMEOUT_MS = 30_000;

// The Training Hub web client sends these; the API is picky about Origin/Referer
const BROWSER_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "application/json, text/plain, */*",
  "Accept-Language": "en-US,en;q=0.9",
  Origin: "https://training.coros.com",
  Referer: "https://training.coros.com/",
};

export interface HttpClientOptions {
  timeoutMs?: number;
  // Swapped for an in-process fake in tests and mock mode
  adapter?: AxiosAdapter;
}

export const createHttpClient = (options: HttpClientOptions = {}): AxiosInstance =>
  axios.create({
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    headers: BROWSER_HEADERS,
    // Status codes are classified by hand, see ensureSuccessStatus
    validateStatus: () => true,
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

/**
 * Headers that authenticate a request on behalf of the session.
 */
export const sessionHeaders = async (
  session: Session,
  url: string
): Promise<Record<string, string>> => {
  const headers: Record<string, string> = {
    accesstoken: session.accessToken,
    yfheader: JSON.stringify({ userId: session.userId }),
  };
  const cookie = await session.cookieJar.getCookieString(url);
  if (cookie) {
    headers.Cookie = cookie;
  }
  return headers;
};

export const isRetryableStatus = (status: number): boolean =>
  status === 408 || status === 429 || status >= 500;

export const ensureSuccessStatus = (response: AxiosResponse, label: string): void => {
  const { status } = response;
  if (status >= 200 && status < 300) return;

  if (status === 401 || status === 403) {
    throw new AuthenticationError(`${label}: session rejected (HTTP ${status})`);
  }
  if (isRetryableStatus(status)) {
    throw new NetworkError(`${label}: HTTP ${status}`, status);
  }
  throw new ApiError(`${label}: unexpected HTTP ${status}`, { status });
};

/**
 * Map anything thrown by axios to the error taxonomy. Errors that are
 * already classified pass through unchanged.
 */
export const toRequestError = (error: unknown, label: string): Error => {
  if (
    error instanceof AuthenticationError ||
    error instanceof NetworkError ||
    error instanceof ApiError
  ) {
    return error;
  }
  if (axios.isCancel(error)) {
    return new NetworkError(`${label}: request aborted`);
  }
  if (axios.isAxiosError(error)) {
    return new NetworkError(
      `${label}: ${error.code ?? error.message}`,
      error.response?.status
    );
  }
  return new NetworkError(`${label}: ${error instanceof Error ? error.message : String(error)}`);
};

/**
 * Validate the COROS envelope and its `data` payload.
 */
export const unwrapEnvelope = <T extends z.ZodTypeAny>(
  body: unknown,
  schema: T,
  label: string
): z.output<T> => {
  const envelope = EnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new ApiError(`${label}: malformed response (${describeIssues(envelope.error)})`);
  }

  const { result, message } = envelope.data;
  if (result === INVALID_TOKEN_RESULT) {
    throw new AuthenticationError(`${label}: access token is invalid (${message ?? "no message"})`);
  }
  if (result !== SUCCESS_RESULT) {
    throw new ApiError(`${label}: API error (code ${result}): ${message ?? "Unknown error"}`, {
      resultCode: result,
    });
  }

  const data = schema.safeParse(envelope.data.data);
  if (!data.success) {
    throw new ApiError(`${label}: unexpected data shape (${describeIssues(data.error)})`);
  }
  return data.data;
};

// Resolves early once `signal` fires
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export const backoffDelay = (attempt: number, retry: RetryOptions): number =>
  Math.min(retry.baseDelayMs * 2 ** (attempt - 1), retry.maxDelayMs);

export interface RetryContext {
  retry: RetryOptions;
  label: string;
  signal?: AbortSignal;
}

/**
 * Run a request, retrying NetworkError with exponential backoff up to
 * `retry.maxAttempts` attempts in total. Everything else surfaces at once.
 */
export const withRetry = async <T>(
  operation: () => Promise<T>,
  { retry, label, signal }: RetryContext
): Promise<T> => {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (
        !(error instanceof NetworkError) ||
        attempt >= retry.maxAttempts ||
        signal?.aborted
      ) {
        throw error;
      }
      const delay = backoffDelay(attempt, retry);
      console.warn(
        `  ⏳ ${label} failed (${error.message}), retrying in ${delay}ms [${attempt + 1}/${retry.maxAttempts}]`
      );
      await sleep(delay, signal);
      if (signal?.aborted) {
        throw error;
      }
    }
  }
};
