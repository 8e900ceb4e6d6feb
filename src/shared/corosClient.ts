import * as bcrypt from "bcryptjs";
import * as crypto from "crypto";
import { AxiosInstance, AxiosResponse } from "axios";
import { CookieJar } from "tough-cookie";
import { AuthenticationError, NetworkError, errorMessage } from "./errors";
import { DEFAULT_BASE_URL, createHttpClient, toRequestError } from "./http";
import { EnvelopeSchema, LoginDataSchema, SUCCESS_RESULT, describeIssues } from "./schemas";
import { Session } from "./types";

const SALT_ROUNDS = 10;
const TOKEN_COOKIE = "CPL-coros-token";

export interface LoginDigest {
  p1: string; // bcrypt hash
  p2: string; // salt
}

/**
 * The web client hashes `md5(password)` with a fresh bcrypt salt and sends
 * both the hash and the salt. `salt` is only fixed in tests.
 */
export const computeLoginDigest = (password: string, salt?: string): LoginDigest => {
  const md5Hex = crypto.createHash("md5").update(password, "utf8").digest("hex");
  const p2 = salt ?? bcrypt.genSaltSync(SALT_ROUNDS);
  return { p1: bcrypt.hashSync(md5Hex, p2), p2 };
};

export interface CorosClientOptions {
  baseUrl?: string;
  http?: AxiosInstance;
}

/**
 * Session manager for the COROS Training Hub API
 */
export class CorosClient {
  private readonly baseUrl: string;
  private readonly http: AxiosInstance;

  constructor(options: CorosClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.http = options.http ?? createHttpClient();
  }

  /**
   * Exchange credentials for a Session. The password only ever appears in
   * the login request body.
   */
  async authenticate(email: string, password: string, signal?: AbortSignal): Promise<Session> {
    if (!email.trim() || !password) {
      throw new AuthenticationError("Email and password are required");
    }

    console.log(`🔐 Authenticating with COROS as ${email}...`);
    const url = `${this.baseUrl}/account/login`;

    let response: AxiosResponse;
    try {
      response = await this.http.post(
        url,
        { account: email, accountType: 2, ...computeLoginDigest(password) },
        { headers: { "Content-Type": "application/json" }, signal }
      );
    } catch (error) {
      throw toRequestError(error, "Login");
    }

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationError(`Auth failed: HTTP ${response.status}`);
    }
    if (response.status < 200 || response.status >= 300) {
      throw new NetworkError(`Login: HTTP ${response.status}`, response.status);
    }

    const envelope = EnvelopeSchema.safeParse(response.data);
    if (!envelope.success) {
      throw new NetworkError(`Login: malformed response (${describeIssues(envelope.error)})`);
    }
    if (envelope.data.result !== SUCCESS_RESULT) {
      throw new AuthenticationError(
        `Auth failed: ${envelope.data.message ?? "Unknown error"} (code ${envelope.data.result})`
      );
    }
    const login = LoginDataSchema.safeParse(envelope.data.data);
    if (!login.success) {
      throw new NetworkError(`Login: malformed response (${describeIssues(login.error)})`);
    }

    const cookieJar = new CookieJar();
    await this.storeResponseCookies(cookieJar, response, url);
    await cookieJar.setCookie(`${TOKEN_COOKIE}=${login.data.accessToken}; Path=/`, this.baseUrl);

    console.log(`✅ Successfully authenticated (user ${login.data.userId})`);

    return {
      accessToken: login.data.accessToken,
      userId: login.data.userId,
      baseUrl: this.baseUrl,
      cookieJar,
    };
  }

  private async storeResponseCookies(
    jar: CookieJar,
    response: AxiosResponse,
    url: string
  ): Promise<void> {
    const raw: unknown = response.headers["set-cookie"];
    const cookies = Array.isArray(raw) ? raw : typeof raw === "string" ? [raw] : [];

    for (const cookie of cookies) {
      if (typeof cookie !== "string") continue;
      try {
        await jar.setCookie(cookie, url);
      } catch (error) {
        console.warn(`  ⚠️  Ignoring unparseable cookie from login response: ${errorMessage(error)}`);
      }
    }
  }
}

export default CorosClient;
