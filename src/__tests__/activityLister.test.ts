import { AxiosAdapter } from "axios";
import { CookieJar } from "tough-cookie";
import ActivityLister, { isLastPage, toActivity } from "../activityLister";
import { CorosClient } from "../shared/corosClient";
import { ApiError, AuthenticationError, NetworkError } from "../shared/errors";
import { createHttpClient } from "../shared/http";
import { Session } from "../shared/types";
import {
  FakeCorosOptions,
  FakeCorosService,
  MOCK_ACCESS_TOKEN,
  MOCK_BASE_URL,
  MOCK_EMAIL,
  MOCK_PASSWORD,
  MockActivity,
  generateMockActivities,
} from "../mocks.setup";

const FAST_RETRY = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

const setup = async (options: FakeCorosOptions, pageSize = 50) => {
  const fake = new FakeCorosService(options);
  const http = createHttpClient({ adapter: fake.adapter });
  const session: Session = await new CorosClient({ baseUrl: MOCK_BASE_URL, http }).authenticate(
    MOCK_EMAIL,
    MOCK_PASSWORD
  );
  const lister = new ActivityLister({ http, pageSize, retry: FAST_RETRY });
  return { fake, session, lister };
};

const chunk = (activities: MockActivity[], sizes: number[]): MockActivity[][] => {
  const pages: MockActivity[][] = [];
  let offset = 0;
  for (const size of sizes) {
    pages.push(activities.slice(offset, offset + size));
    offset += size;
  }
  return pages;
};

describe("isLastPage", () => {
  const entry = {
    labelId: "47000001",
    startTime: 1735713000,
    endTime: 1735715100,
  };

  it("should stop on an empty page", () => {
    expect(isLastPage(1, { dataList: [] })).toBe(true);
    expect(isLastPage(3, { totalPage: 10, dataList: [] })).toBe(true);
  });

  it("should stop once totalPage is reached", () => {
    expect(isLastPage(2, { totalPage: 3, dataList: [entry] })).toBe(false);
    expect(isLastPage(3, { totalPage: 3, dataList: [entry] })).toBe(true);
    expect(isLastPage(4, { totalPage: 3, dataList: [entry] })).toBe(true);
  });

  it("should keep going on a non-empty page without totalPage", () => {
    expect(isLastPage(1, { dataList: [entry] })).toBe(false);
  });
});

describe("toActivity", () => {
  it("should map a raw summary to an Activity", () => {
    const [raw] = generateMockActivities(1);

    expect(toActivity(raw)).toEqual({
      id: "47000001",
      name: "Mock Activity 1",
      activityType: "running",
      sportType: 100,
      distanceMeters: 5100,
      startTime: "2025-01-01T06:30:00.000Z",
      endTime: "2025-01-01T07:05:00.000Z",
      workoutSeconds: 2040,
      totalSeconds: 2100,
    });
  });

  it("should fill in missing optional fields", () => {
    const activity = toActivity({
      labelId: "900",
      name: null,
      sportType: 777,
      startTime: 0,
      endTime: 60,
      distance: "1234.5",
    });

    expect(activity.name).toBe("Unnamed");
    expect(activity.activityType).toBe("other");
    expect(activity.distanceMeters).toBe(1234.5);
    expect(activity.workoutSeconds).toBe(0);
    expect(activity.totalSeconds).toBe(0);
    expect(activity.startTime).toBe("1970-01-01T00:00:00.000Z");
  });

  it("should reject a non-numeric distance", () => {
    expect(() =>
      toActivity({ labelId: "900", startTime: 0, endTime: 60, distance: "far" })
    ).toThrow(ApiError);
  });
});

describe("ActivityLister", () => {
  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should reject an out-of-range page size", () => {
    expect(() => new ActivityLister({ pageSize: 0 })).toThrow(RangeError);
    expect(() => new ActivityLister({ pageSize: 201 })).toThrow(RangeError);
    expect(() => new ActivityLister({ pageSize: 2.5 })).toThrow(RangeError);
  });

  describe("listAllActivities", () => {
    it("should return all 120 activities served as pages of 50, 50 and 20", async () => {
      const all = generateMockActivities(120);
      const { fake, session, lister } = await setup({ pages: chunk(all, [50, 50, 20]) });

      const activities = await lister.listAllActivities(session);

      expect(activities).toHaveLength(120);
      expect(new Set(activities.map((activity) => activity.id)).size).toBe(120);
      expect(activities.map((activity) => activity.id)).toEqual(all.map((raw) => raw.labelId));
      expect(fake.requestsTo("/activity/query")).toHaveLength(3);
    });

    it("should stop on an empty page when totalPage is not reported", async () => {
      const all = generateMockActivities(120);
      const { fake, session, lister } = await setup({
        pages: chunk(all, [50, 50, 20]),
        reportTotalPage: false,
      });

      const activities = await lister.listAllActivities(session);

      expect(activities).toHaveLength(120);
      expect(fake.requestsTo("/activity/query").map((request) => request.params.pageNumber)).toEqual([
        "1",
        "2",
        "3",
        "4",
      ]);
    });

    it("should not depend on the server's page sizes", async () => {
      const all = generateMockActivities(120);
      const { session, lister } = await setup({ pages: chunk(all, [30, 50, 7, 33]) }, 100);

      const activities = await lister.listAllActivities(session);

      expect(activities).toHaveLength(120);
    });

    it.each([1, 7, 50, 200])("should list everything with a page size of %d", async (pageSize) => {
      const { fake, session, lister } = await setup(
        { activities: generateMockActivities(120) },
        pageSize
      );

      const activities = await lister.listAllActivities(session);

      expect(activities).toHaveLength(120);
      expect(fake.requestsTo("/activity/query")).toHaveLength(Math.ceil(120 / pageSize));
    });

    it("should return nothing for an account without activities", async () => {
      const { fake, session, lister } = await setup({ activities: [] });

      const activities = await lister.listAllActivities(session);

      expect(activities).toEqual([]);
      expect(fake.requestsTo("/activity/query")).toHaveLength(1);
    });

    it("should drop activities repeated across pages", async () => {
      const all = generateMockActivities(5);
      const { session, lister } = await setup({ pages: [all.slice(0, 3), all.slice(2, 5)] });

      const activities = await lister.listAllActivities(session);

      expect(activities.map((activity) => activity.id)).toEqual([
        "47000001",
        "47000002",
        "47000003",
        "47000004",
        "47000005",
      ]);
    });

    it("should send the session headers and 1-based paging params", async () => {
      const { fake, session, lister } = await setup({ activities: generateMockActivities(3) });

      await lister.listAllActivities(session);

      const [query] = fake.requestsTo("/activity/query");
      expect(query.params).toEqual({ size: "50", pageNumber: "1", modeList: "" });
      expect(query.headers.accesstoken).toBe(MOCK_ACCESS_TOKEN);
      expect(query.headers.yfheader).toBe('{"userId":"4200"}');
      expect(query.headers.cookie).toContain(`CPL-coros-token=${MOCK_ACCESS_TOKEN}`);
    });

    it("should retry a page after a transient network failure", async () => {
      const all = generateMockActivities(10);
      const { fake, session, lister } = await setup({ pages: chunk(all, [5, 5]) });
      fake.fail({ path: "/activity/query", pageNumber: 2, kind: "network", times: 1 });

      const activities = await lister.listAllActivities(session);

      expect(activities).toHaveLength(10);
      expect(fake.requestsTo("/activity/query")).toHaveLength(3);
    });

    it("should give up with NetworkError once retries are exhausted", async () => {
      const { fake, session, lister } = await setup({ activities: generateMockActivities(3) });
      fake.fail({ path: "/activity/query", kind: "server" });

      await expect(lister.listAllActivities(session)).rejects.toBeInstanceOf(NetworkError);
      expect(fake.requestsTo("/activity/query")).toHaveLength(3);
    });

    it("should fail with ApiError on a malformed page without retrying", async () => {
      const all = generateMockActivities(10);
      const { fake, session, lister } = await setup({ pages: chunk(all, [5, 5]) });
      fake.fail({ path: "/activity/query", pageNumber: 2, kind: "malformed" });

      await expect(lister.listAllActivities(session)).rejects.toBeInstanceOf(ApiError);
      expect(fake.requestsTo("/activity/query")).toHaveLength(2);
    });

    it("should fail with AuthenticationError when the token is rejected", async () => {
      const { fake, session, lister } = await setup({ activities: generateMockActivities(3) });
      fake.fail({ path: "/activity/query", kind: "invalid-token" });

      await expect(lister.listAllActivities(session)).rejects.toBeInstanceOf(AuthenticationError);
    });
  });
});

describe("ActivityLister with large numeric ids", () => {
  const session: Session = {
    accessToken: "test-token",
    userId: "4200",
    baseUrl: MOCK_BASE_URL,
    cookieJar: new CookieJar(),
  };

  // Serves one raw JSON page, parsed by axios itself
  const listerServing = (labelId: string) => {
    const body =
      '{"result":"0000","data":{"totalPage":1,"dataList":' +
      `[{"labelId":${labelId},"name":"Long Run","sportType":100,"startTime":1735713000,"endTime":1735715100}]}}`;
    const adapter: AxiosAdapter = async (config) => ({
      data: body,
      status: 200,
      statusText: "OK",
      headers: {},
      config,
    });
    return new ActivityLister({ http: createHttpClient({ adapter }), retry: FAST_RETRY });
  };

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("should reject an 18-digit numeric id instead of rounding it", async () => {
    await expect(listerServing("466436848513409183").listAllActivities(session)).rejects.toBeInstanceOf(
      ApiError
    );
  });

  it("should keep an 18-digit string id exact", async () => {
    const activities = await listerServing('"466436848513409183"').listAllActivities(session);

    expect(activities.map((activity) => activity.id)).toEqual(["466436848513409183"]);
  });
});
