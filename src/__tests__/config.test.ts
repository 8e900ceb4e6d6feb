import * as path from "path";
import { ConfigError, DEFAULT_BACKUP_DIR, loadConfig, parseFormats } from "../config";
import { DEFAULT_BASE_URL } from "../shared/http";
import { ExportFormat } from "../shared/types";

describe("parseFormats", () => {
  it("should split, normalize and deduplicate formats", () => {
    expect(parseFormats(["FIT, tcx", "gpx,fit"])).toEqual([
      ExportFormat.FIT,
      ExportFormat.TCX,
      ExportFormat.GPX,
    ]);
  });

  it("should reject an unknown format", () => {
    expect(() => parseFormats(["fit,json"])).toThrow(
      'Invalid format "json" (expected one of: fit, tcx, gpx, kml, csv)'
    );
  });
});

describe("loadConfig", () => {
  it("should fall back to defaults", () => {
    expect(loadConfig([], {})).toEqual({
      email: undefined,
      password: undefined,
      backupDir: path.resolve(DEFAULT_BACKUP_DIR),
      formats: [ExportFormat.FIT, ExportFormat.TCX],
      baseUrl: DEFAULT_BASE_URL,
      pageSize: 100,
      concurrency: 1,
      mockMode: false,
      statsOnly: false,
    });
  });

  it("should read settings from the environment", () => {
    const config = loadConfig([], {
      COROS_EMAIL: "runner@example.com",
      COROS_PASSWORD: "test-secret",
      COROS_BACKUP_DIR: "/tmp/coros-env",
      COROS_FORMATS: "gpx, KML",
      COROS_API_BASE_URL: "https://teamapi.coros.com",
      COROS_PAGE_SIZE: "50",
      COROS_CONCURRENCY: "3",
      MOCK_MODE: "true",
    });

    expect(config).toEqual({
      email: "runner@example.com",
      password: "test-secret",
      backupDir: "/tmp/coros-env",
      formats: [ExportFormat.GPX, ExportFormat.KML],
      baseUrl: "https://teamapi.coros.com",
      pageSize: 50,
      concurrency: 3,
      mockMode: true,
      statsOnly: false,
    });
  });

  it("should let command-line flags override the environment", () => {
    const config = loadConfig(
      [
        "--format",
        "fit",
        "--format=csv,gpx",
        "--backup-dir",
        "/tmp/coros-cli",
        "--page-size=200",
        "--concurrency",
        "4",
        "--mock",
        "--stats",
      ],
      { COROS_FORMATS: "kml", COROS_BACKUP_DIR: "/tmp/coros-env", COROS_CONCURRENCY: "2" }
    );

    expect(config.formats).toEqual([ExportFormat.FIT, ExportFormat.CSV, ExportFormat.GPX]);
    expect(config.backupDir).toBe("/tmp/coros-cli");
    expect(config.pageSize).toBe(200);
    expect(config.concurrency).toBe(4);
    expect(config.mockMode).toBe(true);
    expect(config.statsOnly).toBe(true);
  });

  it("should ignore an empty backup directory setting", () => {
    expect(loadConfig([], { COROS_BACKUP_DIR: "" }).backupDir).toBe(path.resolve(DEFAULT_BACKUP_DIR));
  });

  it("should require at least one format", () => {
    expect(() => loadConfig([], { COROS_FORMATS: " , " })).toThrow(
      new ConfigError("At least one export format is required")
    );
  });

  it.each([
    [["--page-size", "201"], 'Page size must be an integer between 1 and 200, got "201"'],
    [["--page-size", "0"], 'Page size must be an integer between 1 and 200, got "0"'],
    [["--concurrency", "abc"], 'Concurrency must be an integer, got "abc"'],
    [["--concurrency=2.5"], 'Concurrency must be an integer, got "2.5"'],
  ])("should reject %p", (argv, message) => {
    expect(() => loadConfig(argv, {})).toThrow(message);
  });

  it("should raise ConfigError for invalid input", () => {
    expect(() => loadConfig(["--format", "zip"], {})).toThrow(ConfigError);
  });
});
