#!/usr/bin/env node
import * as dotenv from "dotenv";
import BackupOrchestrator from "./backupOrchestrator";
import StateStore from "./stateStore";
import { BackupConfig, ConfigError, loadConfig } from "./config";
import {
  FakeCorosService,
  MOCK_BASE_URL,
  MOCK_EMAIL,
  MOCK_PASSWORD,
  generateMockActivities,
} from "./mocks.setup";
import { AuthenticationError, errorMessage } from "./shared/errors";
import { BackupReport, Credentials } from "./shared/types";

// Load environment variables
dotenv.config();

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL = 2;

export const formatSummary = (report: BackupReport): string[] => {
  const lines = [
    "=".repeat(60),
    "Backup Summary",
    "=".repeat(60),
    `Activities found:     ${report.activitiesFound}`,
    `  - Downloaded:       ${report.activitiesDownloaded}`,
    `  - Skipped (cached): ${report.activitiesSkipped}`,
    `  - Failed:           ${report.activitiesFailed}`,
  ];

  const formats = Object.entries(report.formatsDownloaded);
  if (formats.length > 0) {
    lines.push("", "Formats downloaded:");
    for (const [format, count] of formats) {
      lines.push(`  - ${format.toUpperCase()}: ${count} files`);
    }
  }

  if (report.failures.length > 0) {
    lines.push("", "Failed activities (retried on the next run):");
    for (const failure of report.failures) {
      lines.push(`  - ${failure.activityId}: ${failure.error}`);
    }
  }

  if (report.cancelled) {
    lines.push("", "Run was cancelled; remaining activities will be picked up next time.");
  }
  lines.push("=".repeat(60));
  return lines;
};

const printStats = async (config: BackupConfig): Promise<void> => {
  const store = new StateStore(config.backupDir);
  await store.load();
  const stats = store.stats();
  console.log(`Backup directory: ${config.backupDir}`);
  console.log(`Last backup:      ${stats.lastBackup ?? "never"}`);
  console.log(`Total backed up:  ${stats.totalActivities} activities`);
  console.log(`State entries:    ${stats.downloadedIdsCount} unique ids`);
};

async function main(): Promise<number> {
  let config: BackupConfig;
  try {
    config = loadConfig(process.argv.slice(2), process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ Error: ${error.message}`);
      return EXIT_FATAL;
    }
    throw error;
  }

  if (config.statsOnly) {
    await printStats(config);
    return EXIT_OK;
  }

  console.log("🚀 COROS Activity Backup");
  console.log("========================\n");

  let credentials: Credentials;
  let orchestrator: BackupOrchestrator;

  if (config.mockMode) {
    console.log("🔄 Running in MOCK mode (test data)\n");
    const fake = new FakeCorosService({ activities: generateMockActivities(12) });
    credentials = { email: MOCK_EMAIL, password: MOCK_PASSWORD };
    orchestrator = BackupOrchestrator.create({
      backupDir: config.backupDir,
      formats: config.formats,
      baseUrl: MOCK_BASE_URL,
      pageSize: config.pageSize,
      concurrency: config.concurrency,
      adapter: fake.adapter,
    });
  } else {
    if (!config.email || !config.password) {
      console.error("❌ Error: Credentials are required");
      console.error("Please provide COROS_EMAIL and COROS_PASSWORD in .env");
      return EXIT_FATAL;
    }
    credentials = { email: config.email, password: config.password };
    orchestrator = BackupOrchestrator.create({
      backupDir: config.backupDir,
      formats: config.formats,
      baseUrl: config.baseUrl,
      pageSize: config.pageSize,
      concurrency: config.concurrency,
    });
  }

  // First Ctrl+C stops scheduling new activities; committed ones stay committed
  const controller = new AbortController();
  const onSigint = () => {
    console.warn("\n⏹️  Interrupted, finishing up...");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const report = await orchestrator.run(credentials, controller.signal);
    console.log("");
    formatSummary(report).forEach((line) => console.log(line));
    return report.activitiesFailed > 0 || report.cancelled ? EXIT_PARTIAL : EXIT_OK;
  } catch (error) {
    if (error instanceof AuthenticationError) {
      console.error(`❌ Authentication failed: ${error.message}`);
    } else {
      console.error(`❌ Backup failed: ${errorMessage(error)}`);
    }
    return EXIT_FATAL;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((error) => {
      console.error("Fatal error:", error);
      process.exit(EXIT_FATAL);
    });
}
