import * as path from "path";
import pLimit from "p-limit";
import { AxiosAdapter } from "axios";
import ActivityDownloader from "./activityDownloader";
import ActivityLister from "./activityLister";
import StateStore from "./stateStore";
import { writeFileAtomic } from "./shared/atomicWrite";
import { CorosClient } from "./shared/corosClient";
import { AuthenticationError, errorMessage } from "./shared/errors";
import { createHttpClient } from "./shared/http";
import {
  Activity,
  BackupReport,
  Credentials,
  DEFAULT_RETRY,
  ExportFormat,
  RetryOptions,
  Session,
} from "./shared/types";

export type BackupLog = Pick<Console, "log" | "warn" | "error">;

export interface BackupOrchestratorOptions {
  backupDir: string;
  formats: ExportFormat[];
  client: CorosClient;
  lister: ActivityLister;
  downloader: ActivityDownloader;
  stateStore?: StateStore;
  concurrency?: number;
  log?: BackupLog;
}

export interface CreateOrchestratorOptions {
  backupDir: string;
  formats: ExportFormat[];
  baseUrl?: string;
  pageSize?: number;
  concurrency?: number;
  retry?: RetryOptions;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
  log?: BackupLog;
}

/**
 * `<YYYY-MM-DD>_<id>`, from the UTC start date. Stable across runs so a
 * retried activity overwrites its own files.
 */
export const activityFilePrefix = (activity: Activity): string => {
  const date = activity.startTime.slice(0, 10);
  const id = activity.id.replace(/[^A-Za-z0-9_-]/g, "_");
  return `${date}_${id}`;
};

export const metadataFileName = (activity: Activity): string =>
  `${activityFilePrefix(activity)}-metadata.json`;

export const exportFileName = (activity: Activity, format: ExportFormat): string =>
  `${activityFilePrefix(activity)}.${format}`;

/**
 * One backup run: authenticate, list, diff against state, download what is
 * missing and commit each activity once all of its files are on disk.
 */
export class BackupOrchestrator {
  private readonly backupDir: string;
  private readonly formats: ExportFormat[];
  private readonly client: CorosClient;
  private readonly lister: ActivityLister;
  private readonly downloader: ActivityDownloader;
  private readonly stateStore: StateStore;
  private readonly concurrency: number;
  private readonly log: BackupLog;

  constructor(options: BackupOrchestratorOptions) {
    if (options.formats.length === 0) {
      throw new Error("At least one export format is required");
    }
    const concurrency = options.concurrency ?? 1;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError("Concurrency must be a positive integer");
    }

    this.backupDir = options.backupDir;
    this.formats = [...new Set(options.formats)];
    this.client = options.client;
    this.lister = options.lister;
    this.downloader = options.downloader;
    this.stateStore = options.stateStore ?? new StateStore(options.backupDir);
    this.concurrency = concurrency;
    this.log = options.log ?? console;
  }

  /**
   * Wire every component onto one shared HTTP client
   */
  static create(options: CreateOrchestratorOptions): BackupOrchestrator {
    const http = createHttpClient({ timeoutMs: options.timeoutMs, adapter: options.adapter });
    const retry = options.retry ?? DEFAULT_RETRY;

    return new BackupOrchestrator({
      backupDir: options.backupDir,
      formats: options.formats,
      client: new CorosClient({ baseUrl: options.baseUrl, http }),
      lister: new ActivityLister({ http, pageSize: options.pageSize, retry }),
      downloader: new ActivityDownloader({ http, retry }),
      concurrency: options.concurrency,
      log: options.log,
    });
  }

  getStateStore(): StateStore {
    return this.stateStore;
  }

  async run(credentials: Credentials, signal?: AbortSignal): Promise<BackupReport> {
    const startedAt = new Date().toISOString();
    this.log.log(`🚀 Starting backup to ${this.backupDir} (${this.formats.join(", ")})`);

    await this.stateStore.load();

    const session = await this.client.authenticate(credentials.email, credentials.password, signal);
    const remote = await this.lister.listAllActivities(session, signal);

    const missing = remote.filter((activity) => !this.stateStore.contains(activity.id));
    const report: BackupReport = {
      startedAt,
      finishedAt: startedAt,
      activitiesFound: remote.length,
      activitiesDownloaded: 0,
      activitiesSkipped: remote.length - missing.length,
      activitiesFailed: 0,
      failedActivityIds: [],
      failures: [],
      formatsDownloaded: {},
      cancelled: false,
    };

    if (missing.length === 0) {
      this.log.log("✅ Everything is already backed up");
    } else {
      this.log.log(
        `📋 ${missing.length} new activities to back up (${report.activitiesSkipped} already present)`
      );
    }

    const halt: { error?: AuthenticationError } = {};
    const limit = pLimit(this.concurrency);

    await Promise.all(
      missing.map((activity, index) =>
        limit(async () => {
          if (signal?.aborted || halt.error) return;
          try {
            await this.backupActivity(session, activity, report, signal);
            report.activitiesDownloaded++;
            this.log.log(
              `  ✓ ${index + 1}/${missing.length}: ${activity.name} (${activity.id})`
            );
          } catch (error) {
            report.activitiesFailed++;
            report.failedActivityIds.push(activity.id);
            report.failures.push({ activityId: activity.id, error: errorMessage(error) });
            this.log.warn(`  ⚠️  Failed to back up ${activity.id}: ${errorMessage(error)}`);
            // A rejected session fails every remaining request the same way
            if (error instanceof AuthenticationError && !halt.error) {
              halt.error = error;
            }
          }
        })
      )
    );

    report.cancelled = signal?.aborted ?? false;
    report.finishedAt = new Date().toISOString();
    await this.stateStore.finalize({
      finishedAt: report.finishedAt,
      activitiesDownloaded: report.activitiesDownloaded,
    });

    this.log.log(
      `🏁 Backup finished: ${report.activitiesDownloaded} new, ` +
        `${report.activitiesSkipped} skipped, ${report.activitiesFailed} failed` +
        (report.cancelled ? " (cancelled)" : "")
    );

    if (halt.error) {
      throw halt.error;
    }
    return report;
  }

  /**
   * Write metadata and every requested export, then commit. Any failure
   * leaves the activity uncommitted so the next run retries all of it.
   */
  private async backupActivity(
    session: Session,
    activity: Activity,
    report: BackupReport,
    signal?: AbortSignal
  ): Promise<void> {
    const metadata = this.downloader.fetchMetadata(activity);
    await writeFileAtomic(
      path.join(this.backupDir, metadataFileName(activity)),
      JSON.stringify(metadata, null, 2)
    );

    for (const format of this.formats) {
      const bytes = await this.downloader.fetchExport(session, activity, format, signal);
      await writeFileAtomic(path.join(this.backupDir, exportFileName(activity, format)), bytes);
      report.formatsDownloaded[format] = (report.formatsDownloaded[format] ?? 0) + 1;
    }

    await this.stateStore.commit(activity.id, metadata);
  }
}

export default BackupOrchestrator;
