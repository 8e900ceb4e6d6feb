import * as fs from "fs";
import * as path from "path";
import { writeFileAtomic } from "./shared/atomicWrite";
import { FileSystemError, StateCorruptionError, errorMessage } from "./shared/errors";
import { BackupStateSchema, describeIssues } from "./shared/schemas";
import { ActivityMetadata, BackupState, BackupStats } from "./shared/types";

export const STATE_FILE_NAME = ".coros-backup-state.json";

export interface RunSummary {
  finishedAt: string;
  activitiesDownloaded: number;
}

export const emptyState = (): BackupState => ({
  lastBackupTimestamp: null,
  totalActivitiesBackedUp: 0,
  lastSyncedActivityId: null,
  backedUpActivityIds: [],
});

/**
 * Persisted record of fully backed-up activities. Every mutation is written
 * to disk (temp file, then rename) before the call resolves, and writes are
 * queued so concurrent callers never interleave.
 */
export class StateStore {
  readonly statePath: string;
  private state: BackupState = emptyState();
  private known = new Set<string>();
  private loaded = false;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(backupDir: string) {
    this.statePath = path.join(backupDir, STATE_FILE_NAME);
  }

  /**
   * Read the state file. A missing file means a first run; anything
   * unreadable is an error.
   */
  async load(): Promise<BackupState> {
    let raw: string | undefined;
    try {
      raw = await fs.promises.readFile(this.statePath, "utf-8");
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) {
        throw new FileSystemError(
          `Failed to read state file: ${errorMessage(error)}`,
          this.statePath,
          { cause: error }
        );
      }
    }

    this.state = raw === undefined ? emptyState() : this.parse(raw);
    this.known = new Set(this.state.backedUpActivityIds);
    this.loaded = true;

    if (raw === undefined) {
      console.log("🆕 No backup state found, starting a full backup");
    } else {
      console.log(`📂 Loaded backup state with ${this.known.size} activities`);
    }
    return this.snapshot();
  }

  contains(activityId: string): boolean {
    this.ensureLoaded();
    return this.known.has(activityId);
  }

  /**
   * Mark an activity as fully backed up. Only call once its metadata and
   * every requested export are on disk.
   */
  async commit(activityId: string, metadata: ActivityMetadata): Promise<void> {
    this.ensureLoaded();
    if (metadata.activityId !== activityId) {
      throw new Error(`Metadata for ${metadata.activityId} passed to commit of ${activityId}`);
    }
    if (this.known.has(activityId)) {
      throw new Error(`Activity ${activityId} is already committed`);
    }

    this.known.add(activityId);
    this.state.backedUpActivityIds.push(activityId);
    this.state.totalActivitiesBackedUp += 1;
    const previousLastSynced = this.state.lastSyncedActivityId;
    this.state.lastSyncedActivityId = activityId;

    try {
      await this.persist();
    } catch (error) {
      this.known.delete(activityId);
      this.state.backedUpActivityIds = this.state.backedUpActivityIds.filter((id) => id !== activityId);
      this.state.totalActivitiesBackedUp -= 1;
      if (this.state.lastSyncedActivityId === activityId) {
        this.state.lastSyncedActivityId = previousLastSynced;
      }
      throw error;
    }
  }

  async finalize(summary: RunSummary): Promise<void> {
    this.ensureLoaded();
    this.state.lastBackupTimestamp = summary.finishedAt;
    await this.persist();
  }

  stats(): BackupStats {
    this.ensureLoaded();
    return {
      lastBackup: this.state.lastBackupTimestamp,
      totalActivities: this.state.totalActivitiesBackedUp,
      downloadedIdsCount: this.known.size,
    };
  }

  snapshot(): BackupState {
    return { ...this.state, backedUpActivityIds: [...this.state.backedUpActivityIds] };
  }

  private parse(raw: string): BackupState {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StateCorruptionError(
        `State file is not valid JSON: ${errorMessage(error)}`,
        this.statePath,
        { cause: error }
      );
    }

    const parsed = BackupStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new StateCorruptionError(
        `State file has an unexpected shape (${describeIssues(parsed.error)})`,
        this.statePath
      );
    }
    return {
      ...parsed.data,
      backedUpActivityIds: [...new Set(parsed.data.backedUpActivityIds)],
    };
  }

  private persist(): Promise<void> {
    const contents = JSON.stringify(this.snapshot(), null, 2);
    const write = this.writeQueue.then(() => writeFileAtomic(this.statePath, contents));
    // Keep the queue alive after a failed write; the caller still sees the rejection
    this.writeQueue = write.catch((error: unknown) => {
      console.error(`❌ Failed to save backup state: ${errorMessage(error)}`);
    });
    return write;
  }

  private ensureLoaded(): void {
    if (!this.loaded) {
      throw new Error("StateStore.load() must be called first");
    }
  }
}

export default StateStore;
