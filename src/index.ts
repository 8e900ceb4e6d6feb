import ActivityDownloader from "./activityDownloader";
import ActivityLister from "./activityLister";
import BackupOrchestrator from "./backupOrchestrator";
import StateStore from "./stateStore";
import { CorosClient } from "./shared/corosClient";

export * from "./shared/errors";
export * from "./shared/types";
export { writeFileAtomic } from "./shared/atomicWrite";
export { loadConfig, ConfigError } from "./config";
export type { BackupConfig } from "./config";
export { isLastPage } from "./activityLister";
export { activityFilePrefix } from "./backupOrchestrator";
export { ActivityDownloader, ActivityLister, BackupOrchestrator, CorosClient, StateStore };
export default { ActivityDownloader, ActivityLister, BackupOrchestrator, CorosClient, StateStore };
