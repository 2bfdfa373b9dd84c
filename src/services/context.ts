// src/services/context.ts

import { FolderSyncConfig } from "../config";
import { LocalFilterStore } from "../store/filterStore";
import { AppConfig, Logger } from "../types";
import { FolderLimits, resolveLimits } from "../utils/limits";
import { FolderInviteRemote } from "./remote";
import { UpdatesApplier } from "./updatesApplier";

/** Everything the folder link operations need for one account. */
export interface FolderSyncContext {
  accountId: string;
  store: LocalFilterStore;
  remote: FolderInviteRemote;
  updates: UpdatesApplier;
  /** Read on quota errors only. */
  getAppConfig: () => Promise<AppConfig>;
  isPremium: () => Promise<boolean>;
  config: Pick<FolderSyncConfig, "updatesRefreshIntervalSeconds" | "joinConfirmationTimeoutMs">;
  logger: Logger;
}

/** Limits for the caller's tier at the time of the call. */
export async function currentLimits(ctx: FolderSyncContext): Promise<FolderLimits> {
  const [appConfig, premium] = await Promise.all([ctx.getAppConfig(), ctx.isPremium()]);
  return resolveLimits(appConfig, premium);
}
