// src/index.ts

export * from "./types";
export * from "./errors";
export { getFolderSyncConfig, FolderSyncConfig } from "./config";
export { resolveLimits, quotaLimit, FolderLimits, DEFAULT_STANDARD_LIMITS, DEFAULT_PREMIUM_LIMITS } from "./utils/limits";
export { slugFromLink, linkFromSlug, renderFolderLinkQrCode, FOLDER_LINK_PREFIX } from "./utils/folderLinks";

export { StateCell, StateFeed, Unsubscribe, mapDistinct, waitFor } from "./store/stateFeed";
export { LocalFilterStore, FolderStoreTransaction, EMPTY_FILTERS_STATE } from "./store/filterStore";
export { MemoryFilterStore, MemoryFilterStoreSeed } from "./store/memoryFilterStore";

export { FolderSyncContext } from "./services/context";
export { FolderInviteRemote } from "./services/remote";
export { UpdatesApplier, StoreUpdatesApplier } from "./services/updatesApplier";
export {
  exportFolderLink,
  editFolderLink,
  revokeFolderLink,
  getExportedFolderLinks,
  FolderLinkChanges,
} from "./services/linkLifecycle";
export { canShareLinkToPeer, checkFolderLink, joinFolderLink, JoinOptions } from "./services/linkResolution";
export {
  FolderUpdates,
  FolderUpdatesPoller,
  DebounceCache,
  PollFailurePolicy,
  absorbAndCacheEmpty,
  subscribeFolderUpdates,
  joinAvailableChats,
  dismissFolderUpdates,
  leaveFolder,
  requestLeaveFolderSuggestions,
} from "./services/folderUpdates";
export { TelegramFolderInviteRemote } from "./services/telegramRemote";
export { createClient, isAuthorized, fetchAppConfig, createTelegramFolderSync, disconnect } from "./services/telegramService";
