// src/services/folderUpdates.ts

import { translateRemoteError } from "../errors";
import {
  channelMemberCounts,
  findFilter,
  mergeRemotePeers,
  removePendingUpdates,
  replacePendingUpdates,
  resolvePeers,
} from "../store/filterStore";
import { mapDistinct, Unsubscribe } from "../store/stateFeed";
import { CachedPeer, EntityId, FiltersState, FolderId, FolderLinkPreview, PendingUpdateRecord } from "../types";
import { currentLimits, FolderSyncContext } from "./context";
import { JOIN_QUOTA_ERRORS } from "./linkResolution";
import { ChatlistUpdatesResult, RemoteUpdates } from "./remote";

/**
 * Chats a shared folder's owner added that the account has not joined.
 * Two values are equal when they name the same folder and the same missing
 * chats in the same order.
 */
export class FolderUpdates {
  constructor(
    readonly folderId: FolderId,
    readonly title: string,
    readonly missingPeers: readonly CachedPeer[],
    readonly memberCounts: Readonly<Record<EntityId, number>>,
  ) {}

  get availableChatsToJoin(): number {
    return this.missingPeers.length;
  }

  toLinkPreview(): FolderLinkPreview {
    return {
      localFilterId: this.folderId,
      title: this.title,
      peers: [...this.missingPeers],
      alreadyMemberPeerIds: new Set(),
      memberCounts: { ...this.memberCounts },
    };
  }

  equals(other: FolderUpdates): boolean {
    return this.folderId === other.folderId && sameIds(this.missingPeers.map((peer) => peer.id), other.missingPeers.map((peer) => peer.id));
  }
}

function sameIds(a: readonly EntityId[], b: readonly EntityId[]): boolean {
  return a.length === b.length && a.every((id, index) => id === b[index]);
}

export interface DebounceKey {
  accountId: string;
  folderId: FolderId;
}

/**
 * Folders whose updates were polled at least once. Lives as long as the
 * poller that owns it.
 */
export class DebounceCache {
  private readonly observed = new Set<string>();

  private static keyOf(key: DebounceKey): string {
    return `${key.accountId}:${key.folderId}`;
  }

  has(key: DebounceKey): boolean {
    return this.observed.has(DebounceCache.keyOf(key));
  }

  markObserved(key: DebounceKey): void {
    this.observed.add(DebounceCache.keyOf(key));
  }

  clear(): void {
    this.observed.clear();
  }
}

/**
 * Decides what a failed poll leaves behind. Returning a record caches it;
 * returning `undefined` leaves the current record alone.
 */
export interface PollFailurePolicy {
  readonly name: string;
  onFailure(folderId: FolderId, timestamp: number, error: unknown): PendingUpdateRecord | undefined;
}

/** Treats any failure as "nothing missing" so the folder is not polled again until the interval passes. */
export const absorbAndCacheEmpty: PollFailurePolicy = {
  name: "absorbAndCacheEmpty",
  onFailure: (folderId, timestamp) => ({ folderId, timestamp, missingEntityIds: [], memberCounts: {} }),
};

export interface FolderUpdatesPollerOptions {
  debounce?: DebounceCache;
  failurePolicy?: PollFailurePolicy;
  /** Current time in milliseconds. */
  now?: () => number;
}

export class FolderUpdatesPoller {
  readonly debounce: DebounceCache;
  private readonly failurePolicy: PollFailurePolicy;
  private readonly now: () => number;

  constructor(
    private readonly ctx: FolderSyncContext,
    options: FolderUpdatesPollerOptions = {},
  ) {
    this.debounce = options.debounce ?? new DebounceCache();
    this.failurePolicy = options.failurePolicy ?? absorbAndCacheEmpty;
    this.now = options.now ?? Date.now;
  }

  private unixTime(): number {
    return Math.floor(this.now() / 1000);
  }

  /**
   * Refreshes the pending updates of a folder. The first poll of a folder
   * always asks the server; later ones only once the cached record is older
   * than the refresh interval.
   */
  async poll(folderId: FolderId): Promise<void> {
    const { ctx } = this;
    const state = await ctx.store.transaction((tx) => tx.getFiltersState());
    const key: DebounceKey = { accountId: ctx.accountId, folderId };

    if (this.debounce.has(key)) {
      const current = state.updates.find((record) => record.folderId === folderId);
      if (current && current.timestamp + ctx.config.updatesRefreshIntervalSeconds >= this.unixTime()) {
        return;
      }
    } else {
      this.debounce.markObserved(key);
    }

    let result: ChatlistUpdatesResult;
    try {
      result = await ctx.remote.getUpdates(folderId);
    } catch (error) {
      ctx.logger.warn(`FolderUpdates: Poll of folder ${folderId} failed, applying ${this.failurePolicy.name}`);
      const record = this.failurePolicy.onFailure(folderId, this.unixTime(), error);
      if (record) {
        await ctx.store.transaction((tx) => {
          tx.updateFiltersState((current) => replacePendingUpdates(current, record));
        });
      }
      return;
    }

    await ctx.store.transaction((tx) => {
      mergeRemotePeers(tx, result);
      const record: PendingUpdateRecord = {
        folderId,
        timestamp: this.unixTime(),
        missingEntityIds: result.missingPeerIds,
        memberCounts: channelMemberCounts(result.peers),
      };
      tx.updateFiltersState((current) => replacePendingUpdates(current, record));
    });
  }
}

interface PendingFolderState {
  folderId: FolderId;
  title: string;
  peerIds: EntityId[];
  memberCounts: Record<EntityId, number>;
}

export function derivePendingFolderState(state: FiltersState, folderId: FolderId): PendingFolderState | null {
  const record = state.updates.find((item) => item.folderId === folderId);
  if (!record) return null;
  const folder = findFilter(state, folderId);
  if (!folder || !folder.isShared) return null;

  const peerIds = record.missingEntityIds.filter((id) => !folder.includedEntityIds.includes(id));
  if (peerIds.length === 0) return null;
  return { folderId, title: folder.title, peerIds, memberCounts: record.memberCounts };
}

function samePendingState(a: PendingFolderState | null, b: PendingFolderState | null): boolean {
  if (a === null || b === null) return a === b;
  return a.folderId === b.folderId && sameIds(a.peerIds, b.peerIds);
}

/**
 * Watches a folder for chats that can be joined. The listener gets the
 * current value right away and then each change of folder or missing chats;
 * `null` means nothing to join. Values equal under `FolderUpdates.equals` are
 * delivered once.
 */
export function subscribeFolderUpdates(
  ctx: FolderSyncContext,
  folderId: FolderId,
  listener: (updates: FolderUpdates | null) => void,
): Unsubscribe {
  const derived = mapDistinct(ctx.store.filtersState, (state) => derivePendingFolderState(state, folderId), samePendingState);
  let generation = 0;
  let active = true;
  let delivered: FolderUpdates | null | undefined;

  const unsubscribe = derived.subscribe((pending) => {
    const current = ++generation;
    if (!pending) {
      delivered = null;
      listener(null);
      return;
    }
    ctx.store
      .transaction((tx) => resolvePeers(tx, pending.peerIds))
      .then((peers) => {
        if (!active || current !== generation) return;
        const next = new FolderUpdates(pending.folderId, pending.title, peers, pending.memberCounts);
        // Ids the peer cache does not know resolve to nothing.
        if (delivered && delivered.equals(next)) return;
        delivered = next;
        listener(next);
      })
      .catch((error: unknown) => {
        ctx.logger.error(`FolderUpdates: Error delivering updates of folder ${folderId}:`, error);
      });
  });

  return () => {
    active = false;
    unsubscribe();
  };
}

/**
 * Joins some of the chats offered by a folder update
 */
export async function joinAvailableChats(ctx: FolderSyncContext, updates: FolderUpdates, entityIds: EntityId[]): Promise<void> {
  const peers = await ctx.store.transaction((tx) => resolvePeers(tx, entityIds));
  let result: RemoteUpdates;
  try {
    result = await ctx.remote.joinUpdates(updates.folderId, peers);
  } catch (error) {
    ctx.logger.warn(`FolderUpdates: Joining chats of folder ${updates.folderId} was rejected`);
    throw await translateRemoteError(error, "joinAvailableChats", JOIN_QUOTA_ERRORS, () => currentLimits(ctx));
  }
  ctx.updates.addUpdates(result);
}

/**
 * Hides a folder's pending updates. The local record is removed first and
 * stays removed even if the server is not told.
 */
export async function dismissFolderUpdates(ctx: FolderSyncContext, folderId: FolderId): Promise<void> {
  await ctx.store.transaction((tx) => {
    tx.updateFiltersState((state) => removePendingUpdates(state, folderId));
  });
  try {
    await ctx.remote.hideUpdates(folderId);
  } catch (error) {
    ctx.logger.warn(`FolderUpdates: Server did not hide updates of folder ${folderId}:`, error);
  }
}

/**
 * Leaves a shared folder, optionally leaving some of its chats too. Failures
 * are logged and not rethrown.
 */
export async function leaveFolder(ctx: FolderSyncContext, folderId: FolderId, removeEntityIds: EntityId[]): Promise<void> {
  const peers = await ctx.store.transaction((tx) => resolvePeers(tx, removeEntityIds));
  try {
    ctx.updates.addUpdates(await ctx.remote.leave(folderId, peers));
  } catch (error) {
    ctx.logger.warn(`FolderUpdates: Leaving folder ${folderId} failed:`, error);
  }
}

/** Chats of a folder the server suggests leaving along with it. */
export async function requestLeaveFolderSuggestions(ctx: FolderSyncContext, folderId: FolderId): Promise<EntityId[]> {
  try {
    return await ctx.remote.getLeaveSuggestions(folderId);
  } catch (error) {
    ctx.logger.warn(`FolderUpdates: Could not load leave suggestions for folder ${folderId}:`, error);
    return [];
  }
}
