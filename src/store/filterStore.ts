// src/store/filterStore.ts

import { CachedPeer, EntityId, FiltersState, FolderDefinition, FolderId, PeerPresence, PendingUpdateRecord } from "../types";
import { StateFeed } from "./stateFeed";

/** Reads and writes available inside one store transaction. */
export interface FolderStoreTransaction {
  getFiltersState(): FiltersState;
  updateFiltersState(update: (state: FiltersState) => FiltersState): FiltersState;
  getPeer(id: EntityId): CachedPeer | undefined;
  getPeerPresence(id: EntityId): PeerPresence | undefined;
  /** Whether the chat is in the account's chat list. */
  hasChatListPresence(id: EntityId): boolean;
  setChatListPresence(ids: EntityId[], present: boolean): void;
  updatePeers(peers: CachedPeer[]): void;
  updatePeerPresences(presences: Record<EntityId, PeerPresence>): void;
}

/**
 * Local cache of folders, pending folder updates and peers. Transactions
 * run one at a time; `filtersState` emits after each commit that changed it.
 */
export interface LocalFilterStore {
  transaction<T>(body: (tx: FolderStoreTransaction) => T): Promise<T>;
  readonly filtersState: StateFeed<FiltersState>;
}

export const EMPTY_FILTERS_STATE: FiltersState = { filters: [], remoteFilters: [], updates: [] };

export function findFilter(state: FiltersState, folderId: FolderId): FolderDefinition | undefined {
  return state.filters.find((filter) => filter.id === folderId);
}

/** Replaces the filter with the same id in place, or appends it. */
export function upsertFilter(filters: FolderDefinition[], filter: FolderDefinition): FolderDefinition[] {
  const index = filters.findIndex((item) => item.id === filter.id);
  if (index === -1) {
    return [...filters, filter];
  }
  const next = [...filters];
  next[index] = filter;
  return next;
}

export function removePendingUpdates(state: FiltersState, folderId: FolderId): FiltersState {
  return { ...state, updates: state.updates.filter((record) => record.folderId !== folderId) };
}

/** Drops any record for the folder, then appends the new one. */
export function replacePendingUpdates(state: FiltersState, record: PendingUpdateRecord): FiltersState {
  const cleared = removePendingUpdates(state, record.folderId);
  return { ...cleared, updates: [...cleared.updates, record] };
}

/** Peers and presences that came back with a remote response. */
export interface RemotePeers {
  peers: CachedPeer[];
  presences: Record<EntityId, PeerPresence>;
}

export function mergeRemotePeers(tx: FolderStoreTransaction, remote: RemotePeers): void {
  tx.updatePeers(remote.peers);
  tx.updatePeerPresences(remote.presences);
}

/** Looks up cached peers, skipping ids the cache does not know. */
export function resolvePeers(tx: FolderStoreTransaction, ids: EntityId[]): CachedPeer[] {
  const peers: CachedPeer[] = [];
  for (const id of ids) {
    const peer = tx.getPeer(id);
    if (peer) peers.push(peer);
  }
  return peers;
}

/** Participant counts of channels, keyed by entity id. */
export function channelMemberCounts(peers: CachedPeer[]): Record<EntityId, number> {
  const counts: Record<EntityId, number> = {};
  for (const peer of peers) {
    if (peer.kind === "channel" && peer.participantsCount !== undefined) {
      counts[peer.id] = peer.participantsCount;
    }
  }
  return counts;
}
