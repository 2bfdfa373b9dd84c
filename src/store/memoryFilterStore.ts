// src/store/memoryFilterStore.ts

import { CachedPeer, EntityId, FiltersState, FolderDefinition, Logger, PeerPresence, PendingUpdateRecord } from "../types";
import { EMPTY_FILTERS_STATE, FolderStoreTransaction, LocalFilterStore } from "./filterStore";
import { StateCell, StateFeed } from "./stateFeed";

export interface MemoryFilterStoreSeed {
  filters?: FolderDefinition[];
  updates?: PendingUpdateRecord[];
  peers?: CachedPeer[];
  chatListPeerIds?: EntityId[];
}

/**
 * In-process store. A transaction works on copies and commits them when its
 * body returns; a body that throws leaves the store untouched.
 */
export class MemoryFilterStore implements LocalFilterStore {
  private readonly state: StateCell<FiltersState>;
  private peers = new Map<EntityId, CachedPeer>();
  private presences = new Map<EntityId, PeerPresence>();
  private chatList = new Set<EntityId>();
  private tail: Promise<void> = Promise.resolve();

  constructor(seed: MemoryFilterStoreSeed = {}, logger: Logger = console) {
    const filters = seed.filters ?? [];
    this.state = new StateCell<FiltersState>(
      {
        ...EMPTY_FILTERS_STATE,
        filters,
        remoteFilters: filters,
        updates: seed.updates ?? [],
      },
      logger,
    );
    for (const peer of seed.peers ?? []) {
      this.peers.set(peer.id, peer);
    }
    for (const id of seed.chatListPeerIds ?? []) {
      this.chatList.add(id);
    }
  }

  get filtersState(): StateFeed<FiltersState> {
    return this.state;
  }

  transaction<T>(body: (tx: FolderStoreTransaction) => T): Promise<T> {
    const run = this.tail.then(() => this.commit(body));
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private commit<T>(body: (tx: FolderStoreTransaction) => T): T {
    let state = this.state.get();
    const peers = new Map(this.peers);
    const presences = new Map(this.presences);
    const chatList = new Set(this.chatList);

    const tx: FolderStoreTransaction = {
      getFiltersState: () => state,
      updateFiltersState: (update) => {
        state = update(state);
        return state;
      },
      getPeer: (id) => peers.get(id),
      getPeerPresence: (id) => presences.get(id),
      hasChatListPresence: (id) => chatList.has(id),
      setChatListPresence: (ids, present) => {
        for (const id of ids) {
          if (present) chatList.add(id);
          else chatList.delete(id);
        }
      },
      updatePeers: (updated) => {
        for (const peer of updated) {
          peers.set(peer.id, peer);
        }
      },
      updatePeerPresences: (updated) => {
        for (const [id, presence] of Object.entries(updated)) {
          presences.set(id, presence);
        }
      },
    };

    const result = body(tx);

    this.peers = peers;
    this.presences = presences;
    this.chatList = chatList;
    if (state !== this.state.get()) {
      this.state.set(state);
    }
    return result;
  }
}
