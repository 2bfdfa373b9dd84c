// src/services/updatesApplier.ts

import { LocalFilterStore, mergeRemotePeers, upsertFilter } from "../store/filterStore";
import { FiltersState, Logger } from "../types";
import { DialogFilterUpdate, RemoteUpdates } from "./remote";

/** Hands remote update batches to whatever keeps local state current. */
export interface UpdatesApplier {
  addUpdates(updates: RemoteUpdates): void;
}

export function applyDialogFilterUpdates(state: FiltersState, updates: DialogFilterUpdate[]): FiltersState {
  let filters = state.filters;
  for (const update of updates) {
    filters = update.filter
      ? upsertFilter(filters, update.filter)
      : filters.filter((filter) => filter.id !== update.folderId);
  }
  if (filters === state.filters) {
    return state;
  }
  return { ...state, filters, remoteFilters: filters };
}

/**
 * Applies update batches to a store one after another. `addUpdates` returns
 * immediately; `flush` resolves once everything queued so far is applied.
 */
export class StoreUpdatesApplier implements UpdatesApplier {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: LocalFilterStore,
    private readonly logger: Logger = console,
  ) {}

  addUpdates(updates: RemoteUpdates): void {
    this.queue = this.queue
      .then(() => this.apply(updates))
      .catch((error: unknown) => {
        this.logger.error("UpdatesApplier: Error applying updates:", error);
      });
  }

  flush(): Promise<void> {
    return this.queue;
  }

  private apply(updates: RemoteUpdates): Promise<void> {
    return this.store.transaction((tx) => {
      mergeRemotePeers(tx, updates);
      tx.setChatListPresence(updates.joinedEntityIds, true);
      tx.setChatListPresence(updates.leftEntityIds, false);
      if (updates.dialogFilters.length > 0) {
        tx.updateFiltersState((state) => applyDialogFilterUpdates(state, updates.dialogFilters));
      }
    });
  }
}
