// src/services/linkResolution.ts

import { GenericFolderError, QuotaErrorTable, translateRemoteError } from "../errors";
import {
  channelMemberCounts,
  findFilter,
  FolderStoreTransaction,
  mergeRemotePeers,
  resolvePeers,
} from "../store/filterStore";
import { waitFor } from "../store/stateFeed";
import { CachedPeer, EntityId, FolderLinkPreview, JoinFolderResult } from "../types";
import { currentLimits, FolderSyncContext } from "./context";
import { AlreadyJoinedInviteResult, CheckInviteResult, FreshInviteResult, RemoteUpdates } from "./remote";

/** Quota codes of calls that add chats or folders to the account. */
export const JOIN_QUOTA_ERRORS: QuotaErrorTable = {
  USER_CHANNELS_TOO_MUCH: { kind: "channelCount", field: "maxFolderChats" },
  DIALOG_FILTERS_TOO_MUCH: { kind: "dialogFilterCount", field: "maxFolders" },
  COMMUNITIES_TOO_MUCH: { kind: "sharedFolderJoinCount", field: "maxSharedFolderJoins" },
  FILTERS_TOO_MUCH: { kind: "sharedFolderJoinCount", field: "maxSharedFolderJoins" },
};

/**
 * Whether the account may put a chat into a folder link it shares
 */
export function canShareLinkToPeer(peer: CachedPeer): boolean {
  switch (peer.kind) {
    case "channel":
      return peer.isCreator || peer.canInviteUsers || peer.username !== undefined;
    case "group":
      return !peer.bannedAddMembers;
    default:
      return false;
  }
}

function freshPreview(tx: FolderStoreTransaction, result: FreshInviteResult): FolderLinkPreview {
  const peers: CachedPeer[] = [];
  const alreadyMemberPeerIds = new Set<EntityId>();
  for (const id of result.peerIds) {
    const peer = tx.getPeer(id);
    if (!peer) continue;
    peers.push(peer);
    if (tx.hasChatListPresence(id)) {
      alreadyMemberPeerIds.add(id);
    }
  }
  // A folder that is not joined yet offers every chat as new, even the ones
  // already in the chat list.
  alreadyMemberPeerIds.clear();

  return {
    title: result.title,
    peers,
    alreadyMemberPeerIds,
    memberCounts: channelMemberCounts(result.peers),
  };
}

function alreadyJoinedPreview(tx: FolderStoreTransaction, result: AlreadyJoinedInviteResult): FolderLinkPreview {
  const localFilter = findFilter(tx.getFiltersState(), result.folderId);
  const includedIds = localFilter?.includedEntityIds ?? [];

  const peers: CachedPeer[] = [];
  const alreadyMemberPeerIds = new Set<EntityId>();
  for (const id of result.missingPeerIds) {
    const peer = tx.getPeer(id);
    if (!peer) continue;
    peers.push(peer);
    if (includedIds.includes(id) && tx.hasChatListPresence(id)) {
      alreadyMemberPeerIds.add(id);
    }
  }
  for (const id of includedIds) {
    if (peers.some((peer) => peer.id === id)) continue;
    const peer = tx.getPeer(id);
    if (peer && canShareLinkToPeer(peer)) {
      peers.push(peer);
      if (tx.hasChatListPresence(id)) {
        alreadyMemberPeerIds.add(id);
      }
    }
  }

  return {
    localFilterId: result.folderId,
    title: localFilter?.title,
    peers,
    alreadyMemberPeerIds,
    memberCounts: channelMemberCounts(result.peers),
  };
}

/**
 * Resolves a folder link slug into a preview of the chats behind it
 */
export async function checkFolderLink(ctx: FolderSyncContext, slug: string): Promise<FolderLinkPreview> {
  let result: CheckInviteResult;
  try {
    result = await ctx.remote.checkInvite(slug);
  } catch {
    throw new GenericFolderError("checkFolderLink");
  }

  return ctx.store.transaction((tx) => {
    mergeRemotePeers(tx, result);
    return result.kind === "invite" ? freshPreview(tx, result) : alreadyJoinedPreview(tx, result);
  });
}

export interface JoinOptions {
  /** Aborting stops the wait for the folder to appear locally. */
  signal?: AbortSignal;
}

/**
 * Joins the chats of a folder link. Resolves only after the joined folder is
 * present in the local filter list.
 */
export async function joinFolderLink(
  ctx: FolderSyncContext,
  slug: string,
  entityIds: EntityId[],
  options: JoinOptions = {},
): Promise<JoinFolderResult> {
  const { peers, newChatCount } = await ctx.store.transaction((tx) => ({
    peers: resolvePeers(tx, entityIds),
    newChatCount: entityIds.filter((id) => tx.hasChatListPresence(id)).length,
  }));

  let updates: RemoteUpdates;
  try {
    updates = await ctx.remote.joinInvite(slug, peers);
  } catch (error) {
    ctx.logger.warn(`FolderLinks: Join of ${slug} was rejected`);
    throw await translateRemoteError(error, "joinFolderLink", JOIN_QUOTA_ERRORS, () => currentLimits(ctx));
  }

  ctx.updates.addUpdates(updates);

  const update = updates.dialogFilters.at(0);
  const filter = update?.filter;
  if (!update || !filter) {
    ctx.logger.warn(`FolderLinks: Join of ${slug} returned no folder`);
    throw new GenericFolderError("joinFolderLink");
  }
  const result: JoinFolderResult = { folderId: update.folderId, title: filter.title, newChatCount };

  await waitFor(
    ctx.store.filtersState,
    (state) => findFilter(state, result.folderId) !== undefined,
    { signal: options.signal, timeoutMs: ctx.config.joinConfirmationTimeoutMs, operation: "joinFolderLink" },
  );

  ctx.logger.log(`FolderLinks: Joined folder ${result.folderId} from ${slug}`);
  return result;
}
