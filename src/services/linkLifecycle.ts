// src/services/linkLifecycle.ts

import { GenericFolderError, QuotaErrorTable, translateRemoteError } from "../errors";
import { mergeRemotePeers, resolvePeers, upsertFilter } from "../store/filterStore";
import { EntityId, FolderId, SharedLinkInfo } from "../types";
import { sharedLinkInfo } from "../utils/folderLinks";
import { currentLimits, FolderSyncContext } from "./context";
import { EditInviteRequest, ExportedInviteResult, RemoteInvite } from "./remote";

const EXPORT_QUOTA_ERRORS: QuotaErrorTable = {
  INVITES_TOO_MUCH: { kind: "sharedFolderInviteLinkCount", field: "maxSharedFolderLinks" },
  COMMUNITIES_TOO_MUCH: { kind: "sharedFolderJoinCount", field: "maxSharedFolderJoins" },
};

/**
 * Creates an invite link for a folder and stores the folder definition the
 * server returns
 */
export async function exportFolderLink(
  ctx: FolderSyncContext,
  folderId: FolderId,
  title: string,
  entityIds: EntityId[],
): Promise<SharedLinkInfo> {
  const peers = await ctx.store.transaction((tx) => resolvePeers(tx, entityIds));

  let result: ExportedInviteResult;
  try {
    result = await ctx.remote.exportInvite({ folderId, title, peers });
  } catch (error) {
    ctx.logger.warn(`FolderLinks: Export for folder ${folderId} was rejected`);
    throw await translateRemoteError(error, "exportFolderLink", EXPORT_QUOTA_ERRORS, () => currentLimits(ctx));
  }

  await ctx.store.transaction((tx) => {
    tx.updateFiltersState((state) => {
      const filters = upsertFilter(state.filters, result.filter);
      return { ...state, filters, remoteFilters: filters };
    });
  });

  ctx.logger.log(`FolderLinks: Exported link for folder ${folderId} with ${result.invite.peerIds.length} chats`);
  return sharedLinkInfo(result.invite);
}

export interface FolderLinkChanges {
  title?: string;
  entityIds?: EntityId[];
  revoke?: boolean;
}

/**
 * Edits an existing link. Only the changes that are present are sent.
 */
export async function editFolderLink(
  ctx: FolderSyncContext,
  folderId: FolderId,
  link: SharedLinkInfo,
  changes: FolderLinkChanges,
): Promise<SharedLinkInfo> {
  const request = await ctx.store.transaction((tx) => {
    const edit: EditInviteRequest = { folderId, slug: link.slug };
    if (changes.revoke) {
      edit.revoked = true;
    }
    if (changes.title !== undefined) {
      edit.title = changes.title;
    }
    if (changes.entityIds !== undefined) {
      edit.peers = resolvePeers(tx, changes.entityIds);
    }
    return edit;
  });

  let invite: RemoteInvite;
  try {
    invite = await ctx.remote.editInvite(request);
  } catch {
    throw new GenericFolderError("editFolderLink");
  }
  return sharedLinkInfo(invite);
}

/** Deletes a link by slug. */
export async function revokeFolderLink(ctx: FolderSyncContext, folderId: FolderId, link: SharedLinkInfo): Promise<void> {
  try {
    await ctx.remote.deleteInvite(folderId, link.slug);
  } catch {
    throw new GenericFolderError("revokeFolderLink");
  }
  ctx.logger.log(`FolderLinks: Deleted link ${link.slug} of folder ${folderId}`);
}

/**
 * Lists the links exported for a folder, or `null` when the server could not
 * be asked
 */
export async function getExportedFolderLinks(ctx: FolderSyncContext, folderId: FolderId): Promise<SharedLinkInfo[] | null> {
  try {
    const result = await ctx.remote.getExportedInvites(folderId);
    return await ctx.store.transaction((tx) => {
      mergeRemotePeers(tx, result);
      return result.invites.map(sharedLinkInfo);
    });
  } catch (error) {
    ctx.logger.warn(`FolderLinks: Could not load links of folder ${folderId}:`, error);
    return null;
  }
}
