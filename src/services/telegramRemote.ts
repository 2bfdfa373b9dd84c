// src/services/telegramRemote.ts

import { TelegramClient } from "telegram";
import { RPCError } from "telegram/errors";
import { Api } from "telegram/tl";
import { RemoteCallError } from "../errors";
import { CachedPeer, EntityId, FolderId } from "../types";
import {
  chatMembership,
  entityIdFromPeer,
  folderFromApiFilter,
  inputPeersFromCached,
  remotePeersFromApi,
  sanitizeText,
  textOf,
} from "../utils/telegramUtils";
import {
  ChatlistUpdatesResult,
  CheckInviteResult,
  DialogFilterUpdate,
  EditInviteRequest,
  ExportedInviteResult,
  ExportedInvitesResult,
  ExportInviteRequest,
  FolderInviteRemote,
  RemoteInvite,
  RemoteUpdates,
} from "./remote";

function toRemoteCallError(error: unknown): RemoteCallError {
  if (error instanceof RPCError) {
    return new RemoteCallError(error.errorMessage);
  }
  return new RemoteCallError(error instanceof Error ? error.message : String(error));
}

function chatlist(folderId: FolderId): Api.InputChatlistDialogFilter {
  return new Api.InputChatlistDialogFilter({ filterId: folderId });
}

function inviteFromApi(invite: Api.TypeExportedChatlistInvite): RemoteInvite {
  return {
    title: sanitizeText(textOf(invite.title)),
    url: invite.url,
    peerIds: invite.peers.map(entityIdFromPeer),
    revoked: invite.revoked === true,
  };
}

/**
 * Extracts dialog filter changes, chats and users from an update batch
 */
export function remoteUpdatesFromApi(updates: Api.TypeUpdates): RemoteUpdates {
  let list: Api.TypeUpdate[] = [];
  let chats: Api.TypeChat[] = [];
  let users: Api.TypeUser[] = [];

  if (updates instanceof Api.Updates || updates instanceof Api.UpdatesCombined) {
    list = updates.updates;
    chats = updates.chats;
    users = updates.users;
  } else if (updates instanceof Api.UpdateShort) {
    list = [updates.update];
  }

  const dialogFilters: DialogFilterUpdate[] = [];
  for (const update of list) {
    if (update instanceof Api.UpdateDialogFilter) {
      dialogFilters.push({
        folderId: update.id,
        filter: update.filter ? folderFromApiFilter(update.filter) : undefined,
      });
    }
  }

  const membership = chatMembership(chats);
  return {
    ...remotePeersFromApi(chats, users),
    dialogFilters,
    joinedEntityIds: membership.joined,
    leftEntityIds: membership.left,
  };
}

/**
 * Folder-invite service backed by the `chatlists.*` methods of a connected
 * Telegram client
 */
export class TelegramFolderInviteRemote implements FolderInviteRemote {
  constructor(private readonly client: Pick<TelegramClient, "invoke">) {}

  private async invoke<R extends Api.AnyRequest>(request: R): Promise<R["__response"]> {
    try {
      return await this.client.invoke(request);
    } catch (error) {
      throw toRemoteCallError(error);
    }
  }

  async exportInvite(request: ExportInviteRequest): Promise<ExportedInviteResult> {
    const result = await this.invoke(
      new Api.chatlists.ExportChatlistInvite({
        chatlist: chatlist(request.folderId),
        title: request.title,
        peers: inputPeersFromCached(request.peers),
      }),
    );
    const invite = inviteFromApi(result.invite);
    return {
      filter: folderFromApiFilter(result.filter) ?? {
        id: request.folderId,
        title: request.title,
        isShared: true,
        includedEntityIds: invite.peerIds,
      },
      invite,
    };
  }

  async getExportedInvites(folderId: FolderId): Promise<ExportedInvitesResult> {
    const result = await this.invoke(new Api.chatlists.GetExportedInvites({ chatlist: chatlist(folderId) }));
    return {
      ...remotePeersFromApi(result.chats, result.users),
      invites: result.invites.map(inviteFromApi),
    };
  }

  async editInvite(request: EditInviteRequest): Promise<RemoteInvite> {
    const result = await this.invoke(
      new Api.chatlists.EditExportedInvite({
        chatlist: chatlist(request.folderId),
        slug: request.slug,
        revoked: request.revoked,
        title: request.title,
        peers: request.peers ? inputPeersFromCached(request.peers) : undefined,
      }),
    );
    return inviteFromApi(result);
  }

  async deleteInvite(folderId: FolderId, slug: string): Promise<void> {
    await this.invoke(new Api.chatlists.DeleteExportedInvite({ chatlist: chatlist(folderId), slug }));
  }

  async checkInvite(slug: string): Promise<CheckInviteResult> {
    const result = await this.invoke(new Api.chatlists.CheckChatlistInvite({ slug }));
    const peers = remotePeersFromApi(result.chats, result.users);
    if (result instanceof Api.chatlists.ChatlistInviteAlready) {
      return {
        ...peers,
        kind: "already",
        folderId: result.filterId,
        missingPeerIds: result.missingPeers.map(entityIdFromPeer),
        alreadyPeerIds: result.alreadyPeers.map(entityIdFromPeer),
      };
    }
    return {
      ...peers,
      kind: "invite",
      title: sanitizeText(textOf(result.title)),
      emoticon: result.emoticon,
      peerIds: result.peers.map(entityIdFromPeer),
    };
  }

  async joinInvite(slug: string, peers: CachedPeer[]): Promise<RemoteUpdates> {
    const result = await this.invoke(new Api.chatlists.JoinChatlistInvite({ slug, peers: inputPeersFromCached(peers) }));
    return remoteUpdatesFromApi(result);
  }

  async getUpdates(folderId: FolderId): Promise<ChatlistUpdatesResult> {
    const result = await this.invoke(new Api.chatlists.GetChatlistUpdates({ chatlist: chatlist(folderId) }));
    return {
      ...remotePeersFromApi(result.chats, result.users),
      missingPeerIds: result.missingPeers.map(entityIdFromPeer),
    };
  }

  async joinUpdates(folderId: FolderId, peers: CachedPeer[]): Promise<RemoteUpdates> {
    const result = await this.invoke(
      new Api.chatlists.JoinChatlistUpdates({ chatlist: chatlist(folderId), peers: inputPeersFromCached(peers) }),
    );
    return remoteUpdatesFromApi(result);
  }

  async hideUpdates(folderId: FolderId): Promise<void> {
    await this.invoke(new Api.chatlists.HideChatlistUpdates({ chatlist: chatlist(folderId) }));
  }

  async leave(folderId: FolderId, peers: CachedPeer[]): Promise<RemoteUpdates> {
    const result = await this.invoke(
      new Api.chatlists.LeaveChatlist({ chatlist: chatlist(folderId), peers: inputPeersFromCached(peers) }),
    );
    return remoteUpdatesFromApi(result);
  }

  async getLeaveSuggestions(folderId: FolderId): Promise<EntityId[]> {
    const result = await this.invoke(new Api.chatlists.GetLeaveChatlistSuggestions({ chatlist: chatlist(folderId) }));
    return result.map(entityIdFromPeer);
  }
}
