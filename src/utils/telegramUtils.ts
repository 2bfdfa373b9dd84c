// src/utils/telegramUtils.ts

import bigInt from "big-integer";
import { Api } from "telegram/tl";
import { RemotePeers } from "../store/filterStore";
import { CachedPeer, EntityId, FolderDefinition, JsonValue, PeerKind, PeerPresence } from "../types";

/**
 * Sanitizes text by removing control characters and unpaired surrogates
 */
export function sanitizeText(text: string | undefined): string {
  if (!text) return "";
  return text
    .replace(/[\u0000-\u001F\u007F-\u009F]/g, "") // Remove control characters
    .replace(/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?:[^\uD800-\uDBFF]|^)[\uDC00-\uDFFF]/g, "")
    .trim()
    .substring(0, 1000); // Limit length for safety
}

/** Plain text of a title that newer layers send with entities. */
export function textOf(value: string | { text: string }): string {
  return typeof value === "string" ? value : value.text;
}

/**
 * Builds the dialog id of a peer: `-100` prefix for channels, `-` for groups
 */
export function dialogId(kind: PeerKind, id: string): EntityId {
  switch (kind) {
    case "channel":
      return `-100${id}`;
    case "group":
      return `-${id}`;
    default:
      return id;
  }
}

export function parseDialogId(entityId: EntityId): { kind: PeerKind; id: string } {
  if (entityId.startsWith("-100")) {
    return { kind: "channel", id: entityId.substring(4) };
  }
  if (entityId.startsWith("-")) {
    return { kind: "group", id: entityId.substring(1) };
  }
  return { kind: "user", id: entityId };
}

export function entityIdFromPeer(peer: Api.TypePeer): EntityId {
  if (peer instanceof Api.PeerUser) {
    return dialogId("user", peer.userId.toString());
  }
  if (peer instanceof Api.PeerChat) {
    return dialogId("group", peer.chatId.toString());
  }
  return dialogId("channel", peer.channelId.toString());
}

export function entityIdFromInputPeer(peer: Api.TypeInputPeer): EntityId | undefined {
  if (peer instanceof Api.InputPeerUser || peer instanceof Api.InputPeerUserFromMessage) {
    return dialogId("user", peer.userId.toString());
  }
  if (peer instanceof Api.InputPeerChat) {
    return dialogId("group", peer.chatId.toString());
  }
  if (peer instanceof Api.InputPeerChannel || peer instanceof Api.InputPeerChannelFromMessage) {
    return dialogId("channel", peer.channelId.toString());
  }
  return undefined;
}

/**
 * Input peer for a cached peer. Users and channels need an access hash.
 */
export function inputPeerFromCached(peer: CachedPeer): Api.TypeInputPeer | undefined {
  const { id } = parseDialogId(peer.id);
  switch (peer.kind) {
    case "group":
      return new Api.InputPeerChat({ chatId: bigInt(id) });
    case "channel":
      if (peer.accessHash === undefined) return undefined;
      return new Api.InputPeerChannel({ channelId: bigInt(id), accessHash: bigInt(peer.accessHash) });
    case "user":
      if (peer.accessHash === undefined) return undefined;
      return new Api.InputPeerUser({ userId: bigInt(id), accessHash: bigInt(peer.accessHash) });
  }
}

export function inputPeersFromCached(peers: CachedPeer[]): Api.TypeInputPeer[] {
  const inputPeers: Api.TypeInputPeer[] = [];
  for (const peer of peers) {
    const inputPeer = inputPeerFromCached(peer);
    if (inputPeer) inputPeers.push(inputPeer);
  }
  return inputPeers;
}

/**
 * Converts a dialog filter into a folder definition. The default "All Chats"
 * filter has no definition.
 */
export function folderFromApiFilter(filter: Api.TypeDialogFilter): FolderDefinition | undefined {
  if (filter instanceof Api.DialogFilterDefault) {
    return undefined;
  }

  const includedEntityIds: EntityId[] = [];
  for (const peer of [...filter.pinnedPeers, ...filter.includePeers]) {
    const id = entityIdFromInputPeer(peer);
    if (id !== undefined && !includedEntityIds.includes(id)) {
      includedEntityIds.push(id);
    }
  }

  return {
    id: filter.id,
    title: sanitizeText(textOf(filter.title)),
    emoticon: filter.emoticon,
    isShared: filter instanceof Api.DialogFilterChatlist,
    includedEntityIds,
  };
}

function peerFromChat(chat: Api.TypeChat): CachedPeer | undefined {
  if (chat instanceof Api.Channel) {
    return {
      id: dialogId("channel", chat.id.toString()),
      kind: "channel",
      title: sanitizeText(chat.title),
      username: chat.username,
      accessHash: chat.accessHash?.toString(),
      isCreator: chat.creator === true,
      canInviteUsers: chat.adminRights?.inviteUsers === true,
      bannedAddMembers: chat.bannedRights?.inviteUsers === true,
      participantsCount: chat.participantsCount,
    };
  }
  if (chat instanceof Api.Chat) {
    const isCreator = chat.creator === true;
    const canInviteUsers = chat.adminRights?.inviteUsers === true;
    return {
      id: dialogId("group", chat.id.toString()),
      kind: "group",
      title: sanitizeText(chat.title),
      isCreator,
      canInviteUsers,
      bannedAddMembers: !isCreator && !canInviteUsers && chat.defaultBannedRights?.inviteUsers === true,
      participantsCount: chat.participantsCount,
    };
  }
  return undefined;
}

function peerFromUser(user: Api.User): CachedPeer {
  const name = [user.firstName, user.lastName].filter((part) => part).join(" ");
  return {
    id: dialogId("user", user.id.toString()),
    kind: "user",
    title: sanitizeText(name || user.username || "Unknown User"),
    username: user.username,
    accessHash: user.accessHash?.toString(),
    isCreator: false,
    canInviteUsers: false,
    bannedAddMembers: false,
  };
}

export function presenceFromStatus(status: Api.TypeUserStatus | undefined): PeerPresence {
  if (status instanceof Api.UserStatusOnline) {
    return { status: "online", lastSeen: status.expires };
  }
  if (status instanceof Api.UserStatusOffline) {
    return { status: "offline", lastSeen: status.wasOnline };
  }
  if (status instanceof Api.UserStatusRecently) {
    return { status: "recently" };
  }
  if (status instanceof Api.UserStatusLastWeek) {
    return { status: "lastWeek" };
  }
  if (status instanceof Api.UserStatusLastMonth) {
    return { status: "lastMonth" };
  }
  return { status: "unknown" };
}

/**
 * Collects the chats and users of a response into cache records
 */
export function remotePeersFromApi(chats: Api.TypeChat[], users: Api.TypeUser[]): RemotePeers {
  const peers: CachedPeer[] = [];
  const presences: Record<EntityId, PeerPresence> = {};

  for (const user of users) {
    if (!(user instanceof Api.User)) continue;
    const peer = peerFromUser(user);
    peers.push(peer);
    presences[peer.id] = presenceFromStatus(user.status);
  }
  for (const chat of chats) {
    const peer = peerFromChat(chat);
    if (peer) peers.push(peer);
  }

  return { peers, presences };
}

/** Splits the chats of an update batch into ones the account is in and ones it left. */
export function chatMembership(chats: Api.TypeChat[]): { joined: EntityId[]; left: EntityId[] } {
  const joined: EntityId[] = [];
  const left: EntityId[] = [];
  for (const chat of chats) {
    if (chat instanceof Api.Channel || chat instanceof Api.ChannelForbidden) {
      const id = dialogId("channel", chat.id.toString());
      if (chat instanceof Api.Channel && chat.left !== true) joined.push(id);
      else left.push(id);
    } else if (chat instanceof Api.Chat || chat instanceof Api.ChatForbidden) {
      const id = dialogId("group", chat.id.toString());
      if (chat instanceof Api.Chat && chat.left !== true) joined.push(id);
      else left.push(id);
    }
  }
  return { joined, left };
}

export function jsonFromApi(value: Api.TypeJSONValue): JsonValue {
  if (value instanceof Api.JsonObject) {
    const object: { [key: string]: JsonValue } = {};
    for (const item of value.value) {
      object[item.key] = jsonFromApi(item.value);
    }
    return object;
  }
  if (value instanceof Api.JsonArray) {
    return value.value.map((item) => jsonFromApi(item));
  }
  if (value instanceof Api.JsonString || value instanceof Api.JsonNumber || value instanceof Api.JsonBool) {
    return value.value;
  }
  return null;
}
