// src/types.ts

/** Folder (dialog filter) identifier, a 32-bit signed integer unique per account. */
export type FolderId = number;

/**
 * Dialog id of a chat: users are their numeric id, basic groups `-<id>`,
 * channels and supergroups `-100<id>`.
 */
export type EntityId = string;

export type PeerKind = "user" | "group" | "channel";

/** Peer record held in the local peer cache. */
export interface CachedPeer {
  id: EntityId;
  kind: PeerKind;
  title: string;
  username?: string;
  accessHash?: string;
  isCreator: boolean;
  canInviteUsers: boolean;
  bannedAddMembers: boolean;
  participantsCount?: number;
}

export type PresenceStatus = "online" | "offline" | "recently" | "lastWeek" | "lastMonth" | "unknown";

export interface PeerPresence {
  status: PresenceStatus;
  lastSeen?: number;
}

export interface SharedLinkInfo {
  title: string;
  link: string;
  slug: string;
  memberEntityIds: EntityId[];
  revoked: boolean;
}

export interface LimitsTable {
  maxSharedFolderLinks: number;
  maxSharedFolderJoins: number;
  maxFolders: number;
  maxFolderChats: number;
}

export interface FolderDefinition {
  id: FolderId;
  title: string;
  emoticon?: string;
  isShared: boolean;
  includedEntityIds: EntityId[];
}

/** Chats added to a shared folder by its owner that are not in the local copy yet. */
export interface PendingUpdateRecord {
  folderId: FolderId;
  /** Unix seconds of the poll that produced the record. */
  timestamp: number;
  missingEntityIds: EntityId[];
  memberCounts: Record<EntityId, number>;
}

export interface FiltersState {
  filters: FolderDefinition[];
  /** Last filter list acknowledged by the server. */
  remoteFilters: FolderDefinition[];
  updates: PendingUpdateRecord[];
}

export interface JoinFolderResult {
  folderId: FolderId;
  title: string;
  newChatCount: number;
}

export interface FolderLinkPreview {
  localFilterId?: FolderId;
  title?: string;
  peers: CachedPeer[];
  alreadyMemberPeerIds: ReadonlySet<EntityId>;
  memberCounts: Record<EntityId, number>;
}

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/** Snapshot of the server-provided app configuration. */
export type AppConfig = Record<string, JsonValue>;

export interface Logger {
  log(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export interface TelegramConfig {
  apiId: number;
  apiHash: string;
  session?: string;
}
