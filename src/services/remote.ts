// src/services/remote.ts

import { RemotePeers } from "../store/filterStore";
import { CachedPeer, EntityId, FolderDefinition, FolderId } from "../types";

export interface RemoteInvite {
  title: string;
  url: string;
  peerIds: EntityId[];
  revoked: boolean;
}

export interface ExportedInviteResult {
  filter: FolderDefinition;
  invite: RemoteInvite;
}

export interface ExportedInvitesResult extends RemotePeers {
  invites: RemoteInvite[];
}

/** A folder link the account has not joined yet. */
export interface FreshInviteResult extends RemotePeers {
  kind: "invite";
  title: string;
  emoticon?: string;
  peerIds: EntityId[];
}

/** A folder link that belongs to a folder the account already has. */
export interface AlreadyJoinedInviteResult extends RemotePeers {
  kind: "already";
  folderId: FolderId;
  missingPeerIds: EntityId[];
  alreadyPeerIds: EntityId[];
}

export type CheckInviteResult = FreshInviteResult | AlreadyJoinedInviteResult;

/** `filter` is absent when the folder was deleted. */
export interface DialogFilterUpdate {
  folderId: FolderId;
  filter?: FolderDefinition;
}

/** Update batch the server sends back for membership-changing calls. */
export interface RemoteUpdates extends RemotePeers {
  dialogFilters: DialogFilterUpdate[];
  joinedEntityIds: EntityId[];
  leftEntityIds: EntityId[];
}

export interface ChatlistUpdatesResult extends RemotePeers {
  missingPeerIds: EntityId[];
}

export interface ExportInviteRequest {
  folderId: FolderId;
  title: string;
  peers: CachedPeer[];
}

/** Only the fields that are present are sent. */
export interface EditInviteRequest {
  folderId: FolderId;
  slug: string;
  title?: string;
  peers?: CachedPeer[];
  revoked?: boolean;
}

/**
 * Remote folder-invite service. Every call rejects with `RemoteCallError`
 * carrying the server's error code.
 */
export interface FolderInviteRemote {
  exportInvite(request: ExportInviteRequest): Promise<ExportedInviteResult>;
  getExportedInvites(folderId: FolderId): Promise<ExportedInvitesResult>;
  editInvite(request: EditInviteRequest): Promise<RemoteInvite>;
  deleteInvite(folderId: FolderId, slug: string): Promise<void>;
  checkInvite(slug: string): Promise<CheckInviteResult>;
  joinInvite(slug: string, peers: CachedPeer[]): Promise<RemoteUpdates>;
  getUpdates(folderId: FolderId): Promise<ChatlistUpdatesResult>;
  joinUpdates(folderId: FolderId, peers: CachedPeer[]): Promise<RemoteUpdates>;
  hideUpdates(folderId: FolderId): Promise<void>;
  leave(folderId: FolderId, peers: CachedPeer[]): Promise<RemoteUpdates>;
  getLeaveSuggestions(folderId: FolderId): Promise<EntityId[]>;
}
