import { vi } from "vitest";
import { RemoteCallError } from "../errors";
import { FolderSyncContext } from "../services/context";
import {
  ChatlistUpdatesResult,
  CheckInviteResult,
  EditInviteRequest,
  ExportedInviteResult,
  ExportedInvitesResult,
  ExportInviteRequest,
  FolderInviteRemote,
  RemoteInvite,
  RemoteUpdates,
} from "../services/remote";
import { StoreUpdatesApplier, UpdatesApplier } from "../services/updatesApplier";
import { MemoryFilterStore, MemoryFilterStoreSeed } from "../store/memoryFilterStore";
import { AppConfig, CachedPeer, EntityId, FolderDefinition, FolderId } from "../types";

export function channel(id: string, overrides: Partial<CachedPeer> = {}): CachedPeer {
  return {
    id: `-100${id}`,
    kind: "channel",
    title: `Channel ${id}`,
    accessHash: "1",
    isCreator: false,
    canInviteUsers: false,
    bannedAddMembers: false,
    ...overrides,
  };
}

export function group(id: string, overrides: Partial<CachedPeer> = {}): CachedPeer {
  return {
    id: `-${id}`,
    kind: "group",
    title: `Group ${id}`,
    isCreator: false,
    canInviteUsers: false,
    bannedAddMembers: false,
    ...overrides,
  };
}

export function user(id: string, overrides: Partial<CachedPeer> = {}): CachedPeer {
  return {
    id,
    kind: "user",
    title: `User ${id}`,
    accessHash: "1",
    isCreator: false,
    canInviteUsers: false,
    bannedAddMembers: false,
    ...overrides,
  };
}

export function folder(id: FolderId, includedEntityIds: EntityId[], overrides: Partial<FolderDefinition> = {}): FolderDefinition {
  return { id, title: `Folder ${id}`, isShared: true, includedEntityIds, ...overrides };
}

export function emptyUpdates(overrides: Partial<RemoteUpdates> = {}): RemoteUpdates {
  return {
    peers: [],
    presences: {},
    dialogFilters: [],
    joinedEntityIds: [],
    leftEntityIds: [],
    ...overrides,
  };
}

function notStubbed(method: string): never {
  throw new RemoteCallError(`${method} NOT_STUBBED`);
}

/** Remote whose every call fails until a test stubs it. */
export function createFakeRemote() {
  const remote = {
    exportInvite: vi.fn(async (_request: ExportInviteRequest): Promise<ExportedInviteResult> => notStubbed("exportInvite")),
    getExportedInvites: vi.fn(async (_folderId: FolderId): Promise<ExportedInvitesResult> => notStubbed("getExportedInvites")),
    editInvite: vi.fn(async (_request: EditInviteRequest): Promise<RemoteInvite> => notStubbed("editInvite")),
    deleteInvite: vi.fn(async (_folderId: FolderId, _slug: string): Promise<void> => notStubbed("deleteInvite")),
    checkInvite: vi.fn(async (_slug: string): Promise<CheckInviteResult> => notStubbed("checkInvite")),
    joinInvite: vi.fn(async (_slug: string, _peers: CachedPeer[]): Promise<RemoteUpdates> => notStubbed("joinInvite")),
    getUpdates: vi.fn(async (_folderId: FolderId): Promise<ChatlistUpdatesResult> => notStubbed("getUpdates")),
    joinUpdates: vi.fn(async (_folderId: FolderId, _peers: CachedPeer[]): Promise<RemoteUpdates> => notStubbed("joinUpdates")),
    hideUpdates: vi.fn(async (_folderId: FolderId): Promise<void> => notStubbed("hideUpdates")),
    leave: vi.fn(async (_folderId: FolderId, _peers: CachedPeer[]): Promise<RemoteUpdates> => notStubbed("leave")),
    getLeaveSuggestions: vi.fn(async (_folderId: FolderId): Promise<EntityId[]> => notStubbed("getLeaveSuggestions")),
  } satisfies FolderInviteRemote;
  return remote;
}

export function createSilentLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export interface TestContextOptions {
  seed?: MemoryFilterStoreSeed;
  appConfig?: AppConfig;
  isPremium?: boolean;
  updates?: UpdatesApplier;
  joinConfirmationTimeoutMs?: number;
}

export function createTestContext(options: TestContextOptions = {}) {
  const logger = createSilentLogger();
  const store = new MemoryFilterStore(options.seed, logger);
  const remote = createFakeRemote();
  const applier = new StoreUpdatesApplier(store, logger);
  const ctx: FolderSyncContext = {
    accountId: "account-1",
    store,
    remote,
    updates: options.updates ?? applier,
    getAppConfig: async () => options.appConfig ?? {},
    isPremium: async () => options.isPremium ?? false,
    config: {
      updatesRefreshIntervalSeconds: 3600,
      joinConfirmationTimeoutMs: options.joinConfirmationTimeoutMs ?? 1000,
    },
    logger,
  };
  return { ctx, store, remote, logger, applier };
}
