import { describe, expect, it, vi } from "vitest";
import {
  FolderOperationCancelledError,
  FolderSyncTimeoutError,
  GenericFolderError,
  QuotaExceededError,
  RemoteCallError,
} from "../errors";
import { findFilter, upsertFilter } from "../store/filterStore";
import { channel, createTestContext, emptyUpdates, folder, group, user } from "../testing/fixtures";
import { canShareLinkToPeer, checkFolderLink, joinFolderLink } from "./linkResolution";
import { RemoteUpdates } from "./remote";

describe("canShareLinkToPeer", () => {
  it("allows channels the account can invite to", () => {
    expect(canShareLinkToPeer(channel("1"))).toBe(false);
    expect(canShareLinkToPeer(channel("1", { isCreator: true }))).toBe(true);
    expect(canShareLinkToPeer(channel("1", { canInviteUsers: true }))).toBe(true);
    expect(canShareLinkToPeer(channel("1", { username: "news" }))).toBe(true);
  });

  it("allows groups unless adding members is banned", () => {
    expect(canShareLinkToPeer(group("1"))).toBe(true);
    expect(canShareLinkToPeer(group("1", { bannedAddMembers: true }))).toBe(false);
  });

  it("never allows users", () => {
    expect(canShareLinkToPeer(user("1", { isCreator: true }))).toBe(false);
  });
});

describe("checkFolderLink", () => {
  it("offers every chat of a folder that is not joined yet as new", async () => {
    const { ctx, remote } = createTestContext({
      seed: { peers: [channel("1"), channel("2")], chatListPeerIds: ["-1001"] },
    });
    remote.checkInvite.mockResolvedValueOnce({
      kind: "invite",
      title: "Work",
      peerIds: ["-1001", "-1002", "-1003"],
      peers: [channel("2", { participantsCount: 50 })],
      presences: {},
    });

    const preview = await checkFolderLink(ctx, "abc");

    expect(remote.checkInvite).toHaveBeenCalledWith("abc");
    expect(preview.localFilterId).toBeUndefined();
    expect(preview.title).toBe("Work");
    expect(preview.peers).toEqual([channel("1"), channel("2", { participantsCount: 50 })]);
    expect(preview.alreadyMemberPeerIds.size).toBe(0);
    expect(preview.memberCounts).toEqual({ "-1002": 50 });
  });

  it("lists missing chats and shareable chats of a joined folder", async () => {
    const { ctx, remote } = createTestContext({
      seed: {
        filters: [folder(7, ["-1001", "-1004", "-1005"], { title: "Shared" })],
        peers: [channel("1"), channel("3"), channel("4", { isCreator: true }), channel("5")],
        chatListPeerIds: ["-1001", "-1004"],
      },
    });
    remote.checkInvite.mockResolvedValueOnce({
      kind: "already",
      folderId: 7,
      missingPeerIds: ["-1003", "-1001"],
      alreadyPeerIds: ["-1004"],
      peers: [],
      presences: {},
    });

    const preview = await checkFolderLink(ctx, "abc");

    expect(preview.localFilterId).toBe(7);
    expect(preview.title).toBe("Shared");
    expect(preview.peers.map((peer) => peer.id)).toEqual(["-1003", "-1001", "-1004"]);
    expect([...preview.alreadyMemberPeerIds]).toEqual(["-1001", "-1004"]);
    expect(preview.memberCounts).toEqual({});
  });

  it("caches peers and presences that come with a joined folder's preview", async () => {
    const { ctx, remote, store } = createTestContext({
      seed: { filters: [folder(7, ["-1001"])], peers: [channel("1")] },
    });
    remote.checkInvite.mockResolvedValueOnce({
      kind: "already",
      folderId: 7,
      missingPeerIds: ["-1006"],
      alreadyPeerIds: ["-1001"],
      peers: [channel("6", { participantsCount: 12 }), user("11")],
      presences: { "11": { status: "online", lastSeen: 300 } },
    });

    const preview = await checkFolderLink(ctx, "abc");

    const cached = await store.transaction((tx) => ({ peer: tx.getPeer("-1006"), presence: tx.getPeerPresence("11") }));
    expect(cached).toEqual({
      peer: channel("6", { participantsCount: 12 }),
      presence: { status: "online", lastSeen: 300 },
    });
    expect(preview.peers.map((peer) => peer.id)).toEqual(["-1006"]);
    expect(preview.memberCounts).toEqual({ "-1006": 12 });
  });

  it("caches presences that come with a fresh preview", async () => {
    const { ctx, remote, store } = createTestContext();
    remote.checkInvite.mockResolvedValueOnce({
      kind: "invite",
      title: "Work",
      peerIds: ["-1002"],
      peers: [channel("2"), user("11")],
      presences: { "11": { status: "recently" } },
    });

    await checkFolderLink(ctx, "abc");

    expect(await store.transaction((tx) => tx.getPeerPresence("11"))).toEqual({ status: "recently" });
  });

  it("fails generically when the link cannot be checked", async () => {
    const { ctx, remote } = createTestContext();
    remote.checkInvite.mockRejectedValueOnce(new RemoteCallError("INVITE_SLUG_EXPIRED"));

    await expect(checkFolderLink(ctx, "abc")).rejects.toThrow("checkFolderLink failed");
  });
});

describe("joinFolderLink", () => {
  const joined: RemoteUpdates = emptyUpdates({
    dialogFilters: [{ folderId: 9, filter: folder(9, ["-1001", "-1002"], { title: "Joined" }) }],
    joinedEntityIds: ["-1002"],
  });

  it("resolves once the joined folder is stored", async () => {
    const { ctx, remote, store } = createTestContext({
      seed: { peers: [channel("1"), channel("2")], chatListPeerIds: ["-1001"] },
    });
    remote.joinInvite.mockResolvedValueOnce(joined);

    const result = await joinFolderLink(ctx, "abc", ["-1001", "-1002", "-1009"]);

    expect(remote.joinInvite).toHaveBeenCalledWith("abc", [channel("1"), channel("2")]);
    expect(result).toEqual({ folderId: 9, title: "Joined", newChatCount: 1 });
    expect(findFilter(store.filtersState.get(), 9)?.title).toBe("Joined");
  });

  it("waits for the updates to be applied", async () => {
    const updates = { addUpdates: vi.fn() };
    const { ctx, remote, store } = createTestContext({ updates });
    remote.joinInvite.mockResolvedValueOnce(joined);
    let settled = false;

    const joining = joinFolderLink(ctx, "abc", []).then((result) => {
      settled = true;
      return result;
    });
    await vi.waitFor(() => expect(updates.addUpdates).toHaveBeenCalledWith(joined));
    await store.transaction(() => undefined);
    expect(settled).toBe(false);

    await store.transaction((tx) => {
      tx.updateFiltersState((state) => ({ ...state, filters: upsertFilter(state.filters, folder(9, [])) }));
    });

    await expect(joining).resolves.toEqual({ folderId: 9, title: "Joined", newChatCount: 0 });
  });

  it("sees the folder arrive when another subscriber throws", async () => {
    const { ctx, remote, store, logger } = createTestContext();
    remote.joinInvite.mockResolvedValueOnce(joined);
    const failure = new Error("listener failed");
    let calls = 0;
    store.filtersState.subscribe(() => {
      calls += 1;
      if (calls > 1) throw failure;
    });

    await expect(joinFolderLink(ctx, "abc", [])).resolves.toEqual({ folderId: 9, title: "Joined", newChatCount: 0 });
    expect(logger.error).toHaveBeenCalledWith("StateFeed: Error in listener:", failure);
  });

  it("stops waiting when aborted", async () => {
    const updates = { addUpdates: vi.fn() };
    const { ctx, remote } = createTestContext({ updates });
    remote.joinInvite.mockResolvedValueOnce(joined);
    const controller = new AbortController();

    const joining = joinFolderLink(ctx, "abc", [], { signal: controller.signal });
    await vi.waitFor(() => expect(updates.addUpdates).toHaveBeenCalled());
    controller.abort();

    await expect(joining).rejects.toBeInstanceOf(FolderOperationCancelledError);
  });

  it("gives up when the folder never shows up", async () => {
    const { ctx, remote } = createTestContext({ updates: { addUpdates: vi.fn() }, joinConfirmationTimeoutMs: 20 });
    remote.joinInvite.mockResolvedValueOnce(joined);

    const error = await joinFolderLink(ctx, "abc", []).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(FolderSyncTimeoutError);
    expect(error).toBeInstanceOf(GenericFolderError);
    expect(error).toMatchObject({ message: "joinFolderLink failed", timeoutMs: 20 });
  });

  it("fails generically when the response names no folder", async () => {
    const { ctx, remote, applier } = createTestContext();
    remote.joinInvite.mockResolvedValueOnce(emptyUpdates({ joinedEntityIds: ["-1002"] }));

    await expect(joinFolderLink(ctx, "abc", [])).rejects.toThrow("joinFolderLink failed");
    await applier.flush();
    expect(await ctx.store.transaction((tx) => tx.hasChatListPresence("-1002"))).toBe(true);
  });

  it("fails generically when the folder was removed instead", async () => {
    const { ctx, remote } = createTestContext();
    remote.joinInvite.mockResolvedValueOnce(emptyUpdates({ dialogFilters: [{ folderId: 9 }] }));

    await expect(joinFolderLink(ctx, "abc", [])).rejects.toBeInstanceOf(GenericFolderError);
  });

  it.each([
    ["USER_CHANNELS_TOO_MUCH", "channelCount", 100, 200],
    ["DIALOG_FILTERS_TOO_MUCH", "dialogFilterCount", 10, 20],
    ["COMMUNITIES_TOO_MUCH", "sharedFolderJoinCount", 2, 20],
    ["FILTERS_TOO_MUCH", "sharedFolderJoinCount", 2, 20],
  ])("maps %s to the %s quota of the standard tier", async (code, kind, limit, premiumLimit) => {
    const { ctx, remote } = createTestContext();
    remote.joinInvite.mockRejectedValueOnce(new RemoteCallError(code));

    const error = await joinFolderLink(ctx, "abc", []).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(QuotaExceededError);
    expect(error).toMatchObject({ kind, limit, premiumLimit });
  });

  it.each([
    ["USER_CHANNELS_TOO_MUCH", "channelCount", 200],
    ["DIALOG_FILTERS_TOO_MUCH", "dialogFilterCount", 20],
    ["COMMUNITIES_TOO_MUCH", "sharedFolderJoinCount", 20],
    ["FILTERS_TOO_MUCH", "sharedFolderJoinCount", 20],
  ])("maps %s to the %s quota of the premium tier", async (code, kind, limit) => {
    const { ctx, remote } = createTestContext({ isPremium: true });
    remote.joinInvite.mockRejectedValueOnce(new RemoteCallError(code));

    const error = await joinFolderLink(ctx, "abc", []).catch((reason: unknown) => reason);

    expect(error).toMatchObject({ kind, limit, premiumLimit: limit });
  });

  it("uses the tier the caller has when the join fails", async () => {
    const { ctx, remote } = createTestContext();
    let premium = false;
    ctx.isPremium = async () => premium;
    remote.joinInvite.mockRejectedValue(new RemoteCallError("COMMUNITIES_TOO_MUCH"));

    const before = await joinFolderLink(ctx, "abc", []).catch((reason: unknown) => reason);
    premium = true;
    const after = await joinFolderLink(ctx, "abc", []).catch((reason: unknown) => reason);

    expect(before).toMatchObject({ limit: 2, premiumLimit: 20 });
    expect(after).toMatchObject({ limit: 20, premiumLimit: 20 });
  });

  it("reads join limits from the app configuration", async () => {
    const { ctx, remote } = createTestContext({
      appConfig: { chatlist_joined_limit_default: 4, chatlist_joined_limit_premium: 40 },
    });
    remote.joinInvite.mockRejectedValueOnce(new RemoteCallError("COMMUNITIES_TOO_MUCH"));

    const error = await joinFolderLink(ctx, "abc", []).catch((reason: unknown) => reason);

    expect(error).toMatchObject({ kind: "sharedFolderJoinCount", limit: 4, premiumLimit: 40 });
  });

  it.each([new RemoteCallError("INVITE_SLUG_EXPIRED"), new Error("socket closed")])(
    "fails generically on %s",
    async (failure) => {
      const { ctx, remote } = createTestContext();
      remote.joinInvite.mockRejectedValueOnce(failure);

      const error = await joinFolderLink(ctx, "abc", []).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(GenericFolderError);
      expect(error).not.toBeInstanceOf(QuotaExceededError);
    },
  );
});
