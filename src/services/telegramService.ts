// src/services/telegramService.ts

import { TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions";
import { Api } from "telegram/tl";
import { FolderSyncConfig } from "../config";
import { LocalFilterStore } from "../store/filterStore";
import { AppConfig, Logger, TelegramConfig } from "../types";
import { jsonFromApi } from "../utils/telegramUtils";
import { FolderSyncContext } from "./context";
import { TelegramFolderInviteRemote } from "./telegramRemote";
import { StoreUpdatesApplier } from "./updatesApplier";

// Client configuration
const CLIENT_CONFIG = {
  connectionRetries: 5,
  useWSS: true,
  timeout: 60000,
  deviceModel: "chatlist-sync",
  systemVersion: "1.0.0",
  appVersion: "1.0.0",
};

/**
 * Creates and connects a new Telegram client
 */
export async function createClient(config: TelegramConfig): Promise<TelegramClient> {
  const client = new TelegramClient(new StringSession(config.session ?? ""), config.apiId, config.apiHash, CLIENT_CONFIG);

  await client.connect();
  return client;
}

/**
 * Gets authentication status
 */
export async function isAuthorized(client: TelegramClient, logger: Logger = console): Promise<boolean> {
  try {
    return await client.isUserAuthorized();
  } catch (error) {
    logger.error("TelegramService: Error checking auth status:", error);
    return false;
  }
}

/**
 * Loads the server app configuration the folder limits are read from
 */
export async function fetchAppConfig(client: Pick<TelegramClient, "invoke">): Promise<AppConfig> {
  const result = await client.invoke(new Api.help.GetAppConfig({ hash: 0 }));
  if (!(result instanceof Api.help.AppConfig)) {
    return {};
  }
  const config = jsonFromApi(result.config);
  return typeof config === "object" && config !== null && !Array.isArray(config) ? config : {};
}

/**
 * Loads the signed-in user
 */
export async function fetchSelf(client: Pick<TelegramClient, "getMe">): Promise<Api.User> {
  const me = await client.getMe();
  if (!(me instanceof Api.User)) {
    throw new Error("TelegramService: Client is not signed in");
  }
  return me;
}

export interface TelegramFolderSyncOptions {
  client: Pick<TelegramClient, "invoke" | "getMe">;
  store: LocalFilterStore;
  config: FolderSyncConfig;
  logger?: Logger;
}

/**
 * Wires the folder link operations to a connected client. App configuration
 * and premium status are fetched when a quota error needs them.
 */
export async function createTelegramFolderSync(options: TelegramFolderSyncOptions): Promise<FolderSyncContext> {
  const { client, store, config } = options;
  const logger = options.logger ?? console;

  const me = await fetchSelf(client);
  logger.log(`TelegramService: Folder sync ready for account ${me.id.toString()}`);

  return {
    accountId: me.id.toString(),
    store,
    remote: new TelegramFolderInviteRemote(client),
    updates: new StoreUpdatesApplier(store, logger),
    getAppConfig: async () => {
      try {
        return await fetchAppConfig(client);
      } catch (error) {
        logger.warn("TelegramService: Could not load app config, using default limits:", error);
        return {};
      }
    },
    isPremium: async () => {
      try {
        return (await fetchSelf(client)).premium === true;
      } catch (error) {
        logger.warn("TelegramService: Could not load premium status:", error);
        return false;
      }
    },
    config,
    logger,
  };
}

/**
 * Disconnect the client
 */
export async function disconnect(client: TelegramClient, logger: Logger = console): Promise<void> {
  try {
    await client.disconnect();
  } catch (error) {
    logger.warn("Error disconnecting client:", error);
  }
}
