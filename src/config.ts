// src/config.ts

import { z } from "zod";
import { FolderSyncConfigError } from "./errors";
import { TelegramConfig } from "./types";

export interface FolderSyncConfig {
  telegram?: TelegramConfig;
  debug: boolean;
  /** Minimum age in seconds before a folder's pending updates are polled again. */
  updatesRefreshIntervalSeconds: number;
  /** Upper bound on waiting for a joined folder to show up locally. */
  joinConfirmationTimeoutMs: number;
}

export const DEBUG_REFRESH_INTERVAL_SECONDS = 5;
export const REFRESH_INTERVAL_SECONDS = 60 * 60;
export const JOIN_CONFIRMATION_TIMEOUT_MS = 30_000;

const flag = z
  .enum(["1", "0", "true", "false"])
  .optional()
  .transform((value) => value === "1" || value === "true");

const envSchema = z.object({
  TELEGRAM_API_ID: z.coerce.number().int().positive().optional(),
  TELEGRAM_API_HASH: z.string().min(1).optional(),
  TELEGRAM_SESSION: z.string().optional(),
  FOLDER_SYNC_DEBUG: flag,
  FOLDER_UPDATES_REFRESH_SECONDS: z.coerce.number().int().positive().optional(),
  FOLDER_JOIN_CONFIRM_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

/**
 * Reads the engine configuration from environment variables
 */
export function getFolderSyncConfig(env: NodeJS.ProcessEnv = process.env): FolderSyncConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new FolderSyncConfigError(`Invalid folder sync configuration (${issues.join("; ")})`);
  }

  const values = parsed.data;
  let telegram: TelegramConfig | undefined;
  if (values.TELEGRAM_API_ID !== undefined && values.TELEGRAM_API_HASH !== undefined) {
    telegram = {
      apiId: values.TELEGRAM_API_ID,
      apiHash: values.TELEGRAM_API_HASH,
      session: values.TELEGRAM_SESSION,
    };
  } else if (values.TELEGRAM_API_ID !== undefined || values.TELEGRAM_API_HASH !== undefined) {
    throw new FolderSyncConfigError("TELEGRAM_API_ID and TELEGRAM_API_HASH must be set together");
  }

  return {
    telegram,
    debug: values.FOLDER_SYNC_DEBUG,
    updatesRefreshIntervalSeconds:
      values.FOLDER_UPDATES_REFRESH_SECONDS ??
      (values.FOLDER_SYNC_DEBUG ? DEBUG_REFRESH_INTERVAL_SECONDS : REFRESH_INTERVAL_SECONDS),
    joinConfirmationTimeoutMs: values.FOLDER_JOIN_CONFIRM_TIMEOUT_MS ?? JOIN_CONFIRMATION_TIMEOUT_MS,
  };
}
