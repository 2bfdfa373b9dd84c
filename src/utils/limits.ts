// src/utils/limits.ts

import { AppConfig, LimitsTable } from "../types";

export interface FolderLimits {
  standard: LimitsTable;
  premium: LimitsTable;
  isPremium: boolean;
}

export const DEFAULT_STANDARD_LIMITS: Readonly<LimitsTable> = {
  maxSharedFolderLinks: 3,
  maxSharedFolderJoins: 2,
  maxFolders: 10,
  maxFolderChats: 100,
};

export const DEFAULT_PREMIUM_LIMITS: Readonly<LimitsTable> = {
  maxSharedFolderLinks: 20,
  maxSharedFolderJoins: 20,
  maxFolders: 20,
  maxFolderChats: 200,
};

const CONFIG_KEYS: Record<keyof LimitsTable, string> = {
  maxSharedFolderLinks: "chatlist_invites_limit",
  maxSharedFolderJoins: "chatlist_joined_limit",
  maxFolders: "dialog_filters_limit",
  maxFolderChats: "dialog_filters_chats_limit",
};

function readLimit(appConfig: AppConfig, key: string, fallback: number): number {
  const value = appConfig[key];
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  return fallback;
}

function readTable(appConfig: AppConfig, suffix: "default" | "premium", defaults: Readonly<LimitsTable>): LimitsTable {
  return {
    maxSharedFolderLinks: readLimit(appConfig, `${CONFIG_KEYS.maxSharedFolderLinks}_${suffix}`, defaults.maxSharedFolderLinks),
    maxSharedFolderJoins: readLimit(appConfig, `${CONFIG_KEYS.maxSharedFolderJoins}_${suffix}`, defaults.maxSharedFolderJoins),
    maxFolders: readLimit(appConfig, `${CONFIG_KEYS.maxFolders}_${suffix}`, defaults.maxFolders),
    maxFolderChats: readLimit(appConfig, `${CONFIG_KEYS.maxFolderChats}_${suffix}`, defaults.maxFolderChats),
  };
}

/**
 * Builds the standard and premium limit tables from the app configuration.
 * Keys that are missing or not numbers keep their built-in default.
 */
export function resolveLimits(appConfig: AppConfig, isPremiumCaller: boolean): FolderLimits {
  return {
    standard: readTable(appConfig, "default", DEFAULT_STANDARD_LIMITS),
    premium: readTable(appConfig, "premium", DEFAULT_PREMIUM_LIMITS),
    isPremium: isPremiumCaller,
  };
}

/** Limit for the caller's current tier alongside the premium tier's. */
export function quotaLimit(limits: FolderLimits, field: keyof LimitsTable): { limit: number; premiumLimit: number } {
  const current = limits.isPremium ? limits.premium : limits.standard;
  return { limit: current[field], premiumLimit: limits.premium[field] };
}
