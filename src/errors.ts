// src/errors.ts

import { LimitsTable } from "./types";
import { FolderLimits, quotaLimit } from "./utils/limits";

export type QuotaKind =
  | "dialogFilterCount"
  | "sharedFolderJoinCount"
  | "sharedFolderInviteLinkCount"
  | "channelCount";

/** Base class of every error the folder link operations reject with. */
export class FolderLinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class GenericFolderError extends FolderLinkError {
  constructor(operation: string) {
    super(`${operation} failed`);
  }
}

export class QuotaExceededError extends FolderLinkError {
  constructor(
    readonly kind: QuotaKind,
    readonly limit: number,
    readonly premiumLimit: number,
  ) {
    super(`${kind} limit of ${limit} reached`);
  }
}

/** Local state did not reach the expected value in time. */
export class FolderSyncTimeoutError extends GenericFolderError {
  constructor(
    operation: string,
    readonly timeoutMs: number,
  ) {
    super(operation);
  }
}

export class FolderOperationCancelledError extends FolderLinkError {
  constructor() {
    super("Folder operation was cancelled");
  }
}

export class FolderSyncConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FolderSyncConfigError";
  }
}

/** Failure reported by the remote folder-invite service. */
export class RemoteCallError extends Error {
  constructor(readonly code: string) {
    super(`Remote call failed: ${code}`);
    this.name = "RemoteCallError";
  }
}

export function isQuotaExceeded(error: unknown): error is QuotaExceededError {
  return error instanceof QuotaExceededError;
}

export interface QuotaRule {
  kind: QuotaKind;
  field: keyof LimitsTable;
}

/** Remote error codes an operation maps to quota errors. */
export type QuotaErrorTable = Readonly<Record<string, QuotaRule>>;

/**
 * Maps a remote failure onto the folder error taxonomy. Limits are only
 * resolved when the code is one of the table's quota codes.
 */
export async function translateRemoteError(
  error: unknown,
  operation: string,
  table: QuotaErrorTable,
  limits: () => Promise<FolderLimits>,
): Promise<FolderLinkError> {
  if (error instanceof RemoteCallError && Object.prototype.hasOwnProperty.call(table, error.code)) {
    const rule = table[error.code];
    const { limit, premiumLimit } = quotaLimit(await limits(), rule.field);
    return new QuotaExceededError(rule.kind, limit, premiumLimit);
  }
  return new GenericFolderError(operation);
}
