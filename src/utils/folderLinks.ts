// src/utils/folderLinks.ts

import QRCode from "qrcode";
import { SharedLinkInfo } from "../types";

export const FOLDER_LINK_PREFIX = "https://t.me/folder/";

/**
 * Strips the folder link prefix; anything else is returned as is
 */
export function slugFromLink(link: string): string {
  return link.startsWith(FOLDER_LINK_PREFIX) ? link.slice(FOLDER_LINK_PREFIX.length) : link;
}

export function linkFromSlug(slug: string): string {
  return `${FOLDER_LINK_PREFIX}${slug}`;
}

export function sharedLinkInfo(invite: { title: string; url: string; peerIds: string[]; revoked: boolean }): SharedLinkInfo {
  return {
    title: invite.title,
    link: invite.url,
    slug: slugFromLink(invite.url),
    memberEntityIds: invite.peerIds,
    revoked: invite.revoked,
  };
}

/**
 * Renders a folder link as a QR code PNG data URL
 */
export async function renderFolderLinkQrCode(link: SharedLinkInfo | string): Promise<string> {
  const url = typeof link === "string" ? link : link.link;
  try {
    return await QRCode.toDataURL(url, {
      width: 200,
      margin: 1,
      color: {
        dark: "#000000",
        light: "#ffffff",
      },
    });
  } catch (err) {
    console.error("Error generating folder link QR code:", err);
    throw err;
  }
}
