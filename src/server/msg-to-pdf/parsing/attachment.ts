import { getMimeType } from "../mime/index.js";
import type { Attachment } from "../types/index.js";
import type { PropertyBag } from "./property-bag.js";
import {
  PidTagAttachContentId,
  PidTagAttachFilename,
  PidTagAttachLongFilename,
  PidTagAttachMimeTag,
  PidTagAttachmentHidden,
  PidTagDisplayName,
} from "./properties.js";

export function attachmentFileName(bag: PropertyBag, index: number): string {
  return (
    bag.get(PidTagAttachLongFilename) ||
    bag.get(PidTagAttachFilename) ||
    bag.get(PidTagDisplayName) ||
    `attachment-${index + 1}`
  );
}

/** Strips the angle brackets some clients keep around Content-ID values */
export function normalizeContentId(contentId: string | undefined): string | undefined {
  const trimmed = contentId?.trim().replace(/^<|>$/g, "").trim();
  return trimmed || undefined;
}

/**
 * Builds a regular (by-value) attachment. Returns null for attachments without
 * any content, which Outlook leaves behind for removed or linked files.
 */
export function parseAttachment(bag: PropertyBag, content: Uint8Array | undefined, index: number): Attachment | null {
  if (!content || content.length === 0) return null;

  const fileName = attachmentFileName(bag, index);
  const mimeTag = bag.get(PidTagAttachMimeTag);

  return {
    fileName,
    content,
    contentType: mimeTag || getMimeType(fileName),
    contentId: normalizeContentId(bag.get(PidTagAttachContentId)),
    hidden: bag.get(PidTagAttachmentHidden) || undefined,
  };
}
