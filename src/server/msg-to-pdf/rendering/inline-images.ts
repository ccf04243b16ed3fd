import { getMimeType, normalizeContentType } from "../mime/index.js";
import type { Attachment } from "../types/index.js";

export interface InlineResolution {
  html: string;
  /** Attachments referenced from the markup, in attachment order */
  consumed: Attachment[];
  /** Content ids that matched no attachment, or more than one */
  unresolved: string[];
}

const CID_REFERENCE = /\bcid:([^"'\s)>]+)/gi;

/**
 * Replaces every `cid:` reference that matches exactly one attachment's
 * Content-ID with a data URI carrying the attachment bytes. References that
 * match nothing (or are ambiguous) are left untouched.
 */
export function resolveInlineImages(html: string, attachments: readonly Attachment[]): InlineResolution {
  const byContentId = new Map<string, Attachment[]>();
  for (const attachment of attachments) {
    if (!attachment.contentId) continue;
    const key = attachment.contentId.toLowerCase();
    byContentId.set(key, [...(byContentId.get(key) ?? []), attachment]);
  }

  const consumed = new Set<Attachment>();
  const unresolved: string[] = [];
  const dataUris = new Map<Attachment, string>();

  const resolved = html.replace(CID_REFERENCE, (reference, contentId: string) => {
    const matches = byContentId.get(contentId.toLowerCase()) ?? [];
    if (matches.length !== 1) {
      if (!unresolved.includes(contentId)) unresolved.push(contentId);
      return reference;
    }

    const attachment = matches[0];
    consumed.add(attachment);
    let uri = dataUris.get(attachment);
    if (!uri) {
      uri = toDataUri(attachment);
      dataUris.set(attachment, uri);
    }
    return uri;
  });

  return {
    html: resolved,
    consumed: attachments.filter((attachment) => consumed.has(attachment)),
    unresolved,
  };
}

export function toDataUri(attachment: Attachment): string {
  const contentType = normalizeContentType(attachment.contentType) || getMimeType(attachment.fileName);
  return `data:${contentType};base64,${Buffer.from(attachment.content).toString("base64")}`;
}
