import { ConversionError, describeError } from "../errors/index.js";
import type { Attachment, Email, PlannedAttachment } from "../types/index.js";
import type { RenderingEngine } from "./engine.js";
import { buildAttachmentList, buildHeaderBlock } from "./header-block.js";
import { bodyContent, escapeHtml, plainTextToHtml } from "./html.js";
import { resolveInlineImages } from "./inline-images.js";

export type BodyKind = "html" | "text" | "empty";

export interface PreparedBody {
  kind: BodyKind;
  /** Body markup, with inline references already resolved */
  markup: string;
  /** Attachments consumed as inline images */
  consumed: Attachment[];
  unresolved: string[];
}

/**
 * Picks the authoritative body (HTML when it has content, otherwise plain
 * text) and resolves its inline image references.
 */
export function prepareBody(email: Email): PreparedBody {
  const html = email.body.html;
  if (html && html.trim().length > 0) {
    const resolution = resolveInlineImages(bodyContent(html), email.attachments);
    return { kind: "html", markup: resolution.html, consumed: resolution.consumed, unresolved: resolution.unresolved };
  }

  if (email.body.text.length > 0) {
    return { kind: "text", markup: plainTextToHtml(email.body.text), consumed: [], unresolved: [] };
  }

  return { kind: "empty", markup: "", consumed: [], unresolved: [] };
}

export function buildBodyDocument(email: Email, body: PreparedBody, attachments: readonly PlannedAttachment[]): string {
  return [
    "<!DOCTYPE html>",
    "<html>",
    `<head><meta charset="utf-8"><title>${escapeHtml(email.subject)}</title></head>`,
    "<body>",
    buildHeaderBlock(email),
    buildAttachmentList(attachments),
    "<hr>",
    `<div class="body">${body.markup}</div>`,
    "</body>",
    "</html>",
  ].join("\n");
}

/**
 * Renders the header block, attachment list and body into one PDF section.
 * Throws ConversionError(RenderingFailed) when the engine fails.
 */
export async function renderBody(
  email: Email,
  body: PreparedBody,
  attachments: readonly PlannedAttachment[],
  engine: RenderingEngine,
): Promise<Uint8Array> {
  const document = buildBodyDocument(email, body, attachments);
  try {
    return await engine.render(document, { title: email.subject });
  } catch (error) {
    throw new ConversionError("RenderingFailed", `Rendering engine failed: ${describeError(error)}`, { cause: error });
  }
}
