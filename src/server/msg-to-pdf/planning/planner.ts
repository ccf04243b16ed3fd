import { PDFDocument } from "pdf-lib";
import { describeError } from "../errors/index.js";
import type { Attachment, ConversionWarning, PlannedAttachment } from "../types/index.js";
import { classifyAttachment } from "./classify.js";
import { imageToPdf } from "./image-page.js";

export interface PlanOptions {
  /** When false every attachment is only listed and no fragments are produced */
  mergeAttachments?: boolean;
}

export interface AttachmentPlan {
  entries: PlannedAttachment[];
  /** Merge-ready PDFs in attachment order */
  fragments: Uint8Array[];
  warnings: ConversionWarning[];
}

async function validatePdf(bytes: Uint8Array): Promise<Uint8Array> {
  const doc = await PDFDocument.load(bytes);
  if (doc.getPageCount() === 0) {
    throw new Error("PDF has no pages");
  }
  return bytes;
}

/**
 * Decides what happens to each attachment not consumed as an inline image.
 * A conversion failure downgrades the attachment to list-only and records a
 * warning; it never fails the file.
 */
export async function planAttachments(
  attachments: readonly Attachment[],
  options: PlanOptions = {},
): Promise<AttachmentPlan> {
  const mergeAttachments = options.mergeAttachments ?? true;
  const entries: PlannedAttachment[] = [];
  const warnings: ConversionWarning[] = [];

  for (const attachment of attachments) {
    const disposition = mergeAttachments ? classifyAttachment(attachment) : "list-only";
    if (disposition === "list-only") {
      entries.push({ attachment, disposition });
      continue;
    }

    try {
      const fragment =
        disposition === "merge-as-pdf" ? await validatePdf(attachment.content) : await imageToPdf(attachment.content);
      entries.push({ attachment, disposition, fragment });
    } catch (error) {
      warnings.push({
        kind: "AttachmentConversionFailed",
        fileName: attachment.fileName,
        message: describeError(error),
      });
      entries.push({ attachment, disposition: "list-only" });
    }
  }

  return {
    entries,
    fragments: entries.flatMap((entry) => (entry.fragment ? [entry.fragment] : [])),
    warnings,
  };
}
