import { fileExtension, isKnownContentType, normalizeContentType } from "../mime/index.js";
import type { Attachment, Disposition } from "../types/index.js";

const IMAGE_EXTENSIONS = new Set(["png", "jpg", "jpeg", "jpe", "gif", "bmp", "tif", "tiff", "webp"]);

const IMAGE_TYPES = new Set([
  "image/png",
  "image/jpeg",
  "image/jpg",
  "image/pjpeg",
  "image/gif",
  "image/bmp",
  "image/x-ms-bmp",
  "image/tiff",
  "image/webp",
]);

const PDF_TYPES = new Set(["application/pdf", "application/x-pdf"]);

function byExtension(fileName: string): Disposition | undefined {
  const extension = fileExtension(fileName);
  if (extension === "pdf") return "merge-as-pdf";
  if (IMAGE_EXTENSIONS.has(extension)) return "convert-to-pdf";
  return undefined;
}

function byContentType(contentType: string): Disposition | undefined {
  const normalized = normalizeContentType(contentType);
  if (PDF_TYPES.has(normalized)) return "merge-as-pdf";
  if (IMAGE_TYPES.has(normalized)) return "convert-to-pdf";
  return undefined;
}

/**
 * Disposition of one attachment. The declared content type decides; the
 * extension is consulted only when the type is missing, generic
 * (application/octet-stream) or unknown.
 */
export function classifyAttachment(attachment: Attachment): Disposition {
  if (attachment.isEmbeddedMessage) return "list-only";

  const declared = byContentType(attachment.contentType);
  if (declared) return declared;
  if (isKnownContentType(attachment.contentType)) return "list-only";

  return byExtension(attachment.fileName) ?? "list-only";
}
