import type { Importance } from "../types/index.js";

const MIME_TYPES: Record<string, string> = {
  pdf: "application/pdf",
  doc: "application/msword",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  xls: "application/vnd.ms-excel",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ppt: "application/vnd.ms-powerpoint",
  pptx: "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  bmp: "image/bmp",
  tif: "image/tiff",
  tiff: "image/tiff",
  webp: "image/webp",
  svg: "image/svg+xml",
  txt: "text/plain",
  csv: "text/csv",
  html: "text/html",
  htm: "text/html",
  ics: "text/calendar",
  eml: "message/rfc822",
  msg: "application/vnd.ms-outlook",
  zip: "application/zip",
};

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  if (dot <= 0 || dot === fileName.length - 1) return "";
  return fileName.slice(dot + 1).toLowerCase();
}

export function getMimeType(fileName: string): string {
  return MIME_TYPES[fileExtension(fileName)] || "application/octet-stream";
}

const KNOWN_TYPES = new Set(Object.values(MIME_TYPES));

/** True for a declared type this table names; generic types such as application/octet-stream are not */
export function isKnownContentType(contentType: string | undefined): boolean {
  return KNOWN_TYPES.has(normalizeContentType(contentType));
}

/** Lowercased type without parameters, e.g. "image/png; name=a.png" -> "image/png" */
export function normalizeContentType(contentType: string | undefined): string {
  return (contentType ?? "").split(";")[0].trim().toLowerCase();
}

/**
 * Gets the recipient type string from MAPI recipient type number.
 * MAPI_TO = 1, MAPI_CC = 2, MAPI_BCC = 3
 */
export function getRecipientType(type: number | undefined): "to" | "cc" | "bcc" {
  if (type === 2) return "cc";
  if (type === 3) return "bcc";
  return "to";
}

/**
 * PidTagImportance: 0 (low), 1 (normal), 2 (high)
 */
export function mapImportance(importance: number | undefined): Importance | undefined {
  if (importance === 0) return "low";
  if (importance === 1) return "normal";
  if (importance === 2) return "high";
  return undefined;
}

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

/**
 * Formats a date for the PDF header block, e.g. "March 15, 2024 at 02:30 PM UTC".
 * Always UTC so output does not depend on the machine's time zone.
 */
export function formatDisplayDate(date: Date | undefined): string {
  if (!date) return "Unknown";
  const hours24 = date.getUTCHours();
  const hours12 = hours24 % 12 === 0 ? 12 : hours24 % 12;
  const minutes = date.getUTCMinutes().toString().padStart(2, "0");
  const suffix = hours24 < 12 ? "AM" : "PM";
  return `${MONTHS[date.getUTCMonth()]} ${date.getUTCDate()}, ${date.getUTCFullYear()} at ${hours12
    .toString()
    .padStart(2, "0")}:${minutes} ${suffix} UTC`;
}

export function formatFileSize(bytes: number): string {
  const kb = bytes / 1024;
  if (kb < 1024) return `${kb.toFixed(1)} KB`;
  return `${(kb / 1024).toFixed(1)} MB`;
}
