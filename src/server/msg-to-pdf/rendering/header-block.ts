import { formatDisplayDate, formatFileSize } from "../mime/index.js";
import { formatMailbox } from "../parsing/sender.js";
import type { Disposition, Email, ParsedRecipient, PlannedAttachment } from "../types/index.js";
import { escapeHtml } from "./html.js";

const RECIPIENT_LABELS: Record<ParsedRecipient["type"], string> = {
  to: "To",
  cc: "Cc",
  bcc: "Bcc",
};

const DISPOSITION_LABELS: Record<Disposition, string> = {
  "merge-as-pdf": "merged below",
  "convert-to-pdf": "appended as image page",
  "list-only": "not converted",
};

/**
 * Label/value pairs shown above the message body, in display order.
 */
export function headerFields(email: Email): Array<[string, string]> {
  const fields: Array<[string, string]> = [["From", formatMailbox(email.from)]];
  if (email.sender) {
    fields.push(["Sender", formatMailbox(email.sender)]);
  }
  fields.push(["Sent", formatDisplayDate(email.sentAt)]);

  for (const type of ["to", "cc", "bcc"] as const) {
    const recipients = email.recipients.filter((r) => r.type === type);
    if (recipients.length > 0) {
      fields.push([RECIPIENT_LABELS[type], recipients.map((r) => formatMailbox(r)).join("; ")]);
    }
  }

  fields.push(["Subject", email.subject]);

  if (email.importance && email.importance !== "normal") {
    fields.push(["Importance", email.importance === "high" ? "High" : "Low"]);
  }

  if (email.meeting) {
    const { startTime, endTime, location, attendees } = email.meeting;
    fields.push(["When", `${formatDisplayDate(startTime)} to ${formatDisplayDate(endTime)}`]);
    if (location) fields.push(["Location", location]);
    if (attendees.length > 0) fields.push(["Attendees", attendees.join("; ")]);
  }

  return fields;
}

export function buildHeaderBlock(email: Email): string {
  const rows = headerFields(email).map(([label, value]) => `<p><strong>${label}:</strong> ${escapeHtml(value)}</p>`);
  return `<div class="header">\n${rows.join("\n")}\n</div>`;
}

export function attachmentLine({ attachment, disposition }: PlannedAttachment): string {
  const size = attachment.isEmbeddedMessage ? "embedded message" : formatFileSize(attachment.content.length);
  return `${attachment.fileName} (${attachment.contentType}, ${size}) - ${DISPOSITION_LABELS[disposition]}`;
}

export function buildAttachmentList(planned: readonly PlannedAttachment[]): string {
  if (planned.length === 0) return "";
  const items = planned.map((entry) => `<li>${escapeHtml(attachmentLine(entry))}</li>`);
  return `<div class="attachments">\n<p><strong>Attachments (${planned.length}):</strong></p>\n<ul>\n${items.join("\n")}\n</ul>\n</div>`;
}
