import { readFile } from "node:fs/promises";
import { type BuildOptions, parseMsg } from "../parsing/index.js";
import { classifyAttachment } from "../planning/index.js";
import { type BodyKind, prepareBody } from "../rendering/index.js";
import type {
  Disposition,
  Email,
  Importance,
  Mailbox,
  MeetingDetails,
  ParsedRecipient,
} from "../types/index.js";
import { toConversionError } from "./errors.js";

export interface AttachmentSummary {
  fileName: string;
  contentType: string;
  size: number;
  contentId?: string;
  hidden: boolean;
  isEmbeddedMessage: boolean;
  /** "inline" when the body references it by Content-ID */
  disposition: Disposition | "inline";
  message?: InspectionReport;
}

export interface InspectionReport {
  subject: string;
  from: Mailbox;
  sender?: Mailbox;
  recipients: ParsedRecipient[];
  sentAt?: Date;
  receivedAt?: Date;
  messageClass?: string;
  messageId?: string;
  importance?: Importance;
  meeting?: MeetingDetails;
  body: {
    kind: BodyKind;
    length: number;
    fromRtf: boolean;
    unresolvedInlineImages: string[];
  };
  attachments: AttachmentSummary[];
}

export function inspectEmail(email: Email): InspectionReport {
  const body = prepareBody(email);
  const bodyLength = body.kind === "html" ? (email.body.html ?? "").length : email.body.text.length;

  return {
    subject: email.subject,
    from: email.from,
    sender: email.sender,
    recipients: email.recipients,
    sentAt: email.sentAt,
    receivedAt: email.receivedAt,
    messageClass: email.messageClass,
    messageId: email.messageId,
    importance: email.importance,
    meeting: email.meeting,
    body: {
      kind: body.kind,
      length: bodyLength,
      fromRtf: email.body.rtf !== undefined,
      unresolvedInlineImages: body.unresolved,
    },
    attachments: email.attachments.map((attachment) => ({
      fileName: attachment.fileName,
      contentType: attachment.contentType,
      size: attachment.content.length,
      contentId: attachment.contentId,
      hidden: attachment.hidden ?? false,
      isEmbeddedMessage: attachment.isEmbeddedMessage ?? false,
      disposition: body.consumed.includes(attachment) ? "inline" : classifyAttachment(attachment),
      message: attachment.message ? inspectEmail(attachment.message) : undefined,
    })),
  };
}

/** Parses a .msg file and describes it; writes nothing */
export function inspectMsg(bytes: Uint8Array, options: BuildOptions = {}): InspectionReport {
  try {
    return inspectEmail(parseMsg(bytes, options));
  } catch (error) {
    throw toConversionError(error, "parsing");
  }
}

export async function inspectMsgFile(path: string, options: BuildOptions = {}): Promise<InspectionReport> {
  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await readFile(path));
  } catch (error) {
    throw toConversionError(error, "parsing");
  }
  return inspectMsg(bytes, options);
}
