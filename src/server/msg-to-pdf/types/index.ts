import type { FailureKind } from "../errors/index.js";

export interface Mailbox {
  name?: string;
  email?: string;
}

export interface ParsedRecipient {
  name: string;
  email: string;
  type: "to" | "cc" | "bcc";
}

export interface Attachment {
  fileName: string;
  content: Uint8Array;
  contentType: string;
  contentId?: string;
  isEmbeddedMessage?: boolean;
  /** Present when isEmbeddedMessage is set */
  message?: Email;
  hidden?: boolean;
}

export interface EmailBody {
  /** Always present, possibly empty */
  text: string;
  html?: string;
  /** Decompressed RTF, kept only when it was the sole body source */
  rtf?: string;
}

export interface MeetingDetails {
  startTime: Date;
  endTime: Date;
  location?: string;
  attendees: string[];
}

export type Importance = "low" | "normal" | "high";

export interface Email {
  subject: string;
  from: Mailbox;
  /** Only set when the message was sent on behalf of `from` */
  sender?: Mailbox;
  recipients: ParsedRecipient[];
  sentAt?: Date;
  receivedAt?: Date;
  body: EmailBody;
  attachments: Attachment[];
  messageClass?: string;
  messageId?: string;
  importance?: Importance;
  meeting?: MeetingDetails;
}

export type Disposition = "merge-as-pdf" | "convert-to-pdf" | "list-only";

export interface PlannedAttachment {
  attachment: Attachment;
  disposition: Disposition;
  /** PDF bytes to merge; present only for merge-as-pdf and convert-to-pdf */
  fragment?: Uint8Array;
}

export type ConversionStage = "parsing" | "rendering" | "merging";

export interface ConversionWarning {
  kind: "AttachmentConversionFailed";
  fileName: string;
  message: string;
}

export interface ConversionSuccess {
  status: "succeeded";
  sourcePath: string;
  outputPath: string;
  byteSize: number;
  pageCount: number;
  warnings: ConversionWarning[];
}

export interface ConversionFailure {
  status: "failed";
  sourcePath: string;
  failure: {
    kind: FailureKind;
    message: string;
  };
  warnings: ConversionWarning[];
}

export interface ConversionCancelled {
  status: "cancelled";
  sourcePath: string;
}

export type ConversionResult = ConversionSuccess | ConversionFailure | ConversionCancelled;

export interface BatchReport {
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  /** Discovery order, independent of completion order */
  results: ConversionResult[];
}

export interface ConversionOptions {
  mergeAttachments?: boolean;
  showSourceBanner?: boolean;
  maxEmbedDepth?: number;
}
