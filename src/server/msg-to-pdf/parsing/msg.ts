import { extractMeetingDetails } from "../calendar/meeting.js";
import { type ContainerNode, type ContainerTree, type NodeHandle, type ReadOptions, readContainer } from "../container/index.js";
import { mapImportance } from "../mime/index.js";
import { rtfToEmailBody } from "../rtf/index.js";
import type { Attachment, Email, EmailBody } from "../types/index.js";
import { attachmentFileName, parseAttachment } from "./attachment.js";
import { PropertyBag } from "./property-bag.js";
import {
  PidTagBody,
  PidTagBodyHtml,
  PidTagClientSubmitTime,
  PidTagImportance,
  PidTagInternetMessageId,
  PidTagMessageClass,
  PidTagMessageDeliveryTime,
  PidTagRtfCompressed,
  PidTagSubject,
  PidTagTransportMessageHeaders,
} from "./properties.js";
import { parseRecipient, parseRecipientsFromTransportHeaders } from "./recipient.js";
import { extractSenderInfo } from "./sender.js";
import { parseDateFromTransportHeaders } from "./transport-headers.js";

export { DEFAULT_MAX_EMBED_DEPTH } from "../container/index.js";

export type BuildOptions = ReadOptions;

/**
 * Parses the bytes of a .msg file into an Email. Throws ConversionError with
 * kind MalformedContainer or AttachmentTooDeep.
 */
export function parseMsg(bytes: Uint8Array, options: BuildOptions = {}): Email {
  return buildEmail(readContainer(bytes, options));
}

/** Builds the Email for a message node, the top-level message by default */
export function buildEmail(tree: ContainerTree, handle: NodeHandle = tree.root): Email {
  const node = tree.node(handle);
  const bag = new PropertyBag(node.properties);

  const transportHeaders = bag.get(PidTagTransportMessageHeaders) || undefined;
  const senderInfo = extractSenderInfo(bag, transportHeaders);
  const transportRecipients = transportHeaders ? parseRecipientsFromTransportHeaders(transportHeaders) : undefined;

  const recipients = tree
    .children(handle, "recipient")
    .map((recipient) => parseRecipient(new PropertyBag(recipient.properties), transportRecipients));

  const sentAt =
    bag.get(PidTagClientSubmitTime) ?? (transportHeaders ? parseDateFromTransportHeaders(transportHeaders) : undefined);
  const messageClass = bag.get(PidTagMessageClass) || undefined;

  return {
    subject: bag.get(PidTagSubject) || "(No Subject)",
    from: senderInfo.from,
    sender: senderInfo.isOnBehalfOf ? senderInfo.sender : undefined,
    recipients,
    sentAt,
    receivedAt: bag.get(PidTagMessageDeliveryTime),
    body: buildBody(bag),
    attachments: buildAttachments(tree, handle),
    messageClass,
    messageId: bag.get(PidTagInternetMessageId) || undefined,
    importance: mapImportance(bag.get(PidTagImportance)),
    meeting: extractMeetingDetails(bag, messageClass),
  };
}

function buildBody(bag: PropertyBag): EmailBody {
  const text = bag.get(PidTagBody) || "";
  const html = bag.get(PidTagBodyHtml) || undefined;
  if (text || html) {
    return { text, html };
  }

  // Neither body is stored: fall back to the compressed RTF body
  const compressedRtf = bag.get(PidTagRtfCompressed);
  if (compressedRtf && compressedRtf.length > 0) {
    const fromRtf = rtfToEmailBody(compressedRtf);
    if (fromRtf) return fromRtf;
  }

  return { text: "" };
}

function buildAttachments(tree: ContainerTree, handle: NodeHandle): Attachment[] {
  const attachments: Attachment[] = [];

  tree.children(handle, "attachment").forEach((node, index) => {
    const bag = new PropertyBag(node.properties);
    const message = tree.embeddedMessage(node.handle);

    if (message) {
      attachments.push(attachedMessage(tree, bag, message, index));
      return;
    }

    const attachment = parseAttachment(bag, node.content, index);
    if (attachment) attachments.push(attachment);
  });

  return attachments;
}

function attachedMessage(tree: ContainerTree, bag: PropertyBag, message: ContainerNode, index: number): Attachment {
  const fileName = attachmentFileName(bag, index);
  return {
    fileName: /\.msg$/i.test(fileName) ? fileName : `${fileName}.msg`,
    content: new Uint8Array(0),
    contentType: "application/vnd.ms-outlook",
    isEmbeddedMessage: true,
    message: buildEmail(tree, message.handle),
  };
}
