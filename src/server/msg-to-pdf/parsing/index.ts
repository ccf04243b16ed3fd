export { attachmentFileName, normalizeContentId, parseAttachment } from "./attachment.js";
export { type BuildOptions, buildEmail, DEFAULT_MAX_EMBED_DEPTH, parseMsg } from "./msg.js";
export { PropertyBag } from "./property-bag.js";
export { parseRecipient, parseRecipientsFromTransportHeaders, type TransportRecipients } from "./recipient.js";
export { extractSenderInfo, formatMailbox, parseFromTransportHeaders, type SenderResult } from "./sender.js";
export { extractHeaderValue, parseAddress, parseAddressList, parseDateFromTransportHeaders } from "./transport-headers.js";
