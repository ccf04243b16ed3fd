import * as mapi from "msg-parser";

/** The tag type msg-parser's `getProperty` takes, covering both fixed and named properties */
export type PropertyId = Parameters<mapi.Msg["getProperty"]>[0];

export interface PropertyValueMap {
  string: string;
  binary: Uint8Array;
  integer: number;
  boolean: boolean;
  time: Date;
}

export type PropertyKind = keyof PropertyValueMap;

/** A msg-parser property tag paired with the value kind the converter reads it as */
export interface PropertyTag<K extends PropertyKind = PropertyKind> {
  name: string;
  id: PropertyId;
  kind: K;
}

function tag<K extends PropertyKind>(name: string, id: PropertyId, kind: K): PropertyTag<K> {
  return { name, id, kind };
}

// Message
export const PidTagImportance = tag("PidTagImportance", mapi.PidTagImportance, "integer");
export const PidTagMessageClass = tag("PidTagMessageClass", mapi.PidTagMessageClass, "string");
export const PidTagSubject = tag("PidTagSubject", mapi.PidTagSubject, "string");
export const PidTagClientSubmitTime = tag("PidTagClientSubmitTime", mapi.PidTagClientSubmitTime, "time");
export const PidTagSentRepresentingName = tag("PidTagSentRepresentingName", mapi.PidTagSentRepresentingName, "string");
export const PidTagSentRepresentingEmailAddress = tag(
  "PidTagSentRepresentingEmailAddress",
  mapi.PidTagSentRepresentingEmailAddress,
  "string",
);
export const PidTagTransportMessageHeaders = tag(
  "PidTagTransportMessageHeaders",
  mapi.PidTagTransportMessageHeaders,
  "string",
);
export const PidTagSenderName = tag("PidTagSenderName", mapi.PidTagSenderName, "string");
export const PidTagSenderEmailAddress = tag("PidTagSenderEmailAddress", mapi.PidTagSenderEmailAddress, "string");
export const PidTagMessageDeliveryTime = tag("PidTagMessageDeliveryTime", mapi.PidTagMessageDeliveryTime, "time");
export const PidTagBody = tag("PidTagBody", mapi.PidTagBody, "string");
export const PidTagRtfCompressed = tag("PidTagRtfCompressed", mapi.PidTagRtfCompressed, "binary");
export const PidTagBodyHtml = tag("PidTagBodyHtml", mapi.PidTagBodyHtml, "string");
export const PidTagInternetMessageId = tag("PidTagInternetMessageId", mapi.PidTagInternetMessageId, "string");
export const PidTagSenderSmtpAddress = tag("PidTagSenderSmtpAddress", mapi.PidTagSenderSmtpAddress, "string");
export const PidTagSentRepresentingSmtpAddress = tag(
  "PidTagSentRepresentingSmtpAddress",
  mapi.PidTagSentRepresentingSmtpAddress,
  "string",
);

// Recipient
export const PidTagRecipientType = tag("PidTagRecipientType", mapi.PidTagRecipientType, "integer");
export const PidTagDisplayName = tag("PidTagDisplayName", mapi.PidTagDisplayName, "string");
export const PidTagEmailAddress = tag("PidTagEmailAddress", mapi.PidTagEmailAddress, "string");
export const PidTagSmtpAddress = tag("PidTagSmtpAddress", mapi.PidTagSmtpAddress, "string");

// Attachment
export const PidTagAttachFilename = tag("PidTagAttachFilename", mapi.PidTagAttachFilename, "string");
export const PidTagAttachLongFilename = tag("PidTagAttachLongFilename", mapi.PidTagAttachLongFilename, "string");
export const PidTagAttachMimeTag = tag("PidTagAttachMimeTag", mapi.PidTagAttachMimeTag, "string");
export const PidTagAttachContentId = tag("PidTagAttachContentId", mapi.PidTagAttachContentId, "string");
export const PidTagAttachmentHidden = tag("PidTagAttachmentHidden", mapi.PidTagAttachmentHidden, "boolean");

// Meeting (named properties, resolved by msg-parser through the name map)
export const PidLidLocation = tag("PidLidLocation", mapi.PidLidLocation, "string");
export const PidLidAppointmentStartWhole = tag("PidLidAppointmentStartWhole", mapi.PidLidAppointmentStartWhole, "time");
export const PidLidAppointmentEndWhole = tag("PidLidAppointmentEndWhole", mapi.PidLidAppointmentEndWhole, "time");
export const PidLidToAttendeesString = tag("PidLidToAttendeesString", mapi.PidLidToAttendeesString, "string");
export const PidLidCcAttendeesString = tag("PidLidCcAttendeesString", mapi.PidLidCcAttendeesString, "string");
