import type { Mailbox } from "../types/index.js";
import type { PropertyBag } from "./property-bag.js";
import {
  PidTagSenderEmailAddress,
  PidTagSenderName,
  PidTagSenderSmtpAddress,
  PidTagSentRepresentingEmailAddress,
  PidTagSentRepresentingName,
  PidTagSentRepresentingSmtpAddress,
} from "./properties.js";
import { extractHeaderValue, parseAddress } from "./transport-headers.js";

/**
 * Result of extracting sender information, including "on behalf of" scenario detection
 */
export interface SenderResult {
  /** The person being represented (or the sender if no delegation) */
  from: Mailbox;
  /** The actual sender, only set when acting on behalf of another user */
  sender: Mailbox | undefined;
  isOnBehalfOf: boolean;
}

/**
 * Parses the From: header from raw transport message headers string.
 */
export function parseFromTransportHeaders(transportHeaders: string): Mailbox | undefined {
  const value = extractHeaderValue(transportHeaders, "From");
  return value ? parseAddress(value) : undefined;
}

function normalizeEmail(email: string | undefined): string {
  return (email || "").toLowerCase().trim();
}

/**
 * True if the actual sender differs from the represented sender.
 */
function isOnBehalfOfScenario(actual: Mailbox, represented: Mailbox): boolean {
  if (!actual.email && !actual.name) return false;
  if (!represented.email && !represented.name) return false;

  if (actual.email && represented.email) {
    return normalizeEmail(actual.email) !== normalizeEmail(represented.email);
  }

  if (actual.name && represented.name && !actual.email && !represented.email) {
    return actual.name.trim() !== represented.name.trim();
  }

  // One side has an address and the other only a name
  return Boolean(actual.email) !== Boolean(represented.email);
}

/**
 * Extracts complete sender information, detecting "on behalf of" scenarios.
 *
 * In Exchange/Outlook, when a user sends mail "on behalf of" another user:
 * - PidTagSender* contains the actual sender (the person who sent the message)
 * - PidTagSentRepresenting* contains the person being represented (shows in "From")
 */
export function extractSenderInfo(bag: PropertyBag, transportMessageHeaders?: string): SenderResult {
  // Prefer SMTP address over X500/Exchange address
  const actualSender: Mailbox = {
    email: bag.get(PidTagSenderSmtpAddress) || bag.get(PidTagSenderEmailAddress),
    name: bag.get(PidTagSenderName),
  };
  const representedSender: Mailbox = {
    email: bag.get(PidTagSentRepresentingSmtpAddress) || bag.get(PidTagSentRepresentingEmailAddress),
    name: bag.get(PidTagSentRepresentingName),
  };

  if (isOnBehalfOfScenario(actualSender, representedSender)) {
    return { from: representedSender, sender: actualSender, isOnBehalfOf: true };
  }

  let bestEmail = actualSender.email || representedSender.email;
  let bestName = actualSender.name || representedSender.name;

  if (!bestEmail && !bestName && transportMessageHeaders) {
    const fromTransport = parseFromTransportHeaders(transportMessageHeaders);
    if (fromTransport) {
      bestEmail = fromTransport.email;
      bestName = fromTransport.name;
    }
  }

  return { from: { email: bestEmail, name: bestName }, sender: undefined, isOnBehalfOf: false };
}

/** Display form used in the PDF header block */
export function formatMailbox(mailbox: Mailbox | undefined): string {
  const name = mailbox?.name?.trim();
  const email = mailbox?.email?.trim();
  if (name && email && name !== email) {
    return `${name} <${email}>`;
  }
  return email || name || "Unknown";
}
