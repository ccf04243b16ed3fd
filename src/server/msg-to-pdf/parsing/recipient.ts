import { getRecipientType } from "../mime/index.js";
import type { Mailbox, ParsedRecipient } from "../types/index.js";
import type { PropertyBag } from "./property-bag.js";
import { PidTagDisplayName, PidTagEmailAddress, PidTagRecipientType, PidTagSmtpAddress } from "./properties.js";
import { extractHeaderValue, parseAddressList } from "./transport-headers.js";

/**
 * Parsed recipient addresses from transport headers, grouped by type
 */
export interface TransportRecipients {
  to: Mailbox[];
  cc: Mailbox[];
  bcc: Mailbox[];
}

/**
 * Parses To:, Cc:, and Bcc: headers from raw transport message headers.
 */
export function parseRecipientsFromTransportHeaders(transportHeaders: string): TransportRecipients {
  const toValue = extractHeaderValue(transportHeaders, "To");
  const ccValue = extractHeaderValue(transportHeaders, "Cc");
  const bccValue = extractHeaderValue(transportHeaders, "Bcc");

  return {
    to: toValue ? parseAddressList(toValue) : [],
    cc: ccValue ? parseAddressList(ccValue) : [],
    bcc: bccValue ? parseAddressList(bccValue) : [],
  };
}

/**
 * Resolves a recipient's address by display name, searching the matching
 * recipient type first and then all of them.
 */
function resolveEmailFromTransportHeaders(
  displayName: string,
  recipientType: "to" | "cc" | "bcc",
  transportRecipients: TransportRecipients,
): string | undefined {
  const normalizedName = displayName.toLowerCase().trim();
  const typedAddresses = transportRecipients[recipientType];
  const allAddresses = [...transportRecipients.to, ...transportRecipients.cc, ...transportRecipients.bcc];

  for (const addresses of [typedAddresses, allAddresses]) {
    for (const addr of addresses) {
      if (addr.email && addr.name && addr.name.toLowerCase().trim() === normalizedName) {
        return addr.email;
      }
    }
  }

  return undefined;
}

export function parseRecipient(bag: PropertyBag, transportRecipients?: TransportRecipients): ParsedRecipient {
  const name = bag.get(PidTagDisplayName) || "";
  const type = getRecipientType(bag.get(PidTagRecipientType));
  let email: string | undefined = bag.get(PidTagSmtpAddress) || bag.get(PidTagEmailAddress);

  if (!email && name && transportRecipients) {
    email = resolveEmailFromTransportHeaders(name, type, transportRecipients);
  }

  return { name, email: email ?? name, type };
}
