import type { Mailbox } from "../types/index.js";

/**
 * Extracts a single header's full value (handling folded lines) from the raw
 * transport headers kept in PidTagTransportMessageHeaders.
 */
export function extractHeaderValue(transportHeaders: string, headerName: string): string | undefined {
  const lines = transportHeaders.replace(/\r?\n/g, "\n").split("\n");
  const pattern = new RegExp(`^${headerName}:\\s*(.*)`, "i");

  let value = "";
  let found = false;

  for (const line of lines) {
    if (!found) {
      const match = line.match(pattern);
      if (match) {
        value = match[1];
        found = true;
      }
    } else if (line.startsWith(" ") || line.startsWith("\t")) {
      value += ` ${line.trim()}`;
    } else {
      break;
    }
  }

  return found && value.trim() ? value.trim() : undefined;
}

/**
 * Parses one address: `user@example.com`, `"Display Name" <user@example.com>`,
 * `Display Name <user@example.com>` or a bare display name.
 */
export function parseAddress(value: string): Mailbox | undefined {
  const trimmed = value.trim();
  if (!trimmed) return undefined;

  const angleMatch = trimmed.match(/^(.*?)\s*<([^>]+)>\s*$/);
  if (angleMatch) {
    const rawName = angleMatch[1].replace(/^["']|["']$/g, "").trim();
    return { name: rawName || undefined, email: angleMatch[2].trim() };
  }

  if (trimmed.includes("@")) {
    return { email: trimmed };
  }

  return { name: trimmed };
}

/**
 * Splits an address header value on commas that are not inside angle brackets
 * or quotes.
 */
export function parseAddressList(headerValue: string): Mailbox[] {
  const parts: string[] = [];
  let current = "";
  let inAngle = 0;
  let inQuote = false;

  for (const char of headerValue) {
    if (char === '"' && !inAngle) {
      inQuote = !inQuote;
    } else if (char === "<" && !inQuote) {
      inAngle++;
    } else if (char === ">" && !inQuote) {
      inAngle = Math.max(0, inAngle - 1);
    }

    if (char === "," && !inAngle && !inQuote) {
      parts.push(current);
      current = "";
    } else {
      current += char;
    }
  }
  parts.push(current);

  return parts.map(parseAddress).filter((a): a is Mailbox => a !== undefined);
}

export function parseDateFromTransportHeaders(transportHeaders: string): Date | undefined {
  const value = extractHeaderValue(transportHeaders, "Date");
  if (!value) return undefined;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}
