import { decompressRTF } from "@kenjiuno/decompressrtf";
import { convert } from "html-to-text";
import iconvLite from "iconv-lite";
import { deEncapsulateSync } from "rtf-stream-parser";
import type { EmailBody } from "../types/index.js";

/** Destinations whose groups never hold visible text */
const HIDDEN_DESTINATIONS = new Set([
  "fonttbl",
  "colortbl",
  "stylesheet",
  "info",
  "pict",
  "object",
  "fldinst",
  "listtable",
  "listoverridetable",
  "themedata",
  "datastore",
  "latentstyles",
]);

const BREAKS: Record<string, string> = { par: "\n", line: "\n", tab: "\t" };

/* control word | hex escape | escaped symbol | other control symbol | brace | text run */
const RTF_TOKEN = /\\([a-z]+)-?\d* ?|\\'([0-9a-f]{2})|\\([\\{}])|\\([^a-z])|([{}])|([^\\{}]+)/gi;

/**
 * Builds an email body from PidTagRtfCompressed, for messages that store no
 * plain or HTML body. Encapsulated HTML (\fromhtml1) becomes the HTML body;
 * other RTF is reduced to plain text. The decompressed RTF is kept as `rtf`.
 */
export function rtfToEmailBody(compressed: Uint8Array): EmailBody | undefined {
  if (compressed.length === 0) return undefined;

  const rtf = decompress(compressed);
  if (rtf === undefined) return undefined;

  const encapsulated = deEncapsulate(rtf);
  if (encapsulated?.mode === "html") {
    return { text: convert(encapsulated.text, { wordwrap: false }), html: encapsulated.text, rtf };
  }
  if (encapsulated) {
    return { text: encapsulated.text, rtf };
  }

  const text = rtfToPlainText(rtf);
  return text ? { text, rtf } : undefined;
}

function decompress(compressed: Uint8Array): string | undefined {
  try {
    return Buffer.from(decompressRTF(Array.from(compressed))).toString("latin1");
  } catch {
    // Not a valid compressed RTF stream; the message has no usable RTF body
    return undefined;
  }
}

function deEncapsulate(rtf: string): { mode: "html" | "text"; text: string } | undefined {
  try {
    const result = deEncapsulateSync(rtf, { decode: iconvLite.decode, mode: "either" });
    const text = typeof result.text === "string" ? result.text : result.text.toString("utf-8");
    return { mode: result.mode === "html" ? "html" : "text", text };
  } catch {
    // rtf-stream-parser throws for RTF that carries no \fromhtml or \fromtext body
    return undefined;
  }
}

/**
 * Visible text of plain RTF: paragraph, line and tab controls become
 * whitespace, hex escapes decode as Windows-1252, hidden destinations and
 * `{\*...}` groups are dropped.
 */
export function rtfToPlainText(rtf: string): string {
  let text = "";
  let depth = 0;
  let hiddenDepth = 0;
  let groupStart = false;

  for (const [, word, hex, escaped, symbol, brace, run] of rtf.matchAll(RTF_TOKEN)) {
    if (brace === "{") {
      depth++;
      groupStart = true;
      continue;
    }
    if (brace === "}") {
      if (hiddenDepth === depth) hiddenDepth = 0;
      depth--;
      groupStart = false;
      continue;
    }

    const firstInGroup = groupStart;
    groupStart = false;
    if (hiddenDepth > 0) continue;

    if (word !== undefined) {
      const control = word.toLowerCase();
      if (firstInGroup && HIDDEN_DESTINATIONS.has(control)) {
        hiddenDepth = depth;
      } else {
        text += BREAKS[control] ?? "";
      }
    } else if (hex !== undefined) {
      text += iconvLite.decode(Buffer.from([Number.parseInt(hex, 16)]), "windows1252");
    } else if (escaped !== undefined) {
      text += escaped;
    } else if (symbol !== undefined) {
      if (symbol === "*" && firstInGroup) hiddenDepth = depth;
      else if (symbol === "\n" || symbol === "\r") text += "\n";
      else if (symbol === "~") text += " ";
    } else if (run !== undefined) {
      text += run.replace(/[\r\n]/g, "");
    }
  }

  return text.trim();
}
