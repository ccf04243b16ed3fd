import { type PDFDocument, type PDFFont, rgb, StandardFonts } from "pdf-lib";
import { toWinAnsi } from "../rendering/win-ansi.js";

const PAGE_SIZE: [number, number] = [595.28, 841.89];
const MARGIN = 56;
const LABEL_SIZE = 11;
const NAME_SIZE = 16;

/**
 * Breaks text into lines no wider than maxWidth. File names rarely contain
 * spaces, so lines break between characters.
 */
export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const lines: string[] = [];
  let current = "";
  for (const char of text) {
    if (current && font.widthOfTextAtSize(current + char, size) > maxWidth) {
      lines.push(current);
      current = char;
    } else {
      current += char;
    }
  }
  if (current) lines.push(current);
  return lines;
}

/** Adds the page that identifies the source file; always the first page */
export async function addBannerPage(doc: PDFDocument, sourceName: string): Promise<void> {
  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);
  const page = doc.addPage(PAGE_SIZE);
  const [width, height] = PAGE_SIZE;

  let y = height - MARGIN - LABEL_SIZE;
  page.drawText("Source file", { x: MARGIN, y, size: LABEL_SIZE, font: regular, color: rgb(0.4, 0.4, 0.4) });

  y -= NAME_SIZE * 2;
  for (const line of wrapText(toWinAnsi(sourceName) || "(unnamed)", bold, NAME_SIZE, width - 2 * MARGIN)) {
    page.drawText(line, { x: MARGIN, y, size: NAME_SIZE, font: bold });
    y -= NAME_SIZE * 1.3;
  }
}
