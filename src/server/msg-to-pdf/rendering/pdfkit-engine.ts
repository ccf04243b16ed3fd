import { convert, type HtmlToTextOptions } from "html-to-text";
import PDFDocument from "pdfkit";
import { type EmbeddableImage, toEmbeddableImage } from "../mime/index.js";
import type { RenderingEngine, RenderOptions } from "./engine.js";
import { defaultTextFont, type TextFont } from "./fonts.js";

export type MarkupBlock = { kind: "markup"; html: string } | { kind: "image"; src: string };

const PAGE_MARGIN = 50;
const FONT_SIZE = 10;
const BODY_FONT = "body";

const IMG_TAG = /<img\b[^>]*>/gi;
const IMG_SRC = /\bsrc\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))/i;
const DATA_URI = /^data:([^;,]*)(;base64)?,/i;

const TEXT_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  preserveNewlines: true,
  selectors: [
    { selector: "a", options: { ignoreHref: true } },
    { selector: "img", format: "skip" },
    { selector: "style", format: "skip" },
    { selector: "script", format: "skip" },
    { selector: "h1", options: { uppercase: false } },
    { selector: "h2", options: { uppercase: false } },
    { selector: "h3", options: { uppercase: false } },
    { selector: "table", format: "dataTable" },
  ],
};

/**
 * Splits markup around <img> tags so images can be drawn between text runs.
 */
export function splitMarkup(html: string): MarkupBlock[] {
  const blocks: MarkupBlock[] = [];
  let last = 0;
  for (const match of html.matchAll(IMG_TAG)) {
    const index = match.index ?? 0;
    if (index > last) blocks.push({ kind: "markup", html: html.slice(last, index) });
    const src = IMG_SRC.exec(match[0]);
    blocks.push({ kind: "image", src: src ? (src[1] ?? src[2] ?? src[3] ?? "") : "" });
    last = index + match[0].length;
  }
  if (last < html.length) blocks.push({ kind: "markup", html: html.slice(last) });
  return blocks;
}

export function imagePlaceholder(src: string): string {
  const dataUri = DATA_URI.exec(src);
  if (dataUri) return `[image: ${dataUri[1] || "inline data"}]`;
  return src ? `[image: ${src}]` : "[image]";
}

/**
 * Decodes a base64 data URI into an image pdfkit can draw. Returns undefined
 * for anything that is not inline image data, or that sharp cannot decode.
 */
export async function loadInlineImage(src: string): Promise<EmbeddableImage | undefined> {
  const dataUri = DATA_URI.exec(src);
  if (!dataUri || !dataUri[2]) return undefined;

  try {
    return await toEmbeddableImage(Buffer.from(src.slice(dataUri[0].length), "base64"));
  } catch {
    // Undecodable image bytes render as a placeholder
    return undefined;
  }
}

export interface PdfKitEngineOptions {
  /** Defaults to the bundled Unicode font */
  font?: TextFont;
}

/**
 * Default engine: text through html-to-text, data images drawn in place, A4
 * pages.
 */
export class PdfKitEngine implements RenderingEngine {
  private readonly font: TextFont | undefined;

  constructor(options: PdfKitEngineOptions = {}) {
    this.font = options.font;
  }

  async render(html: string, options: RenderOptions): Promise<Uint8Array> {
    const font = this.font ?? defaultTextFont();
    const blocks = splitMarkup(html);
    const images = await Promise.all(
      blocks.map((block) => (block.kind === "image" ? loadInlineImage(block.src) : Promise.resolve(undefined))),
    );

    return new Promise<Uint8Array>((resolve, reject) => {
      const doc = new PDFDocument({ size: "A4", margin: PAGE_MARGIN, info: { Title: options.title } });
      const chunks: Buffer[] = [];
      doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      doc.on("end", () => resolve(new Uint8Array(Buffer.concat(chunks))));
      doc.on("error", reject);

      try {
        if (font.embedded) {
          doc.registerFont(BODY_FONT, font.source);
          doc.font(BODY_FONT);
        } else {
          doc.font(font.source);
        }
        doc.fontSize(FONT_SIZE);
        blocks.forEach((block, i) => {
          if (block.kind === "markup") {
            drawText(doc, font, convert(block.html, TEXT_OPTIONS));
            return;
          }
          const image = images[i];
          if (image) {
            drawImage(doc, image);
          } else {
            drawText(doc, font, imagePlaceholder(block.src));
          }
        });
        doc.end();
      } catch (error) {
        reject(error);
      }
    });
  }
}

function contentWidth(doc: PDFKit.PDFDocument): number {
  return doc.page.width - doc.page.margins.left - doc.page.margins.right;
}

function drawText(doc: PDFKit.PDFDocument, font: TextFont, text: string): void {
  const trimmed = text.replace(/^\n+|\s+$/g, "");
  if (!trimmed) return;
  doc.text(font.sanitize(trimmed), doc.page.margins.left, doc.y, { width: contentWidth(doc) });
}

function drawImage(doc: PDFKit.PDFDocument, image: EmbeddableImage): void {
  const maxHeight = doc.page.height - doc.page.margins.top - doc.page.margins.bottom;
  const scale = Math.min(1, contentWidth(doc) / image.width, maxHeight / image.height);
  const width = image.width * scale;
  const height = image.height * scale;

  if (doc.y + height > doc.page.height - doc.page.margins.bottom) {
    doc.addPage();
  }
  const top = doc.y;
  doc.image(image.data, doc.page.margins.left, top, { width, height });
  doc.y = top + height;
  doc.moveDown(0.5);
}
