import { PDFDocument } from "pdf-lib";
import { toEmbeddableImage } from "../mime/index.js";

/** A4 in points */
const A4_SHORT = 595.28;
const A4_LONG = 841.89;
const PAGE_MARGIN = 36;

export interface ImagePlacement {
  pageWidth: number;
  pageHeight: number;
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Centres an image on an A4 page turned to match its orientation, shrinking
 * it to fit inside the margins. Images are never enlarged.
 */
export function placeImage(imageWidth: number, imageHeight: number): ImagePlacement {
  const landscape = imageWidth > imageHeight;
  const pageWidth = landscape ? A4_LONG : A4_SHORT;
  const pageHeight = landscape ? A4_SHORT : A4_LONG;
  const scale = Math.min(1, (pageWidth - 2 * PAGE_MARGIN) / imageWidth, (pageHeight - 2 * PAGE_MARGIN) / imageHeight);
  const width = imageWidth * scale;
  const height = imageHeight * scale;
  return { pageWidth, pageHeight, x: (pageWidth - width) / 2, y: (pageHeight - height) / 2, width, height };
}

/**
 * Renders a raster image as a one-page PDF. PNG and JPEG embed directly;
 * other formats (GIF, TIFF, WebP) are transcoded to PNG first.
 */
export async function imageToPdf(bytes: Uint8Array): Promise<Uint8Array> {
  const doc = await PDFDocument.create({ updateMetadata: false });
  const source = await toEmbeddableImage(bytes);
  const image = source.format === "jpeg" ? await doc.embedJpg(source.data) : await doc.embedPng(source.data);

  const placement = placeImage(image.width, image.height);
  const page = doc.addPage([placement.pageWidth, placement.pageHeight]);
  page.drawImage(image, { x: placement.x, y: placement.y, width: placement.width, height: placement.height });
  return doc.save();
}
