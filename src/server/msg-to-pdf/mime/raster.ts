import sharp from "sharp";

export type RasterFormat = "png" | "jpeg" | "other";

export function sniffRasterFormat(bytes: Uint8Array): RasterFormat {
  if (bytes.length > 8 && bytes[0] === 0x89 && bytes[1] === 0x50 && bytes[2] === 0x4e && bytes[3] === 0x47) {
    return "png";
  }
  if (bytes.length > 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff) {
    return "jpeg";
  }
  return "other";
}

/** Image bytes a PDF writer can embed as they are */
export interface EmbeddableImage {
  data: Buffer;
  format: "png" | "jpeg";
  width: number;
  height: number;
}

/**
 * PNG and JPEG pass through. GIF, TIFF and WebP are transcoded to PNG and
 * flattened onto white (first frame only). Throws when sharp cannot decode
 * the bytes.
 */
export async function toEmbeddableImage(bytes: Uint8Array): Promise<EmbeddableImage> {
  const input = Buffer.from(bytes);
  const format = sniffRasterFormat(input);
  const data = format === "other" ? await sharp(input).flatten({ background: "#ffffff" }).png().toBuffer() : input;

  const { width, height } = await sharp(data).metadata();
  if (!width || !height) {
    throw new Error("Image has no dimensions");
  }
  return { data, format: format === "jpeg" ? "jpeg" : "png", width, height };
}
