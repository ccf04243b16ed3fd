export {
  fileExtension,
  formatDisplayDate,
  formatFileSize,
  getMimeType,
  getRecipientType,
  isKnownContentType,
  mapImportance,
  normalizeContentType,
} from "./utils.js";
export { type EmbeddableImage, type RasterFormat, sniffRasterFormat, toEmbeddableImage } from "./raster.js";
