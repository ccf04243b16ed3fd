export {
  type BodyKind,
  buildBodyDocument,
  type PreparedBody,
  prepareBody,
  renderBody,
} from "./body-renderer.js";
export type { RenderingEngine, RenderOptions } from "./engine.js";
export { attachmentLine, buildAttachmentList, buildHeaderBlock, headerFields } from "./header-block.js";
export { bodyContent, escapeHtml, plainTextToHtml } from "./html.js";
export { type InlineResolution, resolveInlineImages, toDataUri } from "./inline-images.js";
export { DEFAULT_BODY_FONT, defaultTextFont, TextFont } from "./fonts.js";
export {
  imagePlaceholder,
  loadInlineImage,
  type MarkupBlock,
  PdfKitEngine,
  type PdfKitEngineOptions,
  splitMarkup,
} from "./pdfkit-engine.js";
export { isWinAnsi, toWinAnsi } from "./win-ansi.js";
