// Batch conversion
export {
  type BatchOptions,
  DEFAULT_WORKER_COUNT,
  describeResult,
  discoverMsgFiles,
  runBatch,
  summarizeBatch,
} from "./batch/index.js";
// Container reading
export { type ContainerNode, ContainerTree, type NodeHandle, type PropertySource, readContainer } from "./container/index.js";
// Single-file conversion and inspection
export {
  type AttachmentSummary,
  type ConvertOptions,
  convertMsgBuffer,
  convertMsgFile,
  type InspectionReport,
  inspectMsg,
  inspectMsgFile,
  outputPathFor,
  type PdfConversion,
  pdfFileName,
  runConversion,
} from "./converter/index.js";
export { ConversionError, describeError, type FailureKind, isConversionError } from "./errors/index.js";
export { kilobytes, type Logger } from "./logging.js";
// Email model
export { buildEmail, DEFAULT_MAX_EMBED_DEPTH, formatMailbox, parseMsg } from "./parsing/index.js";
// Attachment planning
export { classifyAttachment, planAttachments } from "./planning/index.js";
// Rendering
export { PdfKitEngine, type RenderingEngine, resolveInlineImages } from "./rendering/index.js";
export { assemblePdf } from "./assembly/index.js";
export type {
  Attachment,
  BatchReport,
  ConversionOptions,
  ConversionResult,
  ConversionStage,
  ConversionWarning,
  Disposition,
  Email,
  Mailbox,
  ParsedRecipient,
} from "./types/index.js";
