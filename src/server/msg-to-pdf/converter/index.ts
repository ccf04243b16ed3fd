export { toConversionError } from "./errors.js";
export { type AttachmentSummary, type InspectionReport, inspectEmail, inspectMsg, inspectMsgFile } from "./inspect.js";
export { outputPathFor, pdfFileName, writeFileAtomic } from "./output.js";
export {
  type ConvertOptions,
  convertMsgBuffer,
  convertMsgFile,
  type PdfConversion,
  runConversion,
} from "./pipeline.js";
