export { classifyAttachment } from "./classify.js";
export { type ImagePlacement, imageToPdf, placeImage } from "./image-page.js";
export { type AttachmentPlan, type PlanOptions, planAttachments } from "./planner.js";
