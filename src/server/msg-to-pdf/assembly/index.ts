export { type AssembledPdf, type AssemblyInput, assemblePdf } from "./assembler.js";
export { addBannerPage, wrapText } from "./banner.js";
