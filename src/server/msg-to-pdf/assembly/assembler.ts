import { PDFDocument } from "pdf-lib";
import { ConversionError, describeError } from "../errors/index.js";
import { addBannerPage } from "./banner.js";

export interface AssemblyInput {
  /** Rendered header block and body */
  body: Uint8Array;
  /** Attachment fragments, already in attachment order */
  fragments: readonly Uint8Array[];
  /** Source file name for the banner page; no banner when undefined */
  banner?: string;
  title?: string;
}

export interface AssembledPdf {
  bytes: Uint8Array;
  pageCount: number;
}

async function appendPages(output: PDFDocument, bytes: Uint8Array, label: string): Promise<void> {
  let source: PDFDocument;
  try {
    source = await PDFDocument.load(bytes, { updateMetadata: false });
  } catch (error) {
    throw new ConversionError("AssemblyFailed", `${label} is not a well-formed PDF: ${describeError(error)}`, {
      cause: error,
    });
  }

  const pages = await output.copyPages(source, source.getPageIndices());
  for (const page of pages) {
    output.addPage(page);
  }
}

/**
 * Merges banner, body and fragments in that fixed order. Document metadata
 * carries no timestamps, so equal input gives an equal page structure.
 */
export async function assemblePdf(input: AssemblyInput): Promise<AssembledPdf> {
  const output = await PDFDocument.create({ updateMetadata: false });
  if (input.title) {
    output.setTitle(input.title);
  }

  if (input.banner !== undefined) {
    await addBannerPage(output, input.banner);
  }

  await appendPages(output, input.body, "Rendered body");
  for (const [index, fragment] of input.fragments.entries()) {
    await appendPages(output, fragment, `Attachment fragment ${index + 1}`);
  }

  return { bytes: await output.save(), pageCount: output.getPageCount() };
}
