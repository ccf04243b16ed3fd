import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { assemblePdf } from "../assembly/index.js";
import { ConversionError } from "../errors/index.js";
import { parseMsg } from "../parsing/index.js";
import { planAttachments } from "../planning/index.js";
import { PdfKitEngine, prepareBody, type RenderingEngine, renderBody } from "../rendering/index.js";
import type {
  ConversionOptions,
  ConversionResult,
  ConversionStage,
  ConversionSuccess,
  ConversionWarning,
  Email,
} from "../types/index.js";
import { toConversionError } from "./errors.js";
import { outputPathFor, writeFileAtomic } from "./output.js";

export interface ConvertOptions extends ConversionOptions {
  /** Defaults to the directory of the source file */
  outputDirectory?: string;
  /** Defaults to the source name with a .pdf extension */
  outputFileName?: string;
  engine?: RenderingEngine;
  signal?: AbortSignal;
  onStage?: (stage: ConversionStage, sourcePath: string) => void;
}

export interface PdfConversion {
  bytes: Uint8Array;
  pageCount: number;
  warnings: ConversionWarning[];
  email: Email;
}

const defaultEngine = new PdfKitEngine();

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new ConversionError("Cancelled", "Conversion was cancelled");
  }
}

/**
 * One file moving through parsing, rendering and merging. Keeps the current
 * stage and the warnings gathered so far for the failure report.
 */
class ConversionRun {
  stage: ConversionStage = "parsing";
  warnings: ConversionWarning[] = [];

  constructor(
    private readonly sourcePath: string,
    private readonly options: ConvertOptions,
  ) {}

  enter(stage: ConversionStage): void {
    throwIfCancelled(this.options.signal);
    this.stage = stage;
    this.options.onStage?.(stage, this.sourcePath);
  }

  async convert(bytes: Uint8Array): Promise<PdfConversion> {
    const { mergeAttachments = true, showSourceBanner = true, maxEmbedDepth } = this.options;

    this.enter("parsing");
    const email = parseMsg(bytes, { maxEmbedDepth });

    this.enter("rendering");
    const body = prepareBody(email);
    const remaining = email.attachments.filter((attachment) => !body.consumed.includes(attachment));
    const plan = await planAttachments(remaining, { mergeAttachments });
    this.warnings = plan.warnings;
    const rendered = await renderBody(email, body, plan.entries, this.options.engine ?? defaultEngine);

    this.enter("merging");
    const assembled = await assemblePdf({
      body: rendered,
      fragments: plan.fragments,
      banner: showSourceBanner ? basename(this.sourcePath) : undefined,
      title: email.subject,
    });

    return { bytes: assembled.bytes, pageCount: assembled.pageCount, warnings: this.warnings, email };
  }

  async convertFile(): Promise<ConversionSuccess> {
    throwIfCancelled(this.options.signal);
    const bytes = new Uint8Array(await readFile(this.sourcePath));
    const pdf = await this.convert(bytes);

    throwIfCancelled(this.options.signal);
    const outputPath = outputPathFor(this.sourcePath, this.options.outputDirectory, this.options.outputFileName);
    await writeFileAtomic(outputPath, pdf.bytes);

    return {
      status: "succeeded",
      sourcePath: this.sourcePath,
      outputPath,
      byteSize: pdf.bytes.length,
      pageCount: pdf.pageCount,
      warnings: pdf.warnings,
    };
  }
}

/**
 * Converts bytes of a .msg file to PDF bytes without touching disk.
 * `sourceName` appears on the banner page.
 */
export async function convertMsgBuffer(
  bytes: Uint8Array,
  sourceName: string,
  options: ConvertOptions = {},
): Promise<PdfConversion> {
  const run = new ConversionRun(sourceName, options);
  try {
    return await run.convert(bytes);
  } catch (error) {
    throw toConversionError(error, run.stage);
  }
}

/**
 * Converts one file and writes `<name>.pdf`. Throws ConversionError on any
 * failure, including cancellation.
 */
export async function convertMsgFile(sourcePath: string, options: ConvertOptions = {}): Promise<ConversionSuccess> {
  const run = new ConversionRun(sourcePath, options);
  try {
    return await run.convertFile();
  } catch (error) {
    throw toConversionError(error, run.stage);
  }
}

/**
 * Converts one file and reports the outcome as a tagged result; never throws.
 */
export async function runConversion(sourcePath: string, options: ConvertOptions = {}): Promise<ConversionResult> {
  const run = new ConversionRun(sourcePath, options);
  try {
    return await run.convertFile();
  } catch (error) {
    const failure = toConversionError(error, run.stage);
    if (failure.kind === "Cancelled") {
      return { status: "cancelled", sourcePath };
    }
    return {
      status: "failed",
      sourcePath,
      failure: { kind: failure.kind, message: failure.message },
      warnings: run.warnings,
    };
  }
}
