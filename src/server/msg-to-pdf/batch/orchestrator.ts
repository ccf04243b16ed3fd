import { basename, join } from "node:path";
import { type ConvertOptions, pdfFileName, runConversion } from "../converter/index.js";
import { kilobytes, type Logger } from "../logging.js";
import type { BatchReport, ConversionResult } from "../types/index.js";
import { type DiscoveredFile, discoverMsgFiles } from "./discovery.js";
import { runPool } from "./pool.js";

export const DEFAULT_WORKER_COUNT = 4;

export interface BatchOptions extends Omit<ConvertOptions, "outputDirectory" | "outputFileName"> {
  inputPath: string;
  outputDirectory: string;
  recursive?: boolean;
  workerCount?: number;
  /** Called as each file settles, in completion order */
  onResult?: (result: ConversionResult, index: number, total: number) => void;
  logger?: Logger;
}

export function summarizeBatch(results: ConversionResult[]): BatchReport {
  return {
    total: results.length,
    succeeded: results.filter((r) => r.status === "succeeded").length,
    failed: results.filter((r) => r.status === "failed").length,
    cancelled: results.filter((r) => r.status === "cancelled").length,
    results,
  };
}

export function describeResult(result: ConversionResult): string {
  const name = basename(result.sourcePath);
  switch (result.status) {
    case "succeeded":
      return `ok ${name} -> ${result.outputPath} (${result.pageCount} pages, ${kilobytes(result.byteSize)})`;
    case "failed":
      return `failed ${name}: ${result.failure.kind}: ${result.failure.message}`;
    case "cancelled":
      return `cancelled ${name}`;
  }
}

/**
 * Output file names in discovery order. Sources whose PDF names differ only in
 * case ("a.msg", "A.MSG") would overwrite each other on a case-insensitive
 * file system; the first keeps its name and later ones get " (2)", " (3)".
 */
export function assignOutputNames(files: DiscoveredFile[], flatten: boolean): string[] {
  const key = (file: DiscoveredFile, name: string) =>
    (flatten ? name : `${file.relativeDirectory}/${name}`).toLowerCase();

  const natural = files.map((file) => pdfFileName(file.sourcePath));
  const reserved = new Set(files.map((file, index) => key(file, natural[index])));
  const taken = new Set<string>();

  return files.map((file, index) => {
    let name = natural[index];
    if (taken.has(key(file, name))) {
      const stem = name.slice(0, -".pdf".length);
      let suffix = 2;
      do {
        name = `${stem} (${suffix++}).pdf`;
      } while (taken.has(key(file, name)) || reserved.has(key(file, name)));
    }
    taken.add(key(file, name));
    return name;
  });
}

function validateWorkerCount(workerCount: number): void {
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new RangeError(`workerCount must be a positive integer, got ${workerCount}`);
  }
}

/**
 * Converts every discovered file with a fixed pool of workers. One file's
 * failure is recorded in its result and never stops the others. Results keep
 * discovery order. Files not finished when `signal` aborts come back cancelled.
 */
export async function runBatch(options: BatchOptions): Promise<BatchReport> {
  const {
    inputPath,
    outputDirectory,
    recursive = false,
    workerCount = DEFAULT_WORKER_COUNT,
    onResult,
    logger = console,
    ...convertOptions
  } = options;
  validateWorkerCount(workerCount);
  const startTime = Date.now();

  const files = await discoverMsgFiles(inputPath, { recursive });
  logger.log(`[batch] Found ${files.length} file(s) in ${inputPath}, ${workerCount} worker(s)`);
  const outputNames = assignOutputNames(files, !recursive);

  const results = await runPool(files, workerCount, async (file, index) => {
    const fileStart = Date.now();
    const result = await runConversion(file.sourcePath, {
      ...convertOptions,
      outputDirectory: recursive ? join(outputDirectory, file.relativeDirectory) : outputDirectory,
      outputFileName: outputNames[index],
    });

    const line = `[batch] ${index + 1}/${files.length} ${describeResult(result)} in ${Date.now() - fileStart}ms`;
    if (result.status === "failed") {
      logger.error(line);
    } else {
      logger.log(line);
    }
    if (result.status !== "cancelled") {
      for (const warning of result.warnings) {
        logger.warn(`[batch] ${basename(result.sourcePath)}: ${warning.fileName}: ${warning.message}`);
      }
    }

    onResult?.(result, index, files.length);
    return result;
  });

  const report = summarizeBatch(results);
  logger.log(
    `[batch] Done in ${Date.now() - startTime}ms: ${report.succeeded} succeeded, ${report.failed} failed, ${report.cancelled} cancelled`,
  );
  return report;
}
