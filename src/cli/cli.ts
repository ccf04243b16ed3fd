import { parseArgs } from "node:util";
import { loadConfig } from "../server/config.js";
import {
  describeError,
  describeResult,
  formatMailbox,
  type InspectionReport,
  inspectMsgFile,
  type Logger,
  type RenderingEngine,
  runBatch,
  runConversion,
} from "../server/msg-to-pdf/index.js";
import { formatDisplayDate, formatFileSize } from "../server/msg-to-pdf/mime/index.js";

export const USAGE = `Usage:
  msg-to-pdf convert <file.msg...> [-o <dir>] [--no-merge] [--no-source]
  msg-to-pdf batch <dir> -o <dir> [-r] [-w <workers>] [--no-merge] [--no-source]
  msg-to-pdf info <file.msg> [--json]`;

const OPTIONS = {
  output: { type: "string", short: "o" },
  recursive: { type: "boolean", short: "r" },
  workers: { type: "string", short: "w" },
  "no-merge": { type: "boolean" },
  "no-source": { type: "boolean" },
  json: { type: "boolean" },
  help: { type: "boolean", short: "h" },
} as const;

export interface CliOptions {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  engine?: RenderingEngine;
}

type ParsedArgs = ReturnType<typeof parseCommandLine>;

function parseCommandLine(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

class UsageError extends Error {}

function parseWorkers(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const workers = Number(value);
  if (!Number.isInteger(workers) || workers < 1) {
    throw new UsageError(`--workers must be a positive integer, got "${value}"`);
  }
  return workers;
}

export function formatInspection(report: InspectionReport): string[] {
  const lines = [`Subject:  ${report.subject}`, `From:     ${formatMailbox(report.from)}`];
  if (report.sender) lines.push(`Sender:   ${formatMailbox(report.sender)}`);
  for (const [type, label] of [
    ["to", "To:      "],
    ["cc", "Cc:      "],
    ["bcc", "Bcc:     "],
  ] as const) {
    const recipients = report.recipients.filter((r) => r.type === type);
    if (recipients.length > 0) lines.push(`${label} ${recipients.map((r) => formatMailbox(r)).join("; ")}`);
  }
  lines.push(`Date:     ${formatDisplayDate(report.sentAt)}`);
  if (report.meeting) {
    lines.push(`Meeting:  ${formatDisplayDate(report.meeting.startTime)} to ${formatDisplayDate(report.meeting.endTime)}`);
  }
  lines.push("");

  const length = report.body.length.toLocaleString("en-US");
  const source = report.body.fromRtf ? ", from RTF" : "";
  if (report.body.kind === "html") lines.push(`Body:     HTML (${length} chars${source})`);
  else if (report.body.kind === "text") lines.push(`Body:     Plain text (${length} chars${source})`);
  else lines.push("Body:     (empty)");

  lines.push(`Attachments: ${report.attachments.length}`);
  for (const attachment of report.attachments) {
    const size = attachment.isEmbeddedMessage ? "embedded message" : formatFileSize(attachment.size);
    lines.push(`  - ${attachment.fileName} (${attachment.contentType}, ${size}) [${attachment.disposition}]`);
  }
  return lines;
}

async function convertCommand(args: ParsedArgs, files: string[], options: CliOptions, logger: Logger): Promise<number> {
  if (files.length === 0) throw new UsageError("convert needs at least one .msg file");
  const config = loadConfig(options.env ?? process.env);

  let failed = 0;
  for (const file of files) {
    const result = await runConversion(file, {
      outputDirectory: args.values.output,
      mergeAttachments: args.values["no-merge"] ? false : config.mergeAttachments,
      showSourceBanner: args.values["no-source"] ? false : config.showSourceBanner,
      engine: options.engine,
      signal: options.signal,
    });
    if (result.status === "succeeded") {
      logger.log(describeResult(result));
      for (const warning of result.warnings) {
        logger.warn(`  warning: ${warning.fileName}: ${warning.message}`);
      }
    } else {
      failed++;
      logger.error(describeResult(result));
    }
  }
  return failed > 0 ? 1 : 0;
}

async function batchCommand(args: ParsedArgs, inputs: string[], options: CliOptions, logger: Logger): Promise<number> {
  const [inputPath] = inputs;
  const outputDirectory = args.values.output;
  if (!inputPath || inputs.length > 1) throw new UsageError("batch needs exactly one input path");
  if (!outputDirectory) throw new UsageError("batch needs an output directory (-o)");
  const config = loadConfig(options.env ?? process.env);

  const report = await runBatch({
    inputPath,
    outputDirectory,
    recursive: args.values.recursive ?? false,
    workerCount: parseWorkers(args.values.workers, config.workerCount),
    mergeAttachments: args.values["no-merge"] ? false : config.mergeAttachments,
    showSourceBanner: args.values["no-source"] ? false : config.showSourceBanner,
    engine: options.engine,
    signal: options.signal,
    logger,
  });

  logger.log(`Completed: ${report.succeeded}/${report.total} successful`);
  const unsuccessful = report.results.filter((r) => r.status !== "succeeded");
  if (unsuccessful.length > 0) {
    logger.error("Unsuccessful files:");
    for (const result of unsuccessful) {
      logger.error(`  ${describeResult(result)}`);
    }
  }
  return report.failed > 0 || report.cancelled > 0 ? 1 : 0;
}

async function infoCommand(args: ParsedArgs, files: string[], logger: Logger): Promise<number> {
  const [file] = files;
  if (!file || files.length > 1) throw new UsageError("info needs exactly one .msg file");
  const report = await inspectMsgFile(file);
  if (args.values.json) {
    logger.log(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatInspection(report)) logger.log(line);
  }
  return 0;
}

/**
 * Runs one CLI invocation and resolves to the process exit code: 0 on
 * success, 1 when any file failed, 2 on a usage error.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  const logger = options.logger ?? console;

  try {
    const args = parseCommandLine(argv);
    const [command, ...rest] = args.positionals;
    if (args.values.help || !command) {
      logger.log(USAGE);
      return args.values.help ? 0 : 2;
    }

    switch (command) {
      case "convert":
        return await convertCommand(args, rest, options, logger);
      case "batch":
        return await batchCommand(args, rest, options, logger);
      case "info":
        return await infoCommand(args, rest, logger);
      default:
        throw new UsageError(`Unknown command "${command}"`);
    }
  } catch (error) {
    if (error instanceof UsageError || (error instanceof TypeError && "code" in error)) {
      logger.error(`Error: ${error.message}`);
      logger.error(USAGE);
      return 2;
    }
    logger.error(`Error: ${describeError(error)}`);
    return 1;
  }
}
