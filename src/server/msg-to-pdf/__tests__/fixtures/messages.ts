import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { blankPdf, pngImage } from "./engines.js";
import { type AttachmentFixture, bin, buildMsg, type FixtureProperty, str } from "./msg-builder.js";

export interface SampleMessage {
  subject?: string;
  text?: string;
  html?: string;
  attachments?: AttachmentFixture[];
}

export function sampleMsg(sample: SampleMessage = {}): Uint8Array {
  const properties: FixtureProperty[] = [str(0x0c1a, "Alice"), str(0x5d01, "alice@example.com")];
  if (sample.subject !== undefined) properties.push(str(0x0037, sample.subject));
  if (sample.text !== undefined) properties.push(str(0x1000, sample.text));
  if (sample.html !== undefined) properties.push(str(0x1013, sample.html));
  return buildMsg({
    properties,
    recipients: [[str(0x3001, "Bob"), str(0x39fe, "bob@example.com")]],
    attachments: sample.attachments,
  });
}

export function fileAttachment(fileName: string, content: Uint8Array, contentId?: string): AttachmentFixture {
  const properties = [str(0x3707, fileName), bin(0x3701, content)];
  if (contentId) properties.push(str(0x3712, contentId));
  return { properties };
}

export async function pdfAttachment(fileName: string, pages: number): Promise<AttachmentFixture> {
  return fileAttachment(fileName, await blankPdf(pages));
}

export async function pngAttachment(fileName: string, contentId?: string): Promise<AttachmentFixture> {
  return fileAttachment(fileName, await pngImage(16, 16), contentId);
}

/** Temporary directories removed by `cleanup` */
export class TempDirs {
  private readonly paths: string[] = [];

  async create(): Promise<string> {
    const path = await mkdtemp(join(tmpdir(), "msg-to-pdf-"));
    this.paths.push(path);
    return path;
  }

  async cleanup(): Promise<void> {
    await Promise.all(this.paths.splice(0).map((path) => rm(path, { recursive: true, force: true })));
  }
}
