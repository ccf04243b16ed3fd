import { randomUUID } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";

/** Source basename with its extension swapped for .pdf */
export function pdfFileName(sourcePath: string): string {
  const name = basename(sourcePath);
  const extension = extname(name);
  return `${extension ? name.slice(0, -extension.length) : name}.pdf`;
}

export function outputPathFor(sourcePath: string, outputDirectory?: string, fileName?: string): string {
  return join(outputDirectory ?? dirname(sourcePath), fileName ?? pdfFileName(sourcePath));
}

/**
 * Writes to a temporary sibling and renames it into place, so the final path
 * only ever holds a complete file.
 */
export async function writeFileAtomic(path: string, bytes: Uint8Array): Promise<void> {
  const directory = dirname(path);
  await mkdir(directory, { recursive: true });

  const temporary = join(directory, `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(temporary, bytes);
    await rename(temporary, path);
  } catch (error) {
    await rm(temporary, { force: true });
    throw error;
  }
}
