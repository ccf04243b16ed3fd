import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join, relative, sep } from "node:path";
import { ConversionError, describeError } from "../errors/index.js";

export interface DiscoveredFile {
  sourcePath: string;
  /** Directory of the file relative to the discovery root, "" at the root */
  relativeDirectory: string;
}

export interface DiscoveryOptions {
  recursive?: boolean;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function isMsgFile(entry: Dirent, path: string): Promise<boolean> {
  if (!entry.name.toLowerCase().endsWith(".msg")) return false;
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;

  // Links count when they resolve to a regular file; dangling links are skipped
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isMissing(error)) return false;
    throw error;
  }
}

function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function walk(root: string, directory: string, recursive: boolean, found: string[]): Promise<void> {
  const entries = await readdir(directory, { withFileTypes: true });
  for (const entry of entries) {
    const path = join(directory, entry.name);
    if (await isMsgFile(entry, path)) {
      found.push(relative(root, path));
    } else if (recursive && entry.isDirectory()) {
      await walk(root, path, recursive, found);
    }
  }
}

/**
 * A file path yields itself. A directory yields its .msg files (any case),
 * ordered by relative path so every run sees the same order.
 */
export async function discoverMsgFiles(root: string, options: DiscoveryOptions = {}): Promise<DiscoveredFile[]> {
  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      return [{ sourcePath: root, relativeDirectory: "" }];
    }

    const found: string[] = [];
    await walk(root, root, options.recursive ?? false, found);

    return found
      .map((path) => path.split(sep).join("/"))
      .sort(compareCodePoints)
      .map((path) => {
        const slash = path.lastIndexOf("/");
        return {
          sourcePath: join(root, ...path.split("/")),
          relativeDirectory: slash === -1 ? "" : path.slice(0, slash),
        };
      });
  } catch (error) {
    throw new ConversionError("IoFailed", `Cannot read input ${root}: ${describeError(error)}`, { cause: error });
  }
}
