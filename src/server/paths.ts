import { realpath } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";

function isInside(root: string, path: string): boolean {
  const rel = relative(root, path);
  return rel === "" || (rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/** The path itself, or its nearest existing ancestor, with symlinks resolved */
async function realAncestor(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (error) {
    const parent = dirname(path);
    if (!isMissing(error) || parent === path) throw error;
    return realAncestor(parent);
  }
}

/**
 * Resolves a client-supplied path against `root`. Returns undefined when the
 * path leads outside the root, lexically or through a symlink.
 */
export async function resolveUnderRoot(root: string, requested: string): Promise<string | undefined> {
  const resolvedRoot = resolve(root);
  const path = resolve(resolvedRoot, requested);
  if (!isInside(resolvedRoot, path)) return undefined;

  const [realRoot, real] = await Promise.all([realpath(resolvedRoot), realAncestor(path)]);
  return isInside(realRoot, real) ? path : undefined;
}
