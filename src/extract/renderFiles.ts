import { readdir, stat } from "node:fs/promises";
import { DirectoryNotFoundError } from "../common/errors.js";

export const RENDER_FILE_PATTERN = /^renders_\d{4}-\d{2}-\d{2}\.csv$/;

export function isRenderFileName(name: string): boolean {
  return RENDER_FILE_PATTERN.test(name);
}

export async function assertDirectory(path: string): Promise<void> {
  let isDirectory = false;
  try {
    isDirectory = (await stat(path)).isDirectory();
  } catch (error) {
    if (!isMissingPathError(error)) {
      throw error;
    }
  }
  if (!isDirectory) {
    throw new DirectoryNotFoundError(path);
  }
}

/**
 * Basenames of the daily render logs directly inside `dir`, in lexical order.
 * Subdirectories are never descended into, even when their name matches.
 */
export async function listRenderFiles(dir: string): Promise<string[]> {
  await assertDirectory(dir);
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => !entry.isDirectory() && isRenderFileName(entry.name))
    .map((entry) => entry.name)
    .sort();
}

function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}
