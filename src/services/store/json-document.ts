/**
 * Whole-file JSON array documents with atomic replacement.
 */

import { randomUUID } from "node:crypto";
import { open, readFile, rename, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { Logger } from "../../types/logger.js";
import type { SaveResult } from "../../types/task.js";

/**
 * Read a JSON array. A missing, empty or malformed file, or any JSON
 * value that is not an array, reads as an empty array.
 */
export async function readDocument(path: string, logger?: Logger): Promise<unknown[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (!isNotFound(error)) {
      logger?.warn("cannot read document; treating as empty", {
        path,
        error: errorMessage(error),
      });
    }
    return [];
  }

  if (content.trim() === "") return [];

  try {
    const data: unknown = JSON.parse(content);
    if (Array.isArray(data)) return data;
    logger?.warn("document is not a JSON array; treating as empty", { path });
  } catch (error) {
    logger?.warn("document is not valid JSON; treating as empty", {
      path,
      error: errorMessage(error),
    });
  }
  return [];
}

/**
 * Replace the document with `entries`.
 * Content goes to a temporary file beside the target, is synced and
 * closed, then renamed over the target; readers never see a partial file.
 */
export async function writeDocument(path: string, entries: unknown[]): Promise<SaveResult> {
  const tmp = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
  const content = JSON.stringify(entries, null, 2) + "\n";

  try {
    const handle = await open(tmp, "w");
    try {
      await handle.writeFile(content, "utf-8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tmp, path);
    return { success: true };
  } catch (error) {
    await rm(tmp, { force: true });
    return { success: false, error: errorMessage(error) };
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
