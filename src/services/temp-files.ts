// ABOUTME: Housekeeping for transient media files (raw takes and converted voice notes).
// ABOUTME: Purges files for finished attempts and sweeps stale leftovers at startup.

import { mkdir, readdir, rm, stat } from "node:fs/promises";
import { extname, join } from "node:path";
import { errorMessage } from "../errors.js";

const MEDIA_EXTENSIONS = new Set([".wav", ".ogg"]);
const STALE_AFTER_MS = 60 * 60 * 1000;

/**
 * Remove files, ignoring ones that are already gone.
 */
export async function purgeFiles(paths: Iterable<string>): Promise<void> {
  for (const path of paths) {
    try {
      await rm(path, { force: true });
    } catch (err) {
      console.warn(`[Media] Could not remove ${path}:`, errorMessage(err));
    }
  }
}

/**
 * Delete media files older than `maxAgeMs` from a previous run.
 * Returns the removed paths.
 */
export async function cleanupStaleMedia(
  dir: string,
  maxAgeMs = STALE_AFTER_MS,
  now = Date.now(),
): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const removed: string[] = [];

  for (const name of await readdir(dir)) {
    if (!MEDIA_EXTENSIONS.has(extname(name).toLowerCase())) continue;
    const path = join(dir, name);
    try {
      const info = await stat(path);
      if (info.isFile() && now - info.mtimeMs > maxAgeMs) {
        await rm(path, { force: true });
        removed.push(path);
      }
    } catch (err) {
      console.warn(`[Media] Skipping ${path}:`, errorMessage(err));
    }
  }

  if (removed.length > 0) {
    console.log(`[Media] Cleaned up ${removed.length} stale file(s)`);
  }
  return removed;
}
