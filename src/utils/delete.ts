import type { BatchDeleteResult, DeleteOutcome, FileItem } from '../types.js';
import { getSize, pathExists, removeItem } from './fs.js';
import { createLogger } from './logger.js';
import { errorMessage } from './errors.js';

const log = createLogger('Cleaner');

/**
 * Permanently removes one item. A path that is already gone counts as
 * cleaned with nothing freed, so repeating the call is harmless.
 */
export async function deleteOne(item: FileItem): Promise<DeleteOutcome> {
  if (!(await pathExists(item.path))) {
    log(`Already gone: ${item.path}`);
    return { ok: true, path: item.path, freed: 0 };
  }

  // Cached sizes may be stale by now
  const freed = await getSize(item.path);

  try {
    await removeItem(item.path);
  } catch (error) {
    log(`Failed to remove ${item.path}: ${errorMessage(error)}`);
    return { ok: false, path: item.path, error: errorMessage(error) };
  }

  log(`Removed ${item.path} (${freed} bytes)`);
  return { ok: true, path: item.path, freed };
}

/**
 * Removes every marked path that is part of `listing`.
 * Failures are skipped; callers find them as paths still present.
 */
export async function deleteMarked(
  markedPaths: Iterable<string>,
  listing: readonly FileItem[]
): Promise<BatchDeleteResult> {
  const byPath = new Map(listing.map((item) => [item.path, item]));
  const deletedPaths: string[] = [];
  let freed = 0;

  for (const path of markedPaths) {
    if (!byPath.has(path)) continue;

    const size = await getSize(path);
    try {
      await removeItem(path);
    } catch (error) {
      log(`Skipping ${path}: ${errorMessage(error)}`);
      continue;
    }
    freed += size;
    deletedPaths.push(path);
  }

  log(`Batch complete: ${deletedPaths.length} removed, ${freed} bytes freed`);
  return { freed, deletedPaths };
}
