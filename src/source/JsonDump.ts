/**
 * JSON dumps of fetched records (`save_to`), readable again by a manual
 * import.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export function dumpFileName(libraryId: string, resource: 'items' | 'collections'): string {
  return `${libraryId}_${resource}.json`;
}

/**
 * Write the items and collections of a library to `directory`.
 *
 * @returns Paths written
 */
export async function writeJsonDump(
  directory: string,
  libraryId: string,
  items: readonly unknown[],
  collections: readonly unknown[],
): Promise<string[]> {
  await mkdir(directory, { recursive: true });
  const itemsPath = join(directory, dumpFileName(libraryId, 'items'));
  const collectionsPath = join(directory, dumpFileName(libraryId, 'collections'));
  await writeFile(itemsPath, `${JSON.stringify(items, null, 2)}\n`, 'utf-8');
  await writeFile(collectionsPath, `${JSON.stringify(collections, null, 2)}\n`, 'utf-8');
  return [itemsPath, collectionsPath];
}
