import { rename, rm, writeFile } from 'node:fs/promises';

import { SOURCE_LAYOUT } from '../config/constants';
import { DossierWriteError } from '../errors/dossier-write-error';

/**
 * Write `bytes` next to `path` first, then rename over it, so `path` only
 * ever holds a complete file.
 *
 * @throws DossierWriteError after removing the partial file
 */
export async function writeFileAtomic(
  path: string,
  bytes: Uint8Array,
): Promise<void> {
  const partialPath = `${path}${SOURCE_LAYOUT.PARTIAL_SUFFIX}`;
  try {
    await writeFile(partialPath, bytes);
    await rename(partialPath, path);
  } catch (error) {
    await rm(partialPath, { force: true });
    throw DossierWriteError.fromError(`Failed to write ${path}`, error);
  }
}
