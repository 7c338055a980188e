import type { LoggerMethods } from '@dossier/logger';
import type { SourceDocument } from '@dossier/model';
import type { Dirent } from 'node:fs';

import { formatWatermarkedFileName } from '@dossier/shared';
import { sortBy } from 'es-toolkit';
import { readdir } from 'node:fs/promises';
import { extname, join } from 'node:path';

import { EXCLUDED_FOLDERS, SOURCE_LAYOUT } from '../config/constants';
import { SourceFolderError } from '../errors/source-folder-error';

export interface WalkSourceFolderOptions {
  logger: LoggerMethods;
  /** Subfolder names that are not document groups */
  excludedFolders?: readonly string[];
}

/**
 * Find the PDF files of every group folder under `root`.
 *
 * Each immediate subfolder is a group; only the PDF files directly inside it
 * are taken (extension matched case-insensitively). Files mapping to the
 * same intermediate name are kept once, the first in walk order winning.
 * The result is sorted by group, then by intermediate file name, which is
 * the dossier order.
 *
 * @throws SourceFolderError when a folder cannot be listed
 */
export async function walkSourceFolder(
  root: string,
  options: WalkSourceFolderOptions,
): Promise<SourceDocument[]> {
  const { logger } = options;
  const excluded = new Set(options.excludedFolders ?? EXCLUDED_FOLDERS);

  const folders = sortBy(
    (await listFolder(root)).filter(
      (entry) => entry.isDirectory() && !excluded.has(entry.name),
    ),
    [(entry) => entry.name],
  );

  const documents: SourceDocument[] = [];
  for (const folder of folders) {
    logger.info(`[FolderWalker] Processing folder: ${folder.name}`);
    const folderPath = join(root, folder.name);
    const files = sortBy(
      (await listFolder(folderPath)).filter(
        (entry) => entry.isFile() && isPdfFileName(entry.name),
      ),
      [(entry) => entry.name],
    );

    if (files.length === 0) {
      logger.info(`[FolderWalker] No PDF files found in ${folder.name}`);
      continue;
    }

    for (const file of files) {
      documents.push({
        path: join(folderPath, file.name),
        group: folder.name,
        fileName: formatWatermarkedFileName(folder.name, file.name),
      });
    }
  }

  const byFileName = new Map<string, SourceDocument>();
  for (const document of documents) {
    const kept = byFileName.get(document.fileName);
    if (kept) {
      logger.warn(
        `[FolderWalker] Skipping ${document.path}: ${document.fileName} already comes from ${kept.path}`,
      );
      continue;
    }
    byFileName.set(document.fileName, document);
  }

  return sortBy(
    [...byFileName.values()],
    [(document) => document.group, (document) => document.fileName],
  );
}

export function isPdfFileName(fileName: string): boolean {
  return extname(fileName).toLowerCase() === SOURCE_LAYOUT.PDF_EXTENSION;
}

async function listFolder(path: string): Promise<Dirent[]> {
  try {
    return await readdir(path, { withFileTypes: true });
  } catch (error) {
    throw SourceFolderError.fromError(`Cannot list folder ${path}`, error);
  }
}
