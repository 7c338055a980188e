import type { DocumentEntry } from '@dossier/model';

import { DOSSIER } from '../config/constants';
import { DossierAssemblyError } from '../errors/dossier-assembly-error';
import { parseWatermarkedFileName } from './watermarked-file-name-parser';

/** What the extractor needs to know about one watermarked document */
export interface DocumentInfoInput {
  /** Intermediate file name (`<group>_<stem>_watermarked.pdf`) */
  fileName: string;
  /** Group label, when known from the folder the file came from */
  group?: string;
  pageCount: number;
}

/** Document with its labels resolved but no page number yet */
export interface DescribedDocument {
  group: string;
  displayName: string;
  pageCount: number;
}

export interface DocumentInfo {
  entries: DocumentEntry[];
  /** Pages before the first document */
  frontMatterPageCount: number;
  /** Page count of the assembled dossier, front matter included */
  totalPageCount: number;
}

/**
 * Front matter size, fixed or derived from the described documents
 */
export type FrontMatterPageCount =
  | number
  | ((documents: readonly DescribedDocument[]) => number);

/**
 * Resolve group and display name of every document, keeping input order.
 */
export function describeDocuments(
  items: readonly DocumentInfoInput[],
): DescribedDocument[] {
  return items.map((item) => {
    if (!Number.isInteger(item.pageCount) || item.pageCount < 0) {
      throw new DossierAssemblyError(
        `Invalid page count ${item.pageCount} for ${item.fileName}`,
      );
    }
    const { group, displayName } = parseWatermarkedFileName(
      item.fileName,
      item.group,
    );
    return { group, displayName, pageCount: item.pageCount };
  });
}

/**
 * Give every document its absolute 1-based start page.
 *
 * The running counter starts right after the front matter, so the first
 * document begins at `frontMatterPageCount + 1`.
 */
export function assignStartPages(
  documents: readonly DescribedDocument[],
  frontMatterPageCount: number,
): DocumentInfo {
  let currentPage = 1 + frontMatterPageCount;
  const entries = documents.map((document): DocumentEntry => {
    const entry = Object.freeze({
      group: document.group,
      displayName: document.displayName,
      startPage: currentPage,
      pageCount: document.pageCount,
    });
    currentPage += document.pageCount;
    return entry;
  });

  return { entries, frontMatterPageCount, totalPageCount: currentPage - 1 };
}

/**
 * Describe the documents and place them after the front matter.
 *
 * A function front matter count sees the described documents, so the TOC
 * size can depend on their groups.
 */
export function extractDocumentInfo(
  items: readonly DocumentInfoInput[],
  frontMatterPageCount: FrontMatterPageCount,
): DocumentInfo {
  const documents = describeDocuments(items);
  return assignStartPages(
    documents,
    typeof frontMatterPageCount === 'number'
      ? frontMatterPageCount
      : frontMatterPageCount(documents),
  );
}

/**
 * Rough TOC page count: two lines per document, forty lines per page, at
 * least one page.
 */
export function estimateTocPageCount(documentCount: number): number {
  return Math.max(
    1,
    Math.floor(
      (documentCount * DOSSIER.ESTIMATE_LINES_PER_DOCUMENT) /
        DOSSIER.ESTIMATE_LINES_PER_PAGE,
    ),
  );
}
