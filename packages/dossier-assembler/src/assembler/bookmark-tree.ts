import type { BookmarkNode, DocumentEntry } from '@dossier/model';

import type { DossierLabels } from '../config/labels';

import { DOSSIER } from '../config/constants';

/**
 * Build the outline tree: title page, table of contents, then one node per
 * group (in document order) holding one child per document.
 *
 * Page indices are 0-based.
 */
export function buildBookmarkTree(
  entries: readonly DocumentEntry[],
  labels: DossierLabels,
): BookmarkNode[] {
  const roots: BookmarkNode[] = [
    {
      title: labels.titlePage,
      pageIndex: DOSSIER.TITLE_PAGE_INDEX,
      children: [],
    },
    {
      title: labels.tableOfContents,
      pageIndex: DOSSIER.FIRST_TOC_PAGE_INDEX,
      children: [],
    },
  ];

  let groupNode: BookmarkNode | undefined;
  for (const entry of entries) {
    const pageIndex = entry.startPage - 1;
    if (groupNode === undefined || groupNode.title !== entry.group) {
      groupNode = { title: entry.group, pageIndex, children: [] };
      roots.push(groupNode);
    }
    groupNode.children.push({
      title: entry.displayName,
      pageIndex,
      children: [],
    });
  }

  return roots;
}
