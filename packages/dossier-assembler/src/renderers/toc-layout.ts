import type { DocumentEntry, TocLinkRecord } from '@dossier/model';

import type { DossierLabels } from '../config/labels';

import { A4, TOC_LAYOUT } from '../config/constants';

export type TocFont = 'regular' | 'bold';
export type TocColor = 'black' | 'blue';

/**
 * Width of `text` in the given face at `fontSize`, in points
 */
export type TocTextMeasure = (
  text: string,
  font: TocFont,
  fontSize: number,
) => number;

/**
 * One string to draw. `y` is the baseline measured from the top edge.
 */
export interface TocTextItem {
  text: string;
  x: number;
  y: number;
  font: TocFont;
  fontSize: number;
  color: TocColor;
}

export interface TocLayout {
  /** Text items per TOC page */
  pages: TocTextItem[][];
  links: TocLinkRecord[];
  pageCount: number;
}

export type TocLayoutEntry = Pick<
  DocumentEntry,
  'group' | 'displayName' | 'startPage'
>;

interface PageSize {
  width: number;
  height: number;
}

const A4_PAGE: PageSize = { width: A4.WIDTH, height: A4.HEIGHT };

/**
 * Lay out the table of contents.
 *
 * The cursor runs top-down from TOP_MARGIN. A group header precedes the first
 * entry of every group; each entry is the indented document name, a dot
 * leader and a right-aligned page reference. Once the cursor gets within
 * BOTTOM_MARGIN of the bottom edge, the next item goes on a new page.
 *
 * Link rectangles stay in this top-down layout space.
 */
export function layoutTableOfContents(
  entries: readonly TocLayoutEntry[],
  measure: TocTextMeasure,
  labels: DossierLabels,
  page: PageSize = A4_PAGE,
): TocLayout {
  const pages: TocTextItem[][] = [[]];
  const links: TocLinkRecord[] = [];
  const right = page.width - TOC_LAYOUT.RIGHT_MARGIN;

  let items = pages[0];
  let cursor: number = TOC_LAYOUT.TOP_MARGIN;
  let pageBreakPending = false;
  let currentGroup: string | undefined;

  const headingWidth = measure(
    labels.tableOfContents,
    'bold',
    TOC_LAYOUT.HEADING_FONT_SIZE,
  );
  items.push({
    text: labels.tableOfContents,
    x: (page.width - headingWidth) / 2,
    y: cursor,
    font: 'bold',
    fontSize: TOC_LAYOUT.HEADING_FONT_SIZE,
    color: 'black',
  });
  cursor += TOC_LAYOUT.HEADING_ADVANCE;

  for (const entry of entries) {
    if (pageBreakPending) {
      items = [];
      pages.push(items);
      cursor = TOC_LAYOUT.TOP_MARGIN;
      pageBreakPending = false;
    }

    if (entry.group !== currentGroup) {
      currentGroup = entry.group;
      cursor += TOC_LAYOUT.GROUP_SPACE_BEFORE;
      items.push({
        text: entry.group,
        x: TOC_LAYOUT.LEFT_MARGIN,
        y: cursor,
        font: 'bold',
        fontSize: TOC_LAYOUT.GROUP_FONT_SIZE,
        color: 'black',
      });
      cursor += TOC_LAYOUT.GROUP_ADVANCE;
    }

    const nameText = `${TOC_LAYOUT.ENTRY_INDENT}${entry.displayName}`;
    const pageText = `${labels.pagePrefix} ${entry.startPage}`;
    const nameWidth = measure(nameText, 'regular', TOC_LAYOUT.ENTRY_FONT_SIZE);
    const pageTextWidth = measure(
      pageText,
      'regular',
      TOC_LAYOUT.ENTRY_FONT_SIZE,
    );

    const entryItem = {
      y: cursor,
      font: 'regular',
      fontSize: TOC_LAYOUT.ENTRY_FONT_SIZE,
    } as const;
    items.push({
      ...entryItem,
      text: nameText,
      x: TOC_LAYOUT.LEFT_MARGIN,
      color: 'blue',
    });

    const dotsStart = TOC_LAYOUT.LEFT_MARGIN + nameWidth + TOC_LAYOUT.LEADER_GAP;
    const dotsEnd = right - pageTextWidth - TOC_LAYOUT.LEADER_GAP;
    const dotCount = Math.max(
      0,
      Math.floor((dotsEnd - dotsStart) / TOC_LAYOUT.DOT_SPACING),
    );
    if (dotCount > 0) {
      items.push({
        ...entryItem,
        text: '.'.repeat(dotCount),
        x: dotsStart,
        color: 'black',
      });
    }

    items.push({
      ...entryItem,
      text: pageText,
      x: right - pageTextWidth,
      color: 'blue',
    });

    links.push({
      rect: {
        x1: TOC_LAYOUT.LEFT_MARGIN,
        y1: cursor - TOC_LAYOUT.LINK_ASCENT,
        x2: right,
        y2: cursor + TOC_LAYOUT.LINK_DESCENT,
      },
      targetPage: entry.startPage,
      tocPageIndex: pages.length - 1,
    });

    cursor += TOC_LAYOUT.ENTRY_ADVANCE;
    if (page.height - cursor < TOC_LAYOUT.BOTTOM_MARGIN) {
      pageBreakPending = true;
    }
  }

  return { pages, links, pageCount: pages.length };
}

/**
 * Number of pages the table of contents will take.
 *
 * Page breaks depend only on the vertical flow, so this can run before any
 * start page is known.
 */
export function countTocPages(
  documents: readonly Pick<DocumentEntry, 'group'>[],
  labels: DossierLabels,
  page: PageSize = A4_PAGE,
): number {
  return layoutTableOfContents(
    documents.map((document) => ({
      group: document.group,
      displayName: '',
      startPage: 0,
    })),
    () => 0,
    labels,
    page,
  ).pageCount;
}
