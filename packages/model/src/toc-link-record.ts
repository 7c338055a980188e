import type { Rect } from './page-geometry';

/**
 * Clickable area drawn on a table of contents page
 *
 * Created while the table of contents is laid out and consumed once by the
 * link injection stage.
 */
export interface TocLinkRecord {
  /**
   * Rectangle in layout space: measured from the top edge of the TOC page,
   * so `y1` is the upper edge and `y2` the lower one
   */
  rect: Rect;

  /**
   * Absolute 1-based page the link jumps to
   */
  targetPage: number;

  /**
   * 0-based index of the TOC page the entry was drawn on, relative to the
   * first TOC page
   */
  tocPageIndex: number;
}
