/**
 * A4 page size in points, used for the title page and the table of contents
 */
export const A4 = {
  WIDTH: 595.28,
  HEIGHT: 841.89,
} as const;

/**
 * Configuration constants for TitlePageRenderer
 */
export const TITLE_PAGE = {
  TITLE_FONT_SIZE: 24,
  /** Baseline of the title, as a fraction of the page height from the bottom */
  TITLE_Y_FRACTION: 0.7,
  DATE_FONT_SIZE: 12,
  /** Baseline of the generation date, as a fraction of the page height from the bottom */
  DATE_Y_FRACTION: 0.3,
} as const;

/**
 * Configuration constants for the table of contents layout.
 *
 * Vertical values are distances measured downwards from the top edge.
 */
export const TOC_LAYOUT = {
  /** Baseline of the first line on every TOC page */
  TOP_MARGIN: 50,
  HEADING_FONT_SIZE: 18,
  /** Advance after the heading */
  HEADING_ADVANCE: 40,
  /** Space before a group header */
  GROUP_SPACE_BEFORE: 20,
  GROUP_FONT_SIZE: 14,
  /** Advance after a group header */
  GROUP_ADVANCE: 25,
  ENTRY_FONT_SIZE: 11,
  /** Indentation prepended to every document name */
  ENTRY_INDENT: '    ',
  /** Advance after a document entry */
  ENTRY_ADVANCE: 18,
  LEFT_MARGIN: 50,
  RIGHT_MARGIN: 50,
  /** Gap between the dot leader and the text on each side */
  LEADER_GAP: 10,
  /** Horizontal room given to one leader dot */
  DOT_SPACING: 4,
  /** A new page starts once the baseline is closer than this to the bottom */
  BOTTOM_MARGIN: 100,
  /** Link rectangle extent above the baseline */
  LINK_ASCENT: 13,
  /** Link rectangle extent below the baseline */
  LINK_DESCENT: 2,
} as const;

/**
 * Fixed slots of the assembled dossier
 */
export const DOSSIER = {
  TITLE_PAGE_COUNT: 1,
  /** 0-based index of the title page */
  TITLE_PAGE_INDEX: 0,
  /** 0-based index of the first TOC page */
  FIRST_TOC_PAGE_INDEX: 1,
  /** TOC lines assumed per document by the page count estimate */
  ESTIMATE_LINES_PER_DOCUMENT: 2,
  /** TOC lines assumed per page by the page count estimate */
  ESTIMATE_LINES_PER_PAGE: 40,
} as const;
