import type { PageGeometry } from '@dossier/model';

import { OVERLAY } from '../config/constants';

/**
 * Width of `text` rendered at `fontSize`, in points
 */
export type TextMeasure = (text: string, fontSize: number) => number;

/** Position of one rotated text row (rotation origin) */
export interface OverlayRow {
  x: number;
  y: number;
}

/** Computed placement of the watermark text on one page */
export interface OverlayLayout {
  /** Text actually drawn (possibly truncated) */
  text: string;
  fontSize: number;
  /** Unrotated width of `text` at `fontSize` */
  textWidth: number;
  /** Width bound at the chosen font size */
  maxAllowedWidth: number;
  rotationDegrees: number;
  /** Shared horizontal translation of every row */
  translateX: number;
  rows: OverlayRow[];
  fontSizeReduced: boolean;
  truncated: boolean;
}

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Widest unrotated text allowed at `fontSize` on a page `pageWidth` wide.
 *
 * The rotation inflation factor depends on the font size, so the bound has
 * to be re-evaluated at every step of the size search.
 */
export function computeMaxAllowedWidth(
  pageWidth: number,
  fontSize: number,
): number {
  const rotation = toRadians(OVERLAY.ROTATION_DEGREES);
  const usableWidth = pageWidth * (1 - 2 * OVERLAY.MARGIN_FRACTION);
  const inflation =
    Math.abs(Math.cos(rotation)) +
    Math.abs(Math.sin(rotation)) * (fontSize / pageWidth);
  return usableWidth / inflation;
}

/**
 * Shrinks the font from MAX_FONT_SIZE towards MIN_FONT_SIZE until the text
 * fits its width bound.
 */
function searchFontSize(
  text: string,
  pageWidth: number,
  measure: TextMeasure,
): number {
  let fontSize: number = OVERLAY.MAX_FONT_SIZE;
  while (
    measure(text, fontSize) > computeMaxAllowedWidth(pageWidth, fontSize) &&
    fontSize > OVERLAY.MIN_FONT_SIZE
  ) {
    fontSize -= OVERLAY.FONT_SIZE_STEP;
  }
  return fontSize;
}

/**
 * Drops TRUNCATION_STEP characters at a time from the original text and
 * appends an ellipsis, as long as the result keeps MIN_TRUNCATED_LENGTH
 * characters.
 */
function truncateToFit(
  text: string,
  fontSize: number,
  maxAllowedWidth: number,
  measure: TextMeasure,
): string {
  let base = text;
  let candidate = text;
  while (
    measure(candidate, fontSize) > maxAllowedWidth &&
    base.length - OVERLAY.TRUNCATION_STEP + OVERLAY.ELLIPSIS.length >=
      OVERLAY.MIN_TRUNCATED_LENGTH
  ) {
    base = base.slice(0, -OVERLAY.TRUNCATION_STEP);
    candidate = base + OVERLAY.ELLIPSIS;
  }
  return candidate;
}

/**
 * Compute font size, truncation and row placement of the watermark text.
 *
 * Rows are positioned so that the center of each rotated text box lands on
 * the horizontal center of the page and on its row height.
 *
 * @param text - Watermark text
 * @param page - Size of the page the overlay is drawn onto
 * @param measure - Text width function of the overlay font
 */
export function computeOverlayLayout(
  text: string,
  page: PageGeometry,
  measure: TextMeasure,
): OverlayLayout {
  const fontSize = searchFontSize(text, page.width, measure);
  const maxAllowedWidth = computeMaxAllowedWidth(page.width, fontSize);

  let drawnText = text;
  if (measure(text, fontSize) > maxAllowedWidth) {
    drawnText = truncateToFit(text, fontSize, maxAllowedWidth, measure);
  }
  const textWidth = measure(drawnText, fontSize);

  const rotation = toRadians(OVERLAY.ROTATION_DEGREES);
  const halfWidth = textWidth / 2;
  const halfHeight = fontSize / 2;
  const rotatedOffsetX =
    halfWidth * Math.cos(rotation) - halfHeight * Math.sin(rotation);
  const rotatedOffsetY =
    halfWidth * Math.sin(rotation) + halfHeight * Math.cos(rotation);

  const translateX = page.width / 2 - rotatedOffsetX;
  const rows = OVERLAY.ROW_FRACTIONS.map((fraction) => ({
    x: translateX,
    y: page.height * fraction - rotatedOffsetY,
  }));

  return {
    text: drawnText,
    fontSize,
    textWidth,
    maxAllowedWidth,
    rotationDegrees: OVERLAY.ROTATION_DEGREES,
    translateX,
    rows,
    fontSizeReduced: fontSize < OVERLAY.MAX_FONT_SIZE,
    truncated: drawnText !== text,
  };
}
