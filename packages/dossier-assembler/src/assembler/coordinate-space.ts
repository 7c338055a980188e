import type { Rect } from '@dossier/model';

/**
 * Convert a rectangle from top-down layout space to PDF space, where y grows
 * upwards from the bottom edge of a page `pageHeight` points high.
 *
 * The lower layout edge (`y2`) becomes the lower PDF edge, so the result keeps
 * `y1 <= y2`.
 */
export function toPdfSpace(rect: Rect, pageHeight: number): Rect {
  return {
    x1: rect.x1,
    y1: pageHeight - rect.y2,
    x2: rect.x2,
    y2: pageHeight - rect.y1,
  };
}
