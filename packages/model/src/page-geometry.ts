/**
 * Page geometry types
 *
 * All measurements are PDF points (1/72 inch).
 */

/**
 * Size of a single page
 *
 * Read per page: pages inside one document may have different sizes.
 */
export interface PageGeometry {
  width: number;
  height: number;
}

/**
 * Axis-aligned rectangle given by two corners
 *
 * `x1 <= x2` and `y1 <= y2`. Which edge `y1` sits on depends on the
 * coordinate space the rectangle was recorded in.
 */
export interface Rect {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}
