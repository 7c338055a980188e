/**
 * Parameters for rendering one watermark overlay page
 *
 * The rendered overlay has exactly `width` × `height` points so it can be
 * drawn at the origin of the page it was measured from.
 */
export interface OverlayRequest {
  /**
   * Watermark text, repeated on the overlay
   */
  text: string;

  /**
   * Fill opacity between 0 and 1
   */
  opacity: number;

  /**
   * Target page width in points
   */
  width: number;

  /**
   * Target page height in points
   */
  height: number;
}
