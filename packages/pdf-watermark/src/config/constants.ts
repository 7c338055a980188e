/**
 * Configuration constants for the watermark overlay
 */
export const OVERLAY = {
  /**
   * Counter-clockwise rotation of every text row, in degrees
   */
  ROTATION_DEGREES: 30,

  /**
   * Font size the search starts from
   */
  MAX_FONT_SIZE: 24,

  /**
   * Smallest font size the search may reach
   */
  MIN_FONT_SIZE: 8,

  /**
   * Decrement applied at each step of the font size search
   */
  FONT_SIZE_STEP: 1,

  /**
   * Horizontal margin on each side, as a fraction of the page width
   */
  MARGIN_FRACTION: 0.1,

  /**
   * Vertical position of each text row, as fractions of the page height
   */
  ROW_FRACTIONS: [0.2, 0.4, 0.6, 0.8],

  /**
   * Characters dropped per truncation step
   */
  TRUNCATION_STEP: 3,

  /**
   * Marker appended to truncated text
   */
  ELLIPSIS: '...',

  /**
   * Truncation never leaves fewer characters than this
   */
  MIN_TRUNCATED_LENGTH: 10,

  /**
   * Fill color (RGB, 0-1)
   */
  COLOR: { red: 1, green: 0, blue: 0 },
} as const;

/**
 * Defaults for watermarking runs
 */
export const WATERMARK_DEFAULTS = {
  TEXT: 'DOCUMENT RESERVE A LA LOCATION',
  OPACITY: 0.3,
} as const;
