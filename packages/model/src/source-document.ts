import type { PageGeometry } from './page-geometry';

/**
 * PDF file discovered in the source folder
 */
export interface SourceDocument {
  /**
   * Absolute path of the source file
   */
  path: string;

  /**
   * Group label (name of the folder holding the file)
   */
  group: string;

  /**
   * File name of the watermarked intermediate:
   * `<group>_<original stem>_watermarked.pdf`
   */
  fileName: string;
}

/**
 * Watermarked copy of one source document, ready to be assembled
 */
export interface WatermarkedDocument {
  /**
   * Intermediate file name (`<group>_<original stem>_watermarked.pdf`)
   */
  fileName: string;

  /**
   * Group label the document is filed under
   */
  group: string;

  /**
   * Serialized PDF
   */
  bytes: Uint8Array;

  /**
   * Number of pages, equal to the source page count
   */
  pageCount: number;

  /**
   * Size of every page, in source order
   */
  pageSizes: PageGeometry[];
}
