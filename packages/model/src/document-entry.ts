/**
 * Placement of one source document inside the assembled dossier
 *
 * Built once per document, never mutated afterwards. For consecutive
 * entries `next.startPage === prev.startPage + prev.pageCount`.
 *
 * @interface DocumentEntry
 */
export interface DocumentEntry {
  /**
   * Group label (the folder the document was filed under, e.g. a person)
   *
   * @type {string}
   */
  readonly group: string;

  /**
   * Human readable name shown in the table of contents and the outline
   *
   * @type {string}
   */
  readonly displayName: string;

  /**
   * Absolute 1-based page number of the document's first page in the dossier
   *
   * @type {number}
   */
  readonly startPage: number;

  /**
   * Number of pages the document contributes
   *
   * @type {number}
   */
  readonly pageCount: number;
}
