/**
 * Node of the two-level outline tree (group → document)
 *
 * @interface BookmarkNode
 */
export interface BookmarkNode {
  /**
   * Label shown in the viewer's outline sidebar
   *
   * @type {string}
   */
  title: string;

  /**
   * 0-based index of the page the bookmark opens
   *
   * @type {number}
   */
  pageIndex: number;

  /**
   * Child bookmarks, empty for leaves
   *
   * @type {BookmarkNode[]}
   */
  children: BookmarkNode[];
}
