export type { BookmarkNode } from './bookmark-node';
export type { DocumentEntry } from './document-entry';
export type { OverlayRequest } from './overlay-request';
export type { PageGeometry, Rect } from './page-geometry';
export type { SourceDocument, WatermarkedDocument } from './source-document';
export type { TocLinkRecord } from './toc-link-record';
