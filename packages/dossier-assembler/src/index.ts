export { buildBookmarkTree } from './assembler/bookmark-tree';
export { toPdfSpace } from './assembler/coordinate-space';
export {
  DocumentAssembler,
  type AssemblyPart,
  type LinkInjectionReport,
  type SkippedLink,
} from './assembler/document-assembler';
export { A4, DOSSIER, TITLE_PAGE, TOC_LAYOUT } from './config/constants';
export {
  ENGLISH_LABELS,
  FRENCH_LABELS,
  LABELS_BY_LANGUAGE,
  type DossierLabels,
  type DossierLanguage,
} from './config/labels';
export {
  DossierBuilder,
  type DossierBuildResult,
  type DossierBuilderOptions,
  type TocPageCountPolicy,
} from './core/dossier-builder';
export { DossierAssemblyError } from './errors/dossier-assembly-error';
export {
  assignStartPages,
  describeDocuments,
  estimateTocPageCount,
  extractDocumentInfo,
  type DescribedDocument,
  type DocumentInfo,
  type DocumentInfoInput,
  type FrontMatterPageCount,
} from './extractors/document-info-extractor';
export {
  parseWatermarkedFileName,
  toTitleCase,
  type ParsedFileName,
} from './extractors/watermarked-file-name-parser';
export {
  TitlePageRenderer,
  formatGenerationDate,
} from './renderers/title-page-renderer';
export {
  countTocPages,
  layoutTableOfContents,
  type TocColor,
  type TocFont,
  type TocLayout,
  type TocLayoutEntry,
  type TocTextItem,
  type TocTextMeasure,
} from './renderers/toc-layout';
export { TocRenderer, type TocRenderResult } from './renderers/toc-renderer';
