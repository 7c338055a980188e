import type { LoggerMethods } from '@dossier/logger';
import type {
  DocumentEntry,
  TocLinkRecord,
  WatermarkedDocument,
} from '@dossier/model';

import { formatZodIssues } from '@dossier/shared';
import { z } from 'zod';

import type { LinkInjectionReport } from '../assembler/document-assembler';

import { buildBookmarkTree } from '../assembler/bookmark-tree';
import { DocumentAssembler } from '../assembler/document-assembler';
import { DOSSIER } from '../config/constants';
import { type DossierLabels, LABELS_BY_LANGUAGE } from '../config/labels';
import { DossierAssemblyError } from '../errors/dossier-assembly-error';
import {
  estimateTocPageCount,
  extractDocumentInfo,
} from '../extractors/document-info-extractor';
import { TitlePageRenderer } from '../renderers/title-page-renderer';
import { countTocPages } from '../renderers/toc-layout';
import { TocRenderer } from '../renderers/toc-renderer';

const dossierOptionsSchema = z.object({
  title: z.string().trim().min(1, 'Title must not be empty'),
  /** Date printed on the title page; the build time when omitted */
  generatedAt: z.date().optional(),
  /**
   * How the TOC page count is known before page numbers are assigned.
   * `exact` lays the TOC out first, `estimate` assumes two lines per document.
   */
  tocPageCountPolicy: z.enum(['exact', 'estimate']).default('exact'),
  language: z.enum(['en', 'fr']).default('en'),
});

export type DossierBuilderOptions = z.input<typeof dossierOptionsSchema>;
export type TocPageCountPolicy = z.infer<
  typeof dossierOptionsSchema
>['tocPageCountPolicy'];

export interface DossierBuildResult {
  bytes: Uint8Array;
  entries: DocumentEntry[];
  links: TocLinkRecord[];
  /** TOC pages actually rendered */
  tocPageCount: number;
  /** Pages of the assembled dossier */
  pageCount: number;
  linkReport: LinkInjectionReport;
  bookmarkCount: number;
}

/**
 * DossierBuilder
 *
 * Turns an ordered list of watermarked documents into the final dossier:
 * title page, clickable table of contents, the documents, and a two-level
 * outline.
 *
 * ## Processing Pipeline
 *
 * 1. Resolve group and display name of every document
 * 2. Decide the TOC page count, then number the documents after the front matter
 * 3. Render the title page and the TOC
 * 4. Concatenate, then add TOC links and bookmarks
 */
export class DossierBuilder {
  private readonly title: string;
  private readonly generatedAt?: Date;
  private readonly tocPageCountPolicy: TocPageCountPolicy;
  private readonly labels: DossierLabels;

  private readonly titlePageRenderer: TitlePageRenderer;
  private readonly tocRenderer: TocRenderer;
  private readonly assembler: DocumentAssembler;

  constructor(
    private readonly logger: LoggerMethods,
    options: DossierBuilderOptions,
  ) {
    const parsed = dossierOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new DossierAssemblyError(
        `[DossierBuilder] Invalid options: ${formatZodIssues(parsed.error)}`,
      );
    }
    this.title = parsed.data.title;
    this.generatedAt = parsed.data.generatedAt;
    this.tocPageCountPolicy = parsed.data.tocPageCountPolicy;
    this.labels = LABELS_BY_LANGUAGE[parsed.data.language];

    this.titlePageRenderer = new TitlePageRenderer(logger, this.labels);
    this.tocRenderer = new TocRenderer(logger, this.labels);
    this.assembler = new DocumentAssembler(logger);
  }

  /**
   * Assemble the dossier from documents in their final order.
   *
   * @throws DossierAssemblyError when there is nothing to assemble or a part
   * cannot be parsed
   */
  async build(
    documents: readonly WatermarkedDocument[],
  ): Promise<DossierBuildResult> {
    if (documents.length === 0) {
      throw new DossierAssemblyError('[DossierBuilder] No documents to assemble');
    }

    const { entries, frontMatterPageCount } = extractDocumentInfo(
      documents,
      (described) =>
        DOSSIER.TITLE_PAGE_COUNT +
        (this.tocPageCountPolicy === 'exact'
          ? countTocPages(described, this.labels)
          : estimateTocPageCount(described.length)),
    );
    const plannedTocPages = frontMatterPageCount - DOSSIER.TITLE_PAGE_COUNT;
    this.logger.info(
      `[DossierBuilder] ${entries.length} documents, TOC planned on ${plannedTocPages} page(s) (${this.tocPageCountPolicy})`,
    );

    const titlePage = await this.titlePageRenderer.render(
      this.title,
      this.generatedAt ?? new Date(),
    );
    const toc = await this.tocRenderer.render(entries);
    if (toc.pageCount !== plannedTocPages) {
      this.logger.warn(
        `[DossierBuilder] TOC rendered on ${toc.pageCount} page(s) but documents were numbered for ${plannedTocPages}; page references are off by ${toc.pageCount - plannedTocPages}`,
      );
    }

    const dossier = await this.assembler.concatenate([
      { label: 'title page', bytes: titlePage },
      { label: 'table of contents', bytes: toc.bytes },
      ...documents.map((document) => ({
        label: document.fileName,
        bytes: document.bytes,
      })),
    ]);
    const linkReport = this.assembler.injectLinks(dossier, toc.links);
    const bookmarkCount = this.assembler.injectBookmarks(
      dossier,
      buildBookmarkTree(entries, this.labels),
    );

    dossier.setTitle(this.title);
    const bytes = await dossier.save();

    this.logger.info(
      `[DossierBuilder] Dossier assembled: ${dossier.getPageCount()} pages`,
    );

    return {
      bytes,
      entries,
      links: toc.links,
      tocPageCount: toc.pageCount,
      pageCount: dossier.getPageCount(),
      linkReport,
      bookmarkCount,
    };
  }
}
