import type { LoggerMethods } from '@dossier/logger';
import type { BookmarkNode, TocLinkRecord } from '@dossier/model';

import {
  PDFDocument,
  type PDFDict,
  PDFHexString,
  PDFName,
  type PDFRef,
} from 'pdf-lib';

import { DOSSIER } from '../config/constants';
import { DossierAssemblyError } from '../errors/dossier-assembly-error';
import { toPdfSpace } from './coordinate-space';

/** Serialized PDF taking part in the concatenation */
export interface AssemblyPart {
  /** Name used in log and error messages */
  label: string;
  bytes: Uint8Array;
}

export interface SkippedLink {
  link: TocLinkRecord;
  reason: string;
}

export interface LinkInjectionReport {
  applied: number;
  skipped: SkippedLink[];
}

interface OutlineLevel {
  first: PDFRef;
  last: PDFRef;
  /** Number of visible descendants (all levels are open) */
  count: number;
}

/**
 * Builds the dossier in three stages over one in-memory document:
 *
 * 1. `concatenate`: front matter, then every document, page by page
 * 2. `injectLinks`: link annotations on the TOC pages
 * 3. `injectBookmarks`: the outline tree
 *
 * Links and bookmarks need the final page count and the TOC page heights,
 * so they run on the concatenated document.
 */
export class DocumentAssembler {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Copy every page of every part, in order, into a new document.
   *
   * @throws DossierAssemblyError when a part cannot be parsed; page numbers
   * are already resolved at this point, so a missing part is fatal
   */
  async concatenate(parts: readonly AssemblyPart[]): Promise<PDFDocument> {
    const dossier = await PDFDocument.create({ updateMetadata: false });

    for (const part of parts) {
      let source: PDFDocument;
      try {
        source = await PDFDocument.load(part.bytes, { updateMetadata: false });
      } catch (error) {
        throw DossierAssemblyError.fromError(
          `Failed to load ${part.label}`,
          error,
        );
      }
      const pages = await dossier.copyPages(source, source.getPageIndices());
      for (const page of pages) {
        dossier.addPage(page);
      }
      this.logger.debug(
        `[DocumentAssembler] Added ${part.label} (${pages.length} pages)`,
      );
    }

    this.logger.info(
      `[DocumentAssembler] Concatenated ${parts.length} parts into ${dossier.getPageCount()} pages`,
    );
    return dossier;
  }

  /**
   * Add a link annotation on the TOC page of every record.
   *
   * The TOC page is `FIRST_TOC_PAGE_INDEX + tocPageIndex`, the target is
   * `targetPage - 1`. Records pointing outside the document are skipped.
   */
  injectLinks(
    document: PDFDocument,
    links: readonly TocLinkRecord[],
  ): LinkInjectionReport {
    const pageCount = document.getPageCount();
    const report: LinkInjectionReport = { applied: 0, skipped: [] };

    const skip = (link: TocLinkRecord, reason: string) => {
      this.logger.warn(`[DocumentAssembler] Skipping link: ${reason}`);
      report.skipped.push({ link, reason });
    };

    for (const link of links) {
      const tocPageIndex = DOSSIER.FIRST_TOC_PAGE_INDEX + link.tocPageIndex;
      const targetPageIndex = link.targetPage - 1;

      if (!isPageIndex(tocPageIndex, pageCount)) {
        skip(link, `TOC page index ${tocPageIndex} out of range (${pageCount} pages)`);
        continue;
      }
      if (!isPageIndex(targetPageIndex, pageCount)) {
        skip(
          link,
          `target page index ${targetPageIndex} out of range (${pageCount} pages)`,
        );
        continue;
      }

      try {
        const tocPage = document.getPage(tocPageIndex);
        const rect = toPdfSpace(link.rect, tocPage.getHeight());
        const annotation = document.context.obj({
          Type: 'Annot',
          Subtype: 'Link',
          Rect: [rect.x1, rect.y1, rect.x2, rect.y2],
          Border: [0, 0, 0],
          Dest: [document.getPage(targetPageIndex).ref, 'Fit'],
        });
        tocPage.node.addAnnot(document.context.register(annotation));
        report.applied += 1;
      } catch (error) {
        skip(link, DossierAssemblyError.getErrorMessage(error));
      }
    }

    this.logger.info(
      `[DocumentAssembler] Added ${report.applied} links, skipped ${report.skipped.length}`,
    );
    return report;
  }

  /**
   * Write the outline tree and open it in the viewer's sidebar.
   *
   * Nodes whose page is outside the document are dropped together with
   * their children.
   *
   * @returns Number of outline items written
   */
  injectBookmarks(document: PDFDocument, tree: readonly BookmarkNode[]): number {
    const nodes = this.keepInRange(tree, document.getPageCount());
    if (nodes.length === 0) {
      this.logger.warn('[DocumentAssembler] No bookmarks to add');
      return 0;
    }

    const context = document.context;
    const outlinesRef = context.nextRef();
    const level = this.writeOutlineLevel(document, nodes, outlinesRef);
    context.assign(
      outlinesRef,
      context.obj({
        Type: 'Outlines',
        First: level.first,
        Last: level.last,
        Count: level.count,
      }),
    );
    document.catalog.set(PDFName.of('Outlines'), outlinesRef);
    document.catalog.set(PDFName.of('PageMode'), PDFName.of('UseOutlines'));

    this.logger.info(`[DocumentAssembler] Added ${level.count} bookmarks`);
    return level.count;
  }

  private keepInRange(
    nodes: readonly BookmarkNode[],
    pageCount: number,
  ): BookmarkNode[] {
    const kept: BookmarkNode[] = [];
    for (const node of nodes) {
      if (!isPageIndex(node.pageIndex, pageCount)) {
        this.logger.warn(
          `[DocumentAssembler] Skipping bookmark "${node.title}": page index ${node.pageIndex} out of range (${pageCount} pages)`,
        );
        continue;
      }
      kept.push({
        ...node,
        children: this.keepInRange(node.children, pageCount),
      });
    }
    return kept;
  }

  private writeOutlineLevel(
    document: PDFDocument,
    nodes: readonly BookmarkNode[],
    parent: PDFRef,
  ): OutlineLevel {
    const context = document.context;
    const refs = nodes.map(() => context.nextRef());
    let count = 0;

    nodes.forEach((node, index) => {
      const item: PDFDict = context.obj({
        Title: PDFHexString.fromText(node.title),
        Parent: parent,
        Dest: [document.getPage(node.pageIndex).ref, 'Fit'],
      });
      if (index > 0) {
        item.set(PDFName.of('Prev'), refs[index - 1]);
      }
      if (index < refs.length - 1) {
        item.set(PDFName.of('Next'), refs[index + 1]);
      }
      count += 1;

      if (node.children.length > 0) {
        const children = this.writeOutlineLevel(
          document,
          node.children,
          refs[index],
        );
        item.set(PDFName.of('First'), children.first);
        item.set(PDFName.of('Last'), children.last);
        item.set(PDFName.of('Count'), context.obj(children.count));
        count += children.count;
      }

      context.assign(refs[index], item);
    });

    return { first: refs[0], last: refs[refs.length - 1], count };
  }
}

function isPageIndex(index: number, pageCount: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < pageCount;
}
