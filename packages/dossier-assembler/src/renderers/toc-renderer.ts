import type { LoggerMethods } from '@dossier/logger';
import type { DocumentEntry, TocLinkRecord } from '@dossier/model';

import { toWinAnsi } from '@dossier/shared';
import { type Color, PDFDocument, StandardFonts, rgb } from 'pdf-lib';

import type { DossierLabels } from '../config/labels';

import { A4 } from '../config/constants';
import {
  type TocColor,
  type TocTextItem,
  layoutTableOfContents,
} from './toc-layout';

/** Rendered table of contents with the data the assembler needs */
export interface TocRenderResult {
  bytes: Uint8Array;
  /** Clickable areas in layout space, in entry order */
  links: TocLinkRecord[];
  /** Pages actually produced */
  pageCount: number;
  /** Text items as drawn on each page, in layout space */
  pages: TocTextItem[][];
}

const COLORS: Record<TocColor, Color> = {
  black: rgb(0, 0, 0),
  blue: rgb(0, 0, 1),
};

/**
 * Draws the table of contents on A4 pages.
 */
export class TocRenderer {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly labels: DossierLabels,
  ) {}

  async render(entries: readonly DocumentEntry[]): Promise<TocRenderResult> {
    const document = await PDFDocument.create({ updateMetadata: false });
    const fonts = {
      regular: await document.embedFont(StandardFonts.Helvetica),
      bold: await document.embedFont(StandardFonts.HelveticaBold),
    };

    const layout = layoutTableOfContents(
      entries,
      (text, font, fontSize) =>
        fonts[font].widthOfTextAtSize(toWinAnsi(text, fonts[font]), fontSize),
      this.labels,
    );
    const pages = layout.pages.map((items) =>
      items.map((item) => ({
        ...item,
        text: toWinAnsi(item.text, fonts[item.font]),
      })),
    );

    for (const items of pages) {
      const page = document.addPage([A4.WIDTH, A4.HEIGHT]);
      const height = page.getHeight();
      for (const item of items) {
        page.drawText(item.text, {
          x: item.x,
          y: height - item.y,
          size: item.fontSize,
          font: fonts[item.font],
          color: COLORS[item.color],
        });
      }
    }

    this.logger.info(
      `[TocRenderer] ${entries.length} entries on ${layout.pageCount} page(s)`,
    );

    return {
      bytes: await document.save(),
      links: layout.links,
      pageCount: layout.pageCount,
      pages,
    };
  }
}
