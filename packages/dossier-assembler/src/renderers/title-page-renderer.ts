import type { LoggerMethods } from '@dossier/logger';

import { toWinAnsi } from '@dossier/shared';
import { PDFDocument, StandardFonts } from 'pdf-lib';

import type { DossierLabels } from '../config/labels';

import { A4, TITLE_PAGE } from '../config/constants';

/**
 * Formats a date as `dd/mm/yyyy` in local time.
 */
export function formatGenerationDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  return `${day}/${month}/${date.getFullYear()}`;
}

/**
 * Draws the single title page: the title, and the generation date below it,
 * both centered.
 */
export class TitlePageRenderer {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly labels: DossierLabels,
  ) {}

  async render(title: string, generatedAt: Date): Promise<Uint8Array> {
    const document = await PDFDocument.create({ updateMetadata: false });
    const bold = await document.embedFont(StandardFonts.HelveticaBold);
    const regular = await document.embedFont(StandardFonts.Helvetica);
    const page = document.addPage([A4.WIDTH, A4.HEIGHT]);
    const { width, height } = page.getSize();

    const titleText = toWinAnsi(title, bold);
    const titleWidth = bold.widthOfTextAtSize(
      titleText,
      TITLE_PAGE.TITLE_FONT_SIZE,
    );
    page.drawText(titleText, {
      x: (width - titleWidth) / 2,
      y: height * TITLE_PAGE.TITLE_Y_FRACTION,
      size: TITLE_PAGE.TITLE_FONT_SIZE,
      font: bold,
    });

    const dateText = toWinAnsi(
      `${this.labels.generatedOn} ${formatGenerationDate(generatedAt)}`,
      regular,
    );
    const dateWidth = regular.widthOfTextAtSize(
      dateText,
      TITLE_PAGE.DATE_FONT_SIZE,
    );
    page.drawText(dateText, {
      x: (width - dateWidth) / 2,
      y: height * TITLE_PAGE.DATE_Y_FRACTION,
      size: TITLE_PAGE.DATE_FONT_SIZE,
      font: regular,
    });

    this.logger.debug(`[TitlePageRenderer] Title page for "${title}"`);

    return document.save();
  }
}
