import type { LoggerMethods } from '@dossier/logger';
import type { OverlayRequest, PageGeometry } from '@dossier/model';

import { formatZodIssues, toWinAnsi } from '@dossier/shared';
import { PDFDocument, StandardFonts, degrees, rgb } from 'pdf-lib';
import { z } from 'zod';

import { OVERLAY, WATERMARK_DEFAULTS } from '../config/constants';
import { WatermarkError } from '../errors/watermark-error';
import { type OverlayLayout, computeOverlayLayout } from './overlay-geometry';

const overlayOptionsSchema = z.object({
  text: z.string().min(1, 'Watermark text must not be empty'),
  opacity: z
    .number()
    .min(0, 'Opacity must be between 0 and 1')
    .max(1, 'Opacity must be between 0 and 1')
    .default(WATERMARK_DEFAULTS.OPACITY),
});

const pageGeometrySchema = z.object({
  width: z.number().finite().positive(),
  height: z.number().finite().positive(),
});

export type OverlayRendererOptions = z.input<typeof overlayOptionsSchema>;

/** Result of rendering one overlay page */
export interface OverlayRenderResult {
  /** Serialized one-page PDF, exactly the requested size */
  bytes: Uint8Array;
  request: OverlayRequest;
  layout: OverlayLayout;
  /**
   * Adjustment notices produced by this call. Only the first adjusted render
   * of a renderer instance reports one.
   */
  diagnostics: string[];
}

/**
 * Renders transparent one-page overlays carrying the watermark text four
 * times, rotated and scaled to the page.
 */
export class OverlayRenderer {
  readonly text: string;
  readonly opacity: number;

  private adjustmentLogged = false;

  constructor(
    private readonly logger: LoggerMethods,
    options: OverlayRendererOptions,
  ) {
    const parsed = overlayOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new WatermarkError(
        `[OverlayRenderer] Invalid options: ${formatZodIssues(parsed.error)}`,
      );
    }
    this.text = parsed.data.text;
    this.opacity = parsed.data.opacity;
  }

  /**
   * Render the overlay for a page of the given size.
   *
   * @throws WatermarkError when the size is not a positive finite number
   */
  async render(page: PageGeometry): Promise<OverlayRenderResult> {
    const parsed = pageGeometrySchema.safeParse(page);
    if (!parsed.success) {
      throw new WatermarkError(
        `[OverlayRenderer] Invalid page size ${page.width}x${page.height}: ${formatZodIssues(parsed.error)}`,
      );
    }
    const { width, height } = parsed.data;

    const document = await PDFDocument.create({ updateMetadata: false });
    const font = await document.embedFont(StandardFonts.HelveticaBold);
    const drawableText = toWinAnsi(this.text, font);
    if (drawableText !== this.text) {
      this.logger.debug(
        `[OverlayRenderer] Characters outside WinAnsi replaced: '${drawableText}'`,
      );
    }
    const layout = computeOverlayLayout(
      drawableText,
      { width, height },
      (text, size) => font.widthOfTextAtSize(text, size),
    );

    const overlayPage = document.addPage([width, height]);
    const { red, green, blue } = OVERLAY.COLOR;
    for (const row of layout.rows) {
      overlayPage.drawText(layout.text, {
        x: row.x,
        y: row.y,
        size: layout.fontSize,
        font,
        color: rgb(red, green, blue),
        opacity: this.opacity,
        rotate: degrees(layout.rotationDegrees),
      });
    }

    return {
      bytes: await document.save(),
      request: { text: this.text, opacity: this.opacity, width, height },
      layout,
      diagnostics: this.reportAdjustment(layout),
    };
  }

  private reportAdjustment(layout: OverlayLayout): string[] {
    if (this.adjustmentLogged) {
      return [];
    }

    if (layout.truncated) {
      const message = `Watermark text truncated to '${layout.text}' at font size ${layout.fontSize} to fit page width`;
      this.logger.warn(`[OverlayRenderer] ${message}`);
      this.adjustmentLogged = true;
      return [message];
    }

    if (layout.fontSizeReduced) {
      const message = `Watermark text scaled down to font size ${layout.fontSize} to fit page width`;
      this.logger.info(`[OverlayRenderer] ${message}`);
      this.adjustmentLogged = true;
      return [message];
    }

    return [];
  }
}
