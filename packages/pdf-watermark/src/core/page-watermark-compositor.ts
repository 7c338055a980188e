import type { LoggerMethods } from '@dossier/logger';
import type {
  PageGeometry,
  SourceDocument,
  WatermarkedDocument,
} from '@dossier/model';
import type { Result } from '@dossier/shared';

import { err, tryAsync } from '@dossier/shared';
import { readFile } from 'node:fs/promises';
import { PDFDocument } from 'pdf-lib';

import type { OverlayRenderer } from './overlay-renderer';

import { WatermarkError } from '../errors/watermark-error';

/** Identity of the document being watermarked */
export interface WatermarkTarget {
  /** Intermediate file name given to the result */
  fileName: string;
  group: string;
}

/**
 * Draws a per-page overlay over every page of a document.
 *
 * Each page gets an overlay rendered for its own size. A failure on any
 * page fails the whole document; the failure is returned, not thrown, so a
 * batch can skip the document and carry on.
 */
export class PageWatermarkCompositor {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly renderer: OverlayRenderer,
  ) {}

  /**
   * Watermark a serialized PDF.
   */
  async watermark(
    bytes: Uint8Array,
    target: WatermarkTarget,
  ): Promise<Result<WatermarkedDocument, WatermarkError>> {
    const result = await tryAsync(
      () => this.composite(bytes, target),
      (error) =>
        WatermarkError.fromError(`Failed to watermark ${target.fileName}`, error),
    );

    if (result.ok) {
      this.logger.info(
        `[PageWatermarkCompositor] Watermarked: ${target.fileName} (${result.value.pageCount} pages)`,
      );
    } else {
      this.logger.error(`[PageWatermarkCompositor] ${result.error.message}`);
    }
    return result;
  }

  /**
   * Read a source file from disk and watermark it.
   */
  async watermarkFile(
    source: SourceDocument,
  ): Promise<Result<WatermarkedDocument, WatermarkError>> {
    let bytes: Uint8Array;
    try {
      bytes = await readFile(source.path);
    } catch (error) {
      const failure = WatermarkError.fromError(
        `Failed to read ${source.path}`,
        error,
      );
      this.logger.error(`[PageWatermarkCompositor] ${failure.message}`);
      return err(failure);
    }

    return this.watermark(bytes, {
      fileName: source.fileName,
      group: source.group,
    });
  }

  private async composite(
    bytes: Uint8Array,
    target: WatermarkTarget,
  ): Promise<WatermarkedDocument> {
    const document = await PDFDocument.load(bytes, { updateMetadata: false });
    const pageSizes: PageGeometry[] = [];

    for (const [index, page] of document.getPages().entries()) {
      const mediaBox = page.getMediaBox();
      const size = { width: mediaBox.width, height: mediaBox.height };

      let overlayBytes: Uint8Array;
      try {
        overlayBytes = (await this.renderer.render(size)).bytes;
      } catch (error) {
        throw WatermarkError.fromError(`page ${index + 1}`, error);
      }

      const [overlay] = await document.embedPdf(overlayBytes, [0]);
      page.drawPage(overlay, {
        x: mediaBox.x,
        y: mediaBox.y,
        width: size.width,
        height: size.height,
      });
      pageSizes.push(size);
    }

    this.logger.debug(
      `[PageWatermarkCompositor] ${target.fileName}: ${pageSizes.length} overlays drawn`,
    );

    return {
      fileName: target.fileName,
      group: target.group,
      bytes: await document.save(),
      pageCount: pageSizes.length,
      pageSizes,
    };
  }
}
