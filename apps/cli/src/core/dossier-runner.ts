import type { DossierBuildResult } from '@dossier/dossier-assembler';
import type { LoggerMethods } from '@dossier/logger';
import type { SourceDocument, WatermarkedDocument } from '@dossier/model';
import type { WatermarkError } from '@dossier/pdf-watermark';
import type { BatchReport } from '@dossier/shared';

import {
  type DossierLanguage,
  DossierBuilder,
  type TocPageCountPolicy,
} from '@dossier/dossier-assembler';
import {
  OverlayRenderer,
  PageWatermarkCompositor,
} from '@dossier/pdf-watermark';
import { BatchReporter } from '@dossier/shared';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import { SOURCE_LAYOUT } from '../config/constants';
import { SourceFolderError } from '../errors/source-folder-error';
import { writeFileAtomic } from '../utils/write-file-atomic';
import { walkSourceFolder } from './folder-walker';

export interface DossierRunOptions {
  /** Folder holding one subfolder per group */
  sourceFolder: string;
  watermarkText: string;
  opacity: number;
  title: string;
  language: DossierLanguage;
  tocPageCountPolicy: TocPageCountPolicy;
  /** Leave the watermarked intermediates in the temp folder */
  keepIntermediates: boolean;
  /** Date printed on the title page; now when omitted */
  generatedAt?: Date;
}

export type WatermarkReport = BatchReport<
  SourceDocument,
  WatermarkedDocument,
  WatermarkError
>;

export interface DossierRunResult {
  success: boolean;
  /** Path of the written dossier, on success */
  outputPath?: string;
  report: WatermarkReport;
  build?: DossierBuildResult;
}

/**
 * File name of the dossier: the watermark text with spaces turned into
 * underscores, after a fixed prefix.
 */
export function formatOutputFileName(watermarkText: string): string {
  return `${SOURCE_LAYOUT.OUTPUT_PREFIX}${watermarkText.replaceAll(' ', '_')}${SOURCE_LAYOUT.PDF_EXTENSION}`;
}

/**
 * DossierRunner
 *
 * Watermarks every PDF found under the source folder and writes the
 * assembled dossier at the root of that folder.
 *
 * A document that fails to watermark is left out and reported; the run
 * fails only when nothing could be watermarked. Assembly and write errors
 * propagate.
 */
export class DossierRunner {
  constructor(private readonly logger: LoggerMethods) {}

  async run(options: DossierRunOptions): Promise<DossierRunResult> {
    const root = resolve(options.sourceFolder);
    const emptyReport: WatermarkReport = { succeeded: [], failed: [] };

    let sources: SourceDocument[];
    try {
      sources = await walkSourceFolder(root, { logger: this.logger });
    } catch (error) {
      if (error instanceof SourceFolderError) {
        this.logger.error(`[DossierRunner] ${error.message}`);
        return { success: false, report: emptyReport };
      }
      throw error;
    }

    if (sources.length === 0) {
      this.logger.warn(`[DossierRunner] No PDF files found under ${root}`);
      return { success: false, report: emptyReport };
    }

    const tempFolder = join(root, SOURCE_LAYOUT.TEMP_FOLDER);
    try {
      const compositor = new PageWatermarkCompositor(
        this.logger,
        new OverlayRenderer(this.logger, {
          text: options.watermarkText,
          opacity: options.opacity,
        }),
      );
      const report = await BatchReporter.run(sources, (source) =>
        compositor.watermarkFile(source),
      );
      this.logger.info(
        `[DossierRunner] Watermarked ${report.succeeded.length} of ${sources.length} documents`,
      );

      if (!BatchReporter.hasAnySuccess(report)) {
        this.logger.warn(
          '[DossierRunner] No PDF files were successfully processed',
        );
        return { success: false, report };
      }

      const documents = report.succeeded.map(({ value }) => value);
      if (options.keepIntermediates) {
        await this.writeIntermediates(tempFolder, documents);
      }

      const builder = new DossierBuilder(this.logger, {
        title: options.title,
        generatedAt: options.generatedAt,
        tocPageCountPolicy: options.tocPageCountPolicy,
        language: options.language,
      });
      const build = await builder.build(documents);

      const outputPath = join(root, formatOutputFileName(options.watermarkText));
      await writeFileAtomic(outputPath, build.bytes);
      this.logger.info(
        `[DossierRunner] Successfully created combined document: ${outputPath}`,
      );

      return { success: true, outputPath, report, build };
    } finally {
      if (!options.keepIntermediates) {
        await this.removeTempFolder(tempFolder);
      }
    }
  }

  private async writeIntermediates(
    folder: string,
    documents: readonly WatermarkedDocument[],
  ): Promise<void> {
    await mkdir(folder, { recursive: true });
    for (const document of documents) {
      await writeFile(join(folder, document.fileName), document.bytes);
    }
    this.logger.info(
      `[DossierRunner] Kept ${documents.length} intermediate file(s) in ${folder}`,
    );
  }

  private async removeTempFolder(folder: string): Promise<void> {
    try {
      await rm(folder, { recursive: true, force: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `[DossierRunner] Could not remove temporary folder ${folder}: ${message}`,
      );
    }
  }
}
