/**
 * Folder and file names used inside the source folder
 */
export const SOURCE_LAYOUT = {
  /** Intermediate watermarked files, kept only on request */
  TEMP_FOLDER: 'temp_watermarked',
  PROTECTED_FOLDER: 'protected_files',
  /** Folder a previous manual export may have left behind */
  OUTPUT_FOLDER: 'Dossier Location',
  OUTPUT_PREFIX: 'Dossier_Location_Complete_',
  PDF_EXTENSION: '.pdf',
  /** Suffix of the file written before the atomic rename */
  PARTIAL_SUFFIX: '.partial',
} as const;

/** Subfolders never treated as document groups */
export const EXCLUDED_FOLDERS: readonly string[] = [
  SOURCE_LAYOUT.TEMP_FOLDER,
  SOURCE_LAYOUT.PROTECTED_FOLDER,
  SOURCE_LAYOUT.OUTPUT_FOLDER,
];

/**
 * Defaults of the command line options not owned by the watermark package
 */
export const CLI_DEFAULTS = {
  TITLE: 'Dossier de Location',
  LANGUAGE: 'en',
  TOC_PAGES: 'exact',
} as const;
