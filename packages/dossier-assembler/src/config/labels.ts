/**
 * Fixed strings printed in the dossier and its outline
 */
export interface DossierLabels {
  /** Outline entry of the title page */
  titlePage: string;
  /** Heading of the TOC and its outline entry */
  tableOfContents: string;
  /** Prefix of the generation date on the title page */
  generatedOn: string;
  /** Prefix of page references in the TOC */
  pagePrefix: string;
}

export const ENGLISH_LABELS: DossierLabels = {
  titlePage: 'Title Page',
  tableOfContents: 'Table of Contents',
  generatedOn: 'Generated on',
  pagePrefix: 'page',
};

export const FRENCH_LABELS: DossierLabels = {
  titlePage: 'Page de Titre',
  tableOfContents: 'Table des Matières',
  generatedOn: 'Généré le',
  pagePrefix: 'page',
};

export const LABELS_BY_LANGUAGE = {
  en: ENGLISH_LABELS,
  fr: FRENCH_LABELS,
} as const;

export type DossierLanguage = keyof typeof LABELS_BY_LANGUAGE;
