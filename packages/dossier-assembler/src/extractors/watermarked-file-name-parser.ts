import { WATERMARKED_SUFFIX } from '@dossier/shared';

/** Group and display name recovered from an intermediate file name */
export interface ParsedFileName {
  group: string;
  displayName: string;
}

const PDF_EXTENSION = /\.pdf$/i;
const GROUP_DELIMITER = '_';
const NAME_DELIMITER = '-';

/**
 * Upper-cases the first letter of every run of letters and lower-cases the
 * rest: `"avis d'imposition"` → `"Avis D'Imposition"`.
 */
export function toTitleCase(text: string): string {
  return text.replace(
    /\p{L}+/gu,
    (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase(),
  );
}

/**
 * Recover the group and display name from `<group>_<stem>_watermarked.pdf`.
 *
 * Without `knownGroup` the group is everything before the first `_`. The
 * display name is the stem without the group prefix and the watermark
 * suffix, cut at the first `-`, with `_` read as spaces and title-cased.
 *
 * @example
 * ```typescript
 * parseWatermarkedFileName('Alice_bulletin_salaire-2024_watermarked.pdf');
 * // { group: 'Alice', displayName: 'Bulletin Salaire' }
 * ```
 */
export function parseWatermarkedFileName(
  fileName: string,
  knownGroup?: string,
): ParsedFileName {
  const stem = fileName.replace(PDF_EXTENSION, '');
  const group = knownGroup ?? stem.split(GROUP_DELIMITER)[0];

  let name = stem;
  if (name.startsWith(`${group}${GROUP_DELIMITER}`)) {
    name = name.slice(group.length + GROUP_DELIMITER.length);
  }
  if (name.endsWith(WATERMARKED_SUFFIX)) {
    name = name.slice(0, -WATERMARKED_SUFFIX.length);
  }

  const beforeDelimiter = name.split(NAME_DELIMITER)[0];
  if (beforeDelimiter.trim().length > 0) {
    name = beforeDelimiter;
  }

  return {
    group,
    displayName: toTitleCase(name.replaceAll('_', ' ').trim()),
  };
}
