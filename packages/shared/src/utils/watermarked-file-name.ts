import { basename, extname } from 'node:path';

/** Suffix marking an intermediate watermarked file */
export const WATERMARKED_SUFFIX = '_watermarked';

/**
 * Name of the watermarked intermediate for a source file:
 * `<group>_<source stem>_watermarked.pdf`.
 */
export function formatWatermarkedFileName(
  group: string,
  sourcePath: string,
): string {
  const fileName = basename(sourcePath);
  const stem = fileName.slice(0, fileName.length - extname(fileName).length);
  return `${group}_${stem}${WATERMARKED_SUFFIX}.pdf`;
}
