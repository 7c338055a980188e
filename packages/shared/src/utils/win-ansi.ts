import type { PDFFont } from 'pdf-lib';

/** Drawn in place of characters the font cannot encode */
export const REPLACEMENT_CHARACTER = '?';

const characterSets = new WeakMap<PDFFont, ReadonlySet<number>>();

function characterSetOf(font: PDFFont): ReadonlySet<number> {
  let characterSet = characterSets.get(font);
  if (characterSet === undefined) {
    characterSet = new Set(font.getCharacterSet());
    characterSets.set(font, characterSet);
  }
  return characterSet;
}

/**
 * Replace every code point `font` cannot encode with `?`.
 *
 * Standard fonts only cover WinAnsi, and pdf-lib throws on anything else
 * when measuring or drawing.
 */
export function toWinAnsi(text: string, font: PDFFont): string {
  const characterSet = characterSetOf(font);
  return Array.from(text, (character) => {
    const codePoint = character.codePointAt(0);
    return codePoint !== undefined && characterSet.has(codePoint)
      ? character
      : REPLACEMENT_CHARACTER;
  }).join('');
}
