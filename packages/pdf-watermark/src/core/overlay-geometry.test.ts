import { describe, expect, test } from 'vitest';

import {
  type TextMeasure,
  computeMaxAllowedWidth,
  computeOverlayLayout,
} from './overlay-geometry';

/** Every character is half an em wide */
const halfEm: TextMeasure = (text, fontSize) => text.length * fontSize * 0.5;

const COS_30 = Math.cos(Math.PI / 6);
const SIN_30 = Math.sin(Math.PI / 6);

const A4 = { width: 595.28, height: 841.89 };
const LETTER = { width: 612, height: 792 };

describe('computeMaxAllowedWidth', () => {
  test('divides the usable width by the rotation inflation factor', () => {
    const expected = (200 * 0.8) / (COS_30 + SIN_30 * (12 / 200));

    expect(computeMaxAllowedWidth(200, 12)).toBeCloseTo(expected, 9);
  });

  test('tightens as the font size grows', () => {
    expect(computeMaxAllowedWidth(595.28, 24)).toBeLessThan(
      computeMaxAllowedWidth(595.28, 8),
    );
  });
});

describe('computeOverlayLayout', () => {
  test('keeps the maximum font size when the text fits', () => {
    const layout = computeOverlayLayout(
      'DOCUMENT RESERVE A LA LOCATION',
      A4,
      halfEm,
    );

    expect(layout.fontSize).toBe(24);
    expect(layout.text).toBe('DOCUMENT RESERVE A LA LOCATION');
    expect(layout.textWidth).toBe(360);
    expect(layout.fontSizeReduced).toBe(false);
    expect(layout.truncated).toBe(false);
  });

  test('shrinks the font one point at a time until the text fits', () => {
    // 30 chars: 15 × size must not exceed 160 / (cos30 + sin30 × size / 200)
    // 12pt → 180 > 178.57, 11pt → 165 <= 179.07
    const layout = computeOverlayLayout(
      'X'.repeat(30),
      { width: 200, height: 300 },
      halfEm,
    );

    expect(layout.fontSize).toBe(11);
    expect(layout.fontSizeReduced).toBe(true);
    expect(layout.truncated).toBe(false);
    expect(layout.textWidth).toBeLessThanOrEqual(layout.maxAllowedWidth);
  });

  test('truncates with an ellipsis when the floor size still overflows', () => {
    // at 8pt the bound is 160 / (cos30 + 0.02) = 180.58, i.e. 45 characters
    const layout = computeOverlayLayout(
      'A'.repeat(60),
      { width: 200, height: 300 },
      halfEm,
    );

    expect(layout.fontSize).toBe(8);
    expect(layout.truncated).toBe(true);
    expect(layout.text).toBe(`${'A'.repeat(42)}...`);
    expect(layout.textWidth).toBe(180);
  });

  test('stops truncating before the text gets shorter than 10 characters', () => {
    const wide: TextMeasure = (text, fontSize) => text.length * fontSize * 10;

    const layout = computeOverlayLayout(
      'ABCDEFGHIJKL',
      { width: 200, height: 300 },
      wide,
    );

    expect(layout.text).toBe('ABCDEFGHI...');
    expect(layout.text.length).toBeGreaterThanOrEqual(10);
    expect(layout.truncated).toBe(true);
    expect(layout.textWidth).toBeGreaterThan(layout.maxAllowedWidth);
  });

  test('leaves text shorter than the truncation floor untouched', () => {
    const wide: TextMeasure = (text, fontSize) => text.length * fontSize * 10;

    const layout = computeOverlayLayout('SHORT', { width: 50, height: 50 }, wide);

    expect(layout.text).toBe('SHORT');
    expect(layout.fontSize).toBe(8);
    expect(layout.truncated).toBe(false);
  });

  test('centers the rotated text box horizontally', () => {
    const page = { width: 400, height: 500 };
    const layout = computeOverlayLayout('WATERMARK', page, halfEm);

    // 9 chars × 24 × 0.5 = 108 wide, 24 high
    const rotatedOffsetX = 54 * COS_30 - 12 * SIN_30;
    expect(layout.translateX).toBeCloseTo(200 - rotatedOffsetX, 9);

    const centerX =
      layout.translateX +
      (layout.textWidth / 2) * COS_30 -
      (layout.fontSize / 2) * SIN_30;
    expect(centerX).toBeCloseTo(200, 9);
  });

  test('places four rows at 20, 40, 60 and 80 percent of the height', () => {
    const page = { width: 400, height: 500 };
    const layout = computeOverlayLayout('WATERMARK', page, halfEm);

    const rotatedOffsetY = 54 * SIN_30 + 12 * COS_30;
    expect(layout.rows).toHaveLength(4);
    [100, 200, 300, 400].forEach((rowCenter, index) => {
      expect(layout.rows[index].x).toBe(layout.translateX);
      expect(layout.rows[index].y).toBeCloseTo(rowCenter - rotatedOffsetY, 9);
    });
  });

  test('reports the fixed rotation angle', () => {
    expect(computeOverlayLayout('X', A4, halfEm).rotationDegrees).toBe(30);
  });

  describe('bounds across page sizes and text lengths', () => {
    const texts = [
      'CONFIDENTIEL',
      'DOCUMENT RESERVE A LA LOCATION',
      'DOCUMENTS RESERVES A LA LOCATION D APPARTEMENT - DOSSIER COMPLET',
      'Z'.repeat(120),
    ];

    for (const page of [A4, LETTER, { width: 200, height: 400 }]) {
      for (const text of texts) {
        test(`${page.width}pt wide, ${text.length} chars`, () => {
          const layout = computeOverlayLayout(text, page, halfEm);

          expect(layout.fontSize).toBeGreaterThanOrEqual(8);
          expect(layout.fontSize).toBeLessThanOrEqual(24);
          expect(layout.textWidth).toBeLessThanOrEqual(layout.maxAllowedWidth);
          // horizontal projection of the rotated text stays in the usable band
          expect(layout.textWidth * COS_30).toBeLessThanOrEqual(
            page.width * 0.8,
          );
        });
      }
    }
  });

  test('longer text never gets a larger font', () => {
    let previous = Number.POSITIVE_INFINITY;
    for (let length = 5; length <= 80; length += 5) {
      const { fontSize } = computeOverlayLayout('M'.repeat(length), A4, halfEm);

      expect(fontSize).toBeLessThanOrEqual(previous);
      previous = fontSize;
    }
  });
});
