import { describe, expect, test } from 'vitest';

import type { TocTextMeasure } from './toc-layout';

import { ENGLISH_LABELS } from '../config/labels';
import { countTocPages, layoutTableOfContents } from './toc-layout';

/** Every character is half an em wide */
const halfEm: TocTextMeasure = (text, _font, fontSize) =>
  text.length * fontSize * 0.5;

const entry = (group: string, displayName: string, startPage: number) => ({
  group,
  displayName,
  startPage,
});

const manyEntries = (count: number) =>
  Array.from({ length: count }, (_, index) =>
    entry('Alice', `Document ${index}`, 3 + index),
  );

describe('layoutTableOfContents', () => {
  test('centers the heading at the top of the first page', () => {
    const layout = layoutTableOfContents([], halfEm, ENGLISH_LABELS);

    // 'Table of Contents' = 17 chars × 18 × 0.5 = 153
    expect(layout.pages[0][0]).toEqual({
      text: 'Table of Contents',
      x: (595.28 - 153) / 2,
      y: 50,
      font: 'bold',
      fontSize: 18,
      color: 'black',
    });
    expect(layout.pageCount).toBe(1);
    expect(layout.links).toEqual([]);
  });

  test('writes a header before the first entry of every group', () => {
    const layout = layoutTableOfContents(
      [entry('A', 'Lease', 3), entry('B', 'Payslip', 4), entry('B', 'Tax', 5)],
      halfEm,
      ENGLISH_LABELS,
    );

    const headers = layout.pages[0].filter((item) => item.fontSize === 14);
    expect(headers.map((item) => [item.text, item.x, item.y])).toEqual([
      ['A', 50, 110],
      ['B', 50, 173],
    ]);
  });

  test('draws name, dot leader and right-aligned page reference', () => {
    const layout = layoutTableOfContents(
      [entry('A', 'Lease', 3)],
      halfEm,
      ENGLISH_LABELS,
    );

    // '    Lease' = 49.5 wide, 'page 3' = 33 wide
    const [, , name, dots, pageRef] = layout.pages[0];
    expect(name).toEqual({
      text: '    Lease',
      x: 50,
      y: 135,
      font: 'regular',
      fontSize: 11,
      color: 'blue',
    });
    expect(dots.text).toBe('.'.repeat(98));
    expect(dots.x).toBeCloseTo(109.5, 9);
    expect(dots.color).toBe('black');
    expect(pageRef.text).toBe('page 3');
    expect(pageRef.x).toBeCloseTo(512.28, 9);
  });

  test('skips the leader when the name leaves no room', () => {
    const layout = layoutTableOfContents(
      [entry('A', 'W'.repeat(90), 3)],
      halfEm,
      ENGLISH_LABELS,
    );

    expect(layout.pages[0].filter((item) => item.text.startsWith('.'))).toEqual(
      [],
    );
  });

  test('records a link rectangle per entry in top-down layout space', () => {
    const layout = layoutTableOfContents(
      [entry('A', 'Lease', 3), entry('B', 'Payslip', 4), entry('B', 'Tax', 5)],
      halfEm,
      ENGLISH_LABELS,
    );

    expect(layout.links).toEqual([
      {
        rect: { x1: 50, y1: 122, x2: 545.28, y2: 137 },
        targetPage: 3,
        tocPageIndex: 0,
      },
      {
        rect: { x1: 50, y1: 185, x2: 545.28, y2: 200 },
        targetPage: 4,
        tocPageIndex: 0,
      },
      {
        rect: { x1: 50, y1: 203, x2: 545.28, y2: 218 },
        targetPage: 5,
        tocPageIndex: 0,
      },
    ]);
  });

  test('fits 34 entries of one group on the first page', () => {
    const layout = layoutTableOfContents(manyEntries(34), halfEm, ENGLISH_LABELS);

    expect(layout.pageCount).toBe(1);
    expect(layout.links[33].rect.y1).toBe(135 + 18 * 33 - 13);
  });

  test('continues on a new page once the bottom margin is reached', () => {
    const layout = layoutTableOfContents(manyEntries(35), halfEm, ENGLISH_LABELS);

    expect(layout.pageCount).toBe(2);
    expect(layout.links[33].tocPageIndex).toBe(0);
    expect(layout.links[34]).toEqual({
      rect: { x1: 50, y1: 37, x2: 545.28, y2: 52 },
      targetPage: 37,
      tocPageIndex: 1,
    });
    expect(layout.pages[1].map((item) => item.text)).toEqual([
      '    Document 34',
      expect.stringMatching(/^\.+$/),
      'page 37',
    ]);
  });

  test('uses the page prefix of the labels', () => {
    const layout = layoutTableOfContents(
      [entry('A', 'Bail', 3)],
      halfEm,
      { ...ENGLISH_LABELS, pagePrefix: 'p.' },
    );

    expect(layout.pages[0].at(-1)?.text).toBe('p. 3');
  });
});

describe('countTocPages', () => {
  test('matches the layout page count without start pages', () => {
    const groups = (count: number) =>
      Array.from({ length: count }, () => ({ group: 'Alice' }));

    expect(countTocPages(groups(1), ENGLISH_LABELS)).toBe(1);
    expect(countTocPages(groups(34), ENGLISH_LABELS)).toBe(1);
    expect(countTocPages(groups(35), ENGLISH_LABELS)).toBe(2);
  });

  test('accounts for the room taken by group headers', () => {
    // every document in its own group: 63 points per entry instead of 18
    const documents = (count: number) =>
      Array.from({ length: count }, (_, index) => ({
        group: `Person ${index}`,
      }));

    expect(countTocPages(documents(11), ENGLISH_LABELS)).toBe(1);
    expect(countTocPages(documents(12), ENGLISH_LABELS)).toBe(2);
  });
});
