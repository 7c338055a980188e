import {
  PDFArray,
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNumber,
} from 'pdf-lib';
import { beforeEach, describe, expect, test, vi } from 'vitest';

import type { BookmarkNode, TocLinkRecord } from '@dossier/model';

import { DossierAssemblyError } from '../errors/dossier-assembly-error';
import { DocumentAssembler } from './document-assembler';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

async function createPdf(sizes: [number, number][]): Promise<Uint8Array> {
  const document = await PDFDocument.create();
  for (const size of sizes) {
    document.addPage(size);
  }
  return document.save();
}

/** Title (1 page), TOC (1 page), then documents 300, 310 and 320 wide */
async function assembleSample(assembler: DocumentAssembler) {
  return assembler.concatenate([
    { label: 'title page', bytes: await createPdf([[595.28, 841.89]]) },
    { label: 'table of contents', bytes: await createPdf([[595.28, 841.89]]) },
    { label: 'A_lease', bytes: await createPdf([[300, 400]]) },
    { label: 'B_payslip', bytes: await createPdf([[310, 400]]) },
    { label: 'B_tax', bytes: await createPdf([[320, 400]]) },
  ]);
}

function readLinks(document: PDFDocument, pageIndex: number) {
  const annots = document.getPage(pageIndex).node.Annots();
  if (annots === undefined) return [];
  const pageRefs = document.getPages().map((page) => page.ref);

  return Array.from({ length: annots.size() }, (_, index) => {
    const annot = annots.lookup(index, PDFDict);
    const rect = annot.lookup(PDFName.of('Rect'), PDFArray).asRectangle();
    const dest = annot.lookup(PDFName.of('Dest'), PDFArray);
    return {
      subtype: annot.lookup(PDFName.of('Subtype'), PDFName),
      rect,
      targetIndex: pageRefs.findIndex((ref) => ref === dest.get(0)),
    };
  });
}

function readOutline(document: PDFDocument): BookmarkNode[] {
  const pageRefs = document.getPages().map((page) => page.ref);
  const readLevel = (first: PDFDict | undefined): BookmarkNode[] => {
    const nodes: BookmarkNode[] = [];
    let item = first;
    while (item !== undefined) {
      const dest = item.lookup(PDFName.of('Dest'), PDFArray);
      nodes.push({
        title: item.lookup(PDFName.of('Title'), PDFHexString).decodeText(),
        pageIndex: pageRefs.findIndex((ref) => ref === dest.get(0)),
        children: readLevel(item.lookupMaybe(PDFName.of('First'), PDFDict)),
      });
      item = item.lookupMaybe(PDFName.of('Next'), PDFDict);
    }
    return nodes;
  };

  const outlines = document.catalog.lookupMaybe(PDFName.of('Outlines'), PDFDict);
  return readLevel(outlines?.lookupMaybe(PDFName.of('First'), PDFDict));
}

const link = (
  targetPage: number,
  tocPageIndex = 0,
  y1 = 122,
): TocLinkRecord => ({
  rect: { x1: 50, y1, x2: 545.28, y2: y1 + 15 },
  targetPage,
  tocPageIndex,
});

describe('DocumentAssembler', () => {
  let assembler: DocumentAssembler;

  beforeEach(() => {
    vi.clearAllMocks();
    assembler = new DocumentAssembler(mockLogger);
  });

  describe('concatenate', () => {
    test('appends every page of every part in order', async () => {
      const document = await assembleSample(assembler);

      expect(document.getPages().map((page) => page.getWidth())).toEqual([
        595.28, 595.28, 300, 310, 320,
      ]);
    });

    test('keeps multi-page parts together', async () => {
      const document = await assembler.concatenate([
        { label: 'a', bytes: await createPdf([[100, 100], [200, 200]]) },
        { label: 'b', bytes: await createPdf([[300, 300]]) },
      ]);

      expect(document.getPages().map((page) => page.getWidth())).toEqual([
        100, 200, 300,
      ]);
    });

    test('fails on a part that does not parse', async () => {
      await expect(
        assembler.concatenate([
          { label: 'broken.pdf', bytes: new TextEncoder().encode('garbage') },
        ]),
      ).rejects.toThrow(DossierAssemblyError);
    });
  });

  describe('injectLinks', () => {
    test('adds a link on the TOC page pointing at the target page', async () => {
      const document = await assembleSample(assembler);

      const report = assembler.injectLinks(document, [link(3), link(4, 0, 185)]);

      expect(report).toEqual({ applied: 2, skipped: [] });
      const links = readLinks(document, 1);
      expect(links.map((l) => [l.subtype, l.targetIndex])).toEqual([
        [PDFName.of('Link'), 2],
        [PDFName.of('Link'), 3],
      ]);
      expect(links[0].rect.x).toBe(50);
      expect(links[0].rect.y).toBeCloseTo(841.89 - 137, 6);
      expect(links[0].rect.height).toBeCloseTo(15, 6);
      expect(readLinks(document, 0)).toEqual([]);
    });

    test('flips with the height of the TOC page itself', async () => {
      const document = await assembler.concatenate([
        { label: 'title', bytes: await createPdf([[612, 792]]) },
        { label: 'toc', bytes: await createPdf([[612, 500]]) },
        { label: 'doc', bytes: await createPdf([[612, 792]]) },
      ]);

      assembler.injectLinks(document, [link(3, 0, 100)]);

      expect(readLinks(document, 1)[0].rect.y).toBeCloseTo(385, 6);
    });

    test('places links of later TOC pages on those pages', async () => {
      const document = await assembler.concatenate([
        { label: 'title', bytes: await createPdf([[595.28, 841.89]]) },
        {
          label: 'toc',
          bytes: await createPdf([
            [595.28, 841.89],
            [595.28, 841.89],
          ]),
        },
        { label: 'doc', bytes: await createPdf([[300, 400]]) },
      ]);

      assembler.injectLinks(document, [link(4, 1)]);

      expect(readLinks(document, 1)).toEqual([]);
      expect(readLinks(document, 2).map((l) => l.targetIndex)).toEqual([3]);
    });

    test('skips links whose target is past the end and keeps going', async () => {
      const document = await assembleSample(assembler);

      const report = assembler.injectLinks(document, [link(9), link(5)]);

      expect(report.applied).toBe(1);
      expect(report.skipped).toEqual([
        {
          link: link(9),
          reason: 'target page index 8 out of range (5 pages)',
        },
      ]);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        '[DocumentAssembler] Skipping link: target page index 8 out of range (5 pages)',
      );
      expect(readLinks(document, 1).map((l) => l.targetIndex)).toEqual([4]);
    });

    test('skips links drawn on a TOC page that does not exist', async () => {
      const document = await assembleSample(assembler);

      const report = assembler.injectLinks(document, [link(3, 7)]);

      expect(report.applied).toBe(0);
      expect(report.skipped[0].reason).toBe(
        'TOC page index 8 out of range (5 pages)',
      );
    });
  });

  describe('injectBookmarks', () => {
    const tree: BookmarkNode[] = [
      { title: 'Title Page', pageIndex: 0, children: [] },
      { title: 'Table of Contents', pageIndex: 1, children: [] },
      {
        title: 'A',
        pageIndex: 2,
        children: [{ title: 'Lease', pageIndex: 2, children: [] }],
      },
      {
        title: 'B',
        pageIndex: 3,
        children: [
          { title: 'Payslip', pageIndex: 3, children: [] },
          { title: 'Tax Notice', pageIndex: 4, children: [] },
        ],
      },
    ];

    test('writes the tree under the catalog outlines', async () => {
      const document = await assembleSample(assembler);

      const count = assembler.injectBookmarks(document, tree);

      expect(count).toBe(7);
      expect(readOutline(document)).toEqual(tree);
    });

    test('opens the outline sidebar and counts open items', async () => {
      const document = await assembleSample(assembler);

      assembler.injectBookmarks(document, tree);

      expect(document.catalog.lookup(PDFName.of('PageMode'), PDFName)).toBe(
        PDFName.of('UseOutlines'),
      );
      const outlines = document.catalog.lookup(PDFName.of('Outlines'), PDFDict);
      expect(outlines.lookup(PDFName.of('Count'), PDFNumber).asNumber()).toBe(7);
    });

    test('survives a save and reload', async () => {
      const document = await assembleSample(assembler);
      assembler.injectBookmarks(document, tree);

      const reloaded = await PDFDocument.load(await document.save());

      expect(readOutline(reloaded)).toEqual(tree);
    });

    test('drops nodes pointing outside the document', async () => {
      const document = await assembleSample(assembler);

      const count = assembler.injectBookmarks(document, [
        ...tree.slice(0, 2),
        {
          title: 'C',
          pageIndex: 3,
          children: [
            { title: 'Kept', pageIndex: 4, children: [] },
            { title: 'Lost', pageIndex: 12, children: [] },
          ],
        },
        { title: 'D', pageIndex: 40, children: [] },
      ]);

      expect(count).toBe(4);
      expect(readOutline(document).map((node) => node.title)).toEqual([
        'Title Page',
        'Table of Contents',
        'C',
      ]);
      expect(mockLogger.warn).toHaveBeenCalledTimes(2);
    });

    test('writes nothing for an empty tree', async () => {
      const document = await assembleSample(assembler);

      expect(assembler.injectBookmarks(document, [])).toBe(0);
      expect(document.catalog.lookupMaybe(PDFName.of('Outlines'), PDFDict)).toBe(
        undefined,
      );
    });
  });
});
