/**
 * Unit Tests: pdfjs page extraction
 *
 * Pages are plain objects shaped like PDFPageProxy, so pdfjs itself is never
 * loaded here.
 */
import { describe, test, expect } from 'vitest';
import {
  extractPageElements,
  extractTextPositions,
  findImagePlacements,
  groupTextBlocks,
  type PdfjsOperatorListLike,
  type PdfjsPageLike,
  type PdfjsTextContentLike,
} from '../elementExtractor';

const PAGE_HEIGHT = 792;

const textContent: PdfjsTextContentLike = {
  items: [
    { str: 'Title', transform: [24, 0, 0, 24, 72, 700], width: 60, height: 24, fontName: 'g_d0_f1', hasEOL: true },
    { type: 'beginMarkedContent' },
    { str: 'First line of body', transform: [12, 0, 0, 12, 72, 650], width: 100, height: 12, fontName: 'g_d0_f2' },
    { str: '', transform: [1, 0, 0, 1, 0, 0], width: 0, height: 0, hasEOL: true },
    { str: 'second line', transform: [12, 0, 0, 12, 72, 636], width: 80, height: 12, fontName: 'g_d0_f2' },
  ],
  styles: { g_d0_f1: { fontFamily: 'serif' } },
};

const operatorList: PdfjsOperatorListLike = {
  fnArray: [10, 12, 85, 11, 10, 12, 85, 11, 85],
  argsArray: [
    null,
    [100, 0, 0, 50, 72, 600],
    ['img_p0_1', 100, 50],
    null,
    null,
    [20, 0, 0, 20, 300, 300],
    ['img_p0_1'],
    null,
    ['img_p0_2'],
  ],
};

function fakePage(text: PdfjsTextContentLike, ops: PdfjsOperatorListLike): PdfjsPageLike {
  return {
    view: [0, 0, 612, PAGE_HEIGHT],
    getTextContent: async () => text,
    getOperatorList: async () => ops,
  };
}

describe('groupTextBlocks', () => {
  test('splits blocks on large baseline gaps and lines on end-of-line markers', () => {
    const blocks = groupTextBlocks(textContent, PAGE_HEIGHT);

    expect(blocks).toHaveLength(2);
    expect(blocks[0].bbox).toEqual([72, 68, 132, 92]);
    expect(blocks[0].lines).toHaveLength(1);
    expect(blocks[1].lines.map(l => l.bbox)).toEqual([
      [72, 130, 172, 142],
      [72, 144, 152, 156],
    ]);
    expect(blocks[1].bbox).toEqual([72, 130, 172, 156]);
  });

  test('resolves font names through the style table', () => {
    const [title, body] = groupTextBlocks(textContent, PAGE_HEIGHT);
    expect(title.lines[0].spans[0].font).toBe('serif');
    expect(title.lines[0].spans[0].size).toBe(24);
    expect(body.lines[0].spans[0].font).toBe('g_d0_f2');
  });

  test('a whitespace item between spans on one line becomes a trailing space', () => {
    const blocks = groupTextBlocks({
      items: [
        { str: 'Hello', transform: [10, 0, 0, 10, 50, 500], width: 25, height: 10 },
        { str: ' ', transform: [10, 0, 0, 10, 75, 500], width: 3, height: 10 },
        { str: 'world', transform: [10, 0, 0, 10, 78, 500], width: 25, height: 10 },
      ],
    }, PAGE_HEIGHT);

    expect(blocks).toHaveLength(1);
    expect(blocks[0].lines[0].spans.map(s => s.text)).toEqual(['Hello ', 'world']);
  });

  test('empty text content yields no blocks', () => {
    expect(groupTextBlocks({ items: [] }, PAGE_HEIGHT)).toEqual([]);
  });
});

describe('findImagePlacements', () => {
  test('maps the unit square through the CTM and restores saved state', () => {
    expect(findImagePlacements(operatorList, PAGE_HEIGHT)).toEqual([
      { objId: 'img_p0_1', bbox: [72, 142, 172, 192] },
      { objId: 'img_p0_1', bbox: [300, 472, 320, 492] },
      { objId: 'img_p0_2', bbox: [0, 791, 1, 792] },
    ]);
  });

  test('nested transforms compose', () => {
    const placements = findImagePlacements({
      fnArray: [12, 12, 85],
      argsArray: [[2, 0, 0, 2, 0, 0], [1, 0, 0, 1, 10, 10], ['img_nested']],
    }, PAGE_HEIGHT);

    expect(placements).toEqual([{ objId: 'img_nested', bbox: [20, 770, 22, 772] }]);
  });

  test('paint operations without an object id get a positional id', () => {
    const placements = findImagePlacements({ fnArray: [82], argsArray: [null] }, PAGE_HEIGHT);
    expect(placements[0].objId).toBe('image-op-0');
  });
});

describe('extractPageElements', () => {
  test('text blocks then images, with ids in extraction order', async () => {
    const elements = await extractPageElements(fakePage(textContent, operatorList), 0);

    expect(elements.map(e => e.id)).toEqual([
      'text_0_0',
      'text_0_1',
      'image_0_0_0',
      'image_0_0_1',
      'image_0_1_0',
    ]);
    expect(elements[0]).toEqual({
      id: 'text_0_0',
      kind: 'text',
      bbox: [72, 68, 132, 92],
      role: 'P',
      text: 'Title',
      properties: {},
    });
    expect(elements[1].text).toBe('First line of body\nsecond line');
    expect(elements[2]).toEqual({
      id: 'image_0_0_0',
      kind: 'image',
      bbox: [72, 142, 172, 192],
      role: 'Figure',
      properties: { alt_text: '' },
    });
  });

  test('uses the page index in element ids', async () => {
    const elements = await extractPageElements(fakePage(textContent, { fnArray: [], argsArray: [] }), 3);
    expect(elements.map(e => e.id)).toEqual(['text_3_0', 'text_3_1']);
  });
});

describe('extractTextPositions', () => {
  test('one position per span, tagged with its block id', async () => {
    const positions = await extractTextPositions(fakePage(textContent, operatorList), 0);

    expect(positions.map(p => [p.elementId, p.text, p.blockIdx, p.lineIdx, p.spanIdx])).toEqual([
      ['text_0_0', 'Title', 0, 0, 0],
      ['text_0_1', 'First line of body', 1, 0, 0],
      ['text_0_1', 'second line', 1, 1, 0],
    ]);
    expect(positions[0].bbox).toEqual([72, 68, 132, 92]);
    expect(positions[0].font).toBe('serif');
  });
});
