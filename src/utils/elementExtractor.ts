/**
 * Element Extractor: pdfjs-dist page → content elements.
 *
 *   page → getTextContent()  → groupTextBlocks()   → text elements, text positions
 *   page → getOperatorList() → findImagePlacements() → image elements
 *
 * Pages are described structurally (PdfjsPageLike) so this module never
 * loads pdfjs itself; pdfjsDocumentSource hands real PDFPageProxy objects in
 * and tests hand in plain fakes.
 *
 * All boxes are converted to a top-left origin.
 */

import { z } from 'zod';
import type { BBox, Element, TextPosition } from '../types';
import { imageElementId, textElementId } from './elementIds';

export interface PdfjsTextContentLike {
  items: unknown[];
  styles?: Record<string, unknown>;
}

export interface PdfjsOperatorListLike {
  fnArray: number[];
  argsArray: unknown[];
}

export interface PdfjsPageLike {
  /** [x0, y0, x1, y1] in PDF units */
  view: number[];
  getTextContent(): Promise<PdfjsTextContentLike>;
  getOperatorList(): Promise<PdfjsOperatorListLike>;
}

// ─── pdfjs-dist OPS constants ─────────────────────────────────────

const OPS = {
  save: 10,
  restore: 11,
  transform: 12,
  paintJpegXObject: 82,
  paintImageXObject: 85,
} as const;

/** 6-element affine transform: [a, b, c, d, e, f] */
type Matrix = [number, number, number, number, number, number];

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

/**
 * Row-vector product m1 * m2: a point is mapped by m1 first, then m2.
 * A `cm`/transform operator therefore updates the CTM as tm * ctm.
 */
function multiplyMatrices(m1: Matrix, m2: Matrix): Matrix {
  return [
    m1[0] * m2[0] + m1[1] * m2[2],
    m1[0] * m2[1] + m1[1] * m2[3],
    m1[2] * m2[0] + m1[3] * m2[2],
    m1[2] * m2[1] + m1[3] * m2[3],
    m1[4] * m2[0] + m1[5] * m2[2] + m2[4],
    m1[4] * m2[1] + m1[5] * m2[3] + m2[5],
  ];
}

const matrixSchema = z.tuple([z.number(), z.number(), z.number(), z.number(), z.number(), z.number()]);

const textItemSchema = z.object({
  str: z.string(),
  transform: z.array(z.number()).min(6),
  width: z.number().optional(),
  height: z.number().optional(),
  fontName: z.string().optional(),
  hasEOL: z.boolean().optional(),
});

const fontStyleSchema = z.object({ fontFamily: z.string() });

// ─── Text layout ─────────────────────────────────────────────────

export interface TextSpan {
  text: string;
  bbox: BBox;
  font: string;
  size: number;
}

export interface TextLine {
  spans: TextSpan[];
  bbox: BBox;
}

export interface TextBlock {
  lines: TextLine[];
  bbox: BBox;
}

/** Lines whose baselines are further apart than this many line heights start a new block. */
const BLOCK_BREAK_FACTOR = 1.5;
/** Baseline shift, in font sizes, that starts a new line. */
const LINE_BREAK_FACTOR = 0.5;

function unionBox(boxes: BBox[]): BBox {
  return [
    Math.min(...boxes.map(b => b[0])),
    Math.min(...boxes.map(b => b[1])),
    Math.max(...boxes.map(b => b[2])),
    Math.max(...boxes.map(b => b[3])),
  ];
}

function resolveFontNames(styles: Record<string, unknown> | undefined): Map<string, string> {
  const names = new Map<string, string>();
  for (const [internalId, style] of Object.entries(styles ?? {})) {
    const parsed = fontStyleSchema.safeParse(style);
    if (parsed.success) names.set(internalId, parsed.data.fontFamily);
  }
  return names;
}

/**
 * Group pdfjs text items into lines and blocks, in content order.
 * Whitespace-only items only separate words; they never become spans.
 */
export function groupTextBlocks(textContent: PdfjsTextContentLike, pageHeight: number): TextBlock[] {
  const fontNames = resolveFontNames(textContent.styles);
  const blocks: TextBlock[] = [];
  let lineSpans: TextSpan[] = [];
  let blockLines: TextLine[] = [];
  let lineBaseline: number | null = null;
  let lineHeight = 0;
  let pendingSpace = false;
  let breakAfter = false;

  const flushLine = () => {
    if (lineSpans.length > 0) {
      blockLines.push({ spans: lineSpans, bbox: unionBox(lineSpans.map(s => s.bbox)) });
    }
    lineSpans = [];
    pendingSpace = false;
  };
  const flushBlock = () => {
    flushLine();
    if (blockLines.length > 0) {
      blocks.push({ lines: blockLines, bbox: unionBox(blockLines.map(l => l.bbox)) });
    }
    blockLines = [];
  };

  for (const raw of textContent.items) {
    const parsed = textItemSchema.safeParse(raw);
    if (!parsed.success) continue;
    const item = parsed.data;
    const transform = item.transform;

    // Font size from the text matrix: sqrt(a^2 + b^2)
    const fontSize = Math.sqrt(transform[0] * transform[0] + transform[1] * transform[1]);
    const baseline = pageHeight - transform[5];

    if (!item.str.trim()) {
      pendingSpace = lineSpans.length > 0;
      if (item.hasEOL) breakAfter = true;
      continue;
    }
    if (fontSize <= 0) continue;

    if (lineBaseline !== null) {
      const shift = Math.abs(baseline - lineBaseline);
      if (shift > BLOCK_BREAK_FACTOR * Math.max(lineHeight, fontSize)) {
        flushBlock();
      } else if (breakAfter || shift > LINE_BREAK_FACTOR * fontSize) {
        flushLine();
      }
    }
    breakAfter = item.hasEOL ?? false;

    const height = item.height || fontSize * 1.2;
    const width = item.width || item.str.length * fontSize * 0.5;
    const x = transform[4];
    const top = baseline - height;
    const rawFont = item.fontName ?? 'default';

    if (pendingSpace && lineSpans.length > 0) {
      const last = lineSpans[lineSpans.length - 1];
      if (!last.text.endsWith(' ')) last.text += ' ';
    }
    pendingSpace = false;

    lineSpans.push({
      text: item.str,
      bbox: [x, top, x + width, baseline],
      font: fontNames.get(rawFont) ?? rawFont,
      size: fontSize,
    });
    lineBaseline = baseline;
    lineHeight = height;
  }

  flushBlock();
  return blocks;
}

export function blockText(block: TextBlock): string {
  return block.lines
    .map(line => line.spans.map(s => s.text).join('').trim())
    .join('\n')
    .trim();
}

// ─── Images ──────────────────────────────────────────────────────

export interface ImagePlacement {
  objId: string;
  bbox: BBox;
}

/**
 * Walk the operator list and record where each image XObject is painted.
 */
export function findImagePlacements(opList: PdfjsOperatorListLike, pageHeight: number): ImagePlacement[] {
  const placements: ImagePlacement[] = [];
  const stack: Matrix[] = [];
  let ctm: Matrix = IDENTITY;

  for (let i = 0; i < opList.fnArray.length; i++) {
    const op = opList.fnArray[i];
    const args = opList.argsArray[i];

    switch (op) {
      case OPS.save:
        stack.push(ctm);
        break;
      case OPS.restore:
        ctm = stack.pop() ?? IDENTITY;
        break;
      case OPS.transform: {
        const tm = matrixSchema.safeParse(args);
        if (tm.success) ctm = multiplyMatrices(tm.data, ctm);
        break;
      }
      case OPS.paintImageXObject:
      case OPS.paintJpegXObject: {
        const first: unknown = Array.isArray(args) ? args[0] : undefined;
        const objId = typeof first === 'string' ? first : `image-op-${i}`;
        placements.push({ objId, bbox: unitSquareBox(ctm, pageHeight) });
        break;
      }
      default:
        break;
    }
  }

  return placements;
}

/** Images paint into the unit square; its image under the CTM is the placement. */
function unitSquareBox(ctm: Matrix, pageHeight: number): BBox {
  const corners = [[0, 0], [1, 0], [0, 1], [1, 1]].map(([u, v]) => ({
    x: u * ctm[0] + v * ctm[2] + ctm[4],
    y: u * ctm[1] + v * ctm[3] + ctm[5],
  }));
  const xs = corners.map(c => c.x);
  const ys = corners.map(c => pageHeight - c.y);
  return [Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys)];
}

// ─── Page extraction ─────────────────────────────────────────────

export function pageHeightOf(page: PdfjsPageLike): number {
  const [, y0 = 0, , y1 = 0] = page.view;
  return y1 - y0;
}

/**
 * Text blocks then image placements, with ids in extraction order. Text
 * elements default to P, images to Figure with an empty alt text.
 */
export async function extractPageElements(page: PdfjsPageLike, pageIndex: number): Promise<Element[]> {
  const pageHeight = pageHeightOf(page);
  const blocks = groupTextBlocks(await page.getTextContent(), pageHeight);

  const elements: Element[] = blocks.map((block, i): Element => ({
    id: textElementId(pageIndex, i),
    kind: 'text',
    bbox: block.bbox,
    role: 'P',
    text: blockText(block),
    properties: {},
  }));

  const placements = findImagePlacements(await page.getOperatorList(), pageHeight);
  const imageOrdinals = new Map<string, number>();
  const rectCounts = new Map<string, number>();
  for (const placement of placements) {
    if (!imageOrdinals.has(placement.objId)) imageOrdinals.set(placement.objId, imageOrdinals.size);
    const imageOrdinal = imageOrdinals.get(placement.objId) ?? 0;
    const rectOrdinal = rectCounts.get(placement.objId) ?? 0;
    rectCounts.set(placement.objId, rectOrdinal + 1);

    elements.push({
      id: imageElementId(pageIndex, imageOrdinal, rectOrdinal),
      kind: 'image',
      bbox: placement.bbox,
      role: 'Figure',
      properties: { alt_text: '' },
    });
  }

  return elements;
}

/**
 * One position per text span, tagged with the id of its block.
 */
export async function extractTextPositions(page: PdfjsPageLike, pageIndex: number): Promise<TextPosition[]> {
  const blocks = groupTextBlocks(await page.getTextContent(), pageHeightOf(page));
  const positions: TextPosition[] = [];

  blocks.forEach((block, blockIdx) => {
    block.lines.forEach((line, lineIdx) => {
      line.spans.forEach((span, spanIdx) => {
        const text = span.text.trim();
        if (!text) return;
        positions.push({
          elementId: textElementId(pageIndex, blockIdx),
          text,
          bbox: span.bbox,
          font: span.font,
          size: span.size,
          blockIdx,
          lineIdx,
          spanIdx,
        });
      });
    });
  });

  return positions;
}
