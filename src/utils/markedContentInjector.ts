/**
 * Marked Content Injector
 *
 * Wraps text-show operators (Tj, TJ, ', ") of a page in
 *
 *   /Tag <</MCID n>> BDC ... EMC
 *
 * so the structure tree can point at them. Each operator's decoded text is a
 * fuzzy correlation unit; operators that match no element are left alone, as
 * are operators already inside a marked-content sequence.
 *
 * MCIDs already used on the page are reserved first, so new ids never
 * collide with existing marked content.
 */

import { PDFDocument, PDFName } from 'pdf-lib';
import type { Diagnostic, OperationResult, TextPosition } from '../types';
import { diagnostic, diagnosticFromError, succeed } from './diagnostics';
import {
  bytesToBinaryString,
  decodeStream,
  getContentStreams,
  hexToString,
  replaceStream,
  unescapePDFString,
  type PageContentStream,
} from './pdfStreamUtils';
import type { ContentCorrelator, CorrelationMatch, NodeLookup } from './structureTree/ContentCorrelator';
import type { McidAllocator } from './structureTree/McidAllocator';

export type TextShowOperator = 'Tj' | 'TJ' | "'" | '"';

export interface TextShowOperation {
  operator: TextShowOperator;
  /** offset of the first operand */
  start: number;
  /** offset just past the operator */
  end: number;
  text: string;
  /** already inside BDC/BMC ... EMC */
  marked: boolean;
}

interface Operand {
  start: number;
  strings: string[];
}

const TEXT_SHOW_OPERATORS: ReadonlySet<string> = new Set(['Tj', 'TJ', "'", '"']);
const WHITESPACE = /[\0\t\n\f\r ]/;
const DELIMITERS = /[()<>[\]{}/%]/;

function isTextShowOperator(word: string): word is TextShowOperator {
  return TEXT_SHOW_OPERATORS.has(word);
}

// ─── Scanning ────────────────────────────────────────────────

/**
 * Find every text-show operation in a content stream (binary string).
 */
export function findTextShowOperations(content: string): TextShowOperation[] {
  const operations: TextShowOperation[] = [];
  let operands: Operand[] = [];
  let depth = 0;
  let i = 0;

  while (i < content.length) {
    const ch = content[i];

    if (WHITESPACE.test(ch)) {
      i++;
    } else if (ch === '%') {
      while (i < content.length && content[i] !== '\n' && content[i] !== '\r') i++;
    } else if (ch === '(') {
      const end = scanLiteralString(content, i);
      operands.push({ start: i, strings: [unescapePDFString(content.slice(i + 1, end - 1))] });
      i = end;
    } else if (ch === '<' && content[i + 1] === '<') {
      const end = scanDictionary(content, i);
      operands.push({ start: i, strings: [] });
      i = end;
    } else if (ch === '<') {
      const close = content.indexOf('>', i);
      const end = close < 0 ? content.length : close + 1;
      operands.push({ start: i, strings: [hexToString(content.slice(i + 1, end - 1))] });
      i = end;
    } else if (ch === '[') {
      const { end, strings } = scanArray(content, i);
      operands.push({ start: i, strings });
      i = end;
    } else if (ch === '/') {
      let end = i + 1;
      while (end < content.length && !WHITESPACE.test(content[end]) && !DELIMITERS.test(content[end])) end++;
      operands.push({ start: i, strings: [] });
      i = end;
    } else {
      let end = i + 1;
      while (end < content.length && !WHITESPACE.test(content[end]) && !DELIMITERS.test(content[end])) end++;
      const word = content.slice(i, end);

      if (/^[+\-.\d]/.test(word)) {
        operands.push({ start: i, strings: [] });
        i = end;
        continue;
      }

      if (isTextShowOperator(word)) {
        operations.push({
          operator: word,
          start: operands.length > 0 ? operands[0].start : i,
          end,
          text: operands.flatMap(o => o.strings).join(''),
          marked: depth > 0,
        });
      } else if (word === 'BDC' || word === 'BMC') {
        depth++;
      } else if (word === 'EMC') {
        depth = Math.max(0, depth - 1);
      } else if (word === 'ID') {
        end = skipInlineImageData(content, end);
      }

      operands = [];
      i = end;
    }
  }

  return operations;
}

/** Offset just past the closing parenthesis of the literal string at `start`. */
function scanLiteralString(content: string, start: number): number {
  let nesting = 0;
  for (let i = start; i < content.length; i++) {
    const ch = content[i];
    if (ch === '\\') {
      i++;
    } else if (ch === '(') {
      nesting++;
    } else if (ch === ')') {
      nesting--;
      if (nesting === 0) return i + 1;
    }
  }
  return content.length;
}

function scanDictionary(content: string, start: number): number {
  let nesting = 0;
  let i = start;
  while (i < content.length) {
    if (content.startsWith('<<', i)) {
      nesting++;
      i += 2;
    } else if (content.startsWith('>>', i)) {
      nesting--;
      i += 2;
      if (nesting === 0) return i;
    } else if (content[i] === '(') {
      i = scanLiteralString(content, i);
    } else {
      i++;
    }
  }
  return content.length;
}

function scanArray(content: string, start: number): { end: number; strings: string[] } {
  const strings: string[] = [];
  let i = start + 1;
  while (i < content.length) {
    const ch = content[i];
    if (ch === ']') return { end: i + 1, strings };
    if (ch === '(') {
      const end = scanLiteralString(content, i);
      strings.push(unescapePDFString(content.slice(i + 1, end - 1)));
      i = end;
    } else if (ch === '<') {
      const close = content.indexOf('>', i);
      const end = close < 0 ? content.length : close + 1;
      strings.push(hexToString(content.slice(i + 1, end - 1)));
      i = end;
    } else {
      i++;
    }
  }
  return { end: content.length, strings };
}

/** Inline image data runs from after ID to the EI operator. */
function skipInlineImageData(content: string, from: number): number {
  const match = /[\0\t\n\f\r ]EI(?=[\0\t\n\f\r ]|$)/g;
  match.lastIndex = from;
  const found = match.exec(content);
  return found ? found.index + found[0].length : content.length;
}

/** MCIDs already present in a content stream. */
export function existingMcids(content: string): number[] {
  const ids: number[] = [];
  const pattern = /\/MCID\s+(\d+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(content)) !== null) {
    ids.push(parseInt(match[1], 10));
  }
  return ids;
}

// ─── Page marking ────────────────────────────────────────────

export interface PageMarkingContext {
  correlator: ContentCorrelator;
  allocator: McidAllocator;
  positions: readonly TextPosition[];
  nodes: NodeLookup;
}

interface DecodedStream {
  source: PageContentStream;
  content: string;
  operations: TextShowOperation[];
}

interface UnitLocation {
  streamIndex: number;
  operation: TextShowOperation;
}

/**
 * Mark the correlated text of one page. Returns the matches that were
 * written; any failure leaves the page untouched and yields no matches.
 */
export function markPageContent(
  pdfDoc: PDFDocument,
  pageIndex: number,
  ctx: PageMarkingContext,
): OperationResult<CorrelationMatch[]> {
  const page = pdfDoc.getPages()[pageIndex];
  const sources = page ? getContentStreams(pdfDoc, page) : [];
  if (sources.length === 0) {
    return succeed([], [diagnostic('warning', 'content-stream-unreadable',
      `Page ${pageIndex} has no content stream to mark`, { page: pageIndex })]);
  }

  const decoded: DecodedStream[] = [];
  for (const source of sources) {
    const bytes = decodeStream(source.stream);
    if (!bytes) {
      return succeed([], [diagnostic('warning', 'content-stream-unreadable',
        `Content stream ${source.ref.toString()} on page ${pageIndex} could not be decoded`, { page: pageIndex })]);
    }
    const content = bytesToBinaryString(bytes);
    decoded.push({ source, content, operations: findTextShowOperations(content) });
  }

  const reserved = decoded.flatMap(d => existingMcids(d.content));
  if (reserved.length > 0) ctx.allocator.reserveAbove(Math.max(...reserved));

  const locations: UnitLocation[] = [];
  decoded.forEach((d, streamIndex) => {
    for (const operation of d.operations) {
      if (!operation.marked) locations.push({ streamIndex, operation });
    }
  });

  const correlation = ctx.correlator.correlateUnits(
    pageIndex,
    locations.map(l => ({ text: l.operation.text })),
    ctx.positions,
    ctx.nodes,
  );
  if (!correlation.success) return correlation;
  const matches = correlation.value;
  const diagnostics: Diagnostic[] = [...correlation.diagnostics];

  try {
    const byStream = new Map<number, Array<{ operation: TextShowOperation; match: CorrelationMatch }>>();
    for (const match of matches) {
      const { streamIndex, operation } = locations[match.unitIndex];
      const list = byStream.get(streamIndex) ?? [];
      list.push({ operation, match });
      byStream.set(streamIndex, list);
    }

    for (const [streamIndex, wraps] of byStream) {
      const { source, content } = decoded[streamIndex];
      replaceStream(pdfDoc, source.ref, wrapOperations(content, wraps));
    }
  } catch (e) {
    console.warn(`[markedContentInjector] Failed to rewrite content on page ${pageIndex}:`, e);
    rollback(matches);
    return succeed([], [...diagnostics, diagnosticFromError(e, 'content-stream-unreadable', 'warning', pageIndex)]);
  }

  return succeed(matches, diagnostics);
}

function wrapOperations(
  content: string,
  wraps: Array<{ operation: TextShowOperation; match: CorrelationMatch }>,
): string {
  const ordered = [...wraps].sort((a, b) => a.operation.start - b.operation.start);
  let result = '';
  let cursor = 0;
  for (const { operation, match } of ordered) {
    const tag = PDFName.of(match.node.type).toString();
    result += content.slice(cursor, operation.start);
    result += `${tag} <</MCID ${match.reference.mcid}>> BDC\n`;
    result += content.slice(operation.start, operation.end);
    result += '\nEMC';
    cursor = operation.end;
  }
  return result + content.slice(cursor);
}

function rollback(matches: readonly CorrelationMatch[]): void {
  for (const { node, reference } of matches) {
    const index = node.children.indexOf(reference);
    if (index >= 0) node.children.splice(index, 1);
  }
}
