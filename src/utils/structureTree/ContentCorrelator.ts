/**
 * Content Correlator
 *
 * Links structure nodes to marked content on a page. Two strategies:
 *
 *   direct: the unit carries an element id that has a node
 *   fuzzy:  the unit only has text; find the extracted text position it
 *           belongs to and use that position's element id
 *
 * Every match takes the next MCID from the session allocator and appends an
 * MCR to the node. Fuzzy matching is best effort: repeated text on a page
 * can land on the wrong block.
 */

import type { ContentReference, Diagnostic, OperationResult, StructureNode, TextPosition } from '../../types';
import { diagnostic, diagnosticFromError, succeed } from '../diagnostics';
import type { McidAllocator } from './McidAllocator';

export interface CorrelationUnit {
  elementId?: string;
  text: string;
}

export interface CorrelationMatch {
  unitIndex: number;
  elementId: string;
  node: StructureNode;
  reference: ContentReference;
}

export type NodeLookup = ReadonlyMap<string, StructureNode>;

const PREFIX_LENGTH = 10;
const PREFIX_MIN_LENGTH = 3;

/** Text as it appears in a content-stream string operand, minus escapes and delimiters. */
export function normalizeCandidateText(text: string): string {
  return text.trim().replace(/[\\()]/g, '');
}

/**
 * First position whose text contains or is contained in `text`; failing
 * that, the first position containing its 10-character prefix.
 */
export function findMatchingPosition(
  text: string,
  positions: readonly TextPosition[],
): TextPosition | undefined {
  const cleaned = normalizeCandidateText(text);
  if (!cleaned) return undefined;

  const candidates = positions.filter(p => p.text.length > 0);
  const contained = candidates.find(p => p.text.includes(cleaned) || cleaned.includes(p.text));
  if (contained) return contained;

  if (cleaned.length > PREFIX_MIN_LENGTH) {
    const prefix = cleaned.slice(0, PREFIX_LENGTH);
    return candidates.find(p => p.text.includes(prefix));
  }
  return undefined;
}

export class ContentCorrelator {
  constructor(private readonly allocator: McidAllocator) {}

  /** Treat every extracted position as a unit of its own. */
  correlate(
    page: number,
    positions: readonly TextPosition[],
    nodes: NodeLookup,
  ): OperationResult<ContentReference[]> {
    const result = this.correlateUnits(page, positions, positions, nodes);
    if (!result.success) return result;
    return succeed(result.value.map(m => m.reference), result.diagnostics);
  }

  correlateUnits(
    page: number,
    units: readonly CorrelationUnit[],
    positions: readonly TextPosition[],
    nodes: NodeLookup,
  ): OperationResult<CorrelationMatch[]> {
    const diagnostics: Diagnostic[] = [];
    const matches: CorrelationMatch[] = [];
    let misses = 0;

    try {
      units.forEach((unit, unitIndex) => {
        const elementId = this.resolveElementId(unit, positions, nodes);
        const node = elementId === undefined ? undefined : nodes.get(elementId);
        if (elementId === undefined || !node) {
          misses++;
          return;
        }

        const reference: ContentReference = { kind: 'mcr', page, mcid: this.allocator.next() };
        node.children.push(reference);
        matches.push({ unitIndex, elementId, node, reference });
      });
    } catch (e) {
      console.warn(`[contentCorrelator] Correlation failed on page ${page}:`, e);
      return succeed([], [diagnosticFromError(e, 'correlation-miss', 'warning', page)]);
    }

    if (misses > 0) {
      diagnostics.push(diagnostic('info', 'correlation-miss',
        `${misses} of ${units.length} content units on page ${page} matched no element`, { page }));
    }
    return succeed(matches, diagnostics);
  }

  private resolveElementId(
    unit: CorrelationUnit,
    positions: readonly TextPosition[],
    nodes: NodeLookup,
  ): string | undefined {
    if (unit.elementId !== undefined && nodes.has(unit.elementId)) {
      return unit.elementId;
    }
    return findMatchingPosition(unit.text, positions)?.elementId;
  }
}
