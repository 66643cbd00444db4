/**
 * Composite Expanders
 *
 * Expand a declarative table or list description into a subtree:
 *
 *   Table → TR × rows → (TH | TD) × cols
 *   L → LI × items → Lbl + LBody
 *
 * A child that fails to create is skipped and reported; the container node
 * is still returned.
 */

import type { Diagnostic, ListSpec, OperationResult, StructureNode, TableSpec } from '../../types';
import { fail, succeed } from '../diagnostics';
import type { StructureTreeBuilder } from './StructureTreeBuilder';

const UNORDERED_LABEL = '•';

export function createTable(builder: StructureTreeBuilder, spec: TableSpec): OperationResult<StructureNode> {
  const table = builder.createNode('Table', { title: spec.title ?? 'Table' });
  if (!table.success) return fail(table.diagnostics);

  const diagnostics: Diagnostic[] = [];
  const headers = spec.headers ?? [];
  const hasHeaderRow = spec.has_header_row ?? false;

  for (let r = 0; r < spec.rows; r++) {
    const isHeader = hasHeaderRow && r === 0;
    const row = builder.createNode('TR',
      { title: `Row ${r + 1}${isHeader ? ' (Header)' : ''}` },
      { parent: table.value });
    if (!row.success) {
      diagnostics.push(...asWarnings(row.diagnostics));
      continue;
    }

    for (let c = 0; c < spec.cols; c++) {
      const title = isHeader && c < headers.length ? headers[c] : `Cell ${r + 1},${c + 1}`;
      const cell = builder.createNode(isHeader ? 'TH' : 'TD', { title }, { parent: row.value });
      if (!cell.success) diagnostics.push(...asWarnings(cell.diagnostics));
    }
  }

  return succeed(table.value, diagnostics);
}

export function createList(builder: StructureTreeBuilder, spec: ListSpec): OperationResult<StructureNode> {
  const list = builder.createNode('L', { title: spec.title ?? 'List' });
  if (!list.success) return fail(list.diagnostics);

  const diagnostics: Diagnostic[] = [];
  const ordered = (spec.list_type ?? 'unordered') === 'ordered';

  spec.items.forEach((text, i) => {
    const item = builder.createNode('LI', { title: `Item ${i + 1}` }, { parent: list.value });
    if (!item.success) {
      diagnostics.push(...asWarnings(item.diagnostics));
      return;
    }

    const label = builder.createNode('Lbl',
      { title: ordered ? `${i + 1}.` : UNORDERED_LABEL },
      { parent: item.value });
    if (!label.success) diagnostics.push(...asWarnings(label.diagnostics));

    const body = builder.createNode('LBody', { title: text, actualText: text }, { parent: item.value });
    if (!body.success) diagnostics.push(...asWarnings(body.diagnostics));
  });

  return succeed(list.value, diagnostics);
}

function asWarnings(diagnostics: Diagnostic[]): Diagnostic[] {
  return diagnostics.map((d): Diagnostic => ({ ...d, severity: 'warning' }));
}
