/**
 * Structure Tree Inspector
 *
 * Reads what a document already says about its logical structure: whether a
 * /StructTreeRoot exists, what its role map contains, and how many elements
 * and marked-content references hang below it.
 */

import {
  PDFArray,
  PDFBool,
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFObject,
  PDFRef,
  PDFString,
} from 'pdf-lib';
import type { ExistingStructureRoot } from '../types';
import { describeObject } from './pdfStructureWriter';
import { getHeadingLevel, isFigureRole, isListRole, isTableRole } from './roleMap';

export interface StructureTreeStatus {
  hasStructTree: boolean;
  hasRoleMap: boolean;
  roleMappingCount: number;
  childCount: number;
  rootType: string | null;
  elementCount: number;
  markedContentCount: number;
  /** element count per structure type */
  types: Record<string, number>;
  marked: boolean;
  language: string | null;
  title: string | null;
}

const MAX_DEPTH = 64;
const LABEL_WIDTH = 18;

export function nameText(name: PDFName): string {
  return name.toString().replace(/^\//, '');
}

function childCountOf(kids: PDFObject | undefined): number {
  if (kids === undefined) return 0;
  return kids instanceof PDFArray ? kids.size() : 1;
}

function readRoleMap(rootDict: PDFDict): Map<string, string> {
  const roleMap = new Map<string, string>();
  const dict = rootDict.lookup(PDFName.of('RoleMap'));
  if (!(dict instanceof PDFDict)) return roleMap;
  for (const [key, value] of dict.entries()) {
    if (value instanceof PDFName) roleMap.set(nameText(key), nameText(value));
  }
  return roleMap;
}

/**
 * Classify the catalog's /StructTreeRoot. Undefined means the document has
 * none and a fresh root can be created.
 */
export function inspectStructureRoot(pdfDoc: PDFDocument): ExistingStructureRoot | undefined {
  const entry = pdfDoc.catalog.get(PDFName.of('StructTreeRoot'));
  if (entry === undefined) return undefined;

  const root = pdfDoc.context.lookup(entry);
  if (!(root instanceof PDFDict)) {
    return { kind: 'unrecognized', description: describeObject(root) };
  }
  return {
    kind: 'dictionary',
    roleMap: readRoleMap(root),
    childCount: childCountOf(root.lookup(PDFName.of('K'))),
  };
}

/**
 * Walk the written tree and summarize it, the way a checker would see it.
 */
export function verifyStructureTree(pdfDoc: PDFDocument): StructureTreeStatus {
  const catalog = pdfDoc.catalog;
  const markInfo = catalog.lookup(PDFName.of('MarkInfo'));
  const markedFlag = markInfo instanceof PDFDict ? markInfo.lookup(PDFName.of('Marked')) : undefined;
  const marked = markedFlag instanceof PDFBool && markedFlag.asBoolean();
  const lang = catalog.lookup(PDFName.of('Lang'));

  const status: StructureTreeStatus = {
    hasStructTree: false,
    hasRoleMap: false,
    roleMappingCount: 0,
    childCount: 0,
    rootType: null,
    elementCount: 0,
    markedContentCount: 0,
    types: {},
    marked,
    language: lang === undefined ? null : decodeTextObject(lang),
    title: pdfDoc.getTitle() ?? null,
  };

  const entry = catalog.get(PDFName.of('StructTreeRoot'));
  if (entry === undefined) return status;
  const root = pdfDoc.context.lookup(entry);
  if (!(root instanceof PDFDict)) return status;

  status.hasStructTree = true;
  const roleMap = readRoleMap(root);
  status.hasRoleMap = root.has(PDFName.of('RoleMap'));
  status.roleMappingCount = roleMap.size;

  const kids = root.lookup(PDFName.of('K'));
  status.childCount = childCountOf(kids);

  const visited = new Set<string>();
  const visit = (obj: PDFObject | undefined, depth: number) => {
    if (obj === undefined || depth > MAX_DEPTH) return;
    if (obj instanceof PDFRef) {
      if (visited.has(obj.toString())) return;
      visited.add(obj.toString());
      visit(pdfDoc.context.lookup(obj), depth);
      return;
    }
    if (obj instanceof PDFArray) {
      for (let i = 0; i < obj.size(); i++) visit(obj.get(i), depth + 1);
      return;
    }
    if (obj instanceof PDFNumber) {
      status.markedContentCount++;
      return;
    }
    if (!(obj instanceof PDFDict)) return;

    const type = obj.lookup(PDFName.of('Type'));
    if (type instanceof PDFName && nameText(type) === 'MCR') {
      status.markedContentCount++;
      return;
    }
    const s = obj.lookup(PDFName.of('S'));
    if (!(s instanceof PDFName)) return;

    const role = nameText(s);
    status.elementCount++;
    status.types[role] = (status.types[role] ?? 0) + 1;
    if (status.rootType === null && depth <= 1) status.rootType = role;
    visit(obj.get(PDFName.of('K')), depth + 1);
  };
  visit(root.get(PDFName.of('K')), 0);

  return status;
}

function decodeTextObject(obj: PDFObject): string | null {
  if (obj instanceof PDFString || obj instanceof PDFHexString) return obj.decodeText();
  if (obj instanceof PDFName) return nameText(obj);
  return null;
}

/**
 * Human-readable report of a structure tree status.
 */
export function formatStatusReport(status: StructureTreeStatus): string[] {
  const row = (label: string, value: string | number) => `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
  const lines = [
    row('Structure tree', status.hasStructTree ? 'present' : 'missing'),
    row('Role map', status.hasRoleMap ? `${status.roleMappingCount} mappings` : 'missing'),
    row('Root children', status.childCount),
    row('Root type', status.rootType ?? '-'),
    row('Elements', status.elementCount),
    row('Marked content', status.markedContentCount),
    row('MarkInfo marked', status.marked ? 'yes' : 'no'),
    row('Language', status.language ?? '-'),
    row('Title', status.title ?? '-'),
  ];

  const headings = Object.keys(status.types).filter(t => getHeadingLevel(t) !== undefined || t === 'H');
  if (headings.length > 0) {
    lines.push(row('Headings', headings.map(t => `${t}×${status.types[t]}`).join(', ')));
  }

  const groups: Array<[string, (role: string) => boolean]> = [
    ['Tables', isTableRole],
    ['Lists', isListRole],
    ['Figures', isFigureRole],
  ];
  for (const [label, predicate] of groups) {
    const count = Object.entries(status.types)
      .filter(([role]) => predicate(role))
      .reduce((sum, [, n]) => sum + n, 0);
    if (count > 0) lines.push(row(label, `${count} elements`));
  }
  return lines;
}
