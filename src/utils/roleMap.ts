/**
 * Role Map: standard structure vocabulary for tagged PDF.
 *
 * Every standard tag maps onto itself except H1–H6, which collapse to the
 * generic H. Custom tags are valid only when the map resolves them to a
 * standard tag. Merging into an existing map is additive: entries already
 * present are never overwritten or removed.
 */

import type { StructureChild, StructureNode } from '../types';

export const STANDARD_ROLES = [
  'H1', 'H2', 'H3', 'H4', 'H5', 'H6',
  // Block
  'P', 'H', 'L', 'LI', 'Lbl', 'LBody',
  // Table
  'Table', 'TR', 'TH', 'TD',
  // Inline
  'Span', 'Quote', 'Note', 'Reference', 'BibEntry', 'Code',
  // Illustration
  'Figure', 'Formula', 'Form',
  // Grouping
  'Document', 'Part', 'Div', 'Sect', 'Art', 'BlockQuote', 'Caption',
  'TOC', 'TOCI', 'Index', 'NonStruct', 'Private',
  // Link
  'Link', 'Annot',
] as const;

export type StandardRole = typeof STANDARD_ROLES[number];

const STANDARD_ROLE_SET: ReadonlySet<string> = new Set(STANDARD_ROLES);

// Guards against cycles in author-supplied maps (A → B → A)
const MAX_RESOLVE_DEPTH = 16;

export function isStandardRole(tag: string): tag is StandardRole {
  return STANDARD_ROLE_SET.has(tag);
}

export function createStandardRoleMap(): Map<string, string> {
  const map = new Map<string, string>();
  for (const role of STANDARD_ROLES) {
    map.set(role, getHeadingLevel(role) !== undefined ? 'H' : role);
  }
  return map;
}

/**
 * Add every standard mapping missing from `existing`.
 * Returns the merged map (a copy) and the keys that were added.
 */
export function mergeStandardRoleMap(
  existing: Map<string, string>,
): { merged: Map<string, string>; added: string[] } {
  const merged = new Map(existing);
  const added: string[] = [];
  for (const [key, value] of createStandardRoleMap()) {
    if (!merged.has(key)) {
      merged.set(key, value);
      added.push(key);
    }
  }
  return { merged, added };
}

/**
 * Resolve a tag to the standard role it stands for, following custom
 * mappings. Returns null when the tag cannot be resolved.
 */
export function resolveRole(roleMap: Map<string, string>, tag: string): StandardRole | null {
  let current = tag;
  for (let depth = 0; depth < MAX_RESOLVE_DEPTH; depth++) {
    if (isStandardRole(current)) return current;
    const next = roleMap.get(current);
    if (next === undefined || next === current) return null;
    current = next;
  }
  return null;
}

/**
 * Heading level for H1–H6, undefined for everything else.
 */
export function getHeadingLevel(role: string): number | undefined {
  const match = /^H([1-6])$/.exec(role);
  return match ? parseInt(match[1], 10) : undefined;
}

export function isTableRole(role: string): boolean {
  return role === 'Table' || role === 'TR' || role === 'TH' || role === 'TD';
}

export function isListRole(role: string): boolean {
  return role === 'L' || role === 'LI' || role === 'Lbl' || role === 'LBody';
}

export function isFigureRole(role: string): boolean {
  return role === 'Figure' || role === 'Formula';
}

export function isStructureNode(child: StructureChild): child is StructureNode {
  return 'nodeId' in child;
}

/**
 * Walk a structure subtree depth-first and collect nodes matching a predicate.
 */
export function walkTree(
  node: StructureNode,
  predicate: (n: StructureNode) => boolean,
  results: StructureNode[] = [],
): StructureNode[] {
  if (predicate(node)) results.push(node);
  for (const child of node.children) {
    if (isStructureNode(child)) walkTree(child, predicate, results);
  }
  return results;
}
