/**
 * Element Reconciler
 *
 * Merges the elements extracted from one page with the sidecar overrides for
 * that page. Overrides patch field by field: role, bbox and text replace the
 * extracted value only when present, and each property key replaces
 * individually. Overrides without an extracted counterpart become standalone
 * elements appended after the extracted ones.
 */

import type { BBox, Diagnostic, Element, OperationResult, SidecarOverride } from '../types';
import { diagnostic, succeed } from './diagnostics';
import { inferKindFromId } from './elementIds';

export const SYNTHESIZED_BBOX: BBox = [0, 0, 100, 20];
export const SYNTHESIZED_ROLE = 'P';

/**
 * Reconcile extracted elements with sidecar overrides for a page.
 * Inputs are left untouched; the result is a fresh list.
 */
export function reconcile(
  page: number,
  extracted: readonly Element[],
  overrides: ReadonlyMap<string, SidecarOverride>,
): OperationResult<Element[]> {
  const diagnostics: Diagnostic[] = [];
  const merged: Element[] = [];
  const seen = new Set<string>();

  for (const element of extracted) {
    if (seen.has(element.id)) {
      diagnostics.push(diagnostic('warning', 'duplicate-element',
        `Duplicate extracted element ${element.id} dropped`, { page, elementId: element.id }));
      continue;
    }
    seen.add(element.id);

    const override = overrides.get(element.id);
    merged.push(override ? applyOverride(element, override) : cloneElement(element));
  }

  for (const [id, override] of overrides) {
    if (seen.has(id)) continue;
    seen.add(id);
    merged.push(synthesizeElement(id, override));
  }

  return succeed(merged, diagnostics);
}

function applyOverride(element: Element, override: SidecarOverride): Element {
  const result = cloneElement(element);
  if (override.role !== undefined) result.role = override.role;
  if (override.bbox !== undefined) result.bbox = [...override.bbox];
  if (override.text !== undefined) result.text = override.text;
  if (override.properties) {
    for (const [key, value] of Object.entries(override.properties)) {
      result.properties[key] = value;
    }
  }
  return result;
}

function synthesizeElement(id: string, override: SidecarOverride): Element {
  return {
    id,
    kind: inferKindFromId(id),
    bbox: override.bbox ? [...override.bbox] : [...SYNTHESIZED_BBOX],
    role: override.role ?? SYNTHESIZED_ROLE,
    text: override.text ?? '',
    properties: { ...override.properties },
  };
}

function cloneElement(element: Element): Element {
  const copy: Element = {
    id: element.id,
    kind: element.kind,
    bbox: [...element.bbox],
    role: element.role,
    properties: { ...element.properties },
  };
  if (element.text !== undefined) copy.text = element.text;
  return copy;
}
