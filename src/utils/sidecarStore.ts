/**
 * Sidecar Store
 *
 * The sidecar is the JSON file that records user edits (roles, boxes,
 * properties) next to a PDF. Extraction is recomputed on every run and the
 * sidecar is layered on top, so the file only holds overrides.
 *
 * Older sidecars come in several shapes (pages as an object or an array,
 * elements as a list or an id-keyed object, role stored under properties,
 * alt text at the top level of an element). parseSidecar() normalizes all of
 * them into SidecarDocument once; nothing downstream looks at raw JSON.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type {
  BBox,
  Diagnostic,
  ElementProperties,
  OperationResult,
  PropertyValue,
  SidecarDocument,
  SidecarDocumentInfo,
  SidecarOverride,
} from '../types';
import { diagnostic, diagnosticFromError, fail, succeed } from './diagnostics';

// ─── Schemas ─────────────────────────────────────────────────

const bboxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

const rawElementSchema = z.object({
  id: z.string().min(1).optional(),
  role: z.string().min(1).optional(),
  bbox: bboxSchema.optional(),
  text: z.string().optional(),
  title: z.string().optional(),
  alt_text: z.string().optional(),
  actual_text: z.string().optional(),
  language: z.string().optional(),
  properties: z.record(z.unknown()).optional(),
});

type RawElement = z.infer<typeof rawElementSchema>;

const rawPageSchema = z.object({
  elements: z.union([z.array(z.unknown()), z.record(z.unknown())]).optional(),
});

const rawSidecarSchema = z.object({
  document: z.object({
    title: z.string().optional(),
    language: z.string().optional(),
    tagged: z.boolean().optional(),
  }).optional(),
  pages: z.union([z.record(z.unknown()), z.array(z.unknown())]).optional(),
});

/** Element fields that older sidecars keep beside `properties`. */
const FOLDED_PROPERTY_KEYS = ['title', 'alt_text', 'actual_text', 'language'] as const;

export const DEFAULT_DOCUMENT_INFO: SidecarDocumentInfo = {
  title: '',
  language: 'en-US',
  tagged: false,
};

// ─── Construction ────────────────────────────────────────────

export function createSidecar(
  pageCount: number,
  info: Partial<SidecarDocumentInfo> = {},
): SidecarDocument {
  const pages = new Map<number, Map<string, SidecarOverride>>();
  for (let page = 0; page < pageCount; page++) {
    pages.set(page, new Map());
  }
  return { document: { ...DEFAULT_DOCUMENT_INFO, ...info }, pages };
}

export function sidecarPathFor(pdfPath: string): string {
  return /\.pdf$/i.test(pdfPath)
    ? pdfPath.replace(/\.pdf$/i, '_sidecar.json')
    : `${pdfPath}_sidecar.json`;
}

// ─── Parsing ─────────────────────────────────────────────────

/**
 * Normalize raw sidecar JSON. Malformed entries are skipped with a warning;
 * only a document that is not an object at all fails.
 */
export function parseSidecar(raw: unknown): OperationResult<SidecarDocument> {
  const parsed = rawSidecarSchema.safeParse(raw);
  if (!parsed.success) {
    return fail([diagnostic('fatal', 'invalid-sidecar-entry',
      `Sidecar is not a valid document: ${parsed.error.issues[0]?.message ?? 'unknown shape'}`)]);
  }

  const diagnostics: Diagnostic[] = [];
  const sidecar = createSidecar(0, parsed.data.document);
  const rawPages = parsed.data.pages ?? {};
  const pageEntries: Array<[string, unknown]> = Array.isArray(rawPages)
    ? rawPages.map((page, index): [string, unknown] => [String(index), page])
    : Object.entries(rawPages);

  for (const [pageKey, rawPage] of pageEntries) {
    if (!/^\d+$/.test(pageKey)) {
      diagnostics.push(diagnostic('warning', 'invalid-sidecar-entry', `Page key "${pageKey}" is not a page index`));
      continue;
    }
    const page = parseInt(pageKey, 10);
    const pageResult = rawPageSchema.safeParse(rawPage);
    if (!pageResult.success) {
      diagnostics.push(diagnostic('warning', 'invalid-sidecar-entry', `Page ${page} is malformed`, { page }));
      continue;
    }

    const overrides = new Map<string, SidecarOverride>();
    sidecar.pages.set(page, overrides);

    const elements = pageResult.data.elements ?? [];
    const elementEntries: Array<[string | undefined, unknown]> = Array.isArray(elements)
      ? elements.map((element): [string | undefined, unknown] => [undefined, element])
      : Object.entries(elements);

    elementEntries.forEach(([keyedId, rawElement], index) => {
      const override = normalizeElement(rawElement, keyedId, page, index, diagnostics);
      if (!override) return;
      const previous = overrides.get(override.id);
      overrides.set(override.id, previous ? mergeOverrides(previous, override) : override);
    });
  }

  return succeed(sidecar, diagnostics);
}

function normalizeElement(
  rawElement: unknown,
  keyedId: string | undefined,
  page: number,
  index: number,
  diagnostics: Diagnostic[],
): SidecarOverride | null {
  const result = rawElementSchema.safeParse(rawElement);
  if (!result.success) {
    diagnostics.push(diagnostic('warning', 'invalid-sidecar-entry',
      `Element ${keyedId ?? `#${index}`} on page ${page} is malformed: ${result.error.issues[0]?.message ?? ''}`,
      { page, elementId: keyedId }));
    return null;
  }

  const element: RawElement = result.data;
  const id = keyedId ?? element.id;
  if (!id) {
    diagnostics.push(diagnostic('warning', 'invalid-sidecar-entry',
      `Element #${index} on page ${page} has no id`, { page }));
    return null;
  }

  const properties = normalizeProperties(element.properties, id, page, diagnostics);
  for (const key of FOLDED_PROPERTY_KEYS) {
    const value = element[key];
    if (value !== undefined && !(key in properties)) {
      properties[key] = value;
    }
  }

  const override: SidecarOverride = { id };
  const role = element.role ?? (typeof properties.role === 'string' ? properties.role : undefined);
  if (role !== undefined) override.role = role;
  if (element.bbox) override.bbox = [...element.bbox];
  if (element.text !== undefined) override.text = element.text;
  if (element.properties !== undefined || Object.keys(properties).length > 0) {
    override.properties = properties;
  }
  return override;
}

function normalizeProperties(
  raw: Record<string, unknown> | undefined,
  elementId: string,
  page: number,
  diagnostics: Diagnostic[],
): ElementProperties {
  const properties: ElementProperties = {};
  if (!raw) return properties;
  for (const [key, value] of Object.entries(raw)) {
    if (isPropertyValue(value)) {
      properties[key] = value;
    } else {
      diagnostics.push(diagnostic('warning', 'invalid-sidecar-entry',
        `Property "${key}" of ${elementId} is not a scalar and was ignored`, { page, elementId }));
    }
  }
  return properties;
}

function isPropertyValue(value: unknown): value is PropertyValue {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function mergeOverrides(base: SidecarOverride, patch: SidecarOverride): SidecarOverride {
  const merged: SidecarOverride = { ...base, ...patch };
  if (base.properties || patch.properties) {
    merged.properties = { ...base.properties, ...patch.properties };
  }
  return merged;
}

// ─── Serialization ───────────────────────────────────────────

export interface SerializedElement {
  id: string;
  role?: string;
  bbox?: BBox;
  text?: string;
  properties?: ElementProperties;
}

export interface SerializedSidecar {
  document: SidecarDocumentInfo;
  pages: Record<string, { elements: SerializedElement[] }>;
}

export function serializeSidecar(sidecar: SidecarDocument): SerializedSidecar {
  const pages: SerializedSidecar['pages'] = {};
  const pageNumbers = [...sidecar.pages.keys()].sort((a, b) => a - b);
  for (const page of pageNumbers) {
    const overrides = sidecar.pages.get(page) ?? new Map<string, SidecarOverride>();
    pages[String(page)] = {
      elements: [...overrides.values()].map(serializeOverride),
    };
  }
  return { document: { ...sidecar.document }, pages };
}

function serializeOverride(override: SidecarOverride): SerializedElement {
  const element: SerializedElement = { id: override.id };
  if (override.role !== undefined) element.role = override.role;
  if (override.bbox !== undefined) element.bbox = [...override.bbox];
  if (override.text !== undefined) element.text = override.text;
  if (override.properties !== undefined) element.properties = { ...override.properties };
  return element;
}

// ─── Access and edits ────────────────────────────────────────

const EMPTY_OVERRIDES: ReadonlyMap<string, SidecarOverride> = new Map();

export function overridesForPage(
  sidecar: SidecarDocument,
  page: number,
): ReadonlyMap<string, SidecarOverride> {
  return sidecar.pages.get(page) ?? EMPTY_OVERRIDES;
}

/**
 * Record an edit for an element. Properties merge key by key into any
 * existing override; role, bbox and text replace when given.
 */
export function upsertOverride(
  sidecar: SidecarDocument,
  page: number,
  patch: SidecarOverride,
): SidecarOverride {
  let overrides = sidecar.pages.get(page);
  if (!overrides) {
    overrides = new Map();
    sidecar.pages.set(page, overrides);
  }
  const previous = overrides.get(patch.id);
  const next = previous ? mergeOverrides(previous, patch) : { ...patch };
  overrides.set(patch.id, next);
  return next;
}

export function countOverrides(sidecar: SidecarDocument): number {
  let count = 0;
  for (const overrides of sidecar.pages.values()) count += overrides.size;
  return count;
}

// ─── File I/O ────────────────────────────────────────────────

export async function readSidecarFile(path: string): Promise<OperationResult<SidecarDocument>> {
  try {
    const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
    return parseSidecar(raw);
  } catch (e) {
    console.warn(`[sidecarStore] Failed to read sidecar ${path}:`, e);
    return fail([diagnosticFromError(e, 'load-failed', 'fatal')]);
  }
}

export async function writeSidecarFile(
  path: string,
  sidecar: SidecarDocument,
): Promise<OperationResult<string>> {
  try {
    await writeFile(path, JSON.stringify(serializeSidecar(sidecar), null, 2), 'utf-8');
    return succeed(path);
  } catch (e) {
    console.warn(`[sidecarStore] Failed to write sidecar ${path}:`, e);
    return fail([diagnosticFromError(e, 'save-failed')]);
  }
}
