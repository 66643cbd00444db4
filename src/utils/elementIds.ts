/**
 * Element id scheme.
 *
 *   text_<page>_<blockOrdinal>
 *   image_<page>_<imgOrdinal>_<rectOrdinal>
 *
 * Ordinals follow extraction order, so ids stay stable only as long as the
 * extractor walks a page the same way on every run.
 */

import type { ElementKind } from '../types';

export function textElementId(page: number, blockOrdinal: number): string {
  return `text_${page}_${blockOrdinal}`;
}

export function imageElementId(page: number, imageOrdinal: number, rectOrdinal: number): string {
  return `image_${page}_${imageOrdinal}_${rectOrdinal}`;
}

export interface ParsedElementId {
  kind: ElementKind;
  page: number;
  ordinals: number[];
}

export function parseElementId(id: string): ParsedElementId | null {
  const text = /^text_(\d+)_(\d+)$/.exec(id);
  if (text) {
    return { kind: 'text', page: parseInt(text[1], 10), ordinals: [parseInt(text[2], 10)] };
  }
  const image = /^image_(\d+)_(\d+)_(\d+)$/.exec(id);
  if (image) {
    return {
      kind: 'image',
      page: parseInt(image[1], 10),
      ordinals: [parseInt(image[2], 10), parseInt(image[3], 10)],
    };
  }
  return null;
}

/** Ids with an unknown prefix are treated as text. */
export function inferKindFromId(id: string): ElementKind {
  return id.startsWith('image_') ? 'image' : 'text';
}
