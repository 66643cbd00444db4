import { describe, test, expect } from 'vitest';
import { inferKindFromId, parseElementId, textElementId, imageElementId } from '../elementIds';
import {
  createStandardRoleMap,
  getHeadingLevel,
  isStandardRole,
  mergeStandardRoleMap,
  resolveRole,
} from '../roleMap';

describe('roleMap', () => {
  test('headings collapse to H, everything else maps to itself', () => {
    const map = createStandardRoleMap();
    expect(map.get('H6')).toBe('H');
    expect(map.get('LBody')).toBe('LBody');
    expect(map.get('TR')).toBe('TR');
  });

  test('merge is additive and never overwrites', () => {
    const existing = new Map([['P', 'Span'], ['Custom', 'P']]);
    const { merged, added } = mergeStandardRoleMap(existing);
    expect(merged.get('P')).toBe('Span');
    expect(merged.get('Custom')).toBe('P');
    expect(added).not.toContain('P');
    expect(added).toContain('Figure');
    expect(merged.size).toBe(existing.size + added.length);
    expect(existing.size).toBe(2);
  });

  test('resolveRole follows custom mappings and stops on cycles', () => {
    const map = new Map([['Heading', 'Title'], ['Title', 'H1'], ['A', 'B'], ['B', 'A']]);
    expect(resolveRole(map, 'Heading')).toBe('H1');
    expect(resolveRole(map, 'A')).toBeNull();
    expect(resolveRole(map, 'Missing')).toBeNull();
  });

  test('heading levels', () => {
    expect(getHeadingLevel('H4')).toBe(4);
    expect(getHeadingLevel('H')).toBeUndefined();
    expect(isStandardRole('Sect')).toBe(true);
    expect(isStandardRole('Row')).toBe(false);
  });
});

describe('elementIds', () => {
  test('build and parse', () => {
    expect(textElementId(2, 7)).toBe('text_2_7');
    expect(parseElementId(imageElementId(1, 0, 3))).toEqual({ kind: 'image', page: 1, ordinals: [0, 3] });
    expect(parseElementId('note_1')).toBeNull();
  });

  test('unknown prefixes are text', () => {
    expect(inferKindFromId('image_0_0_0')).toBe('image');
    expect(inferKindFromId('figure_0')).toBe('text');
  });
});
