/**
 * Unit Tests: StructureTreeBuilder
 *
 * Protocol guard, node creation, re-parenting and batch creation.
 */
import { describe, test, expect } from 'vitest';
import { StructureTreeBuilder } from '../StructureTreeBuilder';

function readyBuilder(): StructureTreeBuilder {
  const builder = new StructureTreeBuilder();
  builder.initRoot();
  return builder;
}

describe('StructureTreeBuilder root', () => {
  test('createNode before initRoot fails and registers nothing', () => {
    const builder = new StructureTreeBuilder();
    const result = builder.createNode('P');
    expect(result.success).toBe(false);
    expect(result.value).toBeNull();
    expect(result.diagnostics[0].code).toBe('root-not-ready');
    expect(builder.nodeCount).toBe(0);
    expect(builder.currentState).toBe('uninitialized');
  });

  test('fresh root carries the full standard role map', () => {
    const builder = new StructureTreeBuilder();
    const result = builder.initRoot();
    expect(result.success).toBe(true);
    const root = builder.getRoot();
    expect(root?.roleMap.size).toBe(39);
    expect(root?.roleMap.get('H3')).toBe('H');
    expect(root?.roleMap.get('Table')).toBe('Table');
    expect(root?.children).toEqual([]);
    expect(builder.isReady).toBe(true);
  });

  test('existing dictionary root keeps its mappings', () => {
    const builder = new StructureTreeBuilder();
    const roleMap = new Map([['H1', 'P'], ['Heading', 'H']]);
    builder.initRoot({ kind: 'dictionary', roleMap, childCount: 4 });

    const root = builder.getRoot();
    expect(root?.roleMap.get('H1')).toBe('P');
    expect(root?.roleMap.get('Heading')).toBe('H');
    expect(root?.addedRoleMappings).not.toContain('H1');
    expect(root?.addedRoleMappings).toContain('H2');
    expect(root?.existingChildCount).toBe(4);
    expect(roleMap.size).toBe(2);
  });

  test('unrecognized root aborts and leaves the builder uninitialized', () => {
    const builder = new StructureTreeBuilder();
    const result = builder.initRoot({ kind: 'unrecognized', description: 'array' });
    expect(result.success).toBe(false);
    expect(result.diagnostics[0]).toMatchObject({ severity: 'fatal', code: 'root-unrecognized' });
    expect(builder.getRoot()).toBeNull();
    expect(builder.createNode('P').success).toBe(false);
  });
});

describe('StructureTreeBuilder nodes', () => {
  test('node ids start at 1 and increase', () => {
    const builder = readyBuilder();
    const a = builder.createNode('P');
    const b = builder.createNode('H1', { title: 'Intro' });
    expect(a.value?.nodeId).toBe(1);
    expect(b.value?.nodeId).toBe(2);
    expect(b.value?.attributes).toEqual({ title: 'Intro' });
    expect(builder.getRoot()?.children.map(n => n.nodeId)).toEqual([1, 2]);
  });

  test('unknown role is rejected', () => {
    const builder = readyBuilder();
    const result = builder.createNode('Banner');
    expect(result.success).toBe(false);
    expect(result.diagnostics[0].code).toBe('unknown-role');
    expect(builder.nodeCount).toBe(0);
  });

  test('custom role resolves through an existing role map', () => {
    const builder = new StructureTreeBuilder();
    builder.initRoot({ kind: 'dictionary', roleMap: new Map([['Heading', 'H']]), childCount: 0 });
    expect(builder.createNode('Heading').success).toBe(true);
  });

  test('createNode with parent appends to the parent only', () => {
    const builder = readyBuilder();
    const sect = builder.createNode('Sect');
    if (!sect.success) throw new Error('setup failed');
    const para = builder.createNode('P', {}, { parent: sect.value });
    expect(sect.value.children).toEqual([para.value]);
    expect(builder.getRoot()?.children).toEqual([sect.value]);
  });

  test('attach moves a node from the root to its new parent', () => {
    const builder = readyBuilder();
    const sect = builder.createNode('Sect');
    const para = builder.createNode('P');
    if (!sect.success || !para.success) throw new Error('setup failed');

    const result = builder.attach(sect.value, para.value);
    expect(result.success).toBe(true);
    expect(builder.getRoot()?.children).toEqual([sect.value]);
    expect(sect.value.children).toEqual([para.value]);
  });

  test('attach rejects self and cycles', () => {
    const builder = readyBuilder();
    const outer = builder.createNode('Div');
    if (!outer.success) throw new Error('setup failed');
    const inner = builder.createNode('Div', {}, { parent: outer.value });
    if (!inner.success) throw new Error('setup failed');

    expect(builder.attach(outer.value, outer.value).diagnostics[0].code).toBe('invalid-attach');
    expect(builder.attach(inner.value, outer.value).diagnostics[0].code).toBe('invalid-attach');
    expect(outer.value.children).toEqual([inner.value]);
  });

  test('attach rejects nodes from another builder', () => {
    const builder = readyBuilder();
    const other = readyBuilder();
    const mine = builder.createNode('Div');
    const foreign = other.createNode('P');
    if (!mine.success || !foreign.success) throw new Error('setup failed');
    expect(builder.attach(mine.value, foreign.value).diagnostics[0].code).toBe('unknown-node');
  });
});

describe('StructureTreeBuilder batch', () => {
  test('defaults type and title, keeps failures as null', () => {
    const builder = readyBuilder();
    const result = builder.createBatch([
      {},
      { type: 'Nope', title: 'Bad' },
      { type: 'Figure', alt_text: 'Chart' },
    ]);
    expect(result.success).toBe(true);
    const [first, second, third] = result.value ?? [];
    expect(first?.type).toBe('P');
    expect(first?.attributes.title).toBe('Element 1');
    expect(second).toBeNull();
    expect(third?.attributes).toEqual({ title: 'Element 3', altText: 'Chart' });
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({ severity: 'warning', code: 'unknown-role' });
  });

  test('parent_id re-parents under an earlier node', () => {
    const builder = readyBuilder();
    const result = builder.createBatch([
      { type: 'Sect', title: 'Chapter' },
      { type: 'P', parent_id: 1 },
      { type: 'P', parent_id: 99 },
    ]);
    const [sect, child, orphan] = result.value ?? [];
    expect(sect?.children).toEqual([child]);
    expect(builder.getRoot()?.children).toEqual([sect, orphan]);
    expect(result.diagnostics[0]).toMatchObject({ code: 'unknown-parent', nodeId: 3 });
  });

  test('batch before initRoot fails', () => {
    const builder = new StructureTreeBuilder();
    const result = builder.createBatch([{}]);
    expect(result.success).toBe(false);
    expect(builder.nodeCount).toBe(0);
  });

  test('formatOutline indents children and lists references', () => {
    const builder = readyBuilder();
    const sect = builder.createNode('Sect', { title: 'Body' });
    if (!sect.success) throw new Error('setup failed');
    const para = builder.createNode('P', {}, { parent: sect.value });
    para.value?.children.push({ kind: 'mcr', page: 0, mcid: 5 });

    expect(builder.formatOutline()).toEqual([
      'Sect#1 "Body"',
      '  P#2',
      '    MCR page 0 mcid 5',
    ]);
    expect(builder.countByType()).toEqual({ Sect: 1, P: 1 });
  });
});
