/**
 * PDF Structure Writer
 *
 * Materializes the in-memory structure tree into pdf-lib objects:
 *
 *   /StructTreeRoot  (new, or the document's existing root extended)
 *     /RoleMap       additive: existing entries are never replaced
 *     /K             existing children first, then one StructElem per root node
 *     /ParentTree    number tree: page /StructParents → [StructElem by MCID]
 *     /ParentTreeNextKey
 *
 * Runs once per save, after correlation, so every node already carries its
 * final children and content references.
 */

import {
  PDFArray,
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNull,
  PDFNumber,
  PDFObject,
  PDFRef,
} from 'pdf-lib';
import type { Diagnostic, OperationResult, StructureNode, StructureRoot } from '../types';
import { TaggingError, diagnostic, diagnosticFromError, fail, succeed } from './diagnostics';
import { isStructureNode } from './roleMap';

export interface StructureWriteSummary {
  rootRef: PDFRef;
  elementCount: number;
  referenceCount: number;
  /** nodeId → StructElem ref */
  elementRefs: Map<number, PDFRef>;
  /** page index → /StructParents key used for it */
  structParents: Map<number, number>;
}

const NAME = {
  Type: PDFName.of('Type'),
  StructTreeRoot: PDFName.of('StructTreeRoot'),
  RoleMap: PDFName.of('RoleMap'),
  K: PDFName.of('K'),
  ParentTree: PDFName.of('ParentTree'),
  ParentTreeNextKey: PDFName.of('ParentTreeNextKey'),
  StructParents: PDFName.of('StructParents'),
  Nums: PDFName.of('Nums'),
  Kids: PDFName.of('Kids'),
  Limits: PDFName.of('Limits'),
};

export function writeStructureTree(
  pdfDoc: PDFDocument,
  root: StructureRoot,
): OperationResult<StructureWriteSummary> {
  try {
    const diagnostics: Diagnostic[] = [];
    const context = pdfDoc.context;
    const { dict: rootDict, ref: rootRef } = resolveRootDict(pdfDoc);

    writeRoleMap(pdfDoc, rootDict, root.roleMap);
    const kids = resolveKidsArray(pdfDoc, rootDict);

    // Refs first, so children can point at parents and parents at children.
    const elementRefs = new Map<number, PDFRef>();
    const assignRefs = (node: StructureNode) => {
      elementRefs.set(node.nodeId, context.nextRef());
      for (const child of node.children) {
        if (isStructureNode(child)) assignRefs(child);
      }
    };
    root.children.forEach(assignRefs);

    const pages = pdfDoc.getPages();
    const byPage = new Map<number, Map<number, PDFRef>>();
    let referenceCount = 0;

    const writeNode = (node: StructureNode, parentRef: PDFRef) => {
      const ref = refFor(elementRefs, node);
      const k = context.obj([]);

      for (const child of node.children) {
        if (isStructureNode(child)) {
          k.push(refFor(elementRefs, child));
          writeNode(child, ref);
          continue;
        }
        const page = pages[child.page];
        if (!page) {
          diagnostics.push(diagnostic('warning', 'correlation-miss',
            `Content reference to missing page ${child.page} dropped`, { page: child.page, nodeId: node.nodeId }));
          continue;
        }
        k.push(context.obj({ Type: 'MCR', Pg: page.ref, MCID: child.mcid }));
        const entries = byPage.get(child.page) ?? new Map<number, PDFRef>();
        entries.set(child.mcid, ref);
        byPage.set(child.page, entries);
        referenceCount++;
      }

      const elem = context.obj({ Type: 'StructElem', S: PDFName.of(node.type), P: parentRef, K: k });
      const { title, altText, actualText, language } = node.attributes;
      if (title !== undefined) elem.set(PDFName.of('T'), PDFHexString.fromText(title));
      if (altText !== undefined) elem.set(PDFName.of('Alt'), PDFHexString.fromText(altText));
      if (actualText !== undefined) elem.set(PDFName.of('ActualText'), PDFHexString.fromText(actualText));
      if (language !== undefined) elem.set(PDFName.of('Lang'), PDFHexString.fromText(language));
      context.assign(ref, elem);
    };

    for (const node of root.children) {
      kids.push(refFor(elementRefs, node));
      writeNode(node, rootRef);
    }

    const structParents = writeParentTree(pdfDoc, rootDict, byPage);

    return succeed({
      rootRef,
      elementCount: elementRefs.size,
      referenceCount,
      elementRefs,
      structParents,
    }, diagnostics);
  } catch (e) {
    console.error('[pdfStructureWriter] Failed to write structure tree:', e);
    return fail([diagnosticFromError(e, 'root-creation-failed', 'fatal')]);
  }
}

function refFor(refs: Map<number, PDFRef>, node: StructureNode): PDFRef {
  const ref = refs.get(node.nodeId);
  if (!ref) throw new TaggingError('unknown-node', `Node ${node.nodeId} has no object reference`);
  return ref;
}

// ─── Root ────────────────────────────────────────────────────

function resolveRootDict(pdfDoc: PDFDocument): { dict: PDFDict; ref: PDFRef } {
  const context = pdfDoc.context;
  const catalog = pdfDoc.catalog;
  const entry = catalog.get(NAME.StructTreeRoot);

  if (entry === undefined) {
    const dict = context.obj({ Type: 'StructTreeRoot' });
    const ref = context.register(dict);
    catalog.set(NAME.StructTreeRoot, ref);
    return { dict, ref };
  }

  const target = context.lookup(entry);
  if (!(target instanceof PDFDict)) {
    throw new TaggingError('root-unrecognized', `StructTreeRoot is a ${describeObject(target)}, not a dictionary`);
  }
  if (entry instanceof PDFRef) return { dict: target, ref: entry };

  // StructElem /P must be indirect, so a direct root gets registered
  const ref = context.register(target);
  catalog.set(NAME.StructTreeRoot, ref);
  return { dict: target, ref };
}

function writeRoleMap(pdfDoc: PDFDocument, rootDict: PDFDict, roleMap: Map<string, string>): void {
  const existing = rootDict.lookup(NAME.RoleMap);
  let dict: PDFDict;
  if (existing instanceof PDFDict) {
    dict = existing;
  } else {
    dict = pdfDoc.context.obj({});
    rootDict.set(NAME.RoleMap, dict);
  }
  for (const [key, value] of roleMap) {
    const name = PDFName.of(key);
    if (!dict.has(name)) dict.set(name, PDFName.of(value));
  }
}

function resolveKidsArray(pdfDoc: PDFDocument, rootDict: PDFDict): PDFArray {
  const existing = rootDict.get(NAME.K);
  if (existing === undefined) {
    const kids = pdfDoc.context.obj([]);
    rootDict.set(NAME.K, kids);
    return kids;
  }
  const resolved = pdfDoc.context.lookup(existing);
  if (resolved instanceof PDFArray) return resolved;

  // A single child is stored without an array
  const kids = pdfDoc.context.obj([existing]);
  rootDict.set(NAME.K, kids);
  return kids;
}

export function describeObject(obj: PDFObject | undefined): string {
  if (obj === undefined) return 'missing object';
  return obj.constructor.name.replace(/^PDF/, '').toLowerCase();
}

// ─── ParentTree ──────────────────────────────────────────────

/**
 * Add one number-tree entry per marked page. A page that already has
 * /StructParents keeps its key and its existing array is extended.
 */
function writeParentTree(
  pdfDoc: PDFDocument,
  rootDict: PDFDict,
  byPage: Map<number, Map<number, PDFRef>>,
): Map<number, number> {
  const context = pdfDoc.context;
  const existingTree = rootDict.lookup(NAME.ParentTree);
  let tree: PDFDict;
  if (existingTree instanceof PDFDict) {
    tree = existingTree;
  } else {
    tree = context.obj({ Nums: [] });
    rootDict.set(NAME.ParentTree, context.register(tree));
  }

  let nextKey = Math.max(readNextKey(rootDict), maxNumTreeKey(pdfDoc, tree) + 1);
  const pages = pdfDoc.getPages();
  const newEntries: Array<[number, PDFArray]> = [];
  const structParents = new Map<number, number>();

  const pageIndexes = [...byPage.keys()].sort((a, b) => a - b);
  for (const pageIndex of pageIndexes) {
    const page = pages[pageIndex];
    const entries = byPage.get(pageIndex);
    if (!page || !entries) continue;

    const existingKey = page.node.lookup(NAME.StructParents);
    const existingArray = existingKey instanceof PDFNumber
      ? findNumTreeValue(pdfDoc, tree, existingKey.asNumber())
      : undefined;

    if (existingKey instanceof PDFNumber && existingArray instanceof PDFArray) {
      fillParentArray(existingArray, entries);
      structParents.set(pageIndex, existingKey.asNumber());
      continue;
    }

    const array = context.obj([]);
    fillParentArray(array, entries);
    const key = nextKey++;
    page.node.set(NAME.StructParents, PDFNumber.of(key));
    newEntries.push([key, array]);
    structParents.set(pageIndex, key);
  }

  if (newEntries.length > 0) appendNumTreeEntries(pdfDoc, tree, newEntries);
  rootDict.set(NAME.ParentTreeNextKey, PDFNumber.of(nextKey));
  return structParents;
}

function fillParentArray(array: PDFArray, entries: Map<number, PDFRef>): void {
  for (const [mcid, ref] of entries) {
    while (array.size() <= mcid) array.push(PDFNull);
    array.set(mcid, ref);
  }
}

function readNextKey(rootDict: PDFDict): number {
  const value = rootDict.lookup(NAME.ParentTreeNextKey);
  return value instanceof PDFNumber ? value.asNumber() : 0;
}

function maxNumTreeKey(pdfDoc: PDFDocument, node: PDFDict, depth = 0): number {
  if (depth > 32) return -1;
  let max = -1;
  const nums = node.lookup(NAME.Nums);
  if (nums instanceof PDFArray) {
    for (let i = 0; i < nums.size(); i += 2) {
      const key = nums.lookup(i);
      if (key instanceof PDFNumber) max = Math.max(max, key.asNumber());
    }
  }
  const kids = node.lookup(NAME.Kids);
  if (kids instanceof PDFArray) {
    for (let i = 0; i < kids.size(); i++) {
      const kid = pdfDoc.context.lookup(kids.get(i));
      if (kid instanceof PDFDict) max = Math.max(max, maxNumTreeKey(pdfDoc, kid, depth + 1));
    }
  }
  return max;
}

function findNumTreeValue(pdfDoc: PDFDocument, node: PDFDict, key: number, depth = 0): PDFObject | undefined {
  if (depth > 32) return undefined;
  const nums = node.lookup(NAME.Nums);
  if (nums instanceof PDFArray) {
    for (let i = 0; i + 1 < nums.size(); i += 2) {
      const candidate = nums.lookup(i);
      if (candidate instanceof PDFNumber && candidate.asNumber() === key) {
        return pdfDoc.context.lookup(nums.get(i + 1));
      }
    }
  }
  const kids = node.lookup(NAME.Kids);
  if (kids instanceof PDFArray) {
    for (let i = 0; i < kids.size(); i++) {
      const kid = pdfDoc.context.lookup(kids.get(i));
      if (!(kid instanceof PDFDict)) continue;
      const found = findNumTreeValue(pdfDoc, kid, key, depth + 1);
      if (found !== undefined) return found;
    }
  }
  return undefined;
}

/**
 * New keys are always above every existing key, so they go at the end:
 * appended to a flat /Nums, or as a new leaf after the last /Kids entry.
 */
function appendNumTreeEntries(pdfDoc: PDFDocument, tree: PDFDict, entries: Array<[number, PDFArray]>): void {
  const context = pdfDoc.context;
  const kids = tree.lookup(NAME.Kids);

  if (kids instanceof PDFArray) {
    const leaf = context.obj({
      Limits: [entries[0][0], entries[entries.length - 1][0]],
      Nums: [],
    });
    const nums = leaf.lookup(NAME.Nums);
    if (nums instanceof PDFArray) pushNums(pdfDoc, nums, entries);
    kids.push(context.register(leaf));
    return;
  }

  const existingNums = tree.lookup(NAME.Nums);
  let nums: PDFArray;
  if (existingNums instanceof PDFArray) {
    nums = existingNums;
  } else {
    nums = context.obj([]);
    tree.set(NAME.Nums, nums);
  }
  pushNums(pdfDoc, nums, entries);
}

function pushNums(pdfDoc: PDFDocument, nums: PDFArray, entries: Array<[number, PDFArray]>): void {
  for (const [key, array] of entries) {
    nums.push(PDFNumber.of(key));
    nums.push(pdfDoc.context.register(array));
  }
}
