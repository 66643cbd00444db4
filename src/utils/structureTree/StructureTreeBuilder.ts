/**
 * Structure Tree Builder
 *
 * Owns the in-memory tree for one tagging session: the root (role map and
 * top-level children), the node registry keyed by nodeId, and the owner of
 * every node. Nothing is written to the PDF here; pdfStructureWriter turns
 * the finished tree into objects at save time.
 *
 * Protocol: uninitialized → root-ready. Every operation except initRoot
 * fails with a diagnostic until the root exists.
 */

import type {
  Diagnostic,
  ExistingStructureRoot,
  NodeAttributes,
  NodeSpec,
  OperationResult,
  StructureNode,
  StructureRoot,
} from '../../types';
import { diagnostic, fail, succeed } from '../diagnostics';
import { createStandardRoleMap, isStructureNode, mergeStandardRoleMap, resolveRole } from '../roleMap';

export type BuilderState = 'uninitialized' | 'root-ready';

export interface CreateNodeOptions {
  /** Defaults to the tree root. */
  parent?: StructureNode;
}

/** null owner = attached directly to the root */
type Owner = StructureNode | null;

export class StructureTreeBuilder {
  private state: BuilderState = 'uninitialized';
  private root: StructureRoot | null = null;
  private readonly nodes = new Map<number, StructureNode>();
  private readonly owners = new Map<number, Owner>();
  private nextNodeId = 1;

  get currentState(): BuilderState {
    return this.state;
  }

  get isReady(): boolean {
    return this.state === 'root-ready';
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  getRoot(): StructureRoot | null {
    return this.root;
  }

  getNode(nodeId: number): StructureNode | undefined {
    return this.nodes.get(nodeId);
  }

  /** Every registered node in creation order. */
  allNodes(): StructureNode[] {
    return [...this.nodes.values()];
  }

  reset(): void {
    this.state = 'uninitialized';
    this.root = null;
    this.nodes.clear();
    this.owners.clear();
    this.nextNodeId = 1;
  }

  // ─── Root ──────────────────────────────────────────────────

  initRoot(existing?: ExistingStructureRoot): OperationResult<StructureRoot> {
    if (this.root) {
      return succeed(this.root);
    }

    if (existing?.kind === 'unrecognized') {
      return fail([diagnostic('fatal', 'root-unrecognized',
        `Existing structure root cannot be extended: ${existing.description}`)]);
    }

    if (existing?.kind === 'dictionary') {
      const { merged, added } = mergeStandardRoleMap(existing.roleMap);
      this.root = {
        roleMap: merged,
        children: [],
        addedRoleMappings: added,
        existingChildCount: existing.childCount,
      };
    } else {
      this.root = {
        roleMap: createStandardRoleMap(),
        children: [],
        addedRoleMappings: [],
        existingChildCount: 0,
      };
    }

    this.state = 'root-ready';
    return succeed(this.root);
  }

  // ─── Nodes ─────────────────────────────────────────────────

  createNode(
    type: string,
    attributes: NodeAttributes = {},
    options: CreateNodeOptions = {},
  ): OperationResult<StructureNode> {
    const root = this.root;
    if (!root) {
      return fail([diagnostic('error', 'root-not-ready', `Cannot create ${type} node before the structure root exists`)]);
    }
    if (resolveRole(root.roleMap, type) === null) {
      return fail([diagnostic('error', 'unknown-role', `Role "${type}" does not resolve to a standard structure type`)]);
    }
    const parent = options.parent;
    if (parent && !this.isRegistered(parent)) {
      return fail([diagnostic('error', 'unknown-parent',
        `Parent node ${parent.nodeId} does not belong to this tree`, { nodeId: parent.nodeId })]);
    }

    const node: StructureNode = {
      nodeId: this.nextNodeId++,
      type,
      attributes: compactAttributes(attributes),
      children: [],
    };
    this.nodes.set(node.nodeId, node);

    if (parent) {
      parent.children.push(node);
      this.owners.set(node.nodeId, parent);
    } else {
      root.children.push(node);
      this.owners.set(node.nodeId, null);
    }
    return succeed(node);
  }

  /**
   * Move `child` to the end of `parent.children`, detaching it from its
   * previous owner.
   */
  attach(parent: StructureNode, child: StructureNode): OperationResult<StructureNode> {
    const root = this.root;
    if (!root) {
      return fail([diagnostic('error', 'root-not-ready', 'Cannot attach nodes before the structure root exists')]);
    }
    if (!this.isRegistered(parent) || !this.isRegistered(child)) {
      const unknown = this.isRegistered(parent) ? child : parent;
      return fail([diagnostic('error', 'unknown-node',
        `Node ${unknown.nodeId} does not belong to this tree`, { nodeId: unknown.nodeId })]);
    }
    if (parent === child || this.isAncestor(child, parent)) {
      return fail([diagnostic('error', 'invalid-attach',
        `Attaching node ${child.nodeId} under ${parent.nodeId} would create a cycle`, { nodeId: child.nodeId })]);
    }

    const owner = this.owners.get(child.nodeId) ?? null;
    if (owner) {
      removeChild(owner.children, child);
    } else {
      removeChild(root.children, child);
    }

    parent.children.push(child);
    this.owners.set(child.nodeId, parent);
    return succeed(child);
  }

  /**
   * Create one node per spec. A failed entry yields null and a diagnostic;
   * the batch itself succeeds once the root is ready.
   */
  createBatch(specs: readonly NodeSpec[]): OperationResult<Array<StructureNode | null>> {
    if (!this.root) {
      return fail([diagnostic('error', 'root-not-ready', 'Cannot create nodes before the structure root exists')]);
    }

    const diagnostics: Diagnostic[] = [];
    const created: Array<StructureNode | null> = [];

    specs.forEach((spec, i) => {
      const result = this.createNode(spec.type ?? 'P', {
        title: spec.title ?? `Element ${i + 1}`,
        altText: spec.alt_text,
        actualText: spec.actual_text,
        language: spec.language,
      });
      if (!result.success) {
        diagnostics.push(...result.diagnostics.map(d => ({ ...d, severity: 'warning' as const })));
        created.push(null);
        return;
      }

      const node = result.value;
      created.push(node);
      if (spec.parent_id === undefined) return;

      const parent = this.nodes.get(spec.parent_id);
      if (!parent) {
        diagnostics.push(diagnostic('warning', 'unknown-parent',
          `Parent ${spec.parent_id} not found; node ${node.nodeId} stays at the root`, { nodeId: node.nodeId }));
        return;
      }
      const attached = this.attach(parent, node);
      if (!attached.success) {
        diagnostics.push(...attached.diagnostics.map(d => ({ ...d, severity: 'warning' as const })));
      }
    });

    return succeed(created, diagnostics);
  }

  // ─── Summaries ─────────────────────────────────────────────

  countByType(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const node of this.nodes.values()) {
      counts[node.type] = (counts[node.type] ?? 0) + 1;
    }
    return counts;
  }

  /** Indented outline of the tree, one line per node or content reference. */
  formatOutline(): string[] {
    const lines: string[] = [];
    const visit = (node: StructureNode, depth: number) => {
      const indent = '  '.repeat(depth);
      const title = node.attributes.title ? ` "${node.attributes.title}"` : '';
      lines.push(`${indent}${node.type}#${node.nodeId}${title}`);
      for (const child of node.children) {
        if (isStructureNode(child)) {
          visit(child, depth + 1);
        } else {
          lines.push(`${indent}  MCR page ${child.page} mcid ${child.mcid}`);
        }
      }
    };
    for (const node of this.root?.children ?? []) visit(node, 0);
    return lines;
  }

  // ─── Internals ─────────────────────────────────────────────

  private isRegistered(node: StructureNode): boolean {
    return this.nodes.get(node.nodeId) === node;
  }

  /** True when `ancestor` owns `node` directly or transitively. */
  private isAncestor(ancestor: StructureNode, node: StructureNode): boolean {
    let current = this.owners.get(node.nodeId) ?? null;
    while (current) {
      if (current === ancestor) return true;
      current = this.owners.get(current.nodeId) ?? null;
    }
    return false;
  }
}

function removeChild<T>(list: T[], item: T): void {
  const index = list.indexOf(item);
  if (index >= 0) list.splice(index, 1);
}

function compactAttributes(attributes: NodeAttributes): NodeAttributes {
  const result: NodeAttributes = {};
  if (attributes.title !== undefined) result.title = attributes.title;
  if (attributes.altText !== undefined) result.altText = attributes.altText;
  if (attributes.actualText !== undefined) result.actualText = attributes.actualText;
  if (attributes.language !== undefined) result.language = attributes.language;
  return result;
}
