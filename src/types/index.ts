export type ElementKind = 'text' | 'image';

/** [x0, y0, x1, y1], top-left origin, PDF points */
export type BBox = [number, number, number, number];

export type PropertyValue = string | number | boolean | null;

export type ElementProperties = Record<string, PropertyValue>;

export interface Element {
  id: string;
  kind: ElementKind;
  bbox: BBox;
  role: string;
  text?: string;
  properties: ElementProperties;
}

/**
 * Persisted patch for one element. A field that is absent leaves the
 * extracted value in place.
 */
export interface SidecarOverride {
  id: string;
  role?: string;
  bbox?: BBox;
  text?: string;
  properties?: ElementProperties;
}

export interface SidecarDocumentInfo {
  title: string;
  language: string;
  tagged: boolean;
}

export interface SidecarDocument {
  document: SidecarDocumentInfo;
  /** page index → overrides keyed by element id, in insertion order */
  pages: Map<number, Map<string, SidecarOverride>>;
}

export interface TextPosition {
  elementId?: string;
  text: string;
  bbox: BBox;
  font: string;
  size: number;
  blockIdx: number;
  lineIdx: number;
  spanIdx: number;
}

export interface NodeAttributes {
  title?: string;
  altText?: string;
  actualText?: string;
  language?: string;
}

export interface ContentReference {
  kind: 'mcr';
  page: number;
  mcid: number;
}

export interface StructureNode {
  readonly nodeId: number;
  readonly type: string;
  attributes: NodeAttributes;
  children: StructureChild[];
}

export type StructureChild = StructureNode | ContentReference;

export interface StructureRoot {
  roleMap: Map<string, string>;
  children: StructureNode[];
  /** role-map entries added by this session on top of an existing root */
  addedRoleMappings: string[];
  /** children the document already had before this session */
  existingChildCount: number;
}

/** What the document says about its current /StructTreeRoot. */
export type ExistingStructureRoot =
  | { kind: 'dictionary'; roleMap: Map<string, string>; childCount: number }
  | { kind: 'unrecognized'; description: string };

// ─── Diagnostics ─────────────────────────────────────────────

export type DiagnosticSeverity = 'fatal' | 'error' | 'warning' | 'info';

export type DiagnosticCode =
  | 'root-not-ready'
  | 'root-unrecognized'
  | 'root-creation-failed'
  | 'unknown-role'
  | 'unknown-node'
  | 'invalid-attach'
  | 'unknown-parent'
  | 'node-creation-failed'
  | 'duplicate-element'
  | 'invalid-sidecar-entry'
  | 'page-extraction-failed'
  | 'content-stream-unreadable'
  | 'correlation-miss'
  | 'session-busy'
  | 'cancelled'
  | 'load-failed'
  | 'save-failed'
  | 'invalid-setting'
  | 'export-failed';

export interface Diagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  message: string;
  page?: number;
  elementId?: string;
  nodeId?: number;
}

export type OperationResult<T> =
  | { success: true; value: T; diagnostics: Diagnostic[] }
  | { success: false; value: null; diagnostics: Diagnostic[] };

// ─── Declarative structure specs ─────────────────────────────

export interface NodeSpec {
  type?: string;
  title?: string;
  alt_text?: string;
  actual_text?: string;
  language?: string;
  parent_id?: number;
}

export interface TableSpec {
  title?: string;
  rows: number;
  cols: number;
  headers?: string[];
  has_header_row?: boolean;
}

export interface ListSpec {
  title?: string;
  items: string[];
  list_type?: 'ordered' | 'unordered';
}

// ─── Session progress ────────────────────────────────────────

export type ProgressCheckpoint =
  | 'root-created'
  | 'elements-reconciled'
  | 'nodes-created'
  | 'correlation-done'
  | 'session-complete';

export interface ProgressEvent {
  checkpoint: ProgressCheckpoint;
  message: string;
  /** 0..100 */
  progress: number;
  page?: number;
}

export type ProgressCallback = (event: ProgressEvent) => void;
