/**
 * Tagging Pipeline
 *
 * One engine, one session at a time. An export runs:
 *
 * 1. Load the PDF with pdf-lib and classify its existing /StructTreeRoot
 * 2. initRoot (fatal on failure)
 * 3. For each page:
 *    a. Extract elements and text positions with pdfjs-dist
 *    b. Reconcile them with the sidecar overrides for the page
 *    c. Create one structure node per element
 *    d. Correlate nodes with marked content (marking the content stream, or
 *       references only when marking is off)
 * 4. Declarative structures from the input: node batch, tables, lists
 * 5. Write the structure tree, then document metadata
 * 6. Return pdfDoc.save() bytes with the tree and the element → MCID map
 *
 * Cancellation is checked at the progress checkpoints only.
 */

import { PDFDocument } from 'pdf-lib';
import type {
  Diagnostic,
  Element,
  ListSpec,
  NodeAttributes,
  NodeSpec,
  ProgressCallback,
  ProgressCheckpoint,
  SidecarDocument,
  SidecarOverride,
  StructureNode,
  StructureRoot,
  TableSpec,
  TextPosition,
} from '../types';
import { DEFAULT_ENGINE_SETTINGS, resolveEngineSettings, type EngineSettings } from './config';
import { diagnostic, diagnosticFromError, hasFatal } from './diagnostics';
import { applyDocumentMetadata, type DocumentMetadata, type MetadataChanges } from './documentMetadata';
import { extractPageElements, extractTextPositions } from './elementExtractor';
import { parseElementId } from './elementIds';
import { reconcile } from './elementReconciler';
import { markPageContent } from './markedContentInjector';
import { openPdfjsDocument, type PageSource } from './pdfjsDocumentSource';
import { writeStructureTree } from './pdfStructureWriter';
import type { SessionStatistics } from './remediationReport';
import { overridesForPage } from './sidecarStore';
import { createList, createTable } from './structureTree/CompositeExpanders';
import { ContentCorrelator, type CorrelationMatch } from './structureTree/ContentCorrelator';
import { McidAllocator } from './structureTree/McidAllocator';
import { StructureTreeBuilder } from './structureTree/StructureTreeBuilder';
import { inspectStructureRoot } from './structureTreeInspector';

export type DocumentOpener = (data: Uint8Array) => Promise<PageSource>;

export interface TaggingEngineOptions {
  settings?: Partial<EngineSettings>;
  /** defaults to pdfjs-dist */
  openDocument?: DocumentOpener;
}

export interface StructureRequests {
  batch?: NodeSpec[];
  tables?: TableSpec[];
  lists?: ListSpec[];
}

export interface ExportInput {
  pdfData: Uint8Array;
  sidecar?: SidecarDocument;
  /** wins over the sidecar's document section */
  metadata?: DocumentMetadata;
  structures?: StructureRequests;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

export interface ExportResult {
  success: boolean;
  diagnostics: Diagnostic[];
  /** the session tree, partial when the export stopped early */
  tree: StructureRoot | null;
  /** element id → MCIDs assigned to it this session */
  mcidMap: Map<string, number[]>;
  pdfBytes: Uint8Array | null;
  metadata: MetadataChanges | null;
  statistics: SessionStatistics;
}

const PAGE_PROGRESS_START = 10;
const PAGE_PROGRESS_END = 80;

class ExportCancelled extends Error {
  constructor(readonly checkpoint: ProgressCheckpoint) {
    super(`Export cancelled at ${checkpoint}`);
    this.name = 'ExportCancelled';
  }
}

export class TaggingEngine {
  readonly settings: EngineSettings;
  readonly builder = new StructureTreeBuilder();
  readonly allocator = new McidAllocator();
  private readonly correlator = new ContentCorrelator(this.allocator);
  private readonly openDocument: DocumentOpener;
  private readonly mcids = new Map<string, number[]>();
  /** set when the supplied settings were rejected; every export then fails */
  private readonly settingsError: Diagnostic | null = null;
  private busy = false;

  constructor(options: TaggingEngineOptions = {}) {
    let settings: EngineSettings;
    try {
      settings = resolveEngineSettings(options.settings);
    } catch (e) {
      console.error('[taggingPipeline] Rejected engine settings:', e);
      this.settingsError = diagnosticFromError(e, 'invalid-setting', 'fatal');
      settings = DEFAULT_ENGINE_SETTINGS;
    }
    this.settings = settings;
    this.openDocument = options.openDocument ?? openPdfjsDocument;
  }

  get isBusy(): boolean {
    return this.busy;
  }

  /** Reset the tree, the node registry, MCIDs and element links. */
  beginSession(): void {
    this.builder.reset();
    this.allocator.reset();
    this.mcids.clear();
  }

  async exportTaggedPdf(input: ExportInput): Promise<ExportResult> {
    if (this.settingsError) return rejected(this.settingsError);
    if (this.busy) {
      return rejected(diagnostic('fatal', 'session-busy', 'An export is already running on this engine'));
    }

    this.busy = true;
    this.beginSession();
    try {
      return await this.runExport(input);
    } finally {
      this.busy = false;
    }
  }

  // ─── Export ────────────────────────────────────────────────

  private async runExport(input: ExportInput): Promise<ExportResult> {
    const diagnostics: Diagnostic[] = [];
    let pagesProcessed = 0;

    const checkpoint = (name: ProgressCheckpoint, message: string, progress: number, page?: number) => {
      input.onProgress?.({ checkpoint: name, message, progress, ...(page === undefined ? {} : { page }) });
      if (input.signal?.aborted) throw new ExportCancelled(name);
    };

    let pdfDoc: PDFDocument;
    try {
      pdfDoc = await PDFDocument.load(input.pdfData, { updateMetadata: false });
    } catch (e) {
      console.error('[taggingPipeline] Failed to load PDF:', e);
      return this.result(false, [diagnosticFromError(e, 'load-failed', 'fatal')], 0);
    }

    const root = this.builder.initRoot(inspectStructureRoot(pdfDoc));
    diagnostics.push(...root.diagnostics);
    if (!root.success) return this.result(false, diagnostics, 0);

    let source: PageSource | null = null;
    try {
      checkpoint('root-created', 'Structure root ready', 5);

      try {
        source = await this.openDocument(input.pdfData);
      } catch (e) {
        console.error('[taggingPipeline] Failed to open PDF for extraction:', e);
        diagnostics.push(diagnosticFromError(e, 'load-failed', 'fatal'));
        return this.result(false, diagnostics, 0);
      }

      const pageCount = Math.min(source.pageCount, pdfDoc.getPageCount());
      for (let pageIndex = 0; pageIndex < pageCount; pageIndex++) {
        const span = (PAGE_PROGRESS_END - PAGE_PROGRESS_START) / Math.max(pageCount, 1);
        const base = PAGE_PROGRESS_START + span * pageIndex;
        await this.processPage(pdfDoc, source, pageIndex, input.sidecar, diagnostics, (name, message, fraction) =>
          checkpoint(name, message, Math.round(base + span * fraction), pageIndex));
        pagesProcessed++;
      }

      this.createRequestedStructures(input.structures, diagnostics);

      const written = writeStructureTree(pdfDoc, root.value);
      diagnostics.push(...written.diagnostics);
      if (!written.success) return this.result(false, diagnostics, pagesProcessed);

      const metadata = applyDocumentMetadata(pdfDoc, this.documentMetadata(input), {
        producer: this.settings.producer,
        creator: this.settings.creator,
      });

      let pdfBytes: Uint8Array;
      try {
        pdfBytes = await pdfDoc.save();
      } catch (e) {
        console.error('[taggingPipeline] Failed to save PDF:', e);
        diagnostics.push(diagnosticFromError(e, 'save-failed', 'fatal'));
        return this.result(false, diagnostics, pagesProcessed);
      }

      console.log(`[taggingPipeline] Tagged ${pagesProcessed} pages: ${this.builder.nodeCount} nodes, `
        + `${this.allocator.assigned.length} marked-content references`);
      checkpoint('session-complete', 'Export complete', 100);

      return this.result(!hasFatal(diagnostics), diagnostics, pagesProcessed, pdfBytes, metadata);
    } catch (e) {
      if (e instanceof ExportCancelled) {
        console.warn(`[taggingPipeline] ${e.message}`);
        diagnostics.push(diagnostic('fatal', 'cancelled', e.message));
      } else {
        console.error('[taggingPipeline] Export failed:', e);
        diagnostics.push(diagnosticFromError(e, 'export-failed', 'fatal'));
      }
      return this.result(false, diagnostics, pagesProcessed);
    } finally {
      if (source) await source.close();
    }
  }

  private async processPage(
    pdfDoc: PDFDocument,
    source: PageSource,
    pageIndex: number,
    sidecar: SidecarDocument | undefined,
    diagnostics: Diagnostic[],
    checkpoint: (name: ProgressCheckpoint, message: string, fraction: number) => void,
  ): Promise<void> {
    let extracted: Element[] = [];
    let positions: TextPosition[] = [];
    try {
      const page = await source.getPage(pageIndex);
      extracted = await extractPageElements(page, pageIndex);
      positions = await extractTextPositions(page, pageIndex);
    } catch (e) {
      console.warn(`[taggingPipeline] Extraction failed on page ${pageIndex}:`, e);
      diagnostics.push(diagnosticFromError(e, 'page-extraction-failed', 'warning', pageIndex));
    }

    const overrides = sidecar ? overridesForPage(sidecar, pageIndex) : new Map<string, SidecarOverride>();
    const reconciled = reconcile(pageIndex, extracted, overrides);
    diagnostics.push(...reconciled.diagnostics);
    const elements = reconciled.value ?? [];
    checkpoint('elements-reconciled', `Page ${pageIndex + 1}: ${elements.length} elements`, 0.25);

    const nodes = this.createElementNodes(pageIndex, elements, overrides, diagnostics);
    checkpoint('nodes-created', `Page ${pageIndex + 1}: ${nodes.size} structure elements`, 0.5);

    const matches = this.correlatePage(pdfDoc, pageIndex, positions, nodes, diagnostics);
    for (const match of matches) {
      const list = this.mcids.get(match.elementId) ?? [];
      list.push(match.reference.mcid);
      this.mcids.set(match.elementId, list);
    }
    checkpoint('correlation-done', `Page ${pageIndex + 1}: ${matches.length} marked-content references`, 1);
  }

  private createElementNodes(
    pageIndex: number,
    elements: readonly Element[],
    overrides: ReadonlyMap<string, SidecarOverride>,
    diagnostics: Diagnostic[],
  ): Map<string, StructureNode> {
    const nodes = new Map<string, StructureNode>();
    let imageOrdinal = 0;

    for (const element of elements) {
      const text = element.text?.trim() ?? '';
      const edited = overrides.has(element.id);
      // blank text is skipped unless the sidecar edits the element
      if (element.kind === 'text' && !text && !edited) continue;

      const ordinal = element.kind === 'image'
        ? imageOrdinal++
        : parseElementId(element.id)?.ordinals[0] ?? nodes.size;
      const attributes = this.nodeAttributes(pageIndex, ordinal, element, text, edited);
      const result = this.builder.createNode(element.role, attributes);
      if (!result.success) {
        diagnostics.push(...result.diagnostics.map(d => ({
          ...d,
          severity: 'warning' as const,
          page: pageIndex,
          elementId: element.id,
        })));
        continue;
      }
      nodes.set(element.id, result.value);
    }
    return nodes;
  }

  private nodeAttributes(
    pageIndex: number,
    ordinal: number,
    element: Element,
    text: string,
    edited: boolean,
  ): NodeAttributes {
    const props = element.properties;
    const str = (key: string) => {
      const value = props[key];
      return typeof value === 'string' && value.length > 0 ? value : undefined;
    };
    let fallbackTitle = `Text block ${pageIndex}-${ordinal}`;
    if (edited) fallbackTitle = `Element ${element.id}`;
    else if (element.kind === 'image') fallbackTitle = `Figure ${pageIndex}-${ordinal}`;
    const limit = this.settings.actualTextLimit;
    const truncated = text.length > limit ? `${text.slice(0, limit)}...` : text;

    return {
      title: str('title') ?? fallbackTitle,
      altText: str('alt_text'),
      actualText: str('actual_text') ?? (truncated || undefined),
      language: str('language'),
    };
  }

  private correlatePage(
    pdfDoc: PDFDocument,
    pageIndex: number,
    positions: TextPosition[],
    nodes: Map<string, StructureNode>,
    diagnostics: Diagnostic[],
  ): CorrelationMatch[] {
    if (nodes.size === 0) return [];

    const result = this.settings.markContentStreams
      ? markPageContent(pdfDoc, pageIndex, {
        correlator: this.correlator,
        allocator: this.allocator,
        positions,
        nodes,
      })
      : this.correlator.correlateUnits(pageIndex, positions, positions, nodes);

    diagnostics.push(...result.diagnostics);
    return result.value ?? [];
  }

  private createRequestedStructures(requests: StructureRequests | undefined, diagnostics: Diagnostic[]): void {
    if (!requests) return;

    if (requests.batch && requests.batch.length > 0) {
      diagnostics.push(...this.builder.createBatch(requests.batch).diagnostics);
    }
    for (const table of requests.tables ?? []) {
      diagnostics.push(...createTable(this.builder, table).diagnostics);
    }
    for (const list of requests.lists ?? []) {
      diagnostics.push(...createList(this.builder, list).diagnostics);
    }
  }

  private documentMetadata(input: ExportInput): DocumentMetadata {
    const info = input.sidecar?.document;
    return {
      title: input.metadata?.title ?? info?.title,
      language: input.metadata?.language ?? (info?.language || this.settings.language),
      marked: input.metadata?.marked ?? true,
      subject: input.metadata?.subject,
    };
  }

  // ─── Results ───────────────────────────────────────────────

  private result(
    success: boolean,
    diagnostics: Diagnostic[],
    pagesProcessed: number,
    pdfBytes: Uint8Array | null = null,
    metadata: MetadataChanges | null = null,
  ): ExportResult {
    return {
      success,
      diagnostics,
      tree: this.builder.getRoot(),
      mcidMap: new Map([...this.mcids].map(([id, list]) => [id, [...list]])),
      pdfBytes,
      metadata,
      statistics: {
        pagesProcessed,
        nodesCreated: this.builder.nodeCount,
        referencesCreated: [...this.mcids.values()].reduce((sum, list) => sum + list.length, 0),
        nodeTypes: this.builder.countByType(),
        warnings: diagnostics.filter(d => d.severity === 'warning').length,
      },
    };
  }
}

/** Result for an export that never started a session. */
function rejected(reason: Diagnostic): ExportResult {
  return {
    success: false,
    diagnostics: [reason],
    tree: null,
    mcidMap: new Map(),
    pdfBytes: null,
    metadata: null,
    statistics: { pagesProcessed: 0, nodesCreated: 0, referencesCreated: 0, nodeTypes: {}, warnings: 0 },
  };
}
