export * from './types';
export * from './utils/structureTree';
export { TaggingEngine } from './utils/taggingPipeline';
export type {
  DocumentOpener,
  ExportInput,
  ExportResult,
  StructureRequests,
  TaggingEngineOptions,
} from './utils/taggingPipeline';
export { reconcile, SYNTHESIZED_BBOX, SYNTHESIZED_ROLE } from './utils/elementReconciler';
export {
  createSidecar,
  countOverrides,
  overridesForPage,
  parseSidecar,
  readSidecarFile,
  serializeSidecar,
  sidecarPathFor,
  upsertOverride,
  writeSidecarFile,
} from './utils/sidecarStore';
export type { SerializedSidecar } from './utils/sidecarStore';
export { extractPageElements, extractTextPositions } from './utils/elementExtractor';
export type { PdfjsPageLike } from './utils/elementExtractor';
export { openPdfjsDocument } from './utils/pdfjsDocumentSource';
export type { PageSource } from './utils/pdfjsDocumentSource';
export { markPageContent, findTextShowOperations } from './utils/markedContentInjector';
export { writeStructureTree } from './utils/pdfStructureWriter';
export type { StructureWriteSummary } from './utils/pdfStructureWriter';
export { inspectStructureRoot, verifyStructureTree, formatStatusReport } from './utils/structureTreeInspector';
export type { StructureTreeStatus } from './utils/structureTreeInspector';
export { applyDocumentMetadata } from './utils/documentMetadata';
export type { DocumentMetadata, MetadataChanges } from './utils/documentMetadata';
export { buildRemediationReport, renderReportHtml, writeRemediationReport } from './utils/remediationReport';
export type { RemediationReport, ReportFormat, SessionStatistics, ValidationIssue } from './utils/remediationReport';
export {
  DEFAULT_ENGINE_SETTINGS,
  resolveEngineSettings,
  settingsFromEnv,
} from './utils/config';
export type { EngineSettings } from './utils/config';
export { SettingsStore } from './utils/settingsStore';
export { STANDARD_ROLES, createStandardRoleMap, mergeStandardRoleMap, resolveRole } from './utils/roleMap';
export { TaggingError } from './utils/diagnostics';
