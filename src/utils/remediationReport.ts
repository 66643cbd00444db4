/**
 * Remediation Report
 *
 * Summarizes what an export changed: metadata, sidecar edits, structure
 * statistics, and (optionally) issues an external checker reported for the
 * source file. Written as JSON or as a standalone HTML page.
 */

import { writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { OperationResult, SidecarDocument } from '../types';
import type { MetadataChanges } from './documentMetadata';
import { diagnosticFromError, fail, succeed } from './diagnostics';
import { countOverrides, serializeSidecar, type SerializedSidecar } from './sidecarStore';

export interface ValidationIssue {
  ruleId: string;
  severity: string;
  description: string;
  page?: number | null;
}

export interface SessionStatistics {
  pagesProcessed: number;
  nodesCreated: number;
  referencesCreated: number;
  nodeTypes: Record<string, number>;
  warnings: number;
}

export interface RemediationReport {
  reportInfo: {
    generatedAt: string;
    toolName: string;
    sourceFile: string;
    exportFile: string;
  };
  metadataChanges: MetadataChanges;
  elementModifications: {
    totalElementsModified: number;
    pagesWithChanges: number;
    details: SerializedSidecar['pages'];
  };
  session: SessionStatistics | null;
  validationSummary: {
    totalIssuesFound: number;
    errors: number;
    warnings: number;
    issues: ValidationIssue[];
  };
}

export interface ReportInput {
  sourcePath: string;
  outputPath?: string;
  toolName: string;
  metadata: MetadataChanges;
  sidecar?: SidecarDocument;
  session?: SessionStatistics;
  validationIssues?: ValidationIssue[];
  generatedAt?: Date;
}

export type ReportFormat = 'json' | 'html';

export function buildRemediationReport(input: ReportInput): RemediationReport {
  const issues = input.validationIssues ?? [];
  const sidecar = input.sidecar;
  const pagesWithChanges = sidecar
    ? [...sidecar.pages.values()].filter(overrides => overrides.size > 0).length
    : 0;

  return {
    reportInfo: {
      generatedAt: (input.generatedAt ?? new Date()).toISOString(),
      toolName: input.toolName,
      sourceFile: basename(input.sourcePath),
      exportFile: input.outputPath ? basename(input.outputPath) : 'N/A',
    },
    metadataChanges: input.metadata,
    elementModifications: {
      totalElementsModified: sidecar ? countOverrides(sidecar) : 0,
      pagesWithChanges,
      details: sidecar ? serializeSidecar(sidecar).pages : {},
    },
    session: input.session ?? null,
    validationSummary: {
      totalIssuesFound: issues.length,
      errors: issues.filter(i => i.severity.toUpperCase() === 'ERROR').length,
      warnings: issues.filter(i => i.severity.toUpperCase() === 'WARNING').length,
      issues,
    },
  };
}

export function escapeHtml(unsafe: string): string {
  return unsafe
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

const STYLES = `
    body { font-family: Arial, sans-serif; margin: 20px; line-height: 1.6; }
    .header { background-color: #f4f4f4; padding: 20px; border-radius: 5px; }
    .section { margin: 20px 0; padding: 15px; border: 1px solid #ddd; border-radius: 5px; }
    .success { color: green; }
    .warning { color: orange; }
    .error { color: red; }
    table { width: 100%; border-collapse: collapse; margin: 10px 0; }
    th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }
    th { background-color: #f2f2f2; }
    .issue-error { background-color: #ffebee; }
    .issue-warning { background-color: #fff3e0; }`;

function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}

export function issueRow(issue: ValidationIssue): string {
  const severity = issue.severity.toLowerCase();
  const rowClass = severity === 'error' || severity === 'warning' ? ` class="issue-${severity}"` : '';
  const page = issue.page === undefined || issue.page === null ? 'N/A' : String(issue.page);
  return `<tr${rowClass}><td>${escapeHtml(issue.ruleId)}</td><td>${escapeHtml(issue.severity)}</td>`
    + `<td>${escapeHtml(issue.description)}</td><td>${page}</td></tr>`;
}

export function renderReportHtml(report: RemediationReport): string {
  const { reportInfo: info, metadataChanges: meta, elementModifications: mods, validationSummary: validation } = report;

  const sessionSection = report.session
    ? `
  <div class="section">
    <h2>Structure Tree</h2>
    <p><strong>Pages Processed:</strong> ${report.session.pagesProcessed}</p>
    <p><strong>Structure Elements Created:</strong> ${report.session.nodesCreated}</p>
    <p><strong>Marked Content References:</strong> ${report.session.referencesCreated}</p>
    <p><strong>Warnings:</strong> <span class="warning">${report.session.warnings}</span></p>
    <table>
      <tr><th>Type</th><th>Count</th></tr>
      ${Object.entries(report.session.nodeTypes)
        .map(([type, count]) => `<tr><td>${escapeHtml(type)}</td><td>${count}</td></tr>`)
        .join('\n      ')}
    </table>
  </div>`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>PDF Accessibility Remediation Report</title>
  <style>${STYLES}
  </style>
</head>
<body>
  <div class="header">
    <h1>PDF Accessibility Remediation Report</h1>
    <p><strong>Generated:</strong> ${escapeHtml(info.generatedAt)}</p>
    <p><strong>Tool:</strong> ${escapeHtml(info.toolName)}</p>
    <p><strong>Source File:</strong> ${escapeHtml(info.sourceFile)}</p>
    <p><strong>Output File:</strong> ${escapeHtml(info.exportFile)}</p>
  </div>

  <div class="section">
    <h2>Metadata Changes</h2>
    <table>
      <tr><th>Property</th><th>Value</th></tr>
      <tr><td>Document Title</td><td>${escapeHtml(meta.title ?? 'Not set')}</td></tr>
      <tr><td>Document Language</td><td>${escapeHtml(meta.language ?? 'Not set')}</td></tr>
      <tr><td>Marked as Tagged</td><td class="success">${yesNo(meta.marked)}</td></tr>
      <tr><td>Accessibility Flags Set</td><td class="success">${yesNo(meta.accessibilityFlagsSet)}</td></tr>
    </table>
  </div>

  <div class="section">
    <h2>Element Modifications</h2>
    <p><strong>Total Elements Modified:</strong> ${mods.totalElementsModified}</p>
    <p><strong>Pages with Changes:</strong> ${mods.pagesWithChanges}</p>
  </div>
${sessionSection}
  <div class="section">
    <h2>Validation Summary</h2>
    <p><strong>Total Issues Found:</strong> ${validation.totalIssuesFound}</p>
    <p><strong>Errors:</strong> <span class="error">${validation.errors}</span></p>
    <p><strong>Warnings:</strong> <span class="warning">${validation.warnings}</span></p>
    <h3>Issues Details</h3>
    <table>
      <tr><th>Rule ID</th><th>Severity</th><th>Description</th><th>Page</th></tr>
      ${validation.issues.map(issueRow).join('\n      ')}
    </table>
  </div>
</body>
</html>
`;
}

export async function writeRemediationReport(
  path: string,
  report: RemediationReport,
  format: ReportFormat = 'json',
): Promise<OperationResult<string>> {
  try {
    const content = format === 'html' ? renderReportHtml(report) : JSON.stringify(report, null, 2);
    await writeFile(path, content, 'utf-8');
    return succeed(path);
  } catch (e) {
    console.error(`[remediationReport] Failed to write ${format} report:`, e);
    return fail([diagnosticFromError(e, 'save-failed')]);
  }
}
