/**
 * Unit Tests: remediation report
 */
import { describe, test, expect, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  buildRemediationReport,
  escapeHtml,
  issueRow,
  renderReportHtml,
  writeRemediationReport,
  type ReportInput,
} from '../remediationReport';
import { createSidecar, upsertOverride } from '../sidecarStore';

function sampleInput(): ReportInput {
  const sidecar = createSidecar(3);
  upsertOverride(sidecar, 0, { id: 'text_0_0', role: 'H1' });
  upsertOverride(sidecar, 0, { id: 'image_0_0_0', properties: { alt_text: 'Company logo' } });
  upsertOverride(sidecar, 2, { id: 'text_2_1', role: 'Caption' });

  return {
    sourcePath: '/reports/q3/input.pdf',
    outputPath: '/reports/q3/input_tagged.pdf',
    toolName: 'tagged-pdf-engine',
    metadata: { title: 'Q3 <Draft>', language: 'en-US', marked: true, accessibilityFlagsSet: true },
    sidecar,
    session: { pagesProcessed: 3, nodesCreated: 4, referencesCreated: 6, nodeTypes: { P: 3, Figure: 1 }, warnings: 1 },
    validationIssues: [
      { ruleId: '7.1-3', severity: 'ERROR', description: 'Content is neither marked as Artifact nor tagged', page: 1 },
      { ruleId: '7.2-34', severity: 'warning', description: 'Natural language <missing>' },
      { ruleId: 'info-1', severity: 'info', description: 'Checked', page: null },
    ],
    generatedAt: new Date('2026-03-04T05:06:07.000Z'),
  };
}

describe('buildRemediationReport', () => {
  test('summarizes edits, session and issues', () => {
    const report = buildRemediationReport(sampleInput());

    expect(report.reportInfo).toEqual({
      generatedAt: '2026-03-04T05:06:07.000Z',
      toolName: 'tagged-pdf-engine',
      sourceFile: 'input.pdf',
      exportFile: 'input_tagged.pdf',
    });
    expect(report.elementModifications.totalElementsModified).toBe(3);
    expect(report.elementModifications.pagesWithChanges).toBe(2);
    expect(report.elementModifications.details['1']).toEqual({ elements: [] });
    expect(report.validationSummary).toMatchObject({ totalIssuesFound: 3, errors: 1, warnings: 1 });
    expect(report.session?.referencesCreated).toBe(6);
  });

  test('without a sidecar or output path', () => {
    const report = buildRemediationReport({ ...sampleInput(), sidecar: undefined, outputPath: undefined });

    expect(report.reportInfo.exportFile).toBe('N/A');
    expect(report.elementModifications).toEqual({ totalElementsModified: 0, pagesWithChanges: 0, details: {} });
  });
});

describe('HTML rendering', () => {
  test('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`))
      .toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;');
  });

  test('issue rows carry a severity class and page', () => {
    const [error, warning, info] = sampleInput().validationIssues ?? [];
    expect(issueRow(error)).toBe('<tr class="issue-error"><td>7.1-3</td><td>ERROR</td>'
      + '<td>Content is neither marked as Artifact nor tagged</td><td>1</td></tr>');
    expect(issueRow(warning)).toContain('<td>Natural language &lt;missing&gt;</td><td>N/A</td>');
    expect(issueRow(info).startsWith('<tr><td>info-1</td>')).toBe(true);
  });

  test('page includes escaped metadata and the session section', () => {
    const html = renderReportHtml(buildRemediationReport(sampleInput()));

    expect(html).toContain('<tr><td>Document Title</td><td>Q3 &lt;Draft&gt;</td></tr>');
    expect(html).toContain('<p><strong>Marked Content References:</strong> 6</p>');
    expect(html).toContain('<tr><td>Figure</td><td>1</td></tr>');
  });
});

describe('writeRemediationReport', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  test('writes JSON by default', async () => {
    dir = await mkdtemp(join(tmpdir(), 'report-'));
    const path = join(dir, 'report.json');
    const report = buildRemediationReport(sampleInput());

    const result = await writeRemediationReport(path, report);

    expect(result).toEqual({ success: true, value: path, diagnostics: [] });
    const written: unknown = JSON.parse(await readFile(path, 'utf-8'));
    expect(written).toEqual(JSON.parse(JSON.stringify(report)));
  });

  test('an unwritable path is reported, not thrown', async () => {
    dir = await mkdtemp(join(tmpdir(), 'report-'));
    const result = await writeRemediationReport(join(dir, 'missing', 'report.html'),
      buildRemediationReport(sampleInput()), 'html');

    expect(result.success).toBe(false);
    expect(result.diagnostics[0].code).toBe('save-failed');
  });
});
