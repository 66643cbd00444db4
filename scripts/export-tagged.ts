/**
 * Export a tagged copy of a PDF.
 *
 * Usage:
 *   npx tsx scripts/export-tagged.ts <in.pdf> <out.pdf> [sidecar.json] [--report <report.json|report.html>]
 *
 * Without a sidecar argument, <in>_sidecar.json is used when it exists.
 * Settings come from the persisted settings file, then TAGGER_* variables.
 */

import fs from 'fs';
import path from 'path';
import { resolveEngineSettings, settingsFromEnv, TOOL_NAME } from '../src/utils/config';
import { buildRemediationReport, writeRemediationReport } from '../src/utils/remediationReport';
import { SettingsStore } from '../src/utils/settingsStore';
import { readSidecarFile, sidecarPathFor } from '../src/utils/sidecarStore';
import { TaggingEngine } from '../src/utils/taggingPipeline';
import type { Diagnostic, SidecarDocument } from '../src/types';

function usage(): never {
  console.error('Usage: npx tsx scripts/export-tagged.ts <in.pdf> <out.pdf> [sidecar.json] [--report <file>]');
  process.exit(1);
}

function printDiagnostics(diagnostics: Diagnostic[]): void {
  for (const d of diagnostics) {
    const where = d.page === undefined ? '' : ` (page ${d.page})`;
    console.log(`  ${d.severity.toUpperCase().padEnd(7)} ${d.code}${where}: ${d.message}`);
  }
}

async function loadSidecar(inputPath: string, explicit: string | undefined): Promise<SidecarDocument | undefined> {
  const sidecarPath = explicit ?? sidecarPathFor(inputPath);
  if (!explicit && !fs.existsSync(sidecarPath)) return undefined;

  const result = await readSidecarFile(sidecarPath);
  printDiagnostics(result.diagnostics);
  if (!result.success) {
    console.error(`Could not read sidecar ${sidecarPath}`);
    process.exit(1);
  }
  console.log(`Sidecar: ${sidecarPath}`);
  return result.value;
}

async function main() {
  const args = process.argv.slice(2);
  const reportFlag = args.indexOf('--report');
  const reportPath = reportFlag >= 0 ? args[reportFlag + 1] : undefined;
  if (reportFlag >= 0) {
    if (!reportPath) usage();
    args.splice(reportFlag, 2);
  }

  const [inputPath, outputPath, sidecarArg] = args;
  if (!inputPath || !outputPath) usage();

  const stored = new SettingsStore().load();
  const env = settingsFromEnv();
  printDiagnostics([...stored.diagnostics, ...env.diagnostics]);
  const settings = resolveEngineSettings(stored.settings, env.settings);

  const sidecar = await loadSidecar(inputPath, sidecarArg);
  const pdfData = new Uint8Array(fs.readFileSync(path.resolve(inputPath)));

  const engine = new TaggingEngine({ settings });
  const result = await engine.exportTaggedPdf({
    pdfData,
    sidecar,
    onProgress: e => console.log(`[${String(e.progress).padStart(3)}%] ${e.message}`),
  });

  printDiagnostics(result.diagnostics);
  if (!result.success || !result.pdfBytes) {
    console.error('Export failed');
    process.exit(1);
  }

  fs.writeFileSync(path.resolve(outputPath), result.pdfBytes);
  console.log(`\nWrote ${outputPath}`);
  console.log(engine.builder.formatOutline().join('\n'));

  if (reportPath && result.metadata) {
    const report = buildRemediationReport({
      sourcePath: inputPath,
      outputPath,
      toolName: TOOL_NAME,
      metadata: result.metadata,
      sidecar,
      session: result.statistics,
    });
    const format = path.extname(reportPath).toLowerCase() === '.html' ? 'html' : settings.reportFormat;
    const written = await writeRemediationReport(reportPath, report, format);
    printDiagnostics(written.diagnostics);
    if (written.success) console.log(`Report: ${reportPath}`);
  }
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
