/**
 * Print what a PDF says about its logical structure.
 *
 * Usage:
 *   npx tsx scripts/inspect-structure.ts <file.pdf>
 */

import fs from 'fs';
import path from 'path';
import { PDFDocument } from 'pdf-lib';
import { formatStatusReport, inspectStructureRoot, verifyStructureTree } from '../src/utils/structureTreeInspector';

async function main() {
  const pdfPath = process.argv[2];
  if (!pdfPath) {
    console.error('Usage: npx tsx scripts/inspect-structure.ts <file.pdf>');
    process.exit(1);
  }

  const fullPath = path.resolve(pdfPath);
  const pdfDoc = await PDFDocument.load(fs.readFileSync(fullPath), { updateMetadata: false });
  console.log(`\n=== ${fullPath} (${pdfDoc.getPageCount()} pages) ===\n`);

  const existing = inspectStructureRoot(pdfDoc);
  if (existing?.kind === 'unrecognized') {
    console.log(`StructTreeRoot is not usable: ${existing.description}\n`);
  }

  for (const line of formatStatusReport(verifyStructureTree(pdfDoc))) {
    console.log(line);
  }
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
