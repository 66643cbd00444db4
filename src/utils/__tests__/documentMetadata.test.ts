/**
 * Unit Tests: document-level accessibility metadata
 */
import { describe, test, expect } from 'vitest';
import { PDFBool, PDFDict, PDFDocument, PDFName } from 'pdf-lib';
import { applyDocumentMetadata, DEFAULT_SUBJECT } from '../documentMetadata';
import { verifyStructureTree } from '../structureTreeInspector';

const OPTIONS = {
  producer: 'tagged-pdf-engine',
  creator: 'tagged-pdf-engine',
  modificationDate: new Date('2026-01-02T03:04:05Z'),
};

function markInfo(pdfDoc: PDFDocument): PDFDict {
  const dict = pdfDoc.catalog.lookup(PDFName.of('MarkInfo'));
  if (!(dict instanceof PDFDict)) throw new Error('no MarkInfo');
  return dict;
}

describe('applyDocumentMetadata', () => {
  test('sets title, language and the tagged flags', async () => {
    const pdfDoc = await PDFDocument.create();

    const changes = applyDocumentMetadata(pdfDoc, { title: '  Annual Report ', language: 'en-GB' }, OPTIONS);

    expect(changes).toEqual({ title: 'Annual Report', language: 'en-GB', marked: true, accessibilityFlagsSet: true });
    expect(pdfDoc.getTitle()).toBe('Annual Report');
    expect(pdfDoc.getSubject()).toBe(DEFAULT_SUBJECT);
    expect(pdfDoc.getProducer()).toBe('tagged-pdf-engine');
    expect(pdfDoc.getModificationDate()).toEqual(OPTIONS.modificationDate);
    expect(pdfDoc.catalog.getViewerPreferences()?.getDisplayDocTitle()).toBe(true);

    const status = verifyStructureTree(pdfDoc);
    expect(status.language).toBe('en-GB');
    expect(status.marked).toBe(true);
    expect(markInfo(pdfDoc).lookup(PDFName.of('Suspects'))).toBe(PDFBool.False);
  });

  test('blank title and language are left unset', async () => {
    const pdfDoc = await PDFDocument.create();

    const changes = applyDocumentMetadata(pdfDoc, { title: '   ', language: '' }, OPTIONS);

    expect(changes.title).toBeNull();
    expect(changes.language).toBeNull();
    expect(pdfDoc.getTitle()).toBeUndefined();
    expect(pdfDoc.catalog.lookup(PDFName.of('Lang'))).toBeUndefined();
  });

  test('an existing MarkInfo dictionary is updated in place', async () => {
    const pdfDoc = await PDFDocument.create();
    const existing = pdfDoc.context.obj({ Marked: false, Custom: 'Kept' });
    pdfDoc.catalog.set(PDFName.of('MarkInfo'), existing);

    applyDocumentMetadata(pdfDoc, { marked: false, subject: 'Remediated' }, OPTIONS);

    expect(markInfo(pdfDoc)).toBe(existing);
    expect(existing.lookup(PDFName.of('Marked'))).toBe(PDFBool.False);
    expect(existing.lookup(PDFName.of('UserProperties'))).toBe(PDFBool.False);
    expect(existing.lookup(PDFName.of('Custom'))).toBe(PDFName.of('Kept'));
    expect(pdfDoc.getSubject()).toBe('Remediated');
  });
});
