/**
 * Document-level accessibility metadata: title, language, MarkInfo and the
 * info dictionary entries a remediated file should carry.
 */

import { PDFBool, PDFDict, PDFDocument, PDFName } from 'pdf-lib';

export interface DocumentMetadata {
  title?: string;
  language?: string;
  /** defaults to true */
  marked?: boolean;
  subject?: string;
}

export interface MetadataOptions {
  producer: string;
  creator: string;
  modificationDate?: Date;
}

export interface MetadataChanges {
  title: string | null;
  language: string | null;
  marked: boolean;
  accessibilityFlagsSet: boolean;
}

export const DEFAULT_SUBJECT = 'PDF with accessibility improvements';

export function applyDocumentMetadata(
  pdfDoc: PDFDocument,
  metadata: DocumentMetadata,
  options: MetadataOptions,
): MetadataChanges {
  const title = metadata.title?.trim() || null;
  const language = metadata.language?.trim() || null;
  const marked = metadata.marked ?? true;

  // showInWindowTitleBar writes /ViewerPreferences /DisplayDocTitle true
  if (title) pdfDoc.setTitle(title, { showInWindowTitleBar: true });
  if (language) pdfDoc.setLanguage(language);

  pdfDoc.setCreator(options.creator);
  pdfDoc.setProducer(options.producer);
  pdfDoc.setSubject(metadata.subject ?? DEFAULT_SUBJECT);
  pdfDoc.setModificationDate(options.modificationDate ?? new Date());

  setMarkInfo(pdfDoc, marked);

  return { title, language, marked, accessibilityFlagsSet: true };
}

function setMarkInfo(pdfDoc: PDFDocument, marked: boolean): void {
  const key = PDFName.of('MarkInfo');
  const existing = pdfDoc.catalog.lookup(key);
  let markInfo: PDFDict;
  if (existing instanceof PDFDict) {
    markInfo = existing;
  } else {
    markInfo = pdfDoc.context.obj({});
    pdfDoc.catalog.set(key, markInfo);
  }
  if (marked) markInfo.set(PDFName.of('Marked'), PDFBool.True);
  markInfo.set(PDFName.of('UserProperties'), PDFBool.False);
  markInfo.set(PDFName.of('Suspects'), PDFBool.False);
}
