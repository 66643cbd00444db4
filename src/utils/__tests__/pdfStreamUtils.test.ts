/**
 * Unit Tests: content stream helpers
 */
import { describe, it, expect } from 'vitest';
import { PDFDocument, PDFName, PDFStream } from 'pdf-lib';
import {
  binaryStringToBytes,
  bytesToBinaryString,
  decodeStream,
  getContentStreams,
  hexToString,
  replaceStream,
  unescapePDFString,
} from '../pdfStreamUtils';

describe('unescapePDFString', () => {
  it('handles named escapes', () => {
    expect(unescapePDFString('a\\nb\\tc\\(d\\)\\\\')).toBe('a\nb\tc(d)\\');
  });

  it('handles octal escapes', () => {
    expect(unescapePDFString('\\101\\102')).toBe('AB');
  });

  it('drops escaped line breaks', () => {
    expect(unescapePDFString('one\\\ntwo')).toBe('onetwo');
  });
});

describe('hexToString', () => {
  it('ignores whitespace and pads an odd final digit', () => {
    expect(hexToString('48 69 4')).toBe('Hi@');
  });
});

describe('binary strings', () => {
  it('keep bytes above 0x7f unchanged', () => {
    const bytes = new Uint8Array([0x42, 0x80, 0x9f, 0xff]);
    expect(binaryStringToBytes(bytesToBinaryString(bytes))).toEqual(bytes);
  });
});

describe('decodeStream', () => {
  it('returns unfiltered bytes as they are', async () => {
    const pdfDoc = await PDFDocument.create();
    const decoded = decodeStream(pdfDoc.context.stream('BT ET'));
    expect(decoded && bytesToBinaryString(decoded)).toBe('BT ET');
  });

  it('returns null when the filter cannot be applied', async () => {
    const pdfDoc = await PDFDocument.create();
    expect(decodeStream(pdfDoc.context.stream('BT ET', { Filter: 'JBIG2Decode' }))).toBeNull();
  });

  it('returns null for FlateDecode data that does not inflate', async () => {
    const pdfDoc = await PDFDocument.create();
    expect(decodeStream(pdfDoc.context.stream('not deflated', { Filter: 'FlateDecode' }))).toBeNull();
  });
});

describe('replaceStream', () => {
  it('writes a FlateDecode stream that decodes back to the content', async () => {
    const pdfDoc = await PDFDocument.create();
    const page = pdfDoc.addPage();
    const ref = pdfDoc.context.register(pdfDoc.context.stream('BT ET'));
    page.node.set(PDFName.of('Contents'), pdfDoc.context.obj([ref]));

    replaceStream(pdfDoc, ref, 'q 1 0 0 1 0 0 cm Q');

    const [entry] = getContentStreams(pdfDoc, page);
    expect(entry.ref).toBe(ref);
    expect(entry.stream.dict.lookup(PDFName.of('Filter'))).toBe(PDFName.of('FlateDecode'));
    const stream = pdfDoc.context.lookup(ref);
    const decoded = stream instanceof PDFStream ? decodeStream(stream) : null;
    expect(decoded && bytesToBinaryString(decoded)).toBe('q 1 0 0 1 0 0 cm Q');
  });
});
