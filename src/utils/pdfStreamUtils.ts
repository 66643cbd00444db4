/**
 * Shared PDF content stream utilities.
 *
 * Content streams are handled as binary strings (one char per byte) so that
 * operators can be found with regular expressions and the bytes written back
 * unchanged outside the edited ranges.
 */

import {
  PDFArray,
  PDFDocument,
  PDFName,
  PDFPage,
  PDFRawStream,
  PDFRef,
  PDFStream,
  decodePDFRawStream,
} from 'pdf-lib';
import * as pako from 'pako';

export interface PageContentStream {
  ref: PDFRef;
  stream: PDFStream;
}

/**
 * Content streams of a page in drawing order. Only indirect streams are
 * returned, since rewriting one means assigning a new object to its ref.
 */
export function getContentStreams(pdfDoc: PDFDocument, page: PDFPage): PageContentStream[] {
  const context = pdfDoc.context;
  const contents = page.node.get(PDFName.of('Contents'));
  const streams: PageContentStream[] = [];

  const collect = (candidate: unknown) => {
    if (!(candidate instanceof PDFRef)) return;
    const stream = context.lookup(candidate);
    if (stream instanceof PDFStream) streams.push({ ref: candidate, stream });
  };

  if (contents instanceof PDFRef) {
    const target = context.lookup(contents);
    if (target instanceof PDFArray) {
      target.asArray().forEach(collect);
    } else {
      collect(contents);
    }
  } else if (contents instanceof PDFArray) {
    contents.asArray().forEach(collect);
  }

  return streams;
}

/**
 * Decode a content stream. Returns null when the declared filter chain
 * cannot be applied; raw bytes are only returned for unfiltered streams.
 */
export function decodeStream(stream: PDFStream): Uint8Array | null {
  const contents = stream.getContents();
  if (contents.length === 0) return null;
  if (!stream.dict.has(PDFName.of('Filter'))) return contents;

  if (stream instanceof PDFRawStream) {
    try {
      return decodePDFRawStream(stream).decode();
    } catch (e) {
      console.warn('[pdfStreamUtils] Filter decode failed:', e);
      return null;
    }
  }

  try {
    return pako.inflate(contents);
  } catch (e) {
    console.warn('[pdfStreamUtils] Inflate failed:', e);
    return null;
  }
}

/**
 * Replace the stream behind `ref` with FlateDecode-compressed `content`.
 * Other entries of the old stream dictionary are not carried over; content
 * streams only need Filter and Length.
 */
export function replaceStream(pdfDoc: PDFDocument, ref: PDFRef, content: string): void {
  const compressed = pako.deflate(binaryStringToBytes(content));
  const streamDict = pdfDoc.context.obj({
    Length: compressed.length,
    Filter: 'FlateDecode',
  });
  pdfDoc.context.assign(ref, PDFRawStream.of(streamDict, compressed));
}

export function bytesToBinaryString(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

export function binaryStringToBytes(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xFF;
  }
  return bytes;
}

/**
 * Unescape a PDF literal string body (the part between the parentheses).
 */
export function unescapePDFString(str: string): string {
  return str.replace(/\\([nrtbf()\\]|[0-7]{1,3}|\r?\n)/g, (_match, seq: string) => {
    switch (seq) {
      case 'n': return '\n';
      case 'r': return '\r';
      case 't': return '\t';
      case 'b': return '\b';
      case 'f': return '\f';
      case '(': return '(';
      case ')': return ')';
      case '\\': return '\\';
      default:
        if (/^[0-7]+$/.test(seq)) return String.fromCharCode(parseInt(seq, 8) & 0xFF);
        return '';
    }
  });
}

/**
 * Convert hex string to text
 */
export function hexToString(hex: string): string {
  let result = '';
  let cleanHex = hex.replace(/\s/g, '');
  if (cleanHex.length % 2 === 1) cleanHex += '0';
  for (let i = 0; i < cleanHex.length; i += 2) {
    const code = parseInt(cleanHex.substring(i, i + 2), 16);
    if (!isNaN(code)) {
      result += String.fromCharCode(code);
    }
  }
  return result;
}
